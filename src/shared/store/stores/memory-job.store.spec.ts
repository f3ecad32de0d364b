import type { JobResult, PageResult } from '@/shared/crawl/interfaces/job-result.interface';
import { MemoryJobStore } from './memory-job.store';

function page(url: string, sequence: number): PageResult {
  return {
    url,
    depth: 0,
    parent: null,
    sequence,
    status: 'ok',
    fetchedAt: '2026-01-01T00:00:00.000Z',
    elapsedMs: 5,
    attempts: 1,
  };
}

const RESULT: JobResult = {
  id: 'job-1',
  mode: 'crawl',
  request: {
    mode: 'crawl',
    urls: ['https://a.test/1', 'https://a.test/2', 'https://a.test/3'],
    format: 'text',
    maxDepth: 0,
    sameDomain: false,
    useBrowser: false,
    includeLinks: false,
    includeImages: false,
  },
  status: 'completed',
  pages: [page('https://a.test/1', 0), page('https://a.test/2', 1), page('https://a.test/3', 2)],
  counts: { attempted: 3, succeeded: 3, failed: 0, skippedByRobots: 0, discovered: 3 },
  createdAt: '2026-01-01T00:00:00.000Z',
};

describe('MemoryJobStore', () => {
  it('saves, loads and deletes copies of a job', async () => {
    const store = new MemoryJobStore();
    const saved = structuredClone(RESULT);
    await store.save(saved);
    saved.pages.length = 0;

    const loaded = await store.load('job-1');
    expect(loaded).toEqual(RESULT);

    await expect(store.delete('job-1')).resolves.toBe(true);
    await expect(store.delete('job-1')).resolves.toBe(false);
    await expect(store.load('job-1')).resolves.toBeNull();
  });

  it('slices pages', async () => {
    const store = new MemoryJobStore();
    await store.save(RESULT);

    const slice = await store.listPages('job-1', 1, 1);
    expect(slice).toEqual({ total: 3, pages: [RESULT.pages[1]] });
    await expect(store.listPages('job-1', 10, 5)).resolves.toEqual({ total: 3, pages: [] });
    await expect(store.listPages('other', 10, 0)).resolves.toBeNull();
  });
});
