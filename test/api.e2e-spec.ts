import { Test } from '@nestjs/testing';
import {
  FastifyAdapter,
  NestFastifyApplication,
} from '@nestjs/platform-fastify';
import { RobotsGateService } from '@/shared/crawl/services/robots-gate.service';
import { sleep } from '@/shared/lib/util';
import {
  RENDERER,
  Renderer,
  RenderRequest,
} from '@/shared/rendering/interfaces/renderer.interface';

const API_KEY = 'test-secret';

const PAGES: Record<string, string> = {
  'https://site.test/':
    '<html><head><title>Welcome</title></head><body><h1>Welcome home</h1><p>Start <a href="/about">here</a>.</p><a href="/contact">Contact</a></body></html>',
  'https://site.test/about':
    '<html><body><p>We build a polite web crawler for teams</p><p>Reach us any time for more details</p><p>Our office is closed on public holidays</p><a href="/">home</a></body></html>',
};

/** Serves PAGES; /slow takes a second; anything else is a 404. */
const renderer: Renderer = {
  async render({ url }: RenderRequest) {
    if (url === 'https://site.test/slow') {
      await sleep(1000);
      return { html: '<p>finally</p>', statusCode: 200, finalUrl: url };
    }
    const html = PAGES[url];
    return html === undefined
      ? { html: 'Not Found', statusCode: 404, finalUrl: url }
      : { html, statusCode: 200, finalUrl: url };
  },
};

describe('Crawl API (e2e)', () => {
  let app: NestFastifyApplication;

  const post = (url: string, payload: object, key: string | null = API_KEY) =>
    app.inject({
      method: 'POST',
      url,
      payload,
      headers: key ? { 'x-api-key': key } : {},
    });
  const get = (url: string) =>
    app.inject({ method: 'GET', url, headers: { 'x-api-key': API_KEY } });

  beforeAll(async () => {
    Object.assign(process.env, {
      NODE_ENV: 'test',
      API_KEY,
      POLITENESS_DELAY_MS: '0',
      FETCH_MAX_RETRIES: '0',
      SYNC_WAIT_TIMEOUT_MS: '500',
      JOB_RETENTION_MS: '0',
      STORE_DRIVER: 'memory',
    });
    delete process.env.REDIS_HOST;
    delete process.env.GEMINI_API_KEY;

    const { ApiAppModule } = await import('@/apps/api/app.module');
    const { configureApp } = await import('@/apps/api/app.setup');

    const moduleRef = await Test.createTestingModule({ imports: [ApiAppModule] })
      .overrideProvider(RENDERER)
      .useValue(renderer)
      .overrideProvider(RobotsGateService)
      .useValue({ isAllowed: async () => true })
      .compile();

    app = configureApp(moduleRef.createNestApplication<NestFastifyApplication>(new FastifyAdapter()));
    await app.init();
    await app.getHttpAdapter().getInstance().ready();
  });

  afterAll(async () => {
    await app.close();
  });

  it('reports health without an API key', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ status: 'ok', service: 'api' });
  });

  it('lists modes and models', async () => {
    const modes = (await get('/api/modes')).json();
    expect(modes.modes.map((entry: { mode: string }) => entry.mode)).toEqual([
      'scrape',
      'search',
      'agent',
      'map',
      'crawl',
    ]);

    const models = (await get('/api/models')).json();
    expect(models).toMatchObject({ configured: false, default_model: 'gemini-2.0-flash' });
  });

  it('rejects job requests without the API key', async () => {
    const res = await post('/api/scrape', { url: 'https://site.test/' }, null);

    expect(res.statusCode).toBe(401);
    expect(res.json()).toEqual({ success: false, error: 'API key required' });
  });

  it('scrapes a page synchronously', async () => {
    const res = await post('/api/scrape', { url: 'https://site.test/' });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body).toMatchObject({
      success: true,
      mode: 'scrape',
      status: 'completed',
      outcome: 'complete',
      url: 'https://site.test/',
      format: 'markdown',
      page_status: 'ok',
      status_code: 200,
      content: '# Welcome home\n\nStart here.\n\nContact',
      counts: {
        pages_attempted: 1,
        pages_succeeded: 1,
        pages_failed: 0,
        pages_skipped_by_robots: 0,
        pages_discovered: 1,
      },
    });
    expect(body.metadata.title).toBe('Welcome');
  });

  it('reports a failed page inside a completed scrape', async () => {
    const body = (await post('/api/scrape', { url: 'https://site.test/missing' })).json();

    expect(body).toMatchObject({
      success: true,
      status: 'completed',
      outcome: 'failed',
      page_status: 'http_error',
      page_error: 'HTTP 404',
    });
  });

  it('validates request bodies', async () => {
    const res = await post('/api/scrape', { url: 'not-a-url', bogus: true });

    expect(res.statusCode).toBe(400);
    const body = res.json();
    expect(body.success).toBe(false);
    expect(body.error).toBe('Validation failed');
    expect(body.details).toEqual(
      expect.arrayContaining(['property bogus should not exist', 'url must be a URL address']),
    );
  });

  it('rejects a map beyond the page ceiling as a configuration error', async () => {
    const res = await post('/api/map', { url: 'https://site.test/', max_pages: 5000 });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      success: false,
      error: 'Invalid map request',
      code: 'JOB_CONFIG_ERROR',
      details: ['max_pages must not exceed 1000'],
    });
  });

  it('maps a site breadth-first', async () => {
    const body = (await post('/api/map', { url: 'https://site.test/' })).json();

    expect(body).toMatchObject({ status: 'completed', outcome: 'partial' });
    expect(body.urls).toEqual(['https://site.test/', 'https://site.test/about']);
    expect(
      body.results.map((page: { url: string; depth: number; status: string }) => [
        page.url,
        page.depth,
        page.status,
      ]),
    ).toEqual([
      ['https://site.test/', 0, 'ok'],
      ['https://site.test/about', 1, 'ok'],
      ['https://site.test/contact', 1, 'http_error'],
    ]);
    expect(body.results[0].title).toBe('Welcome');
  });

  it('ranks passages for a search', async () => {
    const body = (
      await post('/api/search', { url: 'https://site.test/about', query: 'crawler', top_k: 3 })
    ).json();

    expect(body.total_passages).toBe(3);
    expect(body.results).toHaveLength(1);
    expect(body.results[0].text).toBe('We build a polite web crawler for teams');
  });

  it('fails an agent job when no language model is configured', async () => {
    const body = (
      await post('/api/agent', { url: 'https://site.test/about', instruction: 'Who are they?' })
    ).json();

    expect(body).toMatchObject({
      success: false,
      status: 'failed',
      outcome: 'failed',
      model: 'gemini-2.0-flash',
      error: 'Gemini client is not initialized. Check GEMINI_API_KEY configuration.',
    });
  });

  it('runs a crawl asynchronously and pages through its results', async () => {
    const accepted = await post('/api/crawl?async=true', {
      urls: ['https://site.test/', 'https://site.test/about'],
    });
    expect(accepted.statusCode).toBe(202);
    const jobId: string = accepted.json().job_id;

    let status = accepted.json().status;
    for (let i = 0; i < 50 && status === 'running'; i++) {
      await sleep(20);
      status = (await get(`/api/jobs/${jobId}`)).json().status;
    }
    expect(status).toBe('completed');

    const page = (await get(`/api/jobs/${jobId}/results?limit=1&offset=1`)).json();
    expect(page).toMatchObject({ success: true, job_id: jobId, total: 2, limit: 1, offset: 1 });
    expect(page.results.map((result: { url: string }) => result.url)).toEqual([
      'https://site.test/about',
    ]);

    const list = (await get('/api/jobs')).json();
    expect(list.jobs.map((job: { job_id: string }) => job.job_id)).toContain(jobId);
  });

  it('streams crawl results as NDJSON lines', async () => {
    const res = await post('/api/crawl/stream', {
      urls: ['https://site.test/', 'https://site.test/missing'],
    });

    expect(res.statusCode).toBe(200);
    expect(res.headers['content-type']).toMatch(/^application\/x-ndjson/);
    const lines = res.body
      .trim()
      .split('\n')
      .map((line) => JSON.parse(line));

    expect(lines).toHaveLength(3);
    const pages = lines.slice(0, 2).map((line: { url: string; status: string }) => [line.url, line.status]);
    expect(pages.sort()).toEqual([
      ['https://site.test/', 'ok'],
      ['https://site.test/missing', 'http_error'],
    ]);
    expect(lines[0].job_id).toBe(lines[2].job_id);
    expect(lines[2]).toMatchObject({
      done: true,
      mode: 'crawl',
      status: 'completed',
      outcome: 'partial',
      page_count: 2,
    });
  });

  it('answers 202 when the sync wait runs out, then cancels and deletes the job', async () => {
    const accepted = await post('/api/scrape', { url: 'https://site.test/slow' });
    expect(accepted.statusCode).toBe(202);
    const jobId: string = accepted.json().job_id;
    expect(accepted.json().status).toBe('running');

    const cancelled = await post(`/api/jobs/${jobId}/cancel`, {});
    expect(cancelled.statusCode).toBe(200);
    expect(cancelled.json().cancel_reason).toBe('cancelled by request');

    const deleted = await app.inject({
      method: 'DELETE',
      url: `/api/jobs/${jobId}`,
      headers: { 'x-api-key': API_KEY },
    });
    expect(deleted.json()).toEqual({ success: true, job_id: jobId, deleted: true });

    const missing = await get(`/api/jobs/${jobId}`);
    expect(missing.statusCode).toBe(404);
    expect(missing.json()).toEqual({
      success: false,
      error: `Job ${jobId} not found`,
      code: 'JOB_NOT_FOUND',
    });
  });
});
