import type { FrontierEntry } from './interfaces/fetch-outcome.interface';
import { hostOf, normalizeUrl } from './lib/url';

export interface FrontierPolicy {
  maxDepth: number;
  sameDomain: boolean;
  seedHosts: string[];
  includePatterns?: RegExp[];
  excludePatterns?: RegExp[];
}

/**
 * Per-job work queue. Entries are bucketed by depth and popped FIFO from the
 * shallowest bucket, so the crawl is breadth-first even when deeper links are
 * discovered before a slow sibling returns its own links.
 */
export class Frontier {
  private readonly seen = new Set<string>();
  private readonly buckets: FrontierEntry[][] = [];
  private readonly seedHosts: Set<string>;
  private queued = 0;
  private nextSequence = 0;

  constructor(private readonly policy: FrontierPolicy) {
    this.seedHosts = new Set(policy.seedHosts);
  }

  push(url: string, depth: number, parent: string | null): boolean {
    if (depth < 0 || depth > this.policy.maxDepth) return false;

    const normalized = normalizeUrl(url);
    if (!normalized || this.seen.has(normalized)) return false;
    // Seeds are always in scope; the filters apply to discovered links.
    if (depth > 0 && !this.inScope(normalized)) return false;

    this.seen.add(normalized);
    const bucket = (this.buckets[depth] ??= []);
    bucket.push({
      url: normalized,
      depth,
      parent,
      sequence: this.nextSequence++,
    });
    this.queued++;
    return true;
  }

  pop(): FrontierEntry | undefined {
    if (this.queued === 0) return undefined;

    for (const bucket of this.buckets) {
      if (bucket && bucket.length > 0) {
        this.queued--;
        return bucket.shift();
      }
    }
    return undefined;
  }

  /** Depth of the entry the next pop() would return. */
  peekDepth(): number | undefined {
    if (this.queued === 0) return undefined;
    return this.buckets.findIndex((bucket) => bucket && bucket.length > 0);
  }

  size(): number {
    return this.queued;
  }

  seenCount(): number {
    return this.seen.size;
  }

  /** Drops everything still queued; seen URLs stay seen. */
  clear(): number {
    const dropped = this.queued;
    this.buckets.length = 0;
    this.queued = 0;
    return dropped;
  }

  private inScope(url: string): boolean {
    if (this.policy.sameDomain && !this.seedHosts.has(hostOf(url))) {
      return false;
    }

    const { includePatterns = [], excludePatterns = [] } = this.policy;
    if (excludePatterns.some((pattern) => pattern.test(url))) return false;
    if (includePatterns.length === 0) return true;
    return includePatterns.some((pattern) => pattern.test(url));
  }
}
