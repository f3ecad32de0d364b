import type {
  AgentJobRequest,
  CrawlJobRequest,
  MapJobRequest,
  ScrapeJobRequest,
  SearchJobRequest,
  SelectorSpec,
} from '@/shared/crawl/interfaces/job-request.interface';
import {
  AgentJobDto,
  CrawlJobDto,
  MapJobDto,
  ScrapeJobDto,
  SearchJobDto,
  SelectorDto,
} from '../dto/job-request.dto';

function toSelectors(selectors?: SelectorDto[]): SelectorSpec[] | undefined {
  return selectors?.map(({ name, selector, attr }) => ({ name, selector, attr }));
}

function toBase(dto: { timeout_ms?: number; delay_ms?: number }) {
  return { timeoutMs: dto.timeout_ms, delayMs: dto.delay_ms };
}

export function toScrapeRequest(dto: ScrapeJobDto): ScrapeJobRequest {
  return {
    ...toBase(dto),
    mode: 'scrape',
    url: dto.url,
    format: dto.format,
    useBrowser: dto.use_browser,
    includeLinks: dto.include_links,
    includeImages: dto.include_images,
    selectors: toSelectors(dto.selectors),
  };
}

export function toCrawlRequest(dto: CrawlJobDto): CrawlJobRequest {
  return {
    ...toBase(dto),
    mode: 'crawl',
    urls: dto.urls,
    format: dto.format,
    batchSize: dto.batch_size,
    maxDepth: dto.max_depth,
    sameDomain: dto.same_domain,
    useBrowser: dto.use_browser,
    includeLinks: dto.include_links,
    includeImages: dto.include_images,
    selectors: toSelectors(dto.selectors),
  };
}

export function toMapRequest(dto: MapJobDto): MapJobRequest {
  return {
    ...toBase(dto),
    mode: 'map',
    url: dto.url,
    maxDepth: dto.max_depth,
    maxPages: dto.max_pages,
    batchSize: dto.batch_size,
    sameDomain: dto.same_domain,
    useBrowser: dto.use_browser,
    includeContent: dto.include_content,
    format: dto.format,
    includePatterns: dto.include_patterns,
    excludePatterns: dto.exclude_patterns,
  };
}

export function toSearchRequest(dto: SearchJobDto): SearchJobRequest {
  return {
    ...toBase(dto),
    mode: 'search',
    url: dto.url,
    query: dto.query,
    topK: dto.top_k,
    useBrowser: dto.use_browser,
  };
}

export function toAgentRequest(dto: AgentJobDto): AgentJobRequest {
  return {
    ...toBase(dto),
    mode: 'agent',
    url: dto.url,
    instruction: dto.instruction,
    model: dto.model,
    useBrowser: dto.use_browser,
  };
}
