import { Controller, Get } from '@nestjs/common';
import { CRAWL_MODES, CrawlMode } from '@/shared/crawl/interfaces/job-request.interface';
import { GEMINI_MODELS, GeminiService } from '@/shared/gemini/gemini.service';

const MODE_DESCRIPTIONS: Record<CrawlMode, string> = {
  scrape: 'Fetch one page and convert it to markdown, text or html',
  search: 'Rank the passages of one page against a query',
  agent: 'Extract structured data from one page with a language model',
  map: 'Breadth-first discovery of the pages reachable from a seed',
  crawl: 'Scrape a list of pages, optionally following their links',
};

@Controller()
export class MetadataController {
  constructor(private readonly gemini: GeminiService) {}

  @Get('modes')
  modes() {
    return {
      success: true,
      modes: CRAWL_MODES.map((mode) => ({
        mode,
        endpoint: `/api/${mode}`,
        description: MODE_DESCRIPTIONS[mode],
      })),
    };
  }

  @Get('models')
  models() {
    return {
      success: true,
      configured: this.gemini.isConfigured(),
      default_model: this.gemini.getDefaultModel(),
      models: Object.entries(GEMINI_MODELS).map(([id, name]) => ({ id, name })),
    };
  }
}
