import { Injectable, Logger } from '@nestjs/common';
import * as cheerio from 'cheerio';
import {
  CrawlError,
  ExtractionError,
  errorMessage,
} from '@/shared/crawl/errors/crawl.errors';
import type {
  OutputFormat,
  SelectorSpec,
} from '@/shared/crawl/interfaces/job-request.interface';
import type {
  ImageRef,
  JsonValue,
  LinkRef,
  PageMetadata,
  ScoredPassage,
} from '@/shared/crawl/interfaces/job-result.interface';
import { GeminiService } from '@/shared/gemini/gemini.service';
import { bm25Scores, tokenize } from './lib/bm25';
import { CleanOptions, htmlToMarkdown, htmlToText } from './lib/markdown';

export const AGENT_CONTENT_LIMIT = 8000;
const PASSAGE_TAGS = 'p, li, h1, h2, h3, td';
const MIN_PASSAGE_LENGTH = 20;

export interface RankResult {
  matches: ScoredPassage[];
  totalPassages: number;
}

const AGENT_SYSTEM_INSTRUCTION =
  'You are a precise data extraction expert. Extract ONLY the requested information. ' +
  'Return valid JSON. Be accurate and concise.';

/** HTML to content conversions plus the ranking and language-model extractors. */
@Injectable()
export class ExtractorService {
  private readonly logger = new Logger(ExtractorService.name);

  constructor(private readonly gemini: GeminiService) {}

  convert(html: string, format: OutputFormat, options: CleanOptions = {}): string {
    switch (format) {
      case 'html':
        return html;
      case 'text':
        return htmlToText(html);
      case 'markdown':
        return htmlToMarkdown(html, options);
    }
  }

  extractMetadata(html: string, url: string): PageMetadata {
    const $ = cheerio.load(html);
    const meta = (selector: string) =>
      ($(selector).first().attr('content') ?? '').trim();

    let favicon = $('link[rel~="icon"]').first().attr('href')?.trim() ?? '';
    if (favicon) favicon = resolve(favicon, url) ?? '';

    return {
      title:
        $('title').first().text().trim() || meta('meta[property="og:title"]'),
      description:
        meta('meta[name="description"]') ||
        meta('meta[property="og:description"]'),
      author: meta('meta[name="author"]'),
      keywords: meta('meta[name="keywords"]'),
      favicon,
      url,
    };
  }

  extractLinks(html: string, baseUrl: string): LinkRef[] {
    const $ = cheerio.load(html);
    const baseHost = new URL(baseUrl).host;
    const seen = new Set<string>();
    const links: LinkRef[] = [];

    $('a[href]').each((_, element) => {
      const href = $(element).attr('href')?.trim();
      if (!href) return;
      const url = resolve(href, baseUrl);
      if (!url || seen.has(url)) return;
      seen.add(url);

      const text = $(element).text().replace(/\s+/g, ' ').trim();
      links.push({
        url,
        text: text || url,
        internal: hostOrNull(url) === baseHost,
      });
    });

    return links;
  }

  extractImages(html: string, baseUrl: string): ImageRef[] {
    const $ = cheerio.load(html);
    const images: ImageRef[] = [];

    $('img').each((_, element) => {
      const src = $(element).attr('src')?.trim();
      if (!src) return;
      const absolute = resolve(src, baseUrl);
      if (!absolute) return;
      images.push({
        src: absolute,
        alt: ($(element).attr('alt') ?? '').trim(),
        title: ($(element).attr('title') ?? '').trim(),
      });
    });

    return images;
  }

  extractSelectors(html: string, selectors: SelectorSpec[]): Record<string, string[]> {
    const $ = cheerio.load(html);
    const fields: Record<string, string[]> = {};

    for (const { name, selector, attr } of selectors) {
      try {
        fields[name] = $(selector)
          .toArray()
          .map((element) =>
            attr
              ? ($(element).attr(attr) ?? '').trim()
              : $(element).text().replace(/\s+/g, ' ').trim(),
          )
          .filter(Boolean);
      } catch (error) {
        throw new ExtractionError(
          `Selector "${selector}" for field "${name}" failed: ${errorMessage(error)}`,
          { cause: error },
        );
      }
    }

    return fields;
  }

  /**
   * BM25 ranking of the page's passages against `query`. Only passages that
   * score above zero are returned, best first, scores rounded to 4 decimals.
   */
  rank(html: string, query: string, topK = Number.POSITIVE_INFINITY): RankResult {
    const $ = cheerio.load(html);
    const passages: string[] = [];

    $(PASSAGE_TAGS).each((_, element) => {
      const text = $(element).text().replace(/\s+/g, ' ').trim();
      if (text.length > MIN_PASSAGE_LENGTH) passages.push(text);
    });
    if (passages.length === 0) {
      passages.push($('body').text().replace(/\s+/g, ' ').trim());
    }

    const scores = bm25Scores(passages.map(tokenize), tokenize(query));
    const matches = passages
      .map((text, index) => ({ text, score: scores[index] }))
      .filter((passage) => passage.score > 0)
      .sort((a, b) => b.score - a.score)
      .slice(0, Math.max(0, topK))
      .map(({ text, score }) => ({ text, score: Math.round(score * 10000) / 10000 }));

    return { matches, totalPassages: passages.length };
  }

  /**
   * Runs a natural-language extraction instruction over page content through
   * the language model. The reply is parsed as JSON, then as the outermost
   * `{...}` it contains, and otherwise kept as `{ raw_response }`.
   */
  async instruct(
    content: string,
    instruction: string,
    model: string | undefined,
    sourceUrl: string,
  ): Promise<JsonValue> {
    const truncated = content.slice(0, AGENT_CONTENT_LIMIT);
    const prompt = [
      'Extract Information Request',
      '==========================================',
      `Task: ${instruction}`,
      '',
      `Source: ${sourceUrl}`,
      '',
      'Content to analyze:',
      truncated,
      '',
      'Guidelines:',
      '1. Extract ONLY what was requested',
      '2. Return valid JSON format',
      '3. If information not found, indicate as null',
      '4. Be precise and accurate',
      '5. Use the exact structure requested',
    ].join('\n');

    let reply: string;
    try {
      reply = await this.gemini.generateText(prompt, {
        model,
        jsonMode: true,
        systemInstruction: AGENT_SYSTEM_INSTRUCTION,
        temperature: 0.3,
        maxOutputTokens: 2048,
      });
    } catch (error) {
      if (error instanceof CrawlError) throw error;
      throw new ExtractionError(`Language model call failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    this.logger.debug(`Model reply for ${sourceUrl}: ${reply.length} chars`);
    return parseModelReply(reply);
  }
}

export function parseModelReply(reply: string): JsonValue {
  if (!reply.trim()) return {};

  const parsed = tryParseJson(reply);
  if (parsed !== undefined) return parsed;

  const start = reply.indexOf('{');
  const end = reply.lastIndexOf('}');
  if (start !== -1 && end > start) {
    const inner = tryParseJson(reply.slice(start, end + 1));
    if (inner !== undefined) return inner;
  }

  return { raw_response: reply };
}

function tryParseJson(text: string): JsonValue | undefined {
  try {
    return toJsonValue(JSON.parse(text));
  } catch {
    return undefined;
  }
}

function toJsonValue(value: unknown): JsonValue {
  if (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  ) {
    return value;
  }
  if (Array.isArray(value)) return value.map(toJsonValue);
  if (typeof value === 'object') {
    const result: { [key: string]: JsonValue } = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = toJsonValue(entry);
    }
    return result;
  }
  return null;
}

function resolve(href: string, baseUrl: string): string | null {
  try {
    return new URL(href, baseUrl).toString();
  } catch {
    return null;
  }
}

function hostOrNull(url: string): string | null {
  try {
    return new URL(url).host;
  } catch {
    return null;
  }
}
