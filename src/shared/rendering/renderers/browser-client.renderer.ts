import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Pool, errors } from 'undici';
import {
  CollaboratorUnavailableError,
  RenderError,
  RenderTimeoutError,
  errorMessage,
} from '@/shared/crawl/errors/crawl.errors';
import {
  RenderRequest,
  RenderResult,
  Renderer,
} from '@/shared/rendering/interfaces/renderer.interface';

interface BrowserServiceResponse {
  success: boolean;
  data?: string;
  statusCode?: number;
  finalUrl?: string;
  error?: string;
}

const UNREACHABLE_CODES = new Set(['ECONNREFUSED', 'ENOTFOUND', 'EHOSTUNREACH']);

/**
 * JavaScript-executing renderer. Delegates to the remote browser service
 * (`POST /browser/scrape`) over a keep-alive pool.
 */
@Injectable()
export class BrowserClientRenderer implements Renderer, OnModuleDestroy {
  private readonly logger = new Logger(BrowserClientRenderer.name);
  private readonly client: Pool | null;
  private readonly apiKey: string;

  constructor(private readonly configService: ConfigService) {
    const serviceUrl = this.configService.get<string>('BROWSER_SERVICE_URL');
    this.apiKey =
      this.configService.get<string>('BROWSER_SERVICE_API_KEY') || '';

    if (!serviceUrl) {
      this.logger.warn(
        'BROWSER_SERVICE_URL is not configured; use_browser requests will fail',
      );
      this.client = null;
      return;
    }

    this.client = new Pool(serviceUrl, {
      connections: 100,
      pipelining: 0,
      keepAliveTimeout: 10000,
      keepAliveMaxTimeout: 10000,
    });
  }

  async onModuleDestroy() {
    await this.client?.close();
  }

  async render(renderRequest: RenderRequest): Promise<RenderResult> {
    if (!this.client) {
      throw new CollaboratorUnavailableError(
        'browser-service',
        'Browser rendering is not configured (BROWSER_SERVICE_URL)',
      );
    }

    const { url, userAgent, timeoutMs } = renderRequest;
    let payload: unknown;
    let statusCode: number;

    try {
      const response = await this.client.request({
        path: '/browser/scrape',
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'X-API-Key': this.apiKey,
        },
        body: JSON.stringify({ url, options: { timeout: timeoutMs, userAgent } }),
        headersTimeout: timeoutMs,
        bodyTimeout: timeoutMs,
      });
      statusCode = response.statusCode;
      payload = await response.body.json();
    } catch (error) {
      if (
        error instanceof errors.HeadersTimeoutError ||
        error instanceof errors.BodyTimeoutError
      ) {
        throw new RenderTimeoutError(url, timeoutMs, { cause: error });
      }
      if (isUnreachable(error)) {
        throw new CollaboratorUnavailableError(
          'browser-service',
          `Browser service unreachable: ${errorMessage(error)}`,
          { cause: error },
        );
      }
      throw new RenderError(
        `Browser render of ${url} failed: ${errorMessage(error)}`,
        { cause: error },
      );
    }

    if (statusCode === 401 || statusCode === 403) {
      throw new CollaboratorUnavailableError(
        'browser-service',
        `Browser service rejected the API key (HTTP ${statusCode})`,
      );
    }

    const response = asBrowserResponse(payload);
    if (!response || statusCode >= 400 || !response.success || response.data === undefined) {
      const reason = response?.error || `HTTP Error ${statusCode}`;
      throw new RenderError(`Browser render of ${url} failed: ${reason}`);
    }

    return {
      html: response.data,
      statusCode: response.statusCode ?? 200,
      finalUrl: response.finalUrl ?? url,
    };
  }
}

function asBrowserResponse(payload: unknown): BrowserServiceResponse | null {
  if (typeof payload !== 'object' || payload === null) return null;
  if (!('success' in payload) || typeof payload.success !== 'boolean') {
    return null;
  }

  const field = (key: 'data' | 'finalUrl' | 'error'): string | undefined => {
    const value: unknown = Reflect.get(payload, key);
    return typeof value === 'string' ? value : undefined;
  };
  const statusCode =
    'statusCode' in payload && typeof payload.statusCode === 'number'
      ? payload.statusCode
      : undefined;

  return {
    success: payload.success,
    data: field('data'),
    finalUrl: field('finalUrl'),
    error: field('error'),
    statusCode,
  };
}

function isUnreachable(error: unknown): boolean {
  if (error instanceof errors.ConnectTimeoutError) return true;
  const code =
    error instanceof Error && 'code' in error ? String(error.code) : '';
  return UNREACHABLE_CODES.has(code);
}
