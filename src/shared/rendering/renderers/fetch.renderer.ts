import { Injectable, Logger } from '@nestjs/common';
import {
  FetchError,
  RenderTimeoutError,
  errorMessage,
} from '@/shared/crawl/errors/crawl.errors';
import {
  RenderRequest,
  RenderResult,
  Renderer,
} from '@/shared/rendering/interfaces/renderer.interface';
import { httpGet, isTimeoutError } from '@/shared/rendering/lib/http-get';

/** Plain HTTP GET, no JavaScript execution. */
@Injectable()
export class FetchRenderer implements Renderer {
  private readonly logger = new Logger(FetchRenderer.name);

  async render(renderRequest: RenderRequest): Promise<RenderResult> {
    const { url, userAgent, timeoutMs } = renderRequest;
    const startTime = Date.now();

    try {
      const response = await httpGet(url, {
        userAgent,
        timeoutMs,
        accept:
          'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
      });

      this.logger.debug(
        `GET ${url} -> ${response.statusCode}: ${Buffer.byteLength(response.body, 'utf8')} bytes in ${Date.now() - startTime}ms`,
      );

      return {
        html: response.body,
        statusCode: response.statusCode,
        finalUrl: response.finalUrl,
      };
    } catch (error) {
      if (isTimeoutError(error)) {
        throw new RenderTimeoutError(url, timeoutMs, { cause: error });
      }
      throw new FetchError(`GET ${url} failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}
