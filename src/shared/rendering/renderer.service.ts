import { Injectable } from '@nestjs/common';
import { BrowserClientRenderer } from './renderers/browser-client.renderer';
import { FetchRenderer } from './renderers/fetch.renderer';
import type {
  RenderRequest,
  RenderResult,
  Renderer,
} from './interfaces/renderer.interface';

/** Picks the browser renderer for `useBrowser` requests, plain fetch otherwise. */
@Injectable()
export class RendererService implements Renderer {
  constructor(
    private readonly fetchRenderer: FetchRenderer,
    private readonly browserRenderer: BrowserClientRenderer,
  ) {}

  render(request: RenderRequest): Promise<RenderResult> {
    return request.useBrowser
      ? this.browserRenderer.render(request)
      : this.fetchRenderer.render(request);
  }
}
