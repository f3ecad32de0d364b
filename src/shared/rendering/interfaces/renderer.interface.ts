export const RENDERER = Symbol('RENDERER');

export interface RenderRequest {
  url: string;
  userAgent: string;
  timeoutMs: number;
  // Execute page JavaScript through the browser service.
  useBrowser: boolean;
}

export interface RenderResult {
  html: string;
  statusCode: number;
  finalUrl: string;
}

/**
 * Turns a URL into HTML. An HTTP error status is a result, not a throw;
 * transport failures throw FetchError, RenderTimeoutError or RenderError,
 * and a renderer that cannot serve anything throws CollaboratorUnavailableError.
 */
export interface Renderer {
  render(request: RenderRequest): Promise<RenderResult>;
}
