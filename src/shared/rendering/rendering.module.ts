import { Module } from '@nestjs/common';
import { BrowserClientRenderer } from './renderers/browser-client.renderer';
import { FetchRenderer } from './renderers/fetch.renderer';
import { RendererService } from './renderer.service';
import { RENDERER } from './interfaces/renderer.interface';

@Module({
  providers: [
    FetchRenderer,
    BrowserClientRenderer,
    RendererService,
    { provide: RENDERER, useExisting: RendererService },
  ],
  exports: [RENDERER],
})
export class RenderingModule {}
