import { Module } from '@nestjs/common';
import { GeminiModule } from '../gemini/gemini.module';
import { ExtractorService } from './extractor.service';

@Module({
  imports: [GeminiModule],
  providers: [ExtractorService],
  exports: [ExtractorService, GeminiModule],
})
export class ExtractionModule {}
