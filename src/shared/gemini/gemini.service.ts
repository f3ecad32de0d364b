import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { GoogleGenAI } from '@google/genai';
import { CollaboratorUnavailableError } from '@/shared/crawl/errors/crawl.errors';

export const GEMINI_MODELS: Record<string, string> = {
  'gemini-2.0-flash': 'Gemini 2.0 Flash',
  'gemini-2.0-flash-lite': 'Gemini 2.0 Flash-Lite',
  'gemini-2.5-flash': 'Gemini 2.5 Flash',
  'gemini-2.5-pro': 'Gemini 2.5 Pro',
};

export interface GenerateTextOptions {
  model?: string;
  jsonMode?: boolean;
  systemInstruction?: string;
  temperature?: number;
  maxOutputTokens?: number;
}

@Injectable()
export class GeminiService implements OnModuleInit {
  private readonly logger = new Logger(GeminiService.name);
  private client: GoogleGenAI | null = null;
  private defaultModel = 'gemini-2.0-flash';

  constructor(private readonly configService: ConfigService) {}

  onModuleInit() {
    this.defaultModel =
      this.configService.get<string>('GEMINI_DEFAULT_MODEL') || this.defaultModel;

    const apiKey = this.configService.get<string>('GEMINI_API_KEY');
    if (!apiKey) {
      this.logger.warn('GEMINI_API_KEY is not configured; agent mode is disabled');
      return;
    }
    this.client = new GoogleGenAI({ apiKey });
    this.logger.log(`Gemini client initialized (default model ${this.defaultModel})`);
  }

  isConfigured(): boolean {
    return this.client !== null;
  }

  getDefaultModel(): string {
    return this.defaultModel;
  }

  /**
   * Generate text content using Gemini.
   * @param jsonMode - ask for `application/json` output
   */
  async generateText(
    prompt: string,
    options: GenerateTextOptions = {},
  ): Promise<string> {
    if (!this.client) {
      throw new CollaboratorUnavailableError(
        'gemini',
        'Gemini client is not initialized. Check GEMINI_API_KEY configuration.',
      );
    }

    const model = options.model || this.defaultModel;
    try {
      const result = await this.client.models.generateContent({
        model,
        contents: prompt,
        config: {
          systemInstruction: options.systemInstruction,
          temperature: options.temperature,
          maxOutputTokens: options.maxOutputTokens,
          responseMimeType: options.jsonMode ? 'application/json' : undefined,
        },
      });

      const text = result.candidates?.[0]?.content?.parts?.[0]?.text;

      if (!text) {
        throw new Error('No text returned from Gemini API');
      }

      return text;
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.logger.error(`Failed to generate text with ${model}: ${err.message}`, err.stack);
      throw err;
    }
  }
}
