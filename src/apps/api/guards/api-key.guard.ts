import {
  CanActivate,
  ExecutionContext,
  Injectable,
  Logger,
  UnauthorizedException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { FastifyRequest } from 'fastify';

/** Requires a matching x-api-key header when API_KEY is configured. */
@Injectable()
export class ApiKeyGuard implements CanActivate {
  private readonly logger = new Logger(ApiKeyGuard.name);
  private readonly apiKey: string;

  constructor(private readonly configService: ConfigService) {
    this.apiKey = this.configService.get<string>('API_KEY') ?? '';
    if (!this.apiKey) {
      this.logger.warn('API_KEY is not set; job endpoints are unauthenticated');
    }
  }

  canActivate(context: ExecutionContext): boolean {
    if (!this.apiKey) return true;

    const request = context.switchToHttp().getRequest<FastifyRequest>();
    const providedKey = request.headers['x-api-key'];

    if (!providedKey) {
      this.logger.warn('Missing API key in request');
      throw new UnauthorizedException('API key required');
    }

    if (providedKey !== this.apiKey) {
      this.logger.warn(`Invalid API key from ${request.ip}`);
      throw new UnauthorizedException('Invalid API key');
    }

    return true;
  }
}
