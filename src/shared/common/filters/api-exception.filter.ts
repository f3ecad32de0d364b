import {
  ArgumentsHost,
  Catch,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { BaseExceptionFilter } from '@nestjs/core';
import type { FastifyReply } from 'fastify';
import {
  CollaboratorUnavailableError,
  CrawlError,
  JobConfigError,
  JobNotFoundError,
} from '@/shared/crawl/errors/crawl.errors';

export interface ErrorBody {
  success: false;
  error: string;
  code?: string;
  details?: string[];
}

function httpErrorBody(exception: HttpException): ErrorBody {
  const response = exception.getResponse();
  if (typeof response === 'string') {
    return { success: false, error: response };
  }

  const message: unknown = Reflect.get(response, 'message');
  if (Array.isArray(message)) {
    return {
      success: false,
      error: 'Validation failed',
      details: message.map(String),
    };
  }
  return {
    success: false,
    error: typeof message === 'string' ? message : exception.message,
  };
}

/** Maps an exception to the status and body the API answers with. */
export function toErrorResponse(exception: unknown): { status: number; body: ErrorBody } {
  if (exception instanceof HttpException) {
    return { status: exception.getStatus(), body: httpErrorBody(exception) };
  }
  if (exception instanceof JobConfigError) {
    return {
      status: HttpStatus.BAD_REQUEST,
      body: {
        success: false,
        error: exception.message,
        code: exception.code,
        details: exception.details,
      },
    };
  }
  if (exception instanceof JobNotFoundError) {
    return {
      status: HttpStatus.NOT_FOUND,
      body: { success: false, error: exception.message, code: exception.code },
    };
  }
  if (exception instanceof CollaboratorUnavailableError) {
    return {
      status: HttpStatus.SERVICE_UNAVAILABLE,
      body: { success: false, error: exception.message, code: exception.code },
    };
  }
  if (exception instanceof CrawlError) {
    return {
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      body: { success: false, error: exception.message, code: exception.code },
    };
  }
  return {
    status: HttpStatus.INTERNAL_SERVER_ERROR,
    body: { success: false, error: 'Internal server error' },
  };
}

@Catch()
export class ApiExceptionFilter extends BaseExceptionFilter {
  private readonly logger = new Logger(ApiExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    if (host.getType() !== 'http') {
      super.catch(exception, host);
      return;
    }

    const { status, body } = toErrorResponse(exception);
    if (status >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(
        body.error,
        exception instanceof Error ? exception.stack : String(exception),
      );
    }

    host.switchToHttp().getResponse<FastifyReply>().status(status).send(body);
  }
}
