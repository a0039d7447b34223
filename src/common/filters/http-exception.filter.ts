import { Catch, HttpException, HttpStatus, Logger } from '@nestjs/common';
import { ArgumentsHost, ExceptionFilter } from '@nestjs/common';
import { HttpAdapterHost } from '@nestjs/core';
import type { FastifyRequest } from 'fastify';
import { ZodValidationException } from 'nestjs-zod';
import { ZodError } from 'zod';

import { SchemaException } from '../errors/schema.exception';
import { ApiError, createApiResponse } from '../utils/response.util';

const STATUS_TITLES: Record<number, string> = {
  [HttpStatus.NOT_FOUND]: 'Not found',
  [HttpStatus.BAD_REQUEST]: 'Bad request',
  [HttpStatus.CONFLICT]: 'Conflict',
  [HttpStatus.INTERNAL_SERVER_ERROR]: 'Internal server error',
};

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  constructor(private readonly httpAdapterHost: HttpAdapterHost) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    const { httpAdapter } = this.httpAdapterHost;
    const ctx = host.switchToHttp();
    const request = ctx.getRequest<FastifyRequest>();

    let statusCode: number = HttpStatus.INTERNAL_SERVER_ERROR;
    let error: ApiError = {
      title: STATUS_TITLES[HttpStatus.INTERNAL_SERVER_ERROR],
      message: 'An unexpected error occurred',
    };

    if (exception instanceof ZodValidationException) {
      statusCode = HttpStatus.BAD_REQUEST;
      const zodError = exception.getZodError();
      error = {
        title: 'Validation error',
        message:
          zodError instanceof ZodError
            ? zodError.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')
            : exception.message,
      };
    } else if (exception instanceof SchemaException) {
      statusCode = exception.getStatus();
      error = {
        title: STATUS_TITLES[statusCode] ?? 'Error',
        message: exception.message,
        kind: exception.kind,
      };
      if (statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
        this.logger.error(exception.message, exception.cause);
      } else {
        this.logger.debug(`${exception.kind} (${statusCode}): ${exception.message}`);
      }
    } else if (exception instanceof HttpException) {
      statusCode = exception.getStatus();
      error = {
        title: STATUS_TITLES[statusCode] ?? 'Error',
        message: this.messageOf(exception),
      };

      // Fastify's default 404 text
      if (
        statusCode === HttpStatus.NOT_FOUND &&
        typeof error.message === 'string' &&
        error.message.startsWith('Cannot ')
      ) {
        error.message = `Route not found: ${request.url}`;
      }
    } else {
      this.logger.error(exception);
    }

    httpAdapter.reply(ctx.getResponse(), createApiResponse(false, undefined, error), statusCode);
  }

  private messageOf(exception: HttpException): string | object {
    const response = exception.getResponse();
    if (typeof response !== 'object' || response === null) {
      return response;
    }
    if ('message' in response) {
      const { message } = response;
      if (Array.isArray(message)) {
        return message.join(', ');
      }
      if (typeof message === 'string') {
        return message;
      }
    }
    return response;
  }
}
