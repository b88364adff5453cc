import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { describeError, errorStack } from '../utils/describe-error';

export interface ErrorEnvelope {
  success: false;
  statusCode: number;
  error: string;
  message: string | string[];
  path: string;
  timestamp: string;
  [extra: string]: unknown;
}

const RESERVED_KEYS = new Set(['statusCode', 'message', 'error', 'success', 'path', 'timestamp']);

/**
 * Renders every failure as the `{ success: false, ... }` envelope.
 * Extra fields on an HttpException body (e.g. `code`, `rolledBack`) are carried over.
 */
@Catch()
export class ApiExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(ApiExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const envelope = this.toEnvelope(exception, request.originalUrl ?? request.url);
    if (envelope.statusCode >= 500) {
      this.logger.error(
        `${request.method} ${envelope.path} failed: ${describeError(exception)}`,
        errorStack(exception),
      );
    } else {
      this.logger.debug(`${request.method} ${envelope.path} -> ${envelope.statusCode}`);
    }

    response.status(envelope.statusCode).json(envelope);
  }

  toEnvelope(exception: unknown, path: string): ErrorEnvelope {
    const timestamp = new Date().toISOString();

    if (!(exception instanceof HttpException)) {
      return {
        success: false,
        statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
        error: 'Internal Server Error',
        message: 'Internal server error',
        path,
        timestamp,
      };
    }

    const statusCode = exception.getStatus();
    const body = exception.getResponse();
    const envelope: ErrorEnvelope = {
      success: false,
      statusCode,
      error: exception.name.replace(/Exception$/, '').replace(/([a-z])([A-Z])/g, '$1 $2'),
      message: exception.message,
      path,
      timestamp,
    };

    if (typeof body === 'string') {
      envelope.message = body;
      return envelope;
    }

    for (const [key, value] of Object.entries(body)) {
      if (key === 'message' && (typeof value === 'string' || Array.isArray(value))) {
        envelope.message = Array.isArray(value) ? value.map(String) : value;
      } else if (key === 'error' && typeof value === 'string') {
        envelope.error = value;
      } else if (!RESERVED_KEYS.has(key)) {
        envelope[key] = value;
      }
    }
    return envelope;
  }
}
