import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus } from '@nestjs/common';
import type { Response } from 'express';

import {
  BacklogFullError,
  CircuitOpenError,
  NotFoundError,
  PoisonMessageError,
  VendorError,
} from '../../domain/errors';
import { SyncLogger } from '../../modules/logging/sync-logger.service';
import { LogCategory } from '../../modules/logging/log-levels';

export interface ErrorBody {
  statusCode: number;
  error: string;
  message: string;
  issues?: string[];
  retryAfterSeconds?: number;
}

/**
 * Global exception filter.
 *
 * Nest HTTP exceptions keep their status. Domain errors map to:
 *   NotFoundError           → 404
 *   PoisonMessageError      → 400
 *   PermanentVendorError    → 502
 *   RetryableVendorError    → 503 (CircuitOpenError adds Retry-After)
 *   BacklogFullError        → 503
 * Anything else is a 500 with a generic message.
 */
@Catch()
export class SyncExceptionFilter implements ExceptionFilter {
  constructor(private readonly logger: SyncLogger) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();
    const body = toErrorBody(exception);

    if (body.statusCode >= 500) {
      this.logger.error(LogCategory.HTTP, 'Request failed', exception, { statusCode: body.statusCode });
    }

    if (body.retryAfterSeconds !== undefined) {
      response.setHeader('Retry-After', String(body.retryAfterSeconds));
    }
    response.status(body.statusCode).json(body);
  }
}

export function toErrorBody(exception: unknown): ErrorBody {
  if (exception instanceof HttpException) {
    const status = exception.getStatus();
    const raw = exception.getResponse();
    let message = exception.message;
    if (typeof raw === 'string') {
      message = raw;
    } else if (typeof raw === 'object' && raw !== null && 'message' in raw) {
      const detail = raw.message;
      message = Array.isArray(detail) ? detail.join('; ') : String(detail);
    }
    return { statusCode: status, error: exception.name, message };
  }

  if (exception instanceof NotFoundError) {
    return { statusCode: HttpStatus.NOT_FOUND, error: exception.name, message: exception.message };
  }
  if (exception instanceof PoisonMessageError) {
    return { statusCode: HttpStatus.BAD_REQUEST, error: exception.name, message: exception.message, issues: exception.issues };
  }
  if (exception instanceof CircuitOpenError) {
    return {
      statusCode: HttpStatus.SERVICE_UNAVAILABLE,
      error: exception.name,
      message: exception.message,
      retryAfterSeconds: Math.max(1, Math.ceil(exception.retryAfterMs / 1000)),
    };
  }
  if (exception instanceof VendorError) {
    return {
      statusCode: exception.retryable ? HttpStatus.SERVICE_UNAVAILABLE : HttpStatus.BAD_GATEWAY,
      error: exception.name,
      message: exception.message,
    };
  }
  if (exception instanceof BacklogFullError) {
    return { statusCode: HttpStatus.SERVICE_UNAVAILABLE, error: exception.name, message: exception.message };
  }

  return { statusCode: HttpStatus.INTERNAL_SERVER_ERROR, error: 'InternalServerError', message: 'Internal server error' };
}
