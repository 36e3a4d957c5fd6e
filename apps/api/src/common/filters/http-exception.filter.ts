import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';
import { ZodError } from 'zod';
import { NotFoundError, StorageError, ValidationError, ValidationIssue } from '../errors';
import { toValidationIssues } from '../validation';

export interface ErrorBody {
  statusCode: number;
  error: string;
  message: string;
  issues?: ValidationIssue[];
}

export const INTERNAL_ERROR_MESSAGE = 'Internal server error';

/**
 * Maps domain errors to HTTP responses: validation 422, missing song 404,
 * storage and unknown failures 500 with a generic message.
 */
export function toErrorBody(exception: unknown): ErrorBody {
  if (exception instanceof ValidationError) {
    return unprocessable(exception.message, exception.issues);
  }

  if (exception instanceof ZodError) {
    return unprocessable('Invalid request', toValidationIssues(exception));
  }

  if (exception instanceof NotFoundError) {
    return { statusCode: HttpStatus.NOT_FOUND, error: 'Not Found', message: exception.message };
  }

  if (exception instanceof HttpException) {
    const status = exception.getStatus();
    const response = exception.getResponse();
    const message =
      typeof response === 'string'
        ? response
        : typeof response === 'object' && 'message' in response
          ? String(response.message)
          : exception.message;
    return { statusCode: status, error: exception.name, message };
  }

  return {
    statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
    error: 'Internal Server Error',
    message: INTERNAL_ERROR_MESSAGE,
  };
}

function unprocessable(message: string, issues: ValidationIssue[]): ErrorBody {
  return {
    statusCode: HttpStatus.UNPROCESSABLE_ENTITY,
    error: 'Unprocessable Entity',
    message,
    issues,
  };
}

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const body = toErrorBody(exception);

    if (body.statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
      const kind = exception instanceof StorageError ? 'Storage failure' : 'Unhandled error';
      this.logger.error(
        `${kind}: ${exception instanceof Error ? exception.message : String(exception)}`,
        exception instanceof Error ? exception.stack : undefined,
      );
    }

    // Only HTTP requests get a JSON body; socket errors are logged above
    if (host.getType() !== 'http') {
      return;
    }

    const response = host.switchToHttp().getResponse<Response>();
    response.status(body.statusCode).json(body);
  }
}
