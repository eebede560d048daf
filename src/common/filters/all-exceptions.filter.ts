import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { StructuredLogger } from '../../logging/structured-logger.service';
import { StatusResponseDto } from '../dtos/api-response.dto';
import { RateLimitExceededException } from '../errors/gateway.exceptions';
import { RATE_LIMIT_HEADERS } from '../../throttle/rate-limit.config';

/**
 * Catches every thrown exception (HTTP or otherwise, including those raised
 * by middleware) and renders it as `{ status: false, message }`.
 *
 * 403 responses carry no body. Registered globally in AppModule via
 * APP_FILTER.
 */
@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  private readonly logger = new StructuredLogger(AllExceptionsFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    let statusCode: number = HttpStatus.INTERNAL_SERVER_ERROR;
    let message = 'Internal server error';
    let errors: string[] | undefined;

    if (exception instanceof HttpException) {
      statusCode = exception.getStatus();
      const res = exception.getResponse();

      if (typeof res === 'object' && res !== null) {
        const detail: unknown = Reflect.get(res, 'message');
        // ValidationPipe sends message as an array of per-field errors
        if (Array.isArray(detail)) {
          errors = detail.map((entry) => String(entry));
          message = 'Validation failed';
        } else {
          message = String(detail ?? exception.message);
        }
      } else {
        message = String(res);
      }

      if (exception instanceof RateLimitExceededException) {
        response.setHeader(
          RATE_LIMIT_HEADERS.RETRY_AFTER,
          String(exception.retryAfterSeconds),
        );
      }
    } else if (exception instanceof Error) {
      // stack goes to the log only
      this.logger.error(
        `Unhandled exception on ${request.method} ${request.originalUrl}: ${exception.message}`,
        exception.stack,
      );
    }

    if (statusCode === HttpStatus.FORBIDDEN) {
      response.status(statusCode).end();
      return;
    }

    const body: StatusResponseDto = {
      status: false,
      message,
      ...(errors ? { errors } : {}),
    };

    response.status(statusCode).json(body);
  }
}
