import { Injectable, LoggerService, Optional } from '@nestjs/common';
import * as winston from 'winston';
import { RequestContext } from './request-context';

export type LogMeta = Record<string, unknown>;

let rootLogger: winston.Logger | undefined;

function getRootLogger(): winston.Logger {
  if (!rootLogger) {
    rootLogger = winston.createLogger({
      level: process.env.LOG_LEVEL || 'info',
      silent: process.env.NODE_ENV === 'test',
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.printf((info) => {
          const { timestamp, level, message, context, ...meta } = info;
          const request = RequestContext.current();
          return JSON.stringify({
            timestamp,
            level,
            message,
            context,
            correlationId: request?.correlationId,
            clientId: request?.clientId,
            ipAddress: request?.ipAddress,
            ...meta,
          });
        }),
      ),
      transports: [new winston.transports.Console()],
    });
  }
  return rootLogger;
}

/**
 * A Nest logger implementation that emits JSON with a consistent schema and
 * automatically injects the correlation id and caller fingerprint of the
 * current request when available.
 *
 * Classes that want their own context create one with
 * `new StructuredLogger(MyService.name)`; the DI instance is what the
 * application installs through `app.useLogger()`.
 */
@Injectable()
export class StructuredLogger implements LoggerService {
  constructor(@Optional() private readonly context?: string) {}

  log(message: unknown, context?: string, meta?: LogMeta): void {
    this.write('info', message, context, meta);
  }

  error(
    message: unknown,
    trace?: string,
    context?: string,
    meta?: LogMeta,
  ): void {
    this.write('error', message, context, { ...meta, trace });
  }

  warn(message: unknown, context?: string, meta?: LogMeta): void {
    this.write('warn', message, context, meta);
  }

  debug(message: unknown, context?: string, meta?: LogMeta): void {
    this.write('debug', message, context, meta);
  }

  verbose(message: unknown, context?: string, meta?: LogMeta): void {
    this.write('verbose', message, context, meta);
  }

  private write(
    level: string,
    message: unknown,
    context: string | undefined,
    meta: LogMeta | undefined,
  ): void {
    getRootLogger().log({
      level,
      message: typeof message === 'string' ? message : JSON.stringify(message),
      context: context ?? this.context,
      ...meta,
    });
  }
}
