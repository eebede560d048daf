import { MiddlewareConsumer, Module, NestModule, ValidationPipe } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { APP_FILTER, APP_PIPE } from '@nestjs/core';

import { ClockModule } from './common/clock';
import { AllExceptionsFilter } from './common/filters/all-exceptions.filter';
import { gatewayConfig } from './config/gateway.config';

// logging and error handling
import { CorrelationIdMiddleware } from './logging/correlation-id.middleware';
import { LoggingModule } from './logging/logging.module';

import { AuthModule } from './auth/auth.module';
import { ClientContextModule } from './client-context/client-context.module';
import { ClientFingerprintMiddleware } from './client-context/middleware/client-fingerprint.middleware';
import { HealthModule } from './health/health.module';
import { RateLimitMiddleware } from './throttle/middleware/rate-limit.middleware';
import { ThrottleModule } from './throttle/throttle.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [gatewayConfig],
    }),
    LoggingModule,
    ClockModule,
    ClientContextModule,
    AuthModule,
    ThrottleModule,
    HealthModule,
  ],
  providers: [
    {
      provide: APP_FILTER,
      useClass: AllExceptionsFilter,
    },
    {
      provide: APP_PIPE,
      useValue: new ValidationPipe({
        whitelist: true,
        forbidNonWhitelisted: true,
        transform: true,
      }),
    },
  ],
})
export class AppModule implements NestModule {
  /**
   * Order matters: correlation id first so every later log line carries it,
   * then fingerprinting, then rate limiting on the resolved fingerprint.
   */
  configure(consumer: MiddlewareConsumer): void {
    consumer
      .apply(
        CorrelationIdMiddleware,
        ClientFingerprintMiddleware,
        RateLimitMiddleware,
      )
      .forRoutes('*');
  }
}
