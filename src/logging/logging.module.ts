import { Global, Module } from '@nestjs/common';
import { StructuredLogger } from './structured-logger.service';
import { CorrelationIdMiddleware } from './correlation-id.middleware';
import { MetricsService } from './metrics.service';
import { MetricsController } from './metrics.controller';

@Global()
@Module({
  controllers: [MetricsController],
  providers: [StructuredLogger, MetricsService, CorrelationIdMiddleware],
  exports: [StructuredLogger, MetricsService, CorrelationIdMiddleware],
})
export class LoggingModule {}
