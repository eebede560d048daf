import { Module } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { AuthModule } from '../auth/auth.module';
import { ClientContextModule } from '../client-context/client-context.module';
import { CLOCK, Clock } from '../common/clock';
import { gatewayConfig } from '../config/gateway.config';
import { CounterSweeperService } from './counter-sweeper.service';
import { RateLimitMiddleware } from './middleware/rate-limit.middleware';
import {
  CLIENT_RATE_LIMIT_POLICY,
  IP_RATE_LIMIT_POLICY,
  RateLimitPolicy,
} from './rate-limit.policy';
import { RateLimitingController } from './rate-limiting.controller';
import { ThrottleService } from './throttle.service';

@Module({
  imports: [ScheduleModule.forRoot(), ClientContextModule, AuthModule],
  controllers: [RateLimitingController],
  providers: [
    {
      provide: IP_RATE_LIMIT_POLICY,
      inject: [gatewayConfig.KEY, CLOCK],
      useFactory: (config: ConfigType<typeof gatewayConfig>, clock: Clock) =>
        new RateLimitPolicy('ip', config.rateLimiting.ip, clock),
    },
    {
      provide: CLIENT_RATE_LIMIT_POLICY,
      inject: [gatewayConfig.KEY, CLOCK],
      useFactory: (config: ConfigType<typeof gatewayConfig>, clock: Clock) =>
        new RateLimitPolicy('client', config.rateLimiting.client, clock),
    },
    ThrottleService,
    RateLimitMiddleware,
    CounterSweeperService,
  ],
  exports: [ThrottleService, RateLimitMiddleware],
})
export class ThrottleModule {}
