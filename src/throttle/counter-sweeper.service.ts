import {
  Inject,
  Injectable,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import { gatewayConfig } from '../config/gateway.config';
import { StructuredLogger } from '../logging/structured-logger.service';
import { ThrottleService } from './throttle.service';

export const COUNTER_SWEEP_INTERVAL = 'rate-limit-counter-sweep';

/**
 * Periodically drops counters whose window has passed so idle keys do not
 * accumulate. Disabled when the interval is 0.
 */
@Injectable()
export class CounterSweeperService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new StructuredLogger(CounterSweeperService.name);
  private readonly intervalMs: number;

  constructor(
    private readonly throttle: ThrottleService,
    private readonly schedulerRegistry: SchedulerRegistry,
    @Inject(gatewayConfig.KEY)
    config: ConfigType<typeof gatewayConfig>,
  ) {
    this.intervalMs = config.rateLimiting.sweepIntervalSeconds * 1000;
  }

  onModuleInit(): void {
    if (this.intervalMs <= 0) {
      this.logger.log('Counter sweep disabled');
      return;
    }

    const interval = setInterval(() => this.sweep(), this.intervalMs);
    interval.unref();
    this.schedulerRegistry.addInterval(COUNTER_SWEEP_INTERVAL, interval);
  }

  onModuleDestroy(): void {
    if (this.schedulerRegistry.doesExist('interval', COUNTER_SWEEP_INTERVAL)) {
      this.schedulerRegistry.deleteInterval(COUNTER_SWEEP_INTERVAL);
    }
  }

  sweep(): number {
    const removed = this.throttle.sweep();
    if (removed > 0) {
      this.logger.debug(`Swept ${removed} expired rate limit counters`);
    }
    return removed;
  }
}
