import { Injectable } from '@nestjs/common';
import { ThrottleService } from '../throttle/throttle.service';
import {
  HealthCheckResult,
  HealthIndicatorResult,
} from './health.types';

@Injectable()
export class HealthService {
  constructor(private readonly throttle: ThrottleService) {}

  /**
   * Liveness: the process is up and the rate limiter's counter tables
   * answer. No external dependency is consulted.
   */
  checkLiveness(): HealthCheckResult {
    const checks = [this.processCheck(), this.rateLimiterCheck()];

    return {
      status: checks.every((check) => check.status === 'up')
        ? 'healthy'
        : 'unhealthy',
      timestamp: new Date().toISOString(),
      version: process.env.npm_package_version ?? '0.1.0',
      environment: process.env.NODE_ENV ?? 'development',
      uptime: process.uptime(),
      checks,
    };
  }

  private processCheck(): HealthIndicatorResult {
    return {
      name: 'process',
      status: 'up',
      message: 'Application process is running',
      details: { rss: process.memoryUsage().rss },
    };
  }

  private rateLimiterCheck(): HealthIndicatorResult {
    const policies = this.throttle.stats();
    const trackedKeys = policies.reduce(
      (total, policy) => total + policy.trackedKeys,
      0,
    );

    return {
      name: 'rate-limiter',
      status: 'up',
      message: `Counters tracking ${trackedKeys} keys`,
      details: Object.fromEntries(
        policies.map((policy) => [policy.name, policy.enabled]),
      ),
    };
  }
}
