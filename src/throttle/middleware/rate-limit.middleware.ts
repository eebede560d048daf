import { Inject, Injectable, NestMiddleware } from '@nestjs/common';
import { NextFunction, Request, Response } from 'express';
import { ExemptPathPolicy, requestPath } from '../../client-context/exempt-path.policy';
import { CLOCK, Clock } from '../../common/clock';
import { RateLimitExceededException } from '../../common/errors/gateway.exceptions';
import { MetricsService } from '../../logging/metrics.service';
import { StructuredLogger } from '../../logging/structured-logger.service';
import { RuleDecision } from '../fixed-window-counter.store';
import { RATE_LIMIT_HEADERS } from '../rate-limit.config';
import { ThrottleService } from '../throttle.service';

/**
 * Applies the address and client quotas to every non-exempt request
 */
@Injectable()
export class RateLimitMiddleware implements NestMiddleware {
  private readonly logger = new StructuredLogger(RateLimitMiddleware.name);

  constructor(
    private readonly throttle: ThrottleService,
    private readonly exemptPaths: ExemptPathPolicy,
    private readonly metrics: MetricsService,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  use(req: Request, res: Response, next: NextFunction): void {
    const path = requestPath(req);
    if (this.exemptPaths.isExempt(path)) {
      next();
      return;
    }

    const decision = this.throttle.admit({
      headers: req.headers,
      remoteAddress: req.socket.remoteAddress,
      clientFingerprint: req.clientFingerprint,
    });

    if (!decision.allowed) {
      const { rule } = decision.blockedBy;
      const retryAfter = this.secondsUntil(decision.blockedBy.resetAt);
      this.setHeaders(res, decision.blockedBy);

      this.logger.warn('Request throttled', undefined, {
        policy: decision.policy,
        key: decision.key,
        rule: `${rule.limit}/${rule.period}`,
        path,
      });
      this.metrics.recordRejection('throttled');

      throw new RateLimitExceededException(
        `API calls quota exceeded! maximum admitted ${rule.limit} per ${rule.period}.`,
        retryAfter,
      );
    }

    if (decision.tightest) {
      this.setHeaders(res, decision.tightest);
    }

    next();
  }

  private setHeaders(res: Response, decision: RuleDecision): void {
    res.setHeader(RATE_LIMIT_HEADERS.LIMIT, decision.rule.limit);
    res.setHeader(RATE_LIMIT_HEADERS.REMAINING, decision.remaining);
    res.setHeader(
      RATE_LIMIT_HEADERS.RESET,
      Math.ceil(decision.resetAt / 1000),
    );
  }

  private secondsUntil(epochMs: number): number {
    return Math.max(1, Math.ceil((epochMs - this.clock.now()) / 1000));
  }
}
