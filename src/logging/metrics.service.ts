import { Injectable } from '@nestjs/common';
import { Counter, Registry } from 'prom-client';

export type RejectionReason =
  | 'missing_client_id'
  | 'missing_address'
  | 'throttled'
  | 'unauthenticated'
  | 'forbidden'
  | 'authorization_error';

/**
 * Prometheus metrics for the request pipeline. Each application instance
 * owns its registry so test apps never collide on metric names.
 */
@Injectable()
export class MetricsService {
  private readonly registry = new Registry();
  private readonly rejections: Counter<'reason'>;
  private readonly tokensIssued: Counter<'grant'>;

  constructor() {
    this.rejections = new Counter({
      name: 'gateway_rejections_total',
      help: 'Requests rejected by the access pipeline, by reason',
      labelNames: ['reason'],
      registers: [this.registry],
    });

    this.tokensIssued = new Counter({
      name: 'gateway_tokens_issued_total',
      help: 'Access tokens issued, by grant',
      labelNames: ['grant'],
      registers: [this.registry],
    });
  }

  recordRejection(reason: RejectionReason): void {
    this.rejections.inc({ reason });
  }

  recordTokenIssued(grant: 'login' | 'refresh'): void {
    this.tokensIssued.inc({ grant });
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }
}
