import { Clock } from '../common/clock';
import { RateLimitPolicyConfig } from '../config/config.schemas';
import {
  AdmissionResult,
  FixedWindowCounterStore,
  RuleDecision,
} from './fixed-window-counter.store';
import { INVALID_CLIENT_KEY, RateLimitRule } from './rate-limit.config';

export type RateLimitPolicyName = 'ip' | 'client';

export const IP_RATE_LIMIT_POLICY = Symbol('IP_RATE_LIMIT_POLICY');
export const CLIENT_RATE_LIMIT_POLICY = Symbol('CLIENT_RATE_LIMIT_POLICY');

export interface RateLimitPolicyStats {
  name: RateLimitPolicyName;
  enabled: boolean;
  rules: string[];
  whitelist: string[];
  trackedKeys: number;
  entries: number;
}

/**
 * A named set of quota rules with its own counters and whitelist
 */
export class RateLimitPolicy {
  private readonly store: FixedWindowCounterStore;
  private readonly whitelist: Set<string>;

  constructor(
    readonly name: RateLimitPolicyName,
    private readonly config: RateLimitPolicyConfig,
    clock: Clock,
  ) {
    this.store = new FixedWindowCounterStore(clock);
    this.whitelist = new Set(config.whitelist);
  }

  get enabled(): boolean {
    return this.config.enabled;
  }

  get rules(): RateLimitRule[] {
    return this.config.rules;
  }

  isWhitelisted(subject: string): boolean {
    return this.whitelist.has(subject);
  }

  /**
   * Count a request against `key`. The invalid-client bucket is refused
   * without touching any counter.
   */
  admit(key: string): AdmissionResult {
    if (key === INVALID_CLIENT_KEY) {
      return this.refuseInvalidClient();
    }
    return this.store.hit(key, this.config.rules);
  }

  sweep(): number {
    return this.store.sweep();
  }

  reset(key?: string): void {
    this.store.reset(key);
  }

  stats(): RateLimitPolicyStats {
    return {
      name: this.name,
      enabled: this.config.enabled,
      rules: this.config.rules.map((rule) => `${rule.limit}/${rule.period}`),
      whitelist: [...this.whitelist],
      trackedKeys: this.store.trackedKeys(),
      entries: this.store.size,
    };
  }

  private refuseInvalidClient(): AdmissionResult {
    const decisions: RuleDecision[] = this.config.rules.map((rule) => ({
      rule,
      count: rule.limit,
      remaining: 0,
      resetAt: this.store.windowEnd(rule),
    }));

    return {
      allowed: false,
      key: INVALID_CLIENT_KEY,
      decisions,
      blockedBy: decisions[0],
    };
  }
}
