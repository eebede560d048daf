import { Inject, Injectable } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import {
  ClientFingerprint,
  compositeKey,
  FingerprintSource,
  readHeader,
  resolveAddress,
} from '../client-context/client-fingerprint';
import { gatewayConfig } from '../config/gateway.config';
import { RuleDecision } from './fixed-window-counter.store';
import { INVALID_CLIENT_KEY } from './rate-limit.config';
import {
  CLIENT_RATE_LIMIT_POLICY,
  IP_RATE_LIMIT_POLICY,
  RateLimitPolicy,
  RateLimitPolicyName,
  RateLimitPolicyStats,
} from './rate-limit.policy';

/**
 * What the limiter reads from a request: transport metadata plus the
 * fingerprint attached upstream, when there is one
 */
export interface ThrottleRequest extends FingerprintSource {
  clientFingerprint?: ClientFingerprint;
}

/**
 * Bucket keys for one request. Unknown parts map to the invalid-client key.
 */
export interface ThrottleKeys {
  ipKey: string;
  clientKey: string;
  ipAddress?: string;
  clientId?: string;
}

export type ThrottleDecision =
  | { allowed: true; tightest?: RuleDecision }
  | {
      allowed: false;
      policy: RateLimitPolicyName;
      key: string;
      blockedBy: RuleDecision;
    };

@Injectable()
export class ThrottleService {
  private readonly clientIdHeader: string;

  constructor(
    @Inject(IP_RATE_LIMIT_POLICY)
    private readonly ipPolicy: RateLimitPolicy,
    @Inject(CLIENT_RATE_LIMIT_POLICY)
    private readonly clientPolicy: RateLimitPolicy,
    @Inject(gatewayConfig.KEY)
    config: ConfigType<typeof gatewayConfig>,
  ) {
    this.clientIdHeader = config.clientContext.clientIdHeader;
  }

  /**
   * Derive the bucket keys. Prefers the fingerprint attached upstream and
   * falls back to reading the request itself.
   */
  resolveKeys(req: ThrottleRequest): ThrottleKeys {
    const fingerprint = req.clientFingerprint;
    const clientId =
      fingerprint?.clientId ?? readHeader(req.headers, this.clientIdHeader);
    const ipAddress =
      fingerprint?.ipAddress ??
      resolveAddress(req);

    return {
      ipKey: ipAddress ?? INVALID_CLIENT_KEY,
      clientKey:
        ipAddress && clientId
          ? compositeKey(ipAddress, clientId)
          : INVALID_CLIENT_KEY,
      ipAddress,
      clientId,
    };
  }

  /**
   * Run the address policy, then the client policy. Stops at the first one
   * that throttles, so a request refused by address is not counted against
   * its client quota.
   */
  admit(req: ThrottleRequest): ThrottleDecision {
    const keys = this.resolveKeys(req);
    const checks: Array<[RateLimitPolicy, string, string | undefined]> = [
      [this.ipPolicy, keys.ipKey, keys.ipAddress],
      [this.clientPolicy, keys.clientKey, keys.clientId],
    ];

    let tightest: RuleDecision | undefined;

    for (const [policy, key, subject] of checks) {
      if (!policy.enabled) {
        continue;
      }
      if (subject !== undefined && policy.isWhitelisted(subject)) {
        continue;
      }

      const result = policy.admit(key);
      if (!result.allowed && result.blockedBy) {
        return {
          allowed: false,
          policy: policy.name,
          key,
          blockedBy: result.blockedBy,
        };
      }

      for (const decision of result.decisions) {
        if (!tightest || decision.remaining < tightest.remaining) {
          tightest = decision;
        }
      }
    }

    return { allowed: true, tightest };
  }

  sweep(): number {
    return this.ipPolicy.sweep() + this.clientPolicy.sweep();
  }

  reset(): void {
    this.ipPolicy.reset();
    this.clientPolicy.reset();
  }

  stats(): RateLimitPolicyStats[] {
    return [this.ipPolicy.stats(), this.clientPolicy.stats()];
  }
}
