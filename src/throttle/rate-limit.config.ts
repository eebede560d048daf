/**
 * Rate Limiting Configuration
 * Defaults and parsing for the address and client quota policies
 */

/**
 * A single fixed-window quota: at most `limit` requests per `windowSeconds`
 */
export interface RateLimitRule {
  limit: number;
  windowSeconds: number;
  period: string; // as configured, e.g. '1m'
}

/**
 * Sentinel bucket for requests whose address or client id is unknown.
 * Always throttled.
 */
export const INVALID_CLIENT_KEY = 'invalid-client';

export const DEFAULT_IP_RATE_LIMIT_RULES = '100/1m';
export const DEFAULT_CLIENT_RATE_LIMIT_RULES = '60/1m';
export const DEFAULT_SWEEP_INTERVAL_SECONDS = 300;

/**
 * Response headers set on every request that reaches the limiter
 */
export const RATE_LIMIT_HEADERS = {
  LIMIT: 'X-RateLimit-Limit',
  REMAINING: 'X-RateLimit-Remaining',
  RESET: 'X-RateLimit-Reset',
  RETRY_AFTER: 'Retry-After',
} as const;

const UNIT_SECONDS: Record<string, number> = {
  s: 1,
  m: 60,
  h: 3600,
  d: 86400,
};

/**
 * Parse a rule list such as `100/1m;10/1s`.
 * Supported period units: s, m, h, d. Repeats of the same quota, however
 * spelled (`5/1m;5/60s`), keep the first.
 */
export function parseRateLimitRules(raw: string): RateLimitRule[] {
  const rules = new Map<string, RateLimitRule>();
  for (const part of raw.split(';')) {
    if (part.trim().length === 0) {
      continue;
    }
    const rule = parseRateLimitRule(part.trim());
    const quota = `${rule.limit}/${rule.windowSeconds}`;
    if (!rules.has(quota)) {
      rules.set(quota, rule);
    }
  }

  if (rules.size === 0) {
    throw new Error(`Rate limit rule list "${raw}" is empty`);
  }

  return [...rules.values()];
}

export function parseRateLimitRule(raw: string): RateLimitRule {
  const match = raw.match(/^(\d+)\s*\/\s*(\d+)([smhd])$/);
  if (!match) {
    throw new Error(
      `Invalid rate limit rule "${raw}", expected <limit>/<period> such as 100/1m`,
    );
  }

  const limit = parseInt(match[1], 10);
  const amount = parseInt(match[2], 10);
  const unit = match[3];

  if (limit < 1 || amount < 1) {
    throw new Error(`Rate limit rule "${raw}" must use positive numbers`);
  }

  return {
    limit,
    windowSeconds: amount * UNIT_SECONDS[unit],
    period: `${amount}${unit}`,
  };
}

/**
 * Split a `;`-separated setting into trimmed, non-empty entries
 */
export function splitList(raw: string | undefined): string[] {
  if (!raw) {
    return [];
  }
  return raw
    .split(';')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}
