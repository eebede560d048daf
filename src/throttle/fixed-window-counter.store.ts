/**
 * Fixed Window Counter Store
 * In-process counter table for one rate limit policy
 */

import { Clock } from '../common/clock';
import { RateLimitRule } from './rate-limit.config';

/**
 * One tracked key within one window of one rule
 */
export interface CounterEntry {
  key: string;
  windowStart: number; // epoch ms
  count: number;
  limit: number;
  windowDuration: number; // ms
}

/**
 * Outcome of a rule for the request just checked
 */
export interface RuleDecision {
  rule: RateLimitRule;
  count: number;
  remaining: number;
  resetAt: number; // epoch ms at which the window rolls over
}

export interface AdmissionResult {
  allowed: boolean;
  key: string;
  decisions: RuleDecision[];
  blockedBy?: RuleDecision;
}

/**
 * Counters keyed by `(key, rule, window index)` where the window index is
 * `floor(now / windowDuration)`. An entry from an earlier window is reset on
 * the next access; sweep() drops the ones nobody touched again.
 */
export class FixedWindowCounterStore {
  private readonly entries = new Map<string, CounterEntry>();

  constructor(private readonly clock: Clock) {}

  /**
   * Check every rule for `key` and, when all of them still have room, count
   * the request against each. A throttled request increments nothing.
   *
   * Runs synchronously: the comparison and the increment happen in the same
   * turn of the event loop, so two requests on the same key can never both
   * see the pre-increment count.
   */
  hit(key: string, rules: RateLimitRule[]): AdmissionResult {
    const now = this.clock.now();
    const entries = rules.map((rule) => this.currentEntry(key, rule, now));

    const blockedIndex = entries.findIndex(
      (entry) => entry.count >= entry.limit,
    );
    const allowed = blockedIndex === -1;

    if (allowed) {
      // equal rules share a slot, so count each slot once
      for (const entry of new Set(entries)) {
        entry.count += 1;
      }
    }

    const decisions = entries.map((entry, index) => ({
      rule: rules[index],
      count: entry.count,
      remaining: Math.max(0, entry.limit - entry.count),
      resetAt: entry.windowStart + entry.windowDuration,
    }));

    return {
      allowed,
      key,
      decisions,
      blockedBy: allowed ? undefined : decisions[blockedIndex],
    };
  }

  /**
   * End of the window `rule` is currently in
   */
  windowEnd(rule: RateLimitRule): number {
    const windowDuration = rule.windowSeconds * 1000;
    return windowStartFor(this.clock.now(), windowDuration) + windowDuration;
  }

  /**
   * Remove entries whose window has passed. Returns how many were removed.
   */
  sweep(): number {
    const now = this.clock.now();
    let removed = 0;

    for (const [slot, entry] of this.entries) {
      if (entry.windowStart + entry.windowDuration <= now) {
        this.entries.delete(slot);
        removed += 1;
      }
    }

    return removed;
  }

  reset(key?: string): void {
    if (key === undefined) {
      this.entries.clear();
      return;
    }

    for (const [slot, entry] of this.entries) {
      if (entry.key === key) {
        this.entries.delete(slot);
      }
    }
  }

  /**
   * Number of distinct keys with at least one entry
   */
  trackedKeys(): number {
    const keys = new Set<string>();
    for (const entry of this.entries.values()) {
      keys.add(entry.key);
    }
    return keys.size;
  }

  get size(): number {
    return this.entries.size;
  }

  private currentEntry(
    key: string,
    rule: RateLimitRule,
    now: number,
  ): CounterEntry {
    const windowDuration = rule.windowSeconds * 1000;
    const windowStart = windowStartFor(now, windowDuration);
    const slot = `${key}|${rule.limit}/${windowDuration}`;

    const existing = this.entries.get(slot);
    if (existing && existing.windowStart === windowStart) {
      return existing;
    }

    const fresh: CounterEntry = {
      key,
      windowStart,
      count: 0,
      limit: rule.limit,
      windowDuration,
    };
    this.entries.set(slot, fresh);
    return fresh;
  }
}

function windowStartFor(now: number, windowDuration: number): number {
  return Math.floor(now / windowDuration) * windowDuration;
}
