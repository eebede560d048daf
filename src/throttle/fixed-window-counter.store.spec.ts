import { Clock } from '../common/clock';
import { FixedWindowCounterStore } from './fixed-window-counter.store';
import { parseRateLimitRules } from './rate-limit.config';

describe('FixedWindowCounterStore', () => {
  const WINDOW_START = 1_700_000_040_000; // a multiple of 60s
  let now: number;
  let clock: Clock;
  let store: FixedWindowCounterStore;

  beforeEach(() => {
    now = WINDOW_START;
    clock = { now: () => now };
    store = new FixedWindowCounterStore(clock);
  });

  it('admits up to the limit and throttles the next request', () => {
    const rules = parseRateLimitRules('5/1m');

    for (let i = 1; i <= 5; i++) {
      const result = store.hit('203.0.113.5', rules);
      expect(result.allowed).toBe(true);
      expect(result.decisions[0].remaining).toBe(5 - i);
    }

    const sixth = store.hit('203.0.113.5', rules);
    expect(sixth.allowed).toBe(false);
    expect(sixth.blockedBy?.count).toBe(5);
    expect(sixth.blockedBy?.resetAt).toBe(WINDOW_START + 60_000);
  });

  it('starts a new window on rollover', () => {
    const rules = parseRateLimitRules('5/1m');
    for (let i = 0; i < 6; i++) {
      store.hit('k', rules);
    }

    now = WINDOW_START + 60_000;
    const next = store.hit('k', rules);

    expect(next.allowed).toBe(true);
    expect(next.decisions[0].count).toBe(1);
  });

  it('uses fixed windows aligned to the epoch, not to the first request', () => {
    const rules = parseRateLimitRules('1/1m');
    now = WINDOW_START + 59_000;
    expect(store.hit('k', rules).allowed).toBe(true);

    now = WINDOW_START + 60_000;
    expect(store.hit('k', rules).allowed).toBe(true);
  });

  it('counts nothing when any rule is at its limit', () => {
    const rules = parseRateLimitRules('100/1m;2/1s');

    store.hit('k', rules);
    store.hit('k', rules);
    const third = store.hit('k', rules);

    expect(third.allowed).toBe(false);
    expect(third.blockedBy?.rule.period).toBe('1s');
    expect(third.decisions[0].count).toBe(2);

    now += 1000;
    const afterSecond = store.hit('k', rules);
    expect(afterSecond.allowed).toBe(true);
    expect(afterSecond.decisions.map((d) => d.count)).toEqual([3, 1]);
  });

  it('counts a request once against rules that share a slot', () => {
    const rules = [
      { limit: 5, windowSeconds: 60, period: '1m' },
      { limit: 5, windowSeconds: 60, period: '60s' },
    ];

    for (let i = 1; i <= 5; i++) {
      const result = store.hit('k', rules);
      expect(result.allowed).toBe(true);
      expect(result.decisions.map((decision) => decision.count)).toEqual([i, i]);
    }
    expect(store.hit('k', rules).allowed).toBe(false);
    expect(store.size).toBe(1);
  });

  it('keeps separate counters per key', () => {
    const rules = parseRateLimitRules('1/1m');

    expect(store.hit('10.0.0.1:app', rules).allowed).toBe(true);
    expect(store.hit('10.0.0.2:app', rules).allowed).toBe(true);
    expect(store.hit('10.0.0.1:app', rules).allowed).toBe(false);
    expect(store.trackedKeys()).toBe(2);
  });

  it('sweeps entries whose window has passed', () => {
    const rules = parseRateLimitRules('10/1m;10/1h');
    store.hit('a', rules);
    store.hit('b', rules);
    expect(store.size).toBe(4);

    now = WINDOW_START + 60_000;
    expect(store.sweep()).toBe(2);
    expect(store.size).toBe(2);
    expect(store.trackedKeys()).toBe(2);
  });

  it('resets one key or all of them', () => {
    const rules = parseRateLimitRules('1/1m');
    store.hit('a', rules);
    store.hit('b', rules);

    store.reset('a');
    expect(store.hit('a', rules).allowed).toBe(true);
    expect(store.hit('b', rules).allowed).toBe(false);

    store.reset();
    expect(store.size).toBe(0);
  });
});
