import {
  parseRateLimitRule,
  parseRateLimitRules,
  splitList,
} from './rate-limit.config';

describe('rate limit rule parsing', () => {
  it('parses a single rule', () => {
    expect(parseRateLimitRule('100/1m')).toEqual({
      limit: 100,
      windowSeconds: 60,
      period: '1m',
    });
  });

  it('parses every supported unit', () => {
    expect(parseRateLimitRule('10/30s').windowSeconds).toBe(30);
    expect(parseRateLimitRule('10/2h').windowSeconds).toBe(7200);
    expect(parseRateLimitRule('10/1d').windowSeconds).toBe(86400);
  });

  it('parses a rule list, ignoring empty entries', () => {
    const rules = parseRateLimitRules(' 100/1m ; 10/1s ;');

    expect(rules.map((rule) => rule.period)).toEqual(['1m', '1s']);
    expect(rules.map((rule) => rule.limit)).toEqual([100, 10]);
  });

  it('keeps one rule per quota, however the period is spelled', () => {
    expect(parseRateLimitRules('5/1m;5/60s;10/1m')).toEqual([
      { limit: 5, windowSeconds: 60, period: '1m' },
      { limit: 10, windowSeconds: 60, period: '1m' },
    ]);
  });

  it('rejects malformed rules', () => {
    expect(() => parseRateLimitRule('100 per minute')).toThrow(
      'Invalid rate limit rule "100 per minute"',
    );
    expect(() => parseRateLimitRule('100/1w')).toThrow();
  });

  it('rejects zero limits and periods', () => {
    expect(() => parseRateLimitRule('0/1m')).toThrow('must use positive numbers');
    expect(() => parseRateLimitRule('5/0s')).toThrow('must use positive numbers');
  });

  it('rejects an empty list', () => {
    expect(() => parseRateLimitRules(' ; ')).toThrow('is empty');
  });

  it('splits lists', () => {
    expect(splitList('10.0.0.1; 10.0.0.2;;')).toEqual(['10.0.0.1', '10.0.0.2']);
    expect(splitList(undefined)).toEqual([]);
  });
});
