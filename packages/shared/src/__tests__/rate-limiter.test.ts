import { describe, it, expect, beforeEach, vi } from 'vitest';
import { FixedWindowRateLimiter } from '../rate-limiter';

const MINUTE_MS = 60_000;

describe('FixedWindowRateLimiter', () => {
  let nowMs: number;
  let limiter: FixedWindowRateLimiter;

  beforeEach(() => {
    nowMs = Date.parse('2026-03-01T00:00:10.000Z');
    limiter = new FixedWindowRateLimiter({ now: () => nowMs });
  });

  it('allows up to the limit within a window and rejects the next call', () => {
    const decisions = Array.from({ length: 6 }, () => limiter.check('ip:10.0.0.1', 'auth', 5));

    expect(decisions.slice(0, 5).map((d) => d.allowed)).toEqual([true, true, true, true, true]);
    expect(decisions.slice(0, 5).map((d) => d.remaining)).toEqual([4, 3, 2, 1, 0]);
    expect(decisions[5]).toEqual({
      allowed: false,
      limit: 5,
      remaining: 0,
      resetAt: new Date('2026-03-01T00:01:00.000Z'),
      retryAfterSeconds: 50,
    });
  });

  it('starts counting afresh in the next window', () => {
    for (let i = 0; i < 6; i++) limiter.check('ip:10.0.0.1', 'auth', 5);

    nowMs = Date.parse('2026-03-01T00:01:00.000Z');
    const decision = limiter.check('ip:10.0.0.1', 'auth', 5);

    expect(decision.allowed).toBe(true);
    expect(decision.remaining).toBe(4);
    expect(decision.resetAt).toEqual(new Date('2026-03-01T00:02:00.000Z'));
  });

  it('counts each client and limiter class separately', () => {
    limiter.check('user:1', 'auth', 1);

    expect(limiter.check('user:1', 'auth', 1).allowed).toBe(false);
    expect(limiter.check('user:1', 'read', 1).allowed).toBe(true);
    expect(limiter.check('user:2', 'auth', 1).allowed).toBe(true);
  });

  it('does not count rejected calls against the next window', () => {
    for (let i = 0; i < 20; i++) limiter.check('ip:10.0.0.1', 'mutation', 2);

    nowMs += MINUTE_MS;
    expect(limiter.check('ip:10.0.0.1', 'mutation', 2).remaining).toBe(1);
  });

  it('sweeps stale windows once the map outgrows its threshold', () => {
    limiter = new FixedWindowRateLimiter({
      now: () => nowMs,
      sweepThreshold: 3,
      retentionMs: 5 * MINUTE_MS,
    });
    limiter.check('ip:a', 'read', 10);
    limiter.check('ip:b', 'read', 10);
    limiter.check('ip:c', 'read', 10);
    expect(limiter.size).toBe(3);

    nowMs += 6 * MINUTE_MS;
    limiter.check('ip:d', 'read', 10);

    expect(limiter.size).toBe(1);
  });

  it('keeps recent windows when sweeping', () => {
    limiter = new FixedWindowRateLimiter({
      now: () => nowMs,
      sweepThreshold: 2,
      retentionMs: 5 * MINUTE_MS,
    });
    limiter.check('ip:a', 'read', 10);
    limiter.check('ip:b', 'read', 10);
    limiter.check('ip:c', 'read', 10);

    expect(limiter.size).toBe(3);
  });

  it('sweeps at most once per window while new clients keep arriving', () => {
    const onSweep = vi.fn();
    limiter = new FixedWindowRateLimiter({
      now: () => nowMs,
      sweepThreshold: 2,
      retentionMs: 5 * MINUTE_MS,
      onSweep,
    });

    for (const id of ['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h', 'i', 'j']) {
      limiter.check(`ip:${id}`, 'read', 10);
    }
    expect(onSweep.mock.calls).toEqual([[0]]);

    nowMs += MINUTE_MS;
    limiter.check('ip:k', 'read', 10);
    limiter.check('ip:l', 'read', 10);
    expect(onSweep.mock.calls).toEqual([[0], [0]]);

    nowMs += 5 * MINUTE_MS;
    limiter.check('ip:m', 'read', 10);
    expect(onSweep.mock.calls).toEqual([[0], [0], [12]]);
    expect(limiter.size).toBe(1);
  });
});
