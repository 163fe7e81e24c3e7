import { describe, it, expect } from 'vitest';
import { CancellationToken, CancellationTracker, requestIdKey } from '../services/cancellation';
import { caught } from './testUtils';

const POLL_MS = 5;

/** A handler that polls its token and reports what it saw when it stops. */
async function pollUntilCancelled(token: CancellationToken, maxMs = 2000){
  const start = Date.now();
  while (!token.isCancelled()) {
    if (Date.now() - start > maxMs) return { cancelled: false, reason: undefined, at: Date.now() };
    await new Promise(r => setTimeout(r, POLL_MS));
  }
  return { cancelled: true, reason: token.reason, at: Date.now() };
}

describe('CancellationTracker', () => {
  it('delivers cancel(42, "user abort") to a polling handler', async () => {
    const tracker = new CancellationTracker();
    const token = tracker.register(42);
    const observed = pollUntilCancelled(token);
    await new Promise(r => setTimeout(r, 20));
    const cancelledAt = Date.now();
    expect(tracker.cancel(42, 'user abort')).toBe(true);
    const seen = await observed;
    expect(seen.cancelled).toBe(true);
    expect(seen.reason).toBe('user abort');
    // one poll interval plus timer slack
    expect(seen.at - cancelledAt).toBeLessThan(POLL_MS + 50);
  });

  it('reports unknown or finished ids as not found', () => {
    const tracker = new CancellationTracker();
    expect(tracker.cancel(99, 'nothing there')).toBe(false);
    const token = tracker.register(1);
    expect(tracker.complete(1, token)).toBe(true);
    expect(tracker.cancel(1)).toBe(false);
    expect(token.isCancelled()).toBe(false);
  });

  it('never confuses string and integer ids', () => {
    expect(requestIdKey(7)).toBe('i:7');
    expect(requestIdKey('7')).toMatch(/^s:[0-9a-f]{64}$/);
    const tracker = new CancellationTracker();
    const numeric = tracker.register(7);
    const text = tracker.register('7');
    expect(tracker.cancel('7', 'string one')).toBe(true);
    expect(text.reason).toBe('string one');
    expect(numeric.isCancelled()).toBe(false);
  });

  it('keeps connections apart by namespace', () => {
    const tracker = new CancellationTracker();
    const a = tracker.register(1, 'conn-a');
    const b = tracker.register(1, 'conn-b');
    expect(tracker.cancel(1, 'from b', 'conn-b')).toBe(true);
    expect(a.isCancelled()).toBe(false);
    expect(b.isCancelled()).toBe(true);
    expect(tracker.get(1, 'conn-a')).toBe(a);
    expect(tracker.get(1)).toBeUndefined();
  });

  it('only removes the exact token a finished request owned', () => {
    const tracker = new CancellationTracker();
    const first = tracker.register(5);
    const second = tracker.register(5);
    expect(tracker.complete(5, first)).toBe(false);
    expect(tracker.get(5)).toBe(second);
    expect(tracker.complete(5)).toBe(true);
    expect(tracker.size).toBe(0);
  });

  it('cancelAll cancels and forgets one namespace', () => {
    const tracker = new CancellationTracker();
    const a1 = tracker.register(1, 'a');
    const a2 = tracker.register('two', 'a');
    const b1 = tracker.register(1, 'b');
    expect(tracker.cancelAll('a', 'connection closed')).toBe(2);
    expect([a1.reason, a2.reason]).toEqual(['connection closed', 'connection closed']);
    expect(b1.isCancelled()).toBe(false);
    expect(tracker.size).toBe(1);
  });
});

describe('CancellationToken', () => {
  it('first cancellation wins', () => {
    const token = new CancellationToken('r1');
    expect(token.cancel('first')).toBe(true);
    expect(token.cancel('second')).toBe(false);
    expect(token.reason).toBe('first');
  });

  it('notifies listeners once and supports unsubscribe', () => {
    const token = new CancellationToken(3);
    const heard: Array<string | undefined> = [];
    token.onCancel(r => heard.push(`a:${r}`));
    const off = token.onCancel(r => heard.push(`b:${r}`));
    off();
    token.onCancel(() => { throw new Error('listener failure is logged, not thrown'); });
    token.cancel('stop');
    token.cancel('again');
    token.onCancel(r => heard.push(`late:${r}`));
    expect(heard).toEqual(['a:stop', 'late:stop']);
  });

  it('throwIfCancelled raises the request-cancelled error', () => {
    const token = new CancellationToken(4);
    expect(() => token.throwIfCancelled()).not.toThrow();
    token.cancel('user abort');
    expect(caught(() => token.throwIfCancelled())).toEqual({
      code: -32800,
      message: 'Request cancelled',
      data: { reason: 'user abort' },
      __semantic: true,
    });
  });
});
