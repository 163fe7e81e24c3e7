import { describe, it, expect } from 'vitest';
import { RequestScope } from '../services/requestScope';
import { caught } from './testUtils';

describe('RequestScope', () => {
  it('runs cleanups last-in first-out exactly once', async () => {
    const order: string[] = [];
    const scope = new RequestScope();
    scope.defer(() => { order.push('first'); });
    scope.defer(async () => { order.push('second'); });
    scope.defer(() => { throw new Error('cleanup failed'); });
    scope.defer(() => { order.push('fourth'); });
    await scope.release();
    await scope.release();
    expect(order).toEqual(['fourth', 'second', 'first']);
    expect(scope.isReleased).toBe(true);
  });

  it('holds per-request values until release', async () => {
    const scope = new RequestScope('corr-1');
    scope.set('buffer', [1, 2, 3]);
    expect(scope.get('buffer')).toEqual([1, 2, 3]);
    expect(scope.correlationId).toBe('corr-1');
    await scope.release();
    expect(scope.get('buffer')).toBeUndefined();
    expect(caught(() => scope.set('late', 1))).toBeInstanceOf(Error);
    expect(caught(() => scope.defer(() => undefined))).toBeInstanceOf(Error);
  });

  it('generates a correlation id per scope', () => {
    const a = new RequestScope();
    const b = new RequestScope();
    expect(a.correlationId).toMatch(/^[0-9a-f]{16}$/);
    expect(a.correlationId).not.toBe(b.correlationId);
    expect(a.elapsedMs()).toBeGreaterThanOrEqual(0);
  });
});
