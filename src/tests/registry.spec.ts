import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { CancellationToken, CancellationTracker } from '../services/cancellation';
import { errorMessage, semanticError } from '../services/errors';
import { DispatchResult, MethodRegistry } from '../server/registry';
import { caught, caughtAsync, makeContext, makeSession } from './testUtils';

describe('MethodRegistry dispatch', () => {
  it('answers every unregistered method with -32601 whatever the params', async () => {
    const registry = new MethodRegistry();
    registry.add('echo', (_ctx, params) => DispatchResult.ok(params ?? null));
    const params = fc.oneof(
      fc.constant(undefined),
      fc.integer(),
      fc.string(),
      fc.array(fc.integer()),
      fc.dictionary(fc.string(), fc.integer())
    );
    await fc.assert(
      fc.asyncProperty(fc.string().filter(m => m !== 'echo'), params, async (method, p) => {
        const result = await registry.dispatch(makeContext(method, p));
        expect(result).toEqual({ kind: 'error', error: { code: -32601, message: 'Method not found', data: { method } } });
      })
    );
  });

  it('runs before, handler and after in order', async () => {
    const calls: string[] = [];
    const registry = new MethodRegistry({
      before: ctx => { calls.push(`before:${ctx.method}`); },
      after: (ctx, result) => { calls.push(`after:${ctx.method}:${result.kind}`); },
    });
    registry.add('work', () => { calls.push('handler'); return DispatchResult.ok(1); });
    expect(await registry.dispatch(makeContext('work'))).toEqual({ kind: 'result', value: 1 });
    expect(calls).toEqual(['before:work', 'handler', 'after:work:result']);
  });

  it('lets the before hook short-circuit dispatch', async () => {
    let ran = false;
    let after = false;
    const registry = new MethodRegistry({
      before: () => semanticError(-32099, 'Server not initialized'),
      after: () => { after = true; },
    });
    registry.add('work', () => { ran = true; return DispatchResult.none(); });
    const err = await caughtAsync(() => registry.dispatch(makeContext('work')));
    expect(err).toMatchObject({ code: -32099, message: 'Server not initialized' });
    expect(ran).toBe(false);
    expect(after).toBe(false);
  });

  it('routes handler failures through the error hook', async () => {
    const seen: string[] = [];
    const registry = new MethodRegistry({
      error: (_ctx, err) => DispatchResult.fail(-32000, errorMessage(err)),
      after: (_ctx, result) => { seen.push(result.kind); },
    });
    registry.add('boom', () => { throw new Error('kaput'); });
    expect(await registry.dispatch(makeContext('boom'))).toEqual({ kind: 'error', error: { code: -32000, message: 'kaput' } });
    expect(seen).toEqual(['error']);
  });

  it('rethrows handler failures when no error hook is set', async () => {
    const registry = new MethodRegistry();
    registry.add('boom', async () => { throw new Error('kaput'); });
    const err = await caughtAsync(() => registry.dispatch(makeContext('boom')));
    expect(err instanceof Error ? err.message : err).toBe('kaput');
  });

  it('uses the fallback hook for unregistered methods', async () => {
    const registry = new MethodRegistry();
    registry.setHooks({ fallback: ctx => DispatchResult.ok(`fallback:${ctx.method}`) });
    expect(await registry.dispatch(makeContext('missing'))).toEqual({ kind: 'result', value: 'fallback:missing' });
  });

  it('keeps the last registration for a name', async () => {
    const registry = new MethodRegistry();
    registry.add('m', () => DispatchResult.ok(1));
    registry.add('m', () => DispatchResult.ok(2));
    expect(registry.methods()).toEqual(['m']);
    expect(await registry.dispatch(makeContext('m'))).toEqual({ kind: 'result', value: 2 });
  });

  it('refuses changes once sealed', () => {
    const registry = new MethodRegistry().seal();
    expect(registry.isSealed).toBe(true);
    expect(caught(() => registry.add('late', () => DispatchResult.none()))).toBeInstanceOf(Error);
    expect(caught(() => registry.setHooks({}))).toBeInstanceOf(Error);
    expect(caught(() => new MethodRegistry().add('', () => DispatchResult.none()))).toBeInstanceOf(Error);
  });

  it('records per-method metrics and buckets unknown names together', async () => {
    const registry = new MethodRegistry();
    registry.add('work', () => DispatchResult.ok(null));
    await registry.dispatch(makeContext('work'));
    await registry.dispatch(makeContext('work'));
    await registry.dispatch(makeContext('nope/one'));
    await registry.dispatch(makeContext('nope/two'));
    const metrics = registry.getMetricsRaw();
    expect(Object.keys(metrics).sort()).toEqual(['(unregistered)', 'work']);
    expect([metrics.work.count, metrics.work.errors]).toEqual([2, 0]);
    expect([metrics['(unregistered)'].count, metrics['(unregistered)'].errors]).toEqual([2, 2]);
  });

  it('gives cancellable requests a tracked token for the duration of the call', async () => {
    const tracker = new CancellationTracker();
    const registry = new MethodRegistry({ tracker });
    const seen: { token?: CancellationToken; tracked?: CancellationToken } = {};
    registry.add('slow', ctx => {
      seen.token = ctx.cancellation;
      seen.tracked = tracker.get(7, ctx.session.id);
      return DispatchResult.none();
    }, { cancellable: true });
    registry.add('plain', ctx => DispatchResult.ok(ctx.cancellation === undefined));
    expect(registry.isCancellable('slow')).toBe(true);
    expect(registry.isCancellable('plain')).toBe(false);

    const ctx = makeContext('slow', undefined, 7, makeSession('conn-a'));
    await registry.dispatch(ctx);
    expect(seen.token?.requestId).toBe(7);
    expect(seen.tracked).toBe(seen.token);
    expect(tracker.size).toBe(0);
    expect(ctx.cancellation).toBeUndefined();

    // notifications carry no id and get no token
    await registry.dispatch(makeContext('slow', undefined, null));
    expect(seen.token).toBeUndefined();
    expect(await registry.dispatch(makeContext('plain', undefined, 8))).toEqual({ kind: 'result', value: true });
  });
});
