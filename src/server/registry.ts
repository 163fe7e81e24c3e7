/**
 * Method registry and dispatcher.
 *
 * One handler per method name; add() on an existing name replaces the earlier handler
 * (last registration wins, logged as method_overwritten). The table is sealed before
 * serving starts and dispatch never mutates it.
 *
 * dispatch() order:
 *   before hook (may throw to short-circuit) -> exact lookup -> handler
 *   handler threw  -> error hook, or rethrow when none is set
 *   no handler     -> fallback hook, or MethodNotFound
 *   after hook on whatever result came out of the above
 *
 * The dispatcher returns a DispatchResult, never wire bytes; framing and envelope
 * building belong to the connection.
 */
import type { JsonValue, RequestId, RpcErrorObject } from '../models/jsonrpc';
import type { CancellationToken, CancellationTracker } from '../services/cancellation';
import { ErrorCode } from '../services/errors';
import { log } from '../services/logger';
import type { RequestScope } from '../services/requestScope';
import type { Session } from './session';

export type DispatchResult =
  | { kind: 'result'; value: JsonValue }
  | { kind: 'error'; error: RpcErrorObject }
  | { kind: 'none' }
  /** Final response (when the call had an id) and then stop reading the connection. */
  | { kind: 'endStream'; value?: JsonValue };

export const DispatchResult = {
  ok(value: JsonValue): DispatchResult { return { kind: 'result', value }; },
  fail(code: number, message: string, data?: JsonValue): DispatchResult {
    return { kind: 'error', error: data === undefined ? { code, message } : { code, message, data } };
  },
  none(): DispatchResult { return { kind: 'none' }; },
  endStream(value?: JsonValue): DispatchResult { return value === undefined ? { kind: 'endStream' } : { kind: 'endStream', value }; },
};

export interface DispatchContext {
  method: string;
  params?: JsonValue;
  /** null for notifications. */
  id: RequestId | null;
  scope: RequestScope;
  session: Session;
  /** Present while a cancellable handler runs for a request. */
  cancellation?: CancellationToken;
}

export type MethodHandler = (ctx: DispatchContext, params: JsonValue | undefined) => DispatchResult | Promise<DispatchResult>;

export interface MethodOptions {
  /** Create a cancellation token for requests routed to this handler. */
  cancellable?: boolean;
}

interface MethodEntry {
  name: string;
  handler: MethodHandler;
  cancellable: boolean;
}

export interface DispatchHooks {
  before?: (ctx: DispatchContext) => void | Promise<void>;
  after?: (ctx: DispatchContext, result: DispatchResult) => void | Promise<void>;
  error?: (ctx: DispatchContext, err: unknown) => DispatchResult | Promise<DispatchResult>;
  fallback?: (ctx: DispatchContext) => DispatchResult | Promise<DispatchResult>;
}

export interface MethodRegistryOptions extends DispatchHooks {
  tracker?: CancellationTracker;
}

interface MetricRecord { count: number; totalMs: number; maxMs: number; errors: number }

export function methodNotFound(method: string): DispatchResult {
  return DispatchResult.fail(ErrorCode.MethodNotFound, 'Method not found', { method });
}

export class MethodRegistry {
  private readonly entries = new Map<string, MethodEntry>();
  private readonly metrics: Record<string, MetricRecord> = {};
  private hooks: DispatchHooks;
  private readonly tracker: CancellationTracker | undefined;
  private sealed = false;

  constructor(options: MethodRegistryOptions = {}){
    const { tracker, ...hooks } = options;
    this.tracker = tracker;
    this.hooks = hooks;
  }

  add(method: string, handler: MethodHandler, options: MethodOptions = {}): this {
    if(this.sealed) throw new Error(`Method registry is sealed; cannot add ${method}`);
    if(!method) throw new Error('Method name cannot be empty');
    if(this.entries.has(method)) log('debug', 'method_overwritten', { method });
    this.entries.set(method, { name: method, handler, cancellable: options.cancellable === true });
    return this;
  }

  setHooks(hooks: DispatchHooks): this {
    if(this.sealed) throw new Error('Method registry is sealed; cannot change hooks');
    this.hooks = { ...this.hooks, ...hooks };
    return this;
  }

  /** Freeze the table; further add()/setHooks() calls throw. */
  seal(): this {
    this.sealed = true;
    return this;
  }

  get isSealed(){ return this.sealed; }

  has(method: string): boolean { return this.entries.has(method); }

  methods(): string[] { return [...this.entries.keys()].sort(); }

  isCancellable(method: string): boolean { return this.entries.get(method)?.cancellable === true; }

  getMetricsRaw(): Readonly<Record<string, MetricRecord>> { return this.metrics; }

  async dispatch(ctx: DispatchContext): Promise<DispatchResult> {
    const startNs = process.hrtime.bigint();
    if(this.hooks.before) await this.hooks.before(ctx);

    const entry = this.entries.get(ctx.method);
    let result: DispatchResult;
    if(entry){
      result = await this.invoke(entry, ctx);
    } else if(this.hooks.fallback){
      result = await this.hooks.fallback(ctx);
    } else {
      result = methodNotFound(ctx.method);
    }

    const ms = Number(process.hrtime.bigint() - startNs) / 1_000_000;
    // unknown names share one bucket so clients cannot grow the table
    this.recordMetric(entry ? ctx.method : '(unregistered)', ms, result.kind === 'error');
    if(this.hooks.after) await this.hooks.after(ctx, result);
    return result;
  }

  private async invoke(entry: MethodEntry, ctx: DispatchContext): Promise<DispatchResult> {
    const tracker = this.tracker;
    const id = ctx.id;
    const token = entry.cancellable && tracker && id !== null ? tracker.register(id, ctx.session.id) : undefined;
    if(token) ctx.cancellation = token;
    try {
      return await entry.handler(ctx, ctx.params);
    } catch(e){
      if(!this.hooks.error) throw e;
      return await this.hooks.error(ctx, e);
    } finally {
      if(token && tracker && id !== null){
        tracker.complete(id, token, ctx.session.id);
        ctx.cancellation = undefined;
      }
    }
  }

  private recordMetric(name: string, ms: number, failed: boolean){
    let rec = this.metrics[name];
    if(!rec){ rec = { count:0, totalMs:0, maxMs:0, errors:0 }; this.metrics[name] = rec; }
    rec.count++; rec.totalMs += ms; if(ms > rec.maxMs) rec.maxMs = ms;
    if(failed) rec.errors++;
  }
}
