import crypto from 'crypto';
import type { RequestId } from '../models/jsonrpc';
import { ErrorCode, semanticError } from './errors';
import { log } from './logger';

export type CancelListener = (reason: string | undefined) => void;

/**
 * Cooperative cancellation flag for one in-flight request. Long-running handlers poll
 * isCancelled() (or subscribe with onCancel) and return early; nothing interrupts them.
 */
export class CancellationToken {
  private _cancelled = false;
  private _reason: string | undefined;
  private listeners: CancelListener[] = [];

  constructor(readonly requestId: RequestId){}

  isCancelled(): boolean { return this._cancelled; }
  get reason(): string | undefined { return this._reason; }

  /** First cancellation wins; returns false when already cancelled. */
  cancel(reason?: string): boolean {
    if(this._cancelled) return false;
    // reason first so an observer of the flag always sees it
    this._reason = reason;
    this._cancelled = true;
    const listeners = this.listeners;
    this.listeners = [];
    for(const listener of listeners){
      try {
        listener(reason);
      } catch(e){
        log('warn', 'cancel_listener_failed', { data: { requestId: this.requestId, message: e instanceof Error ? e.message : String(e) } });
      }
    }
    return true;
  }

  /** Returns an unsubscribe function. Fires immediately when already cancelled. */
  onCancel(listener: CancelListener): () => void {
    if(this._cancelled){
      listener(this._reason);
      return () => undefined;
    }
    this.listeners.push(listener);
    return () => { this.listeners = this.listeners.filter(l => l !== listener); };
  }

  throwIfCancelled(): void {
    if(this._cancelled){
      semanticError(ErrorCode.RequestCancelled, 'Request cancelled', this._reason === undefined ? undefined : { reason: this._reason });
    }
  }
}

/** Integer ids key on their value, string ids on a content hash of the string. */
export function requestIdKey(id: RequestId): string {
  if(typeof id === 'number') return `i:${id}`;
  return `s:${crypto.createHash('sha256').update(id, 'utf8').digest('hex')}`;
}

/**
 * In-flight request id -> token map shared by every connection. Keys are namespaced by
 * the owning connection so equal ids from different clients never collide.
 */
export class CancellationTracker {
  private readonly tokens = new Map<string, CancellationToken>();

  get size(){ return this.tokens.size; }

  private key(id: RequestId, namespace: string){
    return `${namespace}|${requestIdKey(id)}`;
  }

  register(id: RequestId, namespace = ''): CancellationToken {
    const token = new CancellationToken(id);
    const key = this.key(id, namespace);
    if(this.tokens.has(key)) log('warn', 'cancellation_id_reused', { data: { requestId: id, namespace } });
    this.tokens.set(key, token);
    return token;
  }

  get(id: RequestId, namespace = ''): CancellationToken | undefined {
    return this.tokens.get(this.key(id, namespace));
  }

  /** True when an in-flight request matched. Unknown or finished ids are not an error. */
  cancel(id: RequestId, reason?: string, namespace = ''): boolean {
    const token = this.tokens.get(this.key(id, namespace));
    if(!token){
      log('debug', 'cancel_not_found', { data: { requestId: id, namespace } });
      return false;
    }
    token.cancel(reason);
    log('info', 'cancel_requested', { data: { requestId: id, namespace, reason } });
    return true;
  }

  /** Drop the token for a finished request. With `token` given, only that exact token is removed. */
  complete(id: RequestId, token?: CancellationToken, namespace = ''): boolean {
    const key = this.key(id, namespace);
    const current = this.tokens.get(key);
    if(!current || (token && current !== token)) return false;
    this.tokens.delete(key);
    return true;
  }

  /** Cancel and forget every token of one namespace (connection closed). */
  cancelAll(namespace: string, reason?: string): number {
    let count = 0;
    const prefix = `${namespace}|`;
    for(const [key, token] of this.tokens){
      if(!key.startsWith(prefix)) continue;
      token.cancel(reason);
      this.tokens.delete(key);
      count++;
    }
    return count;
  }
}
