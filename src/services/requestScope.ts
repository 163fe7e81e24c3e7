import { log, newCorrelationId } from './logger';

type Cleanup = () => void | Promise<void>;

/**
 * Resources owned by a single request/response cycle.
 *
 * Handlers register cleanups with defer() and stash per-request values with set();
 * the connection releases the scope in a finally block once the response is written,
 * running cleanups last-in first-out. Nothing registered here outlives its request.
 */
export class RequestScope {
  readonly correlationId: string;
  readonly startedAt = Date.now();
  private readonly cleanups: Cleanup[] = [];
  private readonly values = new Map<string, unknown>();
  private released = false;

  constructor(correlationId: string = newCorrelationId()){
    this.correlationId = correlationId;
  }

  get isReleased(){ return this.released; }

  defer(cleanup: Cleanup){
    if(this.released) throw new Error('RequestScope already released');
    this.cleanups.push(cleanup);
  }

  set<T>(key: string, value: T){
    if(this.released) throw new Error('RequestScope already released');
    this.values.set(key, value);
  }

  get(key: string): unknown {
    return this.values.get(key);
  }

  elapsedMs(){ return Date.now() - this.startedAt; }

  /** Idempotent. A failing cleanup is logged and the remaining ones still run. */
  async release(): Promise<void> {
    if(this.released) return;
    this.released = true;
    while(this.cleanups.length){
      const cleanup = this.cleanups.pop();
      if(!cleanup) break;
      try {
        await cleanup();
      } catch(e){
        log('warn', 'scope_cleanup_failed', { correlationId: this.correlationId, data: { message: e instanceof Error ? e.message : String(e) } });
      }
    }
    this.values.clear();
  }
}
