/**
 * Out-of-band notification delivery.
 *
 * Producers (progress trackers, resource subscriptions) enqueue already-serialized
 * messages; a single background worker drains the queue FIFO every `pollIntervalMs`
 * and hands each buffer to the deliver callback, dropping its reference afterwards.
 *
 * Delivery is not synchronized with the request/response channel: a notification
 * about an operation may be written before, after, or between that operation's
 * response frames.
 */
import type { WireMessage } from '../models/jsonrpc';
import { log } from './logger';

export type DeliverFn = (message: Buffer) => void | Promise<void>;

export interface NotificationQueueOptions {
  deliver: DeliverFn;
  /** Sleep between drains when the queue is empty (default 10ms). */
  pollIntervalMs?: number;
  /** Label for log records. */
  name?: string;
}

export interface NotificationQueueStats {
  pending: number;
  delivered: number;
  failed: number;
  dropped: number;
  running: boolean;
}

export class NotificationQueue {
  private queue: Buffer[] = [];
  private _running = false;
  private worker: Promise<void> | null = null;
  private delivering = false;
  private idleWaiters: Array<() => void> = [];
  private delivered = 0;
  private failed = 0;
  private dropped = 0;
  private closed = false;
  private readonly pollIntervalMs: number;
  private readonly name: string;
  private readonly deliver: DeliverFn;

  constructor(options: NotificationQueueOptions){
    this.deliver = options.deliver;
    this.pollIntervalMs = options.pollIntervalMs && options.pollIntervalMs > 0 ? options.pollIntervalMs : 10;
    this.name = options.name ?? 'notifications';
  }

  get running(){ return this._running; }
  get pending(){ return this.queue.length; }
  get isClosed(){ return this.closed; }

  stats(): NotificationQueueStats {
    return { pending: this.queue.length, delivered: this.delivered, failed: this.failed, dropped: this.dropped, running: this._running };
  }

  /** Serialize and copy the message into the queue. Ownership moves to the queue. */
  enqueue(message: WireMessage | string | Buffer): void {
    if(this.closed) throw new Error(`NotificationQueue ${this.name} is closed`);
    let buf: Buffer;
    if(Buffer.isBuffer(message)) buf = Buffer.from(message);
    else if(typeof message === 'string') buf = Buffer.from(message, 'utf8');
    else buf = Buffer.from(JSON.stringify(message), 'utf8');
    this.queue.push(buf);
  }

  start(): void {
    if(this.closed) throw new Error(`NotificationQueue ${this.name} is closed`);
    if(this._running) return;
    this._running = true;
    if(!this.worker) this.spawn();
  }

  /** Idempotent; the worker notices on its next iteration and exits by itself. */
  stop(): void {
    this._running = false;
    this.settleIdle();
  }

  /** Resolves once the queue is empty and nothing is being delivered (or the worker is stopped). */
  whenIdle(): Promise<void> {
    if(!this._running || (this.queue.length === 0 && !this.delivering)) return Promise.resolve();
    return new Promise<void>(resolve => { this.idleWaiters.push(resolve); });
  }

  /** Stop, wait for the worker and any in-flight delivery, then release undelivered buffers. */
  async close(): Promise<void> {
    if(this.closed) return;
    this.closed = true;
    this.stop();
    if(this.worker) await this.worker;
    if(this.queue.length){
      this.dropped += this.queue.length;
      log('debug', 'notifications_dropped', { data: { queue: this.name, count: this.queue.length } });
      this.queue = [];
    }
  }

  private spawn(){
    this.worker = this.loop().finally(() => {
      this.worker = null;
      // start() may have raced the exit of the previous loop
      if(this._running) this.spawn();
    });
  }

  private async loop(): Promise<void> {
    while(this._running){
      await this.drain();
      if(!this._running) break;
      await new Promise<void>(resolve => setTimeout(resolve, this.pollIntervalMs));
    }
  }

  private async drain(): Promise<void> {
    while(this._running && this.queue.length){
      const message = this.queue.shift();
      if(!message) break;
      this.delivering = true;
      try {
        await this.deliver(message);
        this.delivered++;
      } catch(e){
        this.failed++;
        log('warn', 'notification_delivery_failed', { data: { queue: this.name, message: e instanceof Error ? e.message : String(e) } });
      } finally {
        this.delivering = false;
      }
    }
    if(this.queue.length === 0) this.settleIdle();
  }

  private settleIdle(){
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for(const resolve of waiters) resolve();
  }
}
