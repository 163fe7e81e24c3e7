import type { JsonObject, WireNotification } from '../models/jsonrpc';
import { buildNotification } from '../server/envelope';
import type { NotificationQueue } from './notificationQueue';

export type ProgressToken = string | number;
export type SendFn = (message: WireNotification) => void | Promise<void>;

export const PROGRESS_METHOD = 'notifications/progress';

export class NoNotifierConfiguredError extends Error {
  constructor(){
    super('No notification queue configured for asynchronous progress');
    this.name = 'NoNotifierConfiguredError';
  }
}

export interface ProgressUpdate {
  progress: number;
  total?: number;
  message?: string;
}

export function buildProgressNotification(token: ProgressToken, update: ProgressUpdate): WireNotification {
  const params: JsonObject = { progressToken: token, progress: update.progress };
  if(update.total !== undefined) params.total = update.total;
  if(update.message !== undefined) params.message = update.message;
  return buildNotification(PROGRESS_METHOD, params);
}

export interface ProgressTrackerOptions {
  /** Asynchronous mode: messages go through the queue's background worker. */
  notifier?: NotificationQueue;
  /** Synchronous mode: the caller awaits serialization and the write. */
  send?: SendFn;
  total?: number;
}

/**
 * Reports progress for one long-running operation under a caller supplied token.
 * Progress must increase; updates that do not are skipped (update() returns false).
 */
export class ProgressTracker {
  private current: number | undefined;
  private completed = false;
  private readonly total: number | undefined;

  constructor(readonly token: ProgressToken, private readonly options: ProgressTrackerOptions = {}){
    this.total = options.total;
  }

  get isComplete(){ return this.completed; }
  get progress(){ return this.current; }

  /** Uses the queue when one is configured, otherwise writes synchronously through `send`. */
  async update(progress: number, message?: string): Promise<boolean> {
    if(this.options.notifier) return this.updateAsync(progress, message);
    const send = this.options.send;
    if(!send) throw new NoNotifierConfiguredError();
    const next = this.accept(progress);
    if(next === null) return false;
    await send(buildProgressNotification(this.token, this.payload(next, message)));
    return true;
  }

  updateAsync(progress: number, message?: string): boolean {
    const notifier = this.options.notifier;
    if(!notifier) throw new NoNotifierConfiguredError();
    const next = this.accept(progress);
    if(next === null) return false;
    notifier.enqueue(buildProgressNotification(this.token, this.payload(next, message)));
    return true;
  }

  /** Final update at `total` (or one step past the last value when there is no total). */
  async complete(message?: string): Promise<boolean> {
    const final = this.total ?? (this.current ?? 0) + 1;
    const sent = await this.update(final, message);
    this.completed = true;
    return sent;
  }

  completeAsync(message?: string): boolean {
    const final = this.total ?? (this.current ?? 0) + 1;
    const sent = this.updateAsync(final, message);
    this.completed = true;
    return sent;
  }

  /** 0..100 when a total is known. */
  getPercentage(): number | undefined {
    if(this.total === undefined || this.total <= 0 || this.current === undefined) return undefined;
    return Math.min(100, (this.current / this.total) * 100);
  }

  private accept(progress: number): number | null {
    if(this.completed || !Number.isFinite(progress)) return null;
    if(this.current !== undefined && progress <= this.current) return null;
    this.current = progress;
    return progress;
  }

  private payload(progress: number, message: string | undefined): ProgressUpdate {
    const out: ProgressUpdate = { progress };
    if(this.total !== undefined) out.total = this.total;
    if(message !== undefined) out.message = message;
    return out;
  }
}
