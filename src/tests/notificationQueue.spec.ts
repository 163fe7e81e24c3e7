import { describe, it, expect } from 'vitest';
import type { JsonObject } from '../models/jsonrpc';
import { NotificationQueue } from '../services/notificationQueue';
import { ProgressTracker } from '../services/progress';
import { caught, dig, parseObject, waitFor } from './testUtils';

describe('NotificationQueue', () => {
  it('delivers five queued progress updates in order under one token', async () => {
    const delivered: JsonObject[] = [];
    const queue = new NotificationQueue({ deliver: buf => { delivered.push(parseObject(buf.toString('utf8'))); }, pollIntervalMs: 5 });
    const progress = new ProgressTracker('job-7', { notifier: queue, total: 5 });
    for (let i = 1; i <= 5; i++) expect(progress.updateAsync(i, `step ${i}`)).toBe(true);
    expect(queue.pending).toBe(5);

    queue.start();
    await queue.whenIdle();
    queue.stop();
    await queue.close();

    expect(delivered).toHaveLength(5);
    expect(delivered.map(m => dig(m, 'params', 'progress'))).toEqual([1, 2, 3, 4, 5]);
    expect(new Set(delivered.map(m => dig(m, 'params', 'progressToken')))).toEqual(new Set(['job-7']));
    expect(delivered[0]).toEqual({
      jsonrpc: '2.0',
      method: 'notifications/progress',
      params: { progressToken: 'job-7', progress: 1, total: 5, message: 'step 1' },
    });
    expect(queue.stats()).toEqual({ pending: 0, delivered: 5, failed: 0, dropped: 0, running: false });
  });

  it('picks up messages enqueued while running', async () => {
    const seen: string[] = [];
    const queue = new NotificationQueue({ deliver: buf => { seen.push(buf.toString()); }, pollIntervalMs: 5 });
    queue.start();
    queue.start();
    queue.enqueue('first');
    await waitFor(() => seen.length === 1);
    queue.enqueue(Buffer.from('second'));
    await waitFor(() => seen.length === 2);
    await queue.close();
    expect(seen).toEqual(['first', 'second']);
  });

  it('copies the message so later mutation of the caller buffer has no effect', async () => {
    const seen: string[] = [];
    const queue = new NotificationQueue({ deliver: buf => { seen.push(buf.toString()); }, pollIntervalMs: 5 });
    const source = Buffer.from('abc');
    queue.enqueue(source);
    source.write('xyz');
    queue.start();
    await queue.whenIdle();
    await queue.close();
    expect(seen).toEqual(['abc']);
  });

  it('keeps draining after a delivery failure', async () => {
    const seen: string[] = [];
    const queue = new NotificationQueue({
      deliver: buf => {
        const text = buf.toString();
        if (text === 'bad') throw new Error('write failed');
        seen.push(text);
      },
      pollIntervalMs: 5,
    });
    queue.enqueue('one');
    queue.enqueue('bad');
    queue.enqueue('two');
    queue.start();
    await queue.whenIdle();
    await queue.close();
    expect(seen).toEqual(['one', 'two']);
    expect(queue.stats()).toMatchObject({ delivered: 2, failed: 1 });
  });

  it('drops what is left on close and refuses new work', async () => {
    const queue = new NotificationQueue({ deliver: () => undefined });
    queue.enqueue('a');
    queue.enqueue('b');
    await queue.close();
    await queue.close();
    expect(queue.stats()).toEqual({ pending: 0, delivered: 0, failed: 0, dropped: 2, running: false });
    expect(caught(() => queue.enqueue('c'))).toBeInstanceOf(Error);
    expect(caught(() => queue.start())).toBeInstanceOf(Error);
  });

  it('can be restarted after stop', async () => {
    const seen: string[] = [];
    const queue = new NotificationQueue({ deliver: buf => { seen.push(buf.toString()); }, pollIntervalMs: 5 });
    queue.start();
    queue.stop();
    queue.stop();
    queue.enqueue('after restart');
    queue.start();
    await waitFor(() => seen.length === 1);
    await queue.close();
    expect(seen).toEqual(['after restart']);
  });
});
