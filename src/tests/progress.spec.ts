import { describe, it, expect } from 'vitest';
import type { WireNotification } from '../models/jsonrpc';
import { NotificationQueue } from '../services/notificationQueue';
import { buildProgressNotification, NoNotifierConfiguredError, ProgressTracker } from '../services/progress';
import { caught, caughtAsync } from './testUtils';

describe('ProgressTracker', () => {
  it('sends synchronously through send() and skips non-increasing updates', async () => {
    const sent: WireNotification[] = [];
    const tracker = new ProgressTracker(11, { send: m => { sent.push(m); }, total: 4 });
    expect(await tracker.update(1)).toBe(true);
    expect(await tracker.update(1)).toBe(false);
    expect(await tracker.update(0.5)).toBe(false);
    expect(await tracker.update(2, 'halfway')).toBe(true);
    expect(tracker.getPercentage()).toBe(50);
    expect(await tracker.complete('done')).toBe(true);
    expect(tracker.isComplete).toBe(true);
    expect(await tracker.update(9)).toBe(false);
    expect(sent.map(m => m.params)).toEqual([
      { progressToken: 11, progress: 1, total: 4 },
      { progressToken: 11, progress: 2, total: 4, message: 'halfway' },
      { progressToken: 11, progress: 4, total: 4, message: 'done' },
    ]);
  });

  it('completes one step past the last value when there is no total', async () => {
    const sent: WireNotification[] = [];
    const tracker = new ProgressTracker('t', { send: m => { sent.push(m); } });
    await tracker.update(3);
    await tracker.complete();
    expect(sent.map(m => m.params)).toEqual([
      { progressToken: 't', progress: 3 },
      { progressToken: 't', progress: 4 },
    ]);
    expect(tracker.getPercentage()).toBeUndefined();
  });

  it('prefers the queue when both are configured', async () => {
    const sent: WireNotification[] = [];
    const queue = new NotificationQueue({ deliver: () => undefined });
    const tracker = new ProgressTracker('q', { notifier: queue, send: m => { sent.push(m); } });
    expect(await tracker.update(1)).toBe(true);
    expect(tracker.completeAsync()).toBe(true);
    expect(queue.pending).toBe(2);
    expect(sent).toHaveLength(0);
    await queue.close();
  });

  it('fails without a notifier or send function', async () => {
    const tracker = new ProgressTracker('none');
    expect(await caughtAsync(() => tracker.update(1))).toBeInstanceOf(NoNotifierConfiguredError);
    expect(caught(() => tracker.updateAsync(1))).toBeInstanceOf(NoNotifierConfiguredError);
    expect(tracker.progress).toBeUndefined();
  });

  it('builds the wire notification', () => {
    expect(buildProgressNotification('abc', { progress: 0.25, message: 'quarter' })).toEqual({
      jsonrpc: '2.0',
      method: 'notifications/progress',
      params: { progressToken: 'abc', progress: 0.25, message: 'quarter' },
    });
  });
});
