import { describe, it, expect } from 'vitest';
import { ServerLifecycle, ServerState } from '../server/lifecycle';
import { caught, makeSession } from './testUtils';

describe('ServerLifecycle', () => {
  it('moves Created -> Initializing -> Ready -> Shutdown', () => {
    const lc = new ServerLifecycle('c1');
    expect(lc.state).toBe(ServerState.Created);
    lc.beginInitialize();
    expect(lc.state).toBe(ServerState.Initializing);
    lc.completeInitialize();
    expect(lc.isReady).toBe(true);
    lc.shutdown();
    expect(lc.state).toBe(ServerState.Shutdown);
    expect(lc.isTerminated).toBe(true);
  });

  it('gates methods until the handshake completes', () => {
    const lc = new ServerLifecycle();
    expect(caught(() => lc.assertMethodAllowed('tools/list'))).toEqual({
      code: -32099,
      message: 'Server not initialized',
      data: { method: 'tools/list', state: 'created' },
      __semantic: true,
    });
    // handshake, liveness and notifications are never gated
    for (const method of ['initialize', 'ping', 'notifications/initialized', 'notifications/cancelled']) {
      expect(() => lc.assertMethodAllowed(method)).not.toThrow();
    }
    lc.beginInitialize();
    expect(caught(() => lc.assertMethodAllowed('tools/call'))).toMatchObject({ code: -32099, data: { state: 'initializing' } });
    lc.completeInitialize();
    expect(() => lc.assertMethodAllowed('tools/call')).not.toThrow();
  });

  it('rejects a second initialize', () => {
    const lc = new ServerLifecycle();
    lc.beginInitialize();
    lc.completeInitialize();
    expect(caught(() => lc.beginInitialize())).toMatchObject({ code: -32600, message: 'Server already initialized' });
    expect(lc.state).toBe(ServerState.Ready);
  });

  it('records why initialization failed and refuses to retry', () => {
    const lc = new ServerLifecycle();
    lc.beginInitialize();
    lc.failInitialize('client requested 1999-01-01');
    expect(lc.state).toBe(ServerState.ErrorState);
    expect(lc.failure).toBe('client requested 1999-01-01');
    expect(caught(() => lc.beginInitialize())).toMatchObject({ code: -32600, message: 'Cannot initialize in state error' });
    expect(caught(() => lc.assertMethodAllowed('tools/list'))).toMatchObject({ code: -32099 });
  });

  it('only shuts down from Ready and stays shut', () => {
    const lc = new ServerLifecycle();
    expect(caught(() => lc.shutdown())).toMatchObject({ code: -32099 });
    lc.beginInitialize();
    lc.completeInitialize();
    lc.shutdown();
    expect(caught(() => lc.assertMethodAllowed('tools/list'))).toMatchObject({ code: -32600, message: 'Server is shut down' });
    expect(caught(() => lc.beginInitialize())).toMatchObject({ code: -32600 });
  });

  it('misuse of the internal transitions is a programming error', () => {
    const lc = new ServerLifecycle();
    expect(caught(() => lc.completeInitialize())).toBeInstanceOf(Error);
    expect(caught(() => lc.failInitialize('x'))).toBeInstanceOf(Error);
  });

  it('terminates when its session closes', () => {
    const session = makeSession('s1');
    const order: string[] = [];
    session.onClose(() => order.push(`closed:${session.lifecycle.state}`));
    session.close();
    session.close();
    expect(order).toEqual(['closed:shutdown']);
    expect(session.notify('notifications/message', { text: 'late' })).toBe(false);
    // handlers added after close run immediately
    session.onClose(() => order.push('late'));
    expect(order).toEqual(['closed:shutdown', 'late']);
  });
});
