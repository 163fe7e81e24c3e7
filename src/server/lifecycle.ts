/**
 * Per-connection server lifecycle.
 *
 *   Created --initialize--> Initializing --ok--> Ready --shutdown--> Shutdown
 *                                        \--version mismatch--> ErrorState
 *
 * Any state is forced to Shutdown when the transport closes. Shutdown is terminal.
 */
import { ErrorCode, semanticError } from '../services/errors';
import { log } from '../services/logger';

export enum ServerState {
  Created = 'created',
  Initializing = 'initializing',
  Ready = 'ready',
  ErrorState = 'error',
  Shutdown = 'shutdown',
}

// Legal in every phase: handshake, liveness and notifications handle their own gating
const UNGATED_METHODS = new Set(['initialize', 'ping']);

export class ServerLifecycle {
  private _state = ServerState.Created;
  private _failure: string | undefined;

  constructor(readonly connectionId = 'default'){}

  get state(){ return this._state; }
  /** Why initialization failed, when state is ErrorState. */
  get failure(){ return this._failure; }
  get isReady(){ return this._state === ServerState.Ready; }
  get isTerminated(){ return this._state === ServerState.Shutdown; }

  /** Throws the semantic error a client should see when `method` is not legal right now. */
  assertMethodAllowed(method: string): void {
    if(UNGATED_METHODS.has(method) || method.startsWith('notifications/')) return;
    if(this._state === ServerState.Ready) return;
    if(this._state === ServerState.Shutdown){
      semanticError(ErrorCode.InvalidRequest, 'Server is shut down', { method });
    }
    semanticError(ErrorCode.ServerNotInitialized, 'Server not initialized', { method, state: this._state });
  }

  beginInitialize(): void {
    if(this._state === ServerState.Ready) semanticError(ErrorCode.InvalidRequest, 'Server already initialized');
    if(this._state !== ServerState.Created && this._state !== ServerState.Initializing){
      semanticError(ErrorCode.InvalidRequest, `Cannot initialize in state ${this._state}`);
    }
    this.transition(ServerState.Initializing);
  }

  completeInitialize(): void {
    if(this._state !== ServerState.Initializing){
      throw new Error(`completeInitialize() in state ${this._state}`);
    }
    this.transition(ServerState.Ready);
  }

  failInitialize(reason: string): void {
    if(this._state !== ServerState.Initializing){
      throw new Error(`failInitialize() in state ${this._state}`);
    }
    this._failure = reason;
    this.transition(ServerState.ErrorState);
  }

  shutdown(): void {
    if(this._state !== ServerState.Ready){
      semanticError(ErrorCode.ServerNotInitialized, 'Server not initialized', { method: 'shutdown', state: this._state });
    }
    this.transition(ServerState.Shutdown);
  }

  /** Transport closed: force the terminal state from anywhere. */
  terminate(): void {
    if(this._state !== ServerState.Shutdown) this.transition(ServerState.Shutdown);
  }

  private transition(next: ServerState){
    const prev = this._state;
    this._state = next;
    log('debug', 'lifecycle_transition', { connectionId: this.connectionId, data: { from: prev, to: next } });
  }
}
