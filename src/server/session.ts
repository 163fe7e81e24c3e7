import type { JsonObject, JsonValue } from '../models/jsonrpc';
import { buildNotification } from './envelope';
import { ServerLifecycle } from './lifecycle';
import type { NotificationQueue } from '../services/notificationQueue';
import { log } from '../services/logger';

export interface ClientInfo {
  name: string;
  version?: string;
}

/**
 * State of one client connection: its lifecycle phase, its outbound notification
 * queue and whatever the handshake negotiated. Dispatch contexts carry a reference so
 * handlers can push notifications to the right client.
 */
export class Session {
  readonly lifecycle: ServerLifecycle;
  clientInfo: ClientInfo | undefined;
  clientCapabilities: JsonObject = {};
  protocolVersion: string | undefined;
  private readonly closeHandlers: Array<() => void> = [];
  private _closed = false;

  constructor(readonly id: string, readonly notifications: NotificationQueue){
    this.lifecycle = new ServerLifecycle(id);
  }

  get closed(){ return this._closed; }

  /** Queue a notification for this client. Dropped once the session is closed. */
  notify(method: string, params?: JsonValue): boolean {
    if(this._closed || this.notifications.isClosed) {
      log('debug', 'notify_after_close', { connectionId: this.id, method });
      return false;
    }
    this.notifications.enqueue(buildNotification(method, params));
    return true;
  }

  onClose(handler: () => void){
    if(this._closed){ handler(); return; }
    this.closeHandlers.push(handler);
  }

  /** Runs close handlers once and forces the lifecycle to its terminal state. */
  close(){
    if(this._closed) return;
    this._closed = true;
    this.lifecycle.terminate();
    for(const handler of this.closeHandlers.splice(0)){
      try {
        handler();
      } catch(e){
        log('warn', 'session_close_handler_failed', { connectionId: this.id, data: { message: e instanceof Error ? e.message : String(e) } });
      }
    }
  }
}
