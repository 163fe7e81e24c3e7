/**
 * MCP transport layer.
 *
 * A Connection binds one framer + envelope codec pipeline to one ordered byte stream
 * (stdin/stdout pair or a TCP socket) with its own Session (lifecycle phase and
 * notification queue). Requests are dispatched one at a time in arrival order, so
 * responses leave in request order; `notifications/cancelled` bypasses that queue so it
 * can reach the request currently running. Every request/response cycle gets its own
 * RequestScope, released once the response is written.
 *
 * Read failures:
 *  - clean disconnect (end of stream, EPIPE, ECONNRESET, premature close): loop ends quietly
 *  - framing error: best-effort error frame, then the connection closes
 *  - envelope error: error response (recovered id or null), serving continues
 */
import { EventEmitter } from 'events';
import net, { AddressInfo } from 'net';
import { getRuntimeConfig, RuntimeConfig } from '../config/runtimeConfig';
import type { InboundCall, WireMessage } from '../models/jsonrpc';
import { ErrorCode, errorMessage, toRpcError } from '../services/errors';
import { isLevelEnabled, log } from '../services/logger';
import { NotificationQueue } from '../services/notificationQueue';
import { RequestScope } from '../services/requestScope';
import { buildError, buildResult, envelopeErrorToRpc, EnvelopeError, parseEnvelope, serialize } from './envelope';
import { createFrameDecoder, FrameReader, FrameWriter, FramingError, FramingOptions, isFramingError } from './framing';
import { createDefaultEngine, Engine } from './mcpMethods';
import type { DispatchContext, DispatchResult } from './registry';
import { Session } from './session';

export type ConnectionCloseReason = 'eof' | 'disconnect' | 'framing_error' | 'shutdown' | 'closed';

// Requests accepted ahead of the one running; past this the connection stops reading
const MAX_QUEUED_REQUESTS = 32;

const DISCONNECT_CODES = new Set(['EPIPE', 'ECONNRESET', 'ECONNABORTED', 'ERR_STREAM_PREMATURE_CLOSE', 'ERR_STREAM_DESTROYED', 'EOF']);

export function isDisconnectError(e: unknown): boolean {
  if(isFramingError(e)) return e.kind === 'EndOfStream';
  return typeof e === 'object' && e !== null && 'code' in e && typeof e.code === 'string' && DISCONNECT_CODES.has(e.code);
}

export function framingFromConfig(cfg: RuntimeConfig = getRuntimeConfig()): FramingOptions {
  return {
    mode: cfg.transport.framing,
    maxMessageBytes: cfg.transport.maxMessageBytes,
    blankLines: cfg.transport.blankLines,
  };
}

export interface ConnectionOptions {
  engine: Engine;
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  id?: string;
  framing?: FramingOptions;
  pollIntervalMs?: number;
}

export class Connection extends EventEmitter {
  readonly id: string;
  readonly session: Session;
  private readonly engine: Engine;
  private readonly reader: FrameReader;
  private readonly writer: FrameWriter;
  private readonly protocolLog: boolean;
  private queueTail: Promise<void> = Promise.resolve();
  private queued = 0;
  private roomWaiter: (() => void) | null = null;
  private readonly outOfBand = new Set<Promise<void>>();
  private stopReason: ConnectionCloseReason | null = null;
  private done: Promise<ConnectionCloseReason> | null = null;

  constructor(options: ConnectionOptions){
    super();
    const cfg = getRuntimeConfig();
    const framing = options.framing ?? framingFromConfig(cfg);
    this.id = options.id ?? 'default';
    this.engine = options.engine;
    this.protocolLog = cfg.logging.protocol;
    this.reader = new FrameReader(options.input, createFrameDecoder(framing));
    this.writer = new FrameWriter(options.output, framing);
    const notifications = new NotificationQueue({
      name: this.id,
      pollIntervalMs: options.pollIntervalMs ?? cfg.notifications.pollIntervalMs,
      deliver: message => this.writer.write(message),
    });
    this.session = new Session(this.id, notifications);
  }

  /** Begin serving. Idempotent. */
  start(): this {
    if(!this.done) this.done = this.run();
    return this;
  }

  /** Starts the connection if needed; resolves with why it ended. */
  whenClosed(): Promise<ConnectionCloseReason> {
    if(!this.done) this.done = this.run();
    return this.done;
  }

  /** Stop reading; queued work still finishes and its responses are still written. */
  close(reason: ConnectionCloseReason = 'closed'){
    this.stop(reason);
  }

  private stop(reason: ConnectionCloseReason){
    if(this.stopReason) return;
    this.stopReason = reason;
    this.reader.close();
  }

  private async run(): Promise<ConnectionCloseReason> {
    let reason: ConnectionCloseReason = 'disconnect';
    try {
      reason = await this.loop();
    } catch(e){
      log('error', 'connection_failed', { connectionId: this.id, data: { message: errorMessage(e), stack: e instanceof Error ? e.stack : undefined } });
      this.session.close();
    }
    log('info', 'connection_closed', { connectionId: this.id, data: { reason } });
    this.emit('close', reason);
    return reason;
  }

  private async loop(): Promise<ConnectionCloseReason> {
    this.engine.registry.seal();
    this.session.notifications.start();
    log('info', 'connection_open', { connectionId: this.id });
    let reason: ConnectionCloseReason = 'eof';
    for(;;){
      if(this.queued >= MAX_QUEUED_REQUESTS) await this.queueRoom();
      let frame: Buffer;
      try {
        frame = await this.reader.read();
      } catch(e){
        reason = await this.onReadFailure(e);
        break;
      }
      this.accept(frame);
    }
    await this.teardown(reason);
    return reason;
  }

  private async onReadFailure(e: unknown): Promise<ConnectionCloseReason> {
    if(this.stopReason) return this.stopReason;
    if(isDisconnectError(e)){
      return e instanceof FramingError ? 'eof' : 'disconnect';
    }
    if(e instanceof FramingError){
      log('warn', 'framing_error', { connectionId: this.id, data: { kind: e.kind, message: e.message } });
      await this.queueTail;
      await this.trySend(buildError(null, { code: ErrorCode.ParseError, message: 'Parse error', data: { kind: e.kind, detail: e.message } }));
      return 'framing_error';
    }
    log('error', 'read_failed', { connectionId: this.id, data: { message: errorMessage(e) } });
    return 'disconnect';
  }

  private async teardown(reason: ConnectionCloseReason){
    if(reason === 'disconnect' || reason === 'framing_error'){
      this.engine.tracker.cancelAll(this.id, 'connection closed');
    }
    await this.queueTail;
    await Promise.all([...this.outOfBand]);
    const notifications = this.session.notifications;
    if(reason !== 'disconnect') await notifications.whenIdle();
    // session before queue: notify() refuses once the session is closed
    this.session.close();
    await notifications.close();
    this.engine.tracker.cancelAll(this.id, 'connection closed');
  }

  private accept(frame: Buffer){
    if(this.protocolLog && isLevelEnabled('debug')){
      log('debug', 'recv', { connectionId: this.id, data: { bytes: frame.length } });
    }
    let call: InboundCall;
    try {
      const envelope = parseEnvelope(frame);
      if(envelope.kind === 'response'){
        log('debug', 'response_ignored', { connectionId: this.id, data: { id: envelope.id } });
        return;
      }
      call = envelope;
    } catch(e){
      let reply: WireMessage;
      if(e instanceof EnvelopeError){
        log('warn', 'envelope_error', { connectionId: this.id, data: { kind: e.kind, id: e.recoveredId } });
        reply = buildError(e.recoveredId, envelopeErrorToRpc(e));
      } else {
        log('error', 'envelope_failed', { connectionId: this.id, data: { message: errorMessage(e) } });
        reply = buildError(null, toRpcError(e));
      }
      this.enqueue(() => this.trySend(reply));
      return;
    }
    if(call.kind === 'notification' && call.method === 'notifications/cancelled'){
      const work = this.process(call);
      const tracked: Promise<void> = work.finally(() => { this.outOfBand.delete(tracked); });
      this.outOfBand.add(tracked);
      return;
    }
    this.enqueue(() => this.process(call));
  }

  /** Serial request queue; each step never rejects. */
  private enqueue(step: () => Promise<void>){
    this.queued++;
    this.queueTail = this.queueTail.then(step).finally(() => {
      this.queued--;
      if(this.queued < MAX_QUEUED_REQUESTS && this.roomWaiter){
        const wake = this.roomWaiter;
        this.roomWaiter = null;
        wake();
      }
    });
  }

  private queueRoom(): Promise<void> {
    return new Promise<void>(resolve => { this.roomWaiter = resolve; });
  }

  /** Requests accepted but not yet finished. */
  get queuedRequests(){ return this.queued; }

  private async process(call: InboundCall): Promise<void> {
    if(this.session.lifecycle.isTerminated){
      log('debug', 'dropped_after_shutdown', { connectionId: this.id, method: call.method });
      return;
    }
    const scope = new RequestScope();
    const ctx: DispatchContext = {
      method: call.method,
      params: call.params,
      id: call.kind === 'request' ? call.id : null,
      scope,
      session: this.session,
    };
    try {
      let result: DispatchResult;
      try {
        result = await this.engine.registry.dispatch(ctx);
      } catch(e){
        // before-hook rejections and handlers without an error hook end up here
        result = { kind: 'error', error: toRpcError(e) };
      }
      await this.respond(call, result);
    } catch(e){
      log('warn', 'response_write_failed', { connectionId: this.id, method: call.method, data: { message: errorMessage(e) } });
      if(isDisconnectError(e)) this.stop('disconnect');
    } finally {
      await scope.release();
    }
  }

  private async respond(call: InboundCall, result: DispatchResult){
    if(call.kind === 'notification'){
      if(result.kind === 'error'){
        log('debug', 'notification_failed', { connectionId: this.id, method: call.method, data: result.error });
      }
      if(result.kind === 'endStream') this.stop('shutdown');
      return;
    }
    switch(result.kind){
      case 'result':
        await this.send(buildResult(call.id, result.value));
        return;
      case 'error':
        await this.send(buildError(call.id, result.error));
        return;
      case 'none':
        await this.send(buildResult(call.id, null));
        return;
      case 'endStream':
        await this.send(buildResult(call.id, result.value ?? null));
        this.stop('shutdown');
        return;
    }
  }

  private async send(message: WireMessage){
    if(this.protocolLog && isLevelEnabled('debug')){
      const id = 'id' in message ? message.id : null;
      log('debug', 'send', { connectionId: this.id, data: { id, error: 'error' in message ? message.error.code : undefined } });
    }
    await this.writer.write(serialize(message));
  }

  private async trySend(message: WireMessage){
    try {
      await this.send(message);
    } catch(e){
      log('debug', 'send_failed', { connectionId: this.id, data: { message: errorMessage(e) } });
    }
  }
}

export interface TransportOptions {
  input?: NodeJS.ReadableStream;        // defaults to process.stdin
  output?: NodeJS.WritableStream;       // defaults to process.stdout
  engine?: Engine;                      // defaults to createDefaultEngine()
  framing?: FramingOptions;             // defaults to runtime config
  pollIntervalMs?: number;
}

/** Serve one session over a stdio pair. */
export function startStdioTransport(opts: TransportOptions = {}): Connection {
  const connection = new Connection({
    engine: opts.engine ?? createDefaultEngine(),
    input: opts.input ?? process.stdin,
    output: opts.output ?? process.stdout,
    id: 'stdio',
    framing: opts.framing,
    pollIntervalMs: opts.pollIntervalMs,
  });
  connection.start();
  return connection;
}

export interface TcpTransportOptions {
  host?: string;
  port?: number;
  engine?: Engine;
  framing?: FramingOptions;
  pollIntervalMs?: number;
}

export interface TcpServerHandle {
  server: net.Server;
  engine: Engine;
  connections: ReadonlySet<Connection>;
  address(): AddressInfo;
  close(): Promise<void>;
}

/** Listen for TCP clients; every accepted socket is an independent session. */
export async function startTcpTransport(opts: TcpTransportOptions = {}): Promise<TcpServerHandle> {
  const cfg = getRuntimeConfig();
  const engine = opts.engine ?? createDefaultEngine();
  const host = opts.host ?? cfg.transport.host;
  const port = opts.port ?? cfg.transport.port;
  const connections = new Set<Connection>();
  let seq = 0;

  const server = net.createServer(socket => {
    const connection = new Connection({
      engine,
      input: socket,
      output: socket,
      id: `tcp-${++seq}`,
      framing: opts.framing,
      pollIntervalMs: opts.pollIntervalMs,
    });
    connections.add(connection);
    socket.on('error', err => log('debug', 'socket_error', { connectionId: connection.id, data: { message: err.message } }));
    connection.on('close', () => {
      connections.delete(connection);
      socket.end();
    });
    log('debug', 'tcp_accept', { connectionId: connection.id, data: { remote: `${socket.remoteAddress}:${socket.remotePort}` } });
    connection.start();
  });

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      resolve();
    });
  });

  const address = (): AddressInfo => {
    const addr = server.address();
    if(addr === null || typeof addr === 'string') throw new Error('TCP server is not listening on an IP address');
    return addr;
  };
  log('info', 'tcp_listening', { data: { host: address().address, port: address().port } });

  return {
    server,
    engine,
    connections,
    address,
    close: async () => {
      const closing = new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
      const pending = [...connections].map(c => { c.close('closed'); return c.whenClosed(); });
      await Promise.all(pending);
      await closing;
    },
  };
}
