/**
 * Message framing over ordered byte streams.
 *
 * Two schemes are supported:
 *  - content-length: `Content-Length: <n>\r\n\r\n<n bytes>` (LSP style headers)
 *  - newline (delimiter): one message per line, trailing `\r` stripped
 *
 * Decoders are incremental: bytes are appended as they arrive and complete frames are
 * pulled with next(). FrameReader adapts a decoder to a Node readable stream and turns
 * a clean close into an EndOfStream failure so connection loops can terminate.
 */
import type { FramingMode, BlankLineMode } from '../config/runtimeConfig';
import { DEFAULT_MAX_MESSAGE_BYTES } from '../config/runtimeConfig';

export type FramingErrorKind =
  | 'EndOfStream'
  | 'MissingContentLength'
  | 'InvalidContentLength'
  | 'MessageTooLarge'
  | 'InvalidHeader';

export class FramingError extends Error {
  readonly kind: FramingErrorKind;
  constructor(kind: FramingErrorKind, message?: string){
    super(message ?? kind);
    this.name = 'FramingError';
    this.kind = kind;
  }
}

export function isFramingError(e: unknown, kind?: FramingErrorKind): e is FramingError {
  return e instanceof FramingError && (kind === undefined || e.kind === kind);
}

export interface FramingOptions {
  mode: FramingMode;
  maxMessageBytes?: number;
  /** Delimiter byte for newline framing (default `\n`). */
  delimiter?: number;
  /** What a blank delimited line means; `end` (default) surfaces EndOfStream. */
  blankLines?: BlankLineMode;
}

export interface FrameDecoder {
  append(chunk: Buffer): void;
  /** Next complete frame, or null when more bytes are needed. Throws FramingError. */
  next(): Buffer | null;
  /** Called once the source closed; returns a trailing frame or throws when bytes are left dangling. */
  finish(): Buffer | null;
  readonly bufferedBytes: number;
}

const LF = 0x0a;
const CR = 0x0d;
const MAX_HEADER_LINE = 1024;

/** Chunk list with cross-chunk search so large bodies are copied once. */
class ByteQueue {
  private chunks: Buffer[] = [];
  private head = 0;
  length = 0;

  push(chunk: Buffer){
    if(!chunk.length) return;
    this.chunks.push(chunk);
    this.length += chunk.length;
  }

  /** Absolute offset of `byte` at or after `from`, or -1. */
  indexOf(byte: number, from = 0): number {
    let base = 0;
    for(let i = 0; i < this.chunks.length; i++){
      const chunk = this.chunks[i];
      const start = i === 0 ? this.head : 0;
      const size = chunk.length - start;
      if(from < base + size){
        const localFrom = start + Math.max(0, from - base);
        const idx = chunk.indexOf(byte, localFrom);
        if(idx !== -1) return base + (idx - start);
      }
      base += size;
    }
    return -1;
  }

  take(n: number): Buffer {
    const out = Buffer.allocUnsafe(n);
    let written = 0;
    while(written < n){
      const chunk = this.chunks[0];
      const avail = chunk.length - this.head;
      const need = n - written;
      if(avail <= need){
        chunk.copy(out, written, this.head);
        written += avail;
        this.chunks.shift();
        this.head = 0;
      } else {
        chunk.copy(out, written, this.head, this.head + need);
        this.head += need;
        written += need;
      }
    }
    this.length -= n;
    return out;
  }

  takeAll(): Buffer {
    return this.take(this.length);
  }
}

function stripCarriageReturn(line: Buffer): Buffer {
  return line.length && line[line.length - 1] === CR ? line.subarray(0, line.length - 1) : line;
}

export class ContentLengthDecoder implements FrameDecoder {
  private readonly queue = new ByteQueue();
  private contentLength: number | undefined;
  private inBody = false;
  private sawHeader = false;

  constructor(private readonly maxMessageBytes = DEFAULT_MAX_MESSAGE_BYTES){}

  get bufferedBytes(){ return this.queue.length; }

  append(chunk: Buffer){ this.queue.push(chunk); }

  next(): Buffer | null {
    while(!this.inBody){
      const nl = this.queue.indexOf(LF);
      if(nl === -1){
        if(this.queue.length > MAX_HEADER_LINE) throw new FramingError('InvalidHeader', 'Header line exceeds 1024 bytes');
        return null;
      }
      if(nl > MAX_HEADER_LINE) throw new FramingError('InvalidHeader', 'Header line exceeds 1024 bytes');
      const line = stripCarriageReturn(this.queue.take(nl + 1).subarray(0, nl)).toString('ascii');
      if(line.length === 0){
        if(this.contentLength === undefined){
          throw new FramingError('MissingContentLength', 'Missing Content-Length header');
        }
        this.inBody = true;
        break;
      }
      this.sawHeader = true;
      this.acceptHeader(line);
    }
    const length = this.contentLength ?? 0;
    if(this.queue.length < length) return null;
    const body = this.queue.take(length);
    this.contentLength = undefined;
    this.inBody = false;
    this.sawHeader = false;
    return body;
  }

  finish(): Buffer | null {
    if(this.inBody || this.sawHeader || this.queue.length > 0){
      throw new FramingError('EndOfStream', 'Stream closed mid-frame');
    }
    return null;
  }

  private acceptHeader(line: string){
    const colon = line.indexOf(':');
    if(colon === -1) throw new FramingError('InvalidHeader', `Malformed header line: ${line.slice(0, 80)}`);
    const name = line.slice(0, colon).trim().toLowerCase();
    if(name !== 'content-length') return; // Content-Type and friends are ignored
    const raw = line.slice(colon + 1).trim();
    if(!/^\d+$/.test(raw)) throw new FramingError('InvalidContentLength', `Invalid Content-Length: ${raw.slice(0, 40)}`);
    const value = Number(raw);
    if(value > this.maxMessageBytes){
      throw new FramingError('MessageTooLarge', `Message of ${raw} bytes exceeds limit of ${this.maxMessageBytes}`);
    }
    this.contentLength = value;
  }
}

export class DelimiterDecoder implements FrameDecoder {
  private readonly queue = new ByteQueue();
  private scanned = 0;

  constructor(
    private readonly maxMessageBytes = DEFAULT_MAX_MESSAGE_BYTES,
    private readonly delimiter = LF,
    private readonly blankLines: BlankLineMode = 'end'
  ){}

  get bufferedBytes(){ return this.queue.length; }

  append(chunk: Buffer){ this.queue.push(chunk); }

  next(): Buffer | null {
    for(;;){
      const idx = this.queue.indexOf(this.delimiter, this.scanned);
      if(idx === -1){
        this.scanned = this.queue.length;
        if(this.queue.length > this.maxMessageBytes){
          throw new FramingError('MessageTooLarge', `Line exceeds limit of ${this.maxMessageBytes} bytes`);
        }
        return null;
      }
      this.scanned = 0;
      const line = stripCarriageReturn(this.queue.take(idx + 1).subarray(0, idx));
      if(line.length > this.maxMessageBytes){
        throw new FramingError('MessageTooLarge', `Line exceeds limit of ${this.maxMessageBytes} bytes`);
      }
      if(line.toString('utf8').trim().length === 0){
        if(this.blankLines === 'skip') continue;
        throw new FramingError('EndOfStream', 'Blank line');
      }
      return line;
    }
  }

  finish(): Buffer | null {
    if(!this.queue.length) return null;
    this.scanned = 0;
    const rest = stripCarriageReturn(this.queue.takeAll());
    return rest.toString('utf8').trim().length ? rest : null;
  }
}

export function createFrameDecoder(options: FramingOptions): FrameDecoder {
  const max = options.maxMessageBytes ?? DEFAULT_MAX_MESSAGE_BYTES;
  if(options.mode === 'content-length') return new ContentLengthDecoder(max);
  return new DelimiterDecoder(max, options.delimiter ?? LF, options.blankLines ?? 'end');
}

export function encodeFrame(options: Pick<FramingOptions, 'mode' | 'delimiter'>, body: string | Buffer): Buffer {
  const payload = typeof body === 'string' ? Buffer.from(body, 'utf8') : body;
  if(options.mode === 'content-length'){
    return Buffer.concat([Buffer.from(`Content-Length: ${payload.length}\r\n\r\n`, 'ascii'), payload]);
  }
  return Buffer.concat([payload, Buffer.from([options.delimiter ?? LF])]);
}

// Buffered frames before the source is paused
const READ_HIGH_WATER = 64;

interface PendingRead {
  resolve: (frame: Buffer) => void;
  reject: (err: Error) => void;
}

/**
 * Pulls frames from a readable stream. read() resolves with the next frame, rejects with
 * FramingError('EndOfStream') once the stream closed and every buffered frame was
 * consumed, or with the decoder/stream error that stopped it.
 */
export class FrameReader {
  private readonly frames: Buffer[] = [];
  private failure: Error | null = null;
  private waiter: PendingRead | null = null;
  private paused = false;
  private done = false;

  private readonly onData = (chunk: Buffer | string) => {
    this.decoder.append(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk);
    this.pump();
  };
  private readonly onEnd = () => {
    if(this.done) return;
    this.done = true;
    try {
      const trailing = this.decoder.finish();
      if(trailing) this.frames.push(trailing);
      this.fail(new FramingError('EndOfStream', 'Stream closed'));
    } catch(e){
      this.fail(e instanceof Error ? e : new FramingError('EndOfStream', String(e)));
    }
  };
  private readonly onError = (err: Error) => {
    this.done = true;
    this.fail(err);
  };

  constructor(private readonly input: NodeJS.ReadableStream, private readonly decoder: FrameDecoder){
    input.on('data', this.onData);
    input.on('end', this.onEnd);
    input.on('close', this.onEnd);
    input.on('error', this.onError);
  }

  read(): Promise<Buffer> {
    const frame = this.frames.shift();
    if(frame){
      if(this.paused && this.frames.length < READ_HIGH_WATER / 2 && !this.failure){
        this.paused = false;
        this.input.resume();
      }
      return Promise.resolve(frame);
    }
    if(this.failure) return Promise.reject(this.failure);
    if(this.waiter) return Promise.reject(new Error('FrameReader.read() already pending'));
    return new Promise<Buffer>((resolve, reject) => { this.waiter = { resolve, reject }; });
  }

  /** Detach from the stream; a pending read() rejects with EndOfStream. */
  close(){
    this.input.removeListener('data', this.onData);
    this.input.removeListener('end', this.onEnd);
    this.input.removeListener('close', this.onEnd);
    this.input.removeListener('error', this.onError);
    this.done = true;
    this.frames.length = 0;
    this.fail(new FramingError('EndOfStream', 'Reader closed'));
  }

  private pump(){
    if(this.failure) return;
    try {
      for(let frame = this.decoder.next(); frame; frame = this.decoder.next()){
        this.deliver(frame);
      }
    } catch(e){
      this.input.removeListener('data', this.onData);
      this.fail(e instanceof Error ? e : new FramingError('InvalidHeader', String(e)));
      return;
    }
    if(this.frames.length >= READ_HIGH_WATER && !this.paused){
      this.paused = true;
      this.input.pause();
    }
  }

  private deliver(frame: Buffer){
    const waiter = this.waiter;
    if(waiter){
      this.waiter = null;
      waiter.resolve(frame);
      return;
    }
    this.frames.push(frame);
  }

  private fail(err: Error){
    if(!this.failure) this.failure = err;
    const waiter = this.waiter;
    if(waiter && this.frames.length === 0){
      this.waiter = null;
      waiter.reject(this.failure);
    }
  }
}

/** Writes whole frames; Node keeps write order so frames from concurrent producers never interleave. */
export class FrameWriter {
  constructor(private readonly output: NodeJS.WritableStream, private readonly options: Pick<FramingOptions, 'mode' | 'delimiter'>){}

  write(body: string | Buffer): Promise<void> {
    const frame = encodeFrame(this.options, body);
    return new Promise<void>((resolve, reject) => {
      this.output.write(frame, err => {
        if(err) reject(err); else resolve();
      });
    });
  }
}
