/**
 * JSON-RPC 2.0 envelope codec.
 *
 * parseEnvelope() turns one framed message into a typed Request / Notification /
 * Response, throwing EnvelopeError with the most specific kind it can and the id it
 * managed to recover (so the caller can still answer with a correlated error).
 * The build* helpers produce wire objects; ids are copied verbatim and never invented.
 */
import {
  Envelope,
  JSONRPC_VERSION,
  JsonObject,
  JsonValue,
  RequestId,
  RpcErrorObject,
  WireError,
  WireMessage,
  WireNotification,
  WireSuccess,
  isJsonObject,
  isJsonValue,
} from '../models/jsonrpc';
import { ErrorCode } from '../services/errors';

export type EnvelopeErrorKind =
  | 'ParseError'
  | 'InvalidRequest'
  | 'MissingVersion'
  | 'InvalidVersion'
  | 'MissingMethod'
  | 'EmptyMethod'
  | 'InvalidMessage';

const KIND_MESSAGES: Record<EnvelopeErrorKind, string> = {
  ParseError: 'Parse error',
  InvalidRequest: 'Invalid Request',
  MissingVersion: 'Invalid Request: missing jsonrpc version',
  InvalidVersion: 'Invalid Request: jsonrpc must be "2.0"',
  MissingMethod: 'Invalid Request: missing method',
  EmptyMethod: 'Method cannot be empty',
  InvalidMessage: 'Invalid Request: id must be a string, an integer or null',
};

export class EnvelopeError extends Error {
  readonly kind: EnvelopeErrorKind;
  /** Id recovered from the message before validation failed; null when none. */
  readonly recoveredId: RequestId | null;
  readonly detail?: string;
  constructor(kind: EnvelopeErrorKind, recoveredId: RequestId | null = null, detail?: string){
    super(KIND_MESSAGES[kind]);
    this.name = 'EnvelopeError';
    this.kind = kind;
    this.recoveredId = recoveredId;
    this.detail = detail;
  }
}

type IdProbe = { ok: true; id: RequestId | null } | { ok: false };

function probeId(raw: JsonValue | undefined): IdProbe {
  if(raw === undefined || raw === null) return { ok: true, id: null };
  if(typeof raw === 'string') return { ok: true, id: raw };
  if(typeof raw === 'number' && Number.isSafeInteger(raw)) return { ok: true, id: raw };
  return { ok: false };
}

function parseErrorObject(raw: JsonValue | undefined): RpcErrorObject | null {
  if(!isJsonObject(raw)) return null;
  const { code, message, data } = raw;
  if(typeof code !== 'number' || !Number.isInteger(code) || typeof message !== 'string') return null;
  const out: RpcErrorObject = { code, message };
  if(data !== undefined) out.data = data;
  return out;
}

export function parseEnvelope(bytes: Buffer | string): Envelope {
  const text = typeof bytes === 'string' ? bytes : bytes.toString('utf8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch(e){
    throw new EnvelopeError('ParseError', null, e instanceof Error ? e.message : String(e));
  }
  if(!isJsonValue(parsed)) throw new EnvelopeError('ParseError');
  if(!isJsonObject(parsed)){
    throw new EnvelopeError('InvalidRequest', null, Array.isArray(parsed) ? 'Batch messages are not supported' : 'Message must be an object');
  }
  const obj: JsonObject = parsed;
  const idProbe = probeId(obj.id);
  const recovered = idProbe.ok ? idProbe.id : null;

  if(!('jsonrpc' in obj)) throw new EnvelopeError('MissingVersion', recovered);
  if(obj.jsonrpc !== JSONRPC_VERSION) throw new EnvelopeError('InvalidVersion', recovered);
  if(!idProbe.ok) throw new EnvelopeError('InvalidMessage', null);

  const method = obj.method;
  if(method === undefined){
    if('result' in obj || 'error' in obj){
      if('error' in obj){
        const error = parseErrorObject(obj.error);
        if(!error) throw new EnvelopeError('InvalidMessage', recovered, 'Malformed error object');
        return { kind: 'response', id: idProbe.id, error };
      }
      return { kind: 'response', id: idProbe.id, result: obj.result };
    }
    throw new EnvelopeError('MissingMethod', recovered);
  }
  if(typeof method !== 'string') throw new EnvelopeError('InvalidRequest', recovered, 'Method must be a string');
  if(method.length === 0) throw new EnvelopeError('EmptyMethod', recovered);

  const params = obj.params;
  if(idProbe.id === null){
    return params === undefined ? { kind: 'notification', method } : { kind: 'notification', method, params };
  }
  return params === undefined
    ? { kind: 'request', id: idProbe.id, method }
    : { kind: 'request', id: idProbe.id, method, params };
}

export function envelopeErrorToRpc(err: EnvelopeError): RpcErrorObject {
  const code = err.kind === 'ParseError' ? ErrorCode.ParseError : ErrorCode.InvalidRequest;
  const data: JsonObject = { kind: err.kind };
  if(err.detail) data.detail = err.detail;
  return { code, message: err.message, data };
}

export function buildResult(id: RequestId | null | undefined, result: JsonValue): WireSuccess {
  return { jsonrpc: JSONRPC_VERSION, id: id ?? null, result };
}

export function buildError(id: RequestId | null | undefined, error: RpcErrorObject): WireError {
  const err: RpcErrorObject = { code: error.code, message: error.message };
  if(error.data !== undefined) err.data = error.data;
  return { jsonrpc: JSONRPC_VERSION, id: id ?? null, error: err };
}

export function buildNotification(method: string, params?: JsonValue): WireNotification {
  return params === undefined ? { jsonrpc: JSONRPC_VERSION, method } : { jsonrpc: JSONRPC_VERSION, method, params };
}

export function serialize(message: WireMessage): string {
  return JSON.stringify(message);
}
