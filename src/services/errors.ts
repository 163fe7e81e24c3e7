// Protocol error codes and the semantic error helper handlers use to surface them.
// Handlers throw a plain-object shape (instead of an Error subclass) carrying a
// __semantic marker; the dispatcher error hook passes it to the wire unchanged.
import type { JsonValue, RpcErrorObject } from '../models/jsonrpc';

export const ErrorCode = {
  ParseError: -32700,
  InvalidRequest: -32600,
  MethodNotFound: -32601,
  InvalidParams: -32602,
  InternalError: -32603,
  ServerError: -32000,
  ServerNotInitialized: -32099,
  UnknownProtocolVersion: -32098,
  UnknownTool: -32097,
  RequestCancelled: -32800,
} as const;

export interface SemanticRpcErrorShape<TData extends JsonValue | undefined = JsonValue | undefined> {
  code: number;
  message: string;
  data: TData;
  __semantic: true;
}

export function semanticError<TData extends JsonValue | undefined = undefined>(code: number, message: string, data?: TData): never {
  const err: SemanticRpcErrorShape<TData | undefined> = { code, message, data, __semantic: true };
  // eslint-disable-next-line no-throw-literal
  throw err;
}

export function isSemanticError(e: unknown): e is SemanticRpcErrorShape {
  if(!e || typeof e !== 'object') return false;
  return '__semantic' in e && e.__semantic === true
    && 'code' in e && Number.isSafeInteger(e.code)
    && 'message' in e && typeof e.message === 'string';
}

export function errorMessage(e: unknown): string {
  if(e instanceof Error) return e.message;
  if(isSemanticError(e)) return e.message;
  return String(e);
}

/**
 * Collapse anything a handler threw into a wire error object. Semantic errors keep
 * their code, message and data; everything else becomes -32603 with the message only
 * (stack traces never reach the client).
 */
export function toRpcError(e: unknown): RpcErrorObject {
  if(isSemanticError(e)){
    const out: RpcErrorObject = { code: e.code, message: e.message };
    if(e.data !== undefined) out.data = e.data;
    return out;
  }
  return { code: ErrorCode.InternalError, message: 'Internal error', data: { message: errorMessage(e) } };
}
