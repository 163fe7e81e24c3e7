// JSON-RPC 2.0 wire types. Dynamic JSON lives in JsonValue at the codec boundary;
// everything past envelope.ts works with these typed shapes.

export const JSONRPC_VERSION = '2.0';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject { [key: string]: JsonValue }

/** Integers and strings only; null / absence marks a notification. */
export type RequestId = string | number;

export interface RpcErrorObject {
  code: number;
  message: string;
  data?: JsonValue;
}

export interface RpcRequest {
  kind: 'request';
  id: RequestId;
  method: string;
  params?: JsonValue;
}

export interface RpcNotification {
  kind: 'notification';
  method: string;
  params?: JsonValue;
}

export interface RpcResponse {
  kind: 'response';
  id: RequestId | null;
  result?: JsonValue;
  error?: RpcErrorObject;
}

export type Envelope = RpcRequest | RpcNotification | RpcResponse;
export type InboundCall = RpcRequest | RpcNotification;

// Serialized shapes
export interface WireSuccess {
  jsonrpc: '2.0';
  id: RequestId | null;
  result: JsonValue;
}

export interface WireError {
  jsonrpc: '2.0';
  id: RequestId | null;
  error: RpcErrorObject;
}

export interface WireNotification {
  jsonrpc: '2.0';
  method: string;
  params?: JsonValue;
}

export type WireMessage = WireSuccess | WireError | WireNotification;

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Structural check for values that did not come out of JSON.parse. Iterative so deep nesting cannot overflow the stack. */
export function isJsonValue(value: unknown): value is JsonValue {
  const stack: unknown[] = [value];
  while(stack.length){
    const v = stack.pop();
    if(v === null || typeof v === 'string' || typeof v === 'boolean') continue;
    if(typeof v === 'number'){
      if(!Number.isFinite(v)) return false;
      continue;
    }
    if(Array.isArray(v)){
      for(const item of v) stack.push(item);
      continue;
    }
    if(typeof v === 'object'){
      if(Object.getPrototypeOf(v) !== Object.prototype && Object.getPrototypeOf(v) !== null) return false;
      for(const item of Object.values(v)) stack.push(item);
      continue;
    }
    return false;
  }
  return true;
}
