// Zod schemas for the params of every routed MCP method. The parsed values keep the
// JsonValue typing of the wire so they can flow back out without conversion.
import { z } from 'zod';
import type { JsonValue } from '../models/jsonrpc';

const zLiteral = z.union([z.string(), z.number(), z.boolean(), z.null()]);
export const zJsonValue: z.ZodType<JsonValue> = z.lazy(() => z.union([zLiteral, z.array(zJsonValue), z.record(zJsonValue)]));
export const zJsonObject = z.record(zJsonValue);

export const zRequestId = z.union([z.string(), z.number().int()]);
export const zProgressToken = z.union([z.string(), z.number().int()]);

export const zInitializeParams = z.object({
  protocolVersion: z.string().min(1).optional(),
  capabilities: zJsonObject.optional(),
  clientInfo: z.object({ name: z.string(), version: z.string().optional() }).passthrough().optional(),
}).passthrough();

export const zCancelledParams = z.object({
  requestId: zRequestId,
  reason: z.string().optional(),
}).passthrough();

export const zRequestMeta = z.object({
  progressToken: zProgressToken.optional(),
}).passthrough();

export const zToolCallParams = z.object({
  name: z.string().min(1),
  arguments: zJsonObject.optional(),
  _meta: zRequestMeta.optional(),
}).passthrough();

export const zUriParams = z.object({
  uri: z.string().min(1),
}).passthrough();

export const zPromptGetParams = z.object({
  name: z.string().min(1),
  arguments: z.record(z.string()).optional(),
}).passthrough();

export const zEmptyParams = z.object({
  cursor: z.string().optional(),
}).passthrough();
