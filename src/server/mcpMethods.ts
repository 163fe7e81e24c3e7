/**
 * MCP method surface: builds a MethodRegistry whose handlers delegate to the tool,
 * resource and prompt registries, with the lifecycle gate as before-hook and the
 * handler-error mapping as error-hook.
 */
import { getRuntimeConfig } from '../config/runtimeConfig';
import { isJsonObject, JsonObject, JsonValue } from '../models/jsonrpc';
import type { HandlerContext, InitializeResult, ToolCallResult, ToolContent } from '../models/mcp';
import {
  zCancelledParams,
  zEmptyParams,
  zInitializeParams,
  zPromptGetParams,
  zToolCallParams,
  zUriParams,
} from '../schemas';
import { CancellationTracker } from '../services/cancellation';
import { ErrorCode, errorMessage, isSemanticError, toRpcError } from '../services/errors';
import { log } from '../services/logger';
import { ProgressTracker } from '../services/progress';
import { PromptRegistry } from '../services/promptRegistry';
import { ResourceRegistry } from '../services/resourceRegistry';
import { ToolRegistry } from '../services/toolRegistry';
import { registerBuiltinPrompts } from '../services/handlers.prompts';
import { registerBuiltinResources } from '../services/handlers.resources';
import { registerBuiltinTools } from '../services/handlers.tools';
import { getValidationMetrics, issuesToJson, parseParams } from '../services/validationService';
import { DispatchContext, DispatchResult, MethodRegistry } from './registry';

export interface ServerInfo {
  name: string;
  version: string;
}

export interface EngineOptions {
  tools?: ToolRegistry;
  resources?: ResourceRegistry;
  prompts?: PromptRegistry;
  tracker?: CancellationTracker;
  protocolVersion?: string;
  serverInfo?: ServerInfo;
}

export interface Engine {
  registry: MethodRegistry;
  tools: ToolRegistry;
  resources: ResourceRegistry;
  prompts: PromptRegistry;
  tracker: CancellationTracker;
  protocolVersion: string;
  serverInfo: ServerInfo;
}

function toToolContent(v: unknown): ToolContent | null {
  if(typeof v !== 'object' || v === null) return null;
  const type = 'type' in v ? v.type : undefined;
  const text = 'text' in v ? v.text : undefined;
  const data = 'data' in v ? v.data : undefined;
  const mimeType = 'mimeType' in v ? v.mimeType : undefined;
  if(type === 'text') return typeof text === 'string' ? { type, text } : null;
  if((type === 'image' || type === 'audio') && typeof data === 'string' && typeof mimeType === 'string') return { type, data, mimeType };
  return null;
}

/** The content list of a ready-made tool result, or null when `v` is not one. */
function toolResultContent(v: JsonValue | ToolCallResult): ToolContent[] | null {
  if(typeof v !== 'object' || v === null || Array.isArray(v) || !('content' in v)) return null;
  const content = v.content;
  if(!Array.isArray(content)) return null;
  const items: unknown[] = content;
  const out: ToolContent[] = [];
  for(const item of items){
    const c = toToolContent(item);
    if(!c) return null;
    out.push(c);
  }
  return out;
}

function contentToJson(c: ToolContent): JsonObject {
  return c.type === 'text' ? { type: 'text', text: c.text } : { type: c.type, data: c.data, mimeType: c.mimeType };
}

function toText(v: JsonValue): string {
  if(typeof v === 'string') return v;
  if(isJsonObject(v) && typeof v.text === 'string') return v.text;
  return JSON.stringify(v) ?? '';
}

/**
 * tools/call result shape. A ToolCallResult (text, image or audio items) passes through; a string becomes the text;
 * an object with a string `text` field contributes that field; anything else is JSON.
 */
export function wrapToolResult(out: JsonValue | ToolCallResult): JsonObject {
  const content = toolResultContent(out);
  if(content){
    const result: JsonObject = { content: content.map(contentToJson) };
    const isError = typeof out === 'object' && out !== null && 'isError' in out ? out.isError : undefined;
    if(typeof isError === 'boolean') result.isError = isError;
    return result;
  }
  return { content: [{ type: 'text', text: toText(out) }] };
}

function handlerContext(ctx: DispatchContext, extra: Partial<HandlerContext> = {}): HandlerContext {
  return { scope: ctx.scope, session: ctx.session, ...extra };
}

function onHandlerError(ctx: DispatchContext, err: unknown): DispatchResult {
  const error = toRpcError(err);
  if(isSemanticError(err)){
    log('debug', 'handler_rejected', { method: ctx.method, correlationId: ctx.scope.correlationId, data: { code: error.code, message: error.message } });
  } else {
    log('error', 'handler_error', {
      method: ctx.method,
      correlationId: ctx.scope.correlationId,
      connectionId: ctx.session.id,
      data: { message: errorMessage(err), stack: err instanceof Error ? err.stack : undefined },
    });
  }
  return { kind: 'error', error };
}

function onDispatched(ctx: DispatchContext, result: DispatchResult){
  log('debug', 'dispatch_end', {
    method: ctx.method,
    correlationId: ctx.scope.correlationId,
    connectionId: ctx.session.id,
    ms: ctx.scope.elapsedMs(),
    data: { kind: result.kind, code: result.kind === 'error' ? result.error.code : undefined },
  });
}

export function registerMcpMethods(engine: Engine): MethodRegistry {
  const { registry, tools, resources, prompts, tracker } = engine;

  registry.add('initialize', (ctx, params) => {
    const p = parseParams(zInitializeParams, params, 'initialize');
    const { lifecycle } = ctx.session;
    lifecycle.beginInitialize();
    if(p.protocolVersion !== undefined && p.protocolVersion !== engine.protocolVersion){
      lifecycle.failInitialize(`client requested ${p.protocolVersion}`);
      log('warn', 'protocol_version_mismatch', { connectionId: ctx.session.id, data: { requested: p.protocolVersion, supported: engine.protocolVersion } });
      return DispatchResult.fail(ErrorCode.UnknownProtocolVersion, 'Unsupported protocol version', {
        requested: p.protocolVersion,
        supported: engine.protocolVersion,
      });
    }
    if(p.clientInfo) ctx.session.clientInfo = { name: p.clientInfo.name, version: p.clientInfo.version };
    ctx.session.clientCapabilities = p.capabilities ?? {};
    ctx.session.protocolVersion = engine.protocolVersion;
    lifecycle.completeInitialize();
    log('info', 'session_initialized', { connectionId: ctx.session.id, data: { client: ctx.session.clientInfo?.name ?? null } });
    const result: InitializeResult = {
      protocolVersion: engine.protocolVersion,
      capabilities: {
        tools: { listChanged: false },
        resources: { subscribe: true, listChanged: false },
        prompts: { listChanged: false },
      },
      serverInfo: { name: engine.serverInfo.name, version: engine.serverInfo.version },
    };
    return DispatchResult.ok(result);
  });

  registry.add('notifications/initialized', ctx => {
    log('debug', 'client_initialized', { connectionId: ctx.session.id, data: { state: ctx.session.lifecycle.state } });
    return DispatchResult.none();
  });

  registry.add('ping', () => DispatchResult.ok({}));

  registry.add('shutdown', ctx => {
    ctx.session.lifecycle.shutdown();
    log('info', 'session_shutdown', { connectionId: ctx.session.id });
    return DispatchResult.endStream(null);
  });

  registry.add('notifications/cancelled', (ctx, params) => {
    const p = parseParams(zCancelledParams, params, 'notifications/cancelled');
    const found = tracker.cancel(p.requestId, p.reason, ctx.session.id);
    log('debug', 'cancel_outcome', { connectionId: ctx.session.id, data: { requestId: p.requestId, found } });
    return DispatchResult.none();
  });

  registry.add('tools/list', (_ctx, params) => {
    parseParams(zEmptyParams, params, 'tools/list');
    return DispatchResult.ok({ tools: tools.list() });
  });

  registry.add('tools/call', async (ctx, params) => {
    const p = parseParams(zToolCallParams, params, 'tools/call');
    const tool = tools.get(p.name);
    if(!tool) return DispatchResult.fail(ErrorCode.UnknownTool, `Unknown tool: ${p.name}`, { name: p.name });
    const args: JsonObject = p.arguments ?? {};
    const validation = tools.validateArguments(p.name, args);
    if(!validation.ok){
      return DispatchResult.fail(ErrorCode.InvalidParams, 'Invalid arguments', { tool: p.name, errors: issuesToJson(validation.errors) });
    }
    const progressToken = p._meta?.progressToken;
    const progress = progressToken === undefined ? undefined : new ProgressTracker(progressToken, { notifier: ctx.session.notifications });
    const hctx = handlerContext(ctx, { progress, cancellation: tool.cancellable ? ctx.cancellation : undefined });
    try {
      return DispatchResult.ok(wrapToolResult(await tool.handler(args, hctx)));
    } catch(e){
      if(isSemanticError(e)) throw e;
      log('error', 'tool_error', { method: 'tools/call', correlationId: ctx.scope.correlationId, data: { tool: p.name, message: errorMessage(e) } });
      return DispatchResult.fail(ErrorCode.InternalError, `Tool execution failed: ${errorMessage(e)}`, { tool: p.name });
    }
  }, { cancellable: true });

  registry.add('resources/list', (_ctx, params) => {
    parseParams(zEmptyParams, params, 'resources/list');
    return DispatchResult.ok({ resources: resources.list() });
  });

  registry.add('resources/templates/list', (_ctx, params) => {
    parseParams(zEmptyParams, params, 'resources/templates/list');
    return DispatchResult.ok({ resourceTemplates: resources.listTemplates() });
  });

  registry.add('resources/read', async (ctx, params) => {
    const { uri } = parseParams(zUriParams, params, 'resources/read');
    return DispatchResult.ok({ contents: await resources.read(uri, handlerContext(ctx)) });
  });

  registry.add('resources/subscribe', (ctx, params) => {
    const { uri } = parseParams(zUriParams, params, 'resources/subscribe');
    resources.subscribe(uri, ctx.session);
    return DispatchResult.ok({});
  });

  registry.add('resources/unsubscribe', (ctx, params) => {
    const { uri } = parseParams(zUriParams, params, 'resources/unsubscribe');
    resources.unsubscribe(uri, ctx.session);
    return DispatchResult.ok({});
  });

  registry.add('prompts/list', (_ctx, params) => {
    parseParams(zEmptyParams, params, 'prompts/list');
    return DispatchResult.ok({ prompts: prompts.list() });
  });

  registry.add('prompts/get', async (ctx, params) => {
    const p = parseParams(zPromptGetParams, params, 'prompts/get');
    return DispatchResult.ok(await prompts.get(p.name, p.arguments ?? {}, handlerContext(ctx)));
  });

  // Dispatcher and validation counters; a method's own call is counted after it returns
  registry.add('metrics/snapshot', (_ctx, params) => {
    parseParams(zEmptyParams, params, 'metrics/snapshot');
    const methods = Object.entries(registry.getMetricsRaw())
      .map(([method, rec]) => ({
        method,
        count: rec.count,
        errors: rec.errors,
        avgMs: rec.count ? +(rec.totalMs / rec.count).toFixed(2) : 0,
        maxMs: +rec.maxMs.toFixed(2),
      }))
      .sort((a, b) => a.method.localeCompare(b.method));
    return DispatchResult.ok({
      generatedAt: new Date().toISOString(),
      methods,
      validation: getValidationMetrics(),
      inflightRequests: tracker.size,
    });
  });

  return registry;
}

/**
 * Assemble an engine: registries (empty unless supplied), a shared cancellation
 * tracker and the MCP method table. The registry is left unsealed so embedders can
 * add methods; the transport seals it when serving starts.
 */
export function createEngine(options: EngineOptions = {}): Engine {
  const { protocol } = getRuntimeConfig();
  const tracker = options.tracker ?? new CancellationTracker();
  const registry: MethodRegistry = new MethodRegistry({
    tracker,
    // unregistered names fall through to MethodNotFound in every phase
    before: ctx => { if(registry.has(ctx.method)) ctx.session.lifecycle.assertMethodAllowed(ctx.method); },
    error: onHandlerError,
    after: onDispatched,
  });
  const engine: Engine = {
    registry,
    tools: options.tools ?? new ToolRegistry(),
    resources: options.resources ?? new ResourceRegistry(),
    prompts: options.prompts ?? new PromptRegistry(),
    tracker,
    protocolVersion: options.protocolVersion ?? protocol.version,
    serverInfo: options.serverInfo ?? { name: protocol.serverName, version: protocol.serverVersion },
  };
  registerMcpMethods(engine);
  return engine;
}

/** Engine with the built-in demo tools, resources and prompts registered. */
export function createDefaultEngine(options: EngineOptions = {}): Engine {
  const engine = createEngine(options);
  registerBuiltinTools(engine.tools);
  registerBuiltinResources(engine.resources, engine.serverInfo);
  registerBuiltinPrompts(engine.prompts);
  return engine;
}
