/**
 * Resources addressable by URI, URI templates (`scheme://{var}`), and per-session
 * subscriptions. notifyUpdated() pushes `notifications/resources/updated` to every
 * session subscribed to the URI through that session's notification queue.
 */
import type { JsonObject } from '../models/jsonrpc';
import type { HandlerContext, ResourceContent } from '../models/mcp';
import type { Session } from '../server/session';
import { ErrorCode, semanticError } from './errors';
import { log } from './logger';

export const RESOURCE_UPDATED_METHOD = 'notifications/resources/updated';

type ReadResult = ResourceContent | ResourceContent[];

export interface ResourceDefinition {
  uri: string;
  name: string;
  description?: string;
  mimeType?: string;
  read: (uri: string, ctx: HandlerContext) => ReadResult | Promise<ReadResult>;
}

export interface ResourceTemplateDefinition {
  uriTemplate: string;
  name: string;
  description?: string;
  mimeType?: string;
  read: (uri: string, vars: Record<string, string>, ctx: HandlerContext) => ReadResult | Promise<ReadResult>;
}

interface CompiledTemplate {
  def: ResourceTemplateDefinition;
  pattern: RegExp;
  vars: string[];
}

function compileTemplate(def: ResourceTemplateDefinition): CompiledTemplate {
  const vars: string[] = [];
  const source = def.uriTemplate
    .split(/(\{[A-Za-z_][A-Za-z0-9_]*\})/)
    .map(part => {
      const m = /^\{([A-Za-z_][A-Za-z0-9_]*)\}$/.exec(part);
      if(m){ vars.push(m[1]); return '([^/]+)'; }
      return part.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    })
    .join('');
  return { def, pattern: new RegExp(`^${source}$`), vars };
}

function matchCompiled(tpl: CompiledTemplate, uri: string): Record<string, string> | null {
  const m = tpl.pattern.exec(uri);
  if(!m) return null;
  const out: Record<string, string> = {};
  tpl.vars.forEach((name, i) => {
    const raw = m[i + 1];
    try { out[name] = decodeURIComponent(raw); } catch { out[name] = raw; }
  });
  return out;
}

function contentToJson(c: ResourceContent): JsonObject {
  const out: JsonObject = { uri: c.uri };
  if(c.mimeType !== undefined) out.mimeType = c.mimeType;
  if(c.text !== undefined) out.text = c.text;
  if(c.blob !== undefined) out.blob = c.blob;
  return out;
}

function describe(d: { name: string; description?: string; mimeType?: string }, key: 'uri' | 'uriTemplate', value: string): JsonObject {
  const out: JsonObject = { [key]: value, name: d.name };
  if(d.description !== undefined) out.description = d.description;
  if(d.mimeType !== undefined) out.mimeType = d.mimeType;
  return out;
}

export class ResourceRegistry {
  private readonly resources = new Map<string, ResourceDefinition>();
  private readonly templates: CompiledTemplate[] = [];
  private readonly subscriptions = new Map<string, Set<Session>>();
  private readonly trackedSessions = new WeakSet<Session>();

  register(def: ResourceDefinition): this {
    this.resources.set(def.uri, def);
    return this;
  }

  registerTemplate(def: ResourceTemplateDefinition): this {
    this.templates.push(compileTemplate(def));
    return this;
  }

  list(): JsonObject[] {
    return [...this.resources.values()].map(r => describe(r, 'uri', r.uri));
  }

  listTemplates(): JsonObject[] {
    return this.templates.map(t => describe(t.def, 'uriTemplate', t.def.uriTemplate));
  }

  exists(uri: string): boolean {
    return this.resources.has(uri) || this.templates.some(t => matchCompiled(t, uri) !== null);
  }

  async read(uri: string, ctx: HandlerContext): Promise<JsonObject[]> {
    const direct = this.resources.get(uri);
    let result: ReadResult | undefined;
    if(direct){
      result = await direct.read(uri, ctx);
    } else {
      for(const tpl of this.templates){
        const vars = matchCompiled(tpl, uri);
        if(vars){ result = await tpl.def.read(uri, vars, ctx); break; }
      }
    }
    if(result === undefined) return semanticError(ErrorCode.InvalidParams, 'Resource not found', { uri });
    const list = Array.isArray(result) ? result : [result];
    return list.map(contentToJson);
  }

  subscribe(uri: string, session: Session): boolean {
    if(!this.exists(uri)) semanticError(ErrorCode.InvalidParams, 'Resource not found', { uri });
    let subs = this.subscriptions.get(uri);
    if(!subs){ subs = new Set(); this.subscriptions.set(uri, subs); }
    const added = !subs.has(session);
    subs.add(session);
    if(!this.trackedSessions.has(session)){
      this.trackedSessions.add(session);
      session.onClose(() => this.dropSession(session));
    }
    return added;
  }

  unsubscribe(uri: string, session: Session): boolean {
    const subs = this.subscriptions.get(uri);
    if(!subs) return false;
    const removed = subs.delete(session);
    if(subs.size === 0) this.subscriptions.delete(uri);
    return removed;
  }

  subscriberCount(uri: string): number {
    return this.subscriptions.get(uri)?.size ?? 0;
  }

  /** Queue an update notification for every live subscriber; returns how many were notified. */
  notifyUpdated(uri: string): number {
    const subs = this.subscriptions.get(uri);
    if(!subs) return 0;
    let count = 0;
    for(const session of subs){
      if(session.notify(RESOURCE_UPDATED_METHOD, { uri })) count++;
    }
    log('debug', 'resource_updated', { data: { uri, notified: count } });
    return count;
  }

  dropSession(session: Session){
    for(const [uri, subs] of this.subscriptions){
      subs.delete(session);
      if(subs.size === 0) this.subscriptions.delete(uri);
    }
  }
}
