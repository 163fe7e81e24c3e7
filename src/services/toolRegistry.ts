/**
 * Registry of callable tools: name, description, JSON Schema input contract and the
 * handler that does the work. tools/list publishes the descriptors; tools/call looks
 * the tool up, validates its arguments with the compiled schema and runs it.
 */
import type { JsonObject, JsonValue } from '../models/jsonrpc';
import type { HandlerContext, ToolCallResult } from '../models/mcp';
import { ArgumentValidator, compileSchema, ValidationOutcome } from './validationService';

export type ToolHandler = (args: JsonObject, ctx: HandlerContext) => JsonValue | ToolCallResult | Promise<JsonValue | ToolCallResult>;

export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: JsonObject;
  handler: ToolHandler;
  /** The handler polls ctx.cancellation and can stop early. */
  cancellable?: boolean;
}

interface RegisteredTool extends ToolDefinition {
  validate: ArgumentValidator;
}

export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();

  /** Compiles the input schema eagerly so a broken contract fails at startup. Re-registering a name replaces it. */
  register(def: ToolDefinition): this {
    if(!def.name) throw new Error('Tool name cannot be empty');
    this.tools.set(def.name, { ...def, validate: compileSchema(def.inputSchema) });
    return this;
  }

  has(name: string){ return this.tools.has(name); }

  get(name: string): ToolDefinition | undefined { return this.tools.get(name); }

  names(): string[] { return [...this.tools.keys()].sort(); }

  /** tools/list descriptors, sorted by name. */
  list(): JsonObject[] {
    return this.names().flatMap(name => {
      const tool = this.tools.get(name);
      return tool ? [{ name: tool.name, description: tool.description, inputSchema: tool.inputSchema }] : [];
    });
  }

  validateArguments(name: string, args: JsonObject): ValidationOutcome {
    const tool = this.tools.get(name);
    if(!tool) return { ok: false, errors: [{ path: '/', message: `Unknown tool: ${name}`, keyword: 'tool' }] };
    return tool.validate(args);
  }
}
