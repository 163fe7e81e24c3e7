import type { JsonObject } from '../models/jsonrpc';
import type { HandlerContext, PromptArgument, PromptMessage } from '../models/mcp';
import { ErrorCode, semanticError } from './errors';

export interface PromptRender {
  description?: string;
  messages: PromptMessage[];
}

export interface PromptDefinition {
  name: string;
  description?: string;
  arguments?: PromptArgument[];
  render: (args: Record<string, string>, ctx: HandlerContext) => PromptRender | Promise<PromptRender>;
}

function argumentToJson(a: PromptArgument): JsonObject {
  const out: JsonObject = { name: a.name, required: a.required === true };
  if(a.description !== undefined) out.description = a.description;
  return out;
}

export class PromptRegistry {
  private readonly prompts = new Map<string, PromptDefinition>();

  register(def: PromptDefinition): this {
    this.prompts.set(def.name, def);
    return this;
  }

  has(name: string){ return this.prompts.has(name); }

  list(): JsonObject[] {
    return [...this.prompts.values()].map(p => {
      const out: JsonObject = { name: p.name };
      if(p.description !== undefined) out.description = p.description;
      if(p.arguments) out.arguments = p.arguments.map(argumentToJson);
      return out;
    });
  }

  /** Render a prompt; unknown names and missing required arguments are InvalidParams. */
  async get(name: string, args: Record<string, string>, ctx: HandlerContext): Promise<JsonObject> {
    const prompt = this.prompts.get(name);
    if(!prompt) return semanticError(ErrorCode.InvalidParams, 'Prompt not found', { name });
    for(const arg of prompt.arguments ?? []){
      if(arg.required && (args[arg.name] === undefined || args[arg.name] === '')){
        semanticError(ErrorCode.InvalidParams, `Missing required argument: ${arg.name}`, { name, argument: arg.name });
      }
    }
    const rendered = await prompt.render(args, ctx);
    const out: JsonObject = {
      messages: rendered.messages.map(m => ({ role: m.role, content: { type: m.content.type, text: m.content.text } })),
    };
    const description = rendered.description ?? prompt.description;
    if(description !== undefined) out.description = description;
    return out;
  }
}
