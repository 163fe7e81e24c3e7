// Built-in demo tools. Real deployments register their own collaborators through the
// same ToolRegistry API; these exist so a bare server has something to call.
import type { JsonObject } from '../models/jsonrpc';
import type { ToolCallResult } from '../models/mcp';
import type { CancellationToken } from './cancellation';
import type { ToolRegistry } from './toolRegistry';

const numberPair: JsonObject = {
  type: 'object',
  properties: {
    a: { type: 'number', description: 'First operand' },
    b: { type: 'number', description: 'Second operand' },
  },
  required: ['a', 'b'],
  additionalProperties: false,
};

export type CalculatorOperation = 'add' | 'subtract' | 'multiply' | 'divide';

export function calculate(operation: CalculatorOperation, a: number, b: number): number {
  switch(operation){
    case 'add': return a + b;
    case 'subtract': return a - b;
    case 'multiply': return a * b;
    case 'divide':
      if(b === 0) throw new Error('Division by zero');
      return a / b;
  }
}

function isOperation(v: unknown): v is CalculatorOperation {
  return v === 'add' || v === 'subtract' || v === 'multiply' || v === 'divide';
}

function num(args: JsonObject, key: string): number {
  const v = args[key];
  if(typeof v !== 'number') throw new Error(`Argument ${key} must be a number`);
  return v;
}

/** Resolves after `ms`, or as soon as the token is cancelled. */
function pause(ms: number, token: CancellationToken | undefined): Promise<void> {
  if(token?.isCancelled()) return Promise.resolve();
  return new Promise<void>(resolve => {
    let off: (() => void) | undefined;
    const timer = setTimeout(() => { off?.(); resolve(); }, ms);
    off = token?.onCancel(() => { clearTimeout(timer); resolve(); });
  });
}

function cancelled(reason: string | undefined): ToolCallResult {
  return { content: [{ type: 'text', text: `Cancelled: ${reason ?? 'no reason given'}` }], isError: true };
}

export function registerBuiltinTools(registry: ToolRegistry): ToolRegistry {
  registry.register({
    name: 'add',
    description: 'Add two numbers',
    inputSchema: numberPair,
    handler: args => num(args, 'a') + num(args, 'b'),
  });

  registry.register({
    name: 'calculator',
    description: 'Basic arithmetic: add, subtract, multiply, divide',
    inputSchema: {
      type: 'object',
      properties: {
        operation: { type: 'string', enum: ['add', 'subtract', 'multiply', 'divide'] },
        a: { type: 'number' },
        b: { type: 'number' },
      },
      required: ['operation', 'a', 'b'],
      additionalProperties: false,
    },
    handler: args => {
      const op = args.operation;
      if(!isOperation(op)) throw new Error(`Unsupported operation: ${String(op)}`);
      return calculate(op, num(args, 'a'), num(args, 'b'));
    },
  });

  registry.register({
    name: 'countdown',
    description: 'Count down in steps, reporting progress; stops early when cancelled',
    cancellable: true,
    inputSchema: {
      type: 'object',
      properties: {
        steps: { type: 'integer', minimum: 1, maximum: 100, default: 5 },
        intervalMs: { type: 'integer', minimum: 0, maximum: 10000, default: 100 },
      },
      additionalProperties: false,
    },
    handler: async (args, ctx) => {
      const steps = typeof args.steps === 'number' ? args.steps : 5;
      const intervalMs = typeof args.intervalMs === 'number' ? args.intervalMs : 100;
      const token = ctx.cancellation;
      for(let step = 1; step <= steps; step++){
        if(token?.isCancelled()) return cancelled(token.reason);
        await pause(intervalMs, token);
        if(token?.isCancelled()) return cancelled(token.reason);
        await ctx.progress?.update(step, `${steps - step} remaining`);
      }
      return `Countdown finished after ${steps} steps`;
    },
  });

  return registry;
}
