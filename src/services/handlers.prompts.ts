import type { PromptRegistry } from './promptRegistry';

export function registerBuiltinPrompts(registry: PromptRegistry): PromptRegistry {
  registry.register({
    name: 'summarize',
    description: 'Ask the model to summarize a piece of text',
    arguments: [
      { name: 'text', description: 'Text to summarize', required: true },
      { name: 'style', description: 'Optional tone, e.g. "bullet points"' },
    ],
    render: args => {
      const style = args.style ? ` as ${args.style}` : '';
      return {
        messages: [
          { role: 'user', content: { type: 'text', text: `Summarize the following text${style}:\n\n${args.text}` } },
        ],
      };
    },
  });
  return registry;
}
