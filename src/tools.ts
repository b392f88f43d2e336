import { z } from 'zod';
import type { ToolDefinition } from './chatTypes.js';

export interface Tool {
  readonly definition: ToolDefinition;
  run(rawArguments: string): Promise<string>;
}

export interface ToolOptions<S extends z.ZodTypeAny> {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
  schema: S;
  execute: (args: z.infer<S>) => string | Promise<string>;
}

export function defineTool<S extends z.ZodTypeAny>(options: ToolOptions<S>): Tool {
  const definition: ToolDefinition = {
    name: options.name,
    description: options.description,
    parameters: options.parameters,
  };

  return {
    definition,
    async run(rawArguments: string): Promise<string> {
      let decoded: unknown;
      try {
        decoded = rawArguments.trim() === '' ? {} : JSON.parse(rawArguments);
      } catch {
        throw new Error(`Arguments for ${options.name} are not valid JSON`);
      }

      const parsed = options.schema.safeParse(decoded);
      if (!parsed.success) {
        const detail = parsed.error.issues
          .map((issue: z.ZodIssue) => `${issue.path.join('.') || 'arguments'}: ${issue.message}`)
          .join(', ');
        throw new Error(`Invalid arguments for ${options.name}: ${detail}`);
      }
      return options.execute(parsed.data);
    },
  };
}
