/**
 * Tool registry
 *
 * Every tool is registered once by name. Calls go through `call`, which is the
 * only place errors are caught: whatever a handler throws comes back as a
 * single error content block.
 */

import type { z } from 'zod';
import logger from '@/config/logger.js';
import { AppError, NotFoundError, type ErrorKind } from '@/middleware/error.js';
import type {
  ErrorBlock,
  RegisteredTool,
  ToolDescriptor,
  ToolResult,
} from '@/types/tools.js';
import { parseOrThrow } from '@/utils/validation-helpers.js';

export interface ToolDefinition<TSchema extends z.AnyZodObject> extends ToolDescriptor {
  schema: TSchema;
  handler: (args: z.infer<TSchema>) => Promise<ToolResult>;
}

/**
 * Binds a schema to its handler. Arguments are parsed, and defaults applied,
 * before the handler sees them.
 */
export function defineTool<TSchema extends z.AnyZodObject>(
  definition: ToolDefinition<TSchema>
): RegisteredTool {
  const { schema, handler, ...descriptor } = definition;
  return {
    ...descriptor,
    schema,
    invoke: async (rawArguments) =>
      handler(parseOrThrow(schema, rawArguments ?? {}, descriptor.name)),
  };
}

export function toErrorBlock(error: unknown): ErrorBlock {
  if (error instanceof AppError) {
    return { type: 'error', kind: error.kind, message: error.message };
  }
  return {
    type: 'error',
    kind: 'InternalError',
    message: error instanceof Error ? error.message : 'Unknown error',
  };
}

export function errorResult(error: unknown): ToolResult {
  return { content: [toErrorBlock(error)], isError: true };
}

/**
 * Kind of the first error block in a result, if it failed
 */
export function errorKindOf(result: ToolResult): ErrorKind | undefined {
  const block = result.content.find((item): item is ErrorBlock => item.type === 'error');
  return block?.kind;
}

export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();

  constructor(tools: RegisteredTool[] = []) {
    tools.forEach((tool) => this.register(tool));
  }

  register(tool: RegisteredTool): void {
    if (this.tools.has(tool.name)) {
      throw new Error(`Tool already registered: ${tool.name}`);
    }
    this.tools.set(tool.name, tool);
  }

  list(): ToolDescriptor[] {
    return [...this.tools.values()].map(({ name, title, description, category }) => ({
      name,
      title,
      description,
      category,
    }));
  }

  get(name: string): RegisteredTool | undefined {
    return this.tools.get(name);
  }

  all(): RegisteredTool[] {
    return [...this.tools.values()];
  }

  async call(name: string, rawArguments: unknown): Promise<ToolResult> {
    const startTime = Date.now();
    const tool = this.tools.get(name);

    if (!tool) {
      logger.warn('Unknown tool requested', { tool: name });
      return errorResult(new NotFoundError(`Unknown tool: ${name}`));
    }

    try {
      const result = await tool.invoke(rawArguments);

      logger.info('Tool call completed', {
        tool: name,
        blocks: result.content.length,
        elapsed_ms: Date.now() - startTime,
      });

      return result;
    } catch (error) {
      const block = toErrorBlock(error);
      const meta = {
        tool: name,
        kind: block.kind,
        error: block.message,
        elapsed_ms: Date.now() - startTime,
      };

      if (error instanceof AppError && error.isOperational) {
        logger.warn('Tool call failed', meta);
      } else {
        logger.error('Tool call failed unexpectedly', {
          ...meta,
          stack: error instanceof Error ? error.stack : undefined,
        });
      }

      return { content: [block], isError: true };
    }
  }
}
