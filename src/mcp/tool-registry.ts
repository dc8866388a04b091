// This module defines tool descriptors and the startup-time registry that freezes them before serving.

import type { FastifyBaseLogger } from 'fastify';
import type { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { McpTool, ToolCallResult } from '../types/mcp.js';
import { AppError } from '../utils/errors.js';
import { type SchemaViolation, validateToolArguments } from './validation.js';

export interface ToolRuntimeContext {
  logger: FastifyBaseLogger;
}

export type ToolHandler<TArgs> = (
  args: TArgs,
  context: ToolRuntimeContext
) => Promise<ToolCallResult> | ToolCallResult;

export interface ToolDefinition<TSchema extends z.ZodTypeAny> {
  name: string;
  description: string;
  inputSchema: TSchema;
  handler: ToolHandler<z.output<TSchema>>;
}

export type BoundToolCall =
  | { ok: true; invoke: (context: ToolRuntimeContext) => Promise<ToolCallResult> }
  | { ok: false; violations: SchemaViolation[] };

export interface ToolDescriptor {
  readonly name: string;
  readonly description: string;
  // JSON Schema published through tools/list.
  readonly inputSchema: Record<string, unknown>;
  bind(args: unknown): BoundToolCall;
}

export class DuplicateToolNameError extends AppError {
  public constructor(toolName: string) {
    super(500, 'duplicate_tool_name', `Tool already registered: ${toolName}`, { toolName });
    this.name = 'DuplicateToolNameError';
  }
}

// This function turns one typed tool definition into an immutable descriptor with bound validation.
export function defineTool<TSchema extends z.ZodTypeAny>(definition: ToolDefinition<TSchema>): ToolDescriptor {
  const inputSchema = zodToJsonSchema(definition.inputSchema, {
    $refStrategy: 'none',
    target: 'jsonSchema7'
  }) as Record<string, unknown>;

  return Object.freeze({
    name: definition.name,
    description: definition.description,
    inputSchema,
    bind(args: unknown): BoundToolCall {
      const validation = validateToolArguments(definition.inputSchema, args);
      if (!validation.ok) {
        return { ok: false, violations: validation.violations };
      }

      return {
        ok: true,
        invoke: async (context) => definition.handler(validation.data, context)
      };
    }
  });
}

// This class is the read-only snapshot consumed by the dispatcher.
export class ToolRegistry {
  private readonly byName: ReadonlyMap<string, ToolDescriptor>;
  private readonly ordered: readonly ToolDescriptor[];

  public constructor(tools: ReadonlyMap<string, ToolDescriptor>) {
    this.byName = new Map(tools);
    this.ordered = Object.freeze([...tools.values()]);
  }

  // Registration order.
  public list(): readonly ToolDescriptor[] {
    return this.ordered;
  }

  public get(name: string): ToolDescriptor | undefined {
    return this.byName.get(name);
  }

  // This method exports MCP tool metadata for tools/list.
  public toMcpTools(): McpTool[] {
    return this.ordered.map((tool) => ({
      name: tool.name,
      description: tool.description,
      inputSchema: tool.inputSchema
    }));
  }
}

// This builder collects descriptors during startup and refuses changes once the registry is built.
export class ToolRegistryBuilder {
  private readonly tools = new Map<string, ToolDescriptor>();
  private built = false;

  public register(descriptor: ToolDescriptor): this {
    if (this.built) {
      throw new AppError(500, 'registry_frozen', `Cannot register ${descriptor.name} after the registry was built.`);
    }

    if (this.tools.has(descriptor.name)) {
      throw new DuplicateToolNameError(descriptor.name);
    }

    this.tools.set(descriptor.name, descriptor);
    return this;
  }

  public build(): ToolRegistry {
    this.built = true;
    return new ToolRegistry(this.tools);
  }
}
