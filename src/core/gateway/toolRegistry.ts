/**
 * Register, validate, and describe the read-only capabilities agents may call.
 */
import type { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { AppError } from '../../shared/errors/app-error';

const MAX_ARGS_SIZE = 10 * 1024;

export type ProviderName = 'chembl' | 'pubchem' | 'pubmed' | 'web' | 'lab';

/** Context handed to every provider call. */
export interface ToolExecutionContext {
  traceId: string;
  /** Aborted when the caller's deadline passes; providers pass it to fetch. */
  signal?: AbortSignal;
}

/** A tool as declared by its provider module. */
export interface CapabilityDescriptor<TArgs = unknown> {
  name: string;
  description: string;
  schema: z.ZodType<TArgs, z.ZodTypeDef, unknown>;
  sideEffect: 'read_only';
  provider: ProviderName;
  /** Defaults to `provider`. */
  rateLimitClass?: string;
  /** Defaults to true. */
  cacheable?: boolean;
  execute(args: TArgs, ctx: ToolExecutionContext): Promise<unknown>;
}

/** A validated call bound to its parsed arguments. */
export interface BoundToolCall {
  readonly toolName: string;
  readonly args: unknown;
  run(ctx: ToolExecutionContext): Promise<unknown>;
}

export interface RegisteredCapability {
  readonly name: string;
  readonly description: string;
  readonly sideEffect: 'read_only';
  readonly provider: ProviderName;
  readonly rateLimitClass: string;
  readonly cacheable: boolean;
  readonly parametersSchema: object;
  bind(rawArgs: unknown): BoundToolCall | { error: string };
}

export interface ToolCatalogEntry {
  name: string;
  description: string;
  parameters: object;
}

export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredCapability>();

  /**
   * Register a capability. The stored record is frozen.
   *
   * @throws Error when a duplicate tool name is registered.
   */
  register<TArgs>(descriptor: CapabilityDescriptor<TArgs>): RegisteredCapability {
    if (this.tools.has(descriptor.name)) {
      throw new Error(`Tool "${descriptor.name}" is already registered`);
    }

    const { name, schema } = descriptor;
    const registered: RegisteredCapability = Object.freeze({
      name,
      description: descriptor.description,
      sideEffect: descriptor.sideEffect,
      provider: descriptor.provider,
      rateLimitClass: descriptor.rateLimitClass ?? descriptor.provider,
      cacheable: descriptor.cacheable ?? true,
      parametersSchema: Object.freeze(zodToJsonSchema(schema, { $refStrategy: 'none' })),
      bind(rawArgs: unknown): BoundToolCall | { error: string } {
        const parsed = schema.safeParse(rawArgs);
        if (!parsed.success) {
          const issues = parsed.error.issues
            .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
          return { error: `Invalid arguments for tool "${name}": ${issues}` };
        }
        const args = parsed.data;
        return {
          toolName: name,
          args,
          run: (ctx) => descriptor.execute(args, ctx),
        };
      },
    });

    this.tools.set(name, registered);
    return registered;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  listNames(): string[] {
    return Array.from(this.tools.keys());
  }

  /**
   * Validate an untrusted call against the registry, the size limit and the
   * tool's schema.
   *
   * @throws AppError INVALID_TOOL_CALL on any failure.
   */
  validateToolCall(call: { name: string; args: unknown }): { tool: RegisteredCapability; call: BoundToolCall } {
    const tool = this.tools.get(call.name);
    if (!tool) {
      throw new AppError(
        'INVALID_TOOL_CALL',
        `Unknown tool: "${call.name}". Registered tools: ${this.listNames().join(', ') || 'none'}`,
        undefined,
        { toolName: call.name },
      );
    }

    let argsJson: string | undefined;
    try {
      argsJson = JSON.stringify(call.args);
    } catch (error) {
      throw new AppError('INVALID_TOOL_CALL', `Tool arguments for "${call.name}" must be JSON-serializable`, error, {
        toolName: call.name,
      });
    }
    if (typeof argsJson !== 'string') {
      throw new AppError('INVALID_TOOL_CALL', `Tool arguments for "${call.name}" must be JSON-serializable`, undefined, {
        toolName: call.name,
      });
    }
    const size = Buffer.byteLength(argsJson, 'utf8');
    if (size > MAX_ARGS_SIZE) {
      throw new AppError(
        'INVALID_TOOL_CALL',
        `Tool arguments exceed maximum size (${size} > ${MAX_ARGS_SIZE} bytes)`,
        undefined,
        { toolName: call.name },
      );
    }

    const bound = tool.bind(call.args);
    if ('error' in bound) {
      throw new AppError('INVALID_TOOL_CALL', bound.error, undefined, { toolName: call.name });
    }
    return { tool, call: bound };
  }

  /** Render the JSON-schema catalogue for the named tools, in the given order. */
  describeTools(names: readonly string[]): ToolCatalogEntry[] {
    return names.flatMap((name) => {
      const tool = this.tools.get(name);
      return tool ? [{ name: tool.name, description: tool.description, parameters: tool.parametersSchema }] : [];
    });
  }
}
