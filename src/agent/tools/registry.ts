/**
 * Tool Registry
 *
 * Name → tool mapping the reasoning loop executes against. Created
 * explicitly (createMedicalToolRegistry) and passed by reference; there is
 * no module-level instance.
 *
 * `execute` never rejects. Unknown tools, invalid arguments and handler
 * faults all come back as failed ToolExecutions whose observation the
 * model can read.
 */

import type { z } from 'zod';
import { DuplicateToolError } from '../../errors/index.js';
import type { ParameterSpec, ToolInvocation, ToolSchema } from '../../providers/types.js';
import { found, notFound, type Lookup, type ToolExecution } from '../types.js';

export interface ToolContext {
  signal?: AbortSignal;
}

/**
 * What a tool author writes. `parameters` is what the model sees; `input`
 * validates the arguments the model actually sends.
 */
export interface ToolDefinition<S extends z.ZodTypeAny> {
  name: string;
  description: string;
  parameters: ParameterSpec;
  input: S;
  handler: (input: z.infer<S>, context: ToolContext) => string | Promise<string>;
}

/**
 * A registered tool with its input type erased.
 */
export interface Tool {
  readonly name: string;
  readonly description: string;
  readonly parameters: ParameterSpec;
  /**
   * @throws ToolInputError when the arguments fail validation
   */
  run(args: Record<string, unknown>, context: ToolContext): Promise<string>;
}

export class ToolInputError extends Error {
  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'ToolInputError';
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function defineTool<S extends z.ZodTypeAny>(definition: ToolDefinition<S>): Tool {
  return Object.freeze({
    name: definition.name,
    description: definition.description,
    parameters: definition.parameters,
    run: async (args: Record<string, unknown>, context: ToolContext): Promise<string> => {
      const parsed = definition.input.safeParse(args);
      if (!parsed.success) {
        throw new ToolInputError(describeIssues(parsed.error));
      }
      return definition.handler(parsed.data, context);
    },
  });
}

export function unknownToolObservation(name: string): string {
  return `工具 '${name}' 不存在`;
}

export function invalidArgumentsObservation(name: string, reason: string): string {
  return `工具 '${name}' 的参数无效: ${reason}`;
}

export function toolErrorObservation(name: string, reason: string): string {
  return `执行工具 '${name}' 时发生错误: ${reason}`;
}

export class ToolRegistry {
  private readonly tools = new Map<string, Tool>();

  /**
   * @throws DuplicateToolError if the name is taken and `replace` is not set
   */
  register(tool: Tool, options: { replace?: boolean } = {}): this {
    if (this.tools.has(tool.name) && !options.replace) {
      throw new DuplicateToolError(tool.name);
    }
    this.tools.set(tool.name, tool);
    return this;
  }

  lookup(name: string): Lookup<Tool> {
    const tool = this.tools.get(name);
    return tool ? found(tool) : notFound();
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  /** Names in registration order */
  names(): string[] {
    return [...this.tools.keys()];
  }

  get size(): number {
    return this.tools.size;
  }

  /**
   * Descriptors in registration order, ready for the backend's tool calling.
   */
  schema(): ToolSchema[] {
    return [...this.tools.values()].map((tool) => ({
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters,
    }));
  }

  async execute(name: string, args: Record<string, unknown>, context: ToolContext = {}): Promise<ToolExecution> {
    const lookup = this.lookup(name);
    if (lookup.kind !== 'found') {
      return { toolName: name, observation: unknownToolObservation(name), success: false };
    }

    try {
      const observation = await lookup.value.run(args, context);
      return { toolName: name, observation, success: true };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      const observation =
        error instanceof ToolInputError
          ? invalidArgumentsObservation(name, message)
          : toolErrorObservation(name, message);
      return { toolName: name, observation, success: false };
    }
  }

  /**
   * Execute a model-issued call. A call whose arguments could not be
   * parsed is answered with a failure without running the tool.
   */
  async executeInvocation(invocation: ToolInvocation, context: ToolContext = {}): Promise<ToolExecution> {
    if (invocation.argumentError !== undefined) {
      return {
        toolName: invocation.name,
        observation: invalidArgumentsObservation(invocation.name, invocation.argumentError),
        success: false,
      };
    }
    return this.execute(invocation.name, invocation.arguments, context);
  }
}
