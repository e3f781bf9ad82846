// Tool Registry - Central registry for all available tools
// Also the executor the orchestrator calls when the model requests a tool

import { env } from '../../env.js';
import { logger } from '../../logger.js';
import { AppError } from '../../utils/errors.js';
import type { ToolSpec } from '../../providers/types.js';
import type { ToolExecutor } from '../orchestrator/types.js';
import type { ToolDefinition, ToolParameter, ToolResult } from './types.js';

const log = logger.child({ module: 'tools' });

export class ToolRegistry implements ToolExecutor {
  private tools: Map<string, ToolDefinition> = new Map();
  private timeoutMs: number;

  constructor(timeoutMs: number = env.TOOL_TIMEOUT_MS) {
    this.timeoutMs = timeoutMs;
  }

  register(tool: ToolDefinition): void {
    if (this.tools.has(tool.name)) {
      log.warn(`Tool "${tool.name}" already registered, overwriting`);
    }
    this.tools.set(tool.name, tool);
  }

  get(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  getAll(): ToolDefinition[] {
    return Array.from(this.tools.values());
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  clear(): void {
    this.tools.clear();
  }

  toToolSpecs(): ToolSpec[] {
    return Array.from(this.tools.values()).map(tool => ({
      name: tool.name,
      description: tool.description,
      input_schema: {
        type: 'object',
        properties: this.parametersToSchema(tool.parameters),
        required: tool.parameters.filter(p => p.required).map(p => p.name),
      },
    }));
  }

  async execute(name: string, input: Record<string, unknown>): Promise<string> {
    const tool = this.tools.get(name);
    if (!tool) {
      throw AppError.toolNotFound(name);
    }

    const startTime = Date.now();
    const result = await this.withTimeout(tool.execute(input), name);
    log.debug(
      { tool: name, success: result.success, durationMs: Date.now() - startTime, metadata: result.metadata },
      'tool executed',
    );

    if (!result.success) {
      throw AppError.toolFailed(result.content, { tool: name });
    }

    return result.content;
  }

  private withTimeout(promise: Promise<ToolResult>, toolName: string): Promise<ToolResult> {
    return new Promise((resolve, reject) => {
      const timer = setTimeout(
        () => reject(AppError.toolFailed(`Tool "${toolName}" timed out after ${this.timeoutMs}ms`)),
        this.timeoutMs,
      );
      promise.then(
        (value) => { clearTimeout(timer); resolve(value); },
        (err: unknown) => { clearTimeout(timer); reject(err); },
      );
    });
  }

  private parametersToSchema(params: ToolParameter[]): Record<string, unknown> {
    const schema: Record<string, unknown> = {};

    for (const param of params) {
      const paramSchema: Record<string, unknown> = {
        type: param.type,
        description: param.description,
      };

      if (param.enum) {
        paramSchema.enum = param.enum;
      }

      if (param.default !== undefined) {
        paramSchema.default = param.default;
      }

      schema[param.name] = paramSchema;
    }

    return schema;
  }
}

// Singleton instance
export const toolRegistry = new ToolRegistry();
