import { ToolboxError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { KeyedLock } from '../utils/lock.js';
import { PlanStore } from '../storage/plan.js';
import { bindArguments } from './arguments.js';
import { codeOf, fail } from './result.js';
import type {
  AnyToolDefinition,
  AnyToolResult,
  ParameterDescriptor,
  ToolContext,
  ToolDefinition,
  ToolDescriptor,
  InputSchema,
} from './types.js';
import type { SearchCredentials } from '../config/schema.js';
import { createExecuteCommandTool } from './execute_command.js';
import { readFileContentTool } from './read_file_content.js';
import { writeFileContentTool, appendToFileTool } from './write_file_content.js';
import { createSearchWebTool } from './search_web.js';
import { createFetchUrlTool } from './fetch_url.js';
import { createPlanTools } from './plan.js';
import { listDirectoryTool } from './list_directory.js';
import { getFileInfoTool } from './get_file_info.js';
import { createDirectoryTool } from './create_directory.js';

export function describeTool(tool: AnyToolDefinition): ToolDescriptor {
  const { properties, required } = tool.parameters;

  const parameters: ParameterDescriptor[] = Object.entries(properties).map(([name, spec]) => ({
    name,
    type: spec.type,
    description: spec.description,
    required: required.includes(name) && spec.default === undefined,
    ...(spec.default !== undefined ? { default: spec.default } : {}),
    ...(spec.enum !== undefined ? { enum: spec.enum } : {}),
  }));

  const inputSchema: InputSchema = {
    type: 'object',
    properties: Object.fromEntries(
      parameters.map((p) => [
        p.name,
        {
          type: p.type,
          description: p.description,
          ...(p.enum !== undefined ? { enum: [...p.enum] } : {}),
          ...(p.default !== undefined ? { default: p.default } : {}),
        },
      ])
    ),
    required: parameters.filter((p) => p.required).map((p) => p.name),
    additionalProperties: false,
  };

  return Object.freeze({
    name: tool.name,
    description: tool.description,
    parameters: Object.freeze(parameters),
    inputSchema,
  });
}

/**
 * Owns the tool catalog. Tools are registered while the registry is
 * uninitialized; `seal()` derives every descriptor once and makes the
 * registry ready. There is no way back.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, AnyToolDefinition>();
  private descriptors: readonly ToolDescriptor[] | null = null;

  get ready(): boolean {
    return this.descriptors !== null;
  }

  register<S extends object, F extends object>(tool: ToolDefinition<S, F>): void {
    if (this.ready) {
      throw new ToolboxError(
        `Cannot register "${tool.name}": the registry is already sealed.`,
        'REGISTRY_INVALID'
      );
    }
    if (this.tools.has(tool.name)) {
      throw new ToolboxError(`Tool "${tool.name}" is already registered.`, 'REGISTRY_INVALID');
    }
    this.tools.set(tool.name, tool);
  }

  seal(): this {
    if (!this.ready) {
      this.descriptors = Object.freeze(Array.from(this.tools.values(), describeTool));
    }
    return this;
  }

  get(name: string): AnyToolDefinition | undefined {
    return this.tools.get(name);
  }

  list(): readonly ToolDescriptor[] {
    if (this.descriptors === null) {
      throw new ToolboxError('The tool registry has not been sealed yet.', 'REGISTRY_NOT_READY');
    }
    return this.descriptors;
  }

  async invoke(
    name: string,
    args: Record<string, unknown> = {},
    ctx: ToolContext = { cwd: process.cwd() }
  ): Promise<AnyToolResult> {
    if (!this.ready) {
      throw new ToolboxError('The tool registry has not been sealed yet.', 'REGISTRY_NOT_READY');
    }

    const tool = this.tools.get(name);
    if (tool === undefined) {
      logger.warn(`Unknown tool requested: "${name}"`);
      return fail({}, `Unknown tool: "${name}"`, 'UNKNOWN_TOOL');
    }

    const started = Date.now();
    let result: AnyToolResult;
    try {
      const bound = bindArguments(tool.parameters, args);
      result = await tool.execute(bound, ctx);
    } catch (err: unknown) {
      const message = errorMessage(err);
      const code = codeOf(err, 'UNKNOWN');
      if (code !== 'INVALID_ARGUMENTS') {
        logger.error(`Tool "${name}" threw an unexpected error: ${message}`);
      }
      result = fail(tool.failurePayload(message), message, code);
    }

    logger.debug(
      `${name} → ${result.success ? 'ok' : `failed (${result.code})`} in ${Date.now() - started}ms`
    );
    return result;
  }
}

export interface RegistryOptions {
  /** Kill commands that run longer than this. Unset means no timeout. */
  commandTimeoutMs?: number;
  networkTimeoutMs?: number;
  planPath: string;
  search: {
    endpoint: string;
    credentials: SearchCredentials | null;
  };
}

export function createDefaultRegistry(options: RegistryOptions): ToolRegistry {
  const registry = new ToolRegistry();
  const plans = new PlanStore(options.planPath, new KeyedLock());
  const planTools = createPlanTools(plans);

  registry.register(createExecuteCommandTool({ timeoutMs: options.commandTimeoutMs }));
  registry.register(readFileContentTool);
  registry.register(writeFileContentTool);
  registry.register(appendToFileTool);
  registry.register(
    createSearchWebTool({
      endpoint: options.search.endpoint,
      credentials: options.search.credentials,
      timeoutMs: options.networkTimeoutMs,
    })
  );
  registry.register(createFetchUrlTool({ timeoutMs: options.networkTimeoutMs }));
  registry.register(planTools.createPlan);
  registry.register(planTools.appendPlan);
  registry.register(planTools.readPlan);
  registry.register(listDirectoryTool);
  registry.register(getFileInfoTool);
  registry.register(createDirectoryTool);
  return registry.seal();
}
