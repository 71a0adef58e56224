import type { ErrorCode } from '../utils/errors.js';

export interface ToolContext {
  /** Directory that relative paths, the plan location and spawned commands resolve against. */
  cwd: string;
}

export type ToolSuccess<P extends object> = P & { success: true };

export type ToolFailure<P extends object> = P & {
  success: false;
  error: string;
  code: ErrorCode;
};

/**
 * The envelope every tool resolves to. Callers branch on `success`; a failure
 * still carries the payload keys of its tool, set to empty values.
 */
export type ToolResult<S extends object = object, F extends object = S> =
  | ToolSuccess<S>
  | ToolFailure<F>;

export type AnyToolResult = ToolResult<object, object>;

export type ParameterType = 'string' | 'number' | 'boolean';
export type ArgumentValue = string | number | boolean;

export interface ParameterSpec {
  type: ParameterType;
  description: string;
  enum?: readonly string[];
  default?: ArgumentValue;
}

export interface ParameterSchema {
  type: 'object';
  properties: Record<string, ParameterSpec>;
  required: string[];
}

/** Arguments after binding: defaults applied, types checked, unknown keys rejected. */
export type ToolArguments = Readonly<Record<string, ArgumentValue>>;

export interface ToolDefinition<S extends object = object, F extends object = S> {
  name: string;
  description: string;
  parameters: ParameterSchema;
  /** Empty payload for a failure envelope; `message` is the error being reported. */
  failurePayload(message: string): F;
  execute(args: ToolArguments, ctx: ToolContext): Promise<ToolResult<S, F>>;
}

export type AnyToolDefinition = ToolDefinition<object, object>;

export interface ParameterDescriptor {
  name: string;
  type: ParameterType;
  description: string;
  required: boolean;
  default?: ArgumentValue;
  enum?: readonly string[];
}

/** JSON Schema shape handed to MCP clients in `tools/list`. */
export interface InputSchema {
  type: 'object';
  properties: Record<string, { type: ParameterType; description: string; enum?: string[]; default?: ArgumentValue }>;
  required: string[];
  additionalProperties: false;
}

export interface ToolDescriptor {
  name: string;
  description: string;
  parameters: readonly ParameterDescriptor[];
  inputSchema: InputSchema;
}
