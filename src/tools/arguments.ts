import { ToolboxError } from '../utils/errors.js';
import type { ArgumentValue, ParameterSchema, ParameterSpec, ToolArguments } from './types.js';

function checkValue(name: string, spec: ParameterSpec, value: unknown): ArgumentValue {
  switch (spec.type) {
    case 'string':
      if (typeof value !== 'string') break;
      if (spec.enum !== undefined && !spec.enum.includes(value)) {
        throw new ToolboxError(
          `Argument "${name}" must be one of ${spec.enum.map((v) => `"${v}"`).join(', ')}.`,
          'INVALID_ARGUMENTS'
        );
      }
      return value;
    case 'number':
      if (typeof value === 'number' && Number.isFinite(value)) return value;
      break;
    case 'boolean':
      if (typeof value === 'boolean') return value;
      break;
  }
  throw new ToolboxError(`Argument "${name}" must be a ${spec.type}.`, 'INVALID_ARGUMENTS');
}

/**
 * Binds a raw argument mapping to a tool's declared parameters. Omitted (or
 * null) arguments take their declared default; required ones without a value
 * and keys the tool does not declare are rejected with INVALID_ARGUMENTS.
 */
export function bindArguments(schema: ParameterSchema, raw: Record<string, unknown>): ToolArguments {
  for (const key of Object.keys(raw)) {
    if (!Object.hasOwn(schema.properties, key)) {
      throw new ToolboxError(`Unexpected argument "${key}".`, 'INVALID_ARGUMENTS');
    }
  }

  const bound: Record<string, ArgumentValue> = {};
  for (const [name, spec] of Object.entries(schema.properties)) {
    const value = raw[name];
    if (value === undefined || value === null) {
      if (spec.default !== undefined) {
        bound[name] = spec.default;
      } else if (schema.required.includes(name)) {
        throw new ToolboxError(`Missing required argument "${name}".`, 'INVALID_ARGUMENTS');
      }
      continue;
    }
    bound[name] = checkValue(name, spec, value);
  }
  return bound;
}

export function stringArg(args: ToolArguments, name: string): string {
  const value = args[name];
  if (typeof value !== 'string') {
    throw new ToolboxError(`Argument "${name}" must be a string.`, 'INVALID_ARGUMENTS');
  }
  return value;
}
