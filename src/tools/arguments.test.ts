import { describe, it, expect } from 'vitest';
import { bindArguments, stringArg } from './arguments.js';
import { ToolboxError } from '../utils/errors.js';
import type { ParameterSchema } from './types.js';

const schema: ParameterSchema = {
  type: 'object',
  properties: {
    file_path: { type: 'string', description: 'path' },
    mode: {
      type: 'string',
      description: 'mode',
      enum: ['overwrite', 'append'],
      default: 'overwrite',
    },
    limit: { type: 'number', description: 'limit' },
    force: { type: 'boolean', description: 'force' },
  },
  required: ['file_path'],
};

function invalid(err: unknown): boolean {
  return ToolboxError.isToolboxError(err) && err.code === 'INVALID_ARGUMENTS';
}

describe('bindArguments', () => {
  it('applies declared defaults for omitted arguments', () => {
    expect(bindArguments(schema, { file_path: 'a.txt' })).toEqual({
      file_path: 'a.txt',
      mode: 'overwrite',
    });
  });

  it('treats null like an omitted argument', () => {
    expect(bindArguments(schema, { file_path: 'a.txt', mode: null })).toEqual({
      file_path: 'a.txt',
      mode: 'overwrite',
    });
  });

  it('keeps supplied values of the right type', () => {
    expect(
      bindArguments(schema, { file_path: 'a.txt', mode: 'append', limit: 3, force: true })
    ).toEqual({ file_path: 'a.txt', mode: 'append', limit: 3, force: true });
  });

  it('rejects a missing required argument', () => {
    expect(() => bindArguments(schema, {})).toThrow('Missing required argument "file_path".');
  });

  it('rejects keys the tool does not declare', () => {
    let caught: unknown;
    try {
      bindArguments(schema, { file_path: 'a.txt', path: 'b.txt' });
    } catch (err) {
      caught = err;
    }
    expect(invalid(caught)).toBe(true);
    expect(caught).toHaveProperty('message', 'Unexpected argument "path".');
  });

  it('rejects a value of the wrong type', () => {
    expect(() => bindArguments(schema, { file_path: 42 })).toThrow(
      'Argument "file_path" must be a string.'
    );
    expect(() => bindArguments(schema, { file_path: 'a', limit: '3' })).toThrow(
      'Argument "limit" must be a number.'
    );
    expect(() => bindArguments(schema, { file_path: 'a', limit: Number.NaN })).toThrow(
      'Argument "limit" must be a number.'
    );
    expect(() => bindArguments(schema, { file_path: 'a', force: 'yes' })).toThrow(
      'Argument "force" must be a boolean.'
    );
  });

  it('rejects a string outside the declared enum', () => {
    expect(() => bindArguments(schema, { file_path: 'a', mode: 'w' })).toThrow(
      'Argument "mode" must be one of "overwrite", "append".'
    );
  });

  it('does not treat inherited object keys as declared parameters', () => {
    expect(() => bindArguments(schema, { file_path: 'a', toString: 'x' })).toThrow(
      'Unexpected argument "toString".'
    );
  });
});

describe('stringArg', () => {
  it('returns a bound string', () => {
    expect(stringArg({ command: 'ls' }, 'command')).toBe('ls');
  });

  it('throws INVALID_ARGUMENTS when the argument is absent', () => {
    let caught: unknown;
    try {
      stringArg({}, 'command');
    } catch (err) {
      caught = err;
    }
    expect(invalid(caught)).toBe(true);
  });
});
