import { bootstrap } from './setup.js';
import { printError, printJson } from '../ui/renderer.js';
import { ToolboxError } from '../utils/errors.js';
import type { CliOverrides } from '../config/schema.js';

export interface CallOptions extends CliOverrides {
  /** JSON object of arguments. */
  args?: string;
}

export function parseArgsJson(raw: string | undefined): Record<string, unknown> {
  if (raw === undefined || raw.trim() === '') return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ToolboxError(`--args is not valid JSON: ${raw}`, 'INVALID_ARGUMENTS', { cause: err });
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ToolboxError('--args must be a JSON object.', 'INVALID_ARGUMENTS');
  }
  return Object.fromEntries(Object.entries(parsed));
}

export async function runCall(toolName: string, options: CallOptions): Promise<void> {
  try {
    const args = parseArgsJson(options.args);
    const { registry } = await bootstrap(options);
    const result = await registry.invoke(toolName, args, { cwd: process.cwd() });
    printJson(result);
    if (!result.success) process.exitCode = 1;
  } catch (err) {
    const toolboxErr = ToolboxError.fromUnknown(err);
    await printError(toolboxErr.message);
    process.exit(1);
  }
}
