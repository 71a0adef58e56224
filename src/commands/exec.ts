import { bootstrap } from './setup.js';
import { printError, printJson } from '../ui/renderer.js';
import { ToolboxError } from '../utils/errors.js';
import type { CliOverrides } from '../config/schema.js';
import type { ToolRegistry } from '../tools/registry.js';
import type { AnyToolResult } from '../tools/types.js';

/** Name and description of every tool, in catalog order. */
export function catalogSummary(registry: ToolRegistry): Array<{ name: string; description: string }> {
  return registry.list().map(({ name, description }) => ({ name, description }));
}

export function executeWords(registry: ToolRegistry, words: string[], cwd: string): Promise<AnyToolResult> {
  return registry.invoke('execute_command', { command: words.join(' ') }, { cwd });
}

/**
 * Default action: with words, run them as one shell command and print the
 * envelope; with none, print the catalog.
 */
export async function runDefault(words: string[], options: CliOverrides = {}): Promise<void> {
  try {
    const { registry } = await bootstrap(options);
    if (words.length === 0) {
      printJson(catalogSummary(registry));
      return;
    }
    printJson(await executeWords(registry, words, process.cwd()));
  } catch (err) {
    const toolboxErr = ToolboxError.fromUnknown(err);
    await printError(toolboxErr.message);
    process.exit(1);
  }
}
