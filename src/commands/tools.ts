import { bootstrap } from './setup.js';
import { printError, printJson, renderToolTable } from '../ui/renderer.js';
import { ToolboxError } from '../utils/errors.js';
import type { CliOverrides } from '../config/schema.js';

export interface ToolsOptions extends CliOverrides {
  json?: boolean;
}

export async function runTools(options: ToolsOptions): Promise<void> {
  try {
    const { registry } = await bootstrap(options);
    const tools = registry.list();
    if (options.json) {
      printJson(tools);
      return;
    }
    process.stdout.write(await renderToolTable(tools));
  } catch (err) {
    const toolboxErr = ToolboxError.fromUnknown(err);
    await printError(toolboxErr.message);
    process.exit(1);
  }
}
