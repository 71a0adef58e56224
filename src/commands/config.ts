import { loadConfig } from '../config/loader.js';
import { printError, printJson } from '../ui/renderer.js';
import { ToolboxError } from '../utils/errors.js';
import type { ToolboxConfig } from '../config/schema.js';

/** Replaces the API key with a fixed marker so the config can be shown safely. */
export function maskSecrets(config: ToolboxConfig): ToolboxConfig {
  if (config.search.apiKey === undefined) return config;
  return { ...config, search: { ...config.search, apiKey: '********' } };
}

export async function runConfigShow(): Promise<void> {
  try {
    const config = await loadConfig(process.cwd());
    printJson(maskSecrets(config));
  } catch (err) {
    const toolboxErr = ToolboxError.fromUnknown(err);
    await printError(toolboxErr.message);
    process.exit(1);
  }
}
