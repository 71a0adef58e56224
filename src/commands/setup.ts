import { loadConfig, resolveSearchCredentials } from '../config/loader.js';
import { createDefaultRegistry } from '../tools/registry.js';
import { logger } from '../utils/logger.js';
import type { ToolboxConfig, CliOverrides } from '../config/schema.js';
import type { ToolRegistry } from '../tools/registry.js';

export interface Runtime {
  config: ToolboxConfig;
  registry: ToolRegistry;
}

/**
 * Loads config, configures the shared logger and builds the sealed registry.
 * Missing search credentials are reported here, once, rather than at call time.
 */
export async function bootstrap(
  options: CliOverrides = {},
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env
): Promise<Runtime> {
  const config = await loadConfig(cwd, env);

  logger.setLevel(options.verbose ? 'debug' : config.logLevel);
  logger.setRedactPatterns(config.redactPatterns);
  if (config.search.apiKey !== undefined) logger.addSecret(config.search.apiKey);

  const credentials = resolveSearchCredentials(config);
  if (credentials === null) {
    logger.warn(
      'GOOGLE_API_KEY and/or GOOGLE_SEARCH_ENGINE_ID not set. search_web will fail until both are configured.'
    );
  }

  const registry = createDefaultRegistry({
    commandTimeoutMs: config.commandTimeoutMs,
    networkTimeoutMs: config.networkTimeoutMs,
    planPath: config.planPath,
    search: { endpoint: config.search.endpoint, credentials },
  });
  logger.debug(`Registered ${registry.list().length} tools`);

  return { config, registry };
}
