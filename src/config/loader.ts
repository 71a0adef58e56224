import { cosmiconfig } from 'cosmiconfig';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { existsSync } from 'node:fs';
import { ToolboxConfigSchema, SearchConfigSchema } from './schema.js';
import { CONFIG_DEFAULTS, ENV_SEARCH_API_KEY, ENV_SEARCH_ENGINE_ID } from './defaults.js';
import type { ToolboxConfig, SearchCredentials } from './schema.js';
import { ToolboxError } from '../utils/errors.js';

const MODULE_NAME = 'toolbox';

// Defaults live in CONFIG_DEFAULTS only: a file layer must not fill in keys it
// does not set, or it would mask a lower layer's value.
const FileConfigSchema = ToolboxConfigSchema.extend({
  search: SearchConfigSchema.partial(),
}).partial();

type PartialConfig = Partial<Omit<ToolboxConfig, 'search'>> & {
  search?: Partial<ToolboxConfig['search']>;
};

function mergeConfigs(base: ToolboxConfig, override: PartialConfig): ToolboxConfig {
  return {
    ...base,
    ...override,
    redactPatterns: override.redactPatterns ?? base.redactPatterns,
    search: { ...base.search, ...override.search },
  };
}

async function searchFile(dir: string, searchPlaces: string[]): Promise<PartialConfig> {
  const explorer = cosmiconfig(MODULE_NAME, { searchPlaces, stopDir: dir });

  const result = await explorer.search(dir);
  if (!result) return {};

  const parsed = FileConfigSchema.safeParse(result.config);
  if (!parsed.success) {
    throw new ToolboxError(
      `Invalid config at ${result.filepath}: ${parsed.error.message}`,
      'CONFIG_INVALID'
    );
  }
  return parsed.data;
}

export const USER_CONFIG_DIR = join(homedir(), '.config', MODULE_NAME);

/**
 * Load config from ~/.config/toolbox/config.json (XDG-style user config).
 * Lower priority than the working-directory config.
 */
async function loadUserConfig(userConfigDir: string): Promise<PartialConfig> {
  if (!existsSync(userConfigDir)) return {};
  return searchFile(userConfigDir, ['config.json', 'config.yaml', 'config.yml']);
}

async function loadRepoConfig(cwd: string): Promise<PartialConfig> {
  return searchFile(cwd, [
    `.${MODULE_NAME}rc`,
    `.${MODULE_NAME}rc.json`,
    `.${MODULE_NAME}rc.yaml`,
    `.${MODULE_NAME}rc.yml`,
    `.${MODULE_NAME}/config.json`,
    `${MODULE_NAME}.config.js`,
    `${MODULE_NAME}.config.cjs`,
  ]);
}

function envOverrides(env: NodeJS.ProcessEnv): PartialConfig {
  const search: Partial<ToolboxConfig['search']> = {};
  const apiKey = env[ENV_SEARCH_API_KEY];
  const engineId = env[ENV_SEARCH_ENGINE_ID];
  if (apiKey) search.apiKey = apiKey;
  if (engineId) search.engineId = engineId;
  return { search };
}

export async function loadConfig(
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env,
  userConfigDir: string = USER_CONFIG_DIR
): Promise<ToolboxConfig> {
  // Merge order (lowest → highest priority):
  //   1. Built-in defaults
  //   2. ~/.config/toolbox/config.json
  //   3. .toolboxrc / .toolbox/config.json in cwd
  //   4. GOOGLE_API_KEY / GOOGLE_SEARCH_ENGINE_ID
  const userConfig = await loadUserConfig(userConfigDir);
  const repoConfig = await loadRepoConfig(cwd);

  let config = mergeConfigs(CONFIG_DEFAULTS, userConfig);
  config = mergeConfigs(config, repoConfig);
  config = mergeConfigs(config, envOverrides(env));

  return config;
}

/** Null when either half of the pair is missing; search_web then reports CONFIG_MISSING. */
export function resolveSearchCredentials(config: ToolboxConfig): SearchCredentials | null {
  const { apiKey, engineId } = config.search;
  if (apiKey === undefined || engineId === undefined) return null;
  return { apiKey, engineId };
}
