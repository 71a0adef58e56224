import type { ToolboxConfig } from './schema.js';

export const CONFIG_DEFAULTS: ToolboxConfig = {
  logLevel: 'warn',
  redactPatterns: [],
  planPath: 'project_plan/action_plan.md',
  search: {
    endpoint: 'https://www.googleapis.com/customsearch/v1',
  },
};

export const ENV_SEARCH_API_KEY = 'GOOGLE_API_KEY';
export const ENV_SEARCH_ENGINE_ID = 'GOOGLE_SEARCH_ENGINE_ID';
