import { z } from 'zod';

export const LogLevelSchema = z.enum(['silent', 'error', 'warn', 'info', 'debug']);

export const SearchConfigSchema = z.object({
  endpoint: z.string().url().default('https://www.googleapis.com/customsearch/v1'),
  apiKey: z.string().min(1).optional(),
  engineId: z.string().min(1).optional(),
});
export type SearchConfig = z.infer<typeof SearchConfigSchema>;

export const ToolboxConfigSchema = z.object({
  logLevel: LogLevelSchema.default('warn'),
  redactPatterns: z.array(z.string()).default([]),
  planPath: z.string().min(1).default('project_plan/action_plan.md'),
  commandTimeoutMs: z.number().int().positive().optional(),
  networkTimeoutMs: z.number().int().positive().optional(),
  search: SearchConfigSchema.default({}),
});
export type ToolboxConfig = z.infer<typeof ToolboxConfigSchema>;

/** Both halves of the Custom Search credential pair, resolved once at startup. */
export interface SearchCredentials {
  apiKey: string;
  engineId: string;
}

export type CliOverrides = {
  verbose?: boolean;
};
