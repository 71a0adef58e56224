import { stringArg } from './arguments.js';
import { fetchText } from './fetch_url.js';
import { capture, fail } from './result.js';
import type { SearchCredentials } from '../config/schema.js';
import type { ToolDefinition, ToolArguments, ToolResult } from './types.js';

export interface SearchResults {
  /** Raw JSON text of the Custom Search response. */
  results: string;
}

export interface SearchWebOptions {
  endpoint: string;
  credentials: SearchCredentials | null;
  timeoutMs?: number;
}

const emptyResults = (): SearchResults => ({ results: '' });

export function buildSearchUrl(endpoint: string, query: string, credentials: SearchCredentials): URL {
  const url = new URL(endpoint);
  url.searchParams.set('q', query);
  url.searchParams.set('key', credentials.apiKey);
  url.searchParams.set('cx', credentials.engineId);
  return url;
}

export function createSearchWebTool(options: SearchWebOptions): ToolDefinition<SearchResults> {
  return {
    name: 'search_web',
    description:
      'Search the web with the Google Custom Search API and return the raw JSON response. ' +
      'Requires GOOGLE_API_KEY and GOOGLE_SEARCH_ENGINE_ID to be configured.',
    parameters: {
      type: 'object',
      properties: {
        query: { type: 'string', description: 'Search query.' },
      },
      required: ['query'],
    },

    failurePayload: emptyResults,

    async execute(args: ToolArguments): Promise<ToolResult<SearchResults>> {
      const query = stringArg(args, 'query');
      const { credentials } = options;
      if (credentials === null) {
        return fail(
          emptyResults(),
          'Web search is not configured: set GOOGLE_API_KEY and GOOGLE_SEARCH_ENGINE_ID.',
          'CONFIG_MISSING'
        );
      }

      return capture(
        async () => ({
          results: await fetchText(
            buildSearchUrl(options.endpoint, query, credentials),
            options.timeoutMs
          ),
        }),
        emptyResults,
        'NETWORK_FAILURE'
      );
    },
  };
}
