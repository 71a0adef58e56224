import { ToolboxError, errorMessage } from '../utils/errors.js';
import { stringArg } from './arguments.js';
import { capture } from './result.js';
import type { ToolDefinition, ToolArguments, ToolResult } from './types.js';

export interface FetchedContent {
  content: string;
}

/**
 * GETs `url` and returns the body as text. Connection failures, timeouts and
 * non-2xx statuses all surface as NETWORK_FAILURE.
 */
export async function fetchText(url: string | URL, timeoutMs?: number): Promise<string> {
  let response: Response;
  try {
    response = await fetch(url, {
      ...(timeoutMs !== undefined ? { signal: AbortSignal.timeout(timeoutMs) } : {}),
    });
  } catch (err) {
    throw new ToolboxError(errorMessage(err), 'NETWORK_FAILURE', { cause: err });
  }

  const body = await response.text().catch((err: unknown) => {
    throw new ToolboxError(errorMessage(err), 'NETWORK_FAILURE', { cause: err });
  });

  if (!response.ok) {
    throw new ToolboxError(
      `HTTP ${response.status}${response.statusText ? ` ${response.statusText}` : ''}`,
      'NETWORK_FAILURE'
    );
  }
  return body;
}

const emptyContent = (): FetchedContent => ({ content: '' });

export function createFetchUrlTool(
  options: { timeoutMs?: number } = {}
): ToolDefinition<FetchedContent> {
  return {
    name: 'fetch_url',
    description: 'Fetch a URL with an HTTP GET and return the raw response body as text.',
    parameters: {
      type: 'object',
      properties: {
        url: { type: 'string', description: 'Absolute http(s) URL to fetch.' },
      },
      required: ['url'],
    },

    failurePayload: emptyContent,

    async execute(args: ToolArguments): Promise<ToolResult<FetchedContent>> {
      const url = stringArg(args, 'url');
      return capture(
        async () => ({ content: await fetchText(url, options.timeoutMs) }),
        emptyContent,
        'NETWORK_FAILURE'
      );
    },
  };
}
