import { mkdir } from 'node:fs/promises';
import { resolve } from 'node:path';
import { stringArg } from './arguments.js';
import { capture } from './result.js';
import type { ToolDefinition, ToolArguments, ToolContext, ToolResult } from './types.js';

type NoPayload = Record<never, never>;

const noPayload = (): NoPayload => ({});

export const createDirectoryTool: ToolDefinition<NoPayload> = {
  name: 'create_directory',
  description:
    'Create a directory and any missing parent directories. An existing directory is not an error.',
  parameters: {
    type: 'object',
    properties: {
      directory_path: {
        type: 'string',
        description: 'Directory to create, absolute or relative to the working directory.',
      },
    },
    required: ['directory_path'],
  },

  failurePayload: noPayload,

  async execute(args: ToolArguments, ctx: ToolContext): Promise<ToolResult<NoPayload>> {
    const absolutePath = resolve(ctx.cwd, stringArg(args, 'directory_path'));
    return capture(
      async () => {
        await mkdir(absolutePath, { recursive: true });
        return {};
      },
      noPayload,
      'IO_FAILURE'
    );
  },
};
