import { readdir } from 'node:fs/promises';
import { resolve } from 'node:path';
import { stringArg } from './arguments.js';
import { capture } from './result.js';
import type { ToolDefinition, ToolArguments, ToolContext, ToolResult } from './types.js';

export interface DirectoryContents {
  /** Entry names in the order the host returned them. */
  contents: string[];
}

const emptyContents = (): DirectoryContents => ({ contents: [] });

export const listDirectoryTool: ToolDefinition<DirectoryContents> = {
  name: 'list_directory',
  description: 'List the names of the entries in a directory.',
  parameters: {
    type: 'object',
    properties: {
      directory: {
        type: 'string',
        description: 'Directory to list, absolute or relative to the working directory.',
        default: '.',
      },
    },
    required: [],
  },

  failurePayload: emptyContents,

  async execute(args: ToolArguments, ctx: ToolContext): Promise<ToolResult<DirectoryContents>> {
    const absolutePath = resolve(ctx.cwd, stringArg(args, 'directory'));
    return capture(
      async () => ({ contents: await readdir(absolutePath) }),
      emptyContents,
      'IO_FAILURE'
    );
  },
};
