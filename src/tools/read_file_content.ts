import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { stringArg } from './arguments.js';
import { capture } from './result.js';
import type { ToolDefinition, ToolArguments, ToolContext, ToolResult } from './types.js';

export interface FileContent {
  content: string;
}

export const emptyContent = (): FileContent => ({ content: '' });

export function readTextFile(absolutePath: string): Promise<ToolResult<FileContent>> {
  return capture(
    async () => ({ content: await readFile(absolutePath, 'utf8') }),
    emptyContent,
    'IO_FAILURE'
  );
}

export const readFileContentTool: ToolDefinition<FileContent> = {
  name: 'read_file_content',
  description: 'Read the full text of a file as UTF-8.',
  parameters: {
    type: 'object',
    properties: {
      file_path: {
        type: 'string',
        description: 'Path to the file, absolute or relative to the working directory.',
      },
    },
    required: ['file_path'],
  },

  failurePayload: emptyContent,

  async execute(args: ToolArguments, ctx: ToolContext): Promise<ToolResult<FileContent>> {
    return readTextFile(resolve(ctx.cwd, stringArg(args, 'file_path')));
  },
};
