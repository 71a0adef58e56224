import { writeFile, appendFile, mkdir } from 'node:fs/promises';
import { resolve, dirname } from 'node:path';
import { stringArg } from './arguments.js';
import { capture } from './result.js';
import type { ToolDefinition, ToolArguments, ToolContext, ToolResult } from './types.js';

export type WriteMode = 'overwrite' | 'append';

type NoPayload = Record<never, never>;

const noPayload = (): NoPayload => ({});

export async function writeTextFile(
  absolutePath: string,
  content: string,
  mode: WriteMode
): Promise<ToolResult<NoPayload>> {
  return capture(
    async () => {
      await mkdir(dirname(absolutePath), { recursive: true });
      if (mode === 'append') {
        await appendFile(absolutePath, content, 'utf8');
      } else {
        await writeFile(absolutePath, content, 'utf8');
      }
      return {};
    },
    noPayload,
    'IO_FAILURE'
  );
}

export const writeFileContentTool: ToolDefinition<NoPayload> = {
  name: 'write_file_content',
  description:
    'Write or append text to a file. Missing parent directories are created.',
  parameters: {
    type: 'object',
    properties: {
      file_path: {
        type: 'string',
        description: 'Path to the file, absolute or relative to the working directory.',
      },
      content: { type: 'string', description: 'Text to write.' },
      mode: {
        type: 'string',
        description: '"overwrite" replaces the file; "append" adds to the end.',
        enum: ['overwrite', 'append'],
        default: 'overwrite',
      },
    },
    required: ['file_path', 'content'],
  },

  failurePayload: noPayload,

  async execute(args: ToolArguments, ctx: ToolContext): Promise<ToolResult<NoPayload>> {
    const mode: WriteMode = args['mode'] === 'append' ? 'append' : 'overwrite';
    return writeTextFile(
      resolve(ctx.cwd, stringArg(args, 'file_path')),
      stringArg(args, 'content'),
      mode
    );
  },
};

export const appendToFileTool: ToolDefinition<NoPayload> = {
  name: 'append_to_file',
  description: 'Append text to the end of a file, creating it if it does not exist.',
  parameters: {
    type: 'object',
    properties: {
      file_path: {
        type: 'string',
        description: 'Path to the file, absolute or relative to the working directory.',
      },
      content: { type: 'string', description: 'Text to append.' },
    },
    required: ['file_path', 'content'],
  },

  failurePayload: noPayload,

  execute(args: ToolArguments, ctx: ToolContext): Promise<ToolResult<NoPayload>> {
    return writeFileContentTool.execute({ ...args, mode: 'append' }, ctx);
  },
};
