import { stat } from 'node:fs/promises';
import type { Stats } from 'node:fs';
import { resolve } from 'node:path';
import { stringArg } from './arguments.js';
import { capture } from './result.js';
import type { ToolDefinition, ToolArguments, ToolContext, ToolResult } from './types.js';

export interface FileInfo {
  size: number;
  /** Epoch seconds. */
  modified_time: number;
  /** Epoch seconds; birth time where the filesystem records one, else status-change time. */
  created_time: number;
  is_directory: boolean;
  is_file: boolean;
}

type Found = { info: FileInfo };
type NotFound = { info: Record<never, never> };

const noInfo = (): NotFound => ({ info: {} });

export function toFileInfo(stats: Stats): FileInfo {
  const createdMs = stats.birthtimeMs > 0 ? stats.birthtimeMs : stats.ctimeMs;
  return {
    size: stats.size,
    modified_time: stats.mtimeMs / 1000,
    created_time: createdMs / 1000,
    is_directory: stats.isDirectory(),
    is_file: stats.isFile(),
  };
}

export const getFileInfoTool: ToolDefinition<Found, NotFound> = {
  name: 'get_file_info',
  description:
    'Get size, modification and creation times (epoch seconds) and type of a file or directory.',
  parameters: {
    type: 'object',
    properties: {
      file_path: {
        type: 'string',
        description: 'Path to inspect, absolute or relative to the working directory.',
      },
    },
    required: ['file_path'],
  },

  failurePayload: noInfo,

  async execute(args: ToolArguments, ctx: ToolContext): Promise<ToolResult<Found, NotFound>> {
    const absolutePath = resolve(ctx.cwd, stringArg(args, 'file_path'));
    return capture(async () => ({ info: toFileInfo(await stat(absolutePath)) }), noInfo, 'IO_FAILURE');
  },
};
