import { stringArg } from './arguments.js';
import { capture } from './result.js';
import type { PlanStore } from '../storage/plan.js';
import type { FileContent } from './read_file_content.js';
import type { ToolDefinition, ToolArguments, ToolContext, ToolResult } from './types.js';

type NoPayload = Record<never, never>;

const noPayload = (): NoPayload => ({});
const emptyContent = (): FileContent => ({ content: '' });

export interface PlanTools {
  createPlan: ToolDefinition<NoPayload>;
  appendPlan: ToolDefinition<NoPayload>;
  readPlan: ToolDefinition<FileContent>;
}

export function createPlanTools(store: PlanStore): PlanTools {
  const createPlan: ToolDefinition<NoPayload> = {
    name: 'create_plan',
    description:
      'Create or replace the project action plan document. ' +
      'The document starts with a title and the current working directory.',
    parameters: {
      type: 'object',
      properties: {
        plan_content: { type: 'string', description: 'Body of the plan.' },
      },
      required: ['plan_content'],
    },
    failurePayload: noPayload,
    async execute(args: ToolArguments, ctx: ToolContext): Promise<ToolResult<NoPayload>> {
      const body = stringArg(args, 'plan_content');
      return capture(async () => {
        await store.create(ctx.cwd, body);
        return {};
      }, noPayload, 'IO_FAILURE');
    },
  };

  const appendPlan: ToolDefinition<NoPayload> = {
    name: 'append_plan',
    description:
      'Append a new line of content to the project action plan, creating the plan first if it does not exist.',
    parameters: {
      type: 'object',
      properties: {
        additional_content: { type: 'string', description: 'Content to append.' },
      },
      required: ['additional_content'],
    },
    failurePayload: noPayload,
    async execute(args: ToolArguments, ctx: ToolContext): Promise<ToolResult<NoPayload>> {
      const chunk = stringArg(args, 'additional_content');
      return capture(async () => {
        await store.append(ctx.cwd, chunk);
        return {};
      }, noPayload, 'IO_FAILURE');
    },
  };

  const readPlan: ToolDefinition<FileContent> = {
    name: 'read_plan',
    description: 'Read the current project action plan.',
    parameters: { type: 'object', properties: {}, required: [] },
    failurePayload: emptyContent,
    async execute(_args: ToolArguments, ctx: ToolContext): Promise<ToolResult<FileContent>> {
      return capture(async () => ({ content: await store.read(ctx.cwd) }), emptyContent, 'IO_FAILURE');
    },
  };

  return { createPlan, appendPlan, readPlan };
}
