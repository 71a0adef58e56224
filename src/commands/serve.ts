import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { bootstrap } from './setup.js';
import { createServer } from '../server.js';
import { logger } from '../utils/logger.js';
import { printError } from '../ui/renderer.js';
import { ToolboxError } from '../utils/errors.js';
import type { CliOverrides } from '../config/schema.js';

export async function runServe(version: string, options: CliOverrides = {}): Promise<void> {
  try {
    const { registry } = await bootstrap(options);
    const server = createServer(registry, { version, context: { cwd: process.cwd() } });
    const transport = new StdioServerTransport();
    await server.connect(transport);
    logger.info(`toolbox server running on stdio (${registry.list().length} tools)`);
  } catch (err) {
    const toolboxErr = ToolboxError.fromUnknown(err);
    await printError(`Failed to start server: ${toolboxErr.message}`);
    process.exit(1);
  }
}
