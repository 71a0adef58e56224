import type { ChalkInstance } from 'chalk';
import type { ToolDescriptor } from '../tools/types.js';

let chalkInstance: ChalkInstance | null = null;

async function getChalk(): Promise<ChalkInstance> {
  if (!chalkInstance) {
    const mod = await import('chalk');
    chalkInstance = mod.default;
  }
  return chalkInstance;
}

export function formatJson(value: unknown): string {
  return JSON.stringify(value, null, 2) + '\n';
}

export function printJson(value: unknown): void {
  process.stdout.write(formatJson(value));
}

/** One block per tool: name, description, then each parameter on its own line. */
export async function renderToolTable(tools: readonly ToolDescriptor[]): Promise<string> {
  const ck = await getChalk();
  const blocks = tools.map((tool) => {
    const lines = [ck.bold(tool.name), `  ${tool.description}`];
    for (const p of tool.parameters) {
      const flags = [p.type, p.required ? 'required' : 'optional'];
      if (p.default !== undefined) flags.push(`default ${JSON.stringify(p.default)}`);
      if (p.enum !== undefined) flags.push(`one of ${p.enum.join('|')}`);
      lines.push(`  ${ck.cyan(p.name)} ${ck.dim(`(${flags.join(', ')})`)} ${p.description}`);
    }
    return lines.join('\n');
  });
  return blocks.join('\n\n') + '\n';
}

export async function printError(message: string): Promise<void> {
  const ck = await getChalk();
  process.stderr.write(ck.red(`Error: ${message}`) + '\n');
}
