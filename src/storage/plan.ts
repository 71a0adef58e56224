import { readFile, writeFile, appendFile, mkdir, access } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import type { KeyedLock } from '../utils/lock.js';

export const PLAN_TITLE = '# Project Action Plan';

export function planHeader(workingDirectory: string): string {
  return `${PLAN_TITLE}\n\nWorking Directory: ${workingDirectory}\n\n`;
}

async function exists(path: string): Promise<boolean> {
  return access(path).then(
    () => true,
    () => false
  );
}

/**
 * The single plan document, at `relativePath` under whichever working
 * directory a call names. Every read and write of one absolute path runs under
 * the shared lock, so concurrent creates and appends from this process never
 * interleave. Other processes writing the same file are not coordinated.
 */
export class PlanStore {
  constructor(
    private readonly relativePath: string,
    private readonly lock: KeyedLock
  ) {}

  pathFor(cwd: string): string {
    return resolve(cwd, this.relativePath);
  }

  /** Replaces the document, stamping `cwd` as its working directory. */
  async create(cwd: string, body: string): Promise<void> {
    const path = this.pathFor(cwd);
    await this.lock.run(path, async () => {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(path, planHeader(resolve(cwd)) + body, 'utf8');
    });
  }

  /** Appends `"\n" + chunk`, writing the header first when the document is new. */
  async append(cwd: string, chunk: string): Promise<void> {
    const path = this.pathFor(cwd);
    await this.lock.run(path, async () => {
      if (!(await exists(path))) {
        await mkdir(dirname(path), { recursive: true });
        await writeFile(path, planHeader(resolve(cwd)), 'utf8');
      }
      await appendFile(path, `\n${chunk}`, 'utf8');
    });
  }

  async read(cwd: string): Promise<string> {
    const path = this.pathFor(cwd);
    return this.lock.run(path, () => readFile(path, 'utf8'));
  }
}
