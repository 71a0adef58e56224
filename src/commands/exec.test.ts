import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, realpath } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { rmSync } from 'node:fs';
import { catalogSummary, executeWords } from './exec.js';
import { createDefaultRegistry } from '../tools/registry.js';
import type { ToolRegistry } from '../tools/registry.js';

let tmpDir: string;
let registry: ToolRegistry;

beforeEach(async () => {
  tmpDir = await realpath(await mkdtemp(join(tmpdir(), 'toolbox-exec-test-')));
  registry = createDefaultRegistry({
    planPath: 'project_plan/action_plan.md',
    search: { endpoint: 'https://search.invalid/customsearch/v1', credentials: null },
  });
});

afterEach(() => {
  rmSync(tmpDir, { recursive: true, force: true });
});

describe('catalogSummary', () => {
  it('lists name and description only, in catalog order', () => {
    const summary = catalogSummary(registry);
    expect(summary).toHaveLength(12);
    expect(Object.keys(summary[0] ?? {})).toEqual(['name', 'description']);
    expect(summary.map((s) => s.name)).toEqual(registry.list().map((d) => d.name));
  });
});

describe('executeWords', () => {
  it('joins the words into one shell command', async () => {
    const result = await executeWords(registry, ['echo', 'one', 'two'], tmpDir);
    expect(result).toEqual({ stdout: 'one two\n', stderr: '', exit_code: 0, success: true });
  });

  it('runs in the given directory', async () => {
    const result = await executeWords(registry, ['pwd', '-P'], tmpDir);
    expect(result).toMatchObject({ stdout: `${tmpDir}\n`, success: true });
  });

  it('reports a non-zero exit code without failing the envelope', async () => {
    const result = await executeWords(registry, ['exit', '3'], tmpDir);
    expect(result).toEqual({ stdout: '', stderr: '', exit_code: 3, success: true });
  });
});
