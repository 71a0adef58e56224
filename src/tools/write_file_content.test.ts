import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { rmSync } from 'node:fs';
import { writeFileContentTool, appendToFileTool } from './write_file_content.js';
import { readFileContentTool } from './read_file_content.js';
import type { ToolContext } from './types.js';

let tmpDir: string;
let ctx: ToolContext;

beforeEach(async () => {
  tmpDir = await mkdtemp(join(tmpdir(), 'toolbox-write-test-'));
  ctx = { cwd: tmpDir };
});

afterEach(() => {
  rmSync(tmpDir, { recursive: true, force: true });
});

describe('write_file_content tool', () => {
  it('writes a new file in overwrite mode', async () => {
    const result = await writeFileContentTool.execute(
      { file_path: 'output.txt', content: 'hello', mode: 'overwrite' },
      ctx
    );
    expect(result).toEqual({ success: true });
    expect(await readFile(join(tmpDir, 'output.txt'), 'utf8')).toBe('hello');
  });

  it('round-trips through read_file_content', async () => {
    await writeFileContentTool.execute({ file_path: 'rt.txt', content: 'hello', mode: 'overwrite' }, ctx);
    const read = await readFileContentTool.execute({ file_path: 'rt.txt' }, ctx);
    expect(read).toEqual({ content: 'hello', success: true });
  });

  it('overwrites existing file content', async () => {
    await writeFileContentTool.execute({ file_path: 'out.txt', content: 'original', mode: 'overwrite' }, ctx);
    await writeFileContentTool.execute({ file_path: 'out.txt', content: 'replaced', mode: 'overwrite' }, ctx);
    expect(await readFile(join(tmpDir, 'out.txt'), 'utf8')).toBe('replaced');
  });

  it('appends to an existing file when mode is "append"', async () => {
    await writeFileContentTool.execute({ file_path: 'log.txt', content: 'line1\n', mode: 'overwrite' }, ctx);
    await writeFileContentTool.execute({ file_path: 'log.txt', content: 'line2\n', mode: 'append' }, ctx);
    expect(await readFile(join(tmpDir, 'log.txt'), 'utf8')).toBe('line1\nline2\n');
  });

  it('creates parent directories automatically', async () => {
    await writeFileContentTool.execute({ file_path: 'a/b/c/file.txt', content: 'nested', mode: 'overwrite' }, ctx);
    expect(await readFile(join(tmpDir, 'a', 'b', 'c', 'file.txt'), 'utf8')).toBe('nested');
  });

  it('writes an empty string', async () => {
    const result = await writeFileContentTool.execute({ file_path: 'empty.txt', content: '', mode: 'overwrite' }, ctx);
    expect(result).toEqual({ success: true });
    expect(await readFile(join(tmpDir, 'empty.txt'), 'utf8')).toBe('');
  });

  it('fails when the target is a directory', async () => {
    await mkdir(join(tmpDir, 'taken'));
    const result = await writeFileContentTool.execute({ file_path: 'taken', content: 'x', mode: 'overwrite' }, ctx);
    expect(result).toEqual({
      success: false,
      error: `EISDIR: illegal operation on a directory, open '${join(tmpDir, 'taken')}'`,
      code: 'IO_FAILURE',
    });
  });
});

describe('append_to_file tool', () => {
  it('creates the file when absent and appends afterwards', async () => {
    expect(await appendToFileTool.execute({ file_path: 'notes.md', content: 'a' }, ctx)).toEqual({
      success: true,
    });
    await appendToFileTool.execute({ file_path: 'notes.md', content: 'b' }, ctx);
    expect(await readFile(join(tmpDir, 'notes.md'), 'utf8')).toBe('ab');
  });

  it('reports the same failure as write_file_content', async () => {
    await mkdir(join(tmpDir, 'taken'));
    const result = await appendToFileTool.execute({ file_path: 'taken', content: 'x' }, ctx);
    expect(result).toMatchObject({ success: false, code: 'IO_FAILURE' });
  });
});
