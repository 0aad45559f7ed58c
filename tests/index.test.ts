import * as fs from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { deobscureFile, mergeConfig, obscureFile, OverwriteDeclinedError, PRESET_DEFAULT } from '../src';
import { makeTempDir, removeDir } from './helpers';

describe('library helpers', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
    fs.writeFileSync(path.join(dir, 'tool.py'), 'import sys\nprint(sys.argv)\n');
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('round-trips a file', async () => {
    const obscured = await obscureFile(path.join(dir, 'tool.py'), 7777);
    const restored = await deobscureFile(obscured.outputPath, 7777);

    expect(fs.readFileSync(restored.outputPath, 'utf8')).toBe('import sys\nprint(sys.argv)\n');
  });

  it('refuses to replace an existing output unless told to', async () => {
    const existing = path.join(dir, 'tool_obscure.py');
    fs.writeFileSync(existing, 'existing');

    await expect(obscureFile('tool.py', 7777, { cwd: dir })).rejects.toBeInstanceOf(OverwriteDeclinedError);
    expect(fs.readFileSync(existing, 'utf8')).toBe('existing');

    await obscureFile('tool.py', 7777, { cwd: dir, overwrite: true });
    expect(fs.readFileSync(existing).length).toBe(27);
  });

  it('accepts other extensions through config', async () => {
    fs.writeFileSync(path.join(dir, 'notes.txt'), 'plain notes');
    const config = mergeConfig(PRESET_DEFAULT, { files: { extensions: ['.txt'] } });

    const result = await obscureFile('notes.txt', 1500, { cwd: dir, config });
    expect(result.outputPath).toBe(path.join(dir, 'notes_obscure.txt'));
  });
});
