import * as fs from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { mergeConfig, PRESET_DEFAULT } from '../src/config';
import { DecodingError, EncodingError, InputValidationError, OverwriteDeclinedError } from '../src/errors';
import { fingerprintBytes } from '../src/fingerprint';
import { processFile, ProcessDeps } from '../src/process';
import { makeTempDir, removeDir, RecordingLogger } from './helpers';

const SOURCE = "print('hi')\n";

describe('processFile', () => {
  let dir: string;
  let logger: RecordingLogger;

  const deps = (overrides: Partial<ProcessDeps> = {}): ProcessDeps => ({
    config: PRESET_DEFAULT,
    logger,
    confirmOverwrite: async () => {
      throw new Error('confirmOverwrite should not be called');
    },
    cwd: dir,
    ...overrides,
  });

  beforeEach(() => {
    dir = makeTempDir();
    logger = new RecordingLogger();
    fs.writeFileSync(path.join(dir, 'hello.py'), SOURCE);
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('obscures a file into name_obscure.ext', async () => {
    const result = await processFile({ mode: 'obscure', filePath: 'hello.py', seed: 1234 }, deps());

    const outputPath = path.join(dir, 'hello_obscure.py');
    expect(result.outputPath).toBe(outputPath);
    expect(result.inputPath).toBe(path.join(dir, 'hello.py'));
    expect(result.bytesIn).toBe(12);
    expect(result.bytesOut).toBe(12);
    // 1234 mod 256 = 210; the trailing newline (10) becomes 220
    expect(Array.from(fs.readFileSync(outputPath))).toEqual([66, 68, 59, 64, 70, 250, 249, 58, 59, 249, 251, 220]);
  });

  it('round-trips through deobscure into name_obscure_deobscure.ext', async () => {
    await processFile({ mode: 'obscure', filePath: 'hello.py', seed: 9999 }, deps());
    const result = await processFile({ mode: 'deobscure', filePath: 'hello_obscure.py', seed: 9999 }, deps());

    expect(result.outputPath).toBe(path.join(dir, 'hello_obscure_deobscure.py'));
    expect(fs.readFileSync(result.outputPath, 'utf8')).toBe(SOURCE);
    expect(result.fingerprints?.output).toBe(fingerprintBytes(Buffer.from(SOURCE), 'md5'));
  });

  it('round-trips multibyte text byte for byte', async () => {
    const text = '# -*- coding: utf-8 -*-\nname = "Zoë 🐍"\r\n';
    fs.writeFileSync(path.join(dir, 'uni.py'), text);

    await processFile({ mode: 'obscure', filePath: 'uni.py', seed: 1000 }, deps());
    await processFile({ mode: 'deobscure', filePath: 'uni_obscure.py', seed: 1000 }, deps());

    expect(fs.readFileSync(path.join(dir, 'uni_obscure_deobscure.py'))).toEqual(Buffer.from(text, 'utf8'));
  });

  it('records fingerprints of both files', async () => {
    const result = await processFile({ mode: 'obscure', filePath: 'hello.py', seed: 1234 }, deps());

    const outputBytes = fs.readFileSync(result.outputPath);
    expect(result.fingerprints).toEqual({
      algorithm: 'md5',
      input: fingerprintBytes(Buffer.from(SOURCE), 'md5'),
      output: fingerprintBytes(outputBytes, 'md5'),
    });

    const digests = logger.records.filter(record => record.meta.digest !== undefined);
    expect(digests.map(record => record.meta.path)).toEqual([result.inputPath, result.outputPath]);
    expect(digests.every(record => record.meta.mode === 'obscure')).toBe(true);
  });

  it('skips fingerprints when disabled', async () => {
    const config = mergeConfig(PRESET_DEFAULT, { fingerprint: { enabled: false } });
    const result = await processFile({ mode: 'obscure', filePath: 'hello.py', seed: 1234 }, deps({ config }));
    expect(result.fingerprints).toBeUndefined();
  });

  it('reports elapsed time from the injected clock', async () => {
    const now = vi.fn().mockReturnValueOnce(1_000).mockReturnValueOnce(3_500);
    const result = await processFile({ mode: 'obscure', filePath: 'hello.py', seed: 1234 }, deps({ now }));

    expect(result.elapsedMs).toBe(2_500);
    const success = logger.records.find(record => record.message.startsWith('File '));
    expect(success?.message).toBe(`File ${result.outputPath} successfully obscured in 2.50 seconds.`);
  });

  describe('existing output', () => {
    let outputPath: string;

    beforeEach(() => {
      outputPath = path.join(dir, 'hello_obscure.py');
      fs.writeFileSync(outputPath, 'keep me');
    });

    it('leaves the existing file untouched when the user declines', async () => {
      const confirmOverwrite = vi.fn(async (_outputPath: string) => false);

      await expect(
        processFile({ mode: 'obscure', filePath: 'hello.py', seed: 1234 }, deps({ confirmOverwrite })),
      ).rejects.toBeInstanceOf(OverwriteDeclinedError);

      expect(confirmOverwrite).toHaveBeenCalledWith(outputPath);
      expect(fs.readFileSync(outputPath, 'utf8')).toBe('keep me');
      expect(fs.readdirSync(dir).sort()).toEqual(['hello.py', 'hello_obscure.py']);
    });

    it('replaces the file when the user agrees', async () => {
      const confirmOverwrite = vi.fn(async (_outputPath: string) => true);

      await processFile({ mode: 'obscure', filePath: 'hello.py', seed: 1234 }, deps({ confirmOverwrite }));

      expect(confirmOverwrite).toHaveBeenCalledTimes(1);
      expect(fs.readFileSync(outputPath)).toHaveLength(12);
    });

    it('replaces the file without asking when overwrite is forced', async () => {
      await processFile({ mode: 'obscure', filePath: 'hello.py', seed: 1234 }, deps({ overwrite: true }));
      expect(fs.readFileSync(outputPath, 'utf8')).not.toBe('keep me');
    });
  });

  describe('failures', () => {
    it('rejects a wrong seed with DecodingError and writes nothing', async () => {
      fs.writeFileSync(path.join(dir, 'bad_obscure.py'), Uint8Array.of(0xff, 0xfe));

      await expect(
        processFile({ mode: 'deobscure', filePath: 'bad_obscure.py', seed: 1024 }, deps()),
      ).rejects.toBeInstanceOf(DecodingError);
      expect(fs.existsSync(path.join(dir, 'bad_obscure_deobscure.py'))).toBe(false);
    });

    it('rejects a source file that is not UTF-8', async () => {
      fs.writeFileSync(path.join(dir, 'latin.py'), Uint8Array.of(0x63, 0x61, 0x66, 0xe9));
      await expect(
        processFile({ mode: 'obscure', filePath: 'latin.py', seed: 1234 }, deps()),
      ).rejects.toBeInstanceOf(EncodingError);
    });

    it('rejects a wrong extension before reading', async () => {
      await expect(
        processFile({ mode: 'obscure', filePath: 'notes.txt', seed: 1234 }, deps()),
      ).rejects.toThrow('Invalid file extension ".txt"');
    });

    it('rejects a seed outside the configured range', async () => {
      await expect(
        processFile({ mode: 'obscure', filePath: 'hello.py', seed: 42 }, deps()),
      ).rejects.toBeInstanceOf(InputValidationError);
    });

    it('rejects a missing input', async () => {
      await expect(
        processFile({ mode: 'obscure', filePath: 'missing.py', seed: 1234 }, deps()),
      ).rejects.toThrow(`File ${path.join(dir, 'missing.py')} does not exist.`);
    });
  });
});
