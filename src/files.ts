import * as fs from 'fs';
import * as path from 'path';
import type { ToolConfig } from './config';
import { EncodingError, InputValidationError, IOError } from './errors';
import { Mode, TransformInput } from './types';

// Source text must be real UTF-8; a leading BOM is kept as content
const sourceDecoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/** Absolute path of an existing regular file. Relative paths resolve against `cwd`. */
export async function resolveInputPath(filePath: string, cwd: string = process.cwd()): Promise<string> {
  const absolute = path.resolve(cwd, filePath);
  let stat: fs.Stats;
  try {
    stat = await fs.promises.stat(absolute);
  } catch (err) {
    throw new InputValidationError(`File ${absolute} does not exist.`, { cause: err });
  }
  if (!stat.isFile()) {
    throw new InputValidationError(`${absolute} is not a regular file.`);
  }
  return absolute;
}

/** `dir/name.ext` -> `dir/name_obscure.ext` or `dir/name_deobscure.ext` */
export function outputPathFor(inputPath: string, mode: Mode, files: ToolConfig['files']): string {
  const { dir, name, ext } = path.parse(inputPath);
  const suffix = mode === 'obscure' ? files.obscureSuffix : files.deobscureSuffix;
  return path.join(dir, `${name}${suffix}${ext}`);
}

export async function readFileBytes(filePath: string): Promise<Buffer> {
  try {
    return await fs.promises.readFile(filePath);
  } catch (err) {
    throw new IOError(`Cannot read ${filePath}`, { cause: err, path: filePath });
  }
}

/** Tag file bytes for the codec: text for obscure, raw bytes for deobscure. */
export function toTransformInput(mode: Mode, data: Uint8Array, filePath: string): TransformInput {
  if (mode === 'deobscure') return { mode, content: data };

  try {
    return { mode, content: sourceDecoder.decode(data) };
  } catch (err) {
    throw new EncodingError(`${filePath} is not valid UTF-8 text`, { cause: err });
  }
}

export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Write through a temp file in the target's directory, then rename over the
 * target. Readers see the old file or the complete new one, never a partial
 * write; on failure the temp file is removed.
 */
export async function writeFileAtomic(target: string, data: Uint8Array): Promise<void> {
  const { dir, base } = path.parse(target);
  const temp = path.join(dir, `.${base}.${process.pid}.${Date.now()}.tmp`);

  try {
    await fs.promises.writeFile(temp, data, { flag: 'wx' });
    await fs.promises.rename(temp, target);
  } catch (err) {
    await fs.promises.rm(temp, { force: true });
    throw new IOError(`Cannot write ${target}`, { cause: err, path: target });
  }
}
