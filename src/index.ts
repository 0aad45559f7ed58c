/**
 * byteveil - Library Entry Point
 *
 * Can be used as:
 * 1. A Node.js library: import { obscure, deobscure, obscureFile } from 'byteveil'
 * 2. A CLI tool: byteveil o script.py 4821
 */

export type {
  Mode, Seed, ObscuredContent, TransformInput, TransformOutput,
  TransformRequest, ResolveOutcome, ProcessResult, FileFingerprints,
} from './types';
export { MODES, MODE_VERB } from './types';
export { obscure, deobscure, shiftFor, applyTransform, outputBytes } from './transforms';
export {
  ByteveilError, InputValidationError, EncodingError, DecodingError, IOError,
  OverwriteDeclinedError, isByteveilError, describeError,
} from './errors';
export type { ErrorCode } from './errors';
export {
  PRESETS, PRESET_DEFAULT, PRESET_AUDIT, isPresetName,
  mergeConfig, resolveConfig, validateConfig, parseConfigFile, loadConfigFile,
} from './config';
export type { ToolConfig, ConfigOverrides, DigestAlgorithm, LogLevelName } from './config';
export { PinoLogger, NullLogger, createFileLogger } from './logger';
export type { Logger, LogMeta } from './logger';
export { fingerprintBytes, fingerprintFile } from './fingerprint';
export { outputPathFor } from './files';
export { parseMode, parseSeed } from './validation';
export { processFile } from './process';
export type { ProcessDeps, ConfirmOverwrite } from './process';
export { run } from './run';

import type { ToolConfig } from './config';
import { PRESET_DEFAULT } from './config';
import type { Logger } from './logger';
import { NullLogger } from './logger';
import { processFile } from './process';
import { Mode, ProcessResult, Seed } from './types';

export interface FileTransformOptions {
  config?: ToolConfig;
  logger?: Logger;
  /** Replace an existing output. Without it an existing output aborts the call. */
  overwrite?: boolean;
  cwd?: string;
}

function transformFile(mode: Mode, filePath: string, seed: Seed, options: FileTransformOptions): Promise<ProcessResult> {
  return processFile(
    { mode, filePath, seed },
    {
      config: options.config ?? PRESET_DEFAULT,
      logger: options.logger ?? new NullLogger(),
      confirmOverwrite: async () => false,
      overwrite: options.overwrite ?? false,
      cwd: options.cwd,
    },
  );
}

/**
 * Obscure a file on disk, writing `name_obscure.ext` beside it.
 */
export function obscureFile(filePath: string, seed: Seed, options: FileTransformOptions = {}): Promise<ProcessResult> {
  return transformFile('obscure', filePath, seed, options);
}

export function deobscureFile(filePath: string, seed: Seed, options: FileTransformOptions = {}): Promise<ProcessResult> {
  return transformFile('deobscure', filePath, seed, options);
}
