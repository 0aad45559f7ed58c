/**
 * File processing
 *
 * One run, one file: check and read the input, transform it, get permission
 * before replacing an existing output, write, fingerprint both sides.
 * Either the output is fully written or nothing on disk changes.
 */

import type { ToolConfig } from './config';
import { OverwriteDeclinedError } from './errors';
import {
  outputPathFor,
  pathExists,
  readFileBytes,
  resolveInputPath,
  toTransformInput,
  writeFileAtomic,
} from './files';
import { fingerprintBytes, fingerprintFile } from './fingerprint';
import type { Logger } from './logger';
import { applyTransform, outputBytes } from './transforms';
import { FileFingerprints, MODE_VERB, ProcessResult, TransformRequest } from './types';
import { assertSeedInRange, checkExtension } from './validation';

/** Resolves true to replace `outputPath`. */
export type ConfirmOverwrite = (outputPath: string) => Promise<boolean>;

export interface ProcessDeps {
  config: ToolConfig;
  logger: Logger;
  confirmOverwrite: ConfirmOverwrite;
  /** Replace an existing output without asking */
  overwrite?: boolean;
  cwd?: string;
  now?: () => number;
}

export async function processFile(request: TransformRequest, deps: ProcessDeps): Promise<ProcessResult> {
  const { config } = deps;
  const now = deps.now ?? Date.now;
  const startTime = now();
  const log = deps.logger.child({ mode: request.mode });

  checkExtension(request.filePath, config.files.extensions);
  assertSeedInRange(request.seed, config.seed);
  const inputPath = await resolveInputPath(request.filePath, deps.cwd);

  log.debug('Reading input', { inputPath });
  const inputData = await readFileBytes(inputPath);

  let inputDigest: string | undefined;
  if (config.fingerprint.enabled) {
    inputDigest = fingerprintBytes(inputData, config.fingerprint.algorithm);
    log.info(`${config.fingerprint.algorithm} of original file (${inputPath}): ${inputDigest}`, {
      path: inputPath,
      digest: inputDigest,
    });
  }

  const output = applyTransform(toTransformInput(request.mode, inputData, inputPath), request.seed);
  const data = outputBytes(output);
  const outputPath = outputPathFor(inputPath, request.mode, config.files);

  if (await pathExists(outputPath)) {
    if (!deps.overwrite && !(await deps.confirmOverwrite(outputPath))) {
      log.info('Overwrite declined', { outputPath });
      throw new OverwriteDeclinedError(outputPath);
    }
    log.debug('Replacing existing output', { outputPath });
  }

  await writeFileAtomic(outputPath, data);

  let fingerprints: FileFingerprints | undefined;
  if (inputDigest !== undefined) {
    const outputDigest = await fingerprintFile(outputPath, config.fingerprint.algorithm);
    log.info(`${config.fingerprint.algorithm} of new file (${outputPath}): ${outputDigest}`, {
      path: outputPath,
      digest: outputDigest,
    });
    fingerprints = { algorithm: config.fingerprint.algorithm, input: inputDigest, output: outputDigest };
  }

  const elapsedMs = now() - startTime;
  log.info(`File ${outputPath} successfully ${MODE_VERB[request.mode]} in ${(elapsedMs / 1000).toFixed(2)} seconds.`, {
    inputPath,
    outputPath,
    elapsedMs,
  });

  return {
    mode: request.mode,
    inputPath,
    outputPath,
    bytesIn: inputData.length,
    bytesOut: data.length,
    elapsedMs,
    ...(fingerprints && { fingerprints }),
  };
}
