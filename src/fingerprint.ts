import { createHash } from 'crypto';
import * as fs from 'fs';
import type { DigestAlgorithm } from './config';
import { IOError } from './errors';

/**
 * Hex digest of some bytes. Used for change detection in the audit log;
 * md5 and sha1 are fine for that and for nothing security-related.
 */
export function fingerprintBytes(data: Uint8Array, algorithm: DigestAlgorithm): string {
  return createHash(algorithm).update(data).digest('hex');
}

export async function fingerprintFile(filePath: string, algorithm: DigestAlgorithm): Promise<string> {
  let data: Buffer;
  try {
    data = await fs.promises.readFile(filePath);
  } catch (err) {
    throw new IOError(`Cannot read ${filePath} for fingerprinting`, { cause: err, path: filePath });
  }
  return fingerprintBytes(data, algorithm);
}
