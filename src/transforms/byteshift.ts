/**
 * Byte Shift Codec
 *
 * Caesar-style shift over the 256-value byte alphabet. Obscure adds the seed
 * to every UTF-8 byte of the text, deobscure subtracts it, both modulo 256.
 * For a fixed seed the mapping is a bijection on [0, 255], so the round trip
 * is exact.
 *
 * Only `seed mod 256` matters: 1000 and 1256 are the same key. This hides
 * text from plain sight and nothing more.
 */

import { DecodingError, EncodingError, InputValidationError } from '../errors';
import { ObscuredContent, Seed } from '../types';

const BYTE_RANGE = 256;

const encoder = new TextEncoder();
// fatal: throw on malformed bytes instead of substituting U+FFFD
// ignoreBOM: a leading BOM is content and must survive the round trip
const decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

// Unpaired UTF-16 surrogates have no UTF-8 encoding
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

/** Effective shift for a seed, floored into [0, 255] so negative seeds work too. */
export function shiftFor(seed: Seed): number {
  if (!Number.isSafeInteger(seed)) {
    throw new InputValidationError(`Seed must be an integer, got ${seed}`);
  }
  return ((seed % BYTE_RANGE) + BYTE_RANGE) % BYTE_RANGE;
}

export function obscure(content: string, seed: Seed): ObscuredContent {
  if (typeof content !== 'string') {
    throw new EncodingError('Only text can be obscured');
  }
  const shift = shiftFor(seed);

  if (LONE_SURROGATE.test(content)) {
    throw new EncodingError('Text contains an unpaired surrogate and cannot be encoded as UTF-8');
  }

  const bytes = encoder.encode(content);
  const out = new Uint8Array(bytes.length);
  for (let i = 0; i < bytes.length; i++) {
    out[i] = (bytes[i] + shift) % BYTE_RANGE;
  }
  return out;
}

export function deobscure(content: ObscuredContent, seed: Seed): string {
  if (!(content instanceof Uint8Array)) {
    throw new InputValidationError('Only a byte sequence can be deobscured');
  }
  const shift = shiftFor(seed);

  const out = new Uint8Array(content.length);
  for (let i = 0; i < content.length; i++) {
    out[i] = (content[i] - shift + BYTE_RANGE) % BYTE_RANGE;
  }

  try {
    return decoder.decode(out);
  } catch (err) {
    throw new DecodingError(undefined, { cause: err });
  }
}
