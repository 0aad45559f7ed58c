/**
 * Transform dispatch
 *
 * Picks the codec direction from the tagged input. Keeping the tag on both
 * input and output lets the caller write text or bytes without re-checking
 * the mode.
 */

import { Seed, TransformInput, TransformOutput } from '../types';
import { obscure, deobscure } from './byteshift';

export { obscure, deobscure, shiftFor } from './byteshift';

export function applyTransform(input: TransformInput, seed: Seed): TransformOutput {
  switch (input.mode) {
    case 'obscure':
      return { mode: 'obscure', content: obscure(input.content, seed) };
    case 'deobscure':
      return { mode: 'deobscure', content: deobscure(input.content, seed) };
  }
}

/** Bytes to write for a transform result. Deobscured text goes back out as UTF-8. */
export function outputBytes(output: TransformOutput): Uint8Array {
  return output.mode === 'obscure' ? output.content : Buffer.from(output.content, 'utf8');
}
