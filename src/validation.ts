import * as path from 'path';
import type { ToolConfig } from './config';
import { InputValidationError } from './errors';
import { Mode, Seed } from './types';

const MODE_ALIASES: Record<string, Mode> = {
  o: 'obscure',
  obscure: 'obscure',
  d: 'deobscure',
  deobscure: 'deobscure',
};

export function parseMode(text: string): Mode {
  const key = text.trim().toLowerCase();
  if (!Object.hasOwn(MODE_ALIASES, key)) {
    throw new InputValidationError(`Mode must be "o" (obscure) or "d" (deobscure), got "${text}"`);
  }
  return MODE_ALIASES[key];
}

export function assertSeedInRange(seed: Seed, range: ToolConfig['seed']): Seed {
  if (!Number.isSafeInteger(seed) || seed < range.min || seed > range.max) {
    throw new InputValidationError(`The seed must be a number from ${range.min} to ${range.max}, got ${seed}`);
  }
  return seed;
}

/** Exactly four decimal digits, surrounding whitespace ignored, within the configured range. */
export function parseSeed(text: string, range: ToolConfig['seed']): Seed {
  const trimmed = text.trim();
  if (!/^\d{4}$/.test(trimmed)) {
    throw new InputValidationError(`The seed must be a four-digit number, got "${text}"`);
  }
  return assertSeedInRange(Number.parseInt(trimmed, 10), range);
}

export function checkExtension(filePath: string, extensions: readonly string[]): void {
  const ext = path.extname(filePath);
  if (!extensions.includes(ext)) {
    throw new InputValidationError(
      `Invalid file extension "${ext}" for ${filePath}. Expected ${extensions.join(' or ')}`,
    );
  }
}
