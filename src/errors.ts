/**
 * Error taxonomy
 *
 * Every failure a run can hit maps to one of these categories. The runner
 * prints the category ahead of the message so a wrong seed never reads like
 * a disk problem.
 */

export type ErrorCode = 'input_validation' | 'encoding' | 'decoding' | 'io';

export interface ByteveilErrorOptions {
  cause?: unknown;
}

export abstract class ByteveilError extends Error {
  abstract readonly code: ErrorCode;
  /** Human label printed before the message. */
  abstract readonly category: string;

  constructor(message: string, options: ByteveilErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
  }
}

/** Bad path, extension, seed, mode, option or config file. Raised before the codec runs. */
export class InputValidationError extends ByteveilError {
  readonly code = 'input_validation';
  readonly category = 'Invalid input';
  readonly issues: string[];

  constructor(message: string, options: ByteveilErrorOptions & { issues?: string[] } = {}) {
    super(message, options);
    this.issues = options.issues ?? [];
  }
}

export class EncodingError extends ByteveilError {
  readonly code = 'encoding';
  readonly category = 'Encoding error';
}

export class DecodingError extends ByteveilError {
  readonly code = 'decoding';
  readonly category = 'Decoding error';

  constructor(
    message = 'Content is not valid UTF-8 after deobscuring (wrong seed or corrupted content)',
    options: ByteveilErrorOptions = {},
  ) {
    super(message, options);
  }
}

export class IOError extends ByteveilError {
  readonly code = 'io';
  readonly category = 'I/O error';
  readonly path?: string;

  constructor(message: string, options: ByteveilErrorOptions & { path?: string } = {}) {
    super(message, options);
    this.path = options.path;
  }
}

/** The output exists and the user said no. Nothing has been written. */
export class OverwriteDeclinedError extends IOError {
  readonly reason = 'overwrite_declined';

  constructor(outputPath: string) {
    super(`Not overwriting existing file ${outputPath}`, { path: outputPath });
  }
}

export function isByteveilError(value: unknown): value is ByteveilError {
  return value instanceof ByteveilError;
}

/** Categorized description of any thrown value, with validation issues on their own lines. */
export function describeError(err: unknown): string {
  if (isByteveilError(err)) {
    const lines = [`${err.category}: ${err.message}`];
    if (err instanceof InputValidationError) {
      for (const issue of err.issues) lines.push(`  - ${issue}`);
    }
    return lines.join('\n');
  }
  if (err instanceof Error) return `Unexpected error: ${err.message}`;
  return `Unexpected error: ${String(err)}`;
}
