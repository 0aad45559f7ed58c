// ── Transform types ─────────────────────────────────────────────────

export type Mode = 'obscure' | 'deobscure';

export const MODES: readonly Mode[] = ['obscure', 'deobscure'];

/** Past tense used in user-facing messages. */
export const MODE_VERB: Record<Mode, string> = {
  obscure: 'obscured',
  deobscure: 'deobscured',
};

/**
 * Four-digit key selecting the byte shift.
 * The boundary restricts it to [1000, 9999]; the codec accepts any integer.
 */
export type Seed = number;

/** Shifted UTF-8 bytes. Same length as the encoded plain text, not valid UTF-8 in general. */
export type ObscuredContent = Uint8Array;

/** Codec input, tagged with the direction it is meant for. */
export type TransformInput =
  | { mode: 'obscure'; content: string }
  | { mode: 'deobscure'; content: ObscuredContent };

export type TransformOutput =
  | { mode: 'obscure'; content: ObscuredContent }
  | { mode: 'deobscure'; content: string };

// ── Run types ───────────────────────────────────────────────────────

/** A fully resolved (mode, path, seed) tuple, ready for processing. */
export interface TransformRequest {
  mode: Mode;
  filePath: string;
  seed: Seed;
}

export type ResolveOutcome =
  | { kind: 'request'; request: TransformRequest }
  | { kind: 'cancelled' };

export interface FileFingerprints {
  algorithm: string;
  input: string;
  output: string;
}

export interface ProcessResult {
  mode: Mode;
  inputPath: string;
  outputPath: string;
  bytesIn: number;
  bytesOut: number;
  elapsedMs: number;
  /** Absent when fingerprints are disabled. */
  fingerprints?: FileFingerprints;
}
