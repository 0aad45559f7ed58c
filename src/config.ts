import * as fs from 'fs';
import { z } from 'zod';
import { InputValidationError } from './errors';

export const DIGEST_ALGORITHMS = ['md5', 'sha1', 'sha256', 'sha512'] as const;
export type DigestAlgorithm = (typeof DIGEST_ALGORITHMS)[number];

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevelName = (typeof LOG_LEVELS)[number];

export interface ToolConfig {
  /** Accepted seed range at the command line */
  seed: {
    min: number;
    max: number;
  };

  /** Input policy and output naming */
  files: {
    /** Extensions accepted as input, with the leading dot. Compared case-sensitively. */
    extensions: string[];
    /** Appended to the input's base name when obscuring: `name.py` -> `name_obscure.py` */
    obscureSuffix: string;
    /** Appended to the input's base name when deobscuring */
    deobscureSuffix: string;
  };

  /** Audit log */
  log: {
    enabled: boolean;
    /** JSON-lines log file, relative paths resolve against the working directory */
    file: string;
    level: LogLevelName;
  };

  /** Content digests of the input and output files, written to the log */
  fingerprint: {
    enabled: boolean;
    algorithm: DigestAlgorithm;
  };

  /** Interactive prompts */
  prompt: {
    /** Clear the terminal before the first prompt */
    clearScreen: boolean;
    /** Answer that abandons the run at any prompt */
    quitKeyword: string;
  };
}

// ── Presets ──────────────────────────────────────────────────────────

export const PRESET_DEFAULT: ToolConfig = {
  seed: {
    min: 1000,
    max: 9999,
  },
  files: {
    extensions: ['.py'],
    obscureSuffix: '_obscure',
    deobscureSuffix: '_deobscure',
  },
  log: {
    enabled: true,
    file: 'byteveil.log',
    level: 'info',
  },
  fingerprint: {
    enabled: true,
    algorithm: 'md5',
  },
  prompt: {
    clearScreen: true,
    quitKeyword: 'q',
  },
};

/** Stronger digest and debug-level log lines, for when the log is kept as a record. */
export const PRESET_AUDIT: ToolConfig = {
  ...PRESET_DEFAULT,
  log: {
    ...PRESET_DEFAULT.log,
    level: 'debug',
  },
  fingerprint: {
    enabled: true,
    algorithm: 'sha256',
  },
};

export const PRESETS: Record<string, ToolConfig> = {
  default: PRESET_DEFAULT,
  audit: PRESET_AUDIT,
};

export function isPresetName(name: string): boolean {
  return Object.hasOwn(PRESETS, name);
}

export function unknownPreset(name: string): InputValidationError {
  return new InputValidationError(
    `Unknown preset "${name}". Available presets: ${Object.keys(PRESETS).join(', ')}`,
  );
}

// ── Merging ──────────────────────────────────────────────────────────

export type ConfigOverrides = {
  [K in keyof ToolConfig]?: Partial<ToolConfig[K]>;
};

export function mergeConfig(resolved: ToolConfig, overrides: ConfigOverrides): ToolConfig {
  const files = { ...resolved.files, ...overrides.files };
  return {
    seed: { ...resolved.seed, ...overrides.seed },
    files: { ...files, extensions: [...files.extensions] },
    log: { ...resolved.log, ...overrides.log },
    fingerprint: { ...resolved.fingerprint, ...overrides.fingerprint },
    prompt: { ...resolved.prompt, ...overrides.prompt },
  };
}

// ── Validation ───────────────────────────────────────────────────────

const seedSchema = z.object({
  min: z.number().int().min(0),
  max: z.number().int().min(0),
});

const filesSchema = z.object({
  extensions: z.array(z.string().regex(/^\.[^./\\]+$/, 'must look like ".py"')).min(1),
  obscureSuffix: z.string().min(1),
  deobscureSuffix: z.string().min(1),
});

const logSchema = z.object({
  enabled: z.boolean(),
  file: z.string().min(1),
  level: z.enum(LOG_LEVELS),
});

const fingerprintSchema = z.object({
  enabled: z.boolean(),
  algorithm: z.enum(DIGEST_ALGORITHMS),
});

const promptSchema = z.object({
  clearScreen: z.boolean(),
  quitKeyword: z.string().min(1),
});

export const toolConfigSchema = z
  .object({
    seed: seedSchema,
    files: filesSchema,
    log: logSchema,
    fingerprint: fingerprintSchema,
    prompt: promptSchema,
  })
  .superRefine((config, ctx) => {
    if (config.seed.min > config.seed.max) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['seed', 'min'],
        message: `must not exceed seed.max (${config.seed.max})`,
      });
    }
    if (config.files.obscureSuffix === config.files.deobscureSuffix) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['files', 'deobscureSuffix'],
        message: 'must differ from files.obscureSuffix',
      });
    }
  });

/** Shape of a `--config` file: any subset of the sections, unknown keys rejected. */
export const configFileSchema = z
  .object({
    seed: seedSchema.partial().strict(),
    files: filesSchema.partial().strict(),
    log: logSchema.partial().strict(),
    fingerprint: fingerprintSchema.partial().strict(),
    prompt: promptSchema.partial().strict(),
  })
  .partial()
  .strict();

function formatPath(path: (string | number)[]): string {
  let out = '';
  for (const part of path) {
    if (typeof part === 'number') out += `[${part}]`;
    else out += out ? `.${part}` : part;
  }
  return out || '(root)';
}

function toIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => `${formatPath(issue.path)}: ${issue.message}`);
}

export function validateConfig(config: ToolConfig): ToolConfig {
  const result = toolConfigSchema.safeParse(config);
  if (!result.success) {
    throw new InputValidationError('Configuration is invalid', { issues: toIssues(result.error) });
  }
  return result.data;
}

/** Parse the contents of a JSON config file into overrides. */
export function parseConfigFile(text: string, source = 'config file'): ConfigOverrides {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new InputValidationError(`${source} is not valid JSON`, { cause: err });
  }

  const result = configFileSchema.safeParse(raw);
  if (!result.success) {
    throw new InputValidationError(`${source} has invalid settings`, { issues: toIssues(result.error) });
  }
  return result.data;
}

export function loadConfigFile(filePath: string): ConfigOverrides {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new InputValidationError(`Cannot read config file ${filePath}`, { cause: err });
  }
  return parseConfigFile(text, filePath);
}

// ── Environment ──────────────────────────────────────────────────────

export function isLogLevel(value: string): value is LogLevelName {
  return LOG_LEVELS.some(level => level === value);
}

export function isDigestAlgorithm(value: string): value is DigestAlgorithm {
  return DIGEST_ALGORITHMS.some(algorithm => algorithm === value);
}

/** `BYTEVEIL_LOG_FILE` and `BYTEVEIL_LOG_LEVEL` */
export function envOverrides(env: NodeJS.ProcessEnv): ConfigOverrides {
  const log: Partial<ToolConfig['log']> = {};

  const file = env.BYTEVEIL_LOG_FILE;
  if (file) log.file = file;

  const level = env.BYTEVEIL_LOG_LEVEL?.toLowerCase();
  if (level) {
    if (!isLogLevel(level)) {
      throw new InputValidationError(
        `BYTEVEIL_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${env.BYTEVEIL_LOG_LEVEL}"`,
      );
    }
    log.level = level;
  }

  return Object.keys(log).length ? { log } : {};
}

export interface ResolveConfigOptions {
  preset: string;
  configFile: string | null;
  env: NodeJS.ProcessEnv;
  /** Command-line flags, applied last */
  overrides: ConfigOverrides;
}

/** preset < config file < environment < command-line flags */
export function resolveConfig(opts: ResolveConfigOptions): ToolConfig {
  if (!isPresetName(opts.preset)) throw unknownPreset(opts.preset);

  let config = PRESETS[opts.preset];
  if (opts.configFile) config = mergeConfig(config, loadConfigFile(opts.configFile));
  config = mergeConfig(config, envOverrides(opts.env));
  config = mergeConfig(config, opts.overrides);

  return validateConfig(config);
}
