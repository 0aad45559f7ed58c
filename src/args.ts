import { ConfigOverrides, DIGEST_ALGORITHMS, PRESETS, isDigestAlgorithm, isPresetName, unknownPreset } from './config';
import { InputValidationError } from './errors';

export interface CLIArgs {
  mode?: string;
  file?: string;
  seed?: string;
  preset: string;
  configFile: string | null;
  overrides: ConfigOverrides;
  /** -y / --yes: replace an existing output without asking */
  overwrite: boolean;
}

export type ParsedArgs =
  | { kind: 'run'; args: CLIArgs }
  | { kind: 'help' }
  | { kind: 'list-presets' };

/** Parse `process.argv`-shaped input (node binary and script path first). */
export function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);
  const positionals: string[] = [];
  let preset = 'default';
  let configFile: string | null = null;
  let overwrite = false;
  const overrides: ConfigOverrides = {};

  const valueFor = (flag: string, i: number): string => {
    const value = args[i];
    if (value === undefined || value.startsWith('-')) {
      throw new InputValidationError(`Option ${flag} requires a value`);
    }
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '-h' || arg === '--help') {
      return { kind: 'help' };
    } else if (arg === '--list-presets') {
      return { kind: 'list-presets' };
    } else if (arg === '-c' || arg === '--config') {
      configFile = valueFor(arg, ++i);
    } else if (arg === '-p' || arg === '--preset') {
      preset = valueFor(arg, ++i);
      if (!isPresetName(preset)) throw unknownPreset(preset);
    } else if (arg === '-y' || arg === '--yes') {
      overwrite = true;
    } else if (arg === '--log-file') {
      overrides.log = { ...overrides.log, file: valueFor(arg, ++i) };
    } else if (arg === '--no-log') {
      overrides.log = { ...overrides.log, enabled: false };
    } else if (arg === '--fingerprint') {
      const algorithm = valueFor(arg, ++i).toLowerCase();
      if (!isDigestAlgorithm(algorithm)) {
        throw new InputValidationError(
          `Unknown digest "${algorithm}". Expected one of ${DIGEST_ALGORITHMS.join(', ')}`,
        );
      }
      overrides.fingerprint = { ...overrides.fingerprint, enabled: true, algorithm };
    } else if (arg === '--no-fingerprint') {
      overrides.fingerprint = { ...overrides.fingerprint, enabled: false };
    } else if (arg === '--no-clear') {
      overrides.prompt = { ...overrides.prompt, clearScreen: false };
    } else if (arg.startsWith('-') && arg !== '-') {
      throw new InputValidationError(`Unknown option ${arg}`);
    } else {
      positionals.push(arg);
    }
  }

  if (positionals.length > 3) {
    throw new InputValidationError(`Unexpected argument ${positionals[3]}`);
  }
  const [mode, file, seed] = positionals;

  return { kind: 'run', args: { mode, file, seed, preset, configFile, overrides, overwrite } };
}

export function helpText(): string {
  return `
byteveil - obscure or deobscure source files with a reversible byte shift

This is security through obscurity: it hides code from plain sight and is
not encryption.

Usage:
  byteveil [o|d] [file] [seed] [options]

  Missing arguments are asked for interactively. Type 'q' at any prompt to quit.

Arguments:
  o|d                     "o" to obscure, "d" to deobscure
  file                    Source file to process (default extension: .py)
  seed                    Four-digit initial code, 1000 to 9999

Options:
  -c, --config <file>     JSON config file (overrides preset)
  -p, --preset <name>     Preset: ${Object.keys(PRESETS).join(', ')} (default: default)
  -y, --yes               Overwrite an existing output file without asking
  --log-file <file>       Audit log file (default: byteveil.log)
  --no-log                Do not write the audit log
  --fingerprint <alg>     Digest for file fingerprints: ${DIGEST_ALGORITHMS.join(', ')}
  --no-fingerprint        Do not fingerprint input and output
  --no-clear              Do not clear the screen before prompting
  --list-presets          List available presets
  -h, --help              Show this help

Environment:
  BYTEVEIL_LOG_FILE       Audit log file
  BYTEVEIL_LOG_LEVEL      debug, info, warn or error

Output:
  name.py -> name_obscure.py (obscure) or name_deobscure.py (deobscure)

Examples:
  byteveil o script.py 4821
  byteveil d script_obscure.py 4821
  byteveil o script.py 4821 --yes --fingerprint sha256
  byteveil
`;
}
