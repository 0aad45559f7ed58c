import { helpText, parseArgs, ParsedArgs } from './args';
import { PRESETS, resolveConfig, ToolConfig } from './config';
import { describeError, isByteveilError, OverwriteDeclinedError } from './errors';
import { Logger, NullLogger } from './logger';
import { processFile } from './process';
import { createOverwriteConfirmer, Prompter, resolveRequest, Terminal } from './prompt';
import { MODE_VERB } from './types';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export interface RunIO {
  terminal: Terminal;
  prompter: Prompter;
  env: NodeJS.ProcessEnv;
  cwd: string;
  /** Opens the audit log; only called when logging is enabled. */
  createLogger(options: ToolConfig['log']): Logger;
  now?: () => number;
}

/**
 * Run one invocation end to end and return the process exit code.
 * Every failure is caught here and reported with its category.
 */
export async function run(argv: string[], io: RunIO): Promise<number> {
  const { terminal } = io;

  let parsed: ParsedArgs;
  try {
    parsed = parseArgs(argv);
  } catch (err) {
    terminal.error(describeError(err));
    terminal.error('Run with --help for usage.');
    return EXIT_USAGE;
  }

  if (parsed.kind === 'help') {
    terminal.log(helpText());
    return EXIT_OK;
  }
  if (parsed.kind === 'list-presets') {
    terminal.log('Available presets: ' + Object.keys(PRESETS).join(', '));
    return EXIT_OK;
  }

  const { args } = parsed;
  let config: ToolConfig;
  try {
    config = resolveConfig({
      preset: args.preset,
      configFile: args.configFile,
      env: io.env,
      overrides: args.overrides,
    });
  } catch (err) {
    terminal.error(describeError(err));
    return EXIT_FAILURE;
  }

  let logger: Logger;
  try {
    logger = config.log.enabled ? io.createLogger(config.log) : new NullLogger();
  } catch (err) {
    terminal.error(describeError(err));
    io.prompter.close();
    return EXIT_FAILURE;
  }

  try {
    const outcome = await resolveRequest(args, { prompter: io.prompter, terminal, config });
    if (outcome.kind === 'cancelled') {
      terminal.log('Exiting.');
      logger.info('Run cancelled at prompt');
      return EXIT_OK;
    }

    const { request } = outcome;
    logger.info('Run started', { mode: request.mode, file: request.filePath });

    const result = await processFile(request, {
      config,
      logger,
      confirmOverwrite: createOverwriteConfirmer(io.prompter),
      overwrite: args.overwrite,
      cwd: io.cwd,
      now: io.now,
    });

    const seconds = (result.elapsedMs / 1000).toFixed(2);
    terminal.log(`File ${result.outputPath} successfully ${MODE_VERB[result.mode]} in ${seconds} seconds.`);
    return EXIT_OK;
  } catch (err) {
    if (err instanceof OverwriteDeclinedError) {
      terminal.log('Operation cancelled.');
      return EXIT_OK;
    }
    terminal.error(describeError(err));
    logger.error('Run failed', { err, code: isByteveilError(err) ? err.code : 'unexpected' });
    return EXIT_FAILURE;
  } finally {
    io.prompter.close();
    logger.close();
  }
}
