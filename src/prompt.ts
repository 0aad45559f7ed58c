/**
 * Interactive input
 *
 * Turns whatever the command line left out into a validated request, or a
 * cancellation when the user types the quit keyword. Nothing here touches
 * the input file.
 */

import * as readline from 'readline';
import type { ToolConfig } from './config';
import { InputValidationError } from './errors';
import type { ConfirmOverwrite } from './process';
import { ResolveOutcome } from './types';
import { checkExtension, parseMode, parseSeed } from './validation';

/** Console surface the runner writes to. */
export interface Terminal {
  log(line: string): void;
  error(line: string): void;
  clear(): void;
}

export interface Prompter {
  ask(question: string): Promise<string>;
  close(): void;
}

/** Prompter over stdin/stdout. The readline interface is only opened on the first question. */
export class ReadlinePrompter implements Prompter {
  private rl: readline.Interface | null = null;

  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout,
  ) {}

  private getRL(): readline.Interface {
    if (!this.rl) {
      this.rl = readline.createInterface({ input: this.input, output: this.output });
    }
    return this.rl;
  }

  ask(question: string): Promise<string> {
    const rl = this.getRL();
    return new Promise((resolve, reject) => {
      const onClose = () => reject(new InputValidationError('Input ended before an answer was given'));
      rl.once('close', onClose);
      rl.question(question, answer => {
        rl.off('close', onClose);
        resolve(answer);
      });
    });
  }

  close(): void {
    this.rl?.close();
    this.rl = null;
  }
}

export function createOverwriteConfirmer(prompter: Prompter): ConfirmOverwrite {
  return async outputPath => {
    const answer = await prompter.ask(`File ${outputPath} already exists. Overwrite? (y/n): `);
    return answer.trim().toLowerCase() === 'y';
  };
}

/** Values the command line supplied; any missing one is asked for. */
export interface GivenInput {
  mode?: string;
  file?: string;
  seed?: string;
}

export interface ResolveContext {
  prompter: Prompter;
  terminal: Terminal;
  config: ToolConfig;
}

export const BANNER = [
  'byteveil - source obscuring through a byte shift',
  '================================================',
  '',
];

export async function resolveRequest(given: GivenInput, ctx: ResolveContext): Promise<ResolveOutcome> {
  const { config, prompter, terminal } = ctx;
  const quit = config.prompt.quitKeyword.toLowerCase();
  const interactive = given.mode === undefined || given.file === undefined || given.seed === undefined;

  if (interactive) {
    if (config.prompt.clearScreen) terminal.clear();
    for (const line of BANNER) terminal.log(line);
  }

  // Returns null when the user quits
  const askFor = async (question: string): Promise<string | null> => {
    const answer = await prompter.ask(`${question} (or '${config.prompt.quitKeyword}' to quit): `);
    return answer.trim().toLowerCase() === quit ? null : answer;
  };

  const modeText = given.mode ?? (await askFor("Do you want to obscure (o) or deobscure (d) a source code? Enter 'o' or 'd'"));
  if (modeText === null) return { kind: 'cancelled' };
  const mode = parseMode(modeText);

  const extensions = config.files.extensions.join(' or ');
  const fileText = given.file ?? (await askFor(`Enter the name of the source file (with ${extensions})`));
  if (fileText === null) return { kind: 'cancelled' };
  const filePath = fileText.trim();
  checkExtension(filePath, config.files.extensions);

  const seedText = given.seed ?? (await askFor('Enter a four-digit initial code (Seed)'));
  if (seedText === null) return { kind: 'cancelled' };
  const seed = parseSeed(seedText, config.seed);

  return { kind: 'request', request: { mode, filePath, seed } };
}
