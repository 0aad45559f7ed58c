#!/usr/bin/env node
/**
 * byteveil CLI
 *
 * Usage:
 *   byteveil o script.py 4821            # writes script_obscure.py
 *   byteveil d script_obscure.py 4821    # writes script_obscure_deobscure.py
 *   byteveil                             # asks for mode, file and seed
 */

import { createFileLogger } from './logger';
import { ReadlinePrompter } from './prompt';
import { EXIT_FAILURE, run } from './run';

async function main(): Promise<void> {
  process.exitCode = await run(process.argv, {
    terminal: {
      log: line => console.log(line),
      error: line => console.error(line),
      clear: () => console.clear(),
    },
    prompter: new ReadlinePrompter(),
    env: process.env,
    cwd: process.cwd(),
    createLogger: createFileLogger,
  });
}

main().catch((e: unknown) => {
  console.error(e instanceof Error && e.stack ? e.stack : String(e));
  process.exitCode = EXIT_FAILURE;
});
