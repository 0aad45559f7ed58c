import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { Logger, LogMeta } from '../src/logger';
import type { Prompter, Terminal } from '../src/prompt';

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'byteveil-test-'));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/** Answers questions from a script, in order, and records what was asked. */
export class ScriptedPrompter implements Prompter {
  readonly questions: string[] = [];
  closed = false;

  private readonly answers: string[];

  constructor(answers: string[] = []) {
    this.answers = [...answers];
  }

  async ask(question: string): Promise<string> {
    this.questions.push(question);
    const answer = this.answers.shift();
    if (answer === undefined) throw new Error(`Unexpected question: ${question}`);
    return answer;
  }

  close(): void {
    this.closed = true;
  }
}

export class MemoryTerminal implements Terminal {
  readonly out: string[] = [];
  readonly err: string[] = [];
  clears = 0;

  log(line: string): void {
    this.out.push(line);
  }

  error(line: string): void {
    this.err.push(line);
  }

  clear(): void {
    this.clears++;
  }
}

export interface LogRecord {
  level: 'debug' | 'info' | 'warn' | 'error';
  message: string;
  meta: LogMeta;
}

export class RecordingLogger implements Logger {
  closed = false;

  constructor(
    readonly records: LogRecord[] = [],
    private readonly bindings: LogMeta = {},
  ) {}

  private push(level: LogRecord['level'], message: string, meta: LogMeta = {}): void {
    this.records.push({ level, message, meta: { ...this.bindings, ...meta } });
  }

  debug(message: string, meta?: LogMeta): void {
    this.push('debug', message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.push('info', message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.push('warn', message, meta);
  }

  error(message: string, meta?: LogMeta): void {
    this.push('error', message, meta);
  }

  child(bindings: LogMeta): Logger {
    return new RecordingLogger(this.records, { ...this.bindings, ...bindings });
  }

  close(): void {
    this.closed = true;
  }
}
