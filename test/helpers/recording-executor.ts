import fs from 'fs';
import path from 'path';
import type { Command } from '../../src/types/command.js';
import type { Executor, ExecResult } from '../../src/execution/executor.js';

type Matcher = string | ((argv: string[]) => boolean);
type Responder = Partial<ExecResult> | ((command: Command) => Partial<ExecResult>);

/**
 * In-process stand-in for LocalExecutor. Records every command and answers from
 * registered handlers (first match wins); unmatched commands succeed with no output.
 */
export class RecordingExecutor implements Executor {
  readonly calls: Command[] = [];
  /** timeoutMs passed with each call, parallel to `calls`. */
  readonly timeouts: number[] = [];
  private readonly handlers: Array<{ matches: (argv: string[]) => boolean; respond: Responder }> = [];

  on(matcher: Matcher, respond: Responder): this {
    const matches = typeof matcher === 'string'
      ? (argv: string[]) => argv.join(' ').includes(matcher)
      : matcher;
    this.handlers.push({ matches, respond });
    return this;
  }

  /** Carry out `sudo -u <user> mkdir -p` and `sudo -u <user> tee -a` against the real filesystem. */
  emulateFilesystem(): this {
    this.on((argv) => argv[3] === 'mkdir', (command) => {
      fs.mkdirSync(command.argv[command.argv.length - 1], { recursive: true });
      return {};
    });
    this.on((argv) => argv[3] === 'tee', (command) => {
      const target = command.argv[command.argv.length - 1];
      fs.mkdirSync(path.dirname(target), { recursive: true });
      fs.appendFileSync(target, command.stdin ?? '');
      return { stdout: command.stdin ?? '' };
    });
    return this;
  }

  argvs(): string[][] {
    return this.calls.map((c) => c.argv);
  }

  async execute(command: Command, timeoutMs: number): Promise<ExecResult> {
    this.calls.push(command);
    this.timeouts.push(timeoutMs);
    const handler = this.handlers.find((h) => h.matches(command.argv));
    const partial = handler
      ? typeof handler.respond === 'function' ? handler.respond(command) : handler.respond
      : {};
    return { stdout: '', stderr: '', exitCode: 0, durationMs: 0, ...partial };
  }
}
