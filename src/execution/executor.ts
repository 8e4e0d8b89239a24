// Command execution layer. Every step command passes through this module.
// Provides the Executor interface; LocalExecutor is the production implementation,
// tests substitute a recording executor.
import execa from "execa";
import type { Command } from "../types/command.js";
import { BootstrapError, BootstrapErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";

/** Result of command execution. */
export interface ExecResult {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number;
  readonly durationMs: number;
}

/** Executor interface. */
export interface Executor {
  execute(command: Command, timeoutMs: number): Promise<ExecResult>;
}

export interface LocalExecutorOptions {
  /** Mirror child stdout/stderr to the terminal while the command runs. */
  streamOutput: boolean;
}

/** Local executor built on execa. Never rejects on a non-zero exit; callers inspect exitCode. */
export class LocalExecutor implements Executor {
  constructor(private readonly options: LocalExecutorOptions = { streamOutput: false }) {}

  async execute(command: Command, timeoutMs: number): Promise<ExecResult> {
    const [file, ...args] = command.argv;
    if (!file) {
      throw new BootstrapError(BootstrapErrorCode.COMMAND_FAILED, "Refusing to execute an empty command");
    }

    const start = performance.now();
    logger.debug({ argv: command.argv }, "Executing command");

    const child = execa(file, args, {
      env: command.env,
      input: command.stdin,
      timeout: timeoutMs,
      // 10MB ceiling: upgrade logs on a fresh image stay well under this
      maxBuffer: 10 * 1024 * 1024,
      reject: false,
    });

    if (this.options.streamOutput) {
      child.stdout?.pipe(process.stdout, { end: false });
      child.stderr?.pipe(process.stderr, { end: false });
    }

    const result = await child;
    const durationMs = Math.round(performance.now() - start);
    const exitCode = resolveExitCode(result);
    const stderr = result.timedOut
      ? `${result.stderr}\nCommand timed out after ${timeoutMs}ms`.trim()
      : result.stderr;

    logger.debug({ argv: command.argv, exitCode, durationMs }, "Command finished");
    return { stdout: result.stdout, stderr, exitCode, durationMs };
  }
}

function resolveExitCode(result: { exitCode?: number; timedOut: boolean; signal?: string }): number {
  if (result.timedOut) return 124;
  if (typeof result.exitCode === "number") return result.exitCode;
  if (result.signal) return 128;
  // exitCode is absent when the process never started (ENOENT, EACCES)
  return 127;
}
