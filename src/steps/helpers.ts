import { join } from "node:path";
import type { BootstrapContext } from "./context.js";
import type { BootstrapConfig } from "../config/schema.js";
import type { Command } from "../types/command.js";
import type { StepResult } from "../types/step.js";
import type { DurationCategory } from "../types/duration.js";
import { DURATION_TIMEOUTS } from "../types/duration.js";
import type { ExecResult } from "../execution/executor.js";
import { categorizeError } from "../execution/categorize.js";
import { BootstrapError, BootstrapErrorCode } from "../shared/errors.js";

// ── Result Builders ────────────────────────────────────────────────

export function applied(details: Record<string, unknown> = {}): StepResult {
  return { status: "applied", details };
}

export function skipped(reason: string, details: Record<string, unknown> = {}): StepResult {
  return { status: "skipped", reason, details };
}

// ── Paths ──────────────────────────────────────────────────────────

export function targetHome(config: BootstrapConfig): string {
  return join(config.user.home_root, config.user.name);
}

export function profilePath(config: BootstrapConfig): string {
  return join(targetHome(config), config.alias.profile);
}

// ── Shell ──────────────────────────────────────────────────────────

/** Single-quote a value for bash. */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/** Loads nvm into a non-interactive shell; nvm is a shell function, not a binary. */
export const NVM_PRELUDE = [
  'export NVM_DIR="$HOME/.nvm"',
  '[ -s "$NVM_DIR/nvm.sh" ] && . "$NVM_DIR/nvm.sh"',
].join("\n");

/** Script run as the target user with nvm loaded; commands are chained with && so the first failure wins. */
export function withNvm(commands: string[]): string {
  return `${NVM_PRELUDE}\n${commands.join(" && ")}`;
}

// ── Execution Helpers ──────────────────────────────────────────────

export function timeoutFor(ctx: BootstrapContext, duration: DurationCategory): number {
  const override = ctx.config.errors.command_timeout_override;
  return override > 0 ? override * 1000 : DURATION_TIMEOUTS[duration];
}

/** Execute a Command and return its result whatever the exit code. */
export async function run(ctx: BootstrapContext, command: Command, duration: DurationCategory): Promise<ExecResult> {
  return ctx.executor.execute(command, timeoutFor(ctx, duration));
}

/** Execute a Command; a non-zero exit becomes a categorized COMMAND_FAILED error. */
export async function runOrThrow(ctx: BootstrapContext, command: Command, duration: DurationCategory): Promise<ExecResult> {
  const result = await run(ctx, command, duration);
  if (result.exitCode !== 0) {
    const category = categorizeError(result.stderr);
    throw new BootstrapError(
      BootstrapErrorCode.COMMAND_FAILED,
      `Command exited with ${result.exitCode}: ${describeCommand(command)}`,
      {
        argv: command.argv,
        exitCode: result.exitCode,
        stderr: result.stderr.trim(),
        errorCode: category.code,
        category: category.category,
        transient: category.transient,
        remediation: category.remediation,
      },
    );
  }
  return result;
}

/** Short human form of a command; long inline scripts are cut to their first line. */
export function describeCommand(command: Command): string {
  const text = command.argv.join(" ");
  const firstLine = text.split("\n")[0] ?? text;
  return firstLine.length < text.length ? `${firstLine} …` : firstLine;
}
