import type { BootstrapError } from "../shared/errors.js";
import type { BootstrapContext } from "../steps/context.js";

/** Pipeline steps in execution order. */
export const STEP_NAMES = [
  "system-update",
  "create-user",
  "sudoers",
  "ssh-keys",
  "runtime-manager",
  "runtime",
  "cli-tool",
  "shell-alias",
  "ssh-hardening",
  "verify",
] as const;

export type StepName = (typeof STEP_NAMES)[number];

/** What a step's run() returns when it did not throw. */
export interface StepResult {
  readonly status: "applied" | "skipped";
  /** Warning shown to the operator for a skipped step. */
  readonly reason?: string;
  readonly details: Record<string, unknown>;
}

/** A unit of provisioning work. */
export interface Step {
  readonly name: StepName;
  readonly description: string;
  /** A failing non-fatal step is reported but does not abort the run. */
  readonly fatal: boolean;
  run(ctx: BootstrapContext): Promise<StepResult>;
}

interface OutcomeBase {
  readonly step: StepName;
  readonly durationMs: number;
}

export interface AppliedOutcome extends OutcomeBase {
  readonly status: "applied";
  readonly details: Record<string, unknown>;
}

export interface SkippedOutcome extends OutcomeBase {
  readonly status: "skipped";
  readonly reason: string;
  readonly details: Record<string, unknown>;
}

export interface FailedOutcome extends OutcomeBase {
  readonly status: "failed";
  readonly error: BootstrapError;
}

export type StepOutcome = AppliedOutcome | SkippedOutcome | FailedOutcome;

/** Result of a whole run. */
export interface PipelineReport {
  readonly outcomes: StepOutcome[];
  /** First error that aborted the run (precondition or fatal step), if any. */
  readonly error: BootstrapError | null;
  readonly failedStep: StepName | null;
  readonly exitCode: 0 | 1;
}
