import type { BootstrapConfig } from "./config/schema.js";
import type { DistroContext } from "./types/distro.js";
import type { PipelineReport, Step } from "./types/step.js";
import type { Executor } from "./execution/executor.js";
import type { BootstrapContext } from "./steps/context.js";
import { detectDistro } from "./distro/detector.js";
import { createDistroCommands } from "./distro/commands/factory.js";
import { checkPrivilege } from "./pipeline/privilege.js";
import { StepRegistry } from "./pipeline/registry.js";
import { runPipeline } from "./pipeline/runner.js";
import { registerDefaultSteps } from "./steps/index.js";
import { formatCompletionNotice, type HardeningSummary } from "./report.js";
import { logger } from "./logger.js";

export interface BootstrapOptions {
  readonly config: BootstrapConfig;
  readonly executor: Executor;
  readonly euid: number;
  /** Detected from /etc/os-release when omitted. */
  readonly distro?: DistroContext;
  /** Defaults to the registered provisioning steps. */
  readonly steps?: Step[];
  readonly now?: () => Date;
  readonly print?: (text: string) => void;
}

/**
 * Run the whole provisioning flow.
 * The privilege gate runs before anything else; a non-root caller gets exit code 1
 * without a single command or file write.
 */
export async function bootstrap(options: BootstrapOptions): Promise<PipelineReport> {
  const denied = checkPrivilege(options.euid);
  if (denied) {
    logger.error({ euid: options.euid }, denied.message);
    return { outcomes: [], error: denied, failedStep: null, exitCode: 1 };
  }

  const distro = options.distro ?? detectDistro(options.config.distro);
  const ctx: BootstrapContext = {
    config: options.config,
    distro,
    commands: createDistroCommands(distro),
    executor: options.executor,
    now: options.now ?? (() => new Date()),
    print: options.print ?? ((text) => process.stdout.write(text)),
  };

  let steps = options.steps;
  if (!steps) {
    const registry = new StepRegistry();
    registerDefaultSteps(registry);
    steps = registry.getAll();
  }

  logger.info({ user: ctx.config.user.name, distro: distro.name, steps: steps.length }, "Starting VPS setup");
  const report = await runPipeline(ctx, steps);

  if (report.exitCode === 0) {
    logger.info("VPS setup completed successfully!");
    if (!ctx.config.skip_steps.includes("ssh-hardening")) {
      ctx.print(formatCompletionNotice(ctx.config, hardeningSummary(report)));
    }
  }
  return report;
}

function hardeningSummary(report: PipelineReport): HardeningSummary {
  const outcome = report.outcomes.find((o) => o.step === "ssh-hardening");
  if (!outcome || outcome.status !== "applied") return { backupPath: null, includesDropIns: false };
  const { backupPath, includesDropIns } = outcome.details;
  return {
    backupPath: typeof backupPath === "string" ? backupPath : null,
    includesDropIns: includesDropIns === true,
  };
}
