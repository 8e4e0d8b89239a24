// Sequential pipeline: each step returns an outcome, the first fatal failure stops the
// run. Completed steps keep their side effects; only ssh-hardening compensates.
import type { BootstrapContext } from "../steps/context.js";
import type { PipelineReport, Step, StepOutcome } from "../types/step.js";
import { toBootstrapError } from "../shared/errors.js";
import { logger } from "../logger.js";

export async function runPipeline(ctx: BootstrapContext, steps: Step[]): Promise<PipelineReport> {
  const outcomes: StepOutcome[] = [];
  const skip = new Set(ctx.config.skip_steps);

  for (const step of steps) {
    if (skip.has(step.name)) {
      logger.info({ step: step.name }, "Step disabled in configuration");
      outcomes.push({ status: "skipped", step: step.name, durationMs: 0, reason: "disabled in configuration", details: {} });
      continue;
    }

    logger.info({ step: step.name }, `${step.description}...`);
    const start = performance.now();
    try {
      const result = await step.run(ctx);
      const durationMs = Math.round(performance.now() - start);
      if (result.status === "skipped") {
        const reason = result.reason ?? "nothing to do";
        logger.warn({ step: step.name, ...result.details }, reason);
        outcomes.push({ status: "skipped", step: step.name, durationMs, reason, details: result.details });
      } else {
        logger.info({ step: step.name, durationMs, ...result.details }, "Step completed");
        outcomes.push({ status: "applied", step: step.name, durationMs, details: result.details });
      }
    } catch (err) {
      const error = toBootstrapError(err);
      const durationMs = Math.round(performance.now() - start);
      outcomes.push({ status: "failed", step: step.name, durationMs, error });
      logger.error({ step: step.name, code: error.code, ...error.context }, error.message);

      if (step.fatal) {
        logger.error(
          { failedStep: step.name, completed: outcomes.filter((o) => o.status !== "failed").map((o) => o.step) },
          "Aborting provisioning; steps listed as completed keep their changes",
        );
        return { outcomes, error, failedStep: step.name, exitCode: 1 };
      }
    }
  }

  return { outcomes, error: null, failedStep: null, exitCode: 0 };
}
