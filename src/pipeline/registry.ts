import type { Step, StepName } from "../types/step.js";
import { logger } from "../logger.js";

/**
 * Step registry: stores registered steps in insertion order.
 * The runner executes them in that order.
 */
export class StepRegistry {
  private readonly steps = new Map<StepName, Step>();

  register(step: Step): void {
    if (this.steps.has(step.name)) {
      logger.warn({ step: step.name }, "Duplicate step registration, overwriting");
    }
    this.steps.set(step.name, step);
  }

  get(name: StepName): Step | undefined {
    return this.steps.get(name);
  }

  getAll(): Step[] {
    return [...this.steps.values()];
  }

  get size(): number {
    return this.steps.size;
  }
}
