import type { BootstrapConfig } from "../config/schema.js";
import type { DistroContext } from "../types/distro.js";
import type { DistroCommands } from "../distro/commands/interface.js";
import type { Executor } from "../execution/executor.js";

/**
 * Shared run context: the glue between all steps.
 * Created once by bootstrap(), passed to every step.
 */
export interface BootstrapContext {
  readonly config: BootstrapConfig;
  readonly distro: DistroContext;
  readonly commands: DistroCommands;
  readonly executor: Executor;
  /** Clock used for backup file names. */
  readonly now: () => Date;
  /** Operator-facing output (verification report, notices). */
  readonly print: (text: string) => void;
}
