import type { Step } from "../types/step.js";
import { applied, runOrThrow } from "./helpers.js";

export const systemUpdateStep: Step = {
  name: "system-update",
  description: "Performing system update",
  fatal: true,
  async run(ctx) {
    const refresh = await runOrThrow(ctx, ctx.commands.packageRefresh(), "slow");
    const upgrade = await runOrThrow(ctx, ctx.commands.packageUpgrade(), "long_running");
    return applied({
      packageManager: ctx.distro.package_manager,
      durationMs: refresh.durationMs + upgrade.durationMs,
    });
  },
};
