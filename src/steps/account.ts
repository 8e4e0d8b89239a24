import type { Step } from "../types/step.js";
import { applied, run, runOrThrow, skipped } from "./helpers.js";

/** Check-then-create; not atomic. */
export const createUserStep: Step = {
  name: "create-user",
  description: "Creating target user",
  fatal: true,
  async run(ctx) {
    const { name, shell } = ctx.config.user;
    const existing = await run(ctx, ctx.commands.userExists(name), "instant");
    if (existing.exitCode === 0) {
      return skipped(`User '${name}' already exists, skipping creation`, { user: name });
    }
    await runOrThrow(ctx, ctx.commands.userCreate(name, shell), "quick");
    return applied({ user: name, shell });
  },
};
