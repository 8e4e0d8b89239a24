import { writeFile, chmod, rm } from "node:fs/promises";
import { join } from "node:path";
import type { Step } from "../types/step.js";
import { applied, run } from "./helpers.js";
import { BootstrapError, BootstrapErrorCode } from "../shared/errors.js";

/** sudo ignores fragments that are group/world writable; 0440 is what visudo itself writes. */
export const SUDOERS_MODE = 0o440;

export function sudoersLine(username: string): string {
  return `${username} ALL=(ALL) NOPASSWD:ALL\n`;
}

export const sudoersStep: Step = {
  name: "sudoers",
  description: "Configuring passwordless sudo",
  fatal: true,
  async run(ctx) {
    const { name } = ctx.config.user;
    const path = join(ctx.config.sudo.sudoers_dir, name);

    await writeFile(path, sudoersLine(name), "utf-8");
    await chmod(path, SUDOERS_MODE);

    if (ctx.config.sudo.validate) {
      const check = await run(ctx, ctx.commands.sudoersValidate(path), "instant");
      if (check.exitCode !== 0) {
        // A fragment sudo cannot parse breaks sudo for every account
        await rm(path, { force: true });
        throw new BootstrapError(BootstrapErrorCode.SUDOERS_INVALID, `visudo rejected ${path}; fragment removed`, {
          path,
          output: (check.stderr || check.stdout).trim(),
        });
      }
    }

    return applied({ path, mode: SUDOERS_MODE.toString(8), validated: ctx.config.sudo.validate });
  },
};
