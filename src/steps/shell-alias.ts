import { readFile } from "node:fs/promises";
import type { Step } from "../types/step.js";
import type { BootstrapConfig } from "../config/schema.js";
import { applied, profilePath, runOrThrow, skipped } from "./helpers.js";
import { isErrnoException } from "../shared/errors.js";

export function aliasLine(config: BootstrapConfig): string {
  return `alias ${config.alias.name}="${config.alias.command.replace(/(["\\$`])/g, "\\$1")}"`;
}

/** Blank line, comment, alias; appended verbatim to the profile. */
export function aliasBlock(config: BootstrapConfig): string {
  return `\n# ${config.alias.comment}\n${aliasLine(config)}\n`;
}

async function readProfile(path: string): Promise<string> {
  try {
    return await readFile(path, "utf-8");
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") return "";
    throw err;
  }
}

export const shellAliasStep: Step = {
  name: "shell-alias",
  description: "Adding shell alias",
  fatal: true,
  async run(ctx) {
    const path = profilePath(ctx.config);
    const line = aliasLine(ctx.config);
    const current = await readProfile(path);
    if (current.split("\n").some((l) => l.trim() === line)) {
      return skipped(`Alias '${ctx.config.alias.name}' already present in ${path}, skipping`, { path });
    }

    // Appended as the target user so a profile created here is owned by them
    await runOrThrow(ctx, ctx.commands.appendAsUser(ctx.config.user.name, path, aliasBlock(ctx.config)), "instant");
    return applied({ path, alias: line });
  },
};
