import { readFile } from "node:fs/promises";
import type { Step } from "../types/step.js";
import type { BootstrapContext } from "./context.js";
import { applied, profilePath, run, shellQuote, withNvm } from "./helpers.js";
import { formatVerification, type VerificationReport } from "../report.js";

async function probe(ctx: BootstrapContext, command: string): Promise<string | null> {
  const result = await run(ctx, ctx.commands.runAsUser(ctx.config.user.name, withNvm([command])), "quick");
  const output = result.stdout.trim();
  return result.exitCode === 0 && output !== "" ? output : null;
}

async function findAliasLine(ctx: BootstrapContext): Promise<string | null> {
  const marker = `alias ${ctx.config.alias.name}=`;
  try {
    const content = await readFile(profilePath(ctx.config), "utf-8");
    return content.split("\n").find((l) => l.includes(marker))?.trim() ?? null;
  } catch {
    return null;
  }
}

export async function collectVerification(ctx: BootstrapContext): Promise<VerificationReport> {
  return {
    user: await probe(ctx, "whoami"),
    nodeVersion: await probe(ctx, "node --version"),
    npmVersion: await probe(ctx, "npm --version"),
    cliPath: await probe(ctx, `command -v ${shellQuote(ctx.config.cli.binary)}`),
    aliasLine: await findAliasLine(ctx),
  };
}

/** Informational only; never changes the exit status. */
export const verifyStep: Step = {
  name: "verify",
  description: "Running final verification",
  fatal: false,
  async run(ctx) {
    const report = await collectVerification(ctx);
    ctx.print(formatVerification(report, ctx.config));
    return applied({ ...report });
  },
};
