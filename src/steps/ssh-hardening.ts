// SSH hardening: Unmodified → Backed-up → Patched → Validated-and-active | Rolled-back-and-failed.
// The backup path is computed once and reused for rollback.
import { readFile, writeFile, copyFile } from "node:fs/promises";
import type { Step } from "../types/step.js";
import { applied, describeCommand, run, runOrThrow } from "./helpers.js";
import { backupPathFor, hasInclude, patchDirectives } from "../ssh/sshd-config.js";
import { BootstrapError, BootstrapErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";

export const sshHardeningStep: Step = {
  name: "ssh-hardening",
  description: "Hardening SSH configuration",
  fatal: true,
  async run(ctx) {
    const { sshd_config: configPath, sshd_binary, service_name, directives } = ctx.config.ssh;

    // Backed-up
    const backupPath = backupPathFor(configPath, ctx.now());
    await copyFile(configPath, backupPath);
    logger.info({ backupPath }, "SSH configuration backed up");

    // Patched
    const original = await readFile(configPath, "utf-8");
    const includesDropIns = hasInclude(original);
    if (includesDropIns) {
      logger.warn({ configPath }, "sshd_config includes drop-in files; a drop-in set earlier may override the hardened values");
    }
    const patch = patchDirectives(original, directives);
    await writeFile(configPath, patch.content, "utf-8");
    for (const change of patch.changes) {
      logger.debug({ ...change }, "sshd directive");
    }

    // Validated-and-active
    const check = await run(ctx, ctx.commands.sshdValidate(sshd_binary, configPath), "instant");
    if (check.exitCode === 0) {
      logger.info("SSH configuration is valid, restarting SSH service");
      await runOrThrow(ctx, ctx.commands.serviceControl(service_name, "restart"), "quick");
      return applied({ configPath, backupPath, includesDropIns, changes: patch.changes });
    }

    // Rolled-back-and-failed
    logger.error({ output: (check.stderr || check.stdout).trim() }, "SSH configuration test failed! Restoring backup");
    await copyFile(backupPath, configPath);
    const restart = ctx.commands.serviceControl(service_name, "restart");
    const restarted = await run(ctx, restart, "quick");
    if (restarted.exitCode !== 0) {
      logger.error({ command: describeCommand(restart), stderr: restarted.stderr.trim() }, "SSH service restart after rollback failed");
    }
    throw new BootstrapError(BootstrapErrorCode.SSH_VALIDATION_FAILED, "SSH configuration test failed; original configuration restored", {
      configPath,
      backupPath,
      output: (check.stderr || check.stdout).trim(),
      restartedAfterRollback: restarted.exitCode === 0,
    });
  },
};
