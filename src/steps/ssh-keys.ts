import { access, copyFile, chmod } from "node:fs/promises";
import { join } from "node:path";
import type { Step } from "../types/step.js";
import { applied, runOrThrow, skipped, targetHome } from "./helpers.js";

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export const sshKeysStep: Step = {
  name: "ssh-keys",
  description: "Copying SSH keys from the administrative account",
  fatal: true,
  async run(ctx) {
    const { name } = ctx.config.user;
    const source = ctx.config.ssh.admin_authorized_keys;
    if (!(await exists(source))) {
      // Without keys the account has no way in once password logins are disabled
      return skipped(`No authorized_keys found at ${source}, skipping SSH key copy`, { source });
    }

    const sshDir = join(targetHome(ctx.config), ".ssh");
    const destination = join(sshDir, "authorized_keys");

    // Created as the target user so the directory is theirs
    await runOrThrow(ctx, ctx.commands.mkdirAsUser(name, sshDir), "instant");
    await copyFile(source, destination);
    await runOrThrow(ctx, ctx.commands.chown(name, [destination, sshDir]), "instant");
    await chmod(destination, 0o600);
    await chmod(sshDir, 0o700);

    return applied({ source, destination });
  },
};
