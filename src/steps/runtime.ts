import type { Step } from "../types/step.js";
import type { BootstrapConfig } from "../config/schema.js";
import { applied, runOrThrow, shellQuote, withNvm } from "./helpers.js";

export function nvmInstallUrl(config: BootstrapConfig): string {
  return config.runtime.nvm_install_url.replace("{version}", config.runtime.nvm_version);
}

/** The installer is piped straight into bash; upstream publishes no checksum. */
export function nvmInstallScript(config: BootstrapConfig): string {
  return `set -o pipefail\ncurl -fsSL ${shellQuote(nvmInstallUrl(config))} | bash`;
}

/** "lts" follows the latest long-term-support line; any other value pins that version. */
export function nodeInstallScript(config: BootstrapConfig): string {
  const version = config.runtime.node_version;
  const selector = version === "lts" ? "--lts" : shellQuote(version);
  const alias = version === "lts" ? shellQuote("lts/*") : shellQuote(version);
  return withNvm([
    `nvm install ${selector}`,
    `nvm use ${selector}`,
    `nvm alias default ${alias}`,
    "node --version",
    "npm --version",
  ]);
}

export const runtimeManagerStep: Step = {
  name: "runtime-manager",
  description: "Installing nvm for the target user",
  fatal: true,
  async run(ctx) {
    const url = nvmInstallUrl(ctx.config);
    await runOrThrow(ctx, ctx.commands.runAsUser(ctx.config.user.name, nvmInstallScript(ctx.config)), "slow");
    return applied({ version: ctx.config.runtime.nvm_version, url });
  },
};

export const runtimeStep: Step = {
  name: "runtime",
  description: "Installing Node.js for the target user",
  fatal: true,
  async run(ctx) {
    const result = await runOrThrow(ctx, ctx.commands.runAsUser(ctx.config.user.name, nodeInstallScript(ctx.config)), "slow");
    // The script ends with `node --version` then `npm --version`
    const [node = null, npm = null] = result.stdout.trim().split("\n").slice(-2).map((l) => l.trim());
    return applied({ requested: ctx.config.runtime.node_version, node, npm });
  },
};
