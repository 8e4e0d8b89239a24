import type { Step } from "../types/step.js";
import type { BootstrapConfig } from "../config/schema.js";
import { applied, runOrThrow, shellQuote, withNvm } from "./helpers.js";

export function packageSpec(config: BootstrapConfig): string {
  return config.cli.version ? `${config.cli.package}@${config.cli.version}` : config.cli.package;
}

export const cliToolStep: Step = {
  name: "cli-tool",
  description: "Installing CLI tool globally for the target user",
  fatal: true,
  async run(ctx) {
    const spec = packageSpec(ctx.config);
    const script = withNvm([`npm install -g ${shellQuote(spec)}`]);
    await runOrThrow(ctx, ctx.commands.runAsUser(ctx.config.user.name, script), "slow");
    return applied({ package: spec });
  },
};
