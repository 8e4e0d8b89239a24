import type { StepRegistry } from "../pipeline/registry.js";
import { systemUpdateStep } from "./system.js";
import { createUserStep } from "./account.js";
import { sudoersStep } from "./sudoers.js";
import { sshKeysStep } from "./ssh-keys.js";
import { runtimeManagerStep, runtimeStep } from "./runtime.js";
import { cliToolStep } from "./cli-tool.js";
import { shellAliasStep } from "./shell-alias.js";
import { sshHardeningStep } from "./ssh-hardening.js";
import { verifyStep } from "./verify.js";

/** Registers the provisioning steps in execution order. */
export function registerDefaultSteps(registry: StepRegistry): void {
  registry.register(systemUpdateStep);
  registry.register(createUserStep);
  registry.register(sudoersStep);
  registry.register(sshKeysStep);
  registry.register(runtimeManagerStep);
  registry.register(runtimeStep);
  registry.register(cliToolStep);
  registry.register(shellAliasStep);
  registry.register(sshHardeningStep);
  registry.register(verifyStep);
}
