import type { Command } from "../../types/command.js";

export type ServiceAction = "start" | "stop" | "restart" | "reload";

/**
 * Distro-specific command dispatch interface.
 * Steps call these methods to express intent;
 * implementations translate to distro-specific commands.
 * Every command runs as root unless it says otherwise.
 */
export interface DistroCommands {
  // Package management
  packageRefresh(): Command;
  packageUpgrade(): Command;

  // Accounts
  userExists(username: string): Command;
  userCreate(username: string, shell: string): Command;

  // Acting as the target account
  runAsUser(username: string, script: string): Command;
  mkdirAsUser(username: string, path: string): Command;
  appendAsUser(username: string, path: string, content: string): Command;

  // Ownership and policy checks
  chown(owner: string, paths: string[]): Command;
  sudoersValidate(path: string): Command;
  sshdValidate(binary: string, configPath: string): Command;

  // Service management (shared systemctl)
  serviceControl(unit: string, action: ServiceAction): Command;
}
