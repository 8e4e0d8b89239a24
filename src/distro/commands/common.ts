import type { Command } from "../../types/command.js";
import type { DistroCommands, ServiceAction } from "./interface.js";

/**
 * Commands that are identical across supported families (shadow-utils, sudo, systemd).
 * Families only differ in package management.
 */
export abstract class CommonCommands implements DistroCommands {
  abstract packageRefresh(): Command;
  abstract packageUpgrade(): Command;

  userExists(username: string): Command {
    return { argv: ["id", username] };
  }

  userCreate(username: string, shell: string): Command {
    return { argv: ["useradd", "-m", "-s", shell, username] };
  }

  runAsUser(username: string, script: string): Command {
    // -H so $HOME (and with it ~/.nvm, ~/.bashrc) resolves to the target account
    return { argv: ["sudo", "-u", username, "-H", "bash", "-c", script] };
  }

  mkdirAsUser(username: string, path: string): Command {
    return { argv: ["sudo", "-u", username, "mkdir", "-p", path] };
  }

  appendAsUser(username: string, path: string, content: string): Command {
    return { argv: ["sudo", "-u", username, "tee", "-a", path], stdin: content };
  }

  chown(owner: string, paths: string[]): Command {
    return { argv: ["chown", `${owner}:${owner}`, ...paths] };
  }

  sudoersValidate(path: string): Command {
    return { argv: ["visudo", "-cf", path] };
  }

  sshdValidate(binary: string, configPath: string): Command {
    return { argv: [binary, "-t", "-f", configPath] };
  }

  serviceControl(unit: string, action: ServiceAction): Command {
    return { argv: ["systemctl", action, unit] };
  }
}
