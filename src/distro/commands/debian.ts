import type { Command } from "../../types/command.js";
import { CommonCommands } from "./common.js";

/** Debian/Ubuntu command implementations. */
export class DebianCommands extends CommonCommands {
  private readonly env = { DEBIAN_FRONTEND: "noninteractive" };

  packageRefresh(): Command {
    return { argv: ["apt", "update"], env: this.env };
  }

  packageUpgrade(): Command {
    return { argv: ["apt", "upgrade", "-y"], env: this.env };
  }
}
