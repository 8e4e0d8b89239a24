import type { Command } from "../../types/command.js";
import { CommonCommands } from "./common.js";

/** RHEL/Fedora command implementations. */
export class RHELCommands extends CommonCommands {
  packageRefresh(): Command {
    return { argv: ["dnf", "makecache"] };
  }

  packageUpgrade(): Command {
    return { argv: ["dnf", "upgrade", "-y"] };
  }
}
