// Factory for distro-specific command adapters.
// Called once by bootstrap() after detectDistro(); the returned DistroCommands is
// carried in BootstrapContext and used by every step.
// Adding a new distro family requires: (1) a new Commands class, (2) a new case here,
// and (3) updating resolveFamily() to emit the new family string.

import type { DistroContext } from "../../types/distro.js";
import type { DistroCommands } from "./interface.js";
import { DebianCommands } from "./debian.js";
import { RHELCommands } from "./rhel.js";

/** Create the correct DistroCommands implementation for the detected distro. */
export function createDistroCommands(distro: DistroContext): DistroCommands {
  switch (distro.family) {
    case "debian": return new DebianCommands();
    case "rhel": return new RHELCommands();
  }
}
