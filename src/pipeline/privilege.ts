import { BootstrapError, BootstrapErrorCode } from "../shared/errors.js";

/** Effective uid of the current process; -1 where the platform has no uids. */
export function currentEuid(): number {
  return process.geteuid?.() ?? -1;
}

/** Returns an error when the caller is not root, null otherwise. Has no side effects. */
export function checkPrivilege(euid: number): BootstrapError | null {
  if (euid === 0) return null;
  return new BootstrapError(BootstrapErrorCode.NOT_ROOT, "This script must be run as root", { euid });
}
