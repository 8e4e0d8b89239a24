// Maps the stderr of a failed command onto a code and remediation hints,
// so an aborted run tells the operator what to look at before re-running.

/** Error categories for failed commands. */
export type ErrorCategory = "privilege" | "not_found" | "resource" | "lock" | "network" | "timeout" | "state";

export interface CategorizedError {
  readonly code: string;
  readonly category: ErrorCategory;
  readonly transient: boolean;
  readonly remediation: string[];
}

interface ErrorPattern extends CategorizedError {
  test: (stderr: string) => boolean;
}

const ERROR_PATTERNS: ErrorPattern[] = [
  { test: (s) => s.includes("permission denied") || s.includes("operation not permitted") || s.includes("must be run as root"),
    code: "PERMISSION_DENIED", category: "privilege", transient: false,
    remediation: ["Run vps-bootstrap as root (sudo -i, then re-run)"] },
  { test: (s) => s.includes("could not get lock") || s.includes("dpkg frontend lock") || s.includes("rpm.lock"),
    code: "RESOURCE_LOCKED", category: "lock", transient: true,
    remediation: ["Another package manager process is running (often unattended-upgrades on first boot)", "Wait for it to complete, then re-run"] },
  { test: (s) => s.includes("could not resolve") || s.includes("failed to fetch") || s.includes("connection timed out") || s.includes("network is unreachable") || s.includes("enotfound") || s.includes("eai_again"),
    code: "NETWORK_ERROR", category: "network", transient: true,
    remediation: ["Check outbound connectivity and DNS resolution", "Re-run once the network is reachable; completed steps are safe to repeat"] },
  { test: (s) => s.includes("unable to locate package") || s.includes("no match for argument") || s.includes("404 not found") || s.includes("e404"),
    code: "PACKAGE_NOT_FOUND", category: "not_found", transient: false,
    remediation: ["Check the package name and version in the configuration"] },
  { test: (s) => s.includes("command not found") || s.includes("enoent"),
    code: "COMMAND_NOT_FOUND", category: "not_found", transient: false,
    remediation: ["Install the missing tool or check that the previous step completed"] },
  { test: (s) => s.includes("no space left on device") || s.includes("cannot allocate memory"),
    code: "RESOURCE_EXHAUSTED", category: "resource", transient: false,
    remediation: ["Free disk space or memory on the server, then re-run"] },
  { test: (s) => s.includes("timed out after"),
    code: "TIMEOUT", category: "timeout", transient: true,
    remediation: ["Set errors.command_timeout_override (seconds) above the time the command needs, then re-run"] },
];

export function categorizeError(stderr: string): CategorizedError {
  const normalized = stderr.toLowerCase();
  for (const { test, ...category } of ERROR_PATTERNS) {
    if (test(normalized)) return category;
  }
  return { code: "COMMAND_FAILED", category: "state", transient: false, remediation: [
    "Review the command output above for the specific error",
    "Fix the cause and re-run",
  ] };
}
