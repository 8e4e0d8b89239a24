// Operator-facing text. Everything here is plain lines for a terminal; structured
// progress goes through the pino logger instead.
import type { BootstrapConfig } from "./config/schema.js";

export interface VerificationReport {
  readonly user: string | null;
  readonly nodeVersion: string | null;
  readonly npmVersion: string | null;
  readonly cliPath: string | null;
  readonly aliasLine: string | null;
}

export function formatVerification(report: VerificationReport, config: BootstrapConfig): string {
  return [
    "=== Verification ===",
    `User: ${report.user ?? "unknown"}`,
    `Node version: ${report.nodeVersion ?? "not installed"}`,
    `NPM version: ${report.npmVersion ?? "not installed"}`,
    `${config.cli.binary} installed: ${report.cliPath ?? "Not found in PATH"}`,
    "Aliases available after next login:",
    report.aliasLine ?? "Alias not found",
    "",
  ].join("\n");
}

/** What the ssh-hardening step reported back. */
export interface HardeningSummary {
  readonly backupPath: string | null;
  /** sshd_config has an Include; drop-ins read before the global lines win. */
  readonly includesDropIns: boolean;
}

/** Printed after a successful run: the account must be reachable by key before the root session closes. */
export function formatCompletionNotice(config: BootstrapConfig, hardening: HardeningSummary): string {
  const { name } = config.user;
  const { directives, sshd_config } = config.ssh;
  const claims: string[] = [];
  if (directives.PasswordAuthentication === "no") claims.push("Password authentication is now DISABLED");
  if (directives.PermitRootLogin === "no") claims.push("Root login is now DISABLED");
  if (directives.PubkeyAuthentication === "yes") claims.push("Only SSH key authentication is allowed");

  const warnings = hardening.includesDropIns
    ? [
        ...claims.map((claim) => `- ${claim} in ${sshd_config}, unless an included drop-in file sets it first`),
        "Drop-in files pulled in by Include are read first and their values win.",
        `Check the effective values with: sshd -T | grep -iE '^(${Object.keys(directives).map((k) => k.toLowerCase()).join("|")}) '`,
      ]
    : claims.map((claim) => `- ${claim}`);

  return [
    "",
    "=== IMPORTANT SECURITY NOTICE ===",
    "SSH configuration has been hardened:",
    ...warnings,
    `Make sure you can log in as '${name}' with your SSH key before closing this session!`,
    "",
    "Next steps:",
    `1. Test SSH access: ssh ${name}@your-server-ip (in a new terminal)`,
    `2. Switch to ${name} user: sudo su - ${name}`,
    `3. The ${config.alias.name} alias will be available after sourcing ${config.alias.profile} or logging in again`,
    `4. Configure ${config.cli.binary} with your API key if needed`,
    `5. Test the setup: ${config.alias.name} --help`,
    "",
    `SSH config backup saved at: ${hardening.backupPath ?? `${sshd_config}.backup.*`}`,
    "",
  ].join("\n");
}
