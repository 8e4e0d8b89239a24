/** Distribution family. */
export type DistroFamily = "debian" | "rhel";

export const DISTRO_FAMILIES = ["debian", "rhel"] as const satisfies readonly DistroFamily[];

/** Package manager resolved from distro family. */
export type PackageManager = "apt" | "dnf";

/**
 * Distro context populated once at startup.
 * Consumed by the command factory and logged with the run.
 */
export interface DistroContext {
  readonly family: DistroFamily;
  readonly name: string;
  readonly version: string;
  readonly codename: string | null;
  readonly package_manager: PackageManager;
}
