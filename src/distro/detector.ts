import { readFileSync } from "node:fs";
import type { DistroContext, DistroFamily, PackageManager } from "../types/distro.js";
import { logger } from "../logger.js";

export const OS_RELEASE_PATH = "/etc/os-release";

/** Parse /etc/os-release into key-value pairs. */
export function parseOsRelease(content: string): Record<string, string> {
  const result: Record<string, string> = {};
  for (const line of content.split("\n")) {
    const match = line.match(/^([A-Z_]+)=(.*)$/);
    if (match) {
      result[match[1]] = match[2].replace(/^["']|["']$/g, "");
    }
  }
  return result;
}

/** Resolve distro family from os-release fields. */
export function resolveFamily(osRelease: Record<string, string>): DistroFamily {
  const idLike = (osRelease.ID_LIKE ?? "").toLowerCase();
  const id = (osRelease.ID ?? "").toLowerCase();
  if (id === "debian" || id === "ubuntu" || idLike.includes("debian") || idLike.includes("ubuntu")) return "debian";
  if (id === "fedora" || id === "rhel" || id === "centos" || id === "rocky" || id === "almalinux" || idLike.includes("rhel") || idLike.includes("fedora")) return "rhel";
  // Default to debian: the provisioning flow was written against apt-based images
  logger.warn({ id, idLike }, "Unknown distro family, defaulting to debian");
  return "debian";
}

const PACKAGE_MANAGERS: Record<DistroFamily, PackageManager> = {
  debian: "apt",
  rhel: "dnf",
};

/**
 * Detect the local distro from os-release.
 * A family set in config replaces the detected one (and its package manager).
 */
export function detectDistro(overrides?: { family?: DistroFamily }, osReleasePath: string = OS_RELEASE_PATH): DistroContext {
  let osRelease: Record<string, string> = {};
  try {
    osRelease = parseOsRelease(readFileSync(osReleasePath, "utf-8"));
  } catch {
    logger.warn({ osReleasePath }, "Could not read os-release, falling back to family resolution defaults");
  }

  const family = overrides?.family ?? resolveFamily(osRelease);
  const context: DistroContext = {
    family,
    name: osRelease.NAME ?? osRelease.ID ?? "Unknown",
    version: osRelease.VERSION_ID ?? "unknown",
    codename: osRelease.VERSION_CODENAME ?? null,
    package_manager: PACKAGE_MANAGERS[family],
  };

  logger.info({ distro: context }, "Distro detection complete");
  return context;
}
