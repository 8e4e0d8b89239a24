/** Duration category for command timeouts. */
export type DurationCategory = "instant" | "quick" | "normal" | "slow" | "long_running";

/** Timeout in ms per duration category. */
export const DURATION_TIMEOUTS: Record<DurationCategory, number> = {
  instant: 5_000,
  quick: 15_000,
  normal: 60_000,
  slow: 300_000,
  // apt/dnf upgrades on a fresh image routinely take several minutes
  long_running: 1_800_000,
};
