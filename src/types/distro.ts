/** Canonical distribution family; one profile per family. */
export type DistroFamily = "arch" | "debian" | "gentoo" | "rhel" | "suse";

/**
 * Family-specific two-phase update check.
 * Commands are opaque shell strings; each one is responsible for printing
 * one `name current -> candidate` line per pending update.
 */
export interface DistroProfile {
  readonly familyId: DistroFamily;
  /** Refreshes the package index. Only families that need it carry one. */
  readonly preCheckCommand?: string;
  readonly updateCheckCommand: string;
  readonly requiredDependencies: ReadonlySet<string>;
}
