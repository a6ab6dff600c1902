// Family → update-check profile table.
// All per-family knowledge lives here: adding a family means one new entry in
// PROFILES (and an alias if os-release reports it under another name).
// Commands run through `bash -c`, so pipelines and redirections are allowed.

import type { DistroFamily, DistroProfile } from "../types/distro.js";
import { NotSupportedError } from "../shared/errors.js";

/** The shell every profile command runs under, checked alongside the profile's own tools. */
export const BASELINE_DEPENDENCIES: readonly string[] = ["bash"];

/** Set by the engine to a private directory that lives for one update check. */
export const WORKDIR_ENV = "UPDATES_NOTIFIER_WORKDIR";

const DNF_INSTALLED = `$${WORKDIR_ENV}/installed.txt`;
const DNF_AVAILABLE = `$${WORKDIR_ENV}/available.txt`;

function profile(
  familyId: DistroFamily,
  updateCheckCommand: string,
  requiredDependencies: string[],
  preCheckCommand?: string,
): DistroProfile {
  return Object.freeze({
    familyId,
    updateCheckCommand,
    requiredDependencies: new Set(requiredDependencies),
    ...(preCheckCommand !== undefined ? { preCheckCommand } : {}),
  });
}

const PROFILES: Readonly<Record<DistroFamily, DistroProfile>> = Object.freeze({
  // checkupdates prints repo packages, `aur vercmp` the foreign ones; both already use `name old -> new`.
  arch: profile("arch", "checkupdates & pacman -Qm | aur vercmp & wait", ["checkupdates", "pacman", "aur"]),
  debian: profile("debian", "aptitude search '~U' -F '%p %v -> %V' | tr -s ' '", ["aptitude", "tr"]),
  gentoo: profile(
    "gentoo",
    String.raw`NAMEVERSION="<category>/<name> <version>" INSTFORMAT="{last}<version>" eix --upgrade --format '<installedversions:NAMEVERSION> -> <bestslotupgradeversions:INSTFORMAT>\n' | head -n -1`,
    ["eix", "eix-update", "emerge-webrsync", "head"],
    "emerge-webrsync -q >/dev/null 2>&1 && eix-update -q >/dev/null 2>&1",
  ),
  // dnf check-update exits 100 when updates exist, which the engine treats as success.
  rhel: profile(
    "rhel",
    `awk 'NR==FNR{a[$1]=$2;next} $1 in a{print $1, a[$1], "->", $2}' "${DNF_INSTALLED}" "${DNF_AVAILABLE}"`,
    ["dnf", "awk"],
    `dnf list --installed > "${DNF_INSTALLED}" && dnf check-update > "${DNF_AVAILABLE}"`,
  ),
  suse: profile(
    "suse",
    String.raw`zypper list-updates | sed '1,/^Reading installed packages...$/d' | sed '1,2d' | sed -n 's/.*| \([^ ]*\) *| \([^ ]*\) *| \([^ ]*\) *| [^|]*$/\1 \2 -> \3/p'`,
    ["zypper", "sed"],
  ),
});

/** Names os-release reports for members of a family. */
const FAMILY_ALIASES: ReadonlyMap<string, DistroFamily> = new Map<string, DistroFamily>([
  ["centos", "rhel"],
  ["fedora", "rhel"],
  ["opensuse", "suse"],
]);

export const SUPPORTED_FAMILIES: readonly DistroFamily[] = Object.freeze(
  Object.keys(PROFILES).filter(isDistroFamily),
);

function isDistroFamily(value: string): value is DistroFamily {
  return Object.prototype.hasOwnProperty.call(PROFILES, value);
}

/** Resolve a family identifier (case-insensitive) to its profile. */
export function resolveProfile(familyId: string): DistroProfile {
  const normalized = familyId.trim().toLowerCase();
  const family = isDistroFamily(normalized) ? normalized : FAMILY_ALIASES.get(normalized);
  if (family === undefined) {
    throw new NotSupportedError(normalized);
  }
  return PROFILES[family];
}

/** Baseline tools followed by the profile's own, deduplicated in declaration order. */
export function collectDependencies(profile: DistroProfile): string[] {
  return [...new Set([...BASELINE_DEPENDENCIES, ...profile.requiredDependencies])];
}
