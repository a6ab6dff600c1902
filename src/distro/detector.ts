import { readFileSync } from "node:fs";
import { join } from "node:path";
import { logger } from "../logger.js";
import { NotifierError, NotifierErrorCode, SUPPORTED_FAMILIES_HINT } from "../shared/errors.js";

/** Parse os-release content into key-value pairs. */
export function parseOsRelease(content: string): Record<string, string> {
  const result: Record<string, string> = {};
  for (const line of content.split("\n")) {
    const match = line.trim().match(/^([A-Z_]+)=(.*)$/);
    if (match?.[1] !== undefined && match[2] !== undefined) {
      result[match[1]] = match[2].replace(/^["']|["']$/g, "");
    }
  }
  return result;
}

/** Read `<prefix>/etc/os-release`, or null when it is missing or unreadable. */
export function readOsRelease(prefix = ""): Record<string, string> | null {
  const path = join(prefix || "/", "etc", "os-release");
  try {
    return parseOsRelease(readFileSync(path, "utf-8"));
  } catch (err) {
    logger.debug({ path, error: err instanceof Error ? err.message : String(err) }, "Could not read os-release");
    return null;
  }
}

/**
 * Pick the family identifier from os-release fields.
 * ID_LIKE may list several ancestors (e.g. "rhel centos fedora"); the last one wins.
 * Falls back to ID for distros that are their own family.
 */
export function familyFromOsRelease(osRelease: Record<string, string>): string {
  const idLike = (osRelease.ID_LIKE ?? "").trim().toLowerCase();
  if (idLike) {
    const tokens = idLike.split(/\s+/);
    return tokens[tokens.length - 1] ?? "";
  }
  return (osRelease.ID ?? "").trim().toLowerCase();
}

/** Detect the host's family identifier. Resolution against the profile table happens later. */
export function detectFamily(prefix = ""): string {
  const osRelease = readOsRelease(prefix);
  const family = osRelease ? familyFromOsRelease(osRelease) : "";
  if (!family) {
    throw new NotifierError(
      NotifierErrorCode.DISTRO_UNKNOWN,
      "unknown Linux distribution/family.",
      { prefix },
      [
        "Make sure your distro or distro family is specified on /etc/os-release via ID_LIKE or ID variables.",
        `Otherwise, specify your distro family via --distro or -d parameter (possible values: ${SUPPORTED_FAMILIES_HINT}).`,
      ],
    );
  }
  logger.debug({ family, prefix }, "Distro family detected");
  return family;
}
