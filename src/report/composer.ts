import type { SystemInfo } from "../types/system.js";
import type { ReportBody, UpdateResult } from "../types/update.js";

export const UP_TO_DATE_LINE = "No updates were found. This system is up to date.";

/** "There is 1 update available:" / "There are N updates available:". */
export function summaryLine(count: number): string {
  return count === 1 ? "There is 1 update available:" : `There are ${count} updates available:`;
}

/** Description plus release, unless the description already names the release. */
export function describeOs(info: SystemInfo): string {
  if (!info.osRelease || info.osDescription.includes(info.osRelease)) return info.osDescription;
  return `${info.osDescription} ${info.osRelease}`;
}

export function composeReport(info: SystemInfo, result: UpdateResult): ReportBody {
  const lines = [
    `HOSTNAME: ${info.hostname}`,
    `OS: ${describeOs(info)} (${info.architecture})`,
    `IP: ${info.publicIp}`,
    "",
  ];
  if (result.found) {
    lines.push(summaryLine(result.count), ...result.lines);
  } else {
    lines.push(UP_TO_DATE_LINE);
  }
  return { lines };
}

export function renderReport(body: ReportBody): string {
  return body.lines.join("\n");
}
