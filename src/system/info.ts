import { hostname, machine } from "node:os";
import type { SystemInfo } from "../types/system.js";
import type { CommandRunner } from "../execution/runner.js";
import { readOsRelease } from "../distro/detector.js";
import { logger } from "../logger.js";

export const DEFAULT_PUBLIC_IP_URL = "https://ifconfig.me/ip";
export const UNAVAILABLE = "unavailable";

export interface SystemInfoProvider {
  gather(): Promise<SystemInfo>;
}

export interface HostSystemInfoOptions {
  prefix?: string;
  publicIpUrl?: string;
}

/** Strip quotes and line breaks lsb_release leaves around its values. */
export function cleanLsbValue(raw: string): string {
  return raw.replace(/["\r\n]/g, "").trim();
}

/** Gathers host identity: hostname, lsb_release (or os-release), machine, public IP. */
export class HostSystemInfoProvider implements SystemInfoProvider {
  private readonly prefix: string;
  private readonly publicIpUrl: string;

  constructor(private readonly runner: CommandRunner, options: HostSystemInfoOptions = {}) {
    this.prefix = options.prefix ?? "";
    this.publicIpUrl = options.publicIpUrl ?? DEFAULT_PUBLIC_IP_URL;
  }

  async gather(): Promise<SystemInfo> {
    const { osDescription, osRelease } = await this.describeOs();
    return {
      hostname: hostname(),
      osDescription,
      osRelease,
      architecture: machine(),
      publicIp: await this.lookupPublicIp(),
    };
  }

  private async describeOs(): Promise<{ osDescription: string; osRelease: string }> {
    const description = await this.lsbRelease("-s -d");
    const release = await this.lsbRelease("-s -r");
    if (description) return { osDescription: description, osRelease: release ?? "" };

    const osRelease: Record<string, string> = readOsRelease(this.prefix) ?? {};
    return {
      osDescription: osRelease.PRETTY_NAME ?? osRelease.NAME ?? "Linux",
      osRelease: osRelease.VERSION_ID ?? "",
    };
  }

  private async lsbRelease(flags: string): Promise<string | null> {
    try {
      const result = await this.runner.run(`lsb_release ${flags}`);
      if (result.exitCode !== 0) return null;
      return cleanLsbValue(result.stdout) || null;
    } catch (err) {
      logger.debug({ error: err instanceof Error ? err.message : String(err) }, "lsb_release unavailable");
      return null;
    }
  }

  private async lookupPublicIp(): Promise<string> {
    try {
      const response = await fetch(this.publicIpUrl, { signal: AbortSignal.timeout(10_000) });
      const body = (await response.text()).trim();
      if (!response.ok || !body) {
        logger.warn({ url: this.publicIpUrl, status: response.status }, "Public IP lookup failed");
        return UNAVAILABLE;
      }
      return body;
    } catch (err) {
      logger.warn({ url: this.publicIpUrl, error: err instanceof Error ? err.message : String(err) }, "Public IP lookup failed");
      return UNAVAILABLE;
    }
  }
}
