export interface SystemInfo {
  readonly hostname: string;
  readonly osDescription: string;
  readonly osRelease: string;
  readonly architecture: string;
  readonly publicIp: string;
}
