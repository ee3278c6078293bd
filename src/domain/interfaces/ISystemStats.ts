/**
 * Host Statistics Contract
 * Layer: Domain
 *
 * Health and load-test endpoints report a few facts about the pod they run in
 * so that a load balancer test can tell replicas apart. The contract keeps the
 * HTTP layer away from `node:os`, and lets tests substitute fixed numbers.
 */
export interface HostInfo {
  hostname: string;
  platform: string;
  nodeVersion: string;
  cpuCount: number;
  memoryTotal: number;
  memoryAvailable: number;
  /** Percent of the root volume in use, or null when the platform cannot report it. */
  diskUsage: number | null;
}

export interface MemoryInfo {
  total: number;
  available: number;
  percent: number;
  used: number;
  free: number;
}

export interface ISystemStats {
  /** `<hostname>-<pid>`, unique per replica process. */
  instanceId(): string;

  hostname(): string;

  hostInfo(): Promise<HostInfo>;

  memory(): MemoryInfo;

  /** CPU busy percent across all cores since the previous call. */
  cpuPercent(): number;
}
