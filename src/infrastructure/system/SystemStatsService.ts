/**
 * Host Statistics from `node:os`
 * Layer: Infrastructure
 *
 * CPU usage is derived from the cumulative per-core tick counters that
 * `os.cpus()` reports: each call compares against the previous sample, so the
 * first reading after boot covers the whole uptime of the service. Memory
 * figures come straight from the kernel; Node exposes no separate
 * "available" number, so free memory stands in for it.
 */
import { statfs } from 'node:fs/promises';
import os from 'node:os';

import type { HostInfo, ISystemStats, MemoryInfo } from '@domain/interfaces/ISystemStats';

interface CpuSample {
  idle: number;
  total: number;
}

function sampleCpu(): CpuSample {
  let idle = 0;
  let total = 0;
  for (const cpu of os.cpus()) {
    const { user, nice, sys, irq } = cpu.times;
    idle += cpu.times.idle;
    total += user + nice + sys + irq + cpu.times.idle;
  }
  return { idle, total };
}

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

export class SystemStatsService implements ISystemStats {
  private lastCpu: CpuSample = sampleCpu();

  instanceId(): string {
    return `${os.hostname()}-${process.pid}`;
  }

  hostname(): string {
    return os.hostname();
  }

  async hostInfo(): Promise<HostInfo> {
    return {
      hostname: os.hostname(),
      platform: `${os.type()}-${os.release()}-${os.arch()}`,
      nodeVersion: process.versions.node,
      cpuCount: os.cpus().length,
      memoryTotal: os.totalmem(),
      memoryAvailable: os.freemem(),
      diskUsage: await this.diskUsage(),
    };
  }

  memory(): MemoryInfo {
    const total = os.totalmem();
    const free = os.freemem();
    const used = total - free;
    return {
      total,
      available: free,
      percent: total > 0 ? round1((used / total) * 100) : 0,
      used,
      free,
    };
  }

  cpuPercent(): number {
    const current = sampleCpu();
    const totalDelta = current.total - this.lastCpu.total;
    const idleDelta = current.idle - this.lastCpu.idle;
    this.lastCpu = current;

    if (totalDelta <= 0) return 0;
    return round1(((totalDelta - idleDelta) / totalDelta) * 100);
  }

  private async diskUsage(): Promise<number | null> {
    const root = process.platform === 'win32' ? 'C:\\' : '/';
    try {
      const stats = await statfs(root);
      if (stats.blocks === 0) return null;
      return round1(((stats.blocks - stats.bfree) / stats.blocks) * 100);
    } catch (err) {
      // Some container runtimes deny statfs on the root mount.
      if (err instanceof Error && 'code' in err) return null;
      throw err;
    }
  }
}
