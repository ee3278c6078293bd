/**
 * Unit Tests — SystemStatsService
 *
 * `os.cpus()` and the memory calls are stubbed where a test needs exact
 * numbers; everything else runs against the real host.
 */
import { SystemStatsService } from '@infrastructure/system/SystemStatsService';
import os, { type CpuInfo } from 'node:os';

function cpu(user: number, sys: number, idle: number): CpuInfo {
  return { model: 'test-cpu', speed: 1000, times: { user, nice: 0, sys, idle, irq: 0 } };
}

describe('SystemStatsService', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should build the instance id from hostname and pid', () => {
    const stats = new SystemStatsService();

    expect(stats.instanceId()).toBe(`${os.hostname()}-${process.pid}`);
    expect(stats.hostname()).toBe(os.hostname());
  });

  describe('cpuPercent()', () => {
    it('should report the busy share of ticks since the previous sample', () => {
      const cpus = jest.spyOn(os, 'cpus');
      cpus.mockReturnValue([cpu(100, 100, 800), cpu(100, 100, 800)]);
      const stats = new SystemStatsService();

      cpus.mockReturnValue([cpu(200, 200, 1600), cpu(150, 150, 1200)]);

      // ticks: total 2000 → 3500 (+1500), idle 1600 → 2800 (+1200)
      expect(stats.cpuPercent()).toBe(20);
    });

    it('should report 0 when no ticks elapsed', () => {
      jest.spyOn(os, 'cpus').mockReturnValue([cpu(100, 100, 800)]);
      const stats = new SystemStatsService();

      expect(stats.cpuPercent()).toBe(0);
    });
  });

  describe('memory()', () => {
    it('should derive used and percent from total and free', () => {
      jest.spyOn(os, 'totalmem').mockReturnValue(8_000);
      jest.spyOn(os, 'freemem').mockReturnValue(2_000);

      expect(new SystemStatsService().memory()).toEqual({
        total: 8_000,
        available: 2_000,
        percent: 75,
        used: 6_000,
        free: 2_000,
      });
    });

    it('should round the percentage to one decimal', () => {
      jest.spyOn(os, 'totalmem').mockReturnValue(3_000);
      jest.spyOn(os, 'freemem').mockReturnValue(2_000);

      expect(new SystemStatsService().memory().percent).toBe(33.3);
    });
  });

  describe('hostInfo()', () => {
    it('should describe the host', async () => {
      const info = await new SystemStatsService().hostInfo();

      expect(info.hostname).toBe(os.hostname());
      expect(info.nodeVersion).toBe(process.versions.node);
      expect(info.cpuCount).toBe(os.cpus().length);
      expect(info.platform).toBe(`${os.type()}-${os.release()}-${os.arch()}`);
      if (info.diskUsage !== null) {
        expect(info.diskUsage).toBeGreaterThanOrEqual(0);
        expect(info.diskUsage).toBeLessThanOrEqual(100);
      }
    });
  });
});
