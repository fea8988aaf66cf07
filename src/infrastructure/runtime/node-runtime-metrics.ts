import os from 'node:os';
import type { RuntimeMetrics, RuntimeSnapshot } from '../../domain/index.js';

const MB = 1024 * 1024;

/**
 * Runtime snapshot of the current Node.js process.
 *
 * CPU usage is the process CPU time spent since the previous snapshot
 * (or construction), relative to wall time across all cores.
 */
export class NodeRuntimeMetrics implements RuntimeMetrics {
  private lastCpu: NodeJS.CpuUsage = process.cpuUsage();
  private lastAt: bigint = process.hrtime.bigint();

  snapshot(): RuntimeSnapshot {
    const memory = process.memoryUsage();
    const cores = os.availableParallelism();

    const now = process.hrtime.bigint();
    const cpu = process.cpuUsage(this.lastCpu);
    const elapsedMicros = Number(now - this.lastAt) / 1000;
    const cpuUsagePercent = elapsedMicros > 0
      ? ((cpu.user + cpu.system) / elapsedMicros / cores) * 100
      : 0;
    this.lastCpu = process.cpuUsage();
    this.lastAt = now;

    const resources = process.getActiveResourcesInfo();

    return {
      pid: process.pid,
      usedMemoryMb: Math.round(memory.rss / MB),
      heapUsage: memory.heapTotal > 0
        ? Math.round((memory.heapUsed / memory.heapTotal) * 10_000) / 10_000
        : 0,
      cpuUsagePercent,
      cores,
      os: `${os.type()} - ${os.release()}`,
      arch: process.arch,
      runtimeVersion: process.version,
      activeResources: resources.length,
      timers: resources.filter((r) => r === 'Timeout').length,
    };
  }
}
