import type { RuntimeSnapshot } from '../domain/index.js';
import type { RecorderStats } from './history-recorder.js';
import { formatTimestamp } from './render.js';

export interface SystemInfo {
  pid: number;
  usedMemory: string;
  services: number;
  serviceNames: string[];
  listeners: number;
  heapUsage: number;
  os: string;
  arch: string;
  node: string;
  cores: number;
  cpuUsage: number;
  activeResources: number;
  timers: number;
  totalEvents: number;
  lastLogsRetained: number;
  lastEventsRetained: number;
  lastUpdated: string;
}

export function buildSystemInfo(
  runtime: RuntimeSnapshot,
  serviceNames: readonly string[],
  listeners: number,
  stats: RecorderStats,
  now: Date,
): SystemInfo {
  return {
    pid: runtime.pid,
    usedMemory: `${runtime.usedMemoryMb} MB`,
    services: serviceNames.length,
    serviceNames: [...serviceNames],
    listeners,
    heapUsage: runtime.heapUsage,
    os: runtime.os,
    arch: runtime.arch,
    node: runtime.runtimeVersion,
    cores: runtime.cores,
    cpuUsage: Math.round(runtime.cpuUsagePercent * 100) / 100,
    activeResources: runtime.activeResources,
    timers: runtime.timers,
    totalEvents: stats.totalEvents,
    lastLogsRetained: stats.lastLogsRetained,
    lastEventsRetained: stats.lastEventsRetained,
    lastUpdated: formatTimestamp(now),
  };
}
