import { vi } from 'vitest';
import type { DestinationStream } from 'pino';
import type { Component, RuntimeSnapshot } from '../src/domain/index.js';

/** Minimal fake logger; `child()` hands back the same fake. */
export function fakeLogger() {
  const log = {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    trace: vi.fn(),
    child: vi.fn(),
  };
  log.child.mockReturnValue(log);
  return log as unknown as import('pino').Logger;
}

/** Fixed runtime snapshot for system-info assertions. */
export const FIXED_RUNTIME: RuntimeSnapshot = {
  pid: 4242,
  usedMemoryMb: 128,
  heapUsage: 0.5,
  cpuUsagePercent: 12.3456,
  cores: 8,
  os: 'Linux - 6.1.0',
  arch: 'x64',
  runtimeVersion: 'v20.11.0',
  activeResources: 7,
  timers: 2,
};

/** Component whose stop() is a spy. */
export function fakeComponent(name: string) {
  const component = { name, stop: vi.fn() };
  return component satisfies Component;
}

/** Log sink that keeps every JSON line written to it. */
export function memoryDestination(): DestinationStream & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    write(line: string) {
      lines.push(line);
    },
  };
}

/** Fixed "now" for deterministic timestamps. */
export const FIXED_NOW = new Date(2026, 1, 18, 9, 5, 3);
