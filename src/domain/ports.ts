import type { Channel } from './channel.js';
import type { BusEvent } from './event.js';

/** Listeners see every payload as `unknown` and narrow it themselves. */
export type BusListener = (event: BusEvent) => void;

export interface SendOptions {
  /** Deliver to every interested component, not only the first responder. */
  broadcast?: boolean;
  /** Defer delivery; `send()` returns before any listener runs. */
  async?: boolean;
}

/** The host's event bus, as seen by the console. */
export interface HostBus {
  channels(): readonly Channel[];
  registerChannel(channel: Channel): void;
  subscribe(channel: Channel, listener: BusListener): BusListener;
  unsubscribe(channel: Channel, listener: BusListener): void;
  send<P, R = unknown>(channel: Channel, payload: P, options?: SendOptions): BusEvent<P, R>;
  listenerCount(): number;
}

/** A named, live part of the host application. */
export interface Component {
  readonly name: string;
  stop(): Promise<void> | void;
}

export interface ComponentDirectory {
  list(): readonly Component[];
}

export interface RuntimeSnapshot {
  pid: number;
  usedMemoryMb: number;
  heapUsage: number;
  cpuUsagePercent: number;
  cores: number;
  os: string;
  arch: string;
  runtimeVersion: string;
  activeResources: number;
  timers: number;
}

export interface RuntimeMetrics {
  snapshot(): RuntimeSnapshot;
}

/** Loads the dashboard's static files once, keyed by file name. */
export type StaticFileLoader = () => Promise<ReadonlyMap<string, string>>;

/** Turns one structured log record into a display line. */
export type LogFormatter = (record: unknown) => string;
