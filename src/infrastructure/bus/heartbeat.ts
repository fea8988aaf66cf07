import { CHANNEL_HEARTBEAT } from '../../domain/index.js';
import type { HostBus } from '../../domain/index.js';

export const DEFAULT_HEARTBEAT_MS = 256;

/**
 * Sends an `app_heartbeat` event every `intervalMs`. The timer does not
 * keep the process alive. Returns the function that stops it.
 */
export function startHeartbeat(bus: HostBus, intervalMs: number = DEFAULT_HEARTBEAT_MS): () => void {
  bus.registerChannel(CHANNEL_HEARTBEAT);

  const timer = setInterval(() => {
    bus.send(CHANNEL_HEARTBEAT, { ts: Date.now() });
  }, intervalMs);
  timer.unref();

  return () => clearInterval(timer);
}
