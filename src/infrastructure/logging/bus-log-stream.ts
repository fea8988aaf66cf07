import type { DestinationStream } from 'pino';
import { CHANNEL_LOGGING } from '../../domain/index.js';
import type { HostBus } from '../../domain/index.js';

/**
 * pino destination that publishes every log record on the `logging`
 * channel.
 *
 * Records are dropped until `connect()` is called, and while a record
 * is being delivered: a line logged by a `logging` listener reaches the
 * other streams only, so a listener that logs cannot feed itself.
 */
export class BusLogStream implements DestinationStream {
  private bus: HostBus | null = null;
  private forwarding = false;

  connect(bus: HostBus): void {
    this.bus = bus;
    bus.registerChannel(CHANNEL_LOGGING);
  }

  disconnect(): void {
    this.bus = null;
  }

  write(line: string): void {
    if (this.bus === null || this.forwarding) return;

    this.forwarding = true;
    try {
      this.bus.send(CHANNEL_LOGGING, parseRecord(line));
    } finally {
      this.forwarding = false;
    }
  }
}

function parseRecord(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    // Not JSON (a custom serializer or a partial write): keep the text.
    return line.trimEnd();
  }
}
