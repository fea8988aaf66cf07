import type { Logger } from 'pino';
import { BusEvent } from '../../domain/index.js';
import type {
  BusListener,
  Channel,
  HostBus,
  SendOptions,
} from '../../domain/index.js';

/**
 * In-process host bus.
 *
 * - channels are registered explicitly or on first subscribe/send, and
 *   never removed
 * - synchronous sends deliver to every listener, in subscription order,
 *   before returning
 * - `async: true` defers delivery to `setImmediate`; `drain()` waits for
 *   every deferred delivery, including ones queued while draining
 * - a throwing listener is logged and does not stop delivery to the
 *   others
 */
export class LocalEventBus implements HostBus {
  private readonly known = new Set<Channel>();
  // Arrays are replaced on (un)subscribe, so a delivery in progress keeps
  // iterating the list it started with.
  private readonly listeners = new Map<Channel, readonly BusListener[]>();
  private readonly pending = new Set<Promise<void>>();

  constructor(private readonly log: Logger) {}

  channels(): readonly Channel[] {
    return [...this.known];
  }

  registerChannel(channel: Channel): void {
    this.known.add(channel);
  }

  subscribe(channel: Channel, listener: BusListener): BusListener {
    this.known.add(channel);
    this.listeners.set(channel, [...(this.listeners.get(channel) ?? []), listener]);
    return listener;
  }

  unsubscribe(channel: Channel, listener: BusListener): void {
    const current = this.listeners.get(channel);
    if (current === undefined) return;

    const next = current.filter((l) => l !== listener);
    if (next.length === 0) {
      this.listeners.delete(channel);
    } else {
      this.listeners.set(channel, next);
    }
  }

  send<P, R = unknown>(channel: Channel, payload: P, options: SendOptions = {}): BusEvent<P, R> {
    this.known.add(channel);
    const event = new BusEvent<P, R>(channel, payload, options.broadcast ?? false);

    if (options.async === true) {
      const delivery = new Promise<void>((resolve) => {
        setImmediate(() => {
          try {
            this.deliver(event);
          } finally {
            this.pending.delete(delivery);
            resolve();
          }
        });
      });
      this.pending.add(delivery);
    } else {
      this.deliver(event);
    }

    return event;
  }

  listenerCount(): number {
    let total = 0;
    for (const list of this.listeners.values()) {
      total += list.length;
    }
    return total;
  }

  /** Resolves once no deferred delivery is outstanding. */
  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  private deliver(event: BusEvent): void {
    const listeners = this.listeners.get(event.channel);
    if (listeners === undefined) return;

    for (const listener of listeners) {
      try {
        listener(event);
      } catch (err: unknown) {
        this.log.error({ err, channel: event.channel }, 'Bus listener failed');
      }
    }
  }
}
