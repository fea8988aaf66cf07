import type { Logger } from 'pino';
import type { BusListener, Channel, HostBus } from '../domain/index.js';

/**
 * Attaches one capture listener to every bus channel.
 *
 * The host adds channels while it runs, so `scan()` is called on start
 * and again on every heartbeat. A channel is subscribed at most once;
 * one whose subscription fails stays unregistered and is retried on the
 * next scan. Nothing is unsubscribed before `detachAll()`.
 */
export class ChannelSubscriptionManager {
  private readonly registry = new Map<Channel, BusListener>();

  constructor(
    private readonly bus: HostBus,
    private readonly capture: BusListener,
    private readonly log: Logger,
  ) {}

  get size(): number {
    return this.registry.size;
  }

  has(channel: Channel): boolean {
    return this.registry.has(channel);
  }

  /** Subscribes every channel not seen before. Returns the newly added ones. */
  scan(): Channel[] {
    const added: Channel[] = [];

    for (const channel of this.bus.channels()) {
      if (this.registry.has(channel)) continue;

      try {
        const handle = this.bus.subscribe(channel, this.capture);
        this.registry.set(channel, handle);
        added.push(channel);
      } catch (err: unknown) {
        this.log.warn({ err, channel }, 'Channel subscription failed, retrying on next heartbeat');
      }
    }

    if (added.length > 0) {
      this.log.debug({ channels: added }, 'Subscribed to new channels');
    }
    return added;
  }

  detachAll(): void {
    for (const [channel, handle] of this.registry) {
      this.bus.unsubscribe(channel, handle);
    }
    this.registry.clear();
  }
}
