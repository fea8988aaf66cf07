import { randomUUID } from 'node:crypto';
import { Redis } from 'ioredis';
import type { Logger } from 'pino';
import { z } from 'zod';
import { CHANNEL_CONFIG_CHANGE } from '../../domain/index.js';
import type { BusEvent, BusListener, HostBus } from '../../domain/index.js';
import { CONFIG_RELAY_CHANNEL, publishConfigChange } from './config-notifier.js';

const relayPayloadSchema = z.object({
  origin: z.string().min(1),
  ts: z.string(),
  changes: z.record(z.string(), z.unknown()),
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Re-sends a config change received from another process as a local
 * `config_change` broadcast. Messages from this process and malformed
 * messages are skipped. The re-sent event is added to `relayed` so the
 * outbound side does not publish it back.
 *
 * Exported for unit testing; callers should use `startConfigRelay()`.
 */
export function handleRelayMessage(
  bus: HostBus,
  log: Logger,
  origin: string,
  rawMessage: string,
  relayed: WeakSet<BusEvent>,
): boolean {
  let json: unknown;
  try {
    json = JSON.parse(rawMessage);
  } catch (err: unknown) {
    log.warn({ err, message: rawMessage }, 'Failed to parse relayed config change');
    return false;
  }

  const parsed = relayPayloadSchema.safeParse(json);
  if (!parsed.success) {
    log.warn({ message: rawMessage }, 'Malformed relayed config change, skipping');
    return false;
  }

  if (parsed.data.origin === origin) return false;

  // Async delivery: the event is marked before any listener sees it.
  const event = bus.send(CHANNEL_CONFIG_CHANGE, parsed.data.changes, { broadcast: true, async: true });
  relayed.add(event);

  log.info({ origin: parsed.data.origin, changes: parsed.data.changes }, 'Applied relayed config change');
  return true;
}

/**
 * Shares `config_change` broadcasts between processes over Redis
 * Pub/Sub.
 *
 * ioredis needs a dedicated connection for subscriber mode, so the relay
 * opens one connection to publish and one to subscribe.
 *
 * Returns a cleanup function that detaches from the bus and closes both
 * connections.
 */
export async function startConfigRelay(
  redisUrl: string,
  bus: HostBus,
  log: Logger,
  channel: string = CONFIG_RELAY_CHANNEL,
  origin: string = randomUUID(),
): Promise<() => Promise<void>> {
  const options = { maxRetriesPerRequest: null, enableReadyCheck: true, lazyConnect: true };
  const pub = new Redis(redisUrl, options);
  const sub = new Redis(redisUrl, options);

  await Promise.all([pub.connect(), sub.connect()]);
  log.info({ origin }, 'Config relay Redis connections established');

  const relayed = new WeakSet<BusEvent>();

  const outbound: BusListener = (event) => {
    if (relayed.has(event) || !isRecord(event.payload)) return;
    // Errors are logged inside publishConfigChange()
    void publishConfigChange(pub, log, origin, event.payload, channel);
  };
  bus.subscribe(CHANNEL_CONFIG_CHANGE, outbound);

  sub.on('message', (from: string, message: string) => {
    if (from !== channel) return;
    handleRelayMessage(bus, log, origin, message, relayed);
  });

  await sub.subscribe(channel);
  log.info({ channel }, 'Subscribed to relayed config changes');

  return async () => {
    bus.unsubscribe(CHANNEL_CONFIG_CHANGE, outbound);
    await sub.unsubscribe(channel).catch((err: unknown) => {
      log.warn({ err, channel }, 'Config relay unsubscribe failed');
    });
    await Promise.all([sub.quit(), pub.quit()]).catch((err: unknown) => {
      log.warn({ err }, 'Config relay disconnect failed');
    });
    log.info('Config relay disconnected');
  };
}
