import type { Redis } from 'ioredis';
import type { Logger } from 'pino';

export const CONFIG_RELAY_CHANNEL = 'dev_console_config';

export interface ConfigRelayPayload {
  /** Id of the publishing process; subscribers skip their own messages. */
  origin: string;
  ts: string;
  changes: Record<string, unknown>;
}

/**
 * Publishes a config change set to the relay channel so other processes
 * of the host apply it too.
 *
 * Best-effort: publish failures are logged, never thrown.
 */
export async function publishConfigChange(
  redis: Pick<Redis, 'publish'>,
  log: Logger,
  origin: string,
  changes: Record<string, unknown>,
  channel: string = CONFIG_RELAY_CHANNEL,
): Promise<void> {
  try {
    const payload: ConfigRelayPayload = {
      origin,
      ts: new Date().toISOString(),
      changes,
    };
    await redis.publish(channel, JSON.stringify(payload));
    log.debug({ channel, changes }, 'Published config change to relay');
  } catch (err: unknown) {
    log.error({ err, channel }, 'Failed to publish config change to relay');
  }
}
