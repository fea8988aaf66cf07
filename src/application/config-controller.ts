import type { Logger } from 'pino';
import type { z } from 'zod';
import {
  CHANNEL_CONFIG_CHANGE,
  CONFIG_KEY_MAX_EVENTS,
  CONFIG_KEY_MAX_LOGS,
  CONFIG_KEY_URL,
} from '../domain/index.js';
import type {
  ConfigChangeSet,
  ConfigView,
  ConsoleConfig,
  HostBus,
} from '../domain/index.js';
import { maxEntriesSchema, uiPathSchema } from './config-schema.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Owns the live console configuration.
 *
 * Updates never mutate the config directly: `applyUpdate()` stages the
 * requested keys and broadcasts them, and the change lands when the
 * broadcast comes back through `configure()`. Other host components see
 * the same broadcast.
 */
export class LiveConfigController {
  private config: ConsoleConfig;

  constructor(
    initial: ConsoleConfig,
    private readonly bus: HostBus,
    private readonly onApplied: (config: ConsoleConfig) => void,
    private readonly log: Logger,
  ) {
    this.config = initial;
  }

  current(): ConsoleConfig {
    return this.config;
  }

  view(): ConfigView {
    return {
      baseUrl: this.config.uiPath,
      maxEvents: this.config.maxEvents,
      maxLogs: this.config.maxLogs,
    };
  }

  /**
   * Stages every recognised key present in `document` and broadcasts the
   * change set. Absent keys are left alone; invalid values are skipped.
   * Returns what was staged, which is not yet applied.
   */
  applyUpdate(document: unknown): ConfigChangeSet {
    const changes: ConfigChangeSet = {};

    if (isRecord(document)) {
      const maxEvents = this.stage(document, 'maxEvents', maxEntriesSchema);
      if (maxEvents !== undefined) changes[CONFIG_KEY_MAX_EVENTS] = maxEvents;

      const maxLogs = this.stage(document, 'maxLogs', maxEntriesSchema);
      if (maxLogs !== undefined) changes[CONFIG_KEY_MAX_LOGS] = maxLogs;

      const baseUrl = this.stage(document, 'baseUrl', uiPathSchema);
      if (baseUrl !== undefined) changes[CONFIG_KEY_URL] = baseUrl;
    }

    this.bus.send(CHANNEL_CONFIG_CHANGE, changes, { broadcast: true, async: true });
    this.log.info({ changes }, 'Config change broadcast');
    return changes;
  }

  /**
   * Apply callback for `config_change` broadcasts. Each console key is
   * read on its own: a key that is absent or invalid keeps its current
   * value, other components' keys are ignored. The owner then shrinks
   * what the new limits no longer allow.
   */
  configure(payload: unknown): ConsoleConfig {
    if (!isRecord(payload)) {
      this.log.debug({ payload }, 'Config change without a key/value payload, skipping');
      return this.config;
    }

    this.config = {
      ...this.config,
      maxEvents: this.read(payload, CONFIG_KEY_MAX_EVENTS, maxEntriesSchema) ?? this.config.maxEvents,
      maxLogs: this.read(payload, CONFIG_KEY_MAX_LOGS, maxEntriesSchema) ?? this.config.maxLogs,
      uiPath: this.read(payload, CONFIG_KEY_URL, uiPathSchema) ?? this.config.uiPath,
    };

    this.onApplied(this.config);
    return this.config;
  }

  private read<T>(
    payload: Record<string, unknown>,
    key: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): T | undefined {
    if (!(key in payload)) return undefined;

    const parsed = schema.safeParse(payload[key]);
    if (!parsed.success) {
      this.log.debug({ key, value: payload[key] }, 'Invalid console key in config change, keeping current value');
      return undefined;
    }
    return parsed.data;
  }

  private stage<T>(
    document: Record<string, unknown>,
    field: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): T | undefined {
    if (!(field in document)) return undefined;

    const parsed = schema.safeParse(document[field]);
    if (!parsed.success) {
      this.log.warn({ field, value: document[field] }, 'Ignoring invalid config value');
      return undefined;
    }
    return parsed.data;
  }
}
