import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';
import { maxEntriesSchema, uiPathSchema } from '../../application/index.js';
import {
  DEFAULT_MAX_EVENTS,
  DEFAULT_MAX_LOGS,
  DEFAULT_ROOT_PATH,
  DEFAULT_UI_PATH,
} from '../../domain/index.js';
import { DEFAULT_HEARTBEAT_MS } from '../bus/index.js';
import { LOG_LEVELS } from '../logging/index.js';

type RawSection = Record<string, unknown>;
type RawConfig = Record<string, RawSection>;

/**
 * Service configuration: defaults, overlaid by `config/dev-console.yaml`,
 * overlaid by environment variables, then validated.
 */
export const appConfigSchema = z.object({
  server: z.object({
    host: z.string().min(1),
    port: z.coerce.number().int().min(0).max(65535),
    log_level: z.enum(LOG_LEVELS),
  }),
  dev_console: z.object({
    root_path: z.string().min(2).startsWith('/'),
    ui_path: uiPathSchema,
    max_events: maxEntriesSchema,
    max_logs: maxEntriesSchema,
    heartbeat_ms: maxEntriesSchema,
    static_dir: z.string().min(1),
    excluded_components: z.array(z.string().min(1)),
  }),
  redis: z.object({
    url: z.string(),
    channel: z.string().min(1),
  }),
});

export type AppConfig = z.infer<typeof appConfigSchema>;

export const DEFAULT_CONFIG_PATH = resolve(process.cwd(), 'config', 'dev-console.yaml');

export const DEFAULT_APP_CONFIG: AppConfig = {
  server: { host: '0.0.0.0', port: 3000, log_level: 'info' },
  dev_console: {
    root_path: DEFAULT_ROOT_PATH,
    ui_path: DEFAULT_UI_PATH,
    max_events: DEFAULT_MAX_EVENTS,
    max_logs: DEFAULT_MAX_LOGS,
    heartbeat_ms: DEFAULT_HEARTBEAT_MS,
    static_dir: resolve(process.cwd(), 'public', 'dev-console'),
    excluded_components: ['LogService'],
  },
  redis: { url: '', channel: 'dev_console_config' },
};

/** Environment variable → [section, key]. */
const ENV_OVERRIDES: ReadonlyArray<readonly [string, string, string]> = [
  ['HOST', 'server', 'host'],
  ['PORT', 'server', 'port'],
  ['LOG_LEVEL', 'server', 'log_level'],
  ['DEV_CONSOLE_ROOT_PATH', 'dev_console', 'root_path'],
  ['DEV_CONSOLE_URL', 'dev_console', 'ui_path'],
  ['DEV_CONSOLE_MAX_EVENTS', 'dev_console', 'max_events'],
  ['DEV_CONSOLE_MAX_LOGS', 'dev_console', 'max_logs'],
  ['DEV_CONSOLE_HEARTBEAT_MS', 'dev_console', 'heartbeat_ms'],
  ['DEV_CONSOLE_STATIC_DIR', 'dev_console', 'static_dir'],
  ['REDIS_URL', 'redis', 'url'],
];

function unquote(value: string): string {
  if (value.length >= 2 && ((value.startsWith('"') && value.endsWith('"'))
    || (value.startsWith("'") && value.endsWith("'")))) {
    return value.slice(1, -1);
  }
  return value;
}

/**
 * Reader for the YAML subset the config file uses: top-level section
 * keys, indented `key: value` scalars, and `- item` lists under a key
 * whose value is empty or `[]`. Not a general-purpose YAML parser.
 */
export function parseSimpleYaml(content: string): RawConfig {
  const result: RawConfig = {};
  let section: RawSection | null = null;
  let listKey: string | null = null;

  for (const rawLine of content.split('\n')) {
    const line = rawLine.trimEnd();
    const trimmed = line.trim();
    if (trimmed === '' || trimmed.startsWith('#')) continue;

    const indented = line.startsWith(' ') || line.startsWith('\t');

    if (!indented && trimmed.endsWith(':')) {
      section = {};
      result[trimmed.slice(0, -1).trim()] = section;
      listKey = null;
      continue;
    }

    if (section === null || !indented) continue;

    if (trimmed.startsWith('- ')) {
      const list = listKey === null ? undefined : section[listKey];
      if (Array.isArray(list)) list.push(unquote(trimmed.slice(2).trim()));
      continue;
    }

    const colon = trimmed.indexOf(':');
    if (colon === -1) continue;

    const key = trimmed.slice(0, colon).trim();
    const value = trimmed.slice(colon + 1).trim();

    if (value === '' || value === '[]') {
      section[key] = [];
      listKey = key;
    } else {
      section[key] = unquote(value);
      listKey = null;
    }
  }

  return result;
}

function readConfigFile(path: string): RawConfig {
  try {
    return parseSimpleYaml(readFileSync(path, 'utf-8'));
  } catch (err: unknown) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return {};
    throw err;
  }
}

/**
 * Loads and validates the service configuration. A missing file means
 * defaults; an invalid value anywhere throws with the zod issues.
 */
export function loadAppConfig(
  configPath: string = DEFAULT_CONFIG_PATH,
  env: NodeJS.ProcessEnv = process.env,
): AppConfig {
  const merged: RawConfig = {
    server: { ...DEFAULT_APP_CONFIG.server },
    dev_console: { ...DEFAULT_APP_CONFIG.dev_console },
    redis: { ...DEFAULT_APP_CONFIG.redis },
  };

  for (const [name, values] of Object.entries(readConfigFile(configPath))) {
    const target = merged[name];
    if (target !== undefined) Object.assign(target, values);
  }

  for (const [variable, name, key] of ENV_OVERRIDES) {
    const value = env[variable];
    const target = merged[name];
    if (value !== undefined && value !== '' && target !== undefined) target[key] = value;
  }

  const parsed = appConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }
  return parsed.data;
}
