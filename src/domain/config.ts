/**
 * Console configuration.
 *
 * `rootPath` is fixed once the console starts. `uiPath`, `maxEvents`
 * and `maxLogs` change only through the config-change broadcast.
 */
export interface ConsoleConfig {
  readonly rootPath: string;
  readonly uiPath: string;
  readonly maxEvents: number;
  readonly maxLogs: number;
}

export const DEFAULT_ROOT_PATH = '/dev-console';
export const DEFAULT_UI_PATH = '/ui';
export const DEFAULT_MAX_EVENTS = 1000;
export const DEFAULT_MAX_LOGS = 1000;

export const DEFAULT_CONSOLE_CONFIG: ConsoleConfig = {
  rootPath: DEFAULT_ROOT_PATH,
  uiPath: DEFAULT_UI_PATH,
  maxEvents: DEFAULT_MAX_EVENTS,
  maxLogs: DEFAULT_MAX_LOGS,
};

/** Keys under which console settings travel in a config-change payload. */
export const CONFIG_KEY_MAX_EVENTS = 'dev_console_max_events';
export const CONFIG_KEY_MAX_LOGS = 'dev_console_max_logs';
export const CONFIG_KEY_URL = 'dev_console_url';

export interface ConfigChangeSet {
  [CONFIG_KEY_MAX_EVENTS]?: number;
  [CONFIG_KEY_MAX_LOGS]?: number;
  [CONFIG_KEY_URL]?: string;
}

/** Shape served by `GET {root}/config`. */
export interface ConfigView {
  baseUrl: string;
  maxEvents: number;
  maxLogs: number;
}
