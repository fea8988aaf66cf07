export {
  CHANNEL_HEARTBEAT,
  CHANNEL_LOGGING,
  CHANNEL_HTTP_REQUEST,
  CHANNEL_CONFIG_CHANGE,
  CHANNEL_SERVICE_UNREGISTER,
} from './channel.js';
export type { Channel } from './channel.js';
export { BusEvent } from './event.js';
export type { CapturedEvent } from './event.js';
export {
  isHttpExchange,
  CONTENT_TYPE_JSON,
  CONTENT_TYPE_HTML,
  CONTENT_TYPE_CSS,
  CONTENT_TYPE_JAVASCRIPT,
  CONTENT_TYPE_TEXT,
} from './http.js';
export type { HttpExchange, HttpResponse } from './http.js';
export { NO_MATCH } from './route.js';
export type { RouteMatch, RouteKind } from './route.js';
export {
  DEFAULT_CONSOLE_CONFIG,
  DEFAULT_ROOT_PATH,
  DEFAULT_UI_PATH,
  DEFAULT_MAX_EVENTS,
  DEFAULT_MAX_LOGS,
  CONFIG_KEY_MAX_EVENTS,
  CONFIG_KEY_MAX_LOGS,
  CONFIG_KEY_URL,
} from './config.js';
export type { ConsoleConfig, ConfigChangeSet, ConfigView } from './config.js';
export type {
  BusListener,
  SendOptions,
  HostBus,
  Component,
  ComponentDirectory,
  RuntimeSnapshot,
  RuntimeMetrics,
  StaticFileLoader,
  LogFormatter,
} from './ports.js';
