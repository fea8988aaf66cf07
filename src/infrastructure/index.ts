export { LocalEventBus, startHeartbeat, DEFAULT_HEARTBEAT_MS } from './bus/index.js';
export { ComponentRegistry } from './host/index.js';
export { NodeRuntimeMetrics } from './runtime/index.js';
export { BusLogStream, createLogger, formatLogRecord, LOG_LEVELS } from './logging/index.js';
export { staticFileLoader, DEFAULT_STATIC_DIR } from './static/index.js';
export {
  loadAppConfig,
  parseSimpleYaml,
  appConfigSchema,
  DEFAULT_APP_CONFIG,
  DEFAULT_CONFIG_PATH,
} from './config/index.js';
export type { AppConfig } from './config/index.js';
export {
  startConfigRelay,
  handleRelayMessage,
  publishConfigChange,
  CONFIG_RELAY_CHANNEL,
} from './redis/index.js';
export type { ConfigRelayPayload } from './redis/index.js';
