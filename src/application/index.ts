export { BoundedHistory } from './history.js';
export { HistoryRecorder } from './history-recorder.js';
export type { RequestRouter, HistoryLimits, RecorderStats } from './history-recorder.js';
export { ChannelSubscriptionManager } from './subscription-manager.js';
export { matchRoute, normalizePath } from './route-matcher.js';
export type { RouteContext } from './route-matcher.js';
export { RequestDispatcher, INDEX_FILE } from './request-dispatcher.js';
export type { DispatchContext } from './request-dispatcher.js';
export { responseOk, contentTypeFor, CORS_HEADERS } from './response.js';
export { toEventView } from './event-view.js';
export type { EventView } from './event-view.js';
export { buildSystemInfo } from './system-info.js';
export type { SystemInfo } from './system-info.js';
export { renderValue, truncate, formatTimestamp, TRUNCATE_AT, TRUNCATION_MARKER } from './render.js';
export { LiveConfigController } from './config-controller.js';
export { maxEntriesSchema, uiPathSchema } from './config-schema.js';
export { StaticAssetsError } from './errors.js';
export {
  DevConsoleService,
  DEV_CONSOLE_NAME,
  DEFAULT_EXCLUDED_COMPONENTS,
  ROOT_PATH_PLACEHOLDER,
} from './dev-console-service.js';
export type { DevConsoleOptions } from './dev-console-service.js';
