/**
 * Bus channel identifiers.
 *
 * A channel is an opaque name for a category of bus traffic. The host
 * creates channels at runtime; the set only ever grows.
 */
export type Channel = string;

export const CHANNEL_HEARTBEAT: Channel = 'app_heartbeat';
export const CHANNEL_LOGGING: Channel = 'logging';
export const CHANNEL_HTTP_REQUEST: Channel = 'http_request';
export const CHANNEL_CONFIG_CHANGE: Channel = 'config_change';
export const CHANNEL_SERVICE_UNREGISTER: Channel = 'app_service_unregister';
