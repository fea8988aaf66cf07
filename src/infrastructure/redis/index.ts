export { publishConfigChange, CONFIG_RELAY_CHANNEL } from './config-notifier.js';
export type { ConfigRelayPayload } from './config-notifier.js';
export { startConfigRelay, handleRelayMessage } from './config-relay.js';
