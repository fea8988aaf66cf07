export { LocalEventBus } from './local-event-bus.js';
export { startHeartbeat, DEFAULT_HEARTBEAT_MS } from './heartbeat.js';
