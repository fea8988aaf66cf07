export { default as busBridge } from './bus-bridge.js';
export type { BusBridgeOptions } from './bus-bridge.js';
