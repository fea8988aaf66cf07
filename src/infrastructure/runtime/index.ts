export { NodeRuntimeMetrics } from './node-runtime-metrics.js';
