export { formatLogRecord } from './log-formatter.js';
export { BusLogStream } from './bus-log-stream.js';
export { createLogger, LOG_LEVELS } from './logger.js';
