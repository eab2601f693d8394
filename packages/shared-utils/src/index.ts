export { Logger, createLogger, setLogLevel, resetLogLevel, getLogLevel, parseLogLevel } from './logger.js';
export type { LogLevel } from './logger.js';
export { nowIso, formatEpochMillis, epochMillisToIso, hoursBetween, LOG_TIME_FORMAT } from './date.js';
export { env, envNumber, envInteger } from './env.js';
