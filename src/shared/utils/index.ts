/**
 * Shared Utilities
 */

export { logger, Logger, LogLevel, parseLogLevel } from './logger';
export type { LogMeta } from './logger';
export { generateId } from './uuid';
export { AsyncQueue } from './async-queue';
