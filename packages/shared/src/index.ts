/**
 * @keepsake/shared
 * Types, payload schemas, errors, configuration and logging shared by every package.
 */

export * from './types';
export * from './errors';
export * from './schemas';
export * from './config';
export * from './secrets';
export { logger, formatLog } from './logger';
export type { LogLevel, LogContext } from './logger';
