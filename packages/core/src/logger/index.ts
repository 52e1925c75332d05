export { createLogger, resolveLogLevel } from './factory.js';
export type { CreateLoggerOptions } from './factory.js';

export * from './types.js';
export * from './schemas.js';
export * from './neurobik-logger.js';
export * from './transport-factory.js';
export * from './error-codes.js';
export * from './errors.js';
export * from './transports/console-transport.js';
export * from './transports/file-transport.js';
export * from './transports/silent-transport.js';
