/**
 * Utilities Module
 */

export { safeJsonParse } from './json.js';
export { consoleLogger, silentLogger, type Logger } from './logger.js';
