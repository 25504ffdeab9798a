/**
 * @description: Public exports for shared logging utilities.
 * @scope: interface
 * @module: SharedIndex
 * @risk: low - Export changes can break downstream imports.
 */

export { logger, sanitizeLogData, describeError } from './logger';
