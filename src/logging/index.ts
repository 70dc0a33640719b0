/**
 * Logging Module - Barrel Exports
 *
 * Usage:
 * ```typescript
 * import { Logger } from '@/logging/index.js';
 * ```
 */

export { Logger } from './logger.service.js';
export type { LogFields, LoggerOptions } from './logger.service.js';
