/**
 * @fileoverview Logger - pino Logger for the Composition Pipeline
 *
 * @packageDocumentation
 * @module @emitwire/core/infrastructure/logging
 * @license Apache-2.0
 *
 * Composition, generation and compilation report through one pino logger.
 * Callers may hand in their own (for instance a child of their app logger).
 *
 * @version 1.0.0
 */

import type { LevelWithSilent, Logger } from 'pino';
import pino from 'pino';

export type { LevelWithSilent, Logger };

/**
 * Create the pipeline logger.
 *
 * @example
 * ```typescript
 * const logger = createLogger('debug');
 * logger.debug({ nodes: 12 }, 'Composition graph resolved');
 * ```
 */
export function createLogger(level: LevelWithSilent = 'warn'): Logger {
  return pino({
    name: 'emitwire',
    level,
  });
}
