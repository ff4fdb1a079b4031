/**
 * @fileoverview Infrastructure Layer Exports
 *
 * @module @emitwire/core/infrastructure
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Concrete composition strategies, the graph resolver, the code generator
 * and the loader for generated code, plus configuration and logging.
 */

// ============================================================================
// Composition - Strategies, visitors and the graph resolver
// ============================================================================
export * from './composition';

// ============================================================================
// Generation - Construction code synthesis
// ============================================================================
export * from './generation';

// ============================================================================
// Compilation - Loading generated code
// ============================================================================
export * from './compilation';

// ============================================================================
// Config & Logging
// ============================================================================
export {
  type ComposeOptions,
  type IComposeOptionsInput,
  parseComposeOptions,
  DEFAULT_SOURCE_NAME,
} from './config/compose-options';

export { type Logger, type LevelWithSilent, createLogger } from './logging/logger';
