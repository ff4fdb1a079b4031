/**
 * @fileoverview Domain Layer Exports
 *
 * The Domain layer holds the registration model, the composition contracts
 * and the error taxonomy. NO infrastructure dependencies are allowed here
 * (Hexagonal Architecture).
 *
 * @module @emitwire/core/domain
 * @license Apache-2.0
 */

// ============================================================================
// Registration - What was asked for
// ============================================================================
export * from './registration';

// ============================================================================
// Composition - Graph contracts and errors
// ============================================================================
export * from './composition';

// ============================================================================
// Container - Compiled container contracts
// ============================================================================
export * from './container';
