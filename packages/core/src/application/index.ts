/**
 * @fileoverview Application Layer Exports
 *
 * The Application layer orchestrates the pipeline: it collects
 * registrations and runs them through composition, generation and
 * compilation.
 *
 * @module @emitwire/core/application
 * @license Apache-2.0
 */

// ============================================================================
// Registration - Fluent registration builder
// ============================================================================
export * from './registration';

// ============================================================================
// Construction - compose → generate → compile
// ============================================================================
export * from './construction';
