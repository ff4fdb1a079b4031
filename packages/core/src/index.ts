/**
 * @fileoverview @emitwire/core - Main Entry Point
 *
 * Ahead-of-time composition for dependency injection: registrations are
 * resolved once into a composition graph, and the graph is emitted as
 * plain JavaScript construction code.
 *
 * @packageDocumentation
 * @module @emitwire/core
 * @version 1.0.0
 * @license Apache-2.0
 *
 * @example
 * ```typescript
 * import { RegistrationSetup, createToken, many } from '@emitwire/core';
 *
 * interface IPlugin { readonly name: string; }
 * const IPlugin = createToken<IPlugin>('IPlugin');
 *
 * class PluginHost {
 *   static inject = [many(IPlugin)] as const;
 *   constructor(readonly plugins: IPlugin[]) {}
 * }
 *
 * const container = new RegistrationSetup()
 *   .register(IPlugin, AuditPlugin)
 *   .register(IPlugin, MetricsPlugin)
 *   .register(PluginHost)
 *   .construct();
 *
 * container.resolve(PluginHost).plugins.length; // 2
 * ```
 */

// ============================================================================
// Domain Layer Exports
// Registration model, composition contracts, errors
// ============================================================================
export * from './domain';

// ============================================================================
// Application Layer Exports
// Registration builder and build pipeline
// ============================================================================
export * from './application';

// ============================================================================
// Infrastructure Layer Exports
// Strategies, resolver, generator, compiler
// ============================================================================
export * from './infrastructure';

// ============================================================================
// Version
// ============================================================================
export const VERSION = '1.0.0';
