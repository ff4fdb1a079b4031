/**
 * @fileoverview Domain Registration Module Exports
 *
 * @packageDocumentation
 * @module @emitwire/core/domain/registration
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * This module exports the registration model: service identifiers,
 * dependency markers, lifetimes and registration records.
 *
 * ## Zero-Reflection Pattern
 *
 * Dependencies are declared with static properties instead of decorators:
 *
 * ```typescript
 * import { createToken, many, lazy } from '@emitwire/core';
 *
 * interface IPlugin { name: string; }
 * const IPlugin = createToken<IPlugin>('IPlugin');
 *
 * class PluginHost {
 *   static inject = [many(IPlugin), lazy(Scheduler)] as const;
 *   constructor(readonly plugins: IPlugin[], readonly scheduler: () => Scheduler) {}
 * }
 * ```
 */

// ============================================================================
// Service Identifier
// ============================================================================

export {
  type ServiceIdentifier,
  type Constructor,
  type AbstractConstructor,
  type IInjectableConstructor,
  type Dependency,
  type ManyDependency,
  type LazyDependency,
  CONSTRUCTION_CONTEXT,
  many,
  lazy,
  isServiceIdentifier,
  isManyDependency,
  isLazyDependency,
  isDependency,
  getInjectSignatures,
  getInjectProperties,
  getServiceName,
  getDependencyName,
  getSimpleName,
  getQualifiedName,
  createToken,
} from './service-identifier';

// ============================================================================
// Service Lifetime
// ============================================================================

export {
  ServiceLifetime,
  isServiceLifetime,
  getLifetimeName,
} from './service-lifetime';

// ============================================================================
// Construction Context
// ============================================================================

export { ConstructionContext } from './construction-context';

// ============================================================================
// Registrations
// ============================================================================

export {
  type ServiceFactory,
  type IRegistration,
  type IClassRegistration,
  type IFactoryRegistration,
  type IInstanceRegistration,
  type IInjectedSingletonRegistration,
  type BuiltInRegistration,
  type IRegistrationOptions,
  type IClassRegistrationOptions,
  type IFactoryRegistrationOptions,
  createClassRegistration,
  createFactoryRegistration,
  createInstanceRegistration,
  createInjectedSingletonRegistration,
  validateRegistration,
  isClassRegistration,
  isFactoryRegistration,
  isInstanceRegistration,
  isInjectedSingletonRegistration,
} from './registration';
