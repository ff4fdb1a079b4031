/**
 * @fileoverview Container Interfaces - Contracts of the Compiled Container
 *
 * @packageDocumentation
 * @module @emitwire/core/domain/container
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * The compiled container is the runtime face of the generated construction
 * code: a lookup from public service types to create functions, plus the
 * singletons the container owns.
 *
 * @version 1.0.0
 */

import { type ServiceIdentifier } from '../registration/service-identifier';
import { type ConstructionContext } from '../registration/construction-context';

// ============================================================================
// IDisposable - Resource Cleanup Interface
// ============================================================================

/**
 * Interface for objects that need cleanup when the container is disposed.
 *
 * @remarks
 * Only singletons owned by the container are disposed. Transient instances
 * belong to whoever resolved them.
 *
 * @example
 * ```typescript
 * class ConnectionPool implements IDisposable {
 *   async dispose(): Promise<void> {
 *     await this.end();
 *   }
 * }
 * ```
 */
export interface IDisposable {
  /**
   * Release resources held by this object.
   */
  dispose(): void | Promise<void>;
}

/**
 * Check if an object implements IDisposable.
 */
export function isDisposable(obj: unknown): obj is IDisposable {
  return (
    typeof obj === 'object' &&
    obj !== null &&
    'dispose' in obj &&
    typeof obj.dispose === 'function'
  );
}

// ============================================================================
// Create Functions
// ============================================================================

/**
 * A create function from the compiled lookup.
 *
 * @remarks
 * Functions emitted for compositions that do not require the context
 * ignore the argument.
 */
export type CreateFunction = (context?: ConstructionContext) => unknown;

/**
 * One public implementation of a service type.
 */
export interface ICreateEntry {
  readonly implementationKey: ServiceIdentifier;
  readonly create: CreateFunction;
}

// ============================================================================
// IEmittedContainer - Service Resolution
// ============================================================================

/**
 * IEmittedContainer - Resolve services through the compiled code.
 *
 * @template TExtra - Type of the extra data handed to the construction context
 *
 * @example
 * ```typescript
 * const container = new RegistrationSetup<RequestInfo>().register(CreateOrderHandler).construct();
 *
 * const handler = container.resolve(CreateOrderHandler, { requestId: 'req-1' });
 * const plugins = container.resolveAll(IPlugin);
 * ```
 */
export interface IEmittedContainer<TExtra = unknown> extends IDisposable {
  /**
   * Resolve the single public implementation of a service type.
   *
   * @throws ServiceNotRegisteredError if the type has no public registration
   * @throws AmbiguousDependencyError if it has several
   */
  resolve<T>(identifier: ServiceIdentifier<T>, extra?: TExtra): T;

  /**
   * Like {@link resolve}, but returns undefined for an unregistered type.
   */
  tryResolve<T>(identifier: ServiceIdentifier<T>, extra?: TExtra): T | undefined;

  /**
   * Resolve every public implementation of a service type, in
   * registration order; empty when there is none.
   */
  resolveAll<T>(identifier: ServiceIdentifier<T>, extra?: TExtra): T[];

  isRegistered(identifier: ServiceIdentifier): boolean;

  /**
   * Public service types, in registration order.
   */
  readonly services: readonly ServiceIdentifier[];
}
