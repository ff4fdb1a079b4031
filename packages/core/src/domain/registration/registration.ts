/**
 * @fileoverview Registration - Registration Model Records
 *
 * @packageDocumentation
 * @module @emitwire/core/domain/registration
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * This module defines the immutable records of what was asked for: for each
 * service type, an ordered list of registrations, each carrying an
 * implementation class, a pre-built value, a factory or an injected slot.
 *
 * The set of registration kinds is open: a custom kind only needs a
 * `kind` string and a visitor able to accept it.
 *
 * @version 1.0.0
 */

import { ArgumentInvalidError } from '../composition/composition.errors';

import { type ConstructionContext } from './construction-context';
import {
  type ServiceIdentifier,
  type IInjectableConstructor,
  CONSTRUCTION_CONTEXT,
  isServiceIdentifier,
  isDependency,
  getQualifiedName,
  getServiceName,
} from './service-identifier';
import { ServiceLifetime, isServiceLifetime } from './service-lifetime';

/**
 * Factory delegate for factory registrations.
 *
 * @remarks
 * A factory declaring a parameter receives the per-resolution
 * {@link ConstructionContext}; a parameterless factory is called without
 * one.
 */
export type ServiceFactory<T = unknown, TExtra = unknown> = (context: ConstructionContext<TExtra>) => T;

/**
 * Fields shared by every registration kind.
 */
export interface IRegistration {
  /**
   * Registration kind used for visitor dispatch.
   */
  readonly kind: string;

  /**
   * The service type consumers request.
   */
  readonly serviceType: ServiceIdentifier;

  /**
   * Key of the composition node built for this registration.
   *
   * @remarks
   * One node exists per implementation key, however many service types
   * reference it.
   */
  readonly implementationKey: ServiceIdentifier;

  readonly lifetime: ServiceLifetime;

  /**
   * Internal registrations take part in the graph (as dependencies and as
   * collection members) but are left out of the public service lookup.
   */
  readonly internal: boolean;
}

export interface IClassRegistration extends IRegistration {
  readonly kind: 'class';
  readonly implementationType: IInjectableConstructor;
}

export interface IFactoryRegistration extends IRegistration {
  readonly kind: 'factory';
  readonly factory: ServiceFactory<unknown, never>;
  readonly usesContext: boolean;
}

export interface IInstanceRegistration extends IRegistration {
  readonly kind: 'instance';
  readonly value: unknown;
}

export interface IInjectedSingletonRegistration extends IRegistration {
  readonly kind: 'injected-singleton';
}

/**
 * The registration kinds handled by the built-in visitors.
 */
export type BuiltInRegistration =
  | IClassRegistration
  | IFactoryRegistration
  | IInstanceRegistration
  | IInjectedSingletonRegistration;

/**
 * Options accepted by every registration helper.
 */
export interface IRegistrationOptions {
  /**
   * Exclude the registration from the public service lookup.
   */
  internal?: boolean;

  /**
   * Node key for value, factory and injected registrations.
   *
   * @remarks
   * Defaults to a fresh symbol described by the service type's name, so
   * every registration gets its own composition node. Registrations passing
   * the same key share one node.
   */
  implementationKey?: ServiceIdentifier;
}

export interface IClassRegistrationOptions extends IRegistrationOptions {
  lifetime?: ServiceLifetime.Transient | ServiceLifetime.Singleton;
}

export interface IFactoryRegistrationOptions extends IRegistrationOptions {
  lifetime?: ServiceLifetime.Transient | ServiceLifetime.Singleton;

  /**
   * Whether the factory takes the construction context.
   *
   * @remarks
   * Defaults to whether the factory declares a parameter.
   */
  usesContext?: boolean;
}

// ============================================================================
// Factory Helpers
// ============================================================================

/**
 * A node key unique to one registration.
 */
function createImplementationKey(serviceType: ServiceIdentifier): symbol {
  return Symbol(getQualifiedName(serviceType));
}

/**
 * Create a registration for an implementation class.
 *
 * @example
 * ```typescript
 * const registration = createClassRegistration(IUserRepository, SqlUserRepository);
 * ```
 */
export function createClassRegistration(
  serviceType: ServiceIdentifier,
  implementationType: IInjectableConstructor,
  options?: IClassRegistrationOptions,
): IClassRegistration {
  return {
    kind: 'class',
    serviceType,
    implementationKey: implementationType,
    implementationType,
    lifetime: options?.lifetime ?? ServiceLifetime.Transient,
    internal: options?.internal ?? false,
  };
}

/**
 * Create a registration for a factory delegate.
 */
export function createFactoryRegistration(
  serviceType: ServiceIdentifier,
  factory: ServiceFactory<unknown, never>,
  options?: IFactoryRegistrationOptions,
): IFactoryRegistration {
  return {
    kind: 'factory',
    serviceType,
    implementationKey: options?.implementationKey ?? createImplementationKey(serviceType),
    factory,
    usesContext: options?.usesContext ?? factory.length > 0,
    lifetime: options?.lifetime ?? ServiceLifetime.Transient,
    internal: options?.internal ?? false,
  };
}

/**
 * Create a registration for a pre-built value.
 *
 * @remarks
 * Value registrations are always Singleton (the value already exists).
 */
export function createInstanceRegistration(
  serviceType: ServiceIdentifier,
  value: unknown,
  options?: IRegistrationOptions,
): IInstanceRegistration {
  return {
    kind: 'instance',
    serviceType,
    implementationKey: options?.implementationKey ?? createImplementationKey(serviceType),
    value,
    lifetime: ServiceLifetime.Singleton,
    internal: options?.internal ?? false,
  };
}

/**
 * Create a registration whose value is supplied when the container is
 * compiled.
 */
export function createInjectedSingletonRegistration(
  serviceType: ServiceIdentifier,
  options?: IRegistrationOptions,
): IInjectedSingletonRegistration {
  return {
    kind: 'injected-singleton',
    serviceType,
    implementationKey: options?.implementationKey ?? createImplementationKey(serviceType),
    lifetime: ServiceLifetime.InjectedSingleton,
    internal: options?.internal ?? false,
  };
}

// ============================================================================
// Validation
// ============================================================================

/**
 * Validate a registration before it reaches the composition graph.
 *
 * @throws ArgumentInvalidError if the registration is malformed
 *
 * @internal
 */
export function validateRegistration(registration: IRegistration): void {
  if (typeof registration !== 'object' || registration === null) {
    throw new ArgumentInvalidError('registration', 'must be an object');
  }

  if (typeof registration.kind !== 'string' || registration.kind.length === 0) {
    throw new ArgumentInvalidError('registration.kind', 'must be a non-empty string');
  }

  if (!isServiceIdentifier(registration.serviceType)) {
    throw new ArgumentInvalidError(
      'registration.serviceType',
      `must be a constructor, symbol or non-empty string, got ${String(registration.serviceType)}`,
    );
  }

  if (!isServiceIdentifier(registration.implementationKey)) {
    throw new ArgumentInvalidError(
      'registration.implementationKey',
      `must be a constructor, symbol or non-empty string for '${getServiceName(registration.serviceType)}'`,
    );
  }

  if (!isServiceLifetime(registration.lifetime)) {
    throw new ArgumentInvalidError(
      'registration.lifetime',
      `'${String(registration.lifetime)}' is not a known lifetime`,
    );
  }

  if (isClassRegistration(registration)) {
    validateImplementationType(registration);
  }

  if (isFactoryRegistration(registration) && typeof registration.factory !== 'function') {
    throw new ArgumentInvalidError(
      'factory',
      `factory for '${getServiceName(registration.serviceType)}' must be a function`,
    );
  }
}

function validateImplementationType(registration: IClassRegistration): void {
  const { implementationType, serviceType } = registration;
  const name = getServiceName(serviceType);

  if (typeof implementationType !== 'function') {
    throw new ArgumentInvalidError(
      'implementationType',
      `implementationType for '${name}' must be a constructor function`,
    );
  }

  const signatures = [
    ...(implementationType.inject !== undefined ? [implementationType.inject] : []),
    ...(implementationType.injectSignatures ?? []),
  ];
  for (const signature of signatures) {
    if (!Array.isArray(signature) || !signature.every(isDependency)) {
      throw new ArgumentInvalidError(
        'inject',
        `'${getServiceName(implementationType)}' declares an invalid dependency list`,
      );
    }
  }

  for (const [property, dependency] of Object.entries(implementationType.injectProperties ?? {})) {
    if (!isDependency(dependency) || dependency === CONSTRUCTION_CONTEXT) {
      throw new ArgumentInvalidError(
        'injectProperties',
        `property '${property}' of '${getServiceName(implementationType)}' declares an invalid dependency`,
      );
    }
  }
}

// ============================================================================
// Type Guards
// ============================================================================

export function isClassRegistration(registration: IRegistration): registration is IClassRegistration {
  return registration.kind === 'class';
}

export function isFactoryRegistration(registration: IRegistration): registration is IFactoryRegistration {
  return registration.kind === 'factory';
}

export function isInstanceRegistration(
  registration: IRegistration,
): registration is IInstanceRegistration {
  return registration.kind === 'instance';
}

export function isInjectedSingletonRegistration(
  registration: IRegistration,
): registration is IInjectedSingletonRegistration {
  return registration.kind === 'injected-singleton';
}
