/**
 * @fileoverview ServiceLifetime - Service Lifecycle Management
 *
 * @packageDocumentation
 * @module @emitwire/core/domain/registration
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * This module defines when instances produced by the emitted construction
 * code are created and how long they live.
 *
 * @version 1.0.0
 */

/**
 * ServiceLifetime - Defines when service instances are created.
 *
 * @remarks
 * **Lifecycle Overview:**
 *
 * | Lifetime | Created | Shared | Owned by |
 * |----------|---------|--------|----------|
 * | Transient | Every construction path | Never | Caller |
 * | Singleton | Container construction (or registration, for values) | Globally | Container |
 * | InjectedSingleton | Supplied when the container is compiled | Globally | Container |
 *
 * Transient instances are fresh per construction path: if `C` depends on
 * `A` and `B`, and `B` also depends on `A`, the `A` given to `C` and the `A`
 * given to `B` are two different instances.
 *
 * @example Choosing the right lifetime
 * ```typescript
 * setup.register(IClock, SystemClock, { lifetime: ServiceLifetime.Singleton });
 * setup.registerInjectedSingleton(IConnection);
 * setup.register(CreateOrderHandler);
 * ```
 */
export enum ServiceLifetime {
  /**
   * New instance for every construction path.
   */
  Transient = 'transient',

  /**
   * Single instance owned by the container.
   *
   * @remarks
   * Class and factory registrations with this lifetime are constructed once,
   * at container construction, in dependency order. Pre-built values always
   * have this lifetime.
   */
  Singleton = 'singleton',

  /**
   * Single instance supplied externally when the container is compiled.
   *
   * @remarks
   * The registration only declares the slot; the value is late-bound:
   *
   * ```typescript
   * setup.registerInjectedSingleton(IConnection);
   * const container = setup.construct({ injected: [[IConnection, connection]] });
   * ```
   */
  InjectedSingleton = 'injected-singleton',
}

/**
 * Check if a value is a ServiceLifetime.
 */
export function isServiceLifetime(value: unknown): value is ServiceLifetime {
  return (
    value === ServiceLifetime.Transient ||
    value === ServiceLifetime.Singleton ||
    value === ServiceLifetime.InjectedSingleton
  );
}

/**
 * Get a human-readable name for a lifetime.
 */
export function getLifetimeName(lifetime: ServiceLifetime): string {
  switch (lifetime) {
    case ServiceLifetime.Transient:
      return 'Transient';
    case ServiceLifetime.Singleton:
      return 'Singleton';
    case ServiceLifetime.InjectedSingleton:
      return 'InjectedSingleton';
    default:
      return 'Unknown';
  }
}
