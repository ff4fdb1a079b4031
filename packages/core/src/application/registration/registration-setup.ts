/**
 * @fileoverview RegistrationSetup - Fluent Registration Builder
 *
 * @packageDocumentation
 * @module @emitwire/core/application/registration
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * This module collects registrations and hands them to the build pipeline.
 * A service type may have any number of registrations; their order is the
 * order of `many(T)` collections and of `resolveAll()`.
 *
 * @version 1.0.0
 */

import {
  type Constructor,
  type IClassRegistrationOptions,
  type IFactoryRegistrationOptions,
  type IRegistration,
  type IRegistrationOptions,
  type ServiceFactory,
  type ServiceIdentifier,
  ServiceLifetime,
  createClassRegistration,
  createFactoryRegistration,
  createInjectedSingletonRegistration,
  createInstanceRegistration,
  validateRegistration,
} from '../../domain/registration';
import { ArgumentInvalidError, ContainerSealedError } from '../../domain/composition';
import { type EmittedContainer } from '../../infrastructure/compilation';
import { type CompositionContainer } from '../../infrastructure/composition';
import { type IGeneratedProgram } from '../../infrastructure/generation';
import {
  ContainerBuilder,
  type IBuildContainerOptions,
  type IContainerBuilderOptions,
} from '../construction/container-builder';

function isConstructor(value: unknown): value is Constructor {
  return typeof value === 'function';
}

/**
 * RegistrationSetup - Fluent API for registering services.
 *
 * @template TExtra - Type of the extra data factories read from the context
 *
 * @remarks
 * **Usage Pattern:**
 *
 * ```typescript
 * const setup = new RegistrationSetup();
 *
 * setup
 *   .registerSingleton(IClock, SystemClock)
 *   .register(IOrderRepository, SqlOrderRepository)
 *   .register(IPlugin, AuditPlugin)
 *   .register(IPlugin, MetricsPlugin, { internal: true })
 *   .register(CreateOrderHandler);
 *
 * const container = setup.construct();
 * ```
 *
 * Composing seals the setup; later registrations throw
 * {@link ContainerSealedError}.
 */
export class RegistrationSetup<TExtra = unknown> {
  private readonly registrations: IRegistration[] = [];

  private sealed = false;

  // ============================================================================
  // Class Registration
  // ============================================================================

  /**
   * Register an implementation class.
   *
   * @remarks
   * Two overloads:
   * 1. Self-registration: `register(OrderService)`
   * 2. Service-to-implementation: `register(IOrderService, OrderService)`
   */
  register<T>(implementation: Constructor<T>, options?: IClassRegistrationOptions): this;
  register<T>(
    serviceType: ServiceIdentifier<T>,
    implementation: Constructor<T>,
    options?: IClassRegistrationOptions,
  ): this;
  register<T>(
    serviceTypeOrImpl: ServiceIdentifier<T>,
    implementationOrOptions?: Constructor<T> | IClassRegistrationOptions,
    options?: IClassRegistrationOptions,
  ): this {
    const [serviceType, implementation, resolvedOptions] = this.normalizeArgs(
      serviceTypeOrImpl,
      implementationOrOptions,
      options,
    );

    return this.add(createClassRegistration(serviceType, implementation, resolvedOptions));
  }

  /**
   * Register an implementation class with the Singleton lifetime.
   */
  registerSingleton<T>(implementation: Constructor<T>, options?: IRegistrationOptions): this;
  registerSingleton<T>(
    serviceType: ServiceIdentifier<T>,
    implementation: Constructor<T>,
    options?: IRegistrationOptions,
  ): this;
  registerSingleton<T>(
    serviceTypeOrImpl: ServiceIdentifier<T>,
    implementationOrOptions?: Constructor<T> | IRegistrationOptions,
    options?: IRegistrationOptions,
  ): this {
    const [serviceType, implementation, resolvedOptions] = this.normalizeArgs(
      serviceTypeOrImpl,
      implementationOrOptions,
      options,
    );

    return this.add(
      createClassRegistration(serviceType, implementation, {
        ...resolvedOptions,
        lifetime: ServiceLifetime.Singleton,
      }),
    );
  }

  // ============================================================================
  // Factory, Value and Injected Registration
  // ============================================================================

  /**
   * Register a factory delegate.
   *
   * @example
   * ```typescript
   * setup.registerFactory(ILogger, (context) =>
   *   rootLogger.child({ component: String(context.recipientType?.toString()) }),
   * );
   * ```
   */
  registerFactory<T>(
    serviceType: ServiceIdentifier<T>,
    factory: ServiceFactory<T, TExtra>,
    options?: IFactoryRegistrationOptions,
  ): this {
    return this.add(createFactoryRegistration(serviceType, factory, options));
  }

  /**
   * Register a pre-built value.
   */
  registerInstance<T>(serviceType: ServiceIdentifier<T>, value: T, options?: IRegistrationOptions): this {
    return this.add(createInstanceRegistration(serviceType, value, options));
  }

  /**
   * Register a singleton whose value is supplied to {@link construct}.
   */
  registerInjectedSingleton<T>(serviceType: ServiceIdentifier<T>, options?: IRegistrationOptions): this {
    return this.add(createInjectedSingletonRegistration(serviceType, options));
  }

  /**
   * Add a registration of any kind, including custom ones handled by an
   * added visitor.
   *
   * @throws ContainerSealedError after {@link compose}
   * @throws ArgumentInvalidError if the registration is malformed
   */
  add(registration: IRegistration): this {
    this.ensureNotSealed();
    validateRegistration(registration);

    this.registrations.push(registration);
    return this;
  }

  // ============================================================================
  // Utility Methods
  // ============================================================================

  has(serviceType: ServiceIdentifier): boolean {
    return this.registrations.some((registration) => registration.serviceType === serviceType);
  }

  /**
   * All registrations, in insertion order.
   */
  getRegistrations(): readonly IRegistration[] {
    return [...this.registrations];
  }

  getRegistrationsFor(serviceType: ServiceIdentifier): readonly IRegistration[] {
    return this.registrations.filter((registration) => registration.serviceType === serviceType);
  }

  get count(): number {
    return this.registrations.length;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  // ============================================================================
  // Build
  // ============================================================================

  /**
   * Seal the setup and resolve it into a finalized composition graph.
   */
  compose(options?: IContainerBuilderOptions): CompositionContainer {
    this.sealed = true;
    return new ContainerBuilder(options).compose(this.registrations);
  }

  /**
   * Seal the setup and emit the construction program.
   */
  generate(options?: IContainerBuilderOptions): IGeneratedProgram {
    this.sealed = true;
    return new ContainerBuilder(options).generate(this.registrations);
  }

  /**
   * Seal the setup and build a live container.
   *
   * @example
   * ```typescript
   * setup.registerInjectedSingleton(IConnection);
   * const container = setup.construct({ injected: [[IConnection, connection]] });
   * ```
   */
  construct(options: IBuildContainerOptions = {}): EmittedContainer<TExtra> {
    this.sealed = true;
    return new ContainerBuilder(options).build<TExtra>(this.registrations, {
      injected: options.injected,
    });
  }

  // ============================================================================
  // Private Helpers
  // ============================================================================

  /**
   * @throws ContainerSealedError if sealed
   */
  private ensureNotSealed(): void {
    if (this.sealed) {
      throw new ContainerSealedError();
    }
  }

  /**
   * Normalize registration arguments.
   *
   * Handles two overload patterns:
   * 1. `register(Implementation, options?)` - self-registration
   * 2. `register(ServiceType, Implementation, options?)`
   */
  private normalizeArgs<T, TOptions extends IRegistrationOptions>(
    serviceTypeOrImpl: ServiceIdentifier<T>,
    implementationOrOptions: Constructor<T> | TOptions | undefined,
    options: TOptions | undefined,
  ): [ServiceIdentifier<T>, Constructor<T>, TOptions | undefined] {
    if (isConstructor(implementationOrOptions)) {
      return [serviceTypeOrImpl, implementationOrOptions, options];
    }

    if (isConstructor(serviceTypeOrImpl)) {
      return [serviceTypeOrImpl, serviceTypeOrImpl, implementationOrOptions];
    }

    throw new ArgumentInvalidError(
      'implementation',
      `expected a constructor or a service type and an implementation, got ${typeof serviceTypeOrImpl}`,
    );
  }
}

/**
 * Create a new RegistrationSetup.
 */
export function createRegistrationSetup<TExtra = unknown>(): RegistrationSetup<TExtra> {
  return new RegistrationSetup<TExtra>();
}
