/**
 * @fileoverview GraphResolver - Registrations to Composition Graph
 *
 * @packageDocumentation
 * @module @emitwire/core/infrastructure/composition
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * The resolver turns a registration model into a finalized
 * {@link CompositionContainer}:
 *
 * ```
 * registrations ──▶ visitors ──▶ compositions ──▶ bind (breadth-first) ──▶ container
 * ```
 *
 * @version 1.0.0
 */

import {
  type IComposition,
  type IDependencyGraph,
  type IDependencyMember,
  type IParameterExpression,
  AmbiguousDependencyError,
  ArgumentInvalidError,
  UnresolvedDependencyError,
} from '../../domain/composition';
import {
  type Dependency,
  type IRegistration,
  type ServiceIdentifier,
  CONSTRUCTION_CONTEXT,
  isLazyDependency,
  isManyDependency,
  validateRegistration,
} from '../../domain/registration';
import { type Logger, createLogger } from '../logging/logger';

import { CompositionContainer } from './composition-container';
import { CompositionContext } from './composition-context';
import {
  ContextParameterExpression,
  EnumerableParameterExpression,
  LazyParameterExpression,
  NodeParameterExpression,
} from './parameter-expressions';
import { type RegistrationVisitorRegistry, createDefaultVisitorRegistry } from './visitors';

export interface IGraphResolverOptions {
  visitors?: RegistrationVisitorRegistry;
  logger?: Logger;
}

/**
 * GraphResolver - Builds one composition per implementation key.
 *
 * @remarks
 * **Resolution Rules:**
 *
 * | Dependency | Resolves to |
 * |------------|-------------|
 * | `T` with one implementation | that composition |
 * | `T` with no registration as a service | the registration whose implementation key is `T` |
 * | `T` with several implementations | AmbiguousDependencyError |
 * | `many(T)` | every registration of `T`, internal included, possibly none |
 * | `lazy(T)` | as `T`, built on demand |
 * | `CONSTRUCTION_CONTEXT` | the per-resolution context |
 *
 * @example
 * ```typescript
 * const container = new GraphResolver().resolve(setup.getRegistrations());
 * console.log(container.needsContext);
 * ```
 */
export class GraphResolver {
  private readonly visitors: RegistrationVisitorRegistry;
  private readonly logger: Logger;

  constructor(options: IGraphResolverOptions = {}) {
    this.visitors = options.visitors ?? createDefaultVisitorRegistry();
    this.logger = options.logger ?? createLogger();
  }

  /**
   * Resolve the registrations into a finalized container.
   *
   * @throws ArgumentInvalidError for a malformed registration or a kind no visitor accepts
   * @throws UnresolvedDependencyError for a dependency with no registration
   * @throws AmbiguousDependencyError for a single-valued dependency with several
   * @throws CircularDependencyError for a cycle no lazy edge breaks
   */
  resolve(registrations: readonly IRegistration[]): CompositionContainer {
    for (const registration of registrations) {
      validateRegistration(registration);
    }

    const context = new CompositionContext(registrations);
    const pending: IComposition[] = [];

    const compose = (registration: IRegistration): IComposition => {
      const existing = context.getNode(registration.implementationKey);
      if (existing) {
        context.ensureCompatible(registration);
        return existing.composition;
      }

      const visitor = this.visitors.find(registration);
      if (!visitor) {
        throw new ArgumentInvalidError(
          'registration.kind',
          `no visitor accepts registrations of kind '${registration.kind}'`,
        );
      }

      const composition = visitor.accept(registration);
      context.addComposition(registration, composition);
      pending.push(composition);
      return composition;
    };

    const graph = new DependencyBinder(context, compose);

    for (const registration of registrations) {
      compose(registration);

      let next = pending.shift();
      while (next !== undefined) {
        next.bind(graph);
        next = pending.shift();
      }
    }

    const container = new CompositionContainer(context);

    this.logger.debug(
      {
        registrations: registrations.length,
        compositions: container.size,
        services: container.services.length,
        needsContext: container.needsContext,
      },
      'Composition graph resolved',
    );

    return container;
  }
}

// ============================================================================
// Dependency Binding
// ============================================================================

/**
 * The graph view compositions bind against.
 *
 * @internal
 */
class DependencyBinder implements IDependencyGraph {
  constructor(
    private readonly context: CompositionContext,
    private readonly compose: (registration: IRegistration) => IComposition,
  ) {}

  canResolve(dependency: Dependency): boolean {
    if (dependency === CONSTRUCTION_CONTEXT || isManyDependency(dependency)) {
      return true;
    }

    const serviceType = isLazyDependency(dependency) ? dependency.serviceType : dependency;
    return this.getCandidates(serviceType).length === 1;
  }

  resolve(
    dependency: Dependency,
    recipient: ServiceIdentifier,
    member: IDependencyMember,
  ): IParameterExpression {
    if (dependency === CONSTRUCTION_CONTEXT) {
      return new ContextParameterExpression();
    }

    if (isManyDependency(dependency)) {
      const targets = this.context
        .getRegistrations(dependency.serviceType)
        .map((registration) => this.composeFor(registration, recipient).key);
      return new EnumerableParameterExpression(dependency.serviceType, targets);
    }

    if (isLazyDependency(dependency)) {
      const target = this.resolveSingle(dependency.serviceType, dependency, recipient, member);
      return new LazyParameterExpression(target);
    }

    return new NodeParameterExpression(this.resolveSingle(dependency, dependency, recipient, member));
  }

  private resolveSingle(
    serviceType: ServiceIdentifier,
    dependency: Dependency,
    recipient: ServiceIdentifier,
    member: IDependencyMember,
  ): ServiceIdentifier {
    const candidates = this.getCandidates(serviceType);
    const [candidate] = candidates;

    if (candidate === undefined) {
      throw new UnresolvedDependencyError(
        dependency,
        recipient,
        member,
        this.context.getRequestPath(recipient),
      );
    }

    if (candidates.length > 1) {
      throw new AmbiguousDependencyError(
        serviceType,
        candidates.map((registration) => registration.implementationKey),
        recipient,
        member,
      );
    }

    return this.composeFor(candidate, recipient).key;
  }

  private composeFor(registration: IRegistration, recipient: ServiceIdentifier): IComposition {
    this.context.recordRequest(registration.implementationKey, recipient);
    return this.compose(registration);
  }

  /**
   * Registrations of `serviceType` with distinct implementation keys, or
   * the registration keyed by `serviceType` when it is not a service type.
   */
  private getCandidates(serviceType: ServiceIdentifier): IRegistration[] {
    const registrations = this.context.getRegistrations(serviceType);

    if (registrations.length === 0) {
      const byKey = this.context.findByImplementationKey(serviceType);
      return byKey ? [byKey] : [];
    }

    const seen = new Set<ServiceIdentifier>();
    return registrations.filter((registration) => {
      if (seen.has(registration.implementationKey)) {
        return false;
      }
      seen.add(registration.implementationKey);
      return true;
    });
  }
}
