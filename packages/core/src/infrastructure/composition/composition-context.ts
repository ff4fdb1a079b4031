/**
 * @fileoverview CompositionContext - Mutable State of One Graph Build
 *
 * @packageDocumentation
 * @module @emitwire/core/infrastructure/composition
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Holds the registrations being composed and the compositions built so far.
 * Owned by one {@link GraphResolver} run; the finished state is handed to a
 * {@link CompositionContainer} and not mutated afterwards.
 *
 * @version 1.0.0
 */

import {
  type IComposition,
  ArgumentInvalidError,
  SynthesisInvariantError,
} from '../../domain/composition';
import {
  type IRegistration,
  type ServiceIdentifier,
  getLifetimeName,
  getServiceName,
} from '../../domain/registration';

/**
 * A composition together with the registration it was built from.
 */
export interface IComposedNode {
  readonly composition: IComposition;
  readonly registration: IRegistration;
}

export class CompositionContext {
  /**
   * Registrations grouped by service type, in insertion order of the first
   * registration of each type.
   */
  private readonly registrationsByService = new Map<ServiceIdentifier, IRegistration[]>();

  private readonly nodes = new Map<ServiceIdentifier, IComposedNode>();

  /**
   * Which composition first asked for a key, for error paths.
   */
  private readonly requestedBy = new Map<ServiceIdentifier, ServiceIdentifier>();

  constructor(public readonly registrations: readonly IRegistration[]) {
    for (const registration of registrations) {
      const existing = this.registrationsByService.get(registration.serviceType);
      if (existing) {
        existing.push(registration);
      } else {
        this.registrationsByService.set(registration.serviceType, [registration]);
      }
    }
  }

  /**
   * Every registration of a service type, internal ones included.
   */
  getRegistrations(serviceType: ServiceIdentifier): readonly IRegistration[] {
    return this.registrationsByService.get(serviceType) ?? [];
  }

  /**
   * Service types in insertion order.
   */
  getServiceTypes(): ServiceIdentifier[] {
    return Array.from(this.registrationsByService.keys());
  }

  /**
   * The first registration whose implementation key is `key`.
   */
  findByImplementationKey(key: ServiceIdentifier): IRegistration | undefined {
    return this.registrations.find((registration) => registration.implementationKey === key);
  }

  getNode(key: ServiceIdentifier): IComposedNode | undefined {
    return this.nodes.get(key);
  }

  /**
   * @throws SynthesisInvariantError if no composition exists for the key
   */
  getComposition(key: ServiceIdentifier): IComposition {
    const node = this.nodes.get(key);
    if (!node) {
      throw new SynthesisInvariantError(
        `no composition exists for '${getServiceName(key)}'; the reference escaped resolution`,
      );
    }
    return node.composition;
  }

  addComposition(registration: IRegistration, composition: IComposition): void {
    if (this.nodes.has(composition.key)) {
      throw new SynthesisInvariantError(
        `a composition for '${getServiceName(composition.key)}' already exists`,
      );
    }
    this.nodes.set(composition.key, { composition, registration });
  }

  /**
   * Compositions in creation order.
   */
  getNodes(): IComposedNode[] {
    return Array.from(this.nodes.values());
  }

  /**
   * Check that a further registration sharing an implementation key agrees
   * with the one its node was built from.
   *
   * @throws ArgumentInvalidError on a different kind or lifetime
   */
  ensureCompatible(registration: IRegistration): void {
    const node = this.nodes.get(registration.implementationKey);
    if (!node) {
      return;
    }

    const existing = node.registration;
    if (existing.kind !== registration.kind || existing.lifetime !== registration.lifetime) {
      throw new ArgumentInvalidError(
        'implementationKey',
        `'${getServiceName(registration.implementationKey)}' is registered as ` +
          `${existing.kind}/${getLifetimeName(existing.lifetime)} and as ` +
          `${registration.kind}/${getLifetimeName(registration.lifetime)}`,
      );
    }
  }

  recordRequest(key: ServiceIdentifier, requester: ServiceIdentifier): void {
    if (!this.requestedBy.has(key) && key !== requester) {
      this.requestedBy.set(key, requester);
    }
  }

  /**
   * Names of the compositions that led to `key`, outermost first, not
   * including `key` itself.
   */
  getRequestPath(key: ServiceIdentifier): string[] {
    const path: string[] = [];
    const seen = new Set<ServiceIdentifier>([key]);
    let current = this.requestedBy.get(key);

    while (current !== undefined && !seen.has(current)) {
      path.unshift(getServiceName(current));
      seen.add(current);
      current = this.requestedBy.get(current);
    }

    return path;
  }
}
