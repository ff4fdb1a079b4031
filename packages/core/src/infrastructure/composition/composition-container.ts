/**
 * @fileoverview CompositionContainer - The Finalized Composition Graph
 *
 * @packageDocumentation
 * @module @emitwire/core/infrastructure/composition
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Finalization runs once, when the container is created:
 *
 * 1. Cycle detection over construction edges (lazy edges excluded)
 * 2. Topological order, dependencies first
 * 3. Per-composition context requirement (least fixed point)
 * 4. Identifier disambiguation
 * 5. Public service lookup
 *
 * Afterwards the container is read-only.
 *
 * @version 1.0.0
 */

import {
  type DependencyEdge,
  type IComposition,
  type IGenerationContext,
  CircularDependencyError,
  SynthesisInvariantError,
} from '../../domain/composition';
import {
  type ServiceIdentifier,
  getQualifiedName,
  getServiceName,
  getSimpleName,
} from '../../domain/registration';
import { toIdentifier } from '../generation/code-text';

import { type CompositionContext } from './composition-context';

/**
 * Name of the construction context parameter in emitted code.
 */
export const CONTEXT_PARAMETER = 'context';

/**
 * Keys a composition must be built after: node and enumerable targets.
 */
function getConstructionTargets(edges: readonly DependencyEdge[]): ServiceIdentifier[] {
  const targets: ServiceIdentifier[] = [];
  for (const edge of edges) {
    if (edge.kind === 'node') {
      targets.push(edge.target);
    } else if (edge.kind === 'enumerable') {
      targets.push(...edge.targets);
    }
  }
  return targets;
}

/**
 * CompositionContainer - Immutable graph handed to the code generator.
 */
export class CompositionContainer implements IGenerationContext {
  public readonly contextParameter = CONTEXT_PARAMETER;

  public readonly needsContext: boolean;

  public readonly deferredSingletons: boolean;

  /**
   * Compositions in dependency order.
   */
  public readonly compositions: readonly IComposition[];

  /**
   * Public service types, in insertion order.
   */
  public readonly services: readonly ServiceIdentifier[];

  private readonly byKey: ReadonlyMap<ServiceIdentifier, IComposition>;
  private readonly edges: ReadonlyMap<ServiceIdentifier, readonly DependencyEdge[]>;
  private readonly identifiers: ReadonlyMap<ServiceIdentifier, string>;
  private readonly contextRequirements: ReadonlyMap<ServiceIdentifier, boolean>;
  private readonly serviceLookup: ReadonlyMap<ServiceIdentifier, readonly IComposition[]>;

  constructor(context: CompositionContext) {
    const created = context.getNodes().map((node) => node.composition);

    this.byKey = new Map(created.map((composition) => [composition.key, composition]));
    this.edges = new Map(created.map((composition) => [composition.key, composition.getDependencies()]));

    this.detectCycles(created);
    this.compositions = this.sortTopologically(created);
    this.needsContext = created.some(
      (composition) =>
        composition.declaresContext() ||
        this.getEdges(composition.key).some((edge) => edge.kind === 'context'),
    );
    this.deferredSingletons = created.some((composition) =>
      this.getEdges(composition.key).some((edge) => edge.kind === 'lazy'),
    );
    this.contextRequirements = this.computeContextRequirements(created);
    this.identifiers = this.assignIdentifiers(created);

    const lookup = new Map<ServiceIdentifier, IComposition[]>();
    for (const serviceType of context.getServiceTypes()) {
      const publicCompositions = context
        .getRegistrations(serviceType)
        .filter((registration) => !registration.internal)
        .map((registration) => this.getComposition(registration.implementationKey));
      if (publicCompositions.length > 0) {
        lookup.set(serviceType, publicCompositions);
      }
    }
    this.serviceLookup = lookup;
    this.services = Array.from(lookup.keys());
  }

  // ==========================================================================
  // IGenerationContext
  // ==========================================================================

  getComposition(key: ServiceIdentifier): IComposition {
    const composition = this.byKey.get(key);
    if (!composition) {
      throw new SynthesisInvariantError(
        `no composition exists for '${getServiceName(key)}'; the reference escaped resolution`,
      );
    }
    return composition;
  }

  getIdentifier(key: ServiceIdentifier): string {
    const identifier = this.identifiers.get(key);
    if (identifier === undefined) {
      throw new SynthesisInvariantError(`no identifier was assigned to '${getServiceName(key)}'`);
    }
    return identifier;
  }

  requiresContext(key: ServiceIdentifier): boolean {
    const requirement = this.contextRequirements.get(key);
    if (requirement === undefined) {
      throw new SynthesisInvariantError(
        `no context requirement was computed for '${getServiceName(key)}'`,
      );
    }
    return requirement;
  }

  // ==========================================================================
  // Lookup
  // ==========================================================================

  hasComposition(key: ServiceIdentifier): boolean {
    return this.byKey.has(key);
  }

  /**
   * Public compositions of a service type, in registration order.
   */
  getServiceCompositions(serviceType: ServiceIdentifier): readonly IComposition[] {
    return this.serviceLookup.get(serviceType) ?? [];
  }

  getEdges(key: ServiceIdentifier): readonly DependencyEdge[] {
    return this.edges.get(key) ?? [];
  }

  get size(): number {
    return this.byKey.size;
  }

  // ==========================================================================
  // Finalization
  // ==========================================================================

  /**
   * Tarjan's strongly connected components over construction edges.
   *
   * @throws CircularDependencyError for the first component that is a cycle
   */
  private detectCycles(compositions: readonly IComposition[]): void {
    const index = new Map<ServiceIdentifier, number>();
    const lowLink = new Map<ServiceIdentifier, number>();
    const onStack = new Set<ServiceIdentifier>();
    const stack: ServiceIdentifier[] = [];
    let counter = 0;

    const strongConnect = (key: ServiceIdentifier): void => {
      index.set(key, counter);
      lowLink.set(key, counter);
      counter++;
      stack.push(key);
      onStack.add(key);

      for (const target of getConstructionTargets(this.getEdges(key))) {
        if (!index.has(target)) {
          strongConnect(target);
          lowLink.set(key, Math.min(lowLink.get(key) ?? 0, lowLink.get(target) ?? 0));
        } else if (onStack.has(target)) {
          lowLink.set(key, Math.min(lowLink.get(key) ?? 0, index.get(target) ?? 0));
        }
      }

      if (lowLink.get(key) !== index.get(key)) {
        return;
      }

      const component = new Set<ServiceIdentifier>();
      let member: ServiceIdentifier | undefined;
      do {
        member = stack.pop();
        if (member === undefined) {
          break;
        }
        onStack.delete(member);
        component.add(member);
      } while (member !== key);

      const selfLoop = getConstructionTargets(this.getEdges(key)).includes(key);
      if (component.size > 1 || selfLoop) {
        throw new CircularDependencyError(this.findCycle(key, component));
      }
    };

    for (const composition of compositions) {
      if (!index.has(composition.key)) {
        strongConnect(composition.key);
      }
    }
  }

  /**
   * A path from `start` back to itself inside one component.
   */
  private findCycle(
    start: ServiceIdentifier,
    component: ReadonlySet<ServiceIdentifier>,
  ): ServiceIdentifier[] {
    const visited = new Set<ServiceIdentifier>();

    const walk = (key: ServiceIdentifier, path: ServiceIdentifier[]): ServiceIdentifier[] | undefined => {
      for (const target of getConstructionTargets(this.getEdges(key))) {
        if (target === start) {
          return path;
        }
        if (component.has(target) && !visited.has(target)) {
          visited.add(target);
          const found = walk(target, [...path, target]);
          if (found) {
            return found;
          }
        }
      }
      return undefined;
    };

    return walk(start, [start]) ?? [start];
  }

  private sortTopologically(compositions: readonly IComposition[]): IComposition[] {
    const ordered: IComposition[] = [];
    const visited = new Set<ServiceIdentifier>();

    const visit = (key: ServiceIdentifier): void => {
      if (visited.has(key)) {
        return;
      }
      visited.add(key);
      for (const target of getConstructionTargets(this.getEdges(key))) {
        visit(target);
      }
      ordered.push(this.getComposition(key));
    };

    for (const composition of compositions) {
      visit(composition.key);
    }
    return ordered;
  }

  /**
   * A composition requires the context if it declares it, receives it, or
   * reaches a composition that requires it. Enumerable edges pass the
   * context whenever the container needs it at all.
   */
  private computeContextRequirements(
    compositions: readonly IComposition[],
  ): Map<ServiceIdentifier, boolean> {
    const requirements = new Map<ServiceIdentifier, boolean>(
      compositions.map((composition) => [composition.key, composition.declaresContext()]),
    );

    let changed = true;
    while (changed) {
      changed = false;
      for (const composition of compositions) {
        if (requirements.get(composition.key) === true) {
          continue;
        }

        const required = this.getEdges(composition.key).some((edge) => {
          switch (edge.kind) {
            case 'context':
              return true;
            case 'enumerable':
              return this.needsContext;
            case 'node':
            case 'lazy':
              return requirements.get(edge.target) === true;
          }
        });

        if (required) {
          requirements.set(composition.key, true);
          changed = true;
        }
      }
    }

    return requirements;
  }

  /**
   * Simple name when unique, qualified name when shared, ordinal suffix
   * when still colliding.
   */
  private assignIdentifiers(compositions: readonly IComposition[]): Map<ServiceIdentifier, string> {
    const simpleNameCounts = new Map<string, number>();
    for (const composition of compositions) {
      const simple = toIdentifier(getSimpleName(composition.key));
      simpleNameCounts.set(simple, (simpleNameCounts.get(simple) ?? 0) + 1);
    }

    const identifiers = new Map<ServiceIdentifier, string>();
    const used = new Set<string>();

    for (const composition of compositions) {
      const simple = toIdentifier(getSimpleName(composition.key));
      const base =
        (simpleNameCounts.get(simple) ?? 0) > 1
          ? toIdentifier(getQualifiedName(composition.key))
          : simple;

      let identifier = base;
      let ordinal = 2;
      while (used.has(identifier)) {
        identifier = `${base}_${ordinal}`;
        ordinal++;
      }

      used.add(identifier);
      identifiers.set(composition.key, identifier);
    }

    return identifiers;
  }
}
