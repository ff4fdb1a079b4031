/**
 * @fileoverview Composition Interfaces - Contracts of the Composition Graph
 *
 * @packageDocumentation
 * @module @emitwire/core/domain/composition
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * A composition is the resolved construction strategy for one
 * implementation key. Strategies are polymorphic over one capability set:
 *
 * ```
 * IComposition
 *   bind()                          resolve dependencies against the graph
 *   getDependencies()               edges to other compositions
 *   declaresContext()               needs the construction context itself
 *   getInstanceExpression()         expression producing an instance
 *   getMethods()                    construction methods to emit
 *   getFields()                     fields to declare
 *   getFieldInitializations()       field values, in declared order
 *   getAdditionalInitializations()  statements run at container construction
 *   requiresConstructionContext()   whether emitted code passes the context
 * ```
 *
 * Registration visitors turn registrations into compositions; the set of
 * visitors is open, dispatch goes through `accepts()`.
 *
 * @version 1.0.0
 */

import { type IRegistration } from '../registration/registration';
import { type Dependency, type ServiceIdentifier } from '../registration/service-identifier';

import { type IDependencyMember } from './composition.errors';

// ============================================================================
// Dependency Edges
// ============================================================================

/**
 * Direct construction edge: the target is built inline.
 */
export interface INodeEdge {
  readonly kind: 'node';
  readonly target: ServiceIdentifier;
}

/**
 * Deferred edge: the target is built when the injected callable is invoked.
 * Lazy edges do not count towards construction cycles or ordering.
 */
export interface ILazyEdge {
  readonly kind: 'lazy';
  readonly target: ServiceIdentifier;
}

/**
 * Collection edge over every registration of a service type.
 */
export interface IEnumerableEdge {
  readonly kind: 'enumerable';
  readonly serviceType: ServiceIdentifier;
  readonly targets: readonly ServiceIdentifier[];
}

/**
 * The composition receives the construction context itself.
 */
export interface IContextEdge {
  readonly kind: 'context';
}

export type DependencyEdge = INodeEdge | ILazyEdge | IEnumerableEdge | IContextEdge;

// ============================================================================
// Generation Context
// ============================================================================

/**
 * Read-only view of the finalized graph used while rendering code.
 */
export interface IGenerationContext {
  /**
   * True iff at least one composition requires the construction context.
   */
  readonly needsContext: boolean;

  /**
   * True iff the graph has a lazy edge. Singletons are then built on first
   * use through an accessor method, since a lazy edge may be called before
   * its target's turn in the generated constructor.
   */
  readonly deferredSingletons: boolean;

  /**
   * Name of the construction context parameter in emitted methods.
   */
  readonly contextParameter: string;

  /**
   * Collision-free identifier fragment for an implementation key.
   *
   * @throws SynthesisInvariantError if the key escaped resolution
   */
  getIdentifier(key: ServiceIdentifier): string;

  /**
   * @throws SynthesisInvariantError if the key escaped resolution
   */
  getComposition(key: ServiceIdentifier): IComposition;

  /**
   * Whether emitted code for the composition takes the context parameter.
   *
   * @throws SynthesisInvariantError if the key escaped resolution
   */
  requiresContext(key: ServiceIdentifier): boolean;
}

/**
 * A field value handed to the compiled program, in declared order.
 *
 * @remarks
 * `injected` fields are late-bound: their value is looked up among the
 * values passed when the program is compiled, by implementation key first,
 * then by service type.
 */
export type FieldInitialization =
  | { readonly kind: 'value'; readonly field: string; readonly value: unknown }
  | {
      readonly kind: 'injected';
      readonly field: string;
      readonly key: ServiceIdentifier;
      readonly serviceType: ServiceIdentifier;
    };

// ============================================================================
// Parameter Expressions
// ============================================================================

/**
 * A resolved constructor parameter or injected property value.
 */
export interface IParameterExpression {
  getEdges(): readonly DependencyEdge[];

  getInstanceExpression(context: IGenerationContext): string;
}

/**
 * Graph view handed to compositions while their dependencies are bound.
 */
export interface IDependencyGraph {
  /**
   * Whether `dependency` can be satisfied by the registrations.
   */
  canResolve(dependency: Dependency): boolean;

  /**
   * Resolve `dependency`, requested through `member` of `recipient`.
   *
   * @throws UnresolvedDependencyError if nothing satisfies the dependency
   * @throws AmbiguousDependencyError if a single value has several candidates
   */
  resolve(
    dependency: Dependency,
    recipient: ServiceIdentifier,
    member: IDependencyMember,
  ): IParameterExpression;
}

// ============================================================================
// Composition
// ============================================================================

/**
 * IComposition - construction strategy for one implementation key.
 */
export interface IComposition {
  /**
   * The implementation key this composition is built for.
   */
  readonly key: ServiceIdentifier;

  /**
   * Resolve the composition's dependencies. Called once per composition.
   */
  bind(graph: IDependencyGraph): void;

  getDependencies(): readonly DependencyEdge[];

  /**
   * Whether this composition needs the construction context directly,
   * regardless of its dependencies.
   */
  declaresContext(): boolean;

  getInstanceExpression(context: IGenerationContext): string;

  getComposeMethodName(context: IGenerationContext): string;

  getMethods(context: IGenerationContext): string[];

  getFields(context: IGenerationContext): string[];

  getFieldInitializations(context: IGenerationContext): FieldInitialization[];

  getAdditionalInitializations(context: IGenerationContext): string[];

  requiresConstructionContext(context: IGenerationContext): boolean;

  /**
   * Fields holding instances owned by the container.
   */
  getOwnedFields(context: IGenerationContext): string[];
}

// ============================================================================
// Registration Visitors
// ============================================================================

/**
 * Turns one kind of registration into a composition.
 *
 * @example
 * ```typescript
 * class ClockRegistrationVisitor implements IRegistrationVisitor<IClockRegistration> {
 *   accepts(registration: IRegistration): registration is IClockRegistration {
 *     return registration.kind === 'clock';
 *   }
 *
 *   accept(registration: IClockRegistration): IComposition {
 *     return new InstanceComposition(registration.implementationKey, new FixedClock());
 *   }
 * }
 * ```
 */
export interface IRegistrationVisitor<TRegistration extends IRegistration = IRegistration> {
  accepts(registration: IRegistration): registration is TRegistration;

  accept(registration: TRegistration): IComposition;
}
