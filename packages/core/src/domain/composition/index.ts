/**
 * @fileoverview Domain Composition Module Exports
 *
 * @packageDocumentation
 * @module @emitwire/core/domain/composition
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * Contracts of the composition graph and the error taxonomy. The
 * Infrastructure layer provides the strategies, the resolver and the code
 * generator.
 */

// ============================================================================
// Interfaces
// ============================================================================

export {
  type INodeEdge,
  type ILazyEdge,
  type IEnumerableEdge,
  type IContextEdge,
  type DependencyEdge,
  type IGenerationContext,
  type FieldInitialization,
  type IParameterExpression,
  type IDependencyGraph,
  type IComposition,
  type IRegistrationVisitor,
} from './composition.interface';

// ============================================================================
// Errors
// ============================================================================

export {
  CompositionErrorCode,
  CompositionError,
  type IDependencyMember,
  describeMember,
  ArgumentInvalidError,
  UnresolvedDependencyError,
  AmbiguousDependencyError,
  CircularDependencyError,
  SingletonReentryError,
  SynthesisInvariantError,
  ExternalCompilationError,
  ContainerSealedError,
  ContainerDisposedError,
  ServiceNotRegisteredError,
} from './composition.errors';
