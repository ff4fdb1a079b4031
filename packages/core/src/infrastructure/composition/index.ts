/**
 * @fileoverview Infrastructure Composition Module Exports
 *
 * @packageDocumentation
 * @module @emitwire/core/infrastructure/composition
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Composition strategies, registration visitors and the resolver that turns
 * registrations into a finalized graph.
 */

export * from './compositions';
export * from './visitors';

export {
  NodeParameterExpression,
  EnumerableParameterExpression,
  LazyParameterExpression,
  ContextParameterExpression,
} from './parameter-expressions';

export { CompositionContext, type IComposedNode } from './composition-context';
export { CompositionContainer, CONTEXT_PARAMETER } from './composition-container';
export { GraphResolver, type IGraphResolverOptions } from './graph-resolver';
