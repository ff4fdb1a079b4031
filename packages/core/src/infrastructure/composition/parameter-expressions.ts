/**
 * @fileoverview Parameter Expressions - Resolved Constructor Arguments
 *
 * @packageDocumentation
 * @module @emitwire/core/infrastructure/composition
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Each constructor parameter or injected property resolves to one of four
 * shapes:
 *
 * | Shape | Emitted as |
 * |-------|------------|
 * | node | the target's instance expression |
 * | enumerable | an array literal over every registration of the service type |
 * | lazy | an arrow function returning the target's instance expression |
 * | context | the construction context parameter |
 *
 * @version 1.0.0
 */

import {
  type DependencyEdge,
  type IGenerationContext,
  type IParameterExpression,
} from '../../domain/composition';
import { type ServiceIdentifier } from '../../domain/registration';

/**
 * A single composition built inline.
 */
export class NodeParameterExpression implements IParameterExpression {
  constructor(public readonly target: ServiceIdentifier) {}

  getEdges(): readonly DependencyEdge[] {
    return [{ kind: 'node', target: this.target }];
  }

  getInstanceExpression(context: IGenerationContext): string {
    return context.getComposition(this.target).getInstanceExpression(context);
  }
}

/**
 * Every registration of a service type, in registration order.
 *
 * @remarks
 * Internal registrations are members too. No registration gives `[]`.
 */
export class EnumerableParameterExpression implements IParameterExpression {
  constructor(
    public readonly serviceType: ServiceIdentifier,
    public readonly targets: readonly ServiceIdentifier[],
  ) {}

  getEdges(): readonly DependencyEdge[] {
    return [{ kind: 'enumerable', serviceType: this.serviceType, targets: this.targets }];
  }

  getInstanceExpression(context: IGenerationContext): string {
    const items = this.targets.map((target) =>
      context.getComposition(target).getInstanceExpression(context),
    );
    return `[${items.join(', ')}]`;
  }
}

/**
 * A callable that builds the target on demand.
 *
 * @remarks
 * The edge does not take part in cycle detection, which is how two types
 * may refer to each other.
 */
export class LazyParameterExpression implements IParameterExpression {
  constructor(public readonly target: ServiceIdentifier) {}

  getEdges(): readonly DependencyEdge[] {
    return [{ kind: 'lazy', target: this.target }];
  }

  getInstanceExpression(context: IGenerationContext): string {
    return `() => ${context.getComposition(this.target).getInstanceExpression(context)}`;
  }
}

export class ContextParameterExpression implements IParameterExpression {
  getEdges(): readonly DependencyEdge[] {
    return [{ kind: 'context' }];
  }

  getInstanceExpression(context: IGenerationContext): string {
    return context.contextParameter;
  }
}
