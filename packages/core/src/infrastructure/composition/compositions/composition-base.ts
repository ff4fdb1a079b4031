/**
 * @fileoverview CompositionBase - Defaults Shared by Composition Strategies
 *
 * @packageDocumentation
 * @module @emitwire/core/infrastructure/composition
 * @license Apache-2.0
 *
 * @version 1.0.0
 */

import {
  type DependencyEdge,
  type FieldInitialization,
  type IComposition,
  type IDependencyGraph,
  type IGenerationContext,
} from '../../../domain/composition';
import { type ServiceIdentifier } from '../../../domain/registration';

/**
 * Base class for compositions: no dependencies, no fields, no methods.
 */
export abstract class CompositionBase implements IComposition {
  constructor(public readonly key: ServiceIdentifier) {}

  abstract getInstanceExpression(context: IGenerationContext): string;

  abstract getComposeMethodName(context: IGenerationContext): string;

  bind(_graph: IDependencyGraph): void {}

  getDependencies(): readonly DependencyEdge[] {
    return [];
  }

  declaresContext(): boolean {
    return false;
  }

  getMethods(_context: IGenerationContext): string[] {
    return [];
  }

  getFields(_context: IGenerationContext): string[] {
    return [];
  }

  getFieldInitializations(_context: IGenerationContext): FieldInitialization[] {
    return [];
  }

  getAdditionalInitializations(_context: IGenerationContext): string[] {
    return [];
  }

  requiresConstructionContext(context: IGenerationContext): boolean {
    return context.requiresContext(this.key);
  }

  getOwnedFields(_context: IGenerationContext): string[] {
    return [];
  }

  /**
   * `(context)` or `()` depending on whether the context is passed.
   */
  protected formatArguments(context: IGenerationContext): string {
    return this.requiresConstructionContext(context) ? `(${context.contextParameter})` : '()';
  }
}
