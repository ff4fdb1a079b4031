/**
 * @fileoverview SingletonComposition - One Instance per Container
 *
 * @packageDocumentation
 * @module @emitwire/core/infrastructure/composition
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Wraps another composition. The inner composition builds the instance
 * once, in the generated constructor; every consumer then reads the
 * `singleton<Id>` field. In a graph with lazy edges the instance is built
 * on first use through a `getSingleton<Id>` accessor instead.
 *
 * @version 1.0.0
 */

import {
  type DependencyEdge,
  type FieldInitialization,
  type IComposition,
  type IDependencyGraph,
  type IGenerationContext,
  SingletonReentryError,
} from '../../../domain/composition';
import { indent } from '../../generation/code-text';

import { CompositionBase } from './composition-base';

/**
 * SingletonComposition - Caches the inner composition's instance.
 *
 * @remarks
 * Initialization runs in dependency order, so a singleton's dependencies
 * are assigned before it is built:
 *
 * ```javascript
 * constructor(fieldValues, context) {
 *   this.typeClock = fieldValues[0];
 *   this.singletonClock = this.createClock();
 * }
 * ```
 *
 * If the inner composition takes the construction context, the singleton
 * is built with the context passed to the generated constructor.
 *
 * When the graph has lazy edges, a lazy getter may run before its target's
 * turn in the constructor, so every singleton gets an accessor:
 *
 * ```javascript
 * getSingletonClock() {
 *   if (this.stateClock === 1) {
 *     throw this.reentryClock();
 *   }
 *   if (this.stateClock !== 2) {
 *     this.stateClock = 1;
 *     this.singletonClock = this.createClock();
 *     this.stateClock = 2;
 *   }
 *   return this.singletonClock;
 * }
 * ```
 */
export class SingletonComposition extends CompositionBase {
  constructor(public readonly inner: IComposition) {
    super(inner.key);
  }

  override bind(graph: IDependencyGraph): void {
    this.inner.bind(graph);
  }

  override getDependencies(): readonly DependencyEdge[] {
    return this.inner.getDependencies();
  }

  override declaresContext(): boolean {
    return this.inner.declaresContext();
  }

  override getComposeMethodName(context: IGenerationContext): string {
    return this.inner.getComposeMethodName(context);
  }

  override getInstanceExpression(context: IGenerationContext): string {
    if (context.deferredSingletons) {
      return `this.${this.getAccessorName(context)}${this.formatArguments(context)}`;
    }
    return `this.${this.getSingletonField(context)}`;
  }

  override getMethods(context: IGenerationContext): string[] {
    const methods = this.inner.getMethods(context);
    if (!context.deferredSingletons) {
      return methods;
    }

    const field = `this.${this.getSingletonField(context)}`;
    const state = `this.${this.getStateField(context)}`;
    const body = [
      `if (${state} === 1) {`,
      indent(`throw this.${this.getReentryField(context)}();`),
      '}',
      `if (${state} !== 2) {`,
      indent(
        [
          `${state} = 1;`,
          `${field} = ${this.inner.getInstanceExpression(context)};`,
          `${state} = 2;`,
        ].join('\n'),
      ),
      '}',
      `return ${field};`,
    ].join('\n');

    return [
      ...methods,
      `${this.getAccessorName(context)}${this.formatArguments(context)} {\n${indent(body)}\n}`,
    ];
  }

  override getFields(context: IGenerationContext): string[] {
    const fields = [...this.inner.getFields(context), this.getSingletonField(context)];
    if (context.deferredSingletons) {
      fields.push(this.getStateField(context), this.getReentryField(context));
    }
    return fields;
  }

  override getFieldInitializations(context: IGenerationContext): FieldInitialization[] {
    const initializations = this.inner.getFieldInitializations(context);
    if (!context.deferredSingletons) {
      return initializations;
    }

    const key = this.key;
    return [
      ...initializations,
      {
        kind: 'value',
        field: this.getReentryField(context),
        value: () => new SingletonReentryError(key),
      },
    ];
  }

  override getAdditionalInitializations(context: IGenerationContext): string[] {
    const initialization = context.deferredSingletons
      ? `${this.getInstanceExpression(context)};`
      : `this.${this.getSingletonField(context)} = ${this.inner.getInstanceExpression(context)};`;
    return [...this.inner.getAdditionalInitializations(context), initialization];
  }

  override getOwnedFields(context: IGenerationContext): string[] {
    return [...this.inner.getOwnedFields(context), this.getSingletonField(context)];
  }

  private getSingletonField(context: IGenerationContext): string {
    return `singleton${context.getIdentifier(this.key)}`;
  }

  private getStateField(context: IGenerationContext): string {
    return `state${context.getIdentifier(this.key)}`;
  }

  private getReentryField(context: IGenerationContext): string {
    return `reentry${context.getIdentifier(this.key)}`;
  }

  private getAccessorName(context: IGenerationContext): string {
    return `getSingleton${context.getIdentifier(this.key)}`;
  }
}
