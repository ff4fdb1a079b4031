/**
 * @fileoverview PropertyDependencyComposition - Property Injection
 *
 * @packageDocumentation
 * @module @emitwire/core/infrastructure/composition
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Wraps a constructor composition and assigns the properties declared with
 * `static injectProperties` after construction.
 *
 * @version 1.0.0
 */

import {
  type DependencyEdge,
  type FieldInitialization,
  type IComposition,
  type IDependencyGraph,
  type IGenerationContext,
  type IParameterExpression,
  SynthesisInvariantError,
} from '../../../domain/composition';
import {
  type IInjectableConstructor,
  getInjectProperties,
  getServiceName,
} from '../../../domain/registration';
import { formatPropertyAccess, indent } from '../../generation/code-text';

import { CompositionBase } from './composition-base';

interface IBoundProperty {
  readonly name: string;
  readonly expression: IParameterExpression;
}

/**
 * PropertyDependencyComposition - Sets injected properties on a new instance.
 *
 * @example
 * ```typescript
 * class ReportJob {
 *   static injectProperties = { clock: IClock };
 *   clock!: IClock;
 * }
 * ```
 *
 * emits
 *
 * ```javascript
 * propertyInjectionReportJob() {
 *   const instance = this.createReportJob();
 *   instance.clock = this.singletonSystemClock;
 *   return instance;
 * }
 * ```
 */
export class PropertyDependencyComposition extends CompositionBase {
  private properties: IBoundProperty[] | undefined;

  constructor(
    public readonly inner: IComposition,
    public readonly implementationType: IInjectableConstructor,
  ) {
    super(inner.key);
  }

  override bind(graph: IDependencyGraph): void {
    this.inner.bind(graph);
    this.properties = getInjectProperties(this.implementationType).map(([name, dependency]) => ({
      name,
      expression: graph.resolve(dependency, this.implementationType, { kind: 'property', name }),
    }));
  }

  override getDependencies(): readonly DependencyEdge[] {
    return [
      ...this.inner.getDependencies(),
      ...this.requireProperties().flatMap((property) => property.expression.getEdges()),
    ];
  }

  override declaresContext(): boolean {
    return this.inner.declaresContext();
  }

  override getComposeMethodName(context: IGenerationContext): string {
    return `propertyInjection${context.getIdentifier(this.key)}`;
  }

  override getInstanceExpression(context: IGenerationContext): string {
    return `this.${this.getComposeMethodName(context)}${this.formatArguments(context)}`;
  }

  override getMethods(context: IGenerationContext): string[] {
    const parameter = this.requiresConstructionContext(context) ? context.contextParameter : '';
    const body = [
      `const instance = ${this.inner.getInstanceExpression(context)};`,
      ...this.requireProperties().map(
        (property) =>
          `instance${formatPropertyAccess(property.name)} = ${property.expression.getInstanceExpression(context)};`,
      ),
      'return instance;',
    ].join('\n');

    return [
      ...this.inner.getMethods(context),
      `${this.getComposeMethodName(context)}(${parameter}) {\n${indent(body)}\n}`,
    ];
  }

  override getFields(context: IGenerationContext): string[] {
    return this.inner.getFields(context);
  }

  override getFieldInitializations(context: IGenerationContext): FieldInitialization[] {
    return this.inner.getFieldInitializations(context);
  }

  override getAdditionalInitializations(context: IGenerationContext): string[] {
    return this.inner.getAdditionalInitializations(context);
  }

  override getOwnedFields(context: IGenerationContext): string[] {
    return this.inner.getOwnedFields(context);
  }

  private requireProperties(): IBoundProperty[] {
    if (this.properties === undefined) {
      throw new SynthesisInvariantError(
        `property injection for '${getServiceName(this.implementationType)}' was used before it was bound`,
      );
    }
    return this.properties;
  }
}
