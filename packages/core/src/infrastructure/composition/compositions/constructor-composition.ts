/**
 * @fileoverview ConstructorComposition - Build Instances With `new`
 *
 * @packageDocumentation
 * @module @emitwire/core/infrastructure/composition
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Selects one constructor signature of an implementation class and emits a
 * `create<Id>` method that calls it.
 *
 * @version 1.0.0
 */

import {
  type DependencyEdge,
  type FieldInitialization,
  type IDependencyGraph,
  type IGenerationContext,
  type IParameterExpression,
  SynthesisInvariantError,
} from '../../../domain/composition';
import {
  type Dependency,
  type IInjectableConstructor,
  getInjectSignatures,
  getServiceName,
} from '../../../domain/registration';
import { indent } from '../../generation/code-text';

import { CompositionBase } from './composition-base';

/**
 * ConstructorComposition - Calls the constructor of an implementation class.
 *
 * @remarks
 * **Signature Selection:**
 *
 * A class may declare several signatures with `static injectSignatures`.
 * The longest one whose every parameter resolves wins; among equally long
 * ones, the first declared. When none resolves, the longest signature is
 * resolved anyway so the error names the missing dependency.
 *
 * **Emitted Method:**
 *
 * ```javascript
 * createOrderService(context) {
 *   context.enter(this.typeOrderService);
 *   try {
 *     return new this.typeOrderService(this.createOrderRepository(context), context);
 *   } finally {
 *     context.leave();
 *   }
 * }
 * ```
 *
 * The `enter`/`leave` pair is only emitted when the method takes the
 * context.
 */
export class ConstructorComposition extends CompositionBase {
  private parameters: IParameterExpression[] | undefined;

  constructor(public readonly implementationType: IInjectableConstructor) {
    super(implementationType);
  }

  override bind(graph: IDependencyGraph): void {
    const signature = this.selectSignature(graph);
    this.parameters = signature.map((dependency, index) =>
      graph.resolve(dependency, this.implementationType, { kind: 'parameter', name: `#${index}` }),
    );
  }

  override getDependencies(): readonly DependencyEdge[] {
    return this.requireParameters().flatMap((parameter) => parameter.getEdges());
  }

  override getComposeMethodName(context: IGenerationContext): string {
    return `create${context.getIdentifier(this.key)}`;
  }

  override getInstanceExpression(context: IGenerationContext): string {
    return `this.${this.getComposeMethodName(context)}${this.formatArguments(context)}`;
  }

  override getFields(context: IGenerationContext): string[] {
    return [this.getTypeField(context)];
  }

  override getFieldInitializations(context: IGenerationContext): FieldInitialization[] {
    return [{ kind: 'value', field: this.getTypeField(context), value: this.implementationType }];
  }

  override getMethods(context: IGenerationContext): string[] {
    const typeField = this.getTypeField(context);
    const args = this.requireParameters()
      .map((parameter) => parameter.getInstanceExpression(context))
      .join(', ');
    const construction = `return new this.${typeField}(${args});`;

    if (!this.requiresConstructionContext(context)) {
      return [`${this.getComposeMethodName(context)}() {\n${indent(construction)}\n}`];
    }

    const contextParameter = context.contextParameter;
    const body = [
      `${contextParameter}.enter(this.${typeField});`,
      'try {',
      indent(construction),
      '} finally {',
      indent(`${contextParameter}.leave();`),
      '}',
    ].join('\n');

    return [`${this.getComposeMethodName(context)}(${contextParameter}) {\n${indent(body)}\n}`];
  }

  private getTypeField(context: IGenerationContext): string {
    return `type${context.getIdentifier(this.key)}`;
  }

  private selectSignature(graph: IDependencyGraph): readonly Dependency[] {
    const signatures = getInjectSignatures(this.implementationType);

    // Longest first; the sort is stable, so declaration order breaks ties.
    const ordered = [...signatures].sort((a, b) => b.length - a.length);
    const satisfiable = ordered.find((signature) =>
      signature.every((dependency) => graph.canResolve(dependency)),
    );

    return satisfiable ?? ordered[0] ?? [];
  }

  private requireParameters(): IParameterExpression[] {
    if (this.parameters === undefined) {
      throw new SynthesisInvariantError(
        `constructor composition for '${getServiceName(this.implementationType)}' was used before it was bound`,
      );
    }
    return this.parameters;
  }
}
