/**
 * @fileoverview FactoryComposition - Build Instances With a Delegate
 *
 * @packageDocumentation
 * @module @emitwire/core/infrastructure/composition
 * @license Apache-2.0
 *
 * @version 1.0.0
 */

import { type FieldInitialization, type IGenerationContext } from '../../../domain/composition';
import { type ServiceFactory, type ServiceIdentifier } from '../../../domain/registration';

import { CompositionBase } from './composition-base';

/**
 * FactoryComposition - Calls a registered factory delegate.
 *
 * @remarks
 * The delegate is stored in a `factory<Id>` field and called inline; no
 * method is emitted. A factory that uses the context receives the
 * per-resolution context, whose recipient type is the class the value is
 * being built for.
 */
export class FactoryComposition extends CompositionBase {
  constructor(
    key: ServiceIdentifier,
    public readonly factory: ServiceFactory<unknown, never>,
    public readonly usesContext: boolean,
  ) {
    super(key);
  }

  override declaresContext(): boolean {
    return this.usesContext;
  }

  override getComposeMethodName(context: IGenerationContext): string {
    return this.getFactoryField(context);
  }

  override getInstanceExpression(context: IGenerationContext): string {
    const args = this.usesContext ? context.contextParameter : '';
    return `this.${this.getFactoryField(context)}(${args})`;
  }

  override getFields(context: IGenerationContext): string[] {
    return [this.getFactoryField(context)];
  }

  override getFieldInitializations(context: IGenerationContext): FieldInitialization[] {
    return [{ kind: 'value', field: this.getFactoryField(context), value: this.factory }];
  }

  private getFactoryField(context: IGenerationContext): string {
    return `factory${context.getIdentifier(this.key)}`;
  }
}
