/**
 * @fileoverview InstanceComposition - Pre-Built Values
 *
 * @packageDocumentation
 * @module @emitwire/core/infrastructure/composition
 * @license Apache-2.0
 *
 * @version 1.0.0
 */

import { type FieldInitialization, type IGenerationContext } from '../../../domain/composition';
import { type ServiceIdentifier } from '../../../domain/registration';

import { CompositionBase } from './composition-base';

/**
 * InstanceComposition - Hands out a value that existed at registration.
 */
export class InstanceComposition extends CompositionBase {
  constructor(
    key: ServiceIdentifier,
    public readonly value: unknown,
  ) {
    super(key);
  }

  override getComposeMethodName(context: IGenerationContext): string {
    return this.getValueField(context);
  }

  override getInstanceExpression(context: IGenerationContext): string {
    return `this.${this.getValueField(context)}`;
  }

  override getFields(context: IGenerationContext): string[] {
    return [this.getValueField(context)];
  }

  override getFieldInitializations(context: IGenerationContext): FieldInitialization[] {
    return [{ kind: 'value', field: this.getValueField(context), value: this.value }];
  }

  override getOwnedFields(context: IGenerationContext): string[] {
    return [this.getValueField(context)];
  }

  private getValueField(context: IGenerationContext): string {
    return `value${context.getIdentifier(this.key)}`;
  }
}
