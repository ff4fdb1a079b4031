/**
 * @fileoverview InjectedSingletonComposition - Late-Bound Singletons
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
 * InjectedSingletonComposition - A singleton slot filled at compile time.
 *
 * @remarks
 * The field initialization names the key and the service type only; the
 * compiler looks the value up among the injected values it is given.
 */
export class InjectedSingletonComposition extends CompositionBase {
  constructor(
    key: ServiceIdentifier,
    public readonly serviceType: ServiceIdentifier,
  ) {
    super(key);
  }

  override getComposeMethodName(context: IGenerationContext): string {
    return this.getInjectedField(context);
  }

  override getInstanceExpression(context: IGenerationContext): string {
    return `this.${this.getInjectedField(context)}`;
  }

  override getFields(context: IGenerationContext): string[] {
    return [this.getInjectedField(context)];
  }

  override getFieldInitializations(context: IGenerationContext): FieldInitialization[] {
    return [
      {
        kind: 'injected',
        field: this.getInjectedField(context),
        key: this.key,
        serviceType: this.serviceType,
      },
    ];
  }

  override getOwnedFields(context: IGenerationContext): string[] {
    return [this.getInjectedField(context)];
  }

  private getInjectedField(context: IGenerationContext): string {
    return `injected${context.getIdentifier(this.key)}`;
  }
}
