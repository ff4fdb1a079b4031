/**
 * @fileoverview RegistrationVisitorRegistry - Visitor Dispatch
 *
 * @packageDocumentation
 * @module @emitwire/core/infrastructure/composition
 * @license Apache-2.0
 *
 * @version 1.0.0
 */

import { type IRegistrationVisitor } from '../../../domain/composition';
import { type IRegistration } from '../../../domain/registration';

import {
  ClassRegistrationVisitor,
  FactoryRegistrationVisitor,
  InjectedSingletonRegistrationVisitor,
  InstanceRegistrationVisitor,
} from './built-in-visitors';

/**
 * RegistrationVisitorRegistry - Finds the visitor for a registration.
 *
 * @remarks
 * Visitors are tried most recently added first, so a visitor added later
 * can take over a built-in kind.
 *
 * @example
 * ```typescript
 * const visitors = createDefaultVisitorRegistry().add(new ClockRegistrationVisitor());
 * const resolver = new GraphResolver({ visitors });
 * ```
 */
export class RegistrationVisitorRegistry {
  private readonly visitors: IRegistrationVisitor[] = [];

  add<TRegistration extends IRegistration>(visitor: IRegistrationVisitor<TRegistration>): this {
    this.visitors.push(visitor);
    return this;
  }

  find(registration: IRegistration): IRegistrationVisitor | undefined {
    for (let i = this.visitors.length - 1; i >= 0; i--) {
      const visitor = this.visitors[i];
      if (visitor !== undefined && visitor.accepts(registration)) {
        return visitor;
      }
    }
    return undefined;
  }

  get size(): number {
    return this.visitors.length;
  }
}

/**
 * Create a registry holding the built-in visitors.
 */
export function createDefaultVisitorRegistry(): RegistrationVisitorRegistry {
  return new RegistrationVisitorRegistry()
    .add(new ClassRegistrationVisitor())
    .add(new FactoryRegistrationVisitor())
    .add(new InstanceRegistrationVisitor())
    .add(new InjectedSingletonRegistrationVisitor());
}
