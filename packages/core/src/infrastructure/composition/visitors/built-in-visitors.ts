/**
 * @fileoverview Built-In Registration Visitors
 *
 * @packageDocumentation
 * @module @emitwire/core/infrastructure/composition
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * One visitor per built-in registration kind. Each turns a registration
 * into its composition, wrapping it in {@link SingletonComposition} when
 * the lifetime asks for one.
 *
 * @version 1.0.0
 */

import { type IComposition, type IRegistrationVisitor } from '../../../domain/composition';
import {
  type IClassRegistration,
  type IFactoryRegistration,
  type IInjectedSingletonRegistration,
  type IInstanceRegistration,
  type IRegistration,
  ServiceLifetime,
  getInjectProperties,
  isClassRegistration,
  isFactoryRegistration,
  isInjectedSingletonRegistration,
  isInstanceRegistration,
} from '../../../domain/registration';
import {
  ConstructorComposition,
  FactoryComposition,
  InjectedSingletonComposition,
  InstanceComposition,
  PropertyDependencyComposition,
  SingletonComposition,
} from '../compositions';

function applyLifetime(composition: IComposition, lifetime: ServiceLifetime): IComposition {
  return lifetime === ServiceLifetime.Singleton ? new SingletonComposition(composition) : composition;
}

export class ClassRegistrationVisitor implements IRegistrationVisitor<IClassRegistration> {
  accepts(registration: IRegistration): registration is IClassRegistration {
    return isClassRegistration(registration);
  }

  accept(registration: IClassRegistration): IComposition {
    const { implementationType } = registration;
    let composition: IComposition = new ConstructorComposition(implementationType);

    if (getInjectProperties(implementationType).length > 0) {
      composition = new PropertyDependencyComposition(composition, implementationType);
    }

    return applyLifetime(composition, registration.lifetime);
  }
}

export class FactoryRegistrationVisitor implements IRegistrationVisitor<IFactoryRegistration> {
  accepts(registration: IRegistration): registration is IFactoryRegistration {
    return isFactoryRegistration(registration);
  }

  accept(registration: IFactoryRegistration): IComposition {
    const composition = new FactoryComposition(
      registration.implementationKey,
      registration.factory,
      registration.usesContext,
    );
    return applyLifetime(composition, registration.lifetime);
  }
}

export class InstanceRegistrationVisitor implements IRegistrationVisitor<IInstanceRegistration> {
  accepts(registration: IRegistration): registration is IInstanceRegistration {
    return isInstanceRegistration(registration);
  }

  accept(registration: IInstanceRegistration): IComposition {
    return new InstanceComposition(registration.implementationKey, registration.value);
  }
}

export class InjectedSingletonRegistrationVisitor
  implements IRegistrationVisitor<IInjectedSingletonRegistration>
{
  accepts(registration: IRegistration): registration is IInjectedSingletonRegistration {
    return isInjectedSingletonRegistration(registration);
  }

  accept(registration: IInjectedSingletonRegistration): IComposition {
    return new InjectedSingletonComposition(
      registration.implementationKey,
      registration.serviceType,
    );
  }
}
