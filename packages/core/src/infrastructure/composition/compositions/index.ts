export { CompositionBase } from './composition-base';
export { ConstructorComposition } from './constructor-composition';
export { FactoryComposition } from './factory-composition';
export { InstanceComposition } from './instance-composition';
export { InjectedSingletonComposition } from './injected-singleton-composition';
export { PropertyDependencyComposition } from './property-dependency-composition';
export { SingletonComposition } from './singleton-composition';
