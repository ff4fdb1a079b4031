export {
  ClassRegistrationVisitor,
  FactoryRegistrationVisitor,
  InstanceRegistrationVisitor,
  InjectedSingletonRegistrationVisitor,
} from './built-in-visitors';
export {
  RegistrationVisitorRegistry,
  createDefaultVisitorRegistry,
} from './registration-visitor-registry';
