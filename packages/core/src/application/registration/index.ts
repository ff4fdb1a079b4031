export { RegistrationSetup, createRegistrationSetup } from './registration-setup';
