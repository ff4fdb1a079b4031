export {
  CodeGenerator,
  GENERATED_CLASS_NAME,
  type IGeneratedProgram,
} from './code-generator';
export { toIdentifier, formatPropertyAccess, indent } from './code-text';
