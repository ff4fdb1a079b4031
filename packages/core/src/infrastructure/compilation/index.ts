export { CodeCompiler, type ICodeCompilerOptions, type ICompileOptions } from './code-compiler';
export { CompilationCache, getProcessCompilationCache } from './compilation-cache';
export { EmittedContainer } from './emitted-container';
export {
  type IGeneratedConstruction,
  type GeneratedConstructionClass,
  isGeneratedConstructionClass,
} from './generated-construction';
