/**
 * @fileoverview CodeCompiler - Loads Generated Construction Code
 *
 * @packageDocumentation
 * @module @emitwire/core/infrastructure/compilation
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Compiles the program text in the current V8 context with `node:vm`,
 * instantiates the generated class with the field values and wraps the
 * result in an {@link EmittedContainer}.
 *
 * @version 1.0.0
 */

import { Script } from 'node:vm';

import {
  ArgumentInvalidError,
  ExternalCompilationError,
  SynthesisInvariantError,
} from '../../domain/composition';
import { type CreateFunction, type ICreateEntry } from '../../domain/container';
import {
  ConstructionContext,
  type ServiceIdentifier,
  getServiceName,
} from '../../domain/registration';
import { DEFAULT_SOURCE_NAME } from '../config/compose-options';
import { type IGeneratedProgram } from '../generation/code-generator';
import { type Logger, createLogger } from '../logging/logger';

import { type CompilationCache, getProcessCompilationCache } from './compilation-cache';
import { EmittedContainer } from './emitted-container';
import {
  type GeneratedConstructionClass,
  isGeneratedConstructionClass,
} from './generated-construction';

export interface ICodeCompilerOptions {
  logger?: Logger;

  /**
   * Cache of compiled classes; `null` compiles every program afresh.
   * Defaults to the process-wide cache.
   */
  cache?: CompilationCache | null;

  /**
   * File name shown in diagnostics and stack traces.
   */
  sourceName?: string;
}

export interface ICompileOptions {
  /**
   * Values of injected singletons, by implementation key or service type.
   */
  injected?: Iterable<readonly [ServiceIdentifier, unknown]>;
}

function isCreateFunction(value: unknown): value is CreateFunction {
  return typeof value === 'function';
}

/**
 * CodeCompiler - Turns a generated program into a live container.
 *
 * @example
 * ```typescript
 * const program = new CodeGenerator().generate(container);
 * const emitted = new CodeCompiler().compile(program, {
 *   injected: [[IConnection, connection]],
 * });
 * ```
 */
export class CodeCompiler {
  private readonly logger: Logger;
  private readonly cache: CompilationCache | null;
  private readonly sourceName: string;

  constructor(options: ICodeCompilerOptions = {}) {
    this.logger = options.logger ?? createLogger();
    this.cache = options.cache === undefined ? getProcessCompilationCache() : options.cache;
    this.sourceName = options.sourceName ?? DEFAULT_SOURCE_NAME;
  }

  /**
   * @throws ArgumentInvalidError if an injected singleton has no value
   * @throws ExternalCompilationError if the program fails to compile or load
   * @throws SynthesisInvariantError if the loaded program has the wrong shape
   */
  compile<TExtra = unknown>(
    program: IGeneratedProgram,
    options: ICompileOptions = {},
  ): EmittedContainer<TExtra> {
    const fieldValues = this.getFieldValues(
      program,
      new Map<ServiceIdentifier, unknown>(options.injected ?? []),
    );
    const compiledClass = this.load(program);

    const instance = new compiledClass(fieldValues, new ConstructionContext());
    const createMap = this.readCreateMap(instance.getCreateMap(), program);
    const singletons = instance.getSingletons();
    if (!Array.isArray(singletons)) {
      throw new SynthesisInvariantError('getSingletons() did not return an array');
    }

    const entries = new Map<ServiceIdentifier, ICreateEntry[]>();
    program.services.forEach((serviceType, index) => {
      const keys = program.implementationKeys[index] ?? [];
      const creators = createMap[index] ?? [];
      entries.set(
        serviceType,
        creators.map((create, position) => ({
          implementationKey: keys[position] ?? serviceType,
          create,
        })),
      );
    });

    return new EmittedContainer<TExtra>(entries, singletons, program.needsContext, this.logger);
  }

  private load(program: IGeneratedProgram): GeneratedConstructionClass {
    const cached = this.cache?.get(program.hash);
    if (cached) {
      this.logger.debug({ hash: program.hash }, 'Compilation cache hit');
      return cached;
    }

    this.logger.debug({ hash: program.hash }, 'Compilation cache miss');

    // The program ends with `return GeneratedConstruction;`; wrapping it on
    // the first line keeps line numbers in diagnostics unchanged.
    let loaded: unknown;
    try {
      const script = new Script(`(function () { ${program.source}\n})`, {
        filename: this.sourceName,
      });
      const body: unknown = script.runInThisContext();
      if (typeof body !== 'function') {
        throw new TypeError('program did not evaluate to a function');
      }
      loaded = Reflect.apply(body, undefined, []);
    } catch (error) {
      const diagnostics = this.formatDiagnostics(error);
      this.logger.error({ hash: program.hash, diagnostics }, 'Compilation failed');
      throw new ExternalCompilationError(diagnostics, program.source, error);
    }

    if (!isGeneratedConstructionClass(loaded)) {
      const diagnostics = ['program did not return a construction class'];
      this.logger.error({ hash: program.hash, diagnostics }, 'Compilation failed');
      throw new ExternalCompilationError(diagnostics, program.source);
    }

    this.cache?.set(program.hash, loaded);
    return loaded;
  }

  private getFieldValues(
    program: IGeneratedProgram,
    injected: ReadonlyMap<ServiceIdentifier, unknown>,
  ): unknown[] {
    return program.fieldInitializations.map((initialization) => {
      if (initialization.kind === 'value') {
        return initialization.value;
      }

      if (injected.has(initialization.key)) {
        return injected.get(initialization.key);
      }
      if (!injected.has(initialization.serviceType)) {
        throw new ArgumentInvalidError(
          'injected',
          `no value was supplied for injected singleton '${getServiceName(initialization.serviceType)}'`,
        );
      }
      return injected.get(initialization.serviceType);
    });
  }

  private readCreateMap(value: unknown, program: IGeneratedProgram): CreateFunction[][] {
    if (!Array.isArray(value) || value.length !== program.services.length) {
      throw new SynthesisInvariantError(
        `getCreateMap() must return one entry per service (${program.services.length})`,
      );
    }

    return value.map((entry: unknown, index) => {
      const expected = program.implementationKeys[index]?.length ?? 0;
      if (!Array.isArray(entry) || entry.length !== expected || !entry.every(isCreateFunction)) {
        throw new SynthesisInvariantError(
          `create map entry ${index} must hold ${expected} create function(s)`,
        );
      }
      return entry;
    });
  }

  private formatDiagnostics(error: unknown): string[] {
    if (!(error instanceof Error)) {
      return [String(error)];
    }

    const diagnostics = [`${error.name}: ${error.message}`];
    const location = error.stack?.split('\n')[0];
    if (location !== undefined && location.startsWith(this.sourceName)) {
      diagnostics.push(`at ${location}`);
    }
    return diagnostics;
  }
}
