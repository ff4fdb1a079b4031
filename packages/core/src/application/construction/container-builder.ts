/**
 * @fileoverview ContainerBuilder - Compose, Generate, Compile
 *
 * @packageDocumentation
 * @module @emitwire/core/application/construction
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * Orchestrates the Infrastructure pieces into one pipeline:
 *
 * ```
 * registrations
 *   └─ GraphResolver     → CompositionContainer
 *     └─ CodeGenerator   → IGeneratedProgram
 *       └─ CodeCompiler  → EmittedContainer
 * ```
 *
 * Every stage is deterministic; nothing is retried.
 *
 * @version 1.0.0
 */

import { type IRegistration } from '../../domain/registration';
import { CodeCompiler, type EmittedContainer, type ICompileOptions } from '../../infrastructure/compilation';
import {
  type CompositionContainer,
  GraphResolver,
  type RegistrationVisitorRegistry,
} from '../../infrastructure/composition';
import {
  type ComposeOptions,
  type IComposeOptionsInput,
  parseComposeOptions,
} from '../../infrastructure/config/compose-options';
import { CodeGenerator, type IGeneratedProgram } from '../../infrastructure/generation';
import { type Logger, createLogger } from '../../infrastructure/logging/logger';

/**
 * Options of the build pipeline.
 */
export interface IContainerBuilderOptions extends IComposeOptionsInput {
  /**
   * Visitors for registration kinds; defaults to the built-in ones.
   */
  visitors?: RegistrationVisitorRegistry;
}

/**
 * Options of a full build: pipeline options plus injected singleton values.
 */
export interface IBuildContainerOptions extends IContainerBuilderOptions, ICompileOptions {}

/**
 * ContainerBuilder - Runs registrations through the pipeline.
 *
 * @example
 * ```typescript
 * const builder = new ContainerBuilder({ logLevel: 'debug' });
 *
 * const program = builder.generate(setup.getRegistrations());
 * console.log(program.source);
 *
 * const container = builder.build(setup.getRegistrations());
 * ```
 */
export class ContainerBuilder {
  public readonly options: ComposeOptions;

  private readonly logger: Logger;
  private readonly resolver: GraphResolver;
  private readonly generator: CodeGenerator;
  private readonly compiler: CodeCompiler;

  /**
   * @throws ArgumentInvalidError if the options are invalid
   */
  constructor(input: IContainerBuilderOptions = {}) {
    this.options = parseComposeOptions(input);
    this.logger = input.logger ?? createLogger(this.options.logLevel);

    this.resolver = new GraphResolver({ visitors: input.visitors, logger: this.logger });
    this.generator = new CodeGenerator(this.logger);
    this.compiler = new CodeCompiler({
      logger: this.logger,
      cache: this.options.cacheCompilations ? undefined : null,
      sourceName: this.options.sourceName,
    });
  }

  /**
   * Resolve registrations into a finalized composition graph.
   */
  compose(registrations: readonly IRegistration[]): CompositionContainer {
    return this.resolver.resolve(registrations);
  }

  /**
   * Compose and emit the construction program.
   */
  generate(registrations: readonly IRegistration[]): IGeneratedProgram {
    return this.generator.generate(this.compose(registrations));
  }

  /**
   * Compose, emit and compile into a live container.
   */
  build<TExtra = unknown>(
    registrations: readonly IRegistration[],
    options: ICompileOptions = {},
  ): EmittedContainer<TExtra> {
    const program = this.generate(registrations);
    const container = this.compiler.compile<TExtra>(program, options);

    this.logger.info(
      { hash: program.hash, services: program.services.length },
      'Container constructed',
    );

    return container;
  }
}

/**
 * Build a container from registrations in one call.
 *
 * @example
 * ```typescript
 * const container = buildContainer(setup.getRegistrations(), {
 *   injected: [[IConnection, connection]],
 * });
 * ```
 */
export function buildContainer<TExtra = unknown>(
  registrations: readonly IRegistration[],
  options: IBuildContainerOptions = {},
): EmittedContainer<TExtra> {
  return new ContainerBuilder(options).build<TExtra>(registrations, { injected: options.injected });
}
