/**
 * @fileoverview CodeGenerator - Construction Code Synthesis
 *
 * @packageDocumentation
 * @module @emitwire/core/infrastructure/generation
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Renders a finalized {@link CompositionContainer} as one JavaScript
 * program. The program is the resolution plan: nothing at runtime looks at
 * `static inject` again.
 *
 * @version 1.0.0
 */

import { createHash } from 'node:crypto';

import { type FieldInitialization } from '../../domain/composition';
import { type ServiceIdentifier } from '../../domain/registration';
import { type CompositionContainer } from '../composition/composition-container';
import { type Logger, createLogger } from '../logging/logger';

import { indent } from './code-text';

/**
 * Name of the emitted class.
 */
export const GENERATED_CLASS_NAME = 'GeneratedConstruction';

/**
 * The output of one generation run.
 */
export interface IGeneratedProgram {
  /**
   * Program text. Its last statement returns the generated class, so it is
   * meant to be evaluated as a function body.
   */
  readonly source: string;

  /**
   * SHA-256 of {@link source}, hex encoded.
   */
  readonly hash: string;

  /**
   * Values for `fieldValues`, in the order the constructor reads them.
   */
  readonly fieldInitializations: readonly FieldInitialization[];

  /**
   * Public service types, in the order of `getCreateMap()`.
   */
  readonly services: readonly ServiceIdentifier[];

  /**
   * Implementation keys of each `getCreateMap()` entry.
   */
  readonly implementationKeys: readonly (readonly ServiceIdentifier[])[];

  readonly needsContext: boolean;
}

/**
 * CodeGenerator - Emits the construction program for a container.
 *
 * @remarks
 * **Program Shape:**
 *
 * ```javascript
 * 'use strict';
 * class GeneratedConstruction {
 *   typeClock;
 *   singletonClock;
 *
 *   constructor(fieldValues, context) {
 *     this.typeClock = fieldValues[0];
 *     this.singletonClock = this.createClock();
 *   }
 *
 *   createClock() {
 *     return new this.typeClock();
 *   }
 *
 *   getCreateMap() {
 *     return [
 *       [() => this.singletonClock],
 *     ];
 *   }
 *
 *   getSingletons() {
 *     return [this.singletonClock];
 *   }
 * }
 * return GeneratedConstruction;
 * ```
 *
 * The same container always yields byte-identical text.
 */
export class CodeGenerator {
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? createLogger();
  }

  /**
   * @throws SynthesisInvariantError if a reference escaped resolution
   */
  generate(container: CompositionContainer): IGeneratedProgram {
    const fields: string[] = [];
    const fieldInitializations: FieldInitialization[] = [];
    const additionalInitializations: string[] = [];
    const methods: string[] = [];
    const ownedFields: string[] = [];

    for (const composition of container.compositions) {
      fields.push(...composition.getFields(container));
      fieldInitializations.push(...composition.getFieldInitializations(container));
      additionalInitializations.push(...composition.getAdditionalInitializations(container));
      methods.push(...composition.getMethods(container));
      ownedFields.push(...composition.getOwnedFields(container));
    }

    const constructorBody = [
      ...fieldInitializations.map(
        (initialization, index) => `this.${initialization.field} = fieldValues[${index}];`,
      ),
      ...additionalInitializations,
    ].join('\n');

    const createMapEntries = container.services.map((serviceType) => {
      const creators = container.getServiceCompositions(serviceType).map((composition) => {
        const parameter = composition.requiresConstructionContext(container)
          ? container.contextParameter
          : '';
        return `(${parameter}) => ${composition.getInstanceExpression(container)}`;
      });
      return `[${creators.join(', ')}],`;
    });

    const getCreateMap = [
      'getCreateMap() {',
      indent(['return [', ...createMapEntries.map((entry) => indent(entry)), '];'].join('\n')),
      '}',
    ].join('\n');

    const getSingletons = [
      'getSingletons() {',
      indent(`return [${ownedFields.map((field) => `this.${field}`).join(', ')}];`),
      '}',
    ].join('\n');

    const members = [
      fields.map((field) => `${field};`).join('\n'),
      constructorBody.length > 0
        ? `constructor(fieldValues, ${container.contextParameter}) {\n${indent(constructorBody)}\n}`
        : `constructor(fieldValues, ${container.contextParameter}) {}`,
      ...methods,
      getCreateMap,
      getSingletons,
    ].filter((member) => member.length > 0);

    const source = [
      `'use strict';`,
      `class ${GENERATED_CLASS_NAME} {`,
      indent(members.join('\n\n')),
      '}',
      `return ${GENERATED_CLASS_NAME};`,
      '',
    ].join('\n');

    const hash = createHash('sha256').update(source).digest('hex');

    this.logger.debug(
      { hash, methods: methods.length, fields: fields.length, services: container.services.length },
      'Construction code generated',
    );

    return {
      source,
      hash,
      fieldInitializations,
      services: container.services,
      implementationKeys: container.services.map((serviceType) =>
        container.getServiceCompositions(serviceType).map((composition) => composition.key),
      ),
      needsContext: container.needsContext,
    };
  }
}
