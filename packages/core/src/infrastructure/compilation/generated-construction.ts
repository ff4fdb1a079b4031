/**
 * @fileoverview Generated Construction - Shape of the Compiled Class
 *
 * @packageDocumentation
 * @module @emitwire/core/infrastructure/compilation
 * @license Apache-2.0
 *
 * @version 1.0.0
 */

import { type ConstructionContext } from '../../domain/registration';

/**
 * Instance of the class emitted by the code generator.
 */
export interface IGeneratedConstruction {
  getCreateMap(): unknown;
  getSingletons(): unknown;
}

export type GeneratedConstructionClass = new (
  fieldValues: readonly unknown[],
  context: ConstructionContext,
) => IGeneratedConstruction;

/**
 * Check that a loaded value is a class shaped like the generated one.
 */
export function isGeneratedConstructionClass(value: unknown): value is GeneratedConstructionClass {
  if (typeof value !== 'function') {
    return false;
  }

  const prototype: unknown = Reflect.get(value, 'prototype');
  return (
    typeof prototype === 'object' &&
    prototype !== null &&
    typeof Reflect.get(prototype, 'getCreateMap') === 'function' &&
    typeof Reflect.get(prototype, 'getSingletons') === 'function'
  );
}
