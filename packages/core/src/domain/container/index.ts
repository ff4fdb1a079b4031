/**
 * @fileoverview Domain Container Module Exports
 *
 * @packageDocumentation
 * @module @emitwire/core/domain/container
 * @license Apache-2.0
 */

export {
  type IDisposable,
  type IEmittedContainer,
  type ICreateEntry,
  type CreateFunction,
  isDisposable,
} from './container.interface';
