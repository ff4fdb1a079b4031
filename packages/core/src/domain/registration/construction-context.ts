/**
 * @fileoverview ConstructionContext - Per-Resolution Payload
 *
 * @packageDocumentation
 * @module @emitwire/core/domain/registration
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * A ConstructionContext is created for each top-level resolution, passed by
 * reference to every construction method that needs it, and dropped when
 * the resolution returns. Compositions never store it.
 *
 * @version 1.0.0
 */

import { type ServiceIdentifier, getServiceName } from './service-identifier';

/**
 * ConstructionContext - caller-supplied extra data plus the resolution path.
 *
 * @template TExtra - Type of the extra data passed to `resolve()`
 *
 * @remarks
 * Emitted construction methods that require the context call `enter()`
 * before building their instance and `leave()` afterwards, so a factory
 * invoked in between sees which type it is constructing a value for:
 *
 * ```typescript
 * setup.registerFactory(ILogger, (context) =>
 *   rootLogger.child({ for: String(context.recipientType?.toString()) }),
 * );
 * ```
 */
export class ConstructionContext<TExtra = unknown> {
  /**
   * Extra data supplied by the caller of `resolve()`.
   */
  public readonly extra: TExtra | undefined;

  /**
   * The service type requested at the top level, if any.
   */
  public readonly serviceType: ServiceIdentifier | undefined;

  private readonly path: ServiceIdentifier[] = [];

  constructor(extra?: TExtra, serviceType?: ServiceIdentifier) {
    this.extra = extra;
    this.serviceType = serviceType;
  }

  /**
   * Record that construction of `implementationType` has started.
   */
  enter(implementationType: ServiceIdentifier): void {
    this.path.push(implementationType);
  }

  /**
   * Record that the innermost construction has finished.
   */
  leave(): void {
    this.path.pop();
  }

  /**
   * Implementation types currently under construction, outermost first.
   */
  get resolutionPath(): readonly ServiceIdentifier[] {
    return [...this.path];
  }

  /**
   * The type currently being constructed, which receives the value being
   * produced; undefined at the top level.
   */
  get recipientType(): ServiceIdentifier | undefined {
    return this.path[this.path.length - 1];
  }

  /**
   * Resolution path rendered as `A -> B -> C`.
   */
  describePath(): string {
    return this.path.map((type) => getServiceName(type)).join(' -> ');
  }
}
