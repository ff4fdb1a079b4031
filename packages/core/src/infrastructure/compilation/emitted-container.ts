/**
 * @fileoverview EmittedContainer - Runtime Face of the Compiled Code
 *
 * @packageDocumentation
 * @module @emitwire/core/infrastructure/compilation
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Resolution is a map lookup followed by a call into the generated code.
 * There is no graph walk, no metadata read and no cache at this level:
 * Singleton instances live in fields of the generated object.
 *
 * @version 1.0.0
 */

import {
  AmbiguousDependencyError,
  ContainerDisposedError,
  ServiceNotRegisteredError,
} from '../../domain/composition';
import {
  type ICreateEntry,
  type IEmittedContainer,
  isDisposable,
} from '../../domain/container';
import { ConstructionContext, type ServiceIdentifier } from '../../domain/registration';
import { type Logger } from '../logging/logger';

/**
 * EmittedContainer - Resolves services through the compiled create map.
 *
 * @template TExtra - Type of the extra data handed to the construction context
 *
 * @remarks
 * **Construction Context:**
 *
 * When any composition needs it, each top-level call creates one
 * {@link ConstructionContext} carrying `extra` and the requested type, and
 * drops it when the call returns. `resolveAll` counts as one call.
 *
 * @example
 * ```typescript
 * const setup = new RegistrationSetup<{ tenant: string }>();
 * // ... registrations
 * const container = setup.construct();
 *
 * const service = container.resolve(ReportService, { tenant: 'acme' });
 * await container.dispose();
 * ```
 */
export class EmittedContainer<TExtra = unknown> implements IEmittedContainer<TExtra> {
  private disposed = false;

  constructor(
    private readonly entries: ReadonlyMap<ServiceIdentifier, readonly ICreateEntry[]>,
    private readonly singletons: readonly unknown[],
    public readonly needsContext: boolean,
    private readonly logger: Logger,
  ) {}

  get services(): readonly ServiceIdentifier[] {
    return Array.from(this.entries.keys());
  }

  resolve<T>(identifier: ServiceIdentifier<T>, extra?: TExtra): T {
    this.ensureNotDisposed();

    const entries = this.entries.get(identifier);
    const [entry] = entries ?? [];
    if (entries === undefined || entry === undefined) {
      throw new ServiceNotRegisteredError(identifier);
    }

    if (entries.length > 1) {
      throw new AmbiguousDependencyError(
        identifier,
        entries.map((candidate) => candidate.implementationKey),
      );
    }

    return entry.create(this.createContext(identifier, extra)) as T;
  }

  tryResolve<T>(identifier: ServiceIdentifier<T>, extra?: TExtra): T | undefined {
    try {
      return this.resolve(identifier, extra);
    } catch (error) {
      if (error instanceof ServiceNotRegisteredError) {
        return undefined;
      }
      throw error;
    }
  }

  resolveAll<T>(identifier: ServiceIdentifier<T>, extra?: TExtra): T[] {
    this.ensureNotDisposed();

    const entries = this.entries.get(identifier) ?? [];
    if (entries.length === 0) {
      return [];
    }

    const context = this.createContext(identifier, extra);
    return entries.map((entry) => entry.create(context) as T);
  }

  isRegistered(identifier: ServiceIdentifier): boolean {
    return this.entries.has(identifier);
  }

  /**
   * Dispose the container and every owned singleton implementing
   * IDisposable, in reverse construction order.
   */
  async dispose(): Promise<void> {
    if (this.disposed) {
      return;
    }

    this.disposed = true;

    const seen = new Set<unknown>();
    for (const instance of [...this.singletons].reverse()) {
      if (seen.has(instance) || !isDisposable(instance)) {
        continue;
      }
      seen.add(instance);
      try {
        await instance.dispose();
      } catch (error) {
        this.logger.error({ err: error }, 'Error disposing singleton');
      }
    }
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  private createContext(
    identifier: ServiceIdentifier,
    extra: TExtra | undefined,
  ): ConstructionContext<TExtra> | undefined {
    return this.needsContext ? new ConstructionContext(extra, identifier) : undefined;
  }

  private ensureNotDisposed(): void {
    if (this.disposed) {
      throw new ContainerDisposedError();
    }
  }
}
