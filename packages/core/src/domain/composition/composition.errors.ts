/**
 * @fileoverview Composition Errors - Error Classes for Graph Building and Synthesis
 *
 * @packageDocumentation
 * @module @emitwire/core/domain/composition
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * This module defines the error taxonomy of the composition engine. Each
 * error carries a {@link CompositionErrorCode}, the resolution path leading
 * to it and a rendered dependency graph for debugging.
 *
 * | Code | Raised when |
 * |------|-------------|
 * | ArgumentInvalid | malformed input to a builder API |
 * | UnresolvedDependency | a parameter or property has no registration |
 * | AmbiguousOrCyclicGraph | several candidates for one value, a cycle without a lazy edge, or a singleton reentered while being built |
 * | SynthesisInvariantViolation | a reference escaped resolution (engine bug) |
 * | ExternalCompilation | the generated source failed to compile or load |
 *
 * None of these is retried: composition is deterministic.
 *
 * @version 1.0.0
 */

import {
  type Dependency,
  type ServiceIdentifier,
  getDependencyName,
  getServiceName,
} from '../registration/service-identifier';

/**
 * Machine-readable error category.
 */
export enum CompositionErrorCode {
  ArgumentInvalid = 'ARGUMENT_INVALID',
  UnresolvedDependency = 'UNRESOLVED_DEPENDENCY',
  AmbiguousOrCyclicGraph = 'AMBIGUOUS_OR_CYCLIC_GRAPH',
  SynthesisInvariantViolation = 'SYNTHESIS_INVARIANT_VIOLATION',
  ExternalCompilation = 'EXTERNAL_COMPILATION',
  ContainerSealed = 'CONTAINER_SEALED',
  ContainerDisposed = 'CONTAINER_DISPOSED',
  ServiceNotRegistered = 'SERVICE_NOT_REGISTERED',
}

/**
 * Base error class for all composition errors.
 *
 * @remarks
 * ```typescript
 * try {
 *   setup.compose();
 * } catch (error) {
 *   if (error instanceof CompositionError) {
 *     console.error(error.code, error.message);
 *     console.error(error.dependencyGraph);
 *   }
 * }
 * ```
 */
export abstract class CompositionError extends Error {
  public abstract readonly code: CompositionErrorCode;

  /**
   * The chain of types being composed when the error occurred:
   * ```
   * OrderController -> OrderService -> IOrderRepository (UNRESOLVED)
   * ```
   */
  public readonly resolutionPath: string[];

  /**
   * Visual representation of {@link resolutionPath}:
   * ```
   * OrderController
   *   └─ OrderService
   *     └─ IOrderRepository (UNRESOLVED)
   * ```
   */
  public readonly dependencyGraph: string;

  constructor(message: string, resolutionPath: string[] = [], options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    this.resolutionPath = resolutionPath;
    this.dependencyGraph = this.buildDependencyGraph();

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * @internal
   */
  private buildDependencyGraph(): string {
    if (this.resolutionPath.length === 0) {
      return '';
    }

    const lines: string[] = [];
    for (let i = 0; i < this.resolutionPath.length; i++) {
      const indent = '  '.repeat(i);
      const prefix = i === 0 ? '' : '└─ ';
      lines.push(`${indent}${prefix}${this.resolutionPath[i]}`);
    }
    return lines.join('\n');
  }
}

/**
 * The member of a type through which a dependency was requested.
 */
export interface IDependencyMember {
  readonly kind: 'parameter' | 'property';

  /**
   * Parameter position (as `#n`) or property name.
   */
  readonly name: string;
}

export function describeMember(member: IDependencyMember): string {
  return member.kind === 'parameter' ? `parameter ${member.name}` : `property '${member.name}'`;
}

/**
 * Error thrown for null or malformed input to a builder API.
 *
 * @remarks
 * Raised at the boundary, before anything reaches the composition graph.
 */
export class ArgumentInvalidError extends CompositionError {
  public readonly code = CompositionErrorCode.ArgumentInvalid;

  public readonly argumentName: string;

  constructor(argumentName: string, reason: string) {
    super(`Invalid argument '${argumentName}': ${reason}`);
    this.argumentName = argumentName;
  }
}

/**
 * Error thrown when a constructor parameter or injected property has no
 * matching registration and is not a collection shape.
 *
 * @example
 * ```typescript
 * class ClassA {
 *   static inject = [ClassB] as const;
 *   constructor(readonly b: ClassB) {}
 * }
 *
 * // Throws UnresolvedDependencyError naming ClassB and ClassA
 * new RegistrationSetup().register(ClassA).compose();
 * ```
 */
export class UnresolvedDependencyError extends CompositionError {
  public readonly code = CompositionErrorCode.UnresolvedDependency;

  /**
   * The dependency that could not be satisfied.
   */
  public readonly dependency: Dependency;

  /**
   * The implementation type that requested it.
   */
  public readonly recipient: ServiceIdentifier;

  public readonly member: IDependencyMember;

  constructor(
    dependency: Dependency,
    recipient: ServiceIdentifier,
    member: IDependencyMember,
    resolutionPath: string[] = [],
  ) {
    const dependencyName = getDependencyName(dependency);
    const recipientName = getServiceName(recipient);

    const message =
      `Failed to resolve '${dependencyName}' for ${describeMember(member)} of '${recipientName}'. ` +
      `Is there a missing registration mapping?`;

    super(message, [...resolutionPath, recipientName, `${dependencyName} (UNRESOLVED)`]);
    this.dependency = dependency;
    this.recipient = recipient;
    this.member = member;
  }
}

/**
 * Error thrown when a single-valued dependency has several registrations.
 *
 * @remarks
 * Request every registration with `many(T)`, or mark the extra
 * registrations as belonging to another service type.
 */
export class AmbiguousDependencyError extends CompositionError {
  public readonly code = CompositionErrorCode.AmbiguousOrCyclicGraph;

  public readonly dependency: ServiceIdentifier;

  public readonly recipient: ServiceIdentifier | undefined;

  /**
   * Implementation keys of every candidate, in registration order.
   */
  public readonly candidates: readonly ServiceIdentifier[];

  constructor(
    dependency: ServiceIdentifier,
    candidates: readonly ServiceIdentifier[],
    recipient?: ServiceIdentifier,
    member?: IDependencyMember,
  ) {
    const dependencyName = getServiceName(dependency);
    const candidateNames = candidates.map((candidate) => getServiceName(candidate)).join(', ');
    const requester =
      recipient !== undefined && member !== undefined
        ? ` for ${describeMember(member)} of '${getServiceName(recipient)}'`
        : '';

    const message =
      `'${dependencyName}' has ${candidates.length} registrations (${candidateNames})${requester}; ` +
      `request many(${dependencyName}) to receive all of them.`;

    super(message, [
      ...(recipient !== undefined ? [getServiceName(recipient)] : []),
      `${dependencyName} (AMBIGUOUS)`,
    ]);
    this.dependency = dependency;
    this.recipient = recipient;
    this.candidates = candidates;
  }
}

/**
 * Error thrown when construction edges form a cycle that no lazy edge
 * breaks.
 *
 * @example
 * ```typescript
 * // ServiceA -> ServiceB -> ServiceA = CIRCULAR!
 *
 * // Fix with a lazy edge:
 * class ServiceB {
 *   static inject = [lazy(ServiceA)] as const;
 *   constructor(private readonly serviceA: () => ServiceA) {}
 * }
 * ```
 */
export class CircularDependencyError extends CompositionError {
  public readonly code = CompositionErrorCode.AmbiguousOrCyclicGraph;

  /**
   * The cycle, closing on its first element.
   */
  public readonly cyclePath: string[];

  constructor(cycle: readonly ServiceIdentifier[]) {
    const names = cycle.map((type) => getServiceName(type));
    const first = names[0] ?? '';
    const cyclePath = [...names, first];
    const cycleStr = cyclePath.join(' -> ');

    const message =
      `Circular dependency detected: ${cycleStr}\n\n` +
      `To fix:\n` +
      `  1. Refactor to break the cycle\n` +
      `  2. Declare one of the dependencies with lazy()\n` +
      `  3. Extract shared logic into a separate service`;

    super(message, [...names, `${first} (CIRCULAR!)`]);
    this.cyclePath = cyclePath;
  }
}

/**
 * Error thrown when a singleton is reached through a lazy edge while it is
 * still being built.
 *
 * @example
 * ```typescript
 * class ServiceA {
 *   static inject = [lazy(ServiceB)] as const;
 *   constructor(getB: () => ServiceB) {
 *     getB(); // ServiceB needs ServiceA, which is not built yet
 *   }
 * }
 * ```
 */
export class SingletonReentryError extends CompositionError {
  public readonly code = CompositionErrorCode.AmbiguousOrCyclicGraph;

  public readonly serviceIdentifier: ServiceIdentifier;

  constructor(identifier: ServiceIdentifier) {
    const name = getServiceName(identifier);
    super(
      `Singleton '${name}' was requested through a lazy dependency while it was being constructed. ` +
        `Call the lazy dependency after construction instead.`,
      [`${name} (REENTERED)`],
    );
    this.serviceIdentifier = identifier;
  }
}

/**
 * Error thrown when code synthesis meets a reference that escaped
 * resolution.
 *
 * @remarks
 * This indicates a bug in the engine, not in the registrations. The whole
 * build is aborted; there is no partial container.
 */
export class SynthesisInvariantError extends CompositionError {
  public readonly code = CompositionErrorCode.SynthesisInvariantViolation;

  constructor(message: string) {
    super(`Synthesis invariant violated: ${message}`);
  }
}

/**
 * Error thrown when the generated source fails to compile or load.
 *
 * @remarks
 * The generated program is not visible to callers any other way, so the
 * error carries it in full.
 */
export class ExternalCompilationError extends CompositionError {
  public readonly code = CompositionErrorCode.ExternalCompilation;

  public readonly diagnostics: readonly string[];

  public readonly source: string;

  constructor(diagnostics: readonly string[], source: string, cause?: unknown) {
    super(`Compilation failed.\n${diagnostics.join('\n')}\n${source}`, [], { cause });
    this.diagnostics = diagnostics;
    this.source = source;
  }
}

/**
 * Error thrown when registering after the setup has been composed.
 */
export class ContainerSealedError extends CompositionError {
  public readonly code = CompositionErrorCode.ContainerSealed;

  constructor() {
    super(
      'Cannot register services after the registration setup has been composed. ' +
        'Register all services before calling compose().',
    );
  }
}

/**
 * Error thrown when resolving from a disposed container.
 */
export class ContainerDisposedError extends CompositionError {
  public readonly code = CompositionErrorCode.ContainerDisposed;

  constructor() {
    super('Cannot resolve services from a disposed container.');
  }
}

/**
 * Error thrown when a compiled container is asked for a service it does not
 * expose.
 */
export class ServiceNotRegisteredError extends CompositionError {
  public readonly code = CompositionErrorCode.ServiceNotRegistered;

  public readonly serviceIdentifier: ServiceIdentifier;

  constructor(identifier: ServiceIdentifier) {
    const name = getServiceName(identifier);
    const message =
      `Service '${name}' is not registered in the container. ` +
      `Did you forget to register it, or register it as internal?`;

    super(message, [`${name} (UNREGISTERED)`]);
    this.serviceIdentifier = identifier;
  }
}
