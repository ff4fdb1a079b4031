/**
 * @fileoverview ServiceIdentifier - Unified Service Identification
 *
 * @packageDocumentation
 * @module @emitwire/core/domain/registration
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * This module defines the identifiers used for service types and
 * implementation keys, the static dependency declarations read from
 * injectable classes, and the naming helpers used for generated code.
 *
 * ## Zero-Reflection Philosophy
 *
 * Dependencies are declared statically and read exactly once, while the
 * composition graph is built:
 *
 * ```typescript
 * class OrderService {
 *   static inject = [ILogger, many(IOrderRule), lazy(AuditTrail)] as const;
 *   constructor(logger: ILogger, rules: IOrderRule[], audit: () => AuditTrail) {}
 * }
 * ```
 *
 * @version 1.0.0
 */

/**
 * Type representing a constructor function.
 *
 * @template T - The instance type created by the constructor
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type Constructor<T = any> = new (...args: any[]) => T;

/**
 * Abstract constructor type for abstract classes used as service types.
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type AbstractConstructor<T = any> = abstract new (...args: any[]) => T;

/**
 * ServiceIdentifier - identity of a service type or implementation key.
 *
 * @remarks
 * Identifiers compare by identity: two classes that share a name in
 * different modules are two distinct identifiers.
 *
 * 1. **Constructor<T>**: class-based identification
 * 2. **symbol**: interface token (see {@link createToken})
 * 3. **string**: configuration-driven identification
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type ServiceIdentifier<T = any> = Constructor<T> | AbstractConstructor<T> | symbol | string;

/**
 * Check if a value is a valid ServiceIdentifier.
 *
 * @example
 * ```typescript
 * isServiceIdentifier(UserService); // true (constructor)
 * isServiceIdentifier(Symbol('ILogger')); // true (symbol)
 * isServiceIdentifier(''); // false
 * isServiceIdentifier(null); // false
 * ```
 */
export function isServiceIdentifier(value: unknown): value is ServiceIdentifier {
  if (value === null || value === undefined) {
    return false;
  }

  switch (typeof value) {
    case 'symbol':
    case 'function':
      return true;
    case 'string':
      return value.length > 0;
    default:
      return false;
  }
}

// ============================================================================
// Dependency Markers
// ============================================================================

/**
 * Token a constructor or factory declares to receive the per-resolution
 * {@link ConstructionContext}.
 */
export const CONSTRUCTION_CONTEXT = Symbol('ConstructionContext');

/**
 * Dependency on every registration of a service type, in registration order.
 */
export interface ManyDependency<T = unknown> {
  readonly kind: 'many';
  readonly serviceType: ServiceIdentifier<T>;
}

/**
 * Dependency resolved through a zero-argument callable.
 *
 * @remarks
 * Lazy edges are the only edges allowed to close a cycle in the graph.
 */
export interface LazyDependency<T = unknown> {
  readonly kind: 'lazy';
  readonly serviceType: ServiceIdentifier<T>;
}

/**
 * One element of a constructor signature or property map.
 */
export type Dependency = ServiceIdentifier | ManyDependency | LazyDependency;

/**
 * Declare a collection dependency: the constructor receives `T[]`.
 *
 * @example
 * ```typescript
 * class RuleEngine {
 *   static inject = [many(IRule)] as const;
 *   constructor(readonly rules: IRule[]) {}
 * }
 * ```
 */
export function many<T>(serviceType: ServiceIdentifier<T>): ManyDependency<T> {
  return { kind: 'many', serviceType };
}

/**
 * Declare a deferred dependency: the constructor receives `() => T`.
 */
export function lazy<T>(serviceType: ServiceIdentifier<T>): LazyDependency<T> {
  return { kind: 'lazy', serviceType };
}

export function isManyDependency(value: Dependency): value is ManyDependency {
  return typeof value === 'object' && value.kind === 'many';
}

export function isLazyDependency(value: Dependency): value is LazyDependency {
  return typeof value === 'object' && value.kind === 'lazy';
}

export function isDependency(value: unknown): value is Dependency {
  if (typeof value === 'object' && value !== null) {
    const kind: unknown = Reflect.get(value, 'kind');
    const serviceType: unknown = Reflect.get(value, 'serviceType');
    return (kind === 'many' || kind === 'lazy') && isServiceIdentifier(serviceType);
  }
  return isServiceIdentifier(value);
}

// ============================================================================
// Injectable Constructor (Static Inject Pattern)
// ============================================================================

/**
 * Type for a constructor carrying static dependency declarations.
 *
 * @remarks
 * - `inject`: the constructor signature, in parameter order
 * - `injectSignatures`: alternative signatures; the composition picks the
 *   longest one the graph can satisfy, earlier declarations winning ties
 * - `injectProperties`: properties assigned after construction, in key order
 * - `qualifiedName`: namespace-qualified name used when two implementation
 *   types share a simple name
 *
 * @example
 * ```typescript
 * class ReportJob {
 *   static qualifiedName = 'Reports.ReportJob';
 *   static injectSignatures = [[IClock, IMailer], [IClock]] as const;
 *   static injectProperties = { logger: ILogger } as const;
 *
 *   logger?: ILogger;
 *   constructor(clock: IClock, mailer?: IMailer) {}
 * }
 * ```
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export interface IInjectableConstructor<T = any> extends Constructor<T> {
  inject?: readonly Dependency[];
  injectSignatures?: readonly (readonly Dependency[])[];
  injectProperties?: Readonly<Record<string, Dependency>>;
  qualifiedName?: string;
}

function readStatic(ctor: object, property: keyof IInjectableConstructor): unknown {
  return Reflect.get(ctor, property);
}

/**
 * Get the constructor signatures declared by a class, in declaration order.
 *
 * @remarks
 * A class without declarations has a single parameterless signature.
 */
export function getInjectSignatures(ctor: Constructor): readonly (readonly Dependency[])[] {
  const signatures = readStatic(ctor, 'injectSignatures');
  if (Array.isArray(signatures) && signatures.length > 0) {
    return signatures.filter(Array.isArray).map((signature) => signature.filter(isDependency));
  }

  const inject = readStatic(ctor, 'inject');
  if (Array.isArray(inject)) {
    return [inject.filter(isDependency)];
  }

  return [[]];
}

/**
 * Get the property injections declared by a class, in key order.
 */
export function getInjectProperties(ctor: Constructor): readonly (readonly [string, Dependency])[] {
  const properties = readStatic(ctor, 'injectProperties');
  if (typeof properties !== 'object' || properties === null) {
    return [];
  }

  const result: [string, Dependency][] = [];
  for (const [property, dependency] of Object.entries(properties)) {
    if (isDependency(dependency)) {
      result.push([property, dependency]);
    }
  }
  return result;
}

// ============================================================================
// Naming
// ============================================================================

/**
 * Get a human-readable name for a ServiceIdentifier.
 *
 * @example
 * ```typescript
 * getServiceName(UserService); // 'UserService'
 * getServiceName(Symbol('ILogger')); // 'Symbol(ILogger)'
 * getServiceName('my-service'); // 'my-service'
 * ```
 */
export function getServiceName(identifier: ServiceIdentifier): string {
  if (typeof identifier === 'symbol') {
    return identifier.toString();
  }

  if (typeof identifier === 'string') {
    return identifier;
  }

  const qualified = readStatic(identifier, 'qualifiedName');
  if (typeof qualified === 'string' && qualified.length > 0) {
    return qualified;
  }

  return identifier.name || 'AnonymousClass';
}

/**
 * Get a name for a dependency, marking collection and lazy shapes.
 */
export function getDependencyName(dependency: Dependency): string {
  if (dependency === CONSTRUCTION_CONTEXT) {
    return 'ConstructionContext';
  }
  if (isManyDependency(dependency)) {
    return `many(${getServiceName(dependency.serviceType)})`;
  }
  if (isLazyDependency(dependency)) {
    return `lazy(${getServiceName(dependency.serviceType)})`;
  }
  return getServiceName(dependency);
}

/**
 * Simple (unqualified) name used for generated identifiers.
 *
 * @example
 * ```typescript
 * getSimpleName(Ns1.MyClass1); // 'MyClass1'
 * getSimpleName(Symbol('ILogger')); // 'ILogger'
 * getSimpleName('db.connection'); // 'connection'
 * ```
 */
export function getSimpleName(identifier: ServiceIdentifier): string {
  if (typeof identifier === 'symbol') {
    return identifier.description ?? 'Symbol';
  }

  if (typeof identifier === 'string') {
    const segments = identifier.split('.');
    return segments[segments.length - 1] || identifier;
  }

  return identifier.name || 'AnonymousClass';
}

/**
 * Qualified name used for generated identifiers when simple names collide.
 */
export function getQualifiedName(identifier: ServiceIdentifier): string {
  if (typeof identifier === 'symbol') {
    return identifier.description ?? 'Symbol';
  }
  return getServiceName(identifier);
}

// ============================================================================
// Token Creation Helpers
// ============================================================================

/**
 * Create a typed service token (Symbol) for interface abstraction.
 *
 * @example
 * ```typescript
 * interface ILogger {
 *   info(message: string): void;
 * }
 *
 * const ILogger = createToken<ILogger>('ILogger');
 * setup.register(ILogger, ConsoleLogger);
 * ```
 */
export function createToken<T>(description: string): ServiceIdentifier<T> {
  return Symbol(description);
}
