/**
 * @fileoverview Dependency Injection Container Interfaces
 *
 * @packageDocumentation
 * @module scopeline/application/di
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * Application layer:
 * - ✅ **CAN**: Define service registration and resolution interfaces
 * - ✅ **CAN**: Describe service lifetimes and scopes
 * - ❌ **CANNOT**: Know about specific transports or pipelines
 *
 * ## Architectural Responsibility
 *
 * These are the contracts the pipeline integration consumes from a container:
 *
 * | Operation | Contract |
 * |-----------|----------|
 * | begin a child scope with overrides | `IServiceProvider.createScope(configure)` |
 * | release a scope | `IServiceScope.dispose()` |
 * | enumerate registrations | `IServiceProvider.getRegistrations()` |
 * | check a registration | `IServiceResolver.isRegistered(id)` |
 * | resolve | `IServiceResolver.resolve(id)` |
 *
 * `ServiceProvider` in `infrastructure/di` is the bundled implementation, but
 * anything honouring these interfaces can be plugged into the pipeline.
 *
 * ## Service Lifetimes
 *
 * ```
 * Singleton  Request 1 → A#1   Request 2 → A#1      (cached in the root)
 * Scoped     Request 1 → B#1   Request 2 → B#2      (cached per scope)
 * Transient  every resolve → new instance
 * ```
 *
 * **Valid Lifetime Dependencies:**
 * - ✅ Singleton can inject: Singleton, Transient
 * - ✅ Scoped can inject: Singleton, Scoped, Transient
 * - ✅ Transient can inject: Singleton, Scoped, Transient
 * - ❌ Singleton cannot inject: Scoped (a captive dependency would outlive its scope)
 *
 * ## Request Scope
 *
 * ```typescript
 * const scope = provider.createScope((overrides) => {
 *   overrides.addInstance(MIDDLEWARE_CONTEXT, ctx);   // visible only in this scope
 * });
 * try {
 *   const uow = scope.resolve(UnitOfWork);
 *   await uow.commit();
 * } finally {
 *   await scope.dispose();   // disposes scoped instances, newest first
 * }
 * ```
 */

import 'reflect-metadata';
import type { ILogger } from '../host/logger';

// ============================================================================
// Service Identifiers
// ============================================================================

/**
 * Concrete class constructor.
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type Constructor<T = unknown> = new (...args: any[]) => T;

/**
 * Abstract or concrete class, usable as a capability key.
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type AbstractConstructor<T = unknown> = abstract new (...args: any[]) => T;

/**
 * Typed token for services that have no class of their own (interfaces,
 * configuration objects, functions).
 *
 * @example
 * ```typescript
 * interface AppConfig { dbUrl: string }
 * const APP_CONFIG = new InjectionToken<AppConfig>('AppConfig');
 *
 * services.addInstance(APP_CONFIG, { dbUrl: 'postgres://localhost/test' });
 * const config = provider.resolve(APP_CONFIG); // AppConfig
 * ```
 */
export class InjectionToken<T> {
  declare readonly __type: T | undefined;

  constructor(public readonly description: string) {}

  toString(): string {
    return `InjectionToken(${this.description})`;
  }
}

/**
 * Key a service is registered and resolved under.
 */
export type ServiceIdentifier<T = unknown> =
  | Constructor<T>
  | AbstractConstructor<T>
  | InjectionToken<T>;

export function isServiceIdentifier(value: unknown): value is ServiceIdentifier {
  return typeof value === 'function' || value instanceof InjectionToken;
}

/**
 * Whether an identifier is a class rather than a token.
 *
 * @remarks
 * Abstract classes are still functions at runtime, so they pass this check.
 */
export function isConstructor<T>(identifier: ServiceIdentifier<T>): identifier is Constructor<T> {
  return typeof identifier === 'function';
}

/**
 * Human-readable name for error messages and logs.
 */
export function getServiceName(identifier: ServiceIdentifier): string {
  if (identifier instanceof InjectionToken) {
    return identifier.description;
  }
  return identifier.name || '<anonymous>';
}

// ============================================================================
// Lifetimes & Descriptors
// ============================================================================

/**
 * Lifecycle of a registered service.
 */
export enum ServiceLifetime {
  /** One instance for the whole application, cached in the root provider */
  Singleton = 'singleton',

  /** One instance per scope (per request); disposed with the scope */
  Scoped = 'scoped',

  /** New instance on every resolution */
  Transient = 'transient',
}

/**
 * Factory used for factory registrations.
 *
 * @remarks
 * The resolver passed in is the scope the service is being built for, so a
 * scoped factory sees scope-local overrides such as the current request.
 */
export type ServiceFactory<T> = (resolver: IServiceResolver) => T;

/**
 * A single registration known to the container.
 *
 * @remarks
 * Exactly one of `implementationType`, `factory` or `instance` is set.
 */
export interface ServiceDescriptor<T = unknown> {
  /** Capability the service is registered under */
  readonly serviceType: ServiceIdentifier<T>;

  readonly lifetime: ServiceLifetime;

  /** Class constructed for the service */
  readonly implementationType?: Constructor<T>;

  readonly factory?: ServiceFactory<T>;

  /** Pre-built instance (always behaves as a singleton) */
  readonly instance?: T;
}

// ============================================================================
// Disposal
// ============================================================================

/**
 * Resource that must be released when its owning scope ends.
 */
export interface IDisposable {
  dispose(): void | Promise<void>;
}

export function isDisposable(obj: unknown): obj is IDisposable {
  return (
    typeof obj === 'object' &&
    obj !== null &&
    'dispose' in obj &&
    typeof obj.dispose === 'function'
  );
}

// ============================================================================
// Resolution
// ============================================================================

/**
 * Read side shared by the root provider and every scope.
 */
export interface IServiceResolver {
  /**
   * Resolve a service.
   *
   * @throws DependencyResolutionError when the service (or one of its
   * dependencies) cannot be built
   * @throws ScopeDisposedError when called on a released scope
   */
  resolve<T>(identifier: ServiceIdentifier<T>): T;

  /**
   * Resolve a service, returning `undefined` if it is not registered.
   *
   * @remarks
   * Only a missing registration of `identifier` itself yields `undefined`;
   * failures while building it still throw.
   */
  tryResolve<T>(identifier: ServiceIdentifier<T>): T | undefined;

  isRegistered(identifier: ServiceIdentifier): boolean;
}

/**
 * Registrations visible only inside one scope.
 */
export interface IScopeOverrides {
  /**
   * Make `instance` resolvable as `identifier` within the scope being created.
   */
  addInstance<T>(identifier: ServiceIdentifier<T>, instance: T): this;
}

export type ScopeConfiguration = (overrides: IScopeOverrides) => void;

/**
 * A child resolution scope.
 *
 * @remarks
 * Scoped services resolved through a scope are cached in it and released by
 * `dispose()`, newest first. Disposing twice returns the same promise; the
 * scope's instances are released exactly once.
 */
export interface IServiceScope extends IServiceResolver {
  /** Resolver this scope falls back to */
  readonly parent: IServiceResolver;

  /**
   * Begin a nested scope.
   */
  createScope(configure?: ScopeConfiguration): IServiceScope;

  dispose(): Promise<void>;

  isDisposed(): boolean;
}

/**
 * The root container: application-lifetime, shared by every request.
 */
export interface IServiceProvider extends IServiceResolver {
  /**
   * Begin a child scope of the root.
   *
   * @param configure - Registers scope-local overrides
   */
  createScope(configure?: ScopeConfiguration): IServiceScope;

  /**
   * Every registration, in registration order.
   */
  getRegistrations(): readonly ServiceDescriptor[];

  /**
   * Dispose singletons. Call once at application shutdown.
   */
  dispose(): Promise<void>;
}

/**
 * Build-phase registration API.
 *
 * @remarks
 * Registering an identifier a second time replaces the earlier registration.
 *
 * @example
 * ```typescript
 * const provider = new ServiceCollection()
 *   .addSingleton(Clock)
 *   .addScoped(UnitOfWork)
 *   .addScoped(AuditMiddleware)
 *   .addInstance(APP_CONFIG, config)
 *   .build();
 * ```
 */
export interface IServiceCollection {
  addSingleton<T>(implementationType: Constructor<T>): this;
  addSingleton<T>(serviceType: ServiceIdentifier<T>, implementationType: Constructor<T>): this;

  addScoped<T>(implementationType: Constructor<T>): this;
  addScoped<T>(serviceType: ServiceIdentifier<T>, implementationType: Constructor<T>): this;

  addTransient<T>(implementationType: Constructor<T>): this;
  addTransient<T>(serviceType: ServiceIdentifier<T>, implementationType: Constructor<T>): this;

  /**
   * Register a class under its own type, with the lifetime given by its
   * `@Injectable()` decorator (Transient when undecorated).
   */
  add<T>(implementationType: Constructor<T>): this;

  addSingletonFactory<T>(serviceType: ServiceIdentifier<T>, factory: ServiceFactory<T>): this;
  addScopedFactory<T>(serviceType: ServiceIdentifier<T>, factory: ServiceFactory<T>): this;
  addTransientFactory<T>(serviceType: ServiceIdentifier<T>, factory: ServiceFactory<T>): this;

  addInstance<T>(serviceType: ServiceIdentifier<T>, instance: T): this;

  has(serviceType: ServiceIdentifier): boolean;

  getDescriptors(): readonly ServiceDescriptor[];

  build(options?: BuildOptions): IServiceProvider;
}

/**
 * Options for {@link IServiceCollection.build}.
 */
export interface BuildOptions {
  /** Receives disposal failures (default: console logger) */
  logger?: ILogger;
}

// ============================================================================
// Decorators
// ============================================================================

const INJECTABLE_LIFETIME_KEY = Symbol('scopeline:injectable:lifetime');
const INJECT_PARAMETERS_KEY = Symbol('scopeline:inject:parameters');

/**
 * Mark a class as constructible by the container.
 *
 * @remarks
 * Decorating a class makes TypeScript emit its constructor parameter types
 * (`emitDecoratorMetadata`), which the container reads to inject
 * dependencies. The lifetime is used by `IServiceCollection.add()`.
 *
 * @example
 * ```typescript
 * @Injectable({ lifetime: ServiceLifetime.Scoped })
 * class OrderService {
 *   constructor(private readonly uow: UnitOfWork, private readonly clock: Clock) {}
 * }
 * ```
 */
export function Injectable(
  options: { lifetime?: ServiceLifetime } = {},
): ClassDecorator {
  return (target) => {
    Reflect.defineMetadata(
      INJECTABLE_LIFETIME_KEY,
      options.lifetime ?? ServiceLifetime.Transient,
      target,
    );
  };
}

/**
 * Override the identifier injected into one constructor parameter.
 *
 * @remarks
 * Required for parameters typed as interfaces, which have no runtime type.
 *
 * @example
 * ```typescript
 * @Injectable()
 * class Mailer {
 *   constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {}
 * }
 * ```
 */
export function Inject<T>(identifier: ServiceIdentifier<T>): ParameterDecorator {
  return (target, _propertyKey, parameterIndex) => {
    const existing: unknown = Reflect.getOwnMetadata(INJECT_PARAMETERS_KEY, target);
    const parameters = new Map<number, ServiceIdentifier>(
      existing instanceof Map ? existing : [],
    );
    parameters.set(parameterIndex, identifier);
    Reflect.defineMetadata(INJECT_PARAMETERS_KEY, parameters, target);
  };
}

/**
 * Lifetime declared through `@Injectable()`, if any.
 */
export function getInjectableLifetime(target: Constructor): ServiceLifetime | undefined {
  const lifetime: unknown = Reflect.getOwnMetadata(INJECTABLE_LIFETIME_KEY, target);
  return Object.values(ServiceLifetime).find((value) => value === lifetime);
}

/**
 * Constructor dependencies of `target`, by parameter position.
 *
 * @remarks
 * A static `inject` array wins; otherwise emitted parameter types are used,
 * with `@Inject()` overrides applied. Positions whose type cannot be known
 * (interfaces, primitives) are `undefined`.
 */
export function getConstructorDependencies(
  target: Constructor,
): Array<ServiceIdentifier | undefined> {
  if ('inject' in target && Array.isArray(target.inject)) {
    return target.inject.map((dependency: unknown) =>
      isServiceIdentifier(dependency) ? dependency : undefined,
    );
  }

  const emitted: unknown = Reflect.getMetadata('design:paramtypes', target);
  const paramTypes: unknown[] = Array.isArray(emitted) ? emitted : [];
  const overrides: unknown = Reflect.getOwnMetadata(INJECT_PARAMETERS_KEY, target);
  const count = Math.max(target.length, paramTypes.length);

  const dependencies: Array<ServiceIdentifier | undefined> = [];
  for (let i = 0; i < count; i++) {
    const override: unknown = overrides instanceof Map ? overrides.get(i) : undefined;
    if (isServiceIdentifier(override)) {
      dependencies.push(override);
      continue;
    }
    const paramType = paramTypes[i];
    dependencies.push(
      isServiceIdentifier(paramType) && !isErasedType(paramType) ? paramType : undefined,
    );
  }
  return dependencies;
}

// Interfaces and primitives are emitted as these globals
function isErasedType(type: ServiceIdentifier): boolean {
  return (
    type === Object ||
    type === String ||
    type === Number ||
    type === Boolean ||
    type === Function ||
    type === Array
  );
}

// ============================================================================
// Well-known Tokens
// ============================================================================

/**
 * Resolves to the scope a service is being built in.
 */
export const SERVICE_SCOPE = new InjectionToken<IServiceResolver>('IServiceScope');
