/**
 * @fileoverview ServiceProvider - Root Container
 *
 * @packageDocumentation
 * @module scopeline/infrastructure/di
 *
 * The application-lifetime container. It owns the frozen registration set,
 * caches singletons and creates one {@link ScopedContainer} per request.
 *
 * **Resolution Algorithm:**
 *
 * ```
 * resolve(X)
 *   1. X on the current path?          → CircularDependencyError
 *   2. X overridden in this scope?     → the override
 *   3. X registered?                   → no: ServiceNotRegisteredError
 *   4. by lifetime:
 *        Singleton → root cache; no scoped dependency may sit below it
 *        Scoped    → current scope's cache (ScopeMismatchError under a singleton)
 *        Transient → new instance
 *   5. constructor dependencies: static `inject`, else emitted parameter
 *      types with @Inject() overrides
 * ```
 *
 * Resolving a scoped service directly from the provider caches it in the
 * provider's own root scope, which lives until `provider.dispose()`. A
 * disposable transient resolved directly from the provider is not tracked;
 * the caller disposes it.
 */

import {
  type BuildOptions,
  type IDisposable,
  type IServiceProvider,
  type IServiceScope,
  type ScopeConfiguration,
  type ServiceDescriptor,
  type ServiceIdentifier,
  SERVICE_SCOPE,
  getConstructorDependencies,
  getServiceName,
  isDisposable,
} from '../../application/di/IDependencyInjection';
import {
  DependencyResolutionError,
  ServiceCreationError,
  buildDependencyGraph,
} from '../../application/di/errors';
import { ILogger, consoleLogger } from '../../application/host/logger';
import { ScopedContainer, ResolutionFrame, frameOf, namesOf } from './scoped-container';

export class ServiceProvider implements IServiceProvider {
  readonly logger: ILogger;

  private readonly descriptors: ReadonlyMap<ServiceIdentifier, ServiceDescriptor>;
  private readonly singletons = new Map<ServiceIdentifier, unknown>();
  private readonly singletonDisposables: Array<{ name: string; instance: IDisposable }> = [];

  /**
   * Scope used for resolutions made directly against the provider.
   */
  private readonly rootScope: ScopedContainer;

  private disposal: Promise<void> | undefined;

  constructor(descriptors: readonly ServiceDescriptor[], options: BuildOptions = {}) {
    this.descriptors = new Map(descriptors.map((descriptor) => [descriptor.serviceType, descriptor]));
    this.logger = options.logger ?? consoleLogger;
    this.rootScope = new ScopedContainer(this, this);
  }

  // ============================================================================
  // IServiceProvider Implementation
  // ============================================================================

  resolve<T>(identifier: ServiceIdentifier<T>): T {
    return this.rootScope.resolve(identifier);
  }

  tryResolve<T>(identifier: ServiceIdentifier<T>): T | undefined {
    return this.rootScope.tryResolve(identifier);
  }

  isRegistered(identifier: ServiceIdentifier): boolean {
    return identifier === SERVICE_SCOPE || this.descriptors.has(identifier);
  }

  createScope(configure?: ScopeConfiguration): IServiceScope {
    return new ScopedContainer(this, this, undefined, configure);
  }

  getRegistrations(): readonly ServiceDescriptor[] {
    return [...this.descriptors.values()];
  }

  /**
   * Dispose the root scope, then singletons newest first.
   */
  dispose(): Promise<void> {
    if (!this.disposal) {
      this.disposal = this.disposeAll();
    }
    return this.disposal;
  }

  // ============================================================================
  // Internal API (used by ScopedContainer)
  // ============================================================================

  /** @internal */
  isRootScope(scope: ScopedContainer): boolean {
    return scope === this.rootScope;
  }

  /** @internal */
  getDescriptor(identifier: ServiceIdentifier): ServiceDescriptor | undefined {
    return this.descriptors.get(identifier);
  }

  /**
   * Cached singleton for `descriptor`, created on first request.
   *
   * @param scope - Scope the request came from; dependencies are resolved
   * through it so that scope-bound dependencies are detected
   * @internal
   */
  resolveSingleton(
    descriptor: ServiceDescriptor,
    path: readonly ResolutionFrame[],
    scope: ScopedContainer,
  ): unknown {
    if (descriptor.instance !== undefined) {
      return descriptor.instance;
    }

    const key = descriptor.serviceType;
    if (this.singletons.has(key)) {
      return this.singletons.get(key);
    }

    const instance = this.createInstance(descriptor, scope, [...path, frameOf(descriptor)]);
    this.singletons.set(key, instance);
    return this.trackOwned(getServiceName(key), instance);
  }

  /**
   * Dispose `instance` with the provider instead of a scope.
   *
   * @internal
   */
  trackOwned(name: string, instance: unknown): unknown {
    if (isDisposable(instance)) {
      this.singletonDisposables.push({ name, instance });
    }
    return instance;
  }

  /**
   * Build an instance of `descriptor`, resolving its dependencies from `scope`.
   *
   * @param path - Resolution path, ending with `descriptor` itself
   * @internal
   */
  createInstance(
    descriptor: ServiceDescriptor,
    scope: ScopedContainer,
    path: readonly ResolutionFrame[],
  ): unknown {
    const name = getServiceName(descriptor.serviceType);

    if (descriptor.instance !== undefined) {
      return descriptor.instance;
    }

    if (descriptor.factory) {
      try {
        return descriptor.factory(scope.resolverFor(path));
      } catch (error) {
        throw wrapCreationError(error, name, path);
      }
    }

    const implementation = descriptor.implementationType;
    if (!implementation) {
      throw new DependencyResolutionError(
        `Registration of '${name}' has no implementation`,
        buildDependencyGraph(namesOf(path.slice(0, -1)), `${name} (INVALID)`),
      );
    }

    const dependencies = getConstructorDependencies(implementation).map((dependency, index) => {
      if (!dependency) {
        throw new DependencyResolutionError(
          `Cannot determine constructor parameter #${index} of '${name}'. ` +
            'Decorate the class with @Injectable() and use @Inject() for interface-typed parameters.',
          buildDependencyGraph(namesOf(path), `parameter #${index} (UNKNOWN)`),
        );
      }
      return scope.resolveWithPath(dependency, path);
    });

    try {
      return new implementation(...dependencies);
    } catch (error) {
      throw wrapCreationError(error, name, path);
    }
  }

  private async disposeAll(): Promise<void> {
    await this.rootScope.dispose();

    for (let i = this.singletonDisposables.length - 1; i >= 0; i--) {
      const { name, instance } = this.singletonDisposables[i];
      try {
        await instance.dispose();
      } catch (error) {
        this.logger.error(`Error disposing service '${name}':`, error);
      }
    }

    this.singletonDisposables.length = 0;
    this.singletons.clear();
  }
}

function wrapCreationError(
  error: unknown,
  name: string,
  path: readonly ResolutionFrame[],
): DependencyResolutionError {
  if (error instanceof DependencyResolutionError) {
    return error;
  }
  return new ServiceCreationError(name, error, namesOf(path.slice(0, -1)));
}
