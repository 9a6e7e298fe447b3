/**
 * @fileoverview ScopedContainer - Request-Scoped Service Management
 *
 * @packageDocumentation
 * @module scopeline/infrastructure/di
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * A `ScopedContainer` is one resolution scope: the per-request child of the
 * root {@link ServiceProvider}.
 *
 * ```
 * ServiceProvider (root) ───────────────────────────────────────┐
 * │ singletons: Clock#1, Config#1                               │
 * │                                                             │
 * │  ScopedContainer (request 1)      ScopedContainer (request 2)│
 * │  │ overrides: MiddlewareContext   │ overrides: MiddlewareContext
 * │  │ scoped:    UnitOfWork#1        │ scoped:    UnitOfWork#2  │
 * └─────────────────────────────────────────────────────────────┘
 * ```
 *
 * **Responsibilities:**
 *
 * 1. Serve scope-local overrides (walking up through parent scopes)
 * 2. Delegate singletons to the root provider (their dependencies are
 *    resolved here, so a singleton reaching a scoped service or a scope-local
 *    override is reported as a scope mismatch)
 * 3. Cache scoped instances; create transients
 * 4. Track disposable instances and release them newest-first on `dispose()`
 */

import {
  type IDisposable,
  type IScopeOverrides,
  type IServiceResolver,
  type IServiceScope,
  type ScopeConfiguration,
  type ServiceDescriptor,
  type ServiceIdentifier,
  SERVICE_SCOPE,
  ServiceLifetime,
  getServiceName,
  isDisposable,
} from '../../application/di/IDependencyInjection';
import {
  CircularDependencyError,
  ScopeDisposedError,
  ScopeMismatchError,
  ServiceNotRegisteredError,
  ensureArgument,
} from '../../application/di/errors';
import type { ServiceProvider } from './service-provider';

/**
 * One step of an in-progress resolution.
 *
 * @internal
 */
export interface ResolutionFrame {
  readonly identifier: ServiceIdentifier;
  readonly name: string;
  readonly lifetime: ServiceLifetime;
}

/**
 * Collects the overrides a scope is created with.
 */
class ScopeOverrides implements IScopeOverrides {
  constructor(private readonly target: Map<ServiceIdentifier, unknown>) {}

  addInstance<T>(identifier: ServiceIdentifier<T>, instance: T): this {
    ensureArgument(identifier, 'identifier');
    this.target.set(identifier, instance);
    return this;
  }
}

export class ScopedContainer implements IServiceScope {
  /**
   * Instances registered only for this scope.
   */
  private readonly overrides = new Map<ServiceIdentifier, unknown>();

  /**
   * Scoped instances created in this scope.
   */
  private readonly scopedCache = new Map<ServiceIdentifier, unknown>();

  /**
   * Disposable instances, in creation order.
   */
  private readonly disposables: Array<{ name: string; instance: IDisposable }> = [];

  private disposed = false;
  private disposal: Promise<void> | undefined;

  constructor(
    private readonly provider: ServiceProvider,
    readonly parent: IServiceResolver,
    private readonly parentScope?: ScopedContainer,
    configure?: ScopeConfiguration,
  ) {
    configure?.(new ScopeOverrides(this.overrides));
  }

  // ============================================================================
  // IServiceScope Implementation
  // ============================================================================

  resolve<T>(identifier: ServiceIdentifier<T>): T {
    return this.resolveTyped(identifier, []);
  }

  tryResolve<T>(identifier: ServiceIdentifier<T>): T | undefined {
    this.ensureNotDisposed();
    if (!this.isRegistered(identifier)) {
      return undefined;
    }
    return this.resolve(identifier);
  }

  isRegistered(identifier: ServiceIdentifier): boolean {
    return this.hasOverride(identifier) || this.provider.isRegistered(identifier);
  }

  createScope(configure?: ScopeConfiguration): IServiceScope {
    this.ensureNotDisposed();
    return new ScopedContainer(this.provider, this, this, configure);
  }

  isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * Release the scope and every disposable instance it created.
   *
   * @remarks
   * Instances are disposed newest first, each awaited before the next. A
   * failing `dispose()` is reported to the provider's logger and does not
   * stop the remaining disposals. Calling this again returns the first call's
   * promise.
   */
  dispose(): Promise<void> {
    if (!this.disposal) {
      this.disposed = true;
      this.disposal = this.disposeInstances();
    }
    return this.disposal;
  }

  // ============================================================================
  // Internal Resolution
  // ============================================================================

  /**
   * Resolve `identifier` as part of the resolution described by `path`.
   *
   * @internal
   */
  resolveWithPath(identifier: ServiceIdentifier, path: readonly ResolutionFrame[]): unknown {
    this.ensureNotDisposed();
    ensureArgument(identifier, 'identifier');

    const name = getServiceName(identifier);
    if (path.some((frame) => frame.identifier === identifier)) {
      throw new CircularDependencyError(name, namesOf(path));
    }

    if (identifier === SERVICE_SCOPE) {
      this.ensureNoSingletonAbove(name, path);
      return this;
    }

    const local = this.findOverride(identifier);
    if (local.found) {
      this.ensureNoSingletonAbove(name, path);
      return local.value;
    }

    const descriptor = this.provider.getDescriptor(identifier);
    if (!descriptor) {
      throw new ServiceNotRegisteredError(name, namesOf(path));
    }

    switch (descriptor.lifetime) {
      case ServiceLifetime.Singleton:
        return this.provider.resolveSingleton(descriptor, path, this);

      case ServiceLifetime.Scoped:
        this.ensureNoSingletonAbove(name, path);
        return this.resolveScoped(descriptor, path);

      case ServiceLifetime.Transient: {
        const instance = this.provider.createInstance(descriptor, this, [
          ...path,
          frameOf(descriptor),
        ]);
        // A transient held by a singleton lives as long as the provider
        if (hasSingletonFrame(path)) {
          return this.provider.trackOwned(name, instance);
        }
        // Directly from the provider, only transients held by a cached scoped
        // instance are released; anything else belongs to the caller
        if (this.provider.isRootScope(this) && !path.some(isScopedFrame)) {
          return instance;
        }
        return this.track(name, instance);
      }
    }
  }

  /**
   * Resolver whose resolutions continue `path`; handed to factories so that
   * cycles and scope mismatches through factories are still detected.
   *
   * @internal
   */
  resolverFor(path: readonly ResolutionFrame[]): IServiceResolver {
    return {
      resolve: <T>(identifier: ServiceIdentifier<T>): T => this.resolveTyped(identifier, path),
      tryResolve: <T>(identifier: ServiceIdentifier<T>): T | undefined =>
        this.isRegistered(identifier) ? this.resolveTyped(identifier, path) : undefined,
      isRegistered: (identifier: ServiceIdentifier) => this.isRegistered(identifier),
    };
  }

  private resolveTyped<T>(identifier: ServiceIdentifier<T>, path: readonly ResolutionFrame[]): T {
    // The registry is keyed by identifier; the value stored under
    // ServiceIdentifier<T> is always a T.
    return this.resolveWithPath(identifier, path) as T;
  }

  private resolveScoped(descriptor: ServiceDescriptor, path: readonly ResolutionFrame[]): unknown {
    const key = descriptor.serviceType;
    if (this.scopedCache.has(key)) {
      return this.scopedCache.get(key);
    }

    const instance = this.provider.createInstance(descriptor, this, [
      ...path,
      frameOf(descriptor),
    ]);
    this.scopedCache.set(key, instance);
    return this.track(getServiceName(key), instance);
  }

  private track(name: string, instance: unknown): unknown {
    if (isDisposable(instance)) {
      this.disposables.push({ name, instance });
    }
    return instance;
  }

  private findOverride(identifier: ServiceIdentifier): { found: boolean; value?: unknown } {
    if (this.overrides.has(identifier)) {
      return { found: true, value: this.overrides.get(identifier) };
    }
    return this.parentScope ? this.parentScope.findOverride(identifier) : { found: false };
  }

  private hasOverride(identifier: ServiceIdentifier): boolean {
    return this.findOverride(identifier).found;
  }

  private ensureNoSingletonAbove(name: string, path: readonly ResolutionFrame[]): void {
    const singleton = path.find(isSingletonFrame);
    if (singleton) {
      throw new ScopeMismatchError(singleton.name, name, namesOf(path));
    }
  }

  private async disposeInstances(): Promise<void> {
    for (let i = this.disposables.length - 1; i >= 0; i--) {
      const { name, instance } = this.disposables[i];
      try {
        await instance.dispose();
      } catch (error) {
        this.provider.logger.error(`Error disposing service '${name}':`, error);
      }
    }

    this.disposables.length = 0;
    this.scopedCache.clear();
    this.overrides.clear();
  }

  private ensureNotDisposed(): void {
    if (this.disposed) {
      throw new ScopeDisposedError();
    }
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

export function frameOf(descriptor: ServiceDescriptor): ResolutionFrame {
  return {
    identifier: descriptor.serviceType,
    name: getServiceName(descriptor.serviceType),
    lifetime: descriptor.lifetime,
  };
}

export function namesOf(path: readonly ResolutionFrame[]): string[] {
  return path.map((frame) => frame.name);
}

function isSingletonFrame(frame: ResolutionFrame): boolean {
  return frame.lifetime === ServiceLifetime.Singleton;
}

function isScopedFrame(frame: ResolutionFrame): boolean {
  return frame.lifetime === ServiceLifetime.Scoped;
}

function hasSingletonFrame(path: readonly ResolutionFrame[]): boolean {
  return path.some(isSingletonFrame);
}

/**
 * Run a callback within a new scope of `provider`, disposing it afterwards.
 *
 * @example
 * ```typescript
 * const total = await withScope(provider, async (scope) => {
 *   const orders = scope.resolve(OrderService);
 *   return orders.total();
 * });
 * ```
 */
export async function withScope<T>(
  provider: { createScope(configure?: ScopeConfiguration): IServiceScope },
  callback: (scope: IServiceScope) => T | Promise<T>,
  configure?: ScopeConfiguration,
): Promise<T> {
  const scope = provider.createScope(configure);
  try {
    return await callback(scope);
  } finally {
    await scope.dispose();
  }
}
