/**
 * @module scopeline/application/di
 * @description Dependency injection contracts, decorators and errors
 */

// ============================================================================
// Core Interfaces
// ============================================================================

export type {
  Constructor,
  AbstractConstructor,
  ServiceIdentifier,
  ServiceFactory,
  ServiceDescriptor,
  IDisposable,
  IServiceResolver,
  IScopeOverrides,
  ScopeConfiguration,
  IServiceScope,
  IServiceProvider,
  IServiceCollection,
  BuildOptions,
} from './IDependencyInjection';

// ============================================================================
// Identifiers & Lifetimes
// ============================================================================

export {
  InjectionToken,
  ServiceLifetime,
  SERVICE_SCOPE,
  isServiceIdentifier,
  isConstructor,
  isDisposable,
  getServiceName,
} from './IDependencyInjection';

// ============================================================================
// Decorators
// ============================================================================

export {
  Injectable,
  Inject,
  getInjectableLifetime,
  getConstructorDependencies,
} from './IDependencyInjection';

// ============================================================================
// Error Classes
// ============================================================================

export {
  DIError,
  ArgumentNullError,
  DependencyResolutionError,
  ServiceNotRegisteredError,
  CircularDependencyError,
  ScopeMismatchError,
  ServiceCreationError,
  InjectorConflictError,
  ScopeDisposedError,
  NoActiveScopeError,
  ensureArgument,
  buildDependencyGraph,
} from './errors';
