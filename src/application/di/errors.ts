/**
 * @fileoverview Dependency Injection Errors
 *
 * @packageDocumentation
 * @module scopeline/application/di
 *
 * ## Error Taxonomy
 *
 * | Error | Raised when | Surfaces as |
 * |-------|-------------|-------------|
 * | `ArgumentNullError` | A setup call receives an absent argument | Synchronous throw at setup, before any pipeline change |
 * | `InjectorConflictError` | The scope injector is registered again with a different root provider | Synchronous throw at setup, before any pipeline change |
 * | `DependencyResolutionError` (and subclasses) | The container cannot build a requested service | Request fault, handled by the host's exception filters |
 * | `ScopeDisposedError` | Resolving from a request scope after it was released | Request fault |
 * | `NoActiveScopeError` | A container-backed middleware runs with no scope and no root provider | Request fault |
 *
 * Nothing here is retried: the container performs no I/O and has no
 * transient failures.
 *
 * ## Dependency Graph
 *
 * Resolution errors carry the path the container walked before failing:
 *
 * ```
 * ├─ OrderController
 *   └─ OrderService
 *     └─ PaymentGateway (UNREGISTERED)
 * ```
 */

/**
 * Base class of every error raised by the container and its pipeline glue.
 */
export class DIError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
    Error.captureStackTrace(this, new.target);
  }
}

/**
 * A required argument was `null` or `undefined`.
 */
export class ArgumentNullError extends DIError {
  constructor(public readonly paramName: string) {
    super(`Value cannot be null or undefined. (Parameter '${paramName}')`);
  }
}

/**
 * Throw {@link ArgumentNullError} when `value` is absent.
 */
export function ensureArgument<T>(
  value: T | null | undefined,
  paramName: string,
): asserts value is T {
  if (value === null || value === undefined) {
    throw new ArgumentNullError(paramName);
  }
}

/**
 * Render a resolution path as an indented tree.
 *
 * @param path - Services being resolved, outermost first
 * @param leaf - The failing service, with its marker
 */
export function buildDependencyGraph(path: readonly string[], leaf: string): string {
  let graph = '';
  for (let i = 0; i < path.length; i++) {
    const indent = '  '.repeat(i);
    const branch = i === path.length - 1 ? '└─' : '├─';
    graph += `${indent}${branch} ${path[i]}\n`;
  }
  graph += `${'  '.repeat(path.length)}└─ ${leaf}\n`;
  return graph;
}

/**
 * The container could not produce an instance of a requested service.
 *
 * @remarks
 * `dependencyGraph` shows the resolution path that led to the failure.
 */
export class DependencyResolutionError extends DIError {
  constructor(
    message: string,
    public readonly dependencyGraph: string = '',
  ) {
    super(message);
  }
}

export class ServiceNotRegisteredError extends DependencyResolutionError {
  constructor(
    public readonly serviceName: string,
    path: readonly string[] = [],
  ) {
    super(
      path.length > 0
        ? `Service '${serviceName}' required by '${path[path.length - 1]}' is not registered`
        : `Service '${serviceName}' is not registered`,
      buildDependencyGraph(path, `${serviceName} (UNREGISTERED)`),
    );
  }
}

export class CircularDependencyError extends DependencyResolutionError {
  constructor(
    public readonly serviceName: string,
    path: readonly string[],
  ) {
    super(
      `Circular dependency detected: ${[...path, serviceName].join(' → ')}`,
      buildDependencyGraph(path, `${serviceName} (CIRCULAR!)`),
    );
  }
}

/**
 * A singleton depends, directly or transitively, on a scoped service.
 */
export class ScopeMismatchError extends DependencyResolutionError {
  constructor(
    public readonly singletonName: string,
    public readonly scopedName: string,
    path: readonly string[],
  ) {
    super(
      `Scope mismatch: Singleton '${singletonName}' cannot depend on Scoped '${scopedName}'`,
      buildDependencyGraph(path, `${scopedName} (SCOPE MISMATCH)`),
    );
  }
}

/**
 * A constructor or factory threw while building a service.
 */
export class ServiceCreationError extends DependencyResolutionError {
  constructor(
    public readonly serviceName: string,
    public readonly originalError: unknown,
    path: readonly string[],
  ) {
    super(
      `Failed to create '${serviceName}': ${
        originalError instanceof Error ? originalError.message : String(originalError)
      }`,
      buildDependencyGraph(path, `${serviceName} (FAILED)`),
    );
  }
}

/**
 * A pipeline already carries a scope injector built on another root provider.
 */
export class InjectorConflictError extends DIError {
  constructor() {
    super(
      'The scope injector is already registered with a different root provider. ' +
        'Register each pipeline against a single provider.',
    );
  }
}

export class ScopeDisposedError extends DIError {
  constructor() {
    super('Cannot resolve services from a disposed scope');
  }
}

/**
 * A container-backed middleware ran with neither a request scope nor a root
 * provider to resolve from.
 */
export class NoActiveScopeError extends DIError {
  constructor(public readonly serviceName: string) {
    super(
      `No active request scope to resolve '${serviceName}'. ` +
        'Register the scope injector before container-backed middleware.',
    );
  }
}
