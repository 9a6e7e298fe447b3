/**
 * @fileoverview Context Interface - Domain Layer Core Abstraction
 *
 * @packageDocumentation
 * @module scopeline/domain/context
 *
 * ## Hexagonal Architecture Layer: DOMAIN (Core)
 *
 * This file belongs to the **Domain Layer**, the innermost layer of the
 * library. The Domain layer:
 *
 * - ✅ **CAN**: Define abstractions and interfaces
 * - ✅ **CAN**: Define value objects
 * - ❌ **CANNOT**: Depend on infrastructure (containers, pipelines, transports)
 * - ❌ **CANNOT**: Import from Application or Infrastructure layers
 *
 * ## Architectural Responsibility
 *
 * `IContext` is the ambient, per-request data carrier. It holds request
 * metadata (trace id, request id, user id) and a cancellation signal.
 *
 * The request's **resolution scope** is deliberately *not* stored here: it is
 * threaded explicitly through `MiddlewareContext.services`, so every stage
 * that needs it receives it as part of its signature. `IContext` only carries
 * the cancellation hook the scope injector subscribes to, which is how a
 * cancelled request still releases its scope.
 *
 * ```
 * host.handle(request)
 *   └─ RequestContext.run({ traceId, requestId }, ...)
 *        └─ pipeline
 *             ├─ ScopeInjectorMiddleware   ← ctx.context.onCancel(release)
 *             └─ ...downstream stages
 * ```
 *
 * @see {@link RequestContext} for the AsyncLocalStorage-based implementation
 */

/**
 * Key-value context with cancellation support.
 *
 * @typeParam T - Shape of the data carried by the context
 */
export interface IContext<T = ScopelineContextData> {
  /**
   * Get a value from the context.
   */
  get<K extends keyof T>(key: K): T[K] | undefined;

  /**
   * Set a value in the context.
   *
   * @remarks
   * Values are visible to every async continuation sharing this context.
   */
  set<K extends keyof T>(key: K, value: T[K]): void;

  /**
   * Check whether the context has been cancelled.
   */
  isCancelled(): boolean;

  /**
   * Register a callback invoked when the context is cancelled.
   *
   * @remarks
   * If the context is already cancelled the callback runs immediately.
   */
  onCancel(callback: () => void): void;

  /**
   * Cancel the context and run every registered cancellation callback once.
   */
  cancel(): void;

  /**
   * Snapshot of all values.
   */
  getAll(): Readonly<Partial<T>>;

  has<K extends keyof T>(key: K): boolean;

  delete<K extends keyof T>(key: K): boolean;
}

/**
 * Standard context data carried through a request.
 *
 * @remarks
 * Extend this interface for application-specific keys:
 *
 * ```typescript
 * interface TenantContextData extends ScopelineContextData {
 *   tenantId?: string;
 * }
 * ```
 */
export interface ScopelineContextData {
  /** Distributed trace identifier */
  traceId?: string;

  /** Unique identifier of the current request */
  requestId?: string;

  /** Authenticated user identifier */
  userId?: string;

  /** Request start time (ms since epoch) */
  timestamp?: number;

  /** HTTP method or operation name */
  method?: string;

  /** Request path */
  url?: string;

  [key: string]: unknown;
}

export type ScopelineContext = IContext<ScopelineContextData>;
