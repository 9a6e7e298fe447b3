/**
 * @fileoverview RequestContext - AsyncLocalStorage-based Context
 *
 * @packageDocumentation
 * @module scopeline/domain/context
 *
 * ## Hexagonal Architecture Layer: DOMAIN (Core)
 *
 * `RequestContext` implements {@link IContext} on top of Node's
 * `AsyncLocalStorage`. Every async continuation started inside
 * `RequestContext.run()` observes the same context, and concurrent runs are
 * isolated from each other:
 *
 * ```
 * Request A ── run({ traceId: 'a' }) ──┬─ await db()      → current().traceId === 'a'
 *                                       └─ setTimeout(...) → current().traceId === 'a'
 * Request B ── run({ traceId: 'b' }) ──── await cache()   → current().traceId === 'b'
 * ```
 *
 * The host creates one context per request and hands it to the pipeline as
 * `MiddlewareContext.context`. The scope injector registers it as resolvable
 * inside the request scope, so services can take `RequestContext` as a
 * constructor dependency instead of reaching for `RequestContext.current()`.
 */

import { AsyncLocalStorage } from 'async_hooks';
import { IContext, ScopelineContextData } from './IContext';
import { ILogger, consoleLogger } from '../../application/host/logger';

export interface RequestContextOptions {
  /** Receives errors thrown by cancel callbacks (default: console logger) */
  logger?: ILogger;
}

/**
 * Internal storage structure for context data
 */
interface ContextStore<T extends ScopelineContextData> {
  /** Context values */
  data: Partial<T>;

  /** Callbacks to invoke on cancellation */
  cancelCallbacks: Set<() => void>;

  /** Whether this context has been cancelled */
  cancelled: boolean;

  logger: ILogger;
}

function createStore<T extends ScopelineContextData>(
  data: Partial<T>,
  logger: ILogger,
): ContextStore<T> {
  return {
    data: { ...data },
    cancelCallbacks: new Set(),
    cancelled: false,
    logger,
  };
}

/**
 * Request-scoped context propagated through async boundaries.
 *
 * @example
 * ```typescript
 * await RequestContext.run({ traceId: 'trace-1' }, async (ctx) => {
 *   ctx.set('userId', 'user-1');
 *   await doWork(); // RequestContext.current()?.userId === 'user-1'
 * });
 * ```
 */
export class RequestContext<
  T extends ScopelineContextData = ScopelineContextData,
> implements IContext<T> {
  private static als = new AsyncLocalStorage<ContextStore<ScopelineContextData>>();

  private readonly store: ContextStore<T>;

  private constructor(store: ContextStore<T>) {
    this.store = store;
  }

  /**
   * Run a callback inside a fresh context.
   *
   * @param initialData - Values the context starts with
   * @param callback - Receives the created context
   * @returns Whatever the callback returns (a promise for async callbacks)
   */
  static run<T extends ScopelineContextData = ScopelineContextData, R = unknown>(
    initialData: Partial<T>,
    callback: (context: RequestContext<T>) => R,
    options: RequestContextOptions = {},
  ): R {
    const store = createStore<T>(initialData, options.logger ?? consoleLogger);
    return RequestContext.als.run(store, () => callback(new RequestContext<T>(store)));
  }

  /**
   * Run a callback inside an existing context (e.g. after `clone()`).
   */
  static runWithContext<T extends ScopelineContextData, R>(
    context: RequestContext<T>,
    callback: () => R,
  ): R {
    return RequestContext.als.run(context.store, callback);
  }

  /**
   * Get the context of the current async execution, if any.
   */
  static current(): RequestContext | undefined {
    const store = RequestContext.als.getStore();
    if (!store) {
      return undefined;
    }
    return new RequestContext(store);
  }

  static hasContext(): boolean {
    return RequestContext.als.getStore() !== undefined;
  }

  // ==================== IContext Implementation ====================

  get<K extends keyof T>(key: K): T[K] | undefined {
    return this.store.data[key];
  }

  set<K extends keyof T>(key: K, value: T[K]): void {
    this.store.data[key] = value;
  }

  has<K extends keyof T>(key: K): boolean {
    return Object.prototype.hasOwnProperty.call(this.store.data, key);
  }

  delete<K extends keyof T>(key: K): boolean {
    if (!this.has(key)) {
      return false;
    }
    delete this.store.data[key];
    return true;
  }

  isCancelled(): boolean {
    return this.store.cancelled;
  }

  onCancel(callback: () => void): void {
    if (this.store.cancelled) {
      // Already cancelled: run immediately
      this.runCancelCallback(callback);
    } else {
      this.store.cancelCallbacks.add(callback);
    }
  }

  cancel(): void {
    if (this.store.cancelled) {
      return;
    }

    this.store.cancelled = true;

    for (const callback of this.store.cancelCallbacks) {
      this.runCancelCallback(callback);
    }

    this.store.cancelCallbacks.clear();
  }

  private runCancelCallback(callback: () => void): void {
    try {
      callback();
    } catch (error) {
      this.store.logger.error(`[${this.traceId}] Error in cancel callback:`, error);
    }
  }

  getAll(): Readonly<Partial<T>> {
    return { ...this.store.data };
  }

  /**
   * Create a detached copy of this context with optional extra data.
   *
   * @remarks
   * The clone has its own cancellation state; cancelling it does not cancel
   * the original. It reports callback errors to the same logger.
   */
  clone(additionalData?: Partial<T>): RequestContext<T> {
    return new RequestContext<T>(
      createStore<T>({ ...this.store.data, ...additionalData }, this.store.logger),
    );
  }

  get traceId(): string | undefined {
    return this.store.data.traceId;
  }

  get requestId(): string | undefined {
    return this.store.data.requestId;
  }

  get userId(): string | undefined {
    return this.store.data.userId;
  }
}

/**
 * Get the current context or throw.
 *
 * @throws Error when called outside `RequestContext.run()`
 */
export function getCurrentContext(): RequestContext {
  const context = RequestContext.current();
  if (!context) {
    throw new Error(
      'No active context. Make sure you are within a RequestContext.run() scope.',
    );
  }
  return context;
}

export function tryGetCurrentContext(): RequestContext | null {
  return RequestContext.current() ?? null;
}
