/**
 * @fileoverview Pipeline Builder - Middleware Composition Utilities
 *
 * @packageDocumentation
 * @module scopeline/infrastructure/pipeline
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Infrastructure layer:
 * - ✅ **CAN**: Implement technical patterns (pipelines, scoping)
 * - ✅ **CAN**: Import from Domain and Application layers
 * - ❌ **CANNOT**: Contain business logic
 *
 * ## Architectural Responsibility
 *
 * A pipeline is an ordered sequence of middleware that processes requests:
 *
 * ```
 * Request  →  [Middleware 1]  →  [Middleware 2]  →  [Middleware 3]  →  Response
 * ```
 *
 * Each middleware may do work before and after calling `next()`, which gives
 * the "onion model":
 *
 * ```
 * MW1 Before  →  MW2 Before  →  MW3 Before  →  Handler
 *     ↓              ↓              ↓              ↓
 * MW1 After   ←  MW2 After   ←  MW3 After   ←  Response
 * ```
 *
 * ## Builder Properties
 *
 * Besides its middleware list, a builder carries a property bag
 * ({@link PipelineBuilder.properties}). Extensions that configure the
 * pipeline record markers there, e.g. whether the request-scope injector
 * was already added, so repeated setup calls can be detected.
 */

import { ScopelineContextData } from '../../domain/context';
import {
  IScopelineMiddleware,
  MiddlewareFunction,
  createMiddleware,
  MiddlewareContext,
  NextFunction,
} from '../platform/middleware';

/**
 * Pipeline builder for composing middlewares with fluent API.
 *
 * @template T - Context data type extending ScopelineContextData
 *
 * @example
 * ```typescript
 * const pipeline = new PipelineBuilder()
 *   .use(new TimingMiddleware())
 *   .use(async (ctx, next) => {
 *     ctx.items.set('startedAt', Date.now());
 *     await next();
 *   })
 *   .compose();
 *
 * await pipeline.invoke(ctx, async () => {
 *   ctx.response.body = { ok: true };
 * });
 * ```
 */
export class PipelineBuilder<T extends ScopelineContextData = ScopelineContextData> {
  /**
   * Ordered list of middlewares in this pipeline.
   *
   * @remarks
   * Middlewares execute in the order they're added:
   *
   * ```
   * MW1 before → MW2 before → MW3 before → Handler → MW3 after → MW2 after → MW1 after
   * ```
   */
  private middlewares: IScopelineMiddleware<T>[] = [];

  /**
   * Shared property bag of this builder.
   *
   * @remarks
   * Lives as long as the builder; `clear()` does not reset it.
   */
  readonly properties = new Map<string | symbol, unknown>();

  /**
   * Add middleware to the end of the pipeline.
   *
   * @param middleware - Middleware to add (object or function)
   * @returns This builder for chaining
   */
  use(middleware: IScopelineMiddleware<T> | MiddlewareFunction<T>): this {
    if (typeof middleware === 'function') {
      this.middlewares.push(createMiddleware(middleware));
    } else {
      this.middlewares.push(middleware);
    }
    return this;
  }

  /**
   * Add middleware conditionally based on boolean or function.
   *
   * @example
   * ```typescript
   * builder.useIf(process.env.NODE_ENV !== 'production', new LoggingMiddleware());
   * ```
   */
  useIf(
    condition: boolean | (() => boolean),
    middleware: IScopelineMiddleware<T> | MiddlewareFunction<T>,
  ): this {
    const shouldUse = typeof condition === 'function' ? condition() : condition;
    if (shouldUse) {
      this.use(middleware);
    }
    return this;
  }

  /**
   * Add middleware to the start of the pipeline.
   */
  prepend(middleware: IScopelineMiddleware<T> | MiddlewareFunction<T>): this {
    this.middlewares.unshift(
      typeof middleware === 'function' ? createMiddleware(middleware) : middleware,
    );
    return this;
  }

  /**
   * Snapshot of the middleware list.
   */
  build(): IScopelineMiddleware<T>[] {
    return [...this.middlewares];
  }

  /**
   * Build and return a single composed middleware.
   *
   * @remarks
   * The middleware list is captured when `compose()` is called; later `use()`
   * calls do not affect an already composed pipeline.
   */
  compose(): IScopelineMiddleware<T> {
    const middlewares = this.build();

    return createMiddleware<T>(async (ctx: MiddlewareContext<T>, next: NextFunction) => {
      let index = 0;

      const dispatch = async (): Promise<void> => {
        if (index < middlewares.length) {
          const middleware = middlewares[index++];
          await middleware.invoke(ctx, dispatch);
        } else {
          await next();
        }
      };

      await dispatch();
    });
  }

  get length(): number {
    return this.middlewares.length;
  }

  /**
   * Remove every middleware. Properties are kept.
   */
  clear(): this {
    this.middlewares = [];
    return this;
  }
}

/**
 * Create a new pipeline builder.
 */
export function createPipeline<
  T extends ScopelineContextData = ScopelineContextData,
>(): PipelineBuilder<T> {
  return new PipelineBuilder<T>();
}

/**
 * Compose middlewares into a single middleware.
 */
export function compose<T extends ScopelineContextData = ScopelineContextData>(
  ...middlewares: Array<IScopelineMiddleware<T> | MiddlewareFunction<T>>
): IScopelineMiddleware<T> {
  const pipeline = createPipeline<T>();
  for (const middleware of middlewares) {
    pipeline.use(middleware);
  }
  return pipeline.compose();
}

/**
 * Run one of two middlewares depending on the request.
 *
 * @example
 * ```typescript
 * builder.use(branch((ctx) => ctx.request.path.startsWith('/admin'), adminAudit));
 * ```
 */
export function branch<T extends ScopelineContextData = ScopelineContextData>(
  condition: (ctx: MiddlewareContext<T>) => boolean,
  ifTrue: IScopelineMiddleware<T> | MiddlewareFunction<T>,
  ifFalse?: IScopelineMiddleware<T> | MiddlewareFunction<T>,
): IScopelineMiddleware<T> {
  const trueMw = typeof ifTrue === 'function' ? createMiddleware(ifTrue) : ifTrue;
  const falseMw = ifFalse
    ? typeof ifFalse === 'function'
      ? createMiddleware(ifFalse)
      : ifFalse
    : null;

  return createMiddleware<T>(async (ctx, next) => {
    if (condition(ctx)) {
      await trueMw.invoke(ctx, next);
    } else if (falseMw) {
      await falseMw.invoke(ctx, next);
    } else {
      await next();
    }
  });
}
