/**
 * scopeline - Middleware Interface
 *
 * Unified middleware abstraction: every step of a pipeline receives the
 * request's {@link MiddlewareContext} and a `next` continuation.
 */

import { RequestContext, ScopelineContextData } from '../../domain/context';
import { InjectionToken, IServiceResolver } from '../../application/di/IDependencyInjection';
import { ILogger, consoleLogger } from '../../application/host/logger';
import { ScopelineRequest, ScopelineResponse } from './types';

/**
 * Next function type for middleware chain
 */
export type NextFunction = () => Promise<void>;

/**
 * Middleware context containing request, response, and context data
 */
export interface MiddlewareContext<T extends ScopelineContextData = ScopelineContextData> {
  /** Request context from AsyncLocalStorage */
  context: RequestContext<T>;

  /** Abstract request object */
  request: ScopelineRequest;

  /** Abstract response object (mutable) */
  response: ScopelineResponse;

  /** Items bag for passing data between middlewares */
  items: Map<string, unknown>;

  /**
   * Request services.
   *
   * Set by the scope injector to the current request's scope for the rest
   * of the pipeline; `undefined` outside of it.
   */
  services?: IServiceResolver;
}

/**
 * Resolves, inside a request scope, to the {@link MiddlewareContext} that
 * scope was created for.
 *
 * @example
 * ```typescript
 * @Injectable({ lifetime: ServiceLifetime.Scoped })
 * class AuditTrail {
 *   constructor(@Inject(MIDDLEWARE_CONTEXT) private readonly ctx: MiddlewareContext) {}
 * }
 * ```
 */
export const MIDDLEWARE_CONTEXT = new InjectionToken<MiddlewareContext>('MiddlewareContext');

/**
 * Resolves, inside a request scope, to that request's {@link RequestContext}.
 */
export const REQUEST_CONTEXT = new InjectionToken<RequestContext>('RequestContext');

/**
 * IScopelineMiddleware - Core middleware interface
 *
 * Each middleware receives a context and a next function to call the next
 * middleware in the pipeline.
 *
 * @example
 * ```typescript
 * class StampMiddleware implements IScopelineMiddleware {
 *   async invoke(ctx: MiddlewareContext, next: NextFunction): Promise<void> {
 *     await next();
 *     ctx.response.headers['X-Handled-By'] = 'scopeline';
 *   }
 * }
 * ```
 */
export interface IScopelineMiddleware<T extends ScopelineContextData = ScopelineContextData> {
  /**
   * Middleware execution method
   *
   * @param ctx - Middleware context containing request, response, and context
   * @param next - Function to invoke the next middleware in the pipeline
   */
  invoke(ctx: MiddlewareContext<T>, next: NextFunction): Promise<void>;
}

/**
 * Middleware function type for inline middleware
 */
export type MiddlewareFunction<T extends ScopelineContextData = ScopelineContextData> = (
  ctx: MiddlewareContext<T>,
  next: NextFunction,
) => Promise<void>;

/**
 * Type guard to check if something is a middleware
 */
export function isMiddleware(obj: unknown): obj is IScopelineMiddleware {
  return (
    typeof obj === 'object' &&
    obj !== null &&
    'invoke' in obj &&
    typeof obj.invoke === 'function'
  );
}

/**
 * Convert a function to middleware object
 */
export function createMiddleware<T extends ScopelineContextData = ScopelineContextData>(
  fn: MiddlewareFunction<T>,
): IScopelineMiddleware<T> {
  return {
    invoke: fn,
  };
}

/**
 * Abstract base class for middleware with common utilities
 */
export abstract class ScopelineMiddlewareBase<T extends ScopelineContextData = ScopelineContextData>
  implements IScopelineMiddleware<T>
{
  /**
   * Implement this method in derived classes
   */
  abstract invoke(ctx: MiddlewareContext<T>, next: NextFunction): Promise<void>;

  protected getTraceId(ctx: MiddlewareContext<T>): string | undefined {
    return ctx.context.traceId;
  }

  protected getUserId(ctx: MiddlewareContext<T>): string | undefined {
    return ctx.context.userId;
  }

  protected setResponse(ctx: MiddlewareContext<T>, status: number, body?: unknown): void {
    ctx.response.status = status;
    ctx.response.body = body;
  }

  protected isCancelled(ctx: MiddlewareContext<T>): boolean {
    return ctx.context.isCancelled();
  }
}

// ==================== Built-in Middlewares ====================

export interface LoggingMiddlewareOptions {
  logRequest?: boolean;
  logResponse?: boolean;
  logDuration?: boolean;
  logger?: ILogger;
}

/**
 * Logging middleware - logs request/response lifecycle
 */
export class LoggingMiddleware extends ScopelineMiddlewareBase {
  private readonly options: Required<LoggingMiddlewareOptions>;

  constructor(options: LoggingMiddlewareOptions = {}) {
    super();
    this.options = {
      logRequest: true,
      logResponse: true,
      logDuration: true,
      logger: consoleLogger,
      ...options,
    };
  }

  async invoke(ctx: MiddlewareContext, next: NextFunction): Promise<void> {
    const start = Date.now();
    const traceId = this.getTraceId(ctx);
    const { logger } = this.options;

    if (this.options.logRequest) {
      logger.info(`[${traceId}] → ${ctx.request.method} ${ctx.request.path}`);
    }

    await next();

    if (this.options.logResponse) {
      const duration = this.options.logDuration ? ` (${Date.now() - start}ms)` : '';
      logger.info(`[${traceId}] ← ${ctx.response.status}${duration}`);
    }
  }
}

/**
 * Timing middleware - adds timing header to response
 */
export class TimingMiddleware extends ScopelineMiddlewareBase {
  constructor(private readonly headerName: string = 'X-Response-Time') {
    super();
  }

  async invoke(ctx: MiddlewareContext, next: NextFunction): Promise<void> {
    const start = Date.now();
    try {
      await next();
    } finally {
      ctx.response.headers[this.headerName] = `${Date.now() - start}ms`;
    }
  }
}
