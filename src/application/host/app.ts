/**
 * scopeline - Scopeline Application
 *
 * Entry point for applications: owns the middleware pipeline, the exception
 * filters and the container wiring, and dispatches protocol-agnostic
 * requests through them.
 */

import { v4 as uuidv4 } from 'uuid';
import { RequestContext } from '../../domain/context';
import {
  IExceptionFilter,
  ExceptionFilterChain,
  DefaultExceptionFilter,
  ExceptionContext,
} from '../../domain/exceptions/exceptions';
import {
  IScopelineMiddleware,
  MiddlewareContext,
  MiddlewareFunction,
  TimingMiddleware,
  createMiddleware,
} from '../../infrastructure/platform/middleware';
import {
  HttpStatus,
  ScopelineRequest,
  ScopelineResponse,
} from '../../infrastructure/platform/types';
import { PipelineBuilder } from '../../infrastructure/pipeline/builder';
import {
  registerAllMiddleware,
  registerInjector,
  registerMiddlewareType,
} from '../../infrastructure/scoping/registration';
import { ScopeInjectorOptions } from '../../infrastructure/scoping/scope-injector';
import { IServiceProvider, ServiceIdentifier } from '../di/IDependencyInjection';
import { ILogger, consoleLogger } from './logger';

/**
 * Application options
 */
export interface ScopelineAppOptions {
  /** Application name, used in log messages */
  name?: string;

  logger?: ILogger;

  /** Automatically add the default exception filter */
  useDefaultErrorHandler?: boolean;

  /** Include request timing */
  includeTimings?: boolean;
}

export interface HandleOptions {
  /** Aborting the signal cancels the request's context */
  signal?: AbortSignal;
}

/**
 * ScopelineApp - Main application class
 *
 * @example
 * ```typescript
 * const provider = new ServiceCollection()
 *   .addScoped(UnitOfWork)
 *   .addScoped(AuditMiddleware)
 *   .build();
 *
 * const app = ScopelineApp.create({ name: 'orders' })
 *   .useContainerMiddleware(provider)
 *   .use(async (ctx, next) => {
 *     const uow = ctx.services?.resolve(UnitOfWork);
 *     ctx.response.status = 200;
 *     ctx.response.body = { pending: uow?.pending ?? 0 };
 *     await next();
 *   });
 *
 * const response = await app.handle({ method: 'GET', path: '/orders' });
 * ```
 */
export class ScopelineApp {
  /** User pipeline, run inside the timing and error-handling stages */
  readonly pipeline = new PipelineBuilder();

  private readonly exceptionFilters: IExceptionFilter[] = [];
  private readonly defaultFilter?: IExceptionFilter;
  private readonly logger: ILogger;

  private constructor(private readonly options: ScopelineAppOptions = {}) {
    this.logger = options.logger ?? consoleLogger;

    // Runs after every user filter
    if (options.useDefaultErrorHandler !== false) {
      this.defaultFilter = new DefaultExceptionFilter({ logger: this.logger });
    }
  }

  /**
   * Create a new application
   */
  static create(options?: ScopelineAppOptions): ScopelineApp {
    return new ScopelineApp(options);
  }

  // ==================== Middleware Configuration ====================

  /**
   * Add middleware to the pipeline
   *
   * @param middleware - Middleware instance or function
   */
  use(middleware: IScopelineMiddleware | MiddlewareFunction): this {
    this.pipeline.use(middleware);
    return this;
  }

  /**
   * Add middleware conditionally
   */
  useIf(
    condition: boolean | (() => boolean),
    middleware: IScopelineMiddleware | MiddlewareFunction,
  ): this {
    this.pipeline.useIf(condition, middleware);
    return this;
  }

  // ==================== Container Integration ====================

  /**
   * Give every request its own scope of `provider`, available to later
   * middleware as `ctx.services`.
   */
  useScopedServices(
    provider: IServiceProvider,
    options: Omit<ScopeInjectorOptions, 'logger'> = {},
  ): this {
    registerInjector(this.pipeline, provider, { ...options, logger: this.logger });
    return this;
  }

  /**
   * Request scopes plus one stage for every middleware class registered in
   * `provider`.
   */
  useContainerMiddleware(
    provider: IServiceProvider,
    options: Omit<ScopeInjectorOptions, 'logger'> = {},
  ): this {
    registerAllMiddleware(this.pipeline, provider, { ...options, logger: this.logger });
    return this;
  }

  /**
   * Add a stage that resolves `middlewareType` from the request scope.
   */
  useMiddlewareFromContainer<TMiddleware extends IScopelineMiddleware>(
    middlewareType: ServiceIdentifier<TMiddleware>,
  ): this {
    registerMiddlewareType(this.pipeline, middlewareType, { logger: this.logger });
    return this;
  }

  // ==================== Exception Handling ====================

  /**
   * Add an exception filter
   *
   * @remarks
   * Filters run in the order added, before the default filter. A filter that
   * throws hands the fault to the next one.
   */
  useExceptionFilter(filter: IExceptionFilter): this {
    this.exceptionFilters.push(filter);
    return this;
  }

  // ==================== Request Dispatch ====================

  /**
   * Run one request through the pipeline.
   *
   * @remarks
   * Missing request fields get defaults; a missing id becomes a UUID. The
   * pipeline runs inside a fresh {@link RequestContext}. Faults are turned
   * into responses by the exception filters, so this only rejects if a
   * filter chain itself fails. A request no middleware responds to gets 404.
   */
  async handle(
    request: Partial<ScopelineRequest>,
    options: HandleOptions = {},
  ): Promise<ScopelineResponse> {
    const normalized = normalizeRequest(request);
    const traceHeader = normalized.headers['x-trace-id'];
    const pipeline = this.buildPipeline();

    return RequestContext.run(
      {
        traceId: typeof traceHeader === 'string' ? traceHeader : uuidv4(),
        requestId: normalized.id,
        method: normalized.method,
        url: normalized.path,
        timestamp: Date.now(),
      },
      async (context) => {
        const { signal } = options;
        const onAbort = (): void => context.cancel();
        if (signal?.aborted) {
          context.cancel();
        } else {
          signal?.addEventListener('abort', onAbort, { once: true });
        }

        const ctx: MiddlewareContext = {
          context,
          request: normalized,
          response: { status: HttpStatus.NOT_FOUND, headers: {} },
          items: new Map(),
        };

        try {
          await pipeline.invoke(ctx, async () => undefined);
        } finally {
          signal?.removeEventListener('abort', onAbort);
        }
        return ctx.response;
      },
      { logger: this.logger },
    );
  }

  // ==================== Pipeline Building ====================

  /**
   * Build the complete middleware pipeline including error handling
   */
  private buildPipeline(): IScopelineMiddleware {
    const pipeline = new PipelineBuilder();

    // Add timing middleware if enabled
    if (this.options.includeTimings !== false) {
      pipeline.use(new TimingMiddleware());
    }

    pipeline.use(this.createErrorHandlingMiddleware(this.buildExceptionFilterChain()));
    pipeline.use(this.pipeline.compose());

    return pipeline.compose();
  }

  /**
   * Create error handling middleware that wraps the entire pipeline
   */
  private createErrorHandlingMiddleware(filters: ExceptionFilterChain): IScopelineMiddleware {
    return createMiddleware(async (ctx, next) => {
      try {
        await next();
      } catch (error) {
        const exceptionContext: ExceptionContext = {
          error: error instanceof Error ? error : new Error(String(error)),
          context: ctx.context,
          path: ctx.request.path,
          method: ctx.request.method,
          timestamp: new Date(),
        };

        const response = await filters.catch(exceptionContext);

        ctx.response.status = response.status;
        ctx.response.headers = { ...ctx.response.headers, ...response.headers };
        ctx.response.body = response.body;
      }
    });
  }

  private buildExceptionFilterChain(): ExceptionFilterChain {
    const chain = new ExceptionFilterChain();
    for (const filter of this.exceptionFilters) {
      chain.addFilter(filter);
    }
    if (this.defaultFilter) {
      chain.addFilter(this.defaultFilter);
    }
    return chain;
  }

  // ==================== Utility Methods ====================

  getOptions(): ScopelineAppOptions {
    return { ...this.options };
  }

  get name(): string {
    return this.options.name ?? 'scopeline-app';
  }

  /**
   * Number of stages in the user pipeline
   */
  get middlewareCount(): number {
    return this.pipeline.length;
  }
}

function normalizeRequest(request: Partial<ScopelineRequest>): ScopelineRequest {
  return {
    id: request.id ?? uuidv4(),
    method: request.method ?? 'GET',
    path: request.path ?? '/',
    headers: request.headers ?? {},
    query: request.query ?? {},
    body: request.body,
    protocol: request.protocol ?? 'http',
  };
}

/**
 * Quick start helper
 */
export function createApp(options?: ScopelineAppOptions): ScopelineApp {
  return ScopelineApp.create(options);
}
