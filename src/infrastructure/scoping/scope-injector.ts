/**
 * @fileoverview ScopeInjectorMiddleware - Per-Request Resolution Scope
 *
 * @packageDocumentation
 * @module scopeline/infrastructure/scoping
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Opens one child scope of the root provider per request and makes it the
 * request's service resolver for everything downstream:
 *
 * ```
 * ScopeInjector ──createScope()──► scope (MiddlewareContext, RequestContext)
 *      │ ctx.services = scope
 *      ▼
 * [downstream middleware]  ← resolve from ctx.services
 *      │
 *      ▼ finally
 * scope.dispose()           ← newest-first, exactly once
 * ```
 *
 * The scope is released exactly once, when the pipeline unwinds past this
 * step: after normal completion or after a fault thrown downstream. A
 * cancelled request keeps its scope until then unless `disposeOnCancel` is
 * set.
 */

import {
  IServiceProvider,
  IServiceScope,
} from '../../application/di/IDependencyInjection';
import { ensureArgument } from '../../application/di/errors';
import { ILogger, consoleLogger } from '../../application/host/logger';
import {
  MIDDLEWARE_CONTEXT,
  MiddlewareContext,
  NextFunction,
  REQUEST_CONTEXT,
  ScopelineMiddlewareBase,
} from '../platform/middleware';

export interface ScopeInjectorOptions {
  /** Receives scope release failures (default: console logger) */
  logger?: ILogger;

  /**
   * Release the scope as soon as the request's context is cancelled, instead
   * of waiting for the pipeline to unwind. Downstream code still running
   * after the cancellation then gets `ScopeDisposedError` from the scope.
   *
   * @default false
   */
  disposeOnCancel?: boolean;
}

export class ScopeInjectorMiddleware extends ScopelineMiddlewareBase {
  private readonly logger: ILogger;
  private readonly disposeOnCancel: boolean;

  constructor(
    private readonly rootProvider: IServiceProvider,
    options: ScopeInjectorOptions = {},
  ) {
    super();
    ensureArgument(rootProvider, 'rootProvider');
    this.logger = options.logger ?? consoleLogger;
    this.disposeOnCancel = options.disposeOnCancel ?? false;
  }

  async invoke(ctx: MiddlewareContext, next: NextFunction): Promise<void> {
    const scope = this.beginRequestScope(ctx);
    const previous = ctx.services;
    ctx.services = scope;

    if (this.disposeOnCancel) {
      ctx.context.onCancel(() => {
        this.release(scope, ctx).catch((error: unknown) => {
          this.logger.error('Failed to release cancelled request scope:', error);
        });
      });
    }

    try {
      await next();
    } finally {
      ctx.services = previous;
      await this.release(scope, ctx);
    }
  }

  private beginRequestScope(ctx: MiddlewareContext): IServiceScope {
    return this.rootProvider.createScope((overrides) => {
      overrides.addInstance(MIDDLEWARE_CONTEXT, ctx).addInstance(REQUEST_CONTEXT, ctx.context);
    });
  }

  // dispose() is idempotent: a release after cancellation awaits the same disposal
  private release(scope: IServiceScope, ctx: MiddlewareContext): Promise<void> {
    if (!scope.isDisposed()) {
      this.logger.debug(`[${this.getTraceId(ctx)}] Releasing request scope`);
    }
    return scope.dispose();
  }
}
