/**
 * @fileoverview ContainerMiddleware - Container-Backed Middleware Adapter
 *
 * @packageDocumentation
 * @module scopeline/infrastructure/scoping
 *
 * A pipeline stage that does not hold a middleware instance. On every
 * request it resolves its middleware capability from the request scope and
 * delegates to it, so the middleware's own dependencies (scoped services, the
 * current request) are injected by the container.
 *
 * ```typescript
 * const AuditStage = ContainerMiddleware.for(AuditMiddleware);
 * builder.use(new AuditStage({ fallbackProvider: provider }));
 * ```
 *
 * `ContainerMiddleware.for()` returns the same class for the same capability,
 * so an adapter class can itself be registered in (and looked up from) the
 * container.
 */

import {
  IServiceResolver,
  ServiceIdentifier,
  getServiceName,
} from '../../application/di/IDependencyInjection';
import { NoActiveScopeError, ensureArgument } from '../../application/di/errors';
import { ILogger, consoleLogger } from '../../application/host/logger';
import {
  IScopelineMiddleware,
  MiddlewareContext,
  NextFunction,
} from '../platform/middleware';

export interface ContainerMiddlewareOptions {
  /**
   * Resolver used when the request carries no scope (no scope injector ran
   * before this stage). Usually the root provider.
   */
  fallbackProvider?: IServiceResolver;

  logger?: ILogger;
}

/**
 * Adapter class produced by {@link ContainerMiddleware.for}.
 */
export type ContainerMiddlewareClass = new (
  options?: ContainerMiddlewareOptions,
) => ContainerMiddleware;

const adapterClasses = new WeakMap<ServiceIdentifier, ContainerMiddlewareClass>();

export abstract class ContainerMiddleware implements IScopelineMiddleware {
  /** Capability resolved on each request */
  abstract readonly middlewareType: ServiceIdentifier<IScopelineMiddleware>;

  private readonly fallbackProvider: IServiceResolver | undefined;
  private readonly logger: ILogger;
  private warnedAboutFallback = false;

  constructor(options: ContainerMiddlewareOptions = {}) {
    this.fallbackProvider = options.fallbackProvider;
    this.logger = options.logger ?? consoleLogger;
  }

  /**
   * Adapter class for `middlewareType`, created on first use and cached.
   *
   * @throws ArgumentNullError when `middlewareType` is absent
   */
  static for(middlewareType: ServiceIdentifier<IScopelineMiddleware>): ContainerMiddlewareClass {
    ensureArgument(middlewareType, 'middlewareType');

    const cached = adapterClasses.get(middlewareType);
    if (cached) {
      return cached;
    }

    const adapter = class extends ContainerMiddleware {
      readonly middlewareType = middlewareType;
    };
    Object.defineProperty(adapter, 'name', {
      value: `ContainerMiddleware<${getServiceName(middlewareType)}>`,
    });

    adapterClasses.set(middlewareType, adapter);
    return adapter;
  }

  async invoke(ctx: MiddlewareContext, next: NextFunction): Promise<void> {
    const middleware = this.resolverFor(ctx).resolve(this.middlewareType);
    await middleware.invoke(ctx, next);
  }

  private resolverFor(ctx: MiddlewareContext): IServiceResolver {
    if (ctx.services) {
      return ctx.services;
    }

    if (!this.fallbackProvider) {
      throw new NoActiveScopeError(getServiceName(this.middlewareType));
    }

    if (!this.warnedAboutFallback) {
      this.warnedAboutFallback = true;
      this.logger.warn(
        `No request scope for '${getServiceName(this.middlewareType)}'; resolving from the root provider. ` +
          'Install the scope injector before container-backed middleware.',
      );
    }
    return this.fallbackProvider;
  }
}

/**
 * Whether `type` is an adapter class made by {@link ContainerMiddleware.for}.
 */
export function isContainerMiddlewareClass(type: unknown): boolean {
  return typeof type === 'function' && type.prototype instanceof ContainerMiddleware;
}
