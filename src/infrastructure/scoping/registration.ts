/**
 * @fileoverview Pipeline Registration
 *
 * @packageDocumentation
 * @module scopeline/infrastructure/scoping
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Setup-time functions that wire a container into a {@link PipelineBuilder}.
 *
 * | Function | Effect on the pipeline |
 * |----------|------------------------|
 * | `registerInjector(builder, provider)` | adds the request-scope injector (once) |
 * | `registerAllMiddleware(builder, provider)` | injector, then one stage per middleware registered in `provider` |
 * | `registerMiddlewareType(builder, Type)` | one stage resolving `Type` from the request scope |
 * | `isInjectorRegistered(builder)` | none; reports whether the injector was added |
 *
 * @example
 * ```typescript
 * const provider = new ServiceCollection()
 *   .addScoped(UnitOfWork)
 *   .addScoped(AuditMiddleware)
 *   .addScoped(TenantMiddleware)
 *   .build();
 *
 * const builder = createPipeline();
 * registerAllMiddleware(builder, provider);
 * // [ScopeInjector, ContainerMiddleware<AuditMiddleware>, ContainerMiddleware<TenantMiddleware>]
 * ```
 */

import {
  IServiceProvider,
  IServiceResolver,
  ServiceIdentifier,
} from '../../application/di/IDependencyInjection';
import { InjectorConflictError, ensureArgument } from '../../application/di/errors';
import { ILogger, consoleLogger } from '../../application/host/logger';
import { PipelineBuilder } from '../pipeline/builder';
import { IScopelineMiddleware } from '../platform/middleware';
import { ContainerMiddleware } from './container-middleware';
import { scanMiddlewareAdapters } from './middleware-scanner';
import { ScopeInjectorMiddleware, ScopeInjectorOptions } from './scope-injector';

// ============================================================================
// Builder Property Keys
// ============================================================================

/**
 * Marks a builder whose pipeline already contains the scope injector.
 */
export const INJECTOR_REGISTERED_KEY = Symbol.for('scopeline.scopeInjectorRegistered');

/**
 * Root provider the scope injector was registered with.
 */
export const ROOT_PROVIDER_KEY = Symbol.for('scopeline.rootProvider');

/**
 * Options for {@link registerInjector} and {@link registerAllMiddleware}.
 */
export type RegistrationOptions = ScopeInjectorOptions;

// ============================================================================
// Registration Guard
// ============================================================================

/**
 * Whether the scope injector was added to `builder`.
 *
 * @throws ArgumentNullError when `builder` is absent
 */
export function isInjectorRegistered(builder: PipelineBuilder): boolean {
  ensureArgument(builder, 'builder');
  return builder.properties.get(INJECTOR_REGISTERED_KEY) === true;
}

/**
 * Add the request-scope injector to `builder`.
 *
 * @remarks
 * Calling this again on the same builder with the same provider adds
 * nothing.
 *
 * @throws ArgumentNullError when `builder` or `rootProvider` is absent
 * @throws InjectorConflictError when the injector was registered with a
 * different provider
 *
 * Neither error changes the pipeline.
 */
export function registerInjector(
  builder: PipelineBuilder,
  rootProvider: IServiceProvider,
  options: RegistrationOptions = {},
): PipelineBuilder {
  ensureArgument(builder, 'builder');
  ensureArgument(rootProvider, 'rootProvider');

  const logger = options.logger ?? consoleLogger;
  if (isInjectorRegistered(builder)) {
    assertSameRoot(builder, rootProvider);
    logger.debug('Scope injector already registered; skipping');
    return builder;
  }

  builder.use(new ScopeInjectorMiddleware(rootProvider, options));
  builder.properties.set(INJECTOR_REGISTERED_KEY, true);
  builder.properties.set(ROOT_PROVIDER_KEY, rootProvider);
  logger.debug('Scope injector registered');
  return builder;
}

// ============================================================================
// Container-Backed Middleware
// ============================================================================

/**
 * Add the scope injector (if missing), then one container-backed stage for
 * every middleware class registered in `rootProvider`.
 *
 * @remarks
 * Stages follow the provider's registration order. A middleware whose adapter
 * class (`ContainerMiddleware.for(Type)`) is itself registered in the
 * provider gets no stage.
 *
 * @throws ArgumentNullError when `builder` or `rootProvider` is absent
 * @throws InjectorConflictError when the injector was registered with a
 * different provider
 *
 * Neither error changes the pipeline.
 */
export function registerAllMiddleware(
  builder: PipelineBuilder,
  rootProvider: IServiceProvider,
  options: RegistrationOptions = {},
): PipelineBuilder {
  ensureArgument(builder, 'builder');
  ensureArgument(rootProvider, 'rootProvider');

  const logger = options.logger ?? consoleLogger;
  registerInjector(builder, rootProvider, options);

  const adapters = scanMiddlewareAdapters(rootProvider);
  if (adapters.length === 0) {
    return builder;
  }

  for (const Adapter of adapters) {
    builder.use(new Adapter({ fallbackProvider: rootProvider, logger }));
  }

  logger.info(
    `Registered ${adapters.length} middleware from container: ${adapters.map((a) => a.name).join(', ')}`,
  );
  return builder;
}

/**
 * Add one stage that resolves `middlewareType` from the request scope.
 *
 * @remarks
 * Register the scope injector first. A request that reaches the stage
 * without a scope is served from the root provider recorded by an earlier
 * `registerInjector` call on the same builder, or fails with
 * `NoActiveScopeError` when there is none.
 *
 * @throws ArgumentNullError when `builder` or `middlewareType` is absent
 */
export function registerMiddlewareType<T extends IScopelineMiddleware>(
  builder: PipelineBuilder,
  middlewareType: ServiceIdentifier<T>,
  options: { logger?: ILogger } = {},
): PipelineBuilder {
  ensureArgument(builder, 'builder');
  ensureArgument(middlewareType, 'middlewareType');

  const Adapter = ContainerMiddleware.for(middlewareType);
  builder.use(
    new Adapter({
      fallbackProvider: getRootProvider(builder),
      logger: options.logger,
    }),
  );
  return builder;
}

/**
 * Root provider recorded on `builder` by {@link registerInjector}.
 */
export function getRootProvider(builder: PipelineBuilder): IServiceResolver | undefined {
  const provider = builder.properties.get(ROOT_PROVIDER_KEY);
  return isServiceResolver(provider) ? provider : undefined;
}

function assertSameRoot(builder: PipelineBuilder, rootProvider: IServiceProvider): void {
  if (builder.properties.get(ROOT_PROVIDER_KEY) !== rootProvider) {
    throw new InjectorConflictError();
  }
}

function isServiceResolver(value: unknown): value is IServiceResolver {
  return (
    typeof value === 'object' &&
    value !== null &&
    'resolve' in value &&
    typeof value.resolve === 'function' &&
    'isRegistered' in value &&
    typeof value.isRegistered === 'function'
  );
}
