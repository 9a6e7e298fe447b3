/**
 * @fileoverview Middleware Scanner
 *
 * @packageDocumentation
 * @module scopeline/infrastructure/scoping
 *
 * Finds the registrations of a provider that are pipeline middleware and
 * maps each to its container-backed adapter class.
 *
 * A registration counts as middleware when its capability is a class whose
 * prototype chain has a concrete `invoke` method. Token registrations are
 * skipped: what a token resolves to is only known by resolving it, and
 * nothing is resolved while scanning.
 */

import {
  Constructor,
  IServiceProvider,
} from '../../application/di/IDependencyInjection';
import { IScopelineMiddleware } from '../platform/middleware';
import {
  ContainerMiddleware,
  ContainerMiddlewareClass,
  isContainerMiddlewareClass,
} from './container-middleware';

/**
 * Whether `type` is a middleware class the scanner should wire.
 *
 * @remarks
 * Adapter classes are excluded, so registering an adapter never yields an
 * adapter of an adapter. Abstract classes that only declare `invoke` have no
 * `invoke` at runtime and are excluded too.
 */
export function isMiddlewareType(type: unknown): type is Constructor<IScopelineMiddleware> {
  if (typeof type !== 'function' || isContainerMiddlewareClass(type)) {
    return false;
  }
  const prototype: unknown = type.prototype;
  return (
    typeof prototype === 'object' &&
    prototype !== null &&
    'invoke' in prototype &&
    typeof prototype.invoke === 'function'
  );
}

/**
 * Adapter classes for every middleware registered in `provider`, in
 * registration order.
 *
 * @remarks
 * Adapters that are themselves registered in `provider` are left out: an
 * explicit registration takes precedence over auto-wiring.
 */
export function scanMiddlewareAdapters(provider: IServiceProvider): ContainerMiddlewareClass[] {
  const adapters: ContainerMiddlewareClass[] = [];
  const seen = new Set<ContainerMiddlewareClass>();

  for (const descriptor of provider.getRegistrations()) {
    if (!isMiddlewareType(descriptor.serviceType)) {
      continue;
    }

    const adapter = ContainerMiddleware.for(descriptor.serviceType);
    if (seen.has(adapter) || provider.isRegistered(adapter)) {
      continue;
    }

    seen.add(adapter);
    adapters.push(adapter);
  }

  return adapters;
}
