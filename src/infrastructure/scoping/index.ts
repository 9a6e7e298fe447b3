/**
 * scopeline - Scoping Module
 *
 * Request-scoped dependency resolution for middleware pipelines
 */

export {
  INJECTOR_REGISTERED_KEY,
  ROOT_PROVIDER_KEY,
  isInjectorRegistered,
  registerInjector,
  registerAllMiddleware,
  registerMiddlewareType,
  getRootProvider,
} from './registration';

export type { RegistrationOptions } from './registration';

export { ScopeInjectorMiddleware } from './scope-injector';
export type { ScopeInjectorOptions } from './scope-injector';

export { ContainerMiddleware, isContainerMiddlewareClass } from './container-middleware';
export type { ContainerMiddlewareClass, ContainerMiddlewareOptions } from './container-middleware';

export { isMiddlewareType, scanMiddlewareAdapters } from './middleware-scanner';
