/**
 * scopeline - Context Module
 *
 * Ambient request context propagation and cancellation
 */

export type {
  IContext,
  ScopelineContextData,
  ScopelineContext,
} from './IContext';
export type { RequestContextOptions } from './RequestContext';
export {
  RequestContext,
  getCurrentContext,
  tryGetCurrentContext,
} from './RequestContext';
