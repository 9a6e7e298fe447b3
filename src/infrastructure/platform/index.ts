/**
 * scopeline - Platform Module
 *
 * Platform abstractions for middleware, request/response
 */

// Types
export { HttpStatus, createErrorResponse } from './types';

export type {
  ProtocolType,
  ScopelineRequest,
  ScopelineResponse,
  ErrorResponse,
} from './types';

// Middleware
export {
  MIDDLEWARE_CONTEXT,
  REQUEST_CONTEXT,
  isMiddleware,
  createMiddleware,
  ScopelineMiddlewareBase,
  LoggingMiddleware,
  TimingMiddleware,
} from './middleware';

export type {
  IScopelineMiddleware,
  MiddlewareFunction,
  MiddlewareContext,
  NextFunction,
  LoggingMiddlewareOptions,
} from './middleware';
