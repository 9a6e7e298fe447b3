/**
 * Builds middleware contexts for tests that drive a pipeline directly,
 * without going through ScopelineApp.handle().
 */

import {
  HttpStatus,
  ILogger,
  MiddlewareContext,
  RequestContext,
  ScopelineRequest,
} from '../../src';

export function withMiddlewareContext<R>(
  callback: (ctx: MiddlewareContext) => Promise<R>,
  request: Partial<ScopelineRequest> = {},
): Promise<R> {
  return RequestContext.run({ traceId: 'test-trace', requestId: 'req-1' }, (context) =>
    callback({
      context,
      request: {
        id: 'req-1',
        method: 'GET',
        path: '/',
        headers: {},
        query: {},
        protocol: 'http',
        ...request,
      },
      response: { status: HttpStatus.NOT_FOUND, headers: {} },
      items: new Map(),
    }),
  );
}

export function createMockLogger(): jest.Mocked<ILogger> {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}
