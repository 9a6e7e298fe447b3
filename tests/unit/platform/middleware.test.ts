/**
 * @fileoverview Unit tests for the built-in middleware and the exception
 * filters the app maps faults with
 */

import {
  DefaultExceptionFilter,
  ExceptionContext,
  ExceptionFilterChain,
  HttpStatus,
  LoggingMiddleware,
  NotFoundException,
  TimingMiddleware,
  createExceptionFilter,
  createMiddleware,
  isMiddleware,
  silentLogger,
} from '../../../src';
import { createMockLogger, withMiddlewareContext } from '../../helpers/middleware-context';

describe('Built-in Middleware', () => {
  describe('isMiddleware()', () => {
    it('should recognise objects with an invoke function', () => {
      expect(isMiddleware(createMiddleware(async (_ctx, next) => next()))).toBe(true);
      expect(isMiddleware({ invoke: 'no' })).toBe(false);
      expect(isMiddleware(null)).toBe(false);
    });
  });

  describe('LoggingMiddleware', () => {
    it('should log the request and the response status', async () => {
      const logger = createMockLogger();
      const middleware = new LoggingMiddleware({ logger, logDuration: false });

      await withMiddlewareContext(
        (ctx) =>
          middleware.invoke(ctx, async () => {
            ctx.response.status = HttpStatus.CREATED;
          }),
        { method: 'POST', path: '/orders' },
      );

      expect(logger.info.mock.calls).toEqual([
        ['[test-trace] → POST /orders'],
        ['[test-trace] ← 201'],
      ]);
    });

    it('should skip what is switched off', async () => {
      const logger = createMockLogger();
      const middleware = new LoggingMiddleware({ logger, logRequest: false, logResponse: false });

      await withMiddlewareContext((ctx) => middleware.invoke(ctx, async () => undefined));

      expect(logger.info).not.toHaveBeenCalled();
    });
  });

  describe('TimingMiddleware', () => {
    it('should set the timing header even when next() fails', async () => {
      const middleware = new TimingMiddleware('X-Elapsed');

      const headers = await withMiddlewareContext(async (ctx) => {
        await middleware
          .invoke(ctx, async () => {
            throw new Error('boom');
          })
          .catch(() => undefined);
        return ctx.response.headers;
      });

      expect(headers['X-Elapsed']).toMatch(/^\d+ms$/);
    });
  });
});

describe('Exception Filters', () => {
  const baseContext = (error: Error): Promise<ExceptionContext> =>
    withMiddlewareContext(async (ctx) => ({
      error,
      context: ctx.context,
      path: '/orders',
      method: 'GET',
      timestamp: new Date('2024-01-01T00:00:00.000Z'),
    }));

  it('should keep the status of HTTP exceptions', async () => {
    const filter = new DefaultExceptionFilter({ logger: silentLogger, includeStack: false });

    const response = await filter.catch(await baseContext(new NotFoundException('Order not found')));

    expect(response.status).toBe(HttpStatus.NOT_FOUND);
    expect(response.body).toEqual({
      error: 'Not Found',
      message: 'Order not found',
      statusCode: 404,
      traceId: 'test-trace',
      timestamp: '2024-01-01T00:00:00.000Z',
      path: '/orders',
    });
  });

  it('should hide the message of other errors when details are off', async () => {
    const filter = new DefaultExceptionFilter({
      logger: silentLogger,
      includeStack: false,
      includeDetails: false,
    });

    const response = await filter.catch(await baseContext(new Error('connection string leaked')));

    expect(response.status).toBe(HttpStatus.INTERNAL_SERVER_ERROR);
    expect(response.body?.message).toBe('An unexpected error occurred');
  });

  it('should fall through to the next filter when one throws', async () => {
    const chain = new ExceptionFilterChain()
      .addFilter(
        createExceptionFilter(async () => {
          throw new Error('filter failed');
        }),
      )
      .addFilter(
        createExceptionFilter(async (ctx) => ({
          status: HttpStatus.SERVICE_UNAVAILABLE,
          headers: {},
          body: {
            error: 'Unavailable',
            message: ctx.error.message,
            statusCode: HttpStatus.SERVICE_UNAVAILABLE,
          },
        })),
      );

    const response = await chain.catch(await baseContext(new Error('original')));

    expect(response.status).toBe(HttpStatus.SERVICE_UNAVAILABLE);
    expect(response.body?.message).toBe('filter failed');
  });
});
