/**
 * @file Context Propagation Integration Tests
 * @description RequestContext across async boundaries, cancellation, and
 * the request context as seen from inside a request scope.
 */

import {
  REQUEST_CONTEXT,
  RequestContext,
  ScopelineContextData,
  ServiceCollection,
  getCurrentContext,
  tryGetCurrentContext,
} from '../../../src/index';
import { createMockLogger } from '../../helpers/middleware-context';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('Context Propagation - AsyncLocalStorage', () => {
  describe('Async Boundaries', () => {
    it('should propagate context through promise chains and await', async () => {
      const seen: (string | undefined)[] = [];

      await RequestContext.run({ traceId: 'trace-abc' }, async () => {
        await Promise.resolve().then(() => seen.push(RequestContext.current()?.traceId));
        await delay(1);
        seen.push(RequestContext.current()?.traceId);
      });

      expect(seen).toEqual(['trace-abc', 'trace-abc']);
    });

    it('should propagate context to parallel operations and timers', async () => {
      const result = await RequestContext.run({ traceId: 'trace-parallel' }, () =>
        Promise.all([
          delay(2).then(() => RequestContext.current()?.traceId),
          new Promise<string | undefined>((resolve) =>
            setImmediate(() => resolve(RequestContext.current()?.traceId)),
          ),
          Promise.resolve(RequestContext.current()?.traceId),
        ]),
      );

      expect(result).toEqual(['trace-parallel', 'trace-parallel', 'trace-parallel']);
    });

    it('should share values set inside nested async calls', async () => {
      const inner = async (): Promise<void> => {
        await delay(1);
        getCurrentContext().set('userId', 'user-7');
      };

      const userId = await RequestContext.run({ traceId: 'trace-nested' }, async (ctx) => {
        await inner();
        return ctx.userId;
      });

      expect(userId).toBe('user-7');
    });
  });

  describe('Isolation', () => {
    it('should isolate concurrent requests', async () => {
      const handle = (id: string, wait: number): Promise<string | undefined> =>
        RequestContext.run({ requestId: id }, async () => {
          await delay(wait);
          return RequestContext.current()?.requestId;
        });

      const ids = await Promise.all([handle('req-a', 5), handle('req-b', 1), handle('req-c', 3)]);

      expect(ids).toEqual(['req-a', 'req-b', 'req-c']);
    });

    it('should give a nested run its own values', async () => {
      const traces = await RequestContext.run({ traceId: 'outer' }, async () => {
        const inner = await RequestContext.run({ traceId: 'inner' }, async () => {
          await delay(1);
          return RequestContext.current()?.traceId;
        });
        return [inner, RequestContext.current()?.traceId];
      });

      expect(traces).toEqual(['inner', 'outer']);
    });

    it('should have no context outside of run()', async () => {
      await RequestContext.run({ traceId: 'done' }, async () => undefined);

      expect(tryGetCurrentContext()).toBeNull();
      expect(RequestContext.hasContext()).toBe(false);
      expect(() => getCurrentContext()).toThrow(
        'No active context. Make sure you are within a RequestContext.run() scope.',
      );
    });
  });

  describe('Cancellation', () => {
    it('should run cancel callbacks once', () => {
      const onCancel = jest.fn();

      RequestContext.run({}, (ctx) => {
        ctx.onCancel(onCancel);
        ctx.cancel();
        ctx.cancel();
      });

      expect(onCancel).toHaveBeenCalledTimes(1);
    });

    it('should run callbacks registered after cancellation immediately', () => {
      const onCancel = jest.fn();

      const cancelled = RequestContext.run({}, (ctx) => {
        ctx.cancel();
        ctx.onCancel(onCancel);
        return ctx.isCancelled();
      });

      expect(cancelled).toBe(true);
      expect(onCancel).toHaveBeenCalledTimes(1);
    });

    it('should log a failing cancel callback and still run the others', () => {
      const logger = createMockLogger();
      const failure = new Error('cleanup failed');
      const after = jest.fn();

      RequestContext.run(
        { traceId: 'trace-cancel' },
        (ctx) => {
          ctx.onCancel(() => {
            throw failure;
          });
          ctx.onCancel(after);
          ctx.cancel();
        },
        { logger },
      );

      expect(logger.error).toHaveBeenCalledWith('[trace-cancel] Error in cancel callback:', failure);
      expect(after).toHaveBeenCalledTimes(1);
    });

    it('should report callback failures of a clone to the same logger', () => {
      const logger = createMockLogger();
      const failure = new Error('late cleanup failed');

      RequestContext.run(
        { traceId: 'trace-copy' },
        (ctx) => {
          const copy = ctx.clone();
          copy.cancel();
          copy.onCancel(() => {
            throw failure;
          });
        },
        { logger },
      );

      expect(logger.error).toHaveBeenCalledWith('[trace-copy] Error in cancel callback:', failure);
    });

    it('should keep cancellation of a clone separate from the original', () => {
      const result = RequestContext.run<ScopelineContextData>({ traceId: 'trace-clone' }, (ctx) => {
        const copy = ctx.clone({ userId: 'user-1' });
        copy.cancel();
        return {
          originalCancelled: ctx.isCancelled(),
          copyTrace: copy.traceId,
          originalUser: ctx.userId,
        };
      });

      expect(result).toEqual({
        originalCancelled: false,
        copyTrace: 'trace-clone',
        originalUser: undefined,
      });
    });
  });

  describe('Request Scopes', () => {
    it('should resolve the context a scope was created for, even from another run', async () => {
      const provider = new ServiceCollection().build();

      const scope = RequestContext.run({ requestId: 'req-scope' }, (ctx) =>
        provider.createScope((overrides) => overrides.addInstance(REQUEST_CONTEXT, ctx)),
      );

      const resolved = await RequestContext.run({ requestId: 'req-other' }, async () => {
        await delay(1);
        return scope.resolve(REQUEST_CONTEXT).requestId;
      });

      expect(resolved).toBe('req-scope');
      await scope.dispose();
    });
  });
});
