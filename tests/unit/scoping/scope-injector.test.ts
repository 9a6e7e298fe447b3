/**
 * @fileoverview Unit tests for ScopeInjectorMiddleware
 */

import {
  ArgumentNullError,
  InjectionToken,
  MIDDLEWARE_CONTEXT,
  REQUEST_CONTEXT,
  ScopeDisposedError,
  ScopeInjectorMiddleware,
  ServiceCollection,
  ServiceProvider,
  silentLogger,
} from '../../../src';
import { createMockLogger, withMiddlewareContext } from '../../helpers/middleware-context';

class Connection {
  released = 0;

  dispose(): void {
    this.released++;
  }
}

const CONNECTION = new InjectionToken<Connection>('Connection');

function createProvider(): ServiceProvider {
  return new ServiceCollection()
    .addScopedFactory(CONNECTION, () => new Connection())
    .build({ logger: silentLogger });
}

describe('ScopeInjectorMiddleware', () => {
  it('should reject an absent root provider', () => {
    expect(() => Reflect.construct(ScopeInjectorMiddleware, [undefined])).toThrowErrorType(
      ArgumentNullError,
    );
  });

  it('should expose a fresh scope to next() and release it afterwards', async () => {
    const injector = new ScopeInjectorMiddleware(createProvider(), { logger: silentLogger });

    const result = await withMiddlewareContext(async (ctx) => {
      let connection: Connection | undefined;
      await injector.invoke(ctx, async () => {
        connection = ctx.services?.resolve(CONNECTION);
      });
      return { connection, servicesAfter: ctx.services };
    });

    expect(result.connection?.released).toBe(1);
    expect(result.servicesAfter).toBeUndefined();
  });

  it('should register the middleware and request contexts in the scope', async () => {
    const injector = new ScopeInjectorMiddleware(createProvider(), { logger: silentLogger });

    const same = await withMiddlewareContext(async (ctx) => {
      let matches: boolean[] = [];
      await injector.invoke(ctx, async () => {
        const services = ctx.services;
        matches = [
          services?.resolve(MIDDLEWARE_CONTEXT) === ctx,
          services?.resolve(REQUEST_CONTEXT) === ctx.context,
        ];
      });
      return matches;
    });

    expect(same).toEqual([true, true]);
  });

  it('should refuse resolution from a scope kept past its request', async () => {
    const injector = new ScopeInjectorMiddleware(createProvider(), { logger: silentLogger });

    const leaked = await withMiddlewareContext(async (ctx) => {
      let services = ctx.services;
      await injector.invoke(ctx, async () => {
        services = ctx.services;
      });
      return services;
    });

    expect(() => leaked?.resolve(CONNECTION)).toThrowErrorType(ScopeDisposedError);
  });

  it('should release the scope and rethrow when next() fails', async () => {
    const injector = new ScopeInjectorMiddleware(createProvider(), { logger: silentLogger });
    let connection: Connection | undefined;

    await expect(
      withMiddlewareContext((ctx) =>
        injector.invoke(ctx, async () => {
          connection = ctx.services?.resolve(CONNECTION);
          throw new Error('downstream failure');
        }),
      ),
    ).rejects.toThrow('downstream failure');

    expect(connection?.released).toBe(1);
  });

  it('should keep the scope until the pipeline unwinds when the request is cancelled', async () => {
    const injector = new ScopeInjectorMiddleware(createProvider(), { logger: silentLogger });

    const result = await withMiddlewareContext(async (ctx) => {
      let connection: Connection | undefined;
      let releasedAtCancel: number | undefined;
      let resolvedAfterCancel = false;
      await injector.invoke(ctx, async () => {
        connection = ctx.services?.resolve(CONNECTION);
        ctx.context.cancel();
        releasedAtCancel = connection?.released;
        resolvedAfterCancel = ctx.services?.resolve(CONNECTION) === connection;
      });
      return { releasedAtCancel, resolvedAfterCancel, releasedAfter: connection?.released };
    });

    expect(result).toEqual({ releasedAtCancel: 0, resolvedAfterCancel: true, releasedAfter: 1 });
  });

  it('should serve a request whose context was cancelled before it started', async () => {
    const injector = new ScopeInjectorMiddleware(createProvider(), { logger: silentLogger });

    const released = await withMiddlewareContext(async (ctx) => {
      ctx.context.cancel();
      let connection: Connection | undefined;
      await injector.invoke(ctx, async () => {
        connection = ctx.services?.resolve(CONNECTION);
      });
      return connection?.released;
    });

    expect(released).toBe(1);
  });

  it('should release the scope on cancellation when disposeOnCancel is set', async () => {
    const injector = new ScopeInjectorMiddleware(createProvider(), {
      logger: silentLogger,
      disposeOnCancel: true,
    });

    const result = await withMiddlewareContext(async (ctx) => {
      let connection: Connection | undefined;
      let releasedAtCancel: number | undefined;
      await injector.invoke(ctx, async () => {
        connection = ctx.services?.resolve(CONNECTION);
        ctx.context.cancel();
        releasedAtCancel = connection?.released;
      });
      return { releasedAtCancel, releasedAfter: connection?.released };
    });

    expect(result).toEqual({ releasedAtCancel: 1, releasedAfter: 1 });
  });

  it('should log scope release at debug level', async () => {
    const logger = createMockLogger();
    const injector = new ScopeInjectorMiddleware(createProvider(), { logger });

    await withMiddlewareContext((ctx) => injector.invoke(ctx, async () => undefined));

    expect(logger.debug).toHaveBeenCalledWith('[test-trace] Releasing request scope');
  });
});
