/**
 * @fileoverview Unit tests for wiring a container into a pipeline builder
 */

// Import reflect-metadata for decorator support
import 'reflect-metadata';

import {
  ArgumentNullError,
  ContainerMiddleware,
  IScopelineMiddleware,
  Injectable,
  InjectionToken,
  InjectorConflictError,
  MiddlewareContext,
  NextFunction,
  NoActiveScopeError,
  PipelineBuilder,
  ScopeInjectorMiddleware,
  ServiceCollection,
  ServiceLifetime,
  getRootProvider,
  isInjectorRegistered,
  registerAllMiddleware,
  registerInjector,
  registerMiddlewareType,
  silentLogger,
} from '../../../src';
import { createMockLogger, withMiddlewareContext } from '../../helpers/middleware-context';

// ============================================================================
// Test Services
// ============================================================================

@Injectable({ lifetime: ServiceLifetime.Scoped })
class RequestLog {
  readonly entries: string[] = [];
}

@Injectable({ lifetime: ServiceLifetime.Scoped })
class FirstMiddleware implements IScopelineMiddleware {
  constructor(private readonly log: RequestLog) {}

  async invoke(ctx: MiddlewareContext, next: NextFunction): Promise<void> {
    this.log.entries.push('first');
    ctx.items.set('log', this.log);
    await next();
  }
}

@Injectable({ lifetime: ServiceLifetime.Scoped })
class SecondMiddleware implements IScopelineMiddleware {
  constructor(private readonly log: RequestLog) {}

  async invoke(_ctx: MiddlewareContext, next: NextFunction): Promise<void> {
    this.log.entries.push('second');
    await next();
  }
}

@Injectable()
class PriceCalculator {
  total(): number {
    return 0;
  }
}

const options = { logger: silentLogger };

function middlewareProvider() {
  return new ServiceCollection()
    .add(RequestLog)
    .add(FirstMiddleware)
    .add(PriceCalculator)
    .add(SecondMiddleware)
    .build();
}

// ============================================================================
// Tests
// ============================================================================

describe('Pipeline Registration', () => {
  describe('isInjectorRegistered()', () => {
    it('should be false for a fresh builder', () => {
      expect(isInjectorRegistered(new PipelineBuilder())).toBe(false);
    });

    it('should reject an absent builder', () => {
      expect(() => Reflect.apply(isInjectorRegistered, undefined, [undefined])).toThrowErrorType(
        ArgumentNullError,
      );
    });
  });

  describe('registerInjector()', () => {
    it('should add the scope injector and mark the builder', () => {
      const builder = new PipelineBuilder();
      const provider = new ServiceCollection().build();

      registerInjector(builder, provider, options);

      expect(isInjectorRegistered(builder)).toBe(true);
      expect(builder.length).toBe(1);
      expect(builder.build()[0]).toBeInstanceOf(ScopeInjectorMiddleware);
      expect(getRootProvider(builder)).toBe(provider);
    });

    it('should add nothing when called twice with the same provider', () => {
      const builder = new PipelineBuilder();
      const provider = new ServiceCollection().build();

      registerInjector(builder, provider, options);
      registerInjector(builder, provider, options);

      expect(builder.length).toBe(1);
      expect(getRootProvider(builder)).toBe(provider);
    });

    it('should refuse a second provider and keep the first', () => {
      const builder = new PipelineBuilder();
      const first = new ServiceCollection().build();
      const second = new ServiceCollection().build();
      registerInjector(builder, first, options);

      expect(() => registerInjector(builder, second, options)).toThrowErrorType(
        InjectorConflictError,
      );
      expect(builder.length).toBe(1);
      expect(getRootProvider(builder)).toBe(first);
    });

    it('should reject an absent builder', () => {
      const provider = new ServiceCollection().build();

      expect(() => Reflect.apply(registerInjector, undefined, [null, provider])).toThrow(
        "Value cannot be null or undefined. (Parameter 'builder')",
      );
    });

    it('should reject an absent provider and leave the pipeline untouched', () => {
      const builder = new PipelineBuilder();

      expect(() => Reflect.apply(registerInjector, undefined, [builder, undefined])).toThrow(
        "Value cannot be null or undefined. (Parameter 'rootProvider')",
      );
      expect(builder.length).toBe(0);
      expect(isInjectorRegistered(builder)).toBe(false);
    });
  });

  describe('registerAllMiddleware()', () => {
    it('should add the injector and one stage per registered middleware', () => {
      const builder = new PipelineBuilder();

      registerAllMiddleware(builder, middlewareProvider(), options);

      const stages = builder.build();
      expect(stages).toHaveLength(3);
      expect(isInjectorRegistered(builder)).toBe(true);
      expect(stages[0]).toBeInstanceOf(ScopeInjectorMiddleware);
      expect(stages[1]).toBeInstanceOf(ContainerMiddleware.for(FirstMiddleware));
      expect(stages[2]).toBeInstanceOf(ContainerMiddleware.for(SecondMiddleware));
    });

    it('should not add a second injector after registerInjector()', () => {
      const builder = new PipelineBuilder();
      const provider = middlewareProvider();

      registerInjector(builder, provider, options);
      registerAllMiddleware(builder, provider, options);

      expect(builder.length).toBe(3);
    });

    it('should refuse a provider other than the registered one before adding stages', () => {
      const builder = new PipelineBuilder();
      registerInjector(builder, new ServiceCollection().build(), options);

      expect(() => registerAllMiddleware(builder, middlewareProvider(), options)).toThrow(
        'The scope injector is already registered with a different root provider. ' +
          'Register each pipeline against a single provider.',
      );
      expect(builder.length).toBe(1);
    });

    it('should only add the injector when nothing registered is middleware', () => {
      const builder = new PipelineBuilder();
      const provider = new ServiceCollection().add(RequestLog).add(PriceCalculator).build();

      registerAllMiddleware(builder, provider, options);

      expect(builder.length).toBe(1);
      expect(isInjectorRegistered(builder)).toBe(true);
    });

    it('should leave an already wired builder unchanged when nothing is middleware', () => {
      const builder = new PipelineBuilder();
      const provider = new ServiceCollection().add(PriceCalculator).build();
      registerInjector(builder, provider, options);

      registerAllMiddleware(builder, provider, options);

      expect(builder.length).toBe(1);
    });

    it('should skip middleware whose adapter is registered explicitly', () => {
      const builder = new PipelineBuilder();
      const provider = new ServiceCollection()
        .add(RequestLog)
        .add(FirstMiddleware)
        .add(SecondMiddleware)
        .addScoped(ContainerMiddleware.for(FirstMiddleware))
        .build();

      registerAllMiddleware(builder, provider, options);

      const stages = builder.build();
      expect(stages).toHaveLength(2);
      expect(stages[1]).toBeInstanceOf(ContainerMiddleware.for(SecondMiddleware));
    });

    it('should skip token registrations', () => {
      const TOKEN_MIDDLEWARE = new InjectionToken<IScopelineMiddleware>('TokenMiddleware');
      const builder = new PipelineBuilder();
      const provider = new ServiceCollection()
        .addInstance(TOKEN_MIDDLEWARE, { invoke: async (_ctx, next) => next() })
        .build();

      registerAllMiddleware(builder, provider, options);

      expect(builder.length).toBe(1);
    });

    it('should log the wired middleware', () => {
      const logger = createMockLogger();

      registerAllMiddleware(new PipelineBuilder(), middlewareProvider(), { logger });

      expect(logger.info).toHaveBeenCalledWith(
        'Registered 2 middleware from container: ContainerMiddleware<FirstMiddleware>, ContainerMiddleware<SecondMiddleware>',
      );
    });

    it('should run the middleware in registration order within one scope', async () => {
      const pipeline = registerAllMiddleware(new PipelineBuilder(), middlewareProvider(), options).compose();

      const entries = await withMiddlewareContext(async (ctx) => {
        await pipeline.invoke(ctx, async () => undefined);
        const log = ctx.items.get('log');
        return log instanceof RequestLog ? log.entries : [];
      });

      expect(entries).toEqual(['first', 'second']);
    });

    it('should reject absent arguments and leave the pipeline untouched', () => {
      const builder = new PipelineBuilder();

      expect(() => Reflect.apply(registerAllMiddleware, undefined, [builder, null])).toThrowErrorType(
        ArgumentNullError,
      );
      expect(() =>
        Reflect.apply(registerAllMiddleware, undefined, [undefined, middlewareProvider()]),
      ).toThrowErrorType(ArgumentNullError);
      expect(builder.length).toBe(0);
      expect(isInjectorRegistered(builder)).toBe(false);
    });
  });

  describe('registerMiddlewareType()', () => {
    it('should add one stage that resolves the middleware per request', async () => {
      const provider = new ServiceCollection().add(RequestLog).add(FirstMiddleware).build();
      const builder = new PipelineBuilder();
      registerInjector(builder, provider, options);

      registerMiddlewareType(builder, FirstMiddleware, options);

      expect(builder.length).toBe(2);
      const pipeline = builder.compose();
      const logs = await Promise.all([
        withMiddlewareContext(async (ctx) => {
          await pipeline.invoke(ctx, async () => undefined);
          return ctx.items.get('log');
        }),
        withMiddlewareContext(async (ctx) => {
          await pipeline.invoke(ctx, async () => undefined);
          return ctx.items.get('log');
        }),
      ]);

      expect(logs[0]).toBeInstanceOf(RequestLog);
      expect(logs[0]).not.toBe(logs[1]);
    });

    it('should fail at request time when neither a scope nor a root provider exists', async () => {
      const pipeline = registerMiddlewareType(new PipelineBuilder(), FirstMiddleware, options).compose();

      await expect(
        withMiddlewareContext((ctx) => pipeline.invoke(ctx, async () => undefined)),
      ).rejects.toThrow(NoActiveScopeError);
    });

    it('should reject an absent middleware type', () => {
      expect(() =>
        Reflect.apply(registerMiddlewareType, undefined, [new PipelineBuilder(), undefined]),
      ).toThrow("Value cannot be null or undefined. (Parameter 'middlewareType')");
    });
  });
});
