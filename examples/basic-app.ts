/**
 * scopeline v1.0.0 - Basic Example
 *
 * Demonstrates:
 * - Per-request service scopes (`useScopedServices`)
 * - Middleware constructed by the container (`useContainerMiddleware`)
 * - Scoped services released when the request ends
 * - Exception handling of resolution failures
 */

import 'reflect-metadata';
import {
  BadRequestException,
  HttpStatus,
  IScopelineMiddleware,
  Inject,
  Injectable,
  LoggingMiddleware,
  MIDDLEWARE_CONTEXT,
  MiddlewareContext,
  NextFunction,
  ScopelineApp,
  ServiceCollection,
  ServiceLifetime,
} from '../src/index';

// ==================== Services ====================

@Injectable({ lifetime: ServiceLifetime.Singleton })
class Clock {
  now(): string {
    return new Date().toISOString();
  }
}

@Injectable({ lifetime: ServiceLifetime.Scoped })
class UnitOfWork {
  private readonly changes: string[] = [];

  record(change: string): void {
    this.changes.push(change);
  }

  get pending(): number {
    return this.changes.length;
  }

  async dispose(): Promise<void> {
    console.log(`[UnitOfWork] released with ${this.changes.length} change(s)`);
  }
}

// ==================== Container-Built Middleware ====================

@Injectable({ lifetime: ServiceLifetime.Scoped })
class AuditMiddleware implements IScopelineMiddleware {
  constructor(
    private readonly uow: UnitOfWork,
    private readonly clock: Clock,
    @Inject(MIDDLEWARE_CONTEXT) private readonly ctx: MiddlewareContext,
  ) {}

  async invoke(_ctx: MiddlewareContext, next: NextFunction): Promise<void> {
    this.uow.record(`${this.ctx.request.method} ${this.ctx.request.path} at ${this.clock.now()}`);
    await next();
  }
}

@Injectable({ lifetime: ServiceLifetime.Scoped })
class OrdersEndpoint implements IScopelineMiddleware {
  constructor(private readonly uow: UnitOfWork) {}

  async invoke(ctx: MiddlewareContext, next: NextFunction): Promise<void> {
    if (ctx.request.path !== '/orders') {
      await next();
      return;
    }
    if (ctx.request.method === 'POST' && !ctx.request.body) {
      throw new BadRequestException('Order body is required');
    }
    this.uow.record('orders listed');
    ctx.response.status = HttpStatus.OK;
    ctx.response.body = { pendingChanges: this.uow.pending };
  }
}

// ==================== Main Application ====================

async function main(): Promise<void> {
  const provider = new ServiceCollection()
    .add(Clock)
    .add(UnitOfWork)
    .add(AuditMiddleware)
    .add(OrdersEndpoint)
    .build();

  const app = ScopelineApp.create({ name: 'scopeline-demo' })
    .use(new LoggingMiddleware())
    .useContainerMiddleware(provider);

  console.log('--- GET /orders ---');
  const ok = await app.handle({ method: 'GET', path: '/orders' });
  console.log(ok.status, JSON.stringify(ok.body));

  console.log('--- POST /orders (no body) ---');
  const bad = await app.handle({ method: 'POST', path: '/orders' });
  console.log(bad.status, JSON.stringify(bad.body));

  console.log('--- GET /unknown ---');
  const missing = await app.handle({ method: 'GET', path: '/unknown' });
  console.log(missing.status);

  await provider.dispose();
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
