/**
 * @fileoverview scopeline - Request-Scoped Dependency Injection for Middleware Pipelines
 * @description
 * Scopeline wires a dependency-injection container into a middleware
 * pipeline: every request gets its own resolution scope, released when the
 * request ends, and middleware can be constructed by the container instead
 * of by hand.
 *
 * ## Architecture Layers
 *
 * - **Domain**: request context, HTTP exceptions and exception filters
 * - **Application**: container contracts, decorators, errors, the app host
 * - **Infrastructure**: the bundled container, pipeline, request scoping
 *
 * @example
 * ```typescript
 * import 'reflect-metadata';
 * import { ScopelineApp, ServiceCollection, ServiceLifetime, Injectable } from 'scopeline';
 *
 * @Injectable({ lifetime: ServiceLifetime.Scoped })
 * class UnitOfWork {
 *   async dispose() { await this.rollbackIfOpen(); }
 * }
 *
 * const provider = new ServiceCollection().add(UnitOfWork).build();
 * const app = ScopelineApp.create().useScopedServices(provider);
 * ```
 *
 * @packageDocumentation
 * @module scopeline
 */

import 'reflect-metadata';

// ============================================================================
// DOMAIN LAYER EXPORTS
// ============================================================================

export * from './domain';

// ============================================================================
// APPLICATION LAYER EXPORTS
// ============================================================================

export * from './application';

// ============================================================================
// INFRASTRUCTURE LAYER EXPORTS
// ============================================================================

export * from './infrastructure';

// ==================== Default Export ====================
export { ScopelineApp as default } from './application/host';

// ==================== Version ====================
export const VERSION = '1.0.0';
