/**
 * @fileoverview Infrastructure Layer Exports
 * @description
 * Implementations behind the application contracts:
 *
 * - **DI**: the bundled service container
 * - **Platform**: middleware and request/response abstractions
 * - **Pipeline**: middleware composition
 * - **Scoping**: request-scoped resolution wired into a pipeline
 *
 * @packageDocumentation
 * @module scopeline/infrastructure
 */

// Service container
export * from './di';

// Platform abstractions for middleware, request/response
export * from './platform';

// Middleware pipeline utilities and composition
export * from './pipeline';

// Request scopes and container-backed middleware
export * from './scoping';
