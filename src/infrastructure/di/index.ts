/**
 * scopeline - DI Module
 *
 * Bundled container implementation
 */

// ============================================================================
// ServiceCollection - Service Registration
// ============================================================================

export { ServiceCollection, createServiceCollection } from './service-collection';

// ============================================================================
// ServiceProvider - Service Resolution
// ============================================================================

export { ServiceProvider } from './service-provider';

// ============================================================================
// ScopedContainer - Scoped Service Management
// ============================================================================

export { ScopedContainer, withScope } from './scoped-container';
