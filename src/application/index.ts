/**
 * @module scopeline/application
 * @description Application layer exports
 */

// ============================================================================
// Dependency Injection
// ============================================================================

export * from './di';

// ============================================================================
// Host & Logging
// ============================================================================

export * from './host';
