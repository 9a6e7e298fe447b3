/**
 * @module scopeline/domain
 * @description Domain layer exports
 */

// ============================================================================
// Context Management
// ============================================================================

export * from './context';

// ============================================================================
// Exceptions
// ============================================================================

export * from './exceptions';
