/**
 * @module lattice-di/domain
 * @description Domain layer exports
 */

// ============================================================================
// Service Model
// ============================================================================

export * from './di';

// ============================================================================
// Exceptions
// ============================================================================

export * from './exceptions';
