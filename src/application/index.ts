/**
 * @module lattice-di/application
 * @description Application layer exports
 */

// ============================================================================
// Dependency Injection
// ============================================================================

export * from './di';
