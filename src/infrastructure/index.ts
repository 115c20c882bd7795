/**
 * @fileoverview Infrastructure Layer Exports
 * @description
 * Concrete implementations of the application contracts:
 *
 * - **DI**: `Container`, `Scope` and the auto-wiring `DependencyResolver`
 * - **Logging**: the `ILogger` port with console and silent loggers
 *
 * @packageDocumentation
 * @module lattice-di/infrastructure
 */

// Container, scopes and resolution
export * from './di';

// Logging
export * from './logging';
