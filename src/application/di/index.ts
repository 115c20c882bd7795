/**
 * @module lattice-di/application/di
 * @description Dependency Injection contracts, decorators and hooks
 */

// ============================================================================
// Core Interfaces
// ============================================================================

export type {
  IServiceRegistry,
  IServiceResolver,
  IServiceScope,
  IContainerHooks,
  ContainerStats,
  ContainerOptions,
  IDisposable,
  IClosable,
} from './IDependencyInjection';

export { isDisposable, isClosable } from './IDependencyInjection';

// ============================================================================
// Decorators
// ============================================================================

export {
  Injectable,
  Inject,
  Optional,
  optional,
  withDependencies,
  getInjectableLifetime,
  OptionalDependency,
} from './decorators';

export type { InjectableOptions, DependencySpec } from './decorators';

// ============================================================================
// Hooks
// ============================================================================

export { ContainerHooks, createHooks } from './hooks';
