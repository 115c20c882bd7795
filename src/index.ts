/**
 * @fileoverview lattice-di - Auto-wiring dependency injection for Node.js
 * @description
 * A registry of service factories, a resolver that builds object graphs
 * from constructor metadata, and a lifetime model (Transient, Singleton,
 * Scoped) with cycle detection, scope disposal, usage statistics and
 * observability hooks.
 *
 * ```typescript
 * import 'reflect-metadata';
 * import { Container, Injectable } from 'lattice-di';
 *
 * @Injectable()
 * class Database {}
 *
 * @Injectable()
 * class UserService {
 *   constructor(readonly db: Database) {}
 * }
 *
 * const container = new Container()
 *   .registerSingleton(Database)
 *   .register(UserService);
 *
 * container.resolve(UserService).db === container.resolve(Database); // true
 * ```
 *
 * @packageDocumentation
 * @module lattice-di
 * @version 1.0.0
 */

import 'reflect-metadata';

// ============================================================================
// DOMAIN LAYER EXPORTS (Service Model & Errors)
// ============================================================================

export { ServiceLifetime, InjectionToken, getServiceName } from './domain/di';

export type {
  Constructor,
  AbstractConstructor,
  ServiceIdentifier,
  Registration,
  ServiceFactory,
  FactoryFunction,
} from './domain/di';

export {
  DependencyInjectionError,
  ServiceNotRegisteredError,
  CircularDependencyError,
  InvalidFactoryError,
  DependencyResolutionError,
  ScopeDisposedError,
  buildDependencyGraph,
} from './domain/exceptions';

// ============================================================================
// APPLICATION LAYER EXPORTS (Contracts, Decorators, Hooks)
// ============================================================================

export {
  Injectable,
  Inject,
  Optional,
  optional,
  withDependencies,
  OptionalDependency,
  ContainerHooks,
  createHooks,
  isDisposable,
  isClosable,
} from './application/di';

export type {
  IServiceRegistry,
  IServiceResolver,
  IServiceScope,
  IContainerHooks,
  ContainerStats,
  ContainerOptions,
  IDisposable,
  IClosable,
  InjectableOptions,
  DependencySpec,
} from './application/di';

// ============================================================================
// INFRASTRUCTURE LAYER EXPORTS (Container & Logging)
// ============================================================================

export { Container, createContainer, Scope } from './infrastructure/di';

export { consoleLogger, silentLogger } from './infrastructure/logging';
export type { ILogger } from './infrastructure/logging';

// ==================== Version ====================
export const VERSION = '1.0.0';
