/**
 * @fileoverview Dependency Injection Container Interfaces
 *
 * @packageDocumentation
 * @module lattice-di/application/di
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * Contracts implemented by the container in the infrastructure layer.
 * Application code should depend on these interfaces; only the composition
 * root needs the concrete `Container`.
 *
 * ## Resolution at a glance
 *
 * ```
 * register(key, factory, lifetime)
 *        │
 *        ▼
 * resolve(key) ──► not registered? ──► ServiceNotRegisteredError
 *        │
 *        ├──► already on the resolution stack? ──► CircularDependencyError
 *        │
 *        ├──► Singleton already built? ──► cached instance
 *        │
 *        └──► push key ─► resolve each constructor parameter ─► construct ─► pop key
 * ```
 *
 * ## Unit of work
 *
 * Scopes model one unit of work (an HTTP request, a queue message):
 *
 * ```typescript
 * app.use(async (req, res, next) => {
 *   await container.createScopeAsync(async (scope) => {
 *     req.services = scope;
 *     await next();
 *   }); // scoped services are disposed here, even if next() throws
 * });
 * ```
 */

import { ServiceIdentifier } from '../../domain/di/ServiceIdentifier';
import { ServiceLifetime } from '../../domain/di/ServiceLifetime';
import { Registration, ServiceFactory } from '../../domain/di/Registration';
import { ILogger } from '../../infrastructure/logging/logger';

/**
 * Registration side of the container
 */
export interface IServiceRegistry {
  /**
   * Registers a service. When `factory` is omitted the key itself must be a
   * class and is used as the constructor. When `lifetime` is omitted the
   * `@Injectable` lifetime applies, then Transient.
   *
   * @throws {InvalidFactoryError} If the factory is not callable or its
   * parameters cannot be introspected
   */
  register<T>(
    key: ServiceIdentifier<T>,
    factory?: ServiceFactory<T>,
    lifetime?: ServiceLifetime,
  ): this;

  registerSingleton<T>(key: ServiceIdentifier<T>, factory?: ServiceFactory<T>): this;

  registerScoped<T>(key: ServiceIdentifier<T>, factory?: ServiceFactory<T>): this;

  registerTransient<T>(key: ServiceIdentifier<T>, factory?: ServiceFactory<T>): this;

  /**
   * Registers a pre-built Singleton. The instance is cached immediately.
   */
  registerInstance<T>(key: ServiceIdentifier<T>, instance: T): this;

  isRegistered(key: ServiceIdentifier): boolean;

  /**
   * @throws {ServiceNotRegisteredError}
   */
  getRegistration<T>(key: ServiceIdentifier<T>): Registration<T>;
}

/**
 * Resolution side, shared by the container and its scopes
 */
export interface IServiceResolver {
  /**
   * @throws {ServiceNotRegisteredError}
   * @throws {CircularDependencyError}
   * @throws {DependencyResolutionError}
   */
  resolve<T>(key: ServiceIdentifier<T>): T;

  /**
   * Like `resolve`, but returns `undefined` for an unregistered key.
   * Other resolution failures still throw.
   */
  tryResolve<T>(key: ServiceIdentifier<T>): T | undefined;

  isRegistered(key: ServiceIdentifier): boolean;
}

/**
 * A unit of work owning its Scoped instances
 */
export interface IServiceScope extends IServiceResolver {
  /**
   * Releases every Scoped instance created through this scope, calling
   * `dispose()` (or `close()`) on each. Later calls do nothing.
   *
   * @throws The first error raised by a cleanup method, after every
   * instance has been visited
   */
  dispose(): void;

  /**
   * Same as `dispose`, awaiting cleanup methods that return a promise.
   */
  disposeAsync(): Promise<void>;

  isDisposed(): boolean;
}

/**
 * Observer of container events.
 *
 * Extend `ContainerHooks` or use `createHooks` to implement only some
 * events. A hook that throws is logged and ignored.
 */
export interface IContainerHooks {
  /** Shown in logs when the hook fails */
  readonly name?: string;

  onServiceRegistered(
    key: ServiceIdentifier,
    lifetime: ServiceLifetime,
    factory: ServiceFactory,
  ): void;

  onServiceResolved(key: ServiceIdentifier, instance: unknown, isCached: boolean): void;

  onResolutionError(
    key: ServiceIdentifier,
    error: unknown,
    resolutionStack: readonly ServiceIdentifier[],
  ): void;
}

/**
 * Container usage counters. Every field only ever grows.
 */
export interface ContainerStats {
  readonly totalRegistrations: number;
  readonly singletonRegistrations: number;
  readonly transientRegistrations: number;
  readonly scopedRegistrations: number;
  readonly totalResolutions: number;
  readonly singletonInstancesCreated: number;

  /** Resolution count per service name */
  readonly resolutionsByType: Readonly<Record<string, number>>;
}

/**
 * Container configuration options
 */
export interface ContainerOptions {
  /** Used as a log prefix (default: `container`) */
  name?: string;

  /** Custom logger (default: `consoleLogger`) */
  logger?: ILogger;
}

/**
 * Resource released with `dispose()` when its scope ends
 */
export interface IDisposable {
  dispose(): void | Promise<void>;
}

/**
 * Resource released with `close()` when its scope ends
 */
export interface IClosable {
  close(): void | Promise<void>;
}

export function isDisposable(obj: unknown): obj is IDisposable {
  return (
    typeof obj === 'object' &&
    obj !== null &&
    'dispose' in obj &&
    typeof obj.dispose === 'function'
  );
}

export function isClosable(obj: unknown): obj is IClosable {
  return (
    typeof obj === 'object' &&
    obj !== null &&
    'close' in obj &&
    typeof obj.close === 'function'
  );
}
