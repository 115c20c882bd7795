/**
 * @fileoverview Container - Dependency injection container
 *
 * @packageDocumentation
 * @module lattice-di/infrastructure/di
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * The composition root's entry point. Owns the registrations, the
 * singleton cache, the resolution stack, usage counters and hooks.
 *
 * ## Resolution states
 *
 * ```
 * NotRegistered ──► ServiceNotRegisteredError
 * CycleCheck ─────► CircularDependencyError([...stack, key])
 * CacheHit ───────► cached Singleton (hook: isCached = true)
 * Resolving ──────► key pushed, parameters resolved recursively
 *   ├─ Resolved ──► key popped, Singleton cached (hook: isCached = false)
 *   └─ Failed ────► key popped, error hook fired, error rethrown
 * ```
 *
 * A failed resolution leaves the container consistent: the stack is fully
 * unwound and Singletons built before the failure stay cached.
 *
 * ## Threading
 *
 * Resolution is synchronous and uses a single stack per container. Build
 * the container once at startup; do not register while other code is
 * resolving from it.
 *
 * @example
 * ```typescript
 * const container = new Container({ name: 'api' });
 *
 * container
 *   .registerSingleton(Database)
 *   .registerScoped(UnitOfWork)
 *   .register(CreateOrderHandler);
 *
 * const result = await container.createScopeAsync(async (scope) => {
 *   return scope.resolve(CreateOrderHandler).execute(command);
 * });
 * ```
 */

import {
  ServiceIdentifier,
  getServiceName,
  isConstructorKey,
} from '../../domain/di/ServiceIdentifier';
import { ServiceLifetime } from '../../domain/di/ServiceLifetime';
import {
  Registration,
  ServiceFactory,
  createRegistration,
} from '../../domain/di/Registration';
import {
  CircularDependencyError,
  InvalidFactoryError,
  ServiceNotRegisteredError,
  buildDependencyGraph,
} from '../../domain/exceptions/exceptions';
import {
  ContainerOptions,
  ContainerStats,
  IContainerHooks,
  IServiceRegistry,
  IServiceResolver,
  IServiceScope,
} from '../../application/di/IDependencyInjection';
import { getInjectableLifetime } from '../../application/di/decorators';
import { ILogger, consoleLogger } from '../logging/logger';
import { DependencyResolver, ResolutionContext } from './DependencyResolver';
import { MetricsTracker } from './MetricsTracker';
import { Scope } from './Scope';
import { InstanceCache, RegistrationStore } from './stores';

export class Container implements IServiceRegistry, IServiceResolver {
  readonly name: string;
  private readonly logger: ILogger;
  private readonly registrations = new RegistrationStore();
  private readonly singletons = new InstanceCache();
  private readonly resolutionStack: ServiceIdentifier[] = [];
  private readonly resolver: DependencyResolver;
  private readonly metrics: MetricsTracker;
  private readonly context: ResolutionContext;

  constructor(private readonly options: ContainerOptions = {}) {
    this.name = options.name ?? 'container';
    this.logger = options.logger ?? consoleLogger;
    this.metrics = new MetricsTracker(this.logger);
    this.resolver = new DependencyResolver((key) => this.registrations.has(key));
    this.context = {
      resolve: (key) => this.resolve(key),
      stack: this.resolutionStack,
    };
  }

  getOptions(): ContainerOptions {
    return { ...this.options };
  }

  // ==================== Registration ====================

  register<T>(
    key: ServiceIdentifier<T>,
    factory?: ServiceFactory<T>,
    lifetime?: ServiceLifetime,
  ): this {
    const serviceFactory = factory ?? this.factoryFromKey(key);
    this.resolver.validateFactory(serviceFactory, key);

    const serviceLifetime =
      lifetime ?? getInjectableLifetime(serviceFactory) ?? ServiceLifetime.Transient;

    this.registrations.set(key, createRegistration(key, serviceFactory, serviceLifetime));
    this.metrics.recordRegistration(serviceLifetime);

    this.logger.debug(
      `[${this.name}] Registered ${getServiceName(key)} (${serviceLifetime})`,
    );
    this.metrics.notifyRegistered(key, serviceLifetime, serviceFactory);

    return this;
  }

  registerSingleton<T>(key: ServiceIdentifier<T>, factory?: ServiceFactory<T>): this {
    return this.register(key, factory, ServiceLifetime.Singleton);
  }

  registerScoped<T>(key: ServiceIdentifier<T>, factory?: ServiceFactory<T>): this {
    return this.register(key, factory, ServiceLifetime.Scoped);
  }

  registerTransient<T>(key: ServiceIdentifier<T>, factory?: ServiceFactory<T>): this {
    return this.register(key, factory, ServiceLifetime.Transient);
  }

  registerInstance<T>(key: ServiceIdentifier<T>, instance: T): this {
    this.registrations.set(
      key,
      createRegistration(key, () => instance, ServiceLifetime.Singleton, instance),
    );
    this.singletons.set(key, instance);

    this.metrics.recordRegistration(ServiceLifetime.Singleton);
    this.metrics.recordSingletonCreated();

    this.logger.debug(`[${this.name}] Registered instance of ${getServiceName(key)}`);
    return this;
  }

  isRegistered(key: ServiceIdentifier): boolean {
    return this.registrations.has(key);
  }

  getRegistration<T>(key: ServiceIdentifier<T>): Registration<T> {
    const registration = this.registrations.get(key);
    if (!registration) {
      throw new ServiceNotRegisteredError(getServiceName(key));
    }
    return registration;
  }

  // ==================== Resolution ====================

  resolve<T>(key: ServiceIdentifier<T>): T {
    const serviceName = getServiceName(key);
    const registration = this.registrations.get(key);

    if (!registration) {
      throw this.reportError(
        key,
        new ServiceNotRegisteredError(
          serviceName,
          buildDependencyGraph(this.stackNames(), `${serviceName} (UNREGISTERED)`),
        ),
      );
    }

    if (this.resolutionStack.includes(key)) {
      throw this.reportError(
        key,
        new CircularDependencyError([...this.stackNames(), serviceName]),
      );
    }

    this.metrics.recordResolution(serviceName);

    if (registration.lifetime === ServiceLifetime.Singleton) {
      const cached = this.singletons.lookup(key);
      if (cached.kind === 'found') {
        this.metrics.notifyResolved(key, cached.value, true);
        return cached.value;
      }
    }

    const instance = this.construct(registration);

    if (registration.lifetime === ServiceLifetime.Singleton) {
      this.singletons.set(key, instance);
      this.metrics.recordSingletonCreated();
    }

    this.metrics.notifyResolved(key, instance, false);
    return instance;
  }

  tryResolve<T>(key: ServiceIdentifier<T>): T | undefined {
    return this.isRegistered(key) ? this.resolve(key) : undefined;
  }

  /**
   * Builds an instance from a registration without caching it and without
   * touching the counters. Dependencies still resolve through the container.
   */
  createInstance<T>(registration: Registration<T>): T {
    return this.resolver.createInstance(registration, this.context);
  }

  // ==================== Scopes ====================

  /**
   * Runs `work` inside a new scope and disposes the scope afterwards,
   * whether `work` returns or throws.
   *
   * `work` must be synchronous; use `createScopeAsync` for async work.
   */
  createScope<R>(work: (scope: IServiceScope) => R): R {
    const scope = this.openScope();
    try {
      return work(scope);
    } finally {
      scope.dispose();
    }
  }

  /**
   * Async variant of `createScope`; awaits `work`, then awaits disposal.
   */
  async createScopeAsync<R>(work: (scope: IServiceScope) => Promise<R>): Promise<R> {
    const scope = this.openScope();
    try {
      return await work(scope);
    } finally {
      await scope.disposeAsync();
    }
  }

  /**
   * Creates a scope whose disposal is the caller's responsibility.
   * Prefer `createScope`/`createScopeAsync`.
   */
  openScope(): IServiceScope {
    return new Scope(this, this.resolver, this.metrics, this.logger);
  }

  // ==================== Observability ====================

  getStats(): ContainerStats {
    return this.metrics.getStats();
  }

  addHooks(hooks: IContainerHooks): this {
    this.metrics.addHooks(hooks);
    return this;
  }

  // ==================== Internals ====================

  private factoryFromKey<T>(key: ServiceIdentifier<T>): ServiceFactory<T> {
    if (isConstructorKey(key)) {
      return key;
    }
    throw new InvalidFactoryError(
      getServiceName(key),
      'no factory given and the key is not a constructor',
    );
  }

  private construct<T>(registration: Registration<T>): T {
    const { serviceKey } = registration;
    this.resolutionStack.push(serviceKey);
    try {
      return this.resolver.createInstance(registration, this.context);
    } catch (error) {
      this.metrics.notifyError(serviceKey, error, this.resolutionStack);
      throw error;
    } finally {
      this.resolutionStack.pop();
    }
  }

  private reportError(key: ServiceIdentifier, error: Error): Error {
    this.metrics.notifyError(key, error, this.resolutionStack);
    return error;
  }

  private stackNames(): string[] {
    return this.resolutionStack.map(getServiceName);
  }
}

/**
 * Create a new container
 */
export function createContainer(options?: ContainerOptions): Container {
  return new Container(options);
}
