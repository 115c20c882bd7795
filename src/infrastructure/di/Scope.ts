/**
 * @fileoverview Scope - One unit of work for Scoped services
 *
 * @packageDocumentation
 * @module lattice-di/infrastructure/di
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * A scope caches Scoped instances and owns its own resolution stack.
 * Singletons are delegated to the parent container, which keeps the one
 * container-wide instance; Transients are built fresh and never tracked.
 *
 * The parent is only read from: a scope never writes to the container's
 * registrations, singleton cache, stack or counters.
 *
 * ```
 * container ──┬── scope (request 1) ── UnitOfWork#1, RequestLog#1
 *             └── scope (request 2) ── UnitOfWork#2, RequestLog#2
 * ```
 */

import { ServiceIdentifier, getServiceName } from '../../domain/di/ServiceIdentifier';
import { ServiceLifetime } from '../../domain/di/ServiceLifetime';
import { Registration } from '../../domain/di/Registration';
import {
  CircularDependencyError,
  ScopeDisposedError,
  ServiceNotRegisteredError,
  buildDependencyGraph,
} from '../../domain/exceptions/exceptions';
import {
  IServiceScope,
  isClosable,
  isDisposable,
} from '../../application/di/IDependencyInjection';
import { ILogger } from '../logging/logger';
import { DependencyResolver, ResolutionContext } from './DependencyResolver';
import { MetricsTracker } from './MetricsTracker';
import { InstanceCache } from './stores';

/**
 * What a scope needs from its container
 */
export interface ScopeParent {
  resolve<T>(key: ServiceIdentifier<T>): T;
  isRegistered(key: ServiceIdentifier): boolean;
  getRegistration<T>(key: ServiceIdentifier<T>): Registration<T>;
}

export class Scope implements IServiceScope {
  private readonly scopedInstances = new InstanceCache();
  private readonly resolutionStack: ServiceIdentifier[] = [];
  private readonly context: ResolutionContext;
  private disposed = false;

  constructor(
    private readonly parent: ScopeParent,
    private readonly resolver: DependencyResolver,
    private readonly metrics: MetricsTracker,
    private readonly logger: ILogger,
  ) {
    this.context = {
      resolve: (key) => this.resolve(key),
      stack: this.resolutionStack,
    };
  }

  resolve<T>(key: ServiceIdentifier<T>): T {
    const serviceName = getServiceName(key);

    if (this.disposed) {
      throw this.reportError(key, new ScopeDisposedError(serviceName));
    }

    if (!this.parent.isRegistered(key)) {
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

    const registration = this.parent.getRegistration(key);

    switch (registration.lifetime) {
      case ServiceLifetime.Singleton:
        return this.parent.resolve(key);

      case ServiceLifetime.Scoped: {
        const cached = this.scopedInstances.lookup(key);
        if (cached.kind === 'found') {
          this.metrics.notifyResolved(key, cached.value, true);
          return cached.value;
        }
        const instance = this.build(registration);
        this.scopedInstances.set(key, instance);
        this.metrics.notifyResolved(key, instance, false);
        return instance;
      }

      case ServiceLifetime.Transient: {
        const instance = this.build(registration);
        this.metrics.notifyResolved(key, instance, false);
        return instance;
      }
    }
  }

  tryResolve<T>(key: ServiceIdentifier<T>): T | undefined {
    return this.isRegistered(key) ? this.resolve(key) : undefined;
  }

  isRegistered(key: ServiceIdentifier): boolean {
    return this.parent.isRegistered(key);
  }

  isDisposed(): boolean {
    return this.disposed;
  }

  dispose(): void {
    const instances = this.release();
    const errors: unknown[] = [];

    for (const instance of instances) {
      try {
        const result = isDisposable(instance)
          ? instance.dispose()
          : isClosable(instance)
            ? instance.close()
            : undefined;

        if (isPromiseLike(result)) {
          this.logger.warn(
            'Scoped instance returned a promise from its cleanup method; use disposeAsync() to await it',
          );
          Promise.resolve(result).catch((error: unknown) => {
            this.logger.error('Asynchronous scoped instance cleanup failed', error);
          });
        }
      } catch (error) {
        errors.push(error);
      }
    }

    this.rethrowFirst(errors);
  }

  async disposeAsync(): Promise<void> {
    const instances = this.release();
    const errors: unknown[] = [];

    for (const instance of instances) {
      try {
        if (isDisposable(instance)) {
          await instance.dispose();
        } else if (isClosable(instance)) {
          await instance.close();
        }
      } catch (error) {
        errors.push(error);
      }
    }

    this.rethrowFirst(errors);
  }

  /**
   * Marks the scope disposed and hands out its instances, newest first.
   * Returns nothing on later calls.
   */
  private release(): unknown[] {
    if (this.disposed) {
      return [];
    }
    this.disposed = true;

    const instances = this.scopedInstances.values().reverse();
    this.scopedInstances.clear();
    return instances;
  }

  private rethrowFirst(errors: unknown[]): void {
    if (errors.length === 0) {
      return;
    }
    for (const extra of errors.slice(1)) {
      this.logger.warn('Additional error while disposing scope', extra);
    }
    throw errors[0];
  }

  private build<T>(registration: Registration<T>): T {
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

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}
