/**
 * lattice-di - Metrics Tracker
 *
 * Usage counters and hook dispatch for a container. Hooks are isolated:
 * a hook that throws is logged and the remaining hooks still run.
 */

import { ServiceIdentifier } from '../../domain/di/ServiceIdentifier';
import { ServiceLifetime } from '../../domain/di/ServiceLifetime';
import { ServiceFactory } from '../../domain/di/Registration';
import { ContainerStats, IContainerHooks } from '../../application/di/IDependencyInjection';
import { ILogger } from '../logging/logger';

type HookEvent = 'onServiceRegistered' | 'onServiceResolved' | 'onResolutionError';

export class MetricsTracker {
  private totalRegistrations = 0;
  private singletonRegistrations = 0;
  private transientRegistrations = 0;
  private scopedRegistrations = 0;
  private totalResolutions = 0;
  private singletonInstancesCreated = 0;
  private readonly resolutionsByType = new Map<string, number>();
  private readonly hooks: IContainerHooks[] = [];

  constructor(private readonly logger: ILogger) {}

  recordRegistration(lifetime: ServiceLifetime): void {
    this.totalRegistrations++;
    switch (lifetime) {
      case ServiceLifetime.Singleton:
        this.singletonRegistrations++;
        break;
      case ServiceLifetime.Scoped:
        this.scopedRegistrations++;
        break;
      case ServiceLifetime.Transient:
        this.transientRegistrations++;
        break;
    }
  }

  recordResolution(serviceName: string): void {
    this.totalResolutions++;
    this.resolutionsByType.set(
      serviceName,
      (this.resolutionsByType.get(serviceName) ?? 0) + 1,
    );
  }

  recordSingletonCreated(): void {
    this.singletonInstancesCreated++;
  }

  /**
   * Frozen copy of the counters
   */
  getStats(): ContainerStats {
    return Object.freeze({
      totalRegistrations: this.totalRegistrations,
      singletonRegistrations: this.singletonRegistrations,
      transientRegistrations: this.transientRegistrations,
      scopedRegistrations: this.scopedRegistrations,
      totalResolutions: this.totalResolutions,
      singletonInstancesCreated: this.singletonInstancesCreated,
      resolutionsByType: Object.freeze(Object.fromEntries(this.resolutionsByType)),
    });
  }

  addHooks(hooks: IContainerHooks): void {
    this.hooks.push(hooks);
  }

  notifyRegistered(
    key: ServiceIdentifier,
    lifetime: ServiceLifetime,
    factory: ServiceFactory,
  ): void {
    this.dispatch('onServiceRegistered', (hooks) =>
      hooks.onServiceRegistered(key, lifetime, factory),
    );
  }

  notifyResolved(key: ServiceIdentifier, instance: unknown, isCached: boolean): void {
    this.dispatch('onServiceResolved', (hooks) =>
      hooks.onServiceResolved(key, instance, isCached),
    );
  }

  notifyError(
    key: ServiceIdentifier,
    error: unknown,
    resolutionStack: readonly ServiceIdentifier[],
  ): void {
    const snapshot = Object.freeze([...resolutionStack]);
    this.dispatch('onResolutionError', (hooks) =>
      hooks.onResolutionError(key, error, snapshot),
    );
  }

  private dispatch(event: HookEvent, invoke: (hooks: IContainerHooks) => void): void {
    for (const hooks of [...this.hooks]) {
      try {
        invoke(hooks);
      } catch (error) {
        this.logger.error(
          `Hook '${hooks.name ?? hooks.constructor.name}' failed during ${event}`,
          error,
        );
      }
    }
  }
}
