/**
 * lattice-di - Container Hooks
 *
 * No-op base implementation of `IContainerHooks`, so observers only
 * override the events they care about.
 */

import { ServiceIdentifier } from '../../domain/di/ServiceIdentifier';
import { ServiceLifetime } from '../../domain/di/ServiceLifetime';
import { ServiceFactory } from '../../domain/di/Registration';
import { IContainerHooks } from './IDependencyInjection';

/**
 * Base hooks class
 *
 * @example
 * ```typescript
 * class SlowSingletonWarning extends ContainerHooks {
 *   onServiceResolved(key: ServiceIdentifier, _instance: unknown, isCached: boolean) {
 *     if (!isCached) metrics.increment(`di.created.${getServiceName(key)}`);
 *   }
 * }
 *
 * container.addHooks(new SlowSingletonWarning());
 * ```
 */
export class ContainerHooks implements IContainerHooks {
  get name(): string {
    return this.constructor.name;
  }

  onServiceRegistered(
    _key: ServiceIdentifier,
    _lifetime: ServiceLifetime,
    _factory: ServiceFactory,
  ): void {}

  onServiceResolved(_key: ServiceIdentifier, _instance: unknown, _isCached: boolean): void {}

  onResolutionError(
    _key: ServiceIdentifier,
    _error: unknown,
    _resolutionStack: readonly ServiceIdentifier[],
  ): void {}
}

/**
 * Create hooks from a partial object
 *
 * @example
 * ```typescript
 * container.addHooks(
 *   createHooks({
 *     name: 'error-reporter',
 *     onResolutionError: (key, error) => reporter.capture(error),
 *   }),
 * );
 * ```
 */
export function createHooks(handlers: Partial<IContainerHooks>): IContainerHooks {
  return {
    name: handlers.name ?? 'anonymous',
    onServiceRegistered: (key, lifetime, factory) =>
      handlers.onServiceRegistered?.(key, lifetime, factory),
    onServiceResolved: (key, instance, isCached) =>
      handlers.onServiceResolved?.(key, instance, isCached),
    onResolutionError: (key, error, resolutionStack) =>
      handlers.onResolutionError?.(key, error, resolutionStack),
  };
}
