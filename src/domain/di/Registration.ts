/**
 * @fileoverview Registration - How a service key is constructed
 *
 * @packageDocumentation
 * @module lattice-di/domain/di
 */

import { Constructor, ServiceIdentifier } from './ServiceIdentifier';
import { ServiceLifetime } from './ServiceLifetime';

/**
 * Factory function whose parameters are auto-wired like constructor
 * parameters. Declare them with a static `inject` list (see
 * `withDependencies`).
 */
export type FactoryFunction<T = unknown> = (...args: any[]) => T;

/**
 * Anything the resolver can invoke to build a service.
 */
export type ServiceFactory<T = unknown> = Constructor<T> | FactoryFunction<T>;

/**
 * The stored association between a key, its factory and its lifetime.
 *
 * Registrations are frozen; re-registering a key replaces the whole record.
 */
export interface Registration<T = unknown> {
  readonly serviceKey: ServiceIdentifier<T>;
  readonly factory: ServiceFactory<T>;
  readonly lifetime: ServiceLifetime;

  /** Present only for `registerInstance` registrations */
  readonly instance?: T;
}

export function createRegistration<T>(
  serviceKey: ServiceIdentifier<T>,
  factory: ServiceFactory<T>,
  lifetime: ServiceLifetime,
  instance?: T,
): Registration<T> {
  const registration: Registration<T> =
    instance === undefined
      ? { serviceKey, factory, lifetime }
      : { serviceKey, factory, lifetime, instance };

  return Object.freeze(registration);
}
