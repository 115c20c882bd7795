/**
 * lattice-di - Registration store and instance cache
 *
 * Maps keyed by service identifier. The value type of each entry follows
 * the type parameter of its key, which a plain `Map` cannot express; `set`
 * only accepts matching pairs, so `get` can return the key's type.
 */

import { ServiceIdentifier } from '../../domain/di/ServiceIdentifier';
import { Registration } from '../../domain/di/Registration';

export class RegistrationStore {
  private readonly registrations = new Map<ServiceIdentifier, Registration>();

  set<T>(key: ServiceIdentifier<T>, registration: Registration<T>): void {
    this.registrations.set(key, registration);
  }

  get<T>(key: ServiceIdentifier<T>): Registration<T> | undefined {
    return this.registrations.get(key) as Registration<T> | undefined;
  }

  has(key: ServiceIdentifier): boolean {
    return this.registrations.has(key);
  }
}

/**
 * Result of a cache lookup; `undefined` is a legal instance, so absence is
 * its own case
 */
export type CacheLookup<T> =
  | { readonly kind: 'found'; readonly value: T }
  | { readonly kind: 'absent' };

/**
 * Insertion-ordered instance cache
 */
export class InstanceCache {
  private readonly instances = new Map<ServiceIdentifier, unknown>();

  set<T>(key: ServiceIdentifier<T>, instance: T): void {
    this.instances.set(key, instance);
  }

  lookup<T>(key: ServiceIdentifier<T>): CacheLookup<T> {
    if (!this.instances.has(key)) {
      return { kind: 'absent' };
    }
    return { kind: 'found', value: this.instances.get(key) as T };
  }

  values(): unknown[] {
    return [...this.instances.values()];
  }

  clear(): void {
    this.instances.clear();
  }
}
