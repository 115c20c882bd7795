/**
 * @module lattice-di/domain/di
 * @description Service keys, lifetimes and registrations
 */

export { ServiceLifetime } from './ServiceLifetime';
export {
  InjectionToken,
  getServiceName,
  isClassConstructor,
  isClassSyntax,
  isConstructorKey,
} from './ServiceIdentifier';
export type { Constructor, AbstractConstructor, ServiceIdentifier } from './ServiceIdentifier';
export { createRegistration } from './Registration';
export type { Registration, ServiceFactory, FactoryFunction } from './Registration';
