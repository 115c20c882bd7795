/**
 * @module lattice-di/infrastructure/di
 * @description Concrete container implementation
 */

export { Container, createContainer } from './Container';
export { Scope } from './Scope';
export type { ScopeParent } from './Scope';
export { DependencyResolver } from './DependencyResolver';
export type {
  DependencyLookup,
  Introspection,
  ParameterDescriptor,
  ResolutionContext,
} from './DependencyResolver';
export { MetricsTracker } from './MetricsTracker';
export { getParameterNames } from './parameterNames';
