/**
 * lattice-di - Exception Module
 */

export {
  buildDependencyGraph,
  DependencyInjectionError,
  ServiceNotRegisteredError,
  CircularDependencyError,
  InvalidFactoryError,
  DependencyResolutionError,
  ScopeDisposedError,
} from './exceptions';

export type { DependencyResolutionDetails } from './exceptions';
