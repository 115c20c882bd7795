/**
 * lattice-di - Exceptions
 *
 * Error taxonomy raised by registration and resolution. Every error names
 * the service it concerns and carries a rendering of the resolution path
 * that led to it.
 */

/**
 * Render a resolution path as an indented tree.
 *
 * @example
 * ```
 * ├─ UserController
 *   ├─ UserService
 *     └─ Database
 *       └─ ConnectionString (UNREGISTERED)
 * ```
 */
export function buildDependencyGraph(
  stack: readonly string[],
  current?: string,
): string {
  let graph = '';
  const last = current === undefined ? stack.length - 1 : stack.length;

  for (let i = 0; i < stack.length; i++) {
    const indent = '  '.repeat(i);
    const branch = i === last ? '└─' : '├─';
    graph += `${indent}${branch} ${stack[i]}\n`;
  }

  if (current !== undefined) {
    graph += `${'  '.repeat(stack.length)}└─ ${current}\n`;
  }

  return graph;
}

/**
 * Base class of every error raised by the container
 */
export class DependencyInjectionError extends Error {
  constructor(
    message: string,
    public readonly serviceKey: string,
    public readonly dependencyGraph: string = '',
  ) {
    super(message);
    this.name = 'DependencyInjectionError';

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * The requested key has no registration
 */
export class ServiceNotRegisteredError extends DependencyInjectionError {
  constructor(serviceKey: string, dependencyGraph?: string) {
    super(
      `Service '${serviceKey}' is not registered`,
      serviceKey,
      dependencyGraph ?? buildDependencyGraph([], `${serviceKey} (UNREGISTERED)`),
    );
    this.name = 'ServiceNotRegisteredError';
  }
}

/**
 * Resolving a key would re-enter itself.
 *
 * `chain` is the full path, ending with the repeated key:
 * `['ServiceA', 'ServiceB', 'ServiceA']`.
 */
export class CircularDependencyError extends DependencyInjectionError {
  public readonly chain: readonly string[];

  constructor(chain: readonly string[]) {
    const repeated = chain[chain.length - 1] ?? '<unknown>';
    super(
      `Circular dependency detected: ${chain.join(' -> ')}`,
      repeated,
      buildDependencyGraph(chain.slice(0, -1), `${repeated} (CIRCULAR)`),
    );
    this.name = 'CircularDependencyError';
    this.chain = Object.freeze([...chain]);
  }
}

/**
 * The factory is not callable or its parameters cannot be introspected
 */
export class InvalidFactoryError extends DependencyInjectionError {
  constructor(
    serviceKey: string,
    public readonly reason: string,
  ) {
    super(`Invalid factory for '${serviceKey}': ${reason}`, serviceKey);
    this.name = 'InvalidFactoryError';
  }
}

/**
 * Details of a failed parameter resolution
 */
export interface DependencyResolutionDetails {
  serviceKey: string;
  paramName: string;
  expectedType?: string;
  reason: string;
  dependencyGraph?: string;
  cause?: unknown;
}

/**
 * A required parameter could not be supplied, or invoking the factory failed.
 *
 * `paramName` is `'<constructor>'` when the invocation itself threw, and
 * `'<unknown>'` when the factory had no parameter metadata at all.
 */
export class DependencyResolutionError extends DependencyInjectionError {
  public readonly paramName: string;
  public readonly expectedType?: string;
  public readonly reason: string;
  public readonly cause?: unknown;

  constructor(details: DependencyResolutionDetails) {
    const expected = details.expectedType ? ` (expected ${details.expectedType})` : '';
    super(
      `Cannot resolve parameter '${details.paramName}' of '${details.serviceKey}'${expected}: ${details.reason}`,
      details.serviceKey,
      details.dependencyGraph ?? '',
    );
    this.name = 'DependencyResolutionError';
    this.paramName = details.paramName;
    this.expectedType = details.expectedType;
    this.reason = details.reason;
    this.cause = details.cause;
  }
}

/**
 * A disposed scope was asked for a service
 */
export class ScopeDisposedError extends DependencyInjectionError {
  constructor(serviceKey: string) {
    super(`Cannot resolve '${serviceKey}' from a disposed scope`, serviceKey);
    this.name = 'ScopeDisposedError';
  }
}
