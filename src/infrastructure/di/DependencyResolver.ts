/**
 * @fileoverview DependencyResolver - Constructor introspection and auto-wiring
 *
 * @packageDocumentation
 * @module lattice-di/infrastructure/di
 *
 * ## Hexagonal Architecture Layer: INFRASTRUCTURE
 *
 * Turns a registration into an instance. The resolver never caches and
 * never recurses on its own: every dependency goes back through the
 * `resolve` callback of whoever asked (the container or a scope), so that
 * lifetime caching and cycle detection stay in one place.
 *
 * ## Where parameter keys come from
 *
 * For each parameter index, the first source that has an entry wins:
 *
 * 1. `@Inject(token)` on the parameter
 * 2. the factory's static `inject` list (`withDependencies`)
 * 3. `design:paramtypes`, emitted by TypeScript for decorated classes
 *
 * All three are read from the class that declares the constructor being
 * run, so a subclass with its own decorated constructor never sees its
 * parent's entries. A factory with none of the three is invoked without
 * arguments.
 */

import 'reflect-metadata';

import {
  ServiceIdentifier,
  getServiceName,
  isClassConstructor,
  isClassSyntax,
} from '../../domain/di/ServiceIdentifier';
import { Registration } from '../../domain/di/Registration';
import {
  DependencyResolutionError,
  InvalidFactoryError,
  buildDependencyGraph,
} from '../../domain/exceptions/exceptions';
import {
  INJECT_TOKENS_METADATA_KEY,
  OPTIONAL_PARAMS_METADATA_KEY,
  PARAM_TYPES_METADATA_KEY,
  OptionalDependency,
  isServiceIdentifier,
  readMetadataList,
} from '../../application/di/decorators';
import { getParameterNames } from './parameterNames';

/**
 * One auto-wired parameter
 */
export interface ParameterDescriptor {
  readonly index: number;
  readonly name: string;
  readonly token: ServiceIdentifier;
  readonly optional: boolean;
}

/**
 * Outcome of reading a factory's parameter metadata
 */
export type Introspection =
  | { readonly kind: 'none' }
  | { readonly kind: 'invalid'; readonly reason: string }
  | { readonly kind: 'described'; readonly parameters: readonly ParameterDescriptor[] };

/**
 * Outcome of looking up one dependency
 */
export type DependencyLookup =
  | { readonly kind: 'found'; readonly value: unknown }
  | { readonly kind: 'absent' };

/**
 * What the caller of `createInstance` provides for recursion
 */
export interface ResolutionContext {
  resolve<T>(key: ServiceIdentifier<T>): T;

  /** Keys currently under construction, used for error graphs */
  readonly stack: readonly ServiceIdentifier[];
}

export class DependencyResolver {
  private readonly introspections = new WeakMap<Function, Introspection>();

  constructor(private readonly isRegistered: (key: ServiceIdentifier) => boolean) {}

  /**
   * @throws {InvalidFactoryError}
   */
  validateFactory(factory: unknown, key: ServiceIdentifier): void {
    const serviceName = getServiceName(key);

    if (typeof factory !== 'function') {
      throw new InvalidFactoryError(serviceName, 'factory is not callable');
    }

    const introspection = this.introspect(factory);

    if (introspection.kind === 'invalid') {
      throw new InvalidFactoryError(serviceName, introspection.reason);
    }

    // A function-style constructor registered as its own key (a Node
    // built-in, a class compiled to ES5) cannot carry metadata; it is
    // invoked without arguments.
    const isOwnLegacyConstructor = factory === key && !isClassSyntax(factory);

    if (introspection.kind === 'none' && factory.length > 0 && !isOwnLegacyConstructor) {
      throw new InvalidFactoryError(
        serviceName,
        `factory declares ${factory.length} parameter(s) but no dependency metadata; ` +
          'decorate the class with @Injectable() or declare its dependencies with withDependencies()',
      );
    }
  }

  /**
   * Reads (and memoizes) the parameter metadata of a factory.
   */
  introspect(factory: Function): Introspection {
    const cached = this.introspections.get(factory);
    if (cached) {
      return cached;
    }

    const introspection = this.readParameters(factory);
    this.introspections.set(factory, introspection);
    return introspection;
  }

  /**
   * Builds an instance, resolving every parameter through `context`.
   *
   * @throws {DependencyResolutionError} For an unregistered required
   * parameter or a failing factory call. Errors raised by nested
   * resolutions propagate unchanged.
   */
  createInstance<T>(registration: Registration<T>, context: ResolutionContext): T {
    const { factory, serviceKey } = registration;
    const serviceName = getServiceName(serviceKey);
    const introspection = this.introspect(factory);

    if (introspection.kind === 'invalid') {
      throw new DependencyResolutionError({
        serviceKey: serviceName,
        paramName: '<unknown>',
        reason: introspection.reason,
        dependencyGraph: this.graph(context),
      });
    }

    if (introspection.kind === 'none') {
      return this.invoke(registration, [], '<unknown>', context);
    }

    const args: unknown[] = [];
    for (const parameter of introspection.parameters) {
      const lookup = this.lookup(serviceName, parameter, context);
      args.push(lookup.kind === 'found' ? lookup.value : undefined);
    }

    return this.invoke(registration, args, '<constructor>', context);
  }

  private lookup(
    serviceName: string,
    parameter: ParameterDescriptor,
    context: ResolutionContext,
  ): DependencyLookup {
    if (this.isRegistered(parameter.token)) {
      return { kind: 'found', value: context.resolve(parameter.token) };
    }

    if (parameter.optional) {
      return { kind: 'absent' };
    }

    const expectedType = getServiceName(parameter.token);
    throw new DependencyResolutionError({
      serviceKey: serviceName,
      paramName: parameter.name,
      expectedType,
      reason: 'Service not registered',
      dependencyGraph: this.graph(context, `${expectedType} (UNREGISTERED)`),
    });
  }

  private invoke<T>(
    registration: Registration<T>,
    args: unknown[],
    paramName: string,
    context: ResolutionContext,
  ): T {
    const { factory, serviceKey } = registration;

    try {
      // A key registered without a factory is its own constructor.
      return factory === serviceKey || isClassConstructor(factory)
        ? Reflect.construct(factory, args)
        : factory(...args);
    } catch (error) {
      throw new DependencyResolutionError({
        serviceKey: getServiceName(registration.serviceKey),
        paramName,
        reason: error instanceof Error ? error.message : String(error),
        dependencyGraph: this.graph(context),
        cause: error,
      });
    }
  }

  private readParameters(factory: Function): Introspection {
    const owner = findConstructorOwner(factory);
    if (owner === undefined) {
      return { kind: 'none' };
    }

    const paramTypes = readMetadataList(PARAM_TYPES_METADATA_KEY, owner);
    const injectTokens = readMetadataList(INJECT_TOKENS_METADATA_KEY, owner);
    const optionalIndexes = readMetadataList(OPTIONAL_PARAMS_METADATA_KEY, owner);
    const declared = readStaticInject(owner) ?? [];
    const names = getParameterNames(owner);

    const count = Math.max(
      owner.length,
      paramTypes.length,
      injectTokens.length,
      declared.length,
    );

    const parameters: ParameterDescriptor[] = [];
    for (let index = 0; index < count; index++) {
      const name = names[index] || `arg${index}`;
      const dependency = injectTokens[index] ?? declared[index] ?? paramTypes[index];
      const optional =
        dependency instanceof OptionalDependency || optionalIndexes.includes(index);
      const token = dependency instanceof OptionalDependency ? dependency.token : dependency;

      if (!isServiceIdentifier(token)) {
        return {
          kind: 'invalid',
          reason: `parameter '${name}' (#${index}) has no resolvable type`,
        };
      }

      parameters.push({ index, name, token, optional });
    }

    return { kind: 'described', parameters };
  }

  private graph(context: ResolutionContext, current?: string): string {
    return buildDependencyGraph(context.stack.map(getServiceName), current);
  }
}

/**
 * The class (or function) whose parameter metadata describes what `factory`
 * is invoked with: `factory` itself when it declares any, otherwise the
 * nearest ancestor that does. A subclass without its own constructor runs
 * its parent's, so it inherits the parent's metadata; a subclass that
 * declares metadata never sees the parent's.
 */
function findConstructorOwner(factory: Function): Function | undefined {
  let current: unknown = factory;
  while (typeof current === 'function' && current !== Function.prototype) {
    if (declaresParameters(current)) {
      return current;
    }
    current = Object.getPrototypeOf(current);
  }
  return undefined;
}

function declaresParameters(target: Function): boolean {
  return (
    Reflect.hasOwnMetadata(PARAM_TYPES_METADATA_KEY, target) ||
    Reflect.hasOwnMetadata(INJECT_TOKENS_METADATA_KEY, target) ||
    Reflect.hasOwnMetadata(OPTIONAL_PARAMS_METADATA_KEY, target) ||
    Object.prototype.hasOwnProperty.call(target, 'inject')
  );
}

function readStaticInject(target: Function): readonly unknown[] | undefined {
  if (!Object.prototype.hasOwnProperty.call(target, 'inject')) {
    return undefined;
  }
  const declared: unknown = Reflect.get(target, 'inject');
  return Array.isArray(declared) ? declared : undefined;
}
