/**
 * @fileoverview Dependency Injection Decorators
 *
 * @packageDocumentation
 * @module lattice-di/application/di
 *
 * ## How auto-wiring reads a constructor
 *
 * With `emitDecoratorMetadata`, TypeScript records the constructor parameter
 * types of every decorated class under `design:paramtypes`:
 *
 * ```typescript
 * @Injectable()
 * class UserService {
 *   constructor(private db: Database, private logger: Logger) {}
 * }
 *
 * // Emitted by the compiler:
 * // Reflect.defineMetadata('design:paramtypes', [Database, Logger], UserService)
 * ```
 *
 * The resolver looks up each recorded type in the container. Three things
 * the emitted metadata cannot express are covered by decorators:
 *
 * | Need | Decorator |
 * |------|-----------|
 * | Parameter typed as an interface (emitted as `Object`) | `@Inject(TOKEN)` |
 * | Parameter that may stay `undefined` when unregistered | `@Optional()` |
 * | Default lifetime for `container.register(Class)` | `@Injectable({ lifetime })` |
 *
 * Plain factory functions have no metadata at all; declare their parameters
 * with {@link withDependencies}.
 */

import 'reflect-metadata';

import { ServiceIdentifier, InjectionToken } from '../../domain/di/ServiceIdentifier';
import { ServiceLifetime } from '../../domain/di/ServiceLifetime';

export const INJECTABLE_METADATA_KEY = 'lattice:injectable';
export const INJECT_TOKENS_METADATA_KEY = 'lattice:inject-tokens';
export const OPTIONAL_PARAMS_METADATA_KEY = 'lattice:optional-params';
export const PARAM_TYPES_METADATA_KEY = 'design:paramtypes';

/**
 * Marks a dependency that resolves to `undefined` when its key is not
 * registered. Create it with {@link optional}.
 */
export class OptionalDependency<T = unknown> {
  constructor(public readonly token: ServiceIdentifier<T>) {}
}

/**
 * One entry of a declared dependency list
 */
export type DependencySpec<T = unknown> = ServiceIdentifier<T> | OptionalDependency<T>;

/**
 * Options for `@Injectable`
 */
export interface InjectableOptions {
  /**
   * Lifetime used when the class is registered without an explicit one.
   * Explicit lifetimes (`registerSingleton`, a third `register` argument)
   * always win.
   */
  lifetime?: ServiceLifetime;
}

const LIFETIMES: readonly unknown[] = Object.values(ServiceLifetime);

function isServiceLifetime(value: unknown): value is ServiceLifetime {
  return LIFETIMES.includes(value);
}

/**
 * Marks a class for auto-wiring. Any class decorator makes TypeScript emit
 * constructor metadata; this one can also record a default lifetime.
 *
 * @example
 * ```typescript
 * @Injectable({ lifetime: ServiceLifetime.Scoped })
 * class UnitOfWork {
 *   constructor(private readonly db: Database) {}
 * }
 *
 * container.register(UnitOfWork); // registered as Scoped
 * ```
 */
export function Injectable(options: InjectableOptions = {}): ClassDecorator {
  return (target) => {
    Reflect.defineMetadata(INJECTABLE_METADATA_KEY, { ...options }, target);
  };
}

/**
 * Overrides the key used for one constructor parameter.
 *
 * @example
 * ```typescript
 * const CONFIG = new InjectionToken<AppConfig>('AppConfig');
 *
 * @Injectable()
 * class Mailer {
 *   constructor(@Inject(CONFIG) private readonly config: AppConfig) {}
 * }
 * ```
 */
export function Inject<T>(dependency: DependencySpec<T>): ParameterDecorator {
  return (target, _propertyKey, parameterIndex) => {
    const tokens = [...readMetadataList(INJECT_TOKENS_METADATA_KEY, target)];
    tokens[parameterIndex] = dependency;
    Reflect.defineMetadata(INJECT_TOKENS_METADATA_KEY, tokens, target);
  };
}

/**
 * Lets a constructor parameter receive `undefined` when its key is not
 * registered instead of failing resolution.
 *
 * @example
 * ```typescript
 * @Injectable()
 * class ReportService {
 *   constructor(@Optional() private readonly cache?: Cache) {}
 * }
 * ```
 */
export function Optional(): ParameterDecorator {
  return (target, _propertyKey, parameterIndex) => {
    const indexes = readMetadataList(OPTIONAL_PARAMS_METADATA_KEY, target);
    Reflect.defineMetadata(
      OPTIONAL_PARAMS_METADATA_KEY,
      [...indexes, parameterIndex],
      target,
    );
  };
}

/**
 * Wraps a key so that it resolves to `undefined` when unregistered.
 */
export function optional<T>(token: ServiceIdentifier<T>): OptionalDependency<T> {
  return new OptionalDependency(token);
}

/**
 * Attaches a dependency list to a factory function (or an undecorated
 * class) as its static `inject` property.
 *
 * @example
 * ```typescript
 * container.registerSingleton(
 *   Database,
 *   withDependencies(
 *     (config: AppConfig, clock?: Clock) => new Database(config.url, clock),
 *     [CONFIG, optional(Clock)],
 *   ),
 * );
 * ```
 */
export function withDependencies<F extends Function>(
  factory: F,
  dependencies: readonly DependencySpec[],
): F & { inject: readonly DependencySpec[] } {
  return Object.assign(factory, { inject: [...dependencies] });
}

/**
 * Lifetime recorded by `@Injectable`, if any
 */
export function getInjectableLifetime(target: Function): ServiceLifetime | undefined {
  const options: unknown = Reflect.getMetadata(INJECTABLE_METADATA_KEY, target);
  if (typeof options !== 'object' || options === null || !('lifetime' in options)) {
    return undefined;
  }
  return isServiceLifetime(options.lifetime) ? options.lifetime : undefined;
}

/**
 * Reads an array-valued metadata entry defined on `target` itself; entries
 * of a parent class are not visible. Anything else reads as empty.
 */
export function readMetadataList(key: string, target: Object): readonly unknown[] {
  const value: unknown = Reflect.getOwnMetadata(key, target);
  return Array.isArray(value) ? value : [];
}

/**
 * Whether a value can be used as a service key
 */
export function isServiceIdentifier(value: unknown): value is ServiceIdentifier {
  return (
    typeof value === 'string' ||
    typeof value === 'symbol' ||
    typeof value === 'function' ||
    value instanceof InjectionToken
  );
}
