/**
 * @fileoverview Service Identifiers - Keys used to register and resolve services
 *
 * @packageDocumentation
 * @module lattice-di/domain/di
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * A service identifier is the "key" of a registration. TypeScript interfaces
 * are erased at runtime, so the container accepts several key shapes:
 *
 * | Key | Example | Display name |
 * |-----|---------|--------------|
 * | Concrete class | `UserService` | `UserService` |
 * | Abstract class | `Repository` | `Repository` |
 * | Injection token | `new InjectionToken<IConfig>('IConfig')` | `IConfig` |
 * | String | `'config'` | `config` |
 * | Symbol | `Symbol('clock')` | `Symbol(clock)` |
 *
 * @example
 * ```typescript
 * interface IMailer {
 *   send(to: string, body: string): void;
 * }
 *
 * const MAILER = new InjectionToken<IMailer>('IMailer');
 *
 * container.registerSingleton(MAILER, SmtpMailer);
 * const mailer = container.resolve(MAILER); // typed as IMailer
 * ```
 */

/**
 * Any class that can be instantiated with `new`.
 */
export type Constructor<T = unknown> = new (...args: any[]) => T;

/**
 * Abstract classes are valid keys but never valid factories.
 */
export type AbstractConstructor<T = unknown> = abstract new (...args: any[]) => T;

/**
 * Typed key for services that have no runtime class (interfaces, primitives,
 * configuration objects).
 *
 * The type parameter is only used by the compiler; `__type` is never assigned.
 */
export class InjectionToken<T> {
  declare readonly __type?: T;

  constructor(public readonly description: string) {}

  toString(): string {
    return `InjectionToken(${this.description})`;
  }
}

/**
 * Everything the container accepts as a service key.
 */
export type ServiceIdentifier<T = unknown> =
  | Constructor<T>
  | AbstractConstructor<T>
  | InjectionToken<T>
  | string
  | symbol;

/**
 * Human-readable name of a service key, used for stats, logs and errors.
 */
export function getServiceName(identifier: ServiceIdentifier): string {
  if (typeof identifier === 'string') {
    return identifier;
  }
  if (typeof identifier === 'symbol') {
    return identifier.toString();
  }
  if (identifier instanceof InjectionToken) {
    return identifier.description;
  }
  return identifier.name || '<anonymous>';
}

const CLASS_SYNTAX_PATTERN = /^class[\s{]/;
const NATIVE_CODE_PATTERN = /\{\s*\[native code\]\s*\}\s*$/;

/**
 * Whether a function was declared with `class` syntax.
 */
export function isClassSyntax(fn: Function): boolean {
  return CLASS_SYNTAX_PATTERN.test(Function.prototype.toString.call(fn));
}

/**
 * Whether a function must be invoked with `new`: `class` syntax, or a
 * built-in constructor such as `Map`. Bound and arrow functions carry no
 * `prototype` and are called.
 */
export function isClassConstructor(fn: Function): fn is Constructor {
  if (isClassSyntax(fn)) {
    return true;
  }
  return (
    NATIVE_CODE_PATTERN.test(Function.prototype.toString.call(fn)) &&
    Object.prototype.hasOwnProperty.call(fn, 'prototype')
  );
}

/**
 * Whether a key can serve as its own constructor. Abstract classes pass:
 * `abstract` only exists at compile time.
 */
export function isConstructorKey<T>(key: ServiceIdentifier<T>): key is Constructor<T> {
  return typeof key === 'function';
}
