/**
 * @fileoverview ServiceLifetime - Service Lifecycle Management
 *
 * @packageDocumentation
 * @module lattice-di/domain/di
 *
 * ## Hexagonal Architecture Layer: DOMAIN
 *
 * | Lifetime | Created | Shared | Released |
 * |----------|---------|--------|----------|
 * | Singleton | First resolution (or `registerInstance`) | Whole container | Never |
 * | Scoped | First resolution in a scope | Within that scope | Scope disposal |
 * | Transient | Every resolution | Never | Garbage collection |
 *
 * Outside of a scope, a Scoped service has no scope to live in: the
 * container builds a fresh instance per resolution, exactly like Transient.
 */
export enum ServiceLifetime {
  /** New instance on every resolution. */
  Transient = 'transient',

  /** Exactly one instance per container, created lazily. */
  Singleton = 'singleton',

  /** Exactly one instance per scope, disposed with the scope. */
  Scoped = 'scoped',
}
