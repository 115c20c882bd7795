/**
 * @fileoverview Unit tests for Scope caching and disposal
 */

import 'reflect-metadata';

import {
  Container,
  Injectable,
  withDependencies,
  ScopeDisposedError,
  ServiceNotRegisteredError,
  silentLogger,
} from '../../../src';
import { catchError, createMockLogger } from '../../helpers';

// ============================================================================
// Test Services
// ============================================================================

const disposalLog: string[] = [];

@Injectable()
class Database {}

@Injectable()
class UnitOfWork {
  disposed = 0;

  dispose(): void {
    this.disposed++;
  }
}

@Injectable()
class OrderRepository {
  constructor(readonly uow: UnitOfWork) {}
}

@Injectable()
class FirstResource {
  dispose(): void {
    disposalLog.push('first');
  }
}

@Injectable()
class SecondResource {
  close(): void {
    disposalLog.push('second');
  }
}

@Injectable()
class DualResource {
  dispose(): void {
    disposalLog.push('dispose');
  }

  close(): void {
    disposalLog.push('close');
  }
}

@Injectable()
class FailingResource {
  dispose(): void {
    throw new Error('disk full');
  }
}

@Injectable()
class AnotherFailingResource {
  dispose(): void {
    throw new Error('socket closed');
  }
}

class AsyncConnection {
  closed = false;

  async close(): Promise<void> {
    await Promise.resolve();
    this.closed = true;
  }
}

class RejectingConnection {
  async close(): Promise<void> {
    throw new Error('already closed');
  }
}

class ScopedA {
  constructor(readonly b: unknown) {}
}
class ScopedB {
  constructor(readonly a: unknown) {}
}
withDependencies(ScopedA, [ScopedB]);
withDependencies(ScopedB, [ScopedA]);

// ============================================================================
// Tests
// ============================================================================

describe('Scope', () => {
  let container: Container;

  beforeEach(() => {
    container = new Container({ logger: silentLogger });
    disposalLog.length = 0;
  });

  describe('Scoped lifetime', () => {
    it('should return the same instance within one scope', () => {
      container.registerScoped(UnitOfWork);

      container.createScope((scope) => {
        expect(scope.resolve(UnitOfWork)).toBe(scope.resolve(UnitOfWork));
      });
    });

    it('should return different instances in different scopes', () => {
      container.registerScoped(UnitOfWork);

      const first = container.createScope((scope) => scope.resolve(UnitOfWork));
      const second = container.createScope((scope) => scope.resolve(UnitOfWork));

      expect(first).not.toBe(second);
    });

    it('should share a Scoped dependency between Transients of one scope', () => {
      container.registerScoped(UnitOfWork).register(OrderRepository);

      container.createScope((scope) => {
        const first = scope.resolve(OrderRepository);
        const second = scope.resolve(OrderRepository);

        expect(first).not.toBe(second);
        expect(first.uow).toBe(second.uow);
        expect(first.uow).toBe(scope.resolve(UnitOfWork));
      });
    });

    it('should keep scopes isolated while open at the same time', () => {
      container.registerScoped(UnitOfWork);
      const outer = container.openScope();
      const inner = container.openScope();

      expect(outer.resolve(UnitOfWork)).not.toBe(inner.resolve(UnitOfWork));

      outer.dispose();
      inner.dispose();
    });
  });

  describe('Singleton lifetime', () => {
    it('should return the container Singleton', () => {
      container.registerSingleton(Database);

      const fromScope = container.createScope((scope) => scope.resolve(Database));

      expect(fromScope).toBe(container.resolve(Database));
    });

    it('should count Singleton resolutions on the container', () => {
      container.registerSingleton(Database);

      container.createScope((scope) => scope.resolve(Database));

      expect(container.getStats().totalResolutions).toBe(1);
      expect(container.getStats().singletonInstancesCreated).toBe(1);
    });

    it('should not count Scoped or Transient resolutions', () => {
      container.registerScoped(UnitOfWork).register(Database);

      container.createScope((scope) => {
        scope.resolve(UnitOfWork);
        scope.resolve(Database);
      });

      expect(container.getStats().totalResolutions).toBe(0);
    });
  });

  describe('resolution errors', () => {
    it('should throw ServiceNotRegisteredError', () => {
      const error = container.createScope((scope) =>
        catchError(() => scope.resolve(Database), ServiceNotRegisteredError),
      );

      expect(error.message).toBe("Service 'Database' is not registered");
    });

    it('should return undefined from tryResolve', () => {
      container.registerScoped(UnitOfWork);

      container.createScope((scope) => {
        expect(scope.isRegistered(Database)).toBe(false);
        expect(scope.tryResolve(Database)).toBeUndefined();
        expect(scope.tryResolve(UnitOfWork)).toBe(scope.resolve(UnitOfWork));
      });
    });

    it('should detect cycles between Scoped services', () => {
      container.registerScoped(ScopedA).registerScoped(ScopedB);

      container.createScope((scope) => {
        expect(() => scope.resolve(ScopedA)).toThrowCircularDependency([
          'ScopedA',
          'ScopedB',
          'ScopedA',
        ]);
      });
    });

    it('should reject resolution after disposal', () => {
      container.registerScoped(UnitOfWork);
      const scope = container.openScope();
      scope.dispose();

      const error = catchError(() => scope.resolve(UnitOfWork), ScopeDisposedError);

      expect(error.message).toBe("Cannot resolve 'UnitOfWork' from a disposed scope");
      expect(scope.isDisposed()).toBe(true);
    });
  });

  describe('dispose', () => {
    it('should dispose Scoped instances when createScope returns', () => {
      container.registerScoped(UnitOfWork);

      const uow = container.createScope((scope) => scope.resolve(UnitOfWork));

      expect(uow.disposed).toBe(1);
    });

    it('should dispose Scoped instances when the work throws', () => {
      container.registerScoped(UnitOfWork);
      const captured: { uow?: UnitOfWork } = {};

      expect(() =>
        container.createScope((scope) => {
          captured.uow = scope.resolve(UnitOfWork);
          throw new Error('handler failed');
        }),
      ).toThrow('handler failed');

      expect(captured.uow?.disposed).toBe(1);
    });

    it('should dispose in reverse creation order', () => {
      container.registerScoped(FirstResource).registerScoped(SecondResource);

      container.createScope((scope) => {
        scope.resolve(FirstResource);
        scope.resolve(SecondResource);
      });

      expect(disposalLog).toEqual(['second', 'first']);
    });

    it('should prefer dispose() over close()', () => {
      container.registerScoped(DualResource);

      container.createScope((scope) => scope.resolve(DualResource));

      expect(disposalLog).toEqual(['dispose']);
    });

    it('should be idempotent', () => {
      container.registerScoped(UnitOfWork);
      const scope = container.openScope();
      const uow = scope.resolve(UnitOfWork);

      scope.dispose();
      scope.dispose();

      expect(uow.disposed).toBe(1);
    });

    it('should not dispose Transients or Singletons', () => {
      container.registerTransient(UnitOfWork);

      const uow = container.createScope((scope) => scope.resolve(UnitOfWork));

      expect(uow.disposed).toBe(0);
    });

    it('should visit every instance before rethrowing the first error', () => {
      container.registerScoped(UnitOfWork).registerScoped(FailingResource);
      const scope = container.openScope();
      const uow = scope.resolve(UnitOfWork);
      scope.resolve(FailingResource);

      expect(() => scope.dispose()).toThrow('disk full');
      expect(uow.disposed).toBe(1);
      expect(scope.isDisposed()).toBe(true);
      expect(() => scope.dispose()).not.toThrow();
    });

    it('should log errors after the first as warnings', () => {
      const logger = createMockLogger();
      const logged = new Container({ logger });
      logged.registerScoped(FailingResource).registerScoped(AnotherFailingResource);
      const scope = logged.openScope();
      scope.resolve(FailingResource);
      scope.resolve(AnotherFailingResource);

      expect(() => scope.dispose()).toThrow('socket closed');
      expect(logger.warn).toHaveBeenCalledTimes(1);
      expect(logger.warn).toHaveBeenCalledWith(
        'Additional error while disposing scope',
        expect.objectContaining({ message: 'disk full' }),
      );
    });

    it('should warn when a cleanup method returns a promise', () => {
      const logger = createMockLogger();
      const logged = new Container({ logger });
      logged.registerScoped(AsyncConnection);

      logged.createScope((scope) => scope.resolve(AsyncConnection));

      expect(logger.warn).toHaveBeenCalledWith(
        'Scoped instance returned a promise from its cleanup method; use disposeAsync() to await it',
      );
    });

    it('should log rejected promises from synchronous disposal', async () => {
      const logger = createMockLogger();
      const logged = new Container({ logger });
      logged.registerScoped(RejectingConnection);

      logged.createScope((scope) => scope.resolve(RejectingConnection));
      await new Promise((resolve) => setImmediate(() => resolve(undefined)));

      expect(logger.error).toHaveBeenCalledWith(
        'Asynchronous scoped instance cleanup failed',
        expect.objectContaining({ message: 'already closed' }),
      );
    });
  });

  describe('disposeAsync', () => {
    it('should await async cleanup methods', async () => {
      container.registerScoped(AsyncConnection);
      const scope = container.openScope();
      const connection = scope.resolve(AsyncConnection);

      await scope.disposeAsync();

      expect(connection.closed).toBe(true);
    });

    it('should reject with the first cleanup error', async () => {
      container.registerScoped(UnitOfWork).registerScoped(RejectingConnection);
      const scope = container.openScope();
      const uow = scope.resolve(UnitOfWork);
      scope.resolve(RejectingConnection);

      await expect(scope.disposeAsync()).rejects.toThrow('already closed');
      expect(uow.disposed).toBe(1);
    });
  });

  describe('createScopeAsync', () => {
    it('should await the work, then dispose the scope', async () => {
      container.registerScoped(AsyncConnection);

      const connection = await container.createScopeAsync(async (scope) =>
        scope.resolve(AsyncConnection),
      );

      expect(connection.closed).toBe(true);
    });

    it('should dispose the scope when the work rejects', async () => {
      container.registerScoped(UnitOfWork);
      const captured: { uow?: UnitOfWork } = {};

      await expect(
        container.createScopeAsync(async (scope) => {
          captured.uow = scope.resolve(UnitOfWork);
          throw new Error('request failed');
        }),
      ).rejects.toThrow('request failed');

      expect(captured.uow?.disposed).toBe(1);
    });
  });
});
