/**
 * lattice-di - Basic Example
 *
 * Demonstrates the core container concepts:
 * - Auto-wiring from constructor metadata
 * - Singleton, Scoped and Transient lifetimes
 * - Injection tokens for interfaces
 * - Per-request scopes with disposal
 * - Hooks and usage statistics
 */

import 'reflect-metadata';

import {
  Container,
  Injectable,
  Inject,
  Optional,
  InjectionToken,
  ServiceLifetime,
  createHooks,
  getServiceName,
} from '../src';

// ==================== Configuration ====================

interface AppConfig {
  readonly databaseUrl: string;
  readonly greeting: string;
}

const APP_CONFIG = new InjectionToken<AppConfig>('AppConfig');

// ==================== Services ====================

@Injectable({ lifetime: ServiceLifetime.Singleton })
class Database {
  private readonly users = new Map<string, string>();

  constructor(@Inject(APP_CONFIG) readonly config: AppConfig) {
    console.log(`🔌 Connecting to ${config.databaseUrl}`);
  }

  save(id: string, name: string): void {
    this.users.set(id, name);
  }

  find(id: string): string | undefined {
    return this.users.get(id);
  }
}

class MetricsClient {
  increment(name: string): void {
    console.log(`📈 ${name}`);
  }
}

@Injectable({ lifetime: ServiceLifetime.Scoped })
class RequestSession {
  private static counter = 0;
  readonly id = ++RequestSession.counter;

  dispose(): void {
    console.log(`🧹 Session #${this.id} disposed`);
  }
}

@Injectable()
class UserService {
  constructor(
    private readonly db: Database,
    private readonly session: RequestSession,
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    @Optional() private readonly metrics?: MetricsClient,
  ) {}

  register(id: string, name: string): string {
    this.db.save(id, name);
    this.metrics?.increment('users.registered');
    return `${this.config.greeting}, ${name} (session #${this.session.id})`;
  }

  lookup(id: string): string {
    return this.db.find(id) ?? '<unknown>';
  }
}

// ==================== Composition Root ====================

const container = new Container({ name: 'example' })
  .registerInstance(APP_CONFIG, {
    databaseUrl: 'sqlite::memory:',
    greeting: 'Welcome',
  })
  .register(Database)
  .register(RequestSession)
  .register(UserService)
  .addHooks(
    createHooks({
      name: 'creation-log',
      onServiceResolved: (key, _instance, isCached) => {
        if (!isCached) {
          console.log(`✨ Created ${getServiceName(key)}`);
        }
      },
      onResolutionError: (key, error) => {
        console.error(`❌ Failed to resolve ${getServiceName(key)}:`, error);
      },
    }),
  );

// ==================== Run ====================

async function main(): Promise<void> {
  console.log('\n--- Request 1 ---');
  const first = container.createScope((scope) =>
    scope.resolve(UserService).register('u1', 'Ada'),
  );
  console.log(first);

  console.log('\n--- Request 2 ---');
  const second = await container.createScopeAsync(async (scope) => {
    const users = scope.resolve(UserService);
    return `${users.register('u2', 'Grace')} / u1 = ${users.lookup('u1')}`;
  });
  console.log(second);

  console.log('\n--- Stats ---');
  console.log(container.getStats());
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
