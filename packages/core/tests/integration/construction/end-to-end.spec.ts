/**
 * @fileoverview Construction Integration Tests
 *
 * Registrations go through composition, code generation and compilation,
 * and the resulting container is exercised at runtime.
 *
 * @license Apache-2.0
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';

import { buildContainer } from '../../../src/application/construction';
import { RegistrationSetup } from '../../../src/application/registration';
import {
  AmbiguousDependencyError,
  ContainerDisposedError,
  SingletonReentryError,
} from '../../../src/domain/composition';
import { type IDisposable } from '../../../src/domain/container';
import {
  CONSTRUCTION_CONTEXT,
  type ConstructionContext,
  type ServiceIdentifier,
  createToken,
  lazy,
  many,
} from '../../../src/domain/registration';
import { createLogger } from '../../../src/infrastructure/logging/logger';

// ============================================================================
// Test Fixtures
// ============================================================================

interface IRequest {
  readonly tenant: string;
}

interface IPlugin {
  readonly name: string;
}

interface IConnection {
  readonly url: string;
}

const IPlugin = createToken<IPlugin>('IPlugin');
const IGreeting = createToken<string>('IGreeting');
const IConnection = createToken<IConnection>('IConnection');

const Ns1 = (() => {
  class MyClass1 {
    static qualifiedName = 'Ns1.MyClass1';
  }

  class MyClass2 {
    static qualifiedName = 'Ns1.MyClass2';
    static inject = [MyClass1] as const;
    constructor(readonly first: MyClass1) {}
  }

  class MyClass3 {
    static qualifiedName = 'Ns1.MyClass3';
    static inject = [MyClass1, MyClass2] as const;
    constructor(
      readonly first: MyClass1,
      readonly second: MyClass2,
    ) {}
  }

  return { MyClass1, MyClass2, MyClass3 };
})();

const Ns2 = (() => {
  class MyClass1 {
    static qualifiedName = 'Ns2.MyClass1';
    static inject = [Ns1.MyClass3] as const;
    constructor(readonly third: InstanceType<typeof Ns1.MyClass3>) {}
  }

  class MyClass2 {
    static qualifiedName = 'Ns2.MyClass2';
  }

  return { MyClass1, MyClass2 };
})();

class Clock {}

class Mailer {}

class Service {
  static inject = [Clock] as const;
  constructor(readonly clock: Clock) {}
}

class Notifier {
  static injectSignatures = [[Clock, Mailer], [Clock]] as const;
  constructor(
    readonly clock: Clock,
    readonly mailer?: Mailer,
  ) {}
}

class Greeter {
  static inject = [IGreeting] as const;
  constructor(readonly greeting: string) {}
}

class Audited {
  static inject = [CONSTRUCTION_CONTEXT] as const;
  readonly pathAtConstruction: string;
  readonly tenant: string | undefined;

  constructor(context: ConstructionContext<IRequest>) {
    this.pathAtConstruction = context.describePath();
    this.tenant = context.extra?.tenant;
  }
}

class Repository {
  static inject = [IConnection] as const;
  constructor(readonly connection: IConnection) {}
}

class LazyA {
  // Getter defers the reference to a class declared further down
  static get inject() {
    return [LazyB] as const;
  }
  constructor(readonly b: LazyB) {}
}

class LazyB {
  static inject = [lazy(LazyA)] as const;
  constructor(readonly getA: () => LazyA) {}
}

class AuditPlugin implements IPlugin {
  readonly name = 'audit';
}

class MetricsPlugin implements IPlugin {
  readonly name = 'metrics';
}

class PluginHost {
  static inject = [many(IPlugin)] as const;
  constructor(readonly plugins: IPlugin[]) {}
}

class Report {
  static injectProperties = { clock: Clock } as const;
  clock?: Clock;
}

class Dashboard {
  static injectProperties = { plugins: many(IPlugin) } as const;
  plugins?: IPlugin[];
}

class Settings {}

class SettingsReader {
  static inject = [lazy(Settings)] as const;
  readonly settings: Settings;

  constructor(getSettings: () => Settings) {
    this.settings = getSettings();
  }
}

class EagerA {
  static get inject() {
    return [lazy(EagerB)] as const;
  }
  constructor(getB: () => EagerB) {
    getB();
  }
}

class EagerB {
  static inject = [EagerA] as const;
  constructor(readonly a: EagerA) {}
}

class Pool implements IDisposable {
  closed = false;

  dispose(): void {
    this.closed = true;
  }
}

// ============================================================================
// Tests
// ============================================================================

describe('Container construction', () => {
  let setup: RegistrationSetup<IRequest>;

  beforeEach(() => {
    setup = new RegistrationSetup<IRequest>();
  });

  describe('transient graphs', () => {
    it('should build classes sharing simple names across namespaces', () => {
      setup
        .register(Ns1.MyClass1)
        .register(Ns1.MyClass2)
        .register(Ns1.MyClass3)
        .register(Ns2.MyClass1)
        .register(Ns2.MyClass2);

      const container = setup.construct();
      const third = container.resolve(Ns1.MyClass3);

      expect(third.first).toBeInstanceOf(Ns1.MyClass1);
      expect(third.second).toBeInstanceOf(Ns1.MyClass2);
      expect(third.second.first).toBeInstanceOf(Ns1.MyClass1);
      expect(third.second.first).not.toBe(third.first);

      const root = container.resolve(Ns2.MyClass1);

      expect(root).toBeInstanceOf(Ns2.MyClass1);
      expect(root.third).toBeInstanceOf(Ns1.MyClass3);
      expect(root.third).not.toBe(third);
      expect(container.resolve(Ns2.MyClass1)).not.toBe(root);
    });

    it('should name colliding classes by their qualified names', () => {
      setup
        .register(Ns1.MyClass1)
        .register(Ns1.MyClass2)
        .register(Ns1.MyClass3)
        .register(Ns2.MyClass1)
        .register(Ns2.MyClass2);

      const { source } = setup.generate();

      expect(source).toContain('  createNs1_MyClass1() {');
      expect(source).toContain('  createNs2_MyClass1() {');
      expect(source).toContain('  createNs1_MyClass2() {');
      expect(source).toContain('  createNs2_MyClass2() {');
      expect(source).toContain(
        '    return new this.typeMyClass3(this.createNs1_MyClass1(), this.createNs1_MyClass2());',
      );
      expect(source).toContain('    return new this.typeNs2_MyClass1(this.createMyClass3());');
    });

    it('should pick the longest satisfiable signature', () => {
      setup.register(Clock).register(Notifier);

      const notifier = setup.construct().resolve(Notifier);

      expect(notifier.clock).toBeInstanceOf(Clock);
      expect(notifier.mailer).toBeUndefined();
    });
  });

  describe('singletons', () => {
    it('should share one instance per container', () => {
      setup.registerSingleton(Clock).register(Service);

      const container = setup.construct();
      const first = container.resolve(Service);
      const second = container.resolve(Service);

      expect(first).not.toBe(second);
      expect(first.clock).toBe(second.clock);
      expect(first.clock).toBe(container.resolve(Clock));
    });

    it('should use injected values', () => {
      const connection: IConnection = { url: 'memory://test' };
      setup.registerInjectedSingleton(IConnection).register(Repository);

      const container = setup.construct({ injected: [[IConnection, connection]] });

      expect(container.resolve(Repository).connection).toBe(connection);
    });

    it('should use registered values', () => {
      const connection: IConnection = { url: 'memory://value' };
      setup.registerInstance(IConnection, connection).register(Repository);

      expect(setup.construct().resolve(Repository).connection).toBe(connection);
    });
  });

  describe('construction context', () => {
    it('should tell factories the recipient type and the extra data', () => {
      const recipients: (ServiceIdentifier | undefined)[] = [];
      setup
        .registerFactory(IGreeting, (context) => {
          recipients.push(context.recipientType);
          return `hello ${context.extra?.tenant ?? 'nobody'}`;
        })
        .register(Greeter);

      const container = setup.construct();

      expect(container.resolve(Greeter, { tenant: 'acme' }).greeting).toBe('hello acme');
      expect(container.resolve(IGreeting)).toBe('hello nobody');
      expect(recipients).toEqual([Greeter, undefined]);
    });

    it('should hand the context to constructors that declare it', () => {
      setup.register(Audited);

      const audited = setup.construct().resolve(Audited, { tenant: 'acme' });

      expect(audited.pathAtConstruction).toBe('Audited');
      expect(audited.tenant).toBe('acme');
    });
  });

  describe('lazy dependencies', () => {
    it('should close a cycle through a deferred edge', () => {
      setup.register(LazyA).register(LazyB);

      const a = setup.construct().resolve(LazyA);
      const later = a.b.getA();

      expect(later).toBeInstanceOf(LazyA);
      expect(later).not.toBe(a);
    });

    it('should build a singleton on demand when a lazy edge is called during construction', () => {
      setup.registerSingleton(SettingsReader).registerSingleton(Settings);

      const container = setup.construct();
      const reader = container.resolve(SettingsReader);

      expect(reader.settings).toBeInstanceOf(Settings);
      expect(reader.settings).toBe(container.resolve(Settings));
    });

    it('should reject a lazy edge that reenters a singleton under construction', () => {
      setup.registerSingleton(EagerA).registerSingleton(EagerB);

      try {
        setup.construct();
        expect.fail('Should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(SingletonReentryError);
        expect(error).toMatchObject({
          message:
            "Singleton 'EagerA' was requested through a lazy dependency while it was being constructed. " +
            'Call the lazy dependency after construction instead.',
          resolutionPath: ['EagerA (REENTERED)'],
          serviceIdentifier: EagerA,
        });
      }
    });
  });

  describe('collections', () => {
    it('should include internal registrations in collections only', () => {
      setup
        .register(IPlugin, AuditPlugin)
        .register(IPlugin, MetricsPlugin, { internal: true })
        .register(PluginHost);

      const container = setup.construct();

      expect(container.resolveAll(IPlugin).map((plugin) => plugin.name)).toEqual(['audit']);
      expect(container.resolve(IPlugin).name).toBe('audit');
      expect(container.resolve(PluginHost).plugins.map((plugin) => plugin.name)).toEqual([
        'audit',
        'metrics',
      ]);
    });
  });

  describe('registrations sharing a service type', () => {
    it('should keep every registered value', () => {
      setup
        .registerInstance(IPlugin, { name: 'a' })
        .registerInstance(IPlugin, { name: 'b' })
        .register(PluginHost);

      const container = setup.construct();

      expect(container.resolveAll(IPlugin).map((plugin) => plugin.name)).toEqual(['a', 'b']);
      expect(container.resolve(PluginHost).plugins.map((plugin) => plugin.name)).toEqual(['a', 'b']);
      expect(() => container.resolve(IPlugin)).toThrow(AmbiguousDependencyError);
    });

    it('should keep every registered factory', () => {
      setup
        .registerFactory(IPlugin, () => ({ name: 'f1' }))
        .registerFactory(IPlugin, () => ({ name: 'f2' }))
        .register(PluginHost);

      const container = setup.construct();

      expect(container.resolve(PluginHost).plugins.map((plugin) => plugin.name)).toEqual([
        'f1',
        'f2',
      ]);
    });

    it('should build values registered under one explicit key once', () => {
      setup
        .registerInstance(IPlugin, { name: 'a' }, { implementationKey: 'shared' })
        .registerInstance(IPlugin, { name: 'b' }, { implementationKey: 'shared' })
        .register(PluginHost);

      const container = setup.construct();

      expect(container.resolve(PluginHost).plugins.map((plugin) => plugin.name)).toEqual(['a']);
    });
  });

  describe('property injection', () => {
    it('should assign declared properties after construction', () => {
      setup.registerSingleton(Clock).register(Report);

      const container = setup.construct();

      expect(container.resolve(Report).clock).toBe(container.resolve(Clock));
    });

    it('should assign an empty collection when nothing is registered', () => {
      setup.register(Dashboard);

      expect(setup.construct().resolve(Dashboard).plugins).toEqual([]);
    });

    it('should assign every registration of a collection property', () => {
      const audit: IPlugin = { name: 'audit' };
      const metrics: IPlugin = { name: 'metrics' };
      setup.registerInstance(IPlugin, audit).registerInstance(IPlugin, metrics).register(Dashboard);

      expect(setup.construct().resolve(Dashboard).plugins).toEqual([audit, metrics]);
    });

    it('should assign collection properties when the container passes the context', () => {
      setup
        .registerFactory(IGreeting, (context) => `hello ${context.extra?.tenant ?? 'nobody'}`)
        .register(IPlugin, AuditPlugin)
        .register(Dashboard);

      const dashboard = setup.construct().resolve(Dashboard, { tenant: 'acme' });

      expect(dashboard.plugins?.map((plugin) => plugin.name)).toEqual(['audit']);
    });
  });

  describe('disposal', () => {
    it('should dispose owned singletons', async () => {
      setup.registerSingleton(Pool);

      const container = setup.construct();
      const pool = container.resolve(Pool);
      await container.dispose();

      expect(pool.closed).toBe(true);
      expect(() => container.resolve(Pool)).toThrow(ContainerDisposedError);
    });
  });

  describe('buildContainer()', () => {
    it('should log the constructed container through the given logger', () => {
      const logger = createLogger('silent');
      const info = vi.spyOn(logger, 'info');
      setup.register(Clock);

      const container = buildContainer(setup.getRegistrations(), { logger });

      expect(container.resolve(Clock)).toBeInstanceOf(Clock);
      expect(info).toHaveBeenCalledWith(
        expect.objectContaining({ services: 1 }),
        'Container constructed',
      );
    });
  });
});
