/**
 * @fileoverview RegistrationSetup Unit Tests
 *
 * Tests for the fluent registration builder.
 *
 * @license Apache-2.0
 */

import { describe, it, expect, beforeEach } from 'vitest';

import { RegistrationSetup } from '../../../src/application/registration';
import {
  ArgumentInvalidError,
  CompositionErrorCode,
  ContainerSealedError,
} from '../../../src/domain/composition';
import {
  ServiceLifetime,
  createToken,
  isClassRegistration,
  isFactoryRegistration,
  type IRegistration,
} from '../../../src/domain/registration';

// ============================================================================
// Test Fixtures
// ============================================================================

interface IPluginInterface {
  readonly name: string;
}

const IPlugin = createToken<IPluginInterface>('IPlugin');
const IConnection = createToken<{ close(): void }>('IConnection');

class AuditPlugin implements IPluginInterface {
  readonly name = 'audit';
}

class MetricsPlugin implements IPluginInterface {
  readonly name = 'metrics';
}

class ConfigService {
  port = 3000;
}

// ============================================================================
// Tests
// ============================================================================

describe('RegistrationSetup', () => {
  let setup: RegistrationSetup;

  beforeEach(() => {
    setup = new RegistrationSetup();
  });

  describe('register', () => {
    it('should self-register an implementation class as Transient', () => {
      setup.register(ConfigService);

      const [registration] = setup.getRegistrations();

      expect(registration).toEqual({
        kind: 'class',
        serviceType: ConfigService,
        implementationKey: ConfigService,
        implementationType: ConfigService,
        lifetime: ServiceLifetime.Transient,
        internal: false,
      });
    });

    it('should register a service type to an implementation with options', () => {
      setup.register(IPlugin, MetricsPlugin, { internal: true, lifetime: ServiceLifetime.Singleton });

      const [registration] = setup.getRegistrations();

      expect(registration?.serviceType).toBe(IPlugin);
      expect(registration?.implementationKey).toBe(MetricsPlugin);
      expect(registration?.internal).toBe(true);
      expect(registration?.lifetime).toBe(ServiceLifetime.Singleton);
    });

    it('should accept options for self-registration', () => {
      setup.register(ConfigService, { internal: true });

      expect(setup.getRegistrations()[0]?.internal).toBe(true);
    });

    it('should register singletons through registerSingleton', () => {
      setup.registerSingleton(IPlugin, AuditPlugin);

      expect(setup.getRegistrations()[0]?.lifetime).toBe(ServiceLifetime.Singleton);
    });

    it('should keep every registration of a service type in order', () => {
      setup.register(IPlugin, AuditPlugin).register(IPlugin, MetricsPlugin).register(ConfigService);

      const plugins = setup.getRegistrationsFor(IPlugin);

      expect(plugins.map((registration) => registration.implementationKey)).toEqual([
        AuditPlugin,
        MetricsPlugin,
      ]);
      expect(setup.count).toBe(3);
    });
  });

  describe('factories, values and injected singletons', () => {
    it('should detect whether a factory uses the context', () => {
      setup
        .registerFactory(IPlugin, () => new AuditPlugin())
        .registerFactory('plugin.from-context', (context) => ({ name: String(context.extra) }));

      const [plain, contextual] = setup.getRegistrations();

      expect(plain && isFactoryRegistration(plain) && plain.usesContext).toBe(false);
      expect(contextual && isFactoryRegistration(contextual) && contextual.usesContext).toBe(true);
    });

    it('should key each value by a fresh symbol unless told otherwise', () => {
      setup
        .registerInstance(IPlugin, new AuditPlugin())
        .registerInstance(IPlugin, new AuditPlugin())
        .registerInstance(IPlugin, new MetricsPlugin(), { implementationKey: 'metrics-plugin' });

      const [first, second, explicit] = setup.getRegistrations();

      expect(typeof first?.implementationKey).toBe('symbol');
      expect(first?.implementationKey.toString()).toBe('Symbol(IPlugin)');
      expect(first?.implementationKey).not.toBe(IPlugin);
      expect(first?.implementationKey).not.toBe(second?.implementationKey);
      expect(explicit?.implementationKey).toBe('metrics-plugin');
      expect(first?.lifetime).toBe(ServiceLifetime.Singleton);
    });

    it('should key each factory by a fresh symbol unless told otherwise', () => {
      setup
        .registerFactory(IPlugin, () => new AuditPlugin())
        .registerFactory(IPlugin, () => new MetricsPlugin());

      const [first, second] = setup.getRegistrations();

      expect(first?.implementationKey.toString()).toBe('Symbol(IPlugin)');
      expect(first?.implementationKey).not.toBe(second?.implementationKey);
    });

    it('should register injected singletons with their own lifetime', () => {
      setup.registerInjectedSingleton(IConnection);

      expect(setup.getRegistrations()[0]).toEqual({
        kind: 'injected-singleton',
        serviceType: IConnection,
        implementationKey: expect.any(Symbol),
        lifetime: ServiceLifetime.InjectedSingleton,
        internal: false,
      });
    });
  });

  describe('add', () => {
    it('should accept custom registration kinds', () => {
      const custom: IRegistration = {
        kind: 'clock',
        serviceType: 'clock',
        implementationKey: 'clock',
        lifetime: ServiceLifetime.Singleton,
        internal: false,
      };

      setup.add(custom);

      expect(setup.has('clock')).toBe(true);
      expect(isClassRegistration(custom)).toBe(false);
    });

    it('should reject malformed registrations', () => {
      const malformed: IRegistration = {
        kind: 'class',
        serviceType: '',
        implementationKey: ConfigService,
        lifetime: ServiceLifetime.Transient,
        internal: false,
      };

      expect(() => setup.add(malformed)).toThrow(
        "Invalid argument 'registration.serviceType': must be a constructor, symbol or non-empty string, got ",
      );
    });

    it('should reject invalid static declarations', () => {
      class BrokenService {
        static inject = [IPlugin, 42];
      }

      try {
        setup.register(BrokenService);
        expect.fail('Should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(ArgumentInvalidError);
        expect(error).toMatchObject({
          code: CompositionErrorCode.ArgumentInvalid,
          argumentName: 'inject',
        });
      }
    });
  });

  describe('sealing', () => {
    it('should seal after compose', () => {
      setup.register(ConfigService);
      setup.compose();

      expect(setup.isSealed).toBe(true);
      expect(() => setup.register(AuditPlugin)).toThrow(ContainerSealedError);
    });

    it('should seal after construct', () => {
      setup.register(ConfigService).construct();

      expect(() => setup.registerInstance(IPlugin, new AuditPlugin())).toThrow(ContainerSealedError);
    });
  });
});
