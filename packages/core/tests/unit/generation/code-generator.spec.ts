/**
 * @fileoverview CodeGenerator Unit Tests
 *
 * Tests for the emitted construction program.
 *
 * @license Apache-2.0
 */

import { createHash } from 'node:crypto';

import { describe, it, expect, beforeEach } from 'vitest';

import { RegistrationSetup } from '../../../src/application/registration';
import {
  type ConstructionContext,
  createToken,
  lazy,
  many,
} from '../../../src/domain/registration';
import { GraphResolver } from '../../../src/infrastructure/composition';
import { CodeGenerator, type IGeneratedProgram } from '../../../src/infrastructure/generation';
import { createLogger } from '../../../src/infrastructure/logging/logger';

// ============================================================================
// Test Fixtures
// ============================================================================

const IGreeting = createToken<string>('IGreeting');

class Clock {}

class Service {
  static inject = [Clock] as const;
  constructor(readonly clock: Clock) {}
}

class Greeter {
  static inject = [IGreeting] as const;
  constructor(readonly greeting: string) {}
}

class Report {
  static injectProperties = { clock: Clock } as const;
  clock?: Clock;
}

class Scheduler {
  static inject = [lazy(Clock)] as const;
  constructor(readonly getClock: () => Clock) {}
}

class Dashboard {
  static injectProperties = { greetings: many(IGreeting) } as const;
  greetings?: string[];
}

const greetingFactory = (context: ConstructionContext): string =>
  `hello ${String(context.recipientType)}`;

// ============================================================================
// Tests
// ============================================================================

describe('CodeGenerator', () => {
  let setup: RegistrationSetup;

  const generate = (): IGeneratedProgram => {
    const logger = createLogger('silent');
    const container = new GraphResolver({ logger }).resolve(setup.getRegistrations());
    return new CodeGenerator(logger).generate(container);
  };

  beforeEach(() => {
    setup = new RegistrationSetup();
  });

  it('should emit singleton initialization in dependency order', () => {
    setup.registerSingleton(Clock).register(Service);

    const program = generate();

    expect(program.source).toBe(
      [
        `'use strict';`,
        'class GeneratedConstruction {',
        '  typeClock;',
        '  singletonClock;',
        '  typeService;',
        '',
        '  constructor(fieldValues, context) {',
        '    this.typeClock = fieldValues[0];',
        '    this.typeService = fieldValues[1];',
        '    this.singletonClock = this.createClock();',
        '  }',
        '',
        '  createClock() {',
        '    return new this.typeClock();',
        '  }',
        '',
        '  createService() {',
        '    return new this.typeService(this.singletonClock);',
        '  }',
        '',
        '  getCreateMap() {',
        '    return [',
        '      [() => this.singletonClock],',
        '      [() => this.createService()],',
        '    ];',
        '  }',
        '',
        '  getSingletons() {',
        '    return [this.singletonClock];',
        '  }',
        '}',
        'return GeneratedConstruction;',
        '',
      ].join('\n'),
    );
    expect(program.fieldInitializations).toEqual([
      { kind: 'value', field: 'typeClock', value: Clock },
      { kind: 'value', field: 'typeService', value: Service },
    ]);
    expect(program.services).toEqual([Clock, Service]);
    expect(program.implementationKeys).toEqual([[Clock], [Service]]);
    expect(program.needsContext).toBe(false);
  });

  it('should pass the construction context to methods that need it', () => {
    setup.registerFactory(IGreeting, greetingFactory).register(Greeter);

    const program = generate();

    expect(program.source).toBe(
      [
        `'use strict';`,
        'class GeneratedConstruction {',
        '  factoryIGreeting;',
        '  typeGreeter;',
        '',
        '  constructor(fieldValues, context) {',
        '    this.factoryIGreeting = fieldValues[0];',
        '    this.typeGreeter = fieldValues[1];',
        '  }',
        '',
        '  createGreeter(context) {',
        '    context.enter(this.typeGreeter);',
        '    try {',
        '      return new this.typeGreeter(this.factoryIGreeting(context));',
        '    } finally {',
        '      context.leave();',
        '    }',
        '  }',
        '',
        '  getCreateMap() {',
        '    return [',
        '      [(context) => this.factoryIGreeting(context)],',
        '      [(context) => this.createGreeter(context)],',
        '    ];',
        '  }',
        '',
        '  getSingletons() {',
        '    return [];',
        '  }',
        '}',
        'return GeneratedConstruction;',
        '',
      ].join('\n'),
    );
    expect(program.fieldInitializations[0]).toEqual({
      kind: 'value',
      field: 'factoryIGreeting',
      value: greetingFactory,
    });
    expect(program.needsContext).toBe(true);
  });

  it('should emit a property injection method after the constructor method', () => {
    setup.register(Report).register(Clock);

    const program = generate();

    expect(program.source).toContain(
      [
        '  createReport() {',
        '    return new this.typeReport();',
        '  }',
        '',
        '  propertyInjectionReport() {',
        '    const instance = this.createReport();',
        '    instance.clock = this.createClock();',
        '    return instance;',
        '  }',
      ].join('\n'),
    );
    expect(program.source).toContain('      [() => this.propertyInjectionReport()],');
  });

  it('should build singletons on first use when the graph has lazy edges', () => {
    setup.registerSingleton(Clock).register(Scheduler);

    const program = generate();

    expect(program.source).toBe(
      [
        `'use strict';`,
        'class GeneratedConstruction {',
        '  typeClock;',
        '  singletonClock;',
        '  stateClock;',
        '  reentryClock;',
        '  typeScheduler;',
        '',
        '  constructor(fieldValues, context) {',
        '    this.typeClock = fieldValues[0];',
        '    this.reentryClock = fieldValues[1];',
        '    this.typeScheduler = fieldValues[2];',
        '    this.getSingletonClock();',
        '  }',
        '',
        '  createClock() {',
        '    return new this.typeClock();',
        '  }',
        '',
        '  getSingletonClock() {',
        '    if (this.stateClock === 1) {',
        '      throw this.reentryClock();',
        '    }',
        '    if (this.stateClock !== 2) {',
        '      this.stateClock = 1;',
        '      this.singletonClock = this.createClock();',
        '      this.stateClock = 2;',
        '    }',
        '    return this.singletonClock;',
        '  }',
        '',
        '  createScheduler() {',
        '    return new this.typeScheduler(() => this.getSingletonClock());',
        '  }',
        '',
        '  getCreateMap() {',
        '    return [',
        '      [() => this.getSingletonClock()],',
        '      [() => this.createScheduler()],',
        '    ];',
        '  }',
        '',
        '  getSingletons() {',
        '    return [this.singletonClock];',
        '  }',
        '}',
        'return GeneratedConstruction;',
        '',
      ].join('\n'),
    );
    expect(program.fieldInitializations[1]).toMatchObject({ kind: 'value', field: 'reentryClock' });
  });

  it('should pass the context to collection properties once the container needs it', () => {
    setup.registerFactory('tenant', greetingFactory).register(Dashboard);

    const program = generate();

    expect(program.source).toContain(
      [
        '  propertyInjectionDashboard(context) {',
        '    const instance = this.createDashboard(context);',
        '    instance.greetings = [];',
        '    return instance;',
        '  }',
      ].join('\n'),
    );
    expect(program.source).toContain('      [(context) => this.propertyInjectionDashboard(context)],');
  });

  it('should declare injected singletons as late-bound fields', () => {
    setup.registerInjectedSingleton(IGreeting, { internal: true });

    const program = generate();

    expect(program.source).toContain(
      [
        '  injectedIGreeting;',
        '',
        '  constructor(fieldValues, context) {',
        '    this.injectedIGreeting = fieldValues[0];',
        '  }',
      ].join('\n'),
    );
    expect(program.fieldInitializations).toEqual([
      {
        kind: 'injected',
        field: 'injectedIGreeting',
        key: setup.getRegistrationsFor(IGreeting)[0]?.implementationKey,
        serviceType: IGreeting,
      },
    ]);
    expect(program.services).toEqual([]);
  });

  it('should produce identical text and hash for the same registrations', () => {
    setup
      .registerSingleton(Clock)
      .register(Service)
      .registerFactory(IGreeting, greetingFactory)
      .register(Greeter);

    const first = generate();
    const second = generate();

    expect(second.source).toBe(first.source);
    expect(second.hash).toBe(first.hash);
    expect(first.hash).toBe(createHash('sha256').update(first.source).digest('hex'));
  });
});
