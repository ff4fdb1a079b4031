/**
 * @fileoverview Service Identifier Unit Tests
 *
 * Tests for dependency markers, static declarations and naming helpers.
 *
 * @license Apache-2.0
 */

import { describe, it, expect } from 'vitest';

import {
  CONSTRUCTION_CONTEXT,
  createToken,
  getDependencyName,
  getInjectProperties,
  getInjectSignatures,
  getQualifiedName,
  getServiceName,
  getSimpleName,
  isDependency,
  isServiceIdentifier,
  lazy,
  many,
} from '../../../src/domain/registration';

// ============================================================================
// Test Fixtures
// ============================================================================

const IClock = createToken<{ now(): number }>('IClock');
const IMailer = createToken<{ send(to: string): void }>('IMailer');

class Plain {}

class WithInject {
  static inject = [IClock, many(IMailer)] as const;
}

class WithSignatures {
  static injectSignatures = [[IClock], [IClock, IMailer]] as const;
}

class WithProperties {
  static injectProperties = { clock: IClock, mailers: many(IMailer) };
}

class Qualified {
  static qualifiedName = 'Billing.Invoice';
}

// ============================================================================
// Tests
// ============================================================================

describe('service identifiers', () => {
  describe('isServiceIdentifier', () => {
    it('should accept constructors, symbols and non-empty strings', () => {
      expect(isServiceIdentifier(Plain)).toBe(true);
      expect(isServiceIdentifier(IClock)).toBe(true);
      expect(isServiceIdentifier('db.connection')).toBe(true);
    });

    it('should reject empty strings and non-identifiers', () => {
      expect(isServiceIdentifier('')).toBe(false);
      expect(isServiceIdentifier(null)).toBe(false);
      expect(isServiceIdentifier(42)).toBe(false);
    });
  });

  describe('dependency markers', () => {
    it('should build many and lazy markers', () => {
      expect(many(IClock)).toEqual({ kind: 'many', serviceType: IClock });
      expect(lazy(Plain)).toEqual({ kind: 'lazy', serviceType: Plain });
    });

    it('should recognise markers and identifiers as dependencies', () => {
      expect(isDependency(many(IClock))).toBe(true);
      expect(isDependency(CONSTRUCTION_CONTEXT)).toBe(true);
      expect(isDependency({ kind: 'eager', serviceType: IClock })).toBe(false);
      expect(isDependency({ kind: 'many', serviceType: '' })).toBe(false);
    });
  });

  describe('static declarations', () => {
    it('should give a parameterless signature to a class without declarations', () => {
      expect(getInjectSignatures(Plain)).toEqual([[]]);
    });

    it('should read static inject as the only signature', () => {
      expect(getInjectSignatures(WithInject)).toEqual([[IClock, { kind: 'many', serviceType: IMailer }]]);
    });

    it('should read alternative signatures in declaration order', () => {
      expect(getInjectSignatures(WithSignatures)).toEqual([[IClock], [IClock, IMailer]]);
    });

    it('should read injected properties in key order', () => {
      expect(getInjectProperties(WithProperties)).toEqual([
        ['clock', IClock],
        ['mailers', { kind: 'many', serviceType: IMailer }],
      ]);
      expect(getInjectProperties(Plain)).toEqual([]);
    });
  });

  describe('naming', () => {
    it('should name services for messages', () => {
      expect(getServiceName(Plain)).toBe('Plain');
      expect(getServiceName(IClock)).toBe('Symbol(IClock)');
      expect(getServiceName('db.connection')).toBe('db.connection');
      expect(getServiceName(Qualified)).toBe('Billing.Invoice');
    });

    it('should name dependency shapes', () => {
      expect(getDependencyName(many(Plain))).toBe('many(Plain)');
      expect(getDependencyName(lazy(Plain))).toBe('lazy(Plain)');
      expect(getDependencyName(CONSTRUCTION_CONTEXT)).toBe('ConstructionContext');
    });

    it('should derive simple and qualified names', () => {
      expect(getSimpleName(Qualified)).toBe('Qualified');
      expect(getQualifiedName(Qualified)).toBe('Billing.Invoice');
      expect(getSimpleName(IClock)).toBe('IClock');
      expect(getQualifiedName(IClock)).toBe('IClock');
      expect(getSimpleName('db.connection')).toBe('connection');
      expect(getQualifiedName('db.connection')).toBe('db.connection');
    });
  });
});
