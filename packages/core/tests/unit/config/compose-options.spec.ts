/**
 * @fileoverview Compose Options Unit Tests
 *
 * @license Apache-2.0
 */

import { describe, it, expect, vi } from 'vitest';

import { ArgumentInvalidError } from '../../../src/domain/composition';
import {
  DEFAULT_SOURCE_NAME,
  parseComposeOptions,
} from '../../../src/infrastructure/config/compose-options';

describe('parseComposeOptions', () => {
  it('should apply defaults', () => {
    vi.stubEnv('EMITWIRE_LOG_LEVEL', '');

    expect(parseComposeOptions()).toEqual({
      logLevel: 'warn',
      cacheCompilations: true,
      sourceName: DEFAULT_SOURCE_NAME,
    });
  });

  it('should read the log level from the environment', () => {
    vi.stubEnv('EMITWIRE_LOG_LEVEL', 'DEBUG');

    expect(parseComposeOptions().logLevel).toBe('debug');
  });

  it('should prefer an explicit log level over the environment', () => {
    vi.stubEnv('EMITWIRE_LOG_LEVEL', 'debug');

    expect(parseComposeOptions({ logLevel: 'error' }).logLevel).toBe('error');
  });

  it('should accept level aliases', () => {
    expect(parseComposeOptions({ logLevel: 'WARNING' }).logLevel).toBe('warn');
    expect(parseComposeOptions({ logLevel: 'err' }).logLevel).toBe('error');
    expect(parseComposeOptions({ logLevel: 'information' }).logLevel).toBe('info');
  });

  it('should keep explicit values', () => {
    expect(
      parseComposeOptions({ logLevel: 'silent', cacheCompilations: false, sourceName: 'app-di.js' }),
    ).toEqual({ logLevel: 'silent', cacheCompilations: false, sourceName: 'app-di.js' });
  });

  it('should reject an unknown log level', () => {
    expect(() => parseComposeOptions({ logLevel: 'loud' })).toThrow(ArgumentInvalidError);
    expect(() => parseComposeOptions({ logLevel: 'loud' })).toThrow(
      /^Invalid argument 'options': logLevel: /,
    );
  });

  it('should reject an empty source name', () => {
    expect(() => parseComposeOptions({ logLevel: 'warn', sourceName: '' })).toThrow(
      "Invalid argument 'options': sourceName: String must contain at least 1 character(s)",
    );
  });
});
