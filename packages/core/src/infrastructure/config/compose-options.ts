/**
 * @fileoverview Compose Options - Validated Pipeline Configuration
 *
 * @packageDocumentation
 * @module @emitwire/core/infrastructure/config
 * @license Apache-2.0
 *
 * Options are parsed with zod. The log level falls back to the
 * `EMITWIRE_LOG_LEVEL` environment variable, then to `warn`.
 *
 * @version 1.0.0
 */

import { z } from 'zod';

import { ArgumentInvalidError } from '../../domain/composition';
import { type Logger } from '../logging/logger';

export const DEFAULT_SOURCE_NAME = 'emitwire-generated.js';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const emptyStringAsUndefined = (val: unknown): unknown => {
  if (typeof val === 'string' && val.trim() === '') {
    return undefined;
  }
  return val;
};

const ComposeOptionsSchema = z.object({
  logLevel: z
    .preprocess(
      (val) => {
        const str = emptyStringAsUndefined(val ?? process.env.EMITWIRE_LOG_LEVEL);
        if (typeof str === 'string') {
          const lower = str.toLowerCase();
          const aliasMap: Record<string, string> = {
            warning: 'warn',
            err: 'error',
            information: 'info',
          };
          return aliasMap[lower] ?? lower;
        }
        return str;
      },
      z.enum(LOG_LEVELS).default('warn'),
    ),
  cacheCompilations: z.boolean().default(true),
  sourceName: z.string().min(1).default(DEFAULT_SOURCE_NAME),
});

export type ComposeOptions = z.infer<typeof ComposeOptionsSchema>;

/**
 * Options as callers write them.
 */
export interface IComposeOptionsInput {
  /**
   * pino level name; `warning` and `err` are accepted as aliases.
   */
  logLevel?: string;

  /**
   * Reuse compiled programs with identical source text. Defaults to true.
   */
  cacheCompilations?: boolean;

  /**
   * File name shown in compile diagnostics and stack traces.
   */
  sourceName?: string;

  /**
   * Logger to use instead of creating one at `logLevel`.
   */
  logger?: Logger;
}

/**
 * Parse and validate compose options.
 *
 * @throws ArgumentInvalidError listing every invalid option
 */
export function parseComposeOptions(input: IComposeOptionsInput = {}): ComposeOptions {
  const result = ComposeOptionsSchema.safeParse({
    logLevel: input.logLevel,
    cacheCompilations: input.cacheCompilations,
    sourceName: input.sourceName,
  });

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ArgumentInvalidError('options', issues);
  }

  return result.data;
}
