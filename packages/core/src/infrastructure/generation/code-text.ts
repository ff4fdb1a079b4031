/**
 * @fileoverview Code Text - Helpers for Emitting JavaScript Source
 *
 * @packageDocumentation
 * @module @emitwire/core/infrastructure/generation
 * @license Apache-2.0
 *
 * @version 1.0.0
 */

const IDENTIFIER_PATTERN = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

/**
 * Turn an arbitrary name into an identifier fragment.
 *
 * @example
 * ```typescript
 * toIdentifier('Ns1.MyClass1'); // 'Ns1_MyClass1'
 * toIdentifier('2fa-code');     // '_2fa_code'
 * ```
 */
export function toIdentifier(name: string): string {
  const replaced = name.replace(/[^A-Za-z0-9_$]/g, '_');
  if (replaced.length === 0) {
    return '_';
  }
  return /^[0-9]/.test(replaced) ? `_${replaced}` : replaced;
}

/**
 * Member access for a property name: `.name` when it is an identifier,
 * `["name"]` otherwise.
 */
export function formatPropertyAccess(property: string): string {
  return IDENTIFIER_PATTERN.test(property) ? `.${property}` : `[${JSON.stringify(property)}]`;
}

/**
 * Indent every non-empty line of `text` by `level` two-space steps.
 */
export function indent(text: string, level = 1): string {
  const padding = '  '.repeat(level);
  return text
    .split('\n')
    .map((line) => (line.length > 0 ? `${padding}${line}` : line))
    .join('\n');
}
