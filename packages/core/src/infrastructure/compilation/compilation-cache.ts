/**
 * @fileoverview CompilationCache - Compiled Programs by Source Hash
 *
 * @packageDocumentation
 * @module @emitwire/core/infrastructure/compilation
 * @license Apache-2.0
 *
 * @version 1.0.0
 */

import { type GeneratedConstructionClass } from './generated-construction';

/**
 * CompilationCache - Maps a source hash to the class compiled from it.
 *
 * @remarks
 * Generation is deterministic, so equal hashes mean equal programs and the
 * compiled class can be shared. Instances are never shared: each container
 * gets its own, with its own field values.
 */
export class CompilationCache {
  private readonly compiled = new Map<string, GeneratedConstructionClass>();

  get(hash: string): GeneratedConstructionClass | undefined {
    return this.compiled.get(hash);
  }

  set(hash: string, compiledClass: GeneratedConstructionClass): void {
    this.compiled.set(hash, compiledClass);
  }

  has(hash: string): boolean {
    return this.compiled.has(hash);
  }

  clear(): void {
    this.compiled.clear();
  }

  get size(): number {
    return this.compiled.size;
  }
}

let processCache: CompilationCache | undefined;

/**
 * The cache shared by every compiler in the process.
 */
export function getProcessCompilationCache(): CompilationCache {
  processCache ??= new CompilationCache();
  return processCache;
}
