/**
 * Reference data source interface
 *
 * Implementations pull a complete, self-consistent copy of the glossary.
 */

import type { GlossaryEntry } from '../types/index.js';

export interface IGlossarySource {
  /** Human-readable name used in logs */
  readonly name: string;

  /**
   * Load the full glossary.
   * Must never return a partial glossary: throw instead.
   */
  loadGlossary(): Promise<GlossaryEntry[]>;
}
