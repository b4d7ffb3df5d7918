import type { IResultSink, MappingResult, StoreOutcome } from '@rdg-mapper/core';

/**
 * Result sink that keeps every stored result in memory, in arrival order
 */
export class MemoryResultSink implements IResultSink {
  private readonly stored: MappingResult[] = [];

  async store(results: readonly MappingResult[]): Promise<StoreOutcome> {
    this.stored.push(...results);
    return { ok: true, count: results.length };
  }

  get results(): readonly MappingResult[] {
    return this.stored;
  }

  clear(): void {
    this.stored.length = 0;
  }
}
