import { normalizationSchema } from '@rdg-mapper/core';
import type {
  Attributes,
  Candidate,
  GlossaryEntry,
  IGlossarySource,
  NormalizationConfig,
  SourceRecord,
} from '@rdg-mapper/core';
import { Normalizer } from '../src/normalization/normalizer.js';

/** Glossary source serving a replaceable in-memory list */
export class InMemoryGlossarySource implements IGlossarySource {
  readonly name = 'memory';
  loads = 0;
  failures: Error[] = [];
  private entries: GlossaryEntry[];

  constructor(entries: GlossaryEntry[]) {
    this.entries = entries;
  }

  setEntries(entries: GlossaryEntry[]): void {
    this.entries = entries;
  }

  /** Queue errors thrown by the next loads, in order */
  failNext(...errors: Error[]): void {
    this.failures.push(...errors);
  }

  async loadGlossary(): Promise<GlossaryEntry[]> {
    this.loads++;
    const failure = this.failures.shift();
    if (failure) throw failure;
    return this.entries.map((e) => ({ id: e.id, attributes: { ...e.attributes } }));
  }
}

export function entry(id: string, name: string, extra: Attributes = {}): GlossaryEntry {
  return { id, attributes: { name, ...extra } };
}

export function record(sourceId: string, name: string, extra: Partial<SourceRecord> = {}): SourceRecord {
  return { sourceId, attributes: { name }, ...extra };
}

export function makeNormalizer(config: Partial<NormalizationConfig> = {}): Normalizer {
  return new Normalizer(normalizationSchema.parse(config));
}

/** Candidate against a bare entity, for rule tests */
export function candidate(id: string, score: number): Candidate {
  return {
    entity: { id, attributes: {}, normalizedKey: id.toLowerCase(), normalizedFields: {} },
    score,
    matchedOn: ['name'],
  };
}

/** Captures logger output as parsed json lines */
export function captureLines(): { lines: string[]; write: (line: string) => void; messages: () => string[] } {
  const lines: string[] = [];
  return {
    lines,
    write: (line: string) => {
      lines.push(line);
    },
    messages: () =>
      lines.map((line) => {
        const parsed: unknown = JSON.parse(line);
        return typeof parsed === 'object' && parsed !== null && 'msg' in parsed && typeof parsed.msg === 'string'
          ? parsed.msg
          : '';
      }),
  };
}
