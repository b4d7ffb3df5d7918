/**
 * Reference Index snapshot
 *
 * Immutable, generation-stamped view of the glossary: an exact map from
 * normalized key to entities plus a character-trigram inverted index for
 * approximate candidate lookup. Built once, never mutated, shared by every
 * worker that pinned it.
 */

import { DuplicateIdError, EmptyGlossaryError } from '@rdg-mapper/core';
import type { EntityId, GlossaryEntry, ReferenceEntity } from '@rdg-mapper/core';
import { gramOverlap, keyNgrams } from '@rdg-mapper/entity-resolution/blocking';
import type { Normalizer } from '../normalization/normalizer.js';

/** Approximate candidate with its trigram overlap score */
export interface ApproximateCandidate {
  readonly entity: ReferenceEntity;
  readonly approxScore: number;
}

export interface IndexSnapshotOptions {
  generationId: number;
  /** Build timestamp (default: now) */
  builtAt?: Date;
}

function compareIds(a: EntityId, b: EntityId): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Turn a raw glossary entry into a frozen reference entity
 */
export function toReferenceEntity(entry: GlossaryEntry, normalizer: Normalizer): ReferenceEntity {
  return Object.freeze({
    id: entry.id,
    attributes: Object.freeze({ ...entry.attributes }),
    normalizedKey: normalizer.normalize(entry.attributes),
    normalizedFields: Object.freeze({ ...normalizer.normalizeFields(entry.attributes) }),
  });
}

export class IndexSnapshot {
  readonly generationId: number;
  readonly builtAt: Date;

  private readonly byId: ReadonlyMap<EntityId, ReferenceEntity>;
  private readonly exact: ReadonlyMap<string, readonly ReferenceEntity[]>;
  private readonly postings: ReadonlyMap<string, readonly ReferenceEntity[]>;
  private readonly grams: ReadonlyMap<EntityId, ReadonlySet<string>>;

  private constructor(
    generationId: number,
    builtAt: Date,
    byId: Map<EntityId, ReferenceEntity>,
    exact: Map<string, ReferenceEntity[]>,
    postings: Map<string, ReferenceEntity[]>,
    grams: Map<EntityId, ReadonlySet<string>>
  ) {
    this.generationId = generationId;
    this.builtAt = builtAt;
    this.byId = byId;
    this.exact = exact;
    this.postings = postings;
    this.grams = grams;
    Object.freeze(this);
  }

  /**
   * Build a snapshot from normalized entities.
   *
   * @throws EmptyGlossaryError when there are no entities
   * @throws DuplicateIdError when two entities share an id
   */
  static build(entities: readonly ReferenceEntity[], options: IndexSnapshotOptions): IndexSnapshot {
    if (entities.length === 0) {
      throw new EmptyGlossaryError({ generationId: options.generationId });
    }

    const byId = new Map<EntityId, ReferenceEntity>();
    for (const entity of entities) {
      if (byId.has(entity.id)) {
        throw new DuplicateIdError(entity.id, { generationId: options.generationId });
      }
      byId.set(entity.id, Object.isFrozen(entity) ? entity : Object.freeze({ ...entity }));
    }

    // Id order makes every bucket and posting list deterministic
    const ordered = [...byId.values()].sort((a, b) => compareIds(a.id, b.id));

    const exact = new Map<string, ReferenceEntity[]>();
    const postings = new Map<string, ReferenceEntity[]>();
    const grams = new Map<EntityId, ReadonlySet<string>>();

    for (const entity of ordered) {
      if (entity.normalizedKey.length === 0) continue;

      const bucket = exact.get(entity.normalizedKey);
      if (bucket) bucket.push(entity);
      else exact.set(entity.normalizedKey, [entity]);

      const entityGrams = keyNgrams(entity.normalizedKey);
      grams.set(entity.id, entityGrams);
      for (const gram of entityGrams) {
        const list = postings.get(gram);
        if (list) list.push(entity);
        else postings.set(gram, [entity]);
      }
    }

    for (const list of exact.values()) Object.freeze(list);
    for (const list of postings.values()) Object.freeze(list);

    return new IndexSnapshot(
      options.generationId,
      options.builtAt ?? new Date(),
      byId,
      exact,
      postings,
      grams
    );
  }

  get size(): number {
    return this.byId.size;
  }

  has(id: EntityId): boolean {
    return this.byId.has(id);
  }

  get(id: EntityId): ReferenceEntity | undefined {
    return this.byId.get(id);
  }

  /** All entity ids, ascending */
  ids(): EntityId[] {
    return [...this.byId.keys()].sort(compareIds);
  }

  /** Entity whose normalized key equals `key`; the lowest id when several share it */
  lookupExact(key: string): ReferenceEntity | undefined {
    return this.exact.get(key)?.[0];
  }

  /** Every entity whose normalized key equals `key`, ascending id */
  lookupExactAll(key: string): readonly ReferenceEntity[] {
    return this.exact.get(key) ?? [];
  }

  /**
   * Up to `limit` entities sharing at least one key trigram with `key`,
   * by descending trigram overlap, ties by ascending id.
   */
  lookupCandidates(key: string, limit: number): ApproximateCandidate[] {
    if (key.length === 0 || limit < 1) return [];

    const queryGrams = keyNgrams(key);
    const seen = new Map<EntityId, ReferenceEntity>();
    for (const gram of queryGrams) {
      for (const entity of this.postings.get(gram) ?? []) {
        seen.set(entity.id, entity);
      }
    }

    const scored: ApproximateCandidate[] = [];
    for (const entity of seen.values()) {
      const entityGrams = this.grams.get(entity.id);
      if (!entityGrams) continue;
      scored.push({ entity, approxScore: gramOverlap(queryGrams, entityGrams) });
    }

    scored.sort((a, b) => b.approxScore - a.approxScore || compareIds(a.entity.id, b.entity.id));
    return scored.slice(0, limit);
  }
}
