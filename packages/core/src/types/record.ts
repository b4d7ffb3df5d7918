/**
 * Record types shared by glossary sources, the mapping engine and result sinks
 */

/** A scalar attribute value, or a multi-valued attribute */
export type AttributeValue =
  | string
  | number
  | boolean
  | null
  | AttributeValue[];

/** Ordered mapping from attribute name to raw value */
export type Attributes = {
  [name: string]: AttributeValue | undefined;
};

/** RDG entity identifier (opaque, stable, never reused) */
export type EntityId = string;

/** One row as delivered by a glossary source, before normalization */
export interface GlossaryEntry {
  /** RDG unique identifier */
  id: EntityId;
  /** Raw attribute values */
  attributes: Attributes;
}

/** Per-attribute canonical values, in key-attribute order */
export type NormalizedFields = Readonly<{ [attribute: string]: string }>;

/**
 * One row of the Reference Data Glossary.
 *
 * Immutable once built into an index snapshot.
 */
export interface ReferenceEntity {
  readonly id: EntityId;
  readonly attributes: Readonly<Attributes>;
  /** Canonical form used for exact lookup */
  readonly normalizedKey: string;
  readonly normalizedFields: NormalizedFields;
}

/** One record from a source feed, already preprocessed by ingestion */
export interface SourceRecord {
  /** Feed-local identifier (not globally unique) */
  sourceId: string;
  attributes: Attributes;
  /** Category/context used for fallback-id policy */
  category?: string;
  /** Filled in by the engine; callers normally leave it unset */
  normalizedKey?: string;
}
