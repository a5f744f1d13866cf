/**
 * @fileoverview Shared domain types for entity resolution.
 */

// ============================================================================
// ENTITIES (owned by the record-storage collaborator)
// ============================================================================

/** Group row shape used by child tables of the record-storage layer. */
export interface EntityGroupRow {
  entityGroup: string;
}

/**
 * Snapshot of one entity as delivered on create/update/delete events.
 * Only `canonicalName` is required; everything else is normalized on sync.
 */
export interface EntitySnapshot {
  canonicalName: string;
  /** Comma-joined alias list. */
  aliases?: string | null;
  groups?: ReadonlyArray<string | EntityGroupRow> | null;
  recordType?: string | null;
  relatedRecordTypes?: readonly string[] | null;
}

export const DEFAULT_ENTITY_GROUP = 'Default';

// ============================================================================
// INDEX RECORDS
// ============================================================================

/**
 * Persisted metadata. Every field is a plain string; absent values are stored
 * as `''` and lists as comma-joined strings.
 */
export interface IndexMetadata {
  readonly canonical: string;
  readonly alias: string;
  readonly group: string;
  readonly recordType: string;
  readonly relatedRecordTypes: string;
}

/** One record per (group, canonical, alias); `id = group::canonical::alias`. */
export interface IndexRecord {
  readonly id: string;
  readonly vector: Float32Array;
  readonly metadata: IndexMetadata;
}

export interface SearchMatch {
  recordId: string;
  alias: string;
  metadata: IndexMetadata;
  /** Cosine distance in [0, 2]; 0.0 for exact alias hits. */
  distance: number;
  exact: boolean;
}

export interface IndexStats {
  totalRecords: number;
  vectorDimension: number;
  perGroupCounts: Record<string, number>;
  usingApproximate: boolean;
}

// ============================================================================
// CANDIDATES
// ============================================================================

export type CandidateType = 'chunk' | 'sub_phrase' | 'word' | 'expanded_term';
export type CandidatePriority = 1 | 2 | 3 | 4;

export const CANDIDATE_PRIORITY: Record<CandidateType, CandidatePriority> = {
  chunk: 1,
  sub_phrase: 2,
  word: 3,
  expanded_term: 4,
};

export interface Candidate {
  text: string;
  /** Offsets into the normalized query. */
  start: number;
  end: number;
  type: CandidateType;
  priority: CandidatePriority;
  /** The literal query word an `expanded_term` came from. */
  sourceWord?: string;
  matchedEntity?: string;
  confidence: number;
}

// ============================================================================
// RESOLUTION OUTPUT
// ============================================================================

export interface EntityMapping {
  text: string;
  start: number;
  end: number;
  /** Canonical entity name. */
  entity: string;
  alias: string;
  candidateType: CandidateType;
  priority: CandidatePriority;
  confidence: number;
  distance: number;
  recordType: string;
}

/** Record types (`dt`) and related record types (`rdt`) of resolved entities. */
export interface ResolutionContext {
  dt: string[];
  rdt: string[];
}
