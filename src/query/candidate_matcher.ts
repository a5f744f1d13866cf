/**
 * @fileoverview Candidate Matcher
 *
 * Scores index hits for every candidate and keeps the best entity per
 * candidate. Confidence blends three signals:
 * - exact alias equality (case-insensitive) scores 1.0
 * - a fuzzy ratio at or above the threshold weighs string similarity 0.85
 *   and vector similarity 0.15
 * - otherwise vector similarity alone, weighted 0.7
 *
 * Expanded terms are penalized so they never outrank the literal word, and
 * anything under `minConfidence` is rejected.
 */

import type { EmbeddingError } from '../core/errors.js';
import { Ok, type Result } from '../core/result.js';
import type { Candidate, EntityMapping, ResolutionContext, SearchMatch } from '../types.js';
import { clamp01 } from '../utils/math.js';
import { fuzzyRatio } from './fuzzy.js';

export interface EntitySearcher {
  search(
    queries: readonly string[],
    groupFilter: Iterable<string>,
    topK: number,
    maxDistance: number
  ): Promise<Result<SearchMatch[][], EmbeddingError>>;
}

export interface MatchOptions {
  maxDistance: number;
  fuzzyThreshold: number;
  minConfidence: number;
  expandedTermPenalty: number;
  debug?: boolean;
}

export const DEFAULT_MATCH_OPTIONS: MatchOptions = {
  maxDistance: 1.3,
  fuzzyThreshold: 80,
  minConfidence: 0.5,
  expandedTermPenalty: 0.8,
};

const FUZZY_WEIGHT = 0.85;
const FUZZY_VECTOR_WEIGHT = 0.15;
const VECTOR_ONLY_WEIGHT = 0.7;

export interface MatchOutcome {
  /** Input candidates annotated with `matchedEntity` and `confidence`. */
  candidates: Candidate[];
  /** One mapping per matched candidate, highest confidence first. */
  mappings: EntityMapping[];
  context: ResolutionContext;
  trace: string[];
}

/** Cosine distance in [0, 2] mapped to a similarity in [0, 1]. */
export function vectorSimilarity(distance: number): number {
  return Math.max(0, (2 - distance) / 2);
}

/**
 * Confidence of one (candidate, hit) pair before the rejection floor.
 */
export function scoreMatch(
  candidate: Pick<Candidate, 'text' | 'type'>,
  match: Pick<SearchMatch, 'alias' | 'distance'>,
  options: Pick<MatchOptions, 'fuzzyThreshold' | 'expandedTermPenalty'> = DEFAULT_MATCH_OPTIONS
): number {
  let confidence: number;
  if (match.alias.toLowerCase() === candidate.text.toLowerCase()) {
    confidence = 1;
  } else {
    const fuzzy = fuzzyRatio(match.alias, candidate.text);
    const similarity = vectorSimilarity(match.distance);
    confidence =
      fuzzy >= options.fuzzyThreshold
        ? FUZZY_WEIGHT * (fuzzy / 100) + FUZZY_VECTOR_WEIGHT * similarity
        : VECTOR_ONLY_WEIGHT * similarity;
  }
  if (candidate.type === 'expanded_term') {
    confidence *= options.expandedTermPenalty;
  }
  return clamp01(confidence);
}

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export async function matchCandidates(
  candidates: readonly Candidate[],
  includeGroups: readonly string[],
  searcher: EntitySearcher,
  options: Partial<MatchOptions> = {}
): Promise<Result<MatchOutcome, EmbeddingError>> {
  const opts: MatchOptions = { ...DEFAULT_MATCH_OPTIONS, ...options };
  const annotated = candidates.map((c) => ({ ...c }));
  const trace: string[] = [];
  const groups = new Set(includeGroups);

  if (annotated.length === 0 || groups.size === 0) {
    return Ok({ candidates: annotated, mappings: [], context: { dt: [], rdt: [] }, trace });
  }

  const topK = annotated.length * 2;
  const searched = await searcher.search(
    annotated.map((c) => c.text),
    groups,
    topK,
    opts.maxDistance
  );
  if (!searched.ok) return searched;

  const mappings: EntityMapping[] = [];
  const dt = new Set<string>();
  const rdt = new Set<string>();

  annotated.forEach((candidate, i) => {
    let best: { match: SearchMatch; confidence: number } | null = null;
    for (const match of searched.value[i] ?? []) {
      if (!groups.has(match.metadata.group)) continue;
      if (match.distance > opts.maxDistance) continue;
      let confidence = scoreMatch(candidate, match, opts);
      if (confidence < opts.minConfidence) confidence = 0;
      if (confidence > 0 && (!best || confidence > best.confidence)) {
        best = { match, confidence };
      }
    }

    if (!best) {
      if (opts.debug) trace.push(`'${candidate.text}' (${candidate.type}): no match`);
      return;
    }

    const { match, confidence } = best;
    candidate.matchedEntity = match.metadata.canonical;
    candidate.confidence = confidence;
    mappings.push({
      text: candidate.text,
      start: candidate.start,
      end: candidate.end,
      entity: match.metadata.canonical,
      alias: match.alias,
      candidateType: candidate.type,
      priority: candidate.priority,
      confidence,
      distance: match.distance,
      recordType: match.metadata.recordType,
    });
    if (match.metadata.recordType) dt.add(match.metadata.recordType);
    for (const related of splitList(match.metadata.relatedRecordTypes)) rdt.add(related);

    if (opts.debug) {
      trace.push(
        `'${candidate.text}' (${candidate.type}) -> ${match.metadata.canonical} via '${match.alias}' ` +
          `distance=${match.distance.toFixed(3)} confidence=${confidence.toFixed(3)}`
      );
    }
  });

  mappings.sort((a, b) => b.confidence - a.confidence);
  return Ok({ candidates: annotated, mappings, context: { dt: [...dt], rdt: [...rdt] }, trace });
}
