/**
 * @fileoverview Candidate Generator
 *
 * Turns a raw query into position-tagged surface forms to look up, ranked by
 * how specific they are:
 *
 * | priority | type            | source                                   |
 * |----------|-----------------|------------------------------------------|
 * | 1        | `chunk`         | run of content tokens (2+ tokens)         |
 * | 2        | `sub_phrase`    | adjacent content-token pair inside a chunk |
 * | 3        | `word`          | single content token (min length)         |
 * | 4        | `expanded_term` | business-vocabulary expansion of a word  |
 *
 * Offsets always refer to the normalized query.
 */

import { CANDIDATE_PRIORITY, type Candidate, type CandidateType } from '../types.js';
import { BusinessVocabularyExpander, DEFAULT_BUSINESS_DOMAIN, type VocabularyExpander } from './business_vocabulary.js';
import { getStopWords, LEADING_INTERROGATIVES } from './stop_words.js';

// ============================================================================
// TYPES
// ============================================================================

export interface Token {
  text: string;
  start: number;
  end: number;
  /** Position in the token sequence. */
  index: number;
}

export interface Chunk {
  text: string;
  start: number;
  end: number;
  tokens: Token[];
}

export interface CandidateGeneratorOptions {
  /** Filtered-out tokens tolerated between two content tokens of one chunk. */
  maxChunkGap?: number;
  minWordLength?: number;
  stopWords?: ReadonlySet<string>;
  expander?: VocabularyExpander;
}

export interface GenerateOptions {
  businessDomain?: string;
}

export interface CandidateGeneration {
  normalizedQuery: string;
  tokens: Token[];
  chunks: Chunk[];
  /** Distinct word candidates in first-seen order. */
  meaningfulWords: string[];
  /** Word -> its expansions (the word itself excluded). Only words with expansions appear. */
  expandedTerms: Map<string, string[]>;
  candidates: Candidate[];
}

const DEFAULT_MAX_CHUNK_GAP = 1;
const DEFAULT_MIN_WORD_LENGTH = 3;

// Letters, digits, underscore, whitespace, apostrophe and hyphen survive normalization
const DISALLOWED_CHARS = /[^\p{L}\p{N}_\s'-]/gu;

// ============================================================================
// NORMALIZATION
// ============================================================================

export function normalizeQuery(query: string): string {
  return query.toLowerCase().replace(DISALLOWED_CHARS, ' ').replace(/\s+/g, ' ').trim();
}

/**
 * Split a normalized query (single spaces, trimmed) into tokens with offsets.
 */
export function tokenize(normalized: string): Token[] {
  const tokens: Token[] = [];
  if (!normalized) return tokens;
  let offset = 0;
  for (const text of normalized.split(' ')) {
    tokens.push({ text, start: offset, end: offset + text.length, index: tokens.length });
    offset += text.length + 1;
  }
  return tokens;
}

// ============================================================================
// GENERATOR
// ============================================================================

export class CandidateGenerator {
  private readonly maxChunkGap: number;
  private readonly minWordLength: number;
  private readonly stopWords: ReadonlySet<string>;
  private readonly expander: VocabularyExpander;

  constructor(options: CandidateGeneratorOptions = {}) {
    this.maxChunkGap = Math.max(0, options.maxChunkGap ?? DEFAULT_MAX_CHUNK_GAP);
    this.minWordLength = Math.max(1, options.minWordLength ?? DEFAULT_MIN_WORD_LENGTH);
    this.stopWords = options.stopWords ?? getStopWords();
    this.expander = options.expander ?? new BusinessVocabularyExpander().asExpander();
  }

  generate(query: string, options: GenerateOptions = {}): CandidateGeneration {
    const businessDomain = options.businessDomain ?? DEFAULT_BUSINESS_DOMAIN;
    const normalizedQuery = normalizeQuery(query);
    const tokens = tokenize(normalizedQuery);
    const chunks = this.buildChunks(normalizedQuery, tokens);

    const phrases: Candidate[] = [];
    for (const chunk of chunks) {
      if (chunk.tokens.length >= 2) {
        phrases.push(candidate(chunk.text, chunk.start, chunk.end, 'chunk'));
      }
    }
    for (const chunk of chunks) {
      for (let i = 0; i + 1 < chunk.tokens.length; i += 1) {
        const first = chunk.tokens[i];
        const second = chunk.tokens[i + 1];
        if (!first || !second) continue;
        phrases.push(candidate(normalizedQuery.slice(first.start, second.end), first.start, second.end, 'sub_phrase'));
      }
    }

    const words: Candidate[] = [];
    const firstSpan = new Map<string, Token>();
    for (const chunk of chunks) {
      for (const token of chunk.tokens) {
        if (token.text.length < this.minWordLength) continue;
        words.push(candidate(token.text, token.start, token.end, 'word'));
        if (!firstSpan.has(token.text)) firstSpan.set(token.text, token);
      }
    }

    const meaningfulWords = Array.from(firstSpan.keys());
    const expandedTerms = new Map<string, string[]>();
    const expansions: Candidate[] = [];
    for (const [word, token] of firstSpan) {
      const terms = this.expander(word, businessDomain).filter((term) => term !== word);
      if (terms.length === 0) continue;
      expandedTerms.set(word, terms);
      for (const term of terms) {
        expansions.push({ ...candidate(term, token.start, token.end, 'expanded_term'), sourceWord: word });
      }
    }

    return {
      normalizedQuery,
      tokens,
      chunks,
      meaningfulWords,
      expandedTerms,
      candidates: [...dropOverlappingPhrases(phrases), ...words, ...expansions],
    };
  }

  /**
   * Content tokens are grouped into chunks; up to `maxChunkGap` filtered
   * tokens may sit between two content tokens of the same chunk.
   */
  private buildChunks(normalizedQuery: string, tokens: readonly Token[]): Chunk[] {
    const chunks: Chunk[] = [];
    let current: Token[] = [];
    let gap = 0;

    const close = (): void => {
      const first = current[0];
      const last = current[current.length - 1];
      if (first && last) {
        chunks.push({ text: normalizedQuery.slice(first.start, last.end), start: first.start, end: last.end, tokens: current });
      }
      current = [];
      gap = 0;
    };

    for (const token of tokens) {
      if (this.isRetained(token)) {
        current.push(token);
        gap = 0;
        continue;
      }
      if (current.length === 0) continue;
      gap += 1;
      if (gap > this.maxChunkGap) close();
    }
    close();
    return chunks;
  }

  private isRetained(token: Token): boolean {
    if (token.index === 0 && LEADING_INTERROGATIVES.has(token.text)) return true;
    return !this.stopWords.has(token.text);
  }
}

function candidate(text: string, start: number, end: number, type: CandidateType): Candidate {
  return { text, start, end, type, priority: CANDIDATE_PRIORITY[type], confidence: 0 };
}

/**
 * Keep phrases in generation order, dropping any whose span overlaps one
 * already kept.
 */
export function dropOverlappingPhrases(phrases: readonly Candidate[]): Candidate[] {
  const kept: Candidate[] = [];
  for (const phrase of phrases) {
    const overlaps = kept.some((used) => !(phrase.end <= used.start || phrase.start >= used.end));
    if (!overlaps) kept.push(phrase);
  }
  return kept;
}

/**
 * Candidates for `query` with the default generator settings.
 */
export function generateCandidates(
  query: string,
  options: GenerateOptions = {},
  generator: CandidateGenerator = new CandidateGenerator()
): Candidate[] {
  return generator.generate(query, options).candidates;
}
