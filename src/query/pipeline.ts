/**
 * @fileoverview Resolution Pipeline
 *
 * Single forward pass per query: Generate -> Match -> Assemble. The pipeline
 * holds no per-query state, so one instance serves concurrent callers.
 */

import { ResolutionTimeoutError, type EmbeddingError } from '../core/errors.js';
import { Err, Ok, type Result } from '../core/result.js';
import { logDebug } from '../telemetry/logger.js';
import type { EntityMapping, ResolutionContext } from '../types.js';
import { withTimeout } from '../utils/async.js';
import { DEFAULT_BUSINESS_DOMAIN } from './business_vocabulary.js';
import { CandidateGenerator } from './candidate_generator.js';
import { matchCandidates, type EntitySearcher, type MatchOptions, type MatchOutcome } from './candidate_matcher.js';
import { buildSchemaContext, type SchemaContext, type SchemaGraphProvider } from './schema_context.js';

export type ResolutionError = EmbeddingError | ResolutionTimeoutError;

export interface ResolveOptions {
  entityGroups: readonly string[];
  businessDomain?: string;
  /** Adds a human-readable trace to the diagnostics. No effect on results. */
  debug?: boolean;
}

export interface ResolutionDiagnostics {
  candidatesProcessed: number;
  entitiesFound: number;
  meaningfulWords: string[];
  expandedTerms: Record<string, string[]>;
  trace?: string[];
}

export interface ResolutionResult {
  originalQuery: string;
  normalizedQuery: string;
  entityMappings: EntityMapping[];
  context: ResolutionContext;
  schemaContext?: SchemaContext;
  diagnostics: ResolutionDiagnostics;
}

export interface ResolutionPipelineOptions {
  index: EntitySearcher;
  generator?: CandidateGenerator;
  schemaGraph?: SchemaGraphProvider;
  matching?: Partial<MatchOptions>;
  defaultBusinessDomain?: string;
  /** Wall-clock budget for the match step; 0 disables it. */
  searchBudgetMs?: number;
}

export class ResolutionPipeline {
  private readonly index: EntitySearcher;
  private readonly generator: CandidateGenerator;
  private readonly schemaGraph: SchemaGraphProvider | undefined;
  private readonly matching: Partial<MatchOptions>;
  private readonly defaultBusinessDomain: string;
  private readonly searchBudgetMs: number;

  constructor(options: ResolutionPipelineOptions) {
    this.index = options.index;
    this.generator = options.generator ?? new CandidateGenerator();
    this.schemaGraph = options.schemaGraph;
    this.matching = options.matching ?? {};
    this.defaultBusinessDomain = options.defaultBusinessDomain ?? DEFAULT_BUSINESS_DOMAIN;
    this.searchBudgetMs = options.searchBudgetMs ?? 0;
  }

  async resolve(query: string, options: ResolveOptions): Promise<Result<ResolutionResult, ResolutionError>> {
    const debug = options.debug ?? false;
    const businessDomain = options.businessDomain ?? this.defaultBusinessDomain;
    const trace: string[] = [];

    // Generate
    const generation = this.generator.generate(query, { businessDomain });
    if (debug) {
      trace.push(`normalized query: '${generation.normalizedQuery}'`);
      trace.push(`created ${generation.chunks.length} chunks: ${generation.chunks.map((c) => `'${c.text}'`).join(', ')}`);
      trace.push(`meaningful words: ${generation.meaningfulWords.join(', ')}`);
      for (const [word, terms] of generation.expandedTerms) {
        trace.push(`'${word}' expanded to: ${terms.join(', ')}`);
      }
      trace.push(`generated ${generation.candidates.length} candidates`);
    }

    // Match
    let outcome: MatchOutcome;
    if (options.entityGroups.length === 0 || generation.candidates.length === 0) {
      outcome = { candidates: generation.candidates, mappings: [], context: { dt: [], rdt: [] }, trace: [] };
    } else {
      const budgetMs = this.searchBudgetMs;
      let matched: Result<MatchOutcome, EmbeddingError>;
      try {
        matched = await withTimeout(
          matchCandidates(generation.candidates, options.entityGroups, this.index, { ...this.matching, debug }),
          budgetMs,
          () => new ResolutionTimeoutError(budgetMs)
        );
      } catch (error) {
        if (error instanceof ResolutionTimeoutError) return Err(error);
        throw error;
      }
      if (!matched.ok) return matched;
      outcome = matched.value;
    }
    trace.push(...outcome.trace);
    if (debug) trace.push(`found ${outcome.mappings.length} entity mappings`);

    // Assemble
    const result: ResolutionResult = {
      originalQuery: query,
      normalizedQuery: generation.normalizedQuery,
      entityMappings: outcome.mappings,
      context: outcome.context,
      diagnostics: {
        candidatesProcessed: generation.candidates.length,
        entitiesFound: outcome.mappings.length,
        meaningfulWords: generation.meaningfulWords,
        expandedTerms: Object.fromEntries(generation.expandedTerms),
      },
    };

    if (this.schemaGraph && outcome.context.dt.length > 0) {
      result.schemaContext = await buildSchemaContext(outcome.context.dt, this.schemaGraph);
      if (debug) trace.push(`found ${result.schemaContext.relatedCount ?? 0} related record types`);
    }
    if (debug) result.diagnostics.trace = trace;

    logDebug('Resolved query', {
      candidates: result.diagnostics.candidatesProcessed,
      entities: result.diagnostics.entitiesFound,
    });
    return Ok(result);
  }
}
