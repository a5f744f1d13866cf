/**
 * @fileoverview Business vocabulary expansion
 *
 * Maps everyday query words ("sold", "paid", "shipped") to the business
 * terms an entity is more likely to be named by ("sales order", "payment
 * entry", "delivery note"). A general map applies to every domain; an
 * industry map adds terms for one business domain.
 */

import { z } from 'zod';
import { readDataFile } from '../utils/data_files.js';

export type ExpansionMap = Readonly<Record<string, readonly string[]>>;

export interface BusinessVocabulary {
  general: ExpansionMap;
  industries: Readonly<Record<string, ExpansionMap>>;
}

/** `(word, domain) -> terms`, the word itself first. */
export type VocabularyExpander = (word: string, businessDomain: string) => string[];

const ExpansionMapSchema = z.record(z.array(z.string().min(1)));
const BusinessVocabularySchema = z.object({
  general: ExpansionMapSchema,
  industries: z.record(ExpansionMapSchema),
});

export const DEFAULT_BUSINESS_DOMAIN = 'general';

export function loadBusinessVocabulary(fileName: string = 'business_vocabulary.json'): BusinessVocabulary {
  return readDataFile(fileName, BusinessVocabularySchema);
}

function lookup<T>(map: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.hasOwn(map, key) ? map[key] : undefined;
}

export class BusinessVocabularyExpander {
  constructor(private readonly vocabulary: BusinessVocabulary = loadBusinessVocabulary()) {}

  /**
   * The word followed by its general and industry expansions, de-duplicated
   * in first-seen order. Lookup is case-insensitive; the word keeps its case.
   */
  expandWord(word: string, businessDomain: string = DEFAULT_BUSINESS_DOMAIN): string[] {
    const key = word.toLowerCase();
    const terms = [word, ...(lookup(this.vocabulary.general, key) ?? [])];
    const industry = lookup(this.vocabulary.industries, businessDomain);
    if (industry) {
      terms.push(...(lookup(industry, key) ?? []));
    }
    return Array.from(new Set(terms));
  }

  /**
   * Words that have at least one expansion, mapped to their full term list.
   */
  expandQueryTerms(words: readonly string[], businessDomain: string = DEFAULT_BUSINESS_DOMAIN): Map<string, string[]> {
    const expansions = new Map<string, string[]>();
    for (const word of words) {
      const expanded = this.expandWord(word, businessDomain);
      if (expanded.length > 1) expansions.set(word, expanded);
    }
    return expansions;
  }

  /** Every expansion term across all maps, sorted. */
  getAllBusinessTerms(): string[] {
    const all = new Set<string>();
    const maps = [this.vocabulary.general, ...Object.values(this.vocabulary.industries)];
    for (const map of maps) {
      for (const terms of Object.values(map)) {
        for (const term of terms) all.add(term);
      }
    }
    return Array.from(all).sort();
  }

  getDomains(): string[] {
    return [DEFAULT_BUSINESS_DOMAIN, ...Object.keys(this.vocabulary.industries)];
  }

  /** The expander as a plain function, for injection into the generator. */
  asExpander(): VocabularyExpander {
    return (word, businessDomain) => this.expandWord(word, businessDomain);
  }
}
