import { z } from 'zod';
import { readDataFile } from '../utils/data_files.js';

/** Kept when they open a query, even though they are stop words. */
export const LEADING_INTERROGATIVES: ReadonlySet<string> = new Set([
  'who',
  'what',
  'where',
  'when',
  'why',
  'how',
  'which',
]);

let stopWords: ReadonlySet<string> | null = null;

export function getStopWords(): ReadonlySet<string> {
  if (!stopWords) {
    stopWords = new Set(readDataFile('stop_words.json', z.array(z.string().min(1))));
  }
  return stopWords;
}

export function isStopWord(token: string): boolean {
  return getStopWords().has(token);
}
