/**
 * @fileoverview Loader for the JSON word lists shipped in `data/`.
 *
 * The directory sits two levels above this module both in `src/` and in the
 * compiled `dist/` tree.
 */

import { readFileSync } from 'node:fs';
import type { z } from 'zod';

const DATA_DIR = new URL('../../data/', import.meta.url);

export function readDataFile<T extends z.ZodTypeAny>(fileName: string, schema: T): z.infer<T> {
  const raw: unknown = JSON.parse(readFileSync(new URL(fileName, DATA_DIR), 'utf8'));
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid data file ${fileName}: ${parsed.error.issues[0]?.message ?? 'schema mismatch'}`);
  }
  return parsed.data;
}
