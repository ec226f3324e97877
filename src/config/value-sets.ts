// src/config/value-sets.ts

import * as fs from 'fs/promises';
import { z } from 'zod';
import { ConfigurationError } from '../utils/errors.js';

const VALUE_SETS_URL = new URL('../../defaults/value-sets.json', import.meta.url);

const ValueSetsFileSchema = z.record(z.string().min(1), z.array(z.string()));

let valueSetsCache: Map<string, readonly string[]> | null = null;

/**
 * Named allowed-value lists (state and province codes) referenced by `allowedSet`.
 */
export async function loadValueSets(): Promise<ReadonlyMap<string, readonly string[]>> {
  if (valueSetsCache) {
    return valueSetsCache;
  }

  const content = await fs.readFile(VALUE_SETS_URL, 'utf-8');
  const parsed = ValueSetsFileSchema.safeParse(JSON.parse(content));
  if (!parsed.success) {
    throw new ConfigurationError('Invalid value set file', parsed.error.issues.map((issue) => issue.message));
  }

  valueSetsCache = new Map(Object.entries(parsed.data));
  return valueSetsCache;
}
