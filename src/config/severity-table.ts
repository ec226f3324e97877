// src/config/severity-table.ts

import * as fs from 'fs/promises';
import * as YAML from 'yaml';
import { z } from 'zod';
import { SeveritySchema, SeverityTable } from './schema.js';
import { ConfigurationError } from '../utils/errors.js';
import type { Severity } from '../validators/types.js';

const DEFAULT_TABLE_URL = new URL('../../defaults/severity-table.yml', import.meta.url);

const SeverityTableFileSchema = z.record(z.string().min(1), SeveritySchema);

let defaultTableCache: SeverityTable | null = null;

/**
 * Loads the shipped rule id → severity table.
 */
export async function loadDefaultSeverityTable(): Promise<SeverityTable> {
  if (defaultTableCache) {
    return defaultTableCache;
  }

  const content = await fs.readFile(DEFAULT_TABLE_URL, 'utf-8');
  const parsed = SeverityTableFileSchema.safeParse(YAML.parse(content) ?? {});
  if (!parsed.success) {
    throw new ConfigurationError(
      'Invalid default severity table',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  defaultTableCache = new Map(Object.entries(parsed.data));
  return defaultTableCache;
}

/**
 * Later tables win. Entry order is kept for display.
 */
export function mergeSeverityTables(...tables: Array<Iterable<readonly [string, Severity]>>): SeverityTable {
  const merged = new Map<string, Severity>();
  for (const table of tables) {
    for (const [ruleId, severity] of table) {
      merged.set(ruleId, severity);
    }
  }
  return merged;
}
