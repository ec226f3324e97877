// src/config/gate-config-loader.ts

import * as fs from 'fs/promises';
import * as path from 'path';
import * as YAML from 'yaml';
import {
  Bound,
  DEFAULT_NULL_SENTINELS,
  FieldSpec,
  GateConfig,
  GateConfigFile,
  GateConfigFileSchema,
  GateConfigMetadata,
} from './schema.js';
import { loadDefaultSeverityTable, mergeSeverityTables } from './severity-table.js';
import { loadValueSets } from './value-sets.js';
import { ConfigurationError } from '../utils/errors.js';
import { parseDate, slugify } from '../utils/value-parser.js';

export interface GateConfigLoadResult {
  config: GateConfig;
  metadata: GateConfigMetadata;
}

export const DEFAULT_CONFIG_FILE = 'transport-gate.yml';

export class GateConfigLoader {
  constructor(private basePath: string) {}

  /**
   * Loads and resolves a gate config. Relative paths resolve against the base path,
   * lookup table paths against the config file's directory.
   */
  async loadConfig(configPath: string = DEFAULT_CONFIG_FILE): Promise<GateConfigLoadResult> {
    const sourcePath = path.resolve(this.basePath, configPath);

    let content: string;
    try {
      content = await fs.readFile(sourcePath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        throw new ConfigurationError(`Gate config not found: ${sourcePath}`);
      }
      throw error;
    }

    let raw: unknown;
    try {
      raw = YAML.parse(content);
    } catch (error) {
      throw new ConfigurationError(`Invalid YAML in ${sourcePath}: ${(error as Error).message}`);
    }

    const config = await resolveGateConfig(raw ?? {}, path.dirname(sourcePath));

    return {
      config,
      metadata: {
        sourcePath,
        loadedAt: new Date().toISOString(),
      },
    };
  }
}

/**
 * Validates a parsed config object and resolves it for the pipeline:
 * field ids, regular expressions, value sets, range bounds, lookup paths and
 * the merged severity table.
 */
export async function resolveGateConfig(raw: unknown, baseDir: string): Promise<GateConfig> {
  const parsed = GateConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      'Invalid gate configuration',
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }

  const file = parsed.data;
  const issues: string[] = [];
  const valueSets = await loadValueSets();

  const fields = file.fields.map((field, index) => resolveField(field, `fields.${index}`, valueSets, issues));
  checkUnique(fields.map((f) => f.name), 'field name', issues);
  checkUnique(fields.map((f) => f.id), 'field id', issues);
  checkUnique(
    [...file.domainRules.map((r) => r.id), ...file.relationalRules.map((r) => r.id)],
    'rule id',
    issues
  );
  checkLookupReferences(file, issues);

  if (issues.length > 0) {
    throw new ConfigurationError('Invalid gate configuration', issues);
  }

  const defaults = await loadDefaultSeverityTable();

  return {
    name: file.name,
    nullSentinels: file.nullSentinels ?? DEFAULT_NULL_SENTINELS,
    fields,
    derive: file.derive,
    domainRules: file.domainRules,
    relationalRules: file.relationalRules,
    lookups: Object.fromEntries(
      Object.entries(file.lookups).map(([name, lookupPath]) => [name, path.resolve(baseDir, lookupPath)])
    ),
    severities: mergeSeverityTables(defaults, Object.entries(file.severities)),
    policy: file.policy,
  };
}

function resolveField(
  field: GateConfigFile['fields'][number],
  at: string,
  valueSets: ReadonlyMap<string, readonly string[]>,
  issues: string[]
): FieldSpec {
  const spec: FieldSpec = {
    name: field.name,
    id: field.id ?? slugify(field.name),
    type: field.type,
    required: field.required,
  };

  if (spec.id === '') {
    issues.push(`${at}.name: cannot derive a rule id from "${field.name}", set "id"`);
  }
  if (field.case) spec.case = field.case;
  if (field.length) spec.length = field.length;

  if (field.pattern !== undefined) {
    try {
      spec.pattern = new RegExp(field.pattern);
    } catch (error) {
      issues.push(`${at}.pattern: ${(error as Error).message}`);
    }
  }

  if (field.allowed || field.allowedSet) {
    const allowed = new Set<string>((field.allowed ?? []).map(String));
    if (field.allowedSet) {
      const set = valueSets.get(field.allowedSet);
      if (set) {
        set.forEach((value) => allowed.add(value));
      } else {
        issues.push(`${at}.allowedSet: unknown value set "${field.allowedSet}". Available: [${[...valueSets.keys()].join(', ')}]`);
      }
    }
    spec.allowed = allowed;
  }

  if (field.min !== undefined) {
    const bound = resolveBound(field.min, field.type, `${at}.min`, issues);
    if (bound) spec.min = bound;
  }
  if (field.max !== undefined) {
    const bound = resolveBound(field.max, field.type, `${at}.max`, issues);
    if (bound) spec.max = bound;
  }

  return spec;
}

function resolveBound(
  value: number | string,
  type: FieldSpec['type'],
  at: string,
  issues: string[]
): Bound | undefined {
  if (type === 'number' || type === 'integer') {
    if (typeof value === 'number') {
      return { kind: 'number', value };
    }
    issues.push(`${at}: numeric fields need a numeric bound, got "${value}"`);
    return undefined;
  }

  if (type === 'date') {
    if (value === 'now') {
      return { kind: 'now' };
    }
    const date = typeof value === 'string' ? parseDate(value) : null;
    if (date) {
      return { kind: 'date', value: date };
    }
    issues.push(`${at}: date fields need "now" or a YYYY-MM-DD bound, got "${value}"`);
    return undefined;
  }

  issues.push(`${at}: min/max apply to number, integer and date fields only`);
  return undefined;
}

function checkUnique(values: string[], label: string, issues: string[]): void {
  const seen = new Set<string>();
  for (const value of values) {
    if (seen.has(value)) {
      issues.push(`duplicate ${label}: ${value}`);
    }
    seen.add(value);
  }
}

function checkLookupReferences(file: GateConfigFile, issues: string[]): void {
  const known = new Set(Object.keys(file.lookups));
  if (known.has('self')) {
    issues.push('lookups.self: "self" is reserved for the dataset itself');
  }

  file.relationalRules.forEach((rule, index) => {
    const table =
      rule.type === 'foreign-key' ? rule.references.table : rule.type === 'has-children' ? rule.parent.table : null;
    if (table === null) return;

    if (rule.type === 'has-children' && table === 'self') {
      issues.push(`relationalRules.${index}.parent.table: has-children needs a lookup table, not "self"`);
    } else if (table !== 'self' && !known.has(table)) {
      issues.push(`relationalRules.${index}: unknown lookup table "${table}"`);
    }
  });
}
