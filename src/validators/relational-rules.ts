// src/validators/relational-rules.ts

import { RelationalRuleConfig } from '../config/schema.js';
import { Dataset, keyOf } from '../core/dataset.js';
import { createValidationError, ValidationError } from './types.js';

/**
 * Cross-record rule. Indices it builds are private to one evaluation.
 */
export interface RelationalRule {
  readonly id: string;
  evaluate(dataset: Dataset): ValidationError[];
}

const KEY_SEPARATOR = '\u0000';

function resolveTable(dataset: Dataset, table: string): Dataset {
  if (table === 'self') return dataset;
  const lookup = dataset.lookups[table];
  if (!lookup) {
    throw new Error(`Lookup table "${table}" was not loaded`);
  }
  return lookup;
}

function collectKeys(table: Dataset, field: string): Set<string> {
  const keys = new Set<string>();
  for (const record of table.records) {
    const key = keyOf(record.fields[field] ?? null);
    if (key !== null) keys.add(key);
  }
  return keys;
}

/**
 * No two records share the key. Records with a null key part are ignored.
 */
export class UniqueRule implements RelationalRule {
  constructor(
    readonly id: string,
    private fields: readonly string[]
  ) {}

  evaluate(dataset: Dataset): ValidationError[] {
    const rowsByKey = new Map<string, { display: string; rows: number[] }>();

    for (const record of dataset.records) {
      const parts = this.fields.map((field) => keyOf(record.fields[field] ?? null));
      if (parts.some((part) => part === null)) continue;

      const key = parts.join(KEY_SEPARATOR);
      const entry = rowsByKey.get(key);
      if (entry) {
        entry.rows.push(record.rowIndex);
      } else {
        rowsByKey.set(key, { display: parts.join(', '), rows: [record.rowIndex] });
      }
    }

    const errors: ValidationError[] = [];
    for (const { display, rows } of rowsByKey.values()) {
      if (rows.length < 2) continue;
      errors.push(
        createValidationError({
          ruleId: this.id,
          stage: 'relational',
          rowIndices: rows,
          ...(this.fields.length === 1 ? { field: this.fields[0] } : {}),
          message: `Duplicate ${this.fields.join(' + ')} "${display}" on ${rows.length} rows`,
        })
      );
    }
    return errors;
  }
}

/**
 * Every non-null value of `field` exists in the referenced table.
 * Reported once per offending record.
 */
export class ForeignKeyRule implements RelationalRule {
  constructor(
    readonly id: string,
    private field: string,
    private references: { table: string; field: string }
  ) {}

  evaluate(dataset: Dataset): ValidationError[] {
    const known = collectKeys(resolveTable(dataset, this.references.table), this.references.field);
    const errors: ValidationError[] = [];

    for (const record of dataset.records) {
      const key = keyOf(record.fields[this.field] ?? null);
      if (key === null || known.has(key)) continue;

      errors.push(
        createValidationError({
          ruleId: this.id,
          stage: 'relational',
          rowIndices: [record.rowIndex],
          field: this.field,
          message: `${this.field} "${key}" not found in ${this.references.table}.${this.references.field}`,
        })
      );
    }
    return errors;
  }
}

/**
 * Every parent key in a lookup table is referenced by at least one record.
 */
export class HasChildrenRule implements RelationalRule {
  constructor(
    readonly id: string,
    private parent: { table: string; field: string },
    private childField: string
  ) {}

  evaluate(dataset: Dataset): ValidationError[] {
    const parents = resolveTable(dataset, this.parent.table);
    const referenced = collectKeys(dataset, this.childField);
    const errors: ValidationError[] = [];

    for (const record of parents.records) {
      const key = keyOf(record.fields[this.parent.field] ?? null);
      if (key === null || referenced.has(key)) continue;

      errors.push(
        createValidationError({
          ruleId: this.id,
          stage: 'relational',
          rowIndices: [record.rowIndex],
          field: this.parent.field,
          table: this.parent.table,
          message: `${this.parent.table}.${this.parent.field} "${key}" has no records referencing it through ${this.childField}`,
        })
      );
    }
    return errors;
  }
}

export function createRelationalRule(config: RelationalRuleConfig): RelationalRule {
  switch (config.type) {
    case 'unique':
      return new UniqueRule(config.id, config.fields);
    case 'foreign-key':
      return new ForeignKeyRule(config.id, config.field, config.references);
    case 'has-children':
      return new HasChildrenRule(config.id, config.parent, config.childField);
  }
}
