// src/core/cleaner.ts

import { DeriveSpec, FieldSpec } from '../config/schema.js';
import { Dataset, DataRecord, FieldValue } from './dataset.js';
import { parseDate, parseNumber } from '../utils/value-parser.js';

export interface CleanerOptions {
  fields: readonly FieldSpec[];
  derive?: readonly DeriveSpec[];
  nullSentinels: readonly string[];
}

/**
 * Deterministic, idempotent cleaning. Returns a new Dataset with the same rows
 * in the same order; values that fail coercion keep their trimmed raw form so
 * the field validator can report them.
 */
export class Cleaner {
  private specs: Map<string, FieldSpec>;
  private sentinels: Set<string>;
  private derive: readonly DeriveSpec[];

  constructor(options: CleanerOptions) {
    this.specs = new Map(options.fields.map((spec) => [spec.name, spec]));
    this.sentinels = new Set(options.nullSentinels);
    this.derive = options.derive ?? [];
  }

  clean(dataset: Dataset): Dataset {
    return {
      name: dataset.name,
      firstDataLine: dataset.firstDataLine,
      records: dataset.records.map((record) => this.cleanRecord(record, true)),
      lookups: Object.fromEntries(
        Object.entries(dataset.lookups).map(([name, lookup]) => [name, this.cleanLookup(lookup)])
      ),
    };
  }

  /**
   * Lookup tables carry no field specs: trimming and null normalization only.
   */
  private cleanLookup(lookup: Dataset): Dataset {
    return {
      name: lookup.name,
      firstDataLine: lookup.firstDataLine,
      records: lookup.records.map((record) => this.cleanRecord(record, false)),
      lookups: {},
    };
  }

  private cleanRecord(record: DataRecord, typed: boolean): DataRecord {
    const fields: Record<string, FieldValue> = {};

    for (const [name, value] of Object.entries(record.fields)) {
      fields[name] = this.cleanValue(value, typed ? this.specs.get(name) : undefined);
    }

    if (typed) {
      for (const derivation of this.derive) {
        this.applyDerivation(fields, derivation);
      }
    }

    return { rowIndex: record.rowIndex, fields };
  }

  /**
   * Splits a range column such as "01/02/2024 - 01/05/2024" into two fields.
   * Always recomputed from the source column, so repeated cleaning is stable.
   */
  private applyDerivation(fields: Record<string, FieldValue>, derivation: DeriveSpec): void {
    const [startField, endField] = derivation.into;
    const source = fields[derivation.from];

    if (typeof source !== 'string') {
      fields[startField] = null;
      fields[endField] = null;
      return;
    }

    const parts = source.split(derivation.separator);
    fields[startField] = this.cleanValue(parts[0] ?? null, this.specs.get(startField));
    fields[endField] = this.cleanValue(parts[1] ?? null, this.specs.get(endField));
  }

  cleanValue(value: FieldValue | undefined, spec?: FieldSpec): FieldValue {
    if (value === undefined || value === null) return null;
    if (typeof value === 'number' && Number.isNaN(value)) return null;

    let current: FieldValue = value;
    if (typeof current === 'string') {
      current = current.trim();
      if (this.sentinels.has(current)) return null;
    }

    if (!spec) return copyValue(current);

    if (typeof current === 'string' && spec.case) {
      current = spec.case === 'upper' ? current.toUpperCase() : current.toLowerCase();
      // "n/a" folds to "N/A"; it must be null on the first pass, not the second
      if (this.sentinels.has(current)) return null;
    }

    return coerce(current, spec);
  }
}

function coerce(value: Exclude<FieldValue, null>, spec: FieldSpec): FieldValue {
  switch (spec.type) {
    case 'number':
    case 'integer':
      if (typeof value === 'string') {
        return parseNumber(value) ?? value;
      }
      return copyValue(value);

    case 'date':
      if (typeof value === 'string') {
        return parseDate(value) ?? value;
      }
      return copyValue(value);

    case 'string':
      return typeof value === 'number' ? String(value) : copyValue(value);
  }
}

function copyValue(value: FieldValue): FieldValue {
  return value instanceof Date ? new Date(value.getTime()) : value;
}
