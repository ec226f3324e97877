// src/validators/domain-rules.ts

import { DomainRuleConfig } from '../config/schema.js';
import { DataRecord, FieldValue, isDateValue, isNumberValue, keyOf } from '../core/dataset.js';
import { describeValue } from './field-validator.js';
import { createValidationError, ValidationError } from './types.js';

/**
 * Rule over one record. Skipped for records where a `requires` field is null.
 */
export interface RecordRule {
  readonly id: string;
  readonly scope: 'record';
  readonly requires: readonly string[];
  evaluate(record: DataRecord): ValidationError[];
}

/**
 * Rule over all records sharing a `groupBy` value (e.g. one trip), in row order.
 */
export interface GroupRule {
  readonly id: string;
  readonly scope: 'group';
  readonly groupBy: string;
  readonly requires: readonly string[];
  evaluate(groupKey: string, records: readonly DataRecord[]): ValidationError[];
}

export type DomainRule = RecordRule | GroupRule;

function comparable(value: FieldValue): number | null {
  if (isNumberValue(value)) return value;
  if (isDateValue(value)) return value.getTime();
  return null;
}

function finding(ruleId: string, rowIndices: number[], field: string, message: string): ValidationError {
  return createValidationError({ ruleId, stage: 'domain', rowIndices, field, message });
}

/**
 * earlier <= later (or < when strict): arrival before departure, range start before end.
 */
export class OrderedRule implements RecordRule {
  readonly scope = 'record' as const;
  readonly requires: readonly string[];

  constructor(
    readonly id: string,
    private earlier: string,
    private later: string,
    private strict = false
  ) {
    this.requires = [earlier, later];
  }

  evaluate(record: DataRecord): ValidationError[] {
    const first = record.fields[this.earlier] ?? null;
    const second = record.fields[this.later] ?? null;
    const a = comparable(first);
    const b = comparable(second);

    // Mixed or uncoerced values were already reported by the field validator
    if (a === null || b === null || isDateValue(first) !== isDateValue(second)) return [];

    const violated = this.strict ? a >= b : a > b;
    if (!violated) return [];

    const relation = this.strict ? 'is not before' : 'is after';
    return [
      finding(
        this.id,
        [record.rowIndex],
        this.earlier,
        `${this.earlier} (${describeValue(first)}) ${relation} ${this.later} (${describeValue(second)})`
      ),
    ];
  }
}

export class CoordinatesRule implements RecordRule {
  readonly scope = 'record' as const;
  readonly requires: readonly string[] = [];

  constructor(
    readonly id: string,
    private latitude: string,
    private longitude: string
  ) {}

  evaluate(record: DataRecord): ValidationError[] {
    const errors: ValidationError[] = [];
    this.checkAxis(record, this.latitude, 90, 'latitude', errors);
    this.checkAxis(record, this.longitude, 180, 'longitude', errors);
    return errors;
  }

  private checkAxis(record: DataRecord, field: string, limit: number, label: string, errors: ValidationError[]): void {
    const value = record.fields[field] ?? null;
    if (!isNumberValue(value)) return;

    if (value < -limit || value > limit) {
      errors.push(finding(this.id, [record.rowIndex], field, `${field}: ${label} ${value} outside [-${limit}, ${limit}]`));
    }
  }
}

/**
 * Distances and durations; with `strict`, weights that must be above zero.
 * Each listed field is checked on its own, so a null in one field does not
 * hide a bad value in another.
 */
export class NonNegativeRule implements RecordRule {
  readonly scope = 'record' as const;
  readonly requires: readonly string[] = [];

  constructor(
    readonly id: string,
    private fields: readonly string[],
    private strict = false
  ) {}

  evaluate(record: DataRecord): ValidationError[] {
    const errors: ValidationError[] = [];
    for (const field of this.fields) {
      const value = record.fields[field] ?? null;
      if (!isNumberValue(value)) continue;

      if (this.strict ? value <= 0 : value < 0) {
        const problem = value < 0 ? 'is negative' : 'is not positive';
        errors.push(finding(this.id, [record.rowIndex], field, `${field}: ${value} ${problem}`));
      }
    }
    return errors;
  }
}

/**
 * value < limit unless the exemption field holds one of the exempt values
 * (compared trimmed and case-insensitively). Models overweight loads that only
 * authorised accounts may book.
 */
export class CeilingRule implements RecordRule {
  readonly scope = 'record' as const;
  readonly requires: readonly string[];
  private exempt: Set<string>;

  constructor(
    readonly id: string,
    private field: string,
    private limit: number,
    private exemptField?: string,
    exemptValues: readonly string[] = []
  ) {
    this.requires = [field];
    this.exempt = new Set(exemptValues.map((value) => value.trim().toLowerCase()));
  }

  evaluate(record: DataRecord): ValidationError[] {
    const value = record.fields[this.field] ?? null;
    if (!isNumberValue(value) || value < this.limit) return [];

    if (this.exemptField) {
      const holder = keyOf(record.fields[this.exemptField] ?? null);
      if (holder !== null && this.exempt.has(holder.trim().toLowerCase())) return [];
    }

    const by = this.exemptField ? ` and ${this.exemptField} is not exempt` : '';
    return [finding(this.id, [record.rowIndex], this.field, `${this.field}: ${value} reaches limit ${this.limit}${by}`)];
  }
}

/**
 * Stop sequence strictly increasing in row order within each group.
 * One finding per offending group, attributed to all of its rows.
 */
export class SequenceRule implements GroupRule {
  readonly scope = 'group' as const;
  readonly requires: readonly string[];

  constructor(
    readonly id: string,
    readonly groupBy: string,
    private field: string
  ) {
    this.requires = [groupBy, field];
  }

  evaluate(groupKey: string, records: readonly DataRecord[]): ValidationError[] {
    const sequenced = records.filter((record) => isNumberValue(record.fields[this.field] ?? null));

    for (let i = 1; i < sequenced.length; i++) {
      const previous = sequenced[i - 1].fields[this.field];
      const current = sequenced[i].fields[this.field];
      if (isNumberValue(previous) && isNumberValue(current) && current <= previous) {
        return [
          finding(
            this.id,
            sequenced.map((record) => record.rowIndex),
            this.field,
            `${this.groupBy} ${groupKey}: ${this.field} not increasing at row ${sequenced[i].rowIndex} (${current} after ${previous})`
          ),
        ];
      }
    }

    return [];
  }
}

/**
 * Builds a rule from the built-in catalog.
 */
export function createDomainRule(config: DomainRuleConfig): DomainRule {
  switch (config.type) {
    case 'ordered':
      return new OrderedRule(config.id, config.earlier, config.later, config.strict);
    case 'coordinates':
      return new CoordinatesRule(config.id, config.latitude, config.longitude);
    case 'non-negative':
      return new NonNegativeRule(config.id, config.fields, config.strict);
    case 'ceiling':
      return new CeilingRule(config.id, config.field, config.limit, config.exemptField, config.exemptValues);
    case 'sequence':
      return new SequenceRule(config.id, config.groupBy, config.field);
  }
}
