// src/validators/field-validator.ts

import { Bound, FieldSpec } from '../config/schema.js';
import { DataRecord, FieldValue, isDateValue, isNumberValue, keyOf } from '../core/dataset.js';
import { formatDate } from '../utils/value-parser.js';
import { createValidationError, ValidationContext, ValidationError, Validator } from './types.js';

/**
 * Checks each declared field in isolation. One finding per violated rule;
 * order is row, then field declaration, then rule
 * (required, type, pattern, allowed, length, min, max).
 */
export class FieldValidator implements Validator {
  readonly name = 'fields';
  readonly stage = 'field' as const;

  constructor(private fields: readonly FieldSpec[]) {}

  ruleIds(): string[] {
    return this.fields.flatMap((spec) => {
      const ids = [`${spec.id}.type`];
      if (spec.required) ids.unshift(`${spec.id}.required`);
      if (spec.pattern) ids.push(`${spec.id}.pattern`);
      if (spec.allowed) ids.push(`${spec.id}.allowed`);
      if (spec.length) ids.push(`${spec.id}.length`);
      if (spec.min) ids.push(`${spec.id}.min`);
      if (spec.max) ids.push(`${spec.id}.max`);
      return ids;
    });
  }

  validate(context: ValidationContext): ValidationError[] {
    const errors: ValidationError[] = [];

    for (const record of context.dataset.records) {
      for (const spec of this.fields) {
        this.checkField(record, spec, context.referenceTime, errors);
      }
    }

    return errors;
  }

  private checkField(record: DataRecord, spec: FieldSpec, referenceTime: Date, errors: ValidationError[]): void {
    const value = record.fields[spec.name] ?? null;
    const push = (check: string, message: string) =>
      errors.push(
        createValidationError({
          ruleId: `${spec.id}.${check}`,
          stage: 'field',
          rowIndices: [record.rowIndex],
          field: spec.name,
          message,
        })
      );

    if (value === null) {
      if (spec.required) {
        push('required', `${spec.name} is required`);
      }
      return;
    }

    if (!matchesType(value, spec.type)) {
      push('type', `${spec.name}: expected ${spec.type}, got ${describeValue(value)}`);
      return;
    }

    if (spec.pattern && typeof value === 'string' && !spec.pattern.test(value)) {
      push('pattern', `${spec.name}: ${describeValue(value)} does not match ${spec.pattern.source}`);
    }

    if (spec.allowed) {
      const key = keyOf(value);
      if (key === null || !spec.allowed.has(key)) {
        push('allowed', `${spec.name}: ${describeValue(value)} is not an allowed value`);
      }
    }

    if (spec.length && typeof value === 'string') {
      const { min, max } = spec.length;
      if ((min !== undefined && value.length < min) || (max !== undefined && value.length > max)) {
        push('length', `${spec.name}: length ${value.length} outside ${describeLength(min, max)}`);
      }
    }

    const comparable = toComparable(value);
    if (comparable === null) return;

    if (spec.min) {
      const min = resolveBound(spec.min, referenceTime);
      if (comparable < min) {
        push('min', `${spec.name}: ${describeValue(value)} is below minimum ${describeBound(spec.min, referenceTime)}`);
      }
    }

    if (spec.max) {
      const max = resolveBound(spec.max, referenceTime);
      if (comparable > max) {
        push('max', `${spec.name}: ${describeValue(value)} is above maximum ${describeBound(spec.max, referenceTime)}`);
      }
    }
  }
}

export function matchesType(value: FieldValue, type: FieldSpec['type']): boolean {
  switch (type) {
    case 'string':
      return typeof value === 'string';
    case 'number':
      return isNumberValue(value);
    case 'integer':
      return isNumberValue(value) && Number.isInteger(value);
    case 'date':
      return isDateValue(value);
  }
}

export function describeValue(value: FieldValue): string {
  if (value === null) return 'null';
  if (value instanceof Date) return formatDate(value);
  if (typeof value === 'string') return `"${value}"`;
  return String(value);
}

function toComparable(value: FieldValue): number | null {
  if (isNumberValue(value)) return value;
  if (isDateValue(value)) return value.getTime();
  return null;
}

function resolveBound(bound: Bound, referenceTime: Date): number {
  switch (bound.kind) {
    case 'number':
      return bound.value;
    case 'date':
      return bound.value.getTime();
    case 'now':
      return referenceTime.getTime();
  }
}

function describeBound(bound: Bound, referenceTime: Date): string {
  switch (bound.kind) {
    case 'number':
      return String(bound.value);
    case 'date':
      return formatDate(bound.value);
    case 'now':
      return `now (${formatDate(referenceTime)})`;
  }
}

function describeLength(min?: number, max?: number): string {
  if (min !== undefined && max !== undefined) {
    return min === max ? `exactly ${min}` : `${min}..${max}`;
  }
  return min !== undefined ? `>= ${min}` : `<= ${max}`;
}
