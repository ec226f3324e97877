// src/validators/domain-validator.ts

import { DomainRuleConfig } from '../config/schema.js';
import { DataRecord, keyOf } from '../core/dataset.js';
import { createDomainRule, DomainRule, GroupRule } from './domain-rules.js';
import { createValidationError, ValidationContext, ValidationError, Validator } from './types.js';

/**
 * Transport semantic rules over single records and per-trip groups.
 * Rules run in registration order; findings within a rule follow row order.
 */
export class DomainValidator implements Validator {
  readonly name = 'domain';
  readonly stage = 'domain' as const;
  private rules: DomainRule[] = [];

  constructor(configs: readonly DomainRuleConfig[] = []) {
    configs.forEach((config) => this.register(createDomainRule(config)));
  }

  /**
   * Register a rule. Custom rules outside the built-in catalog plug in here.
   */
  register(rule: DomainRule): void {
    this.rules.push(rule);
  }

  ruleIds(): string[] {
    return this.rules.map((rule) => rule.id);
  }

  validate(context: ValidationContext): ValidationError[] {
    const errors: ValidationError[] = [];
    const { records } = context.dataset;

    for (const rule of this.rules) {
      if (rule.scope === 'record') {
        for (const record of records) {
          if (!hasPrerequisites(record, rule.requires)) continue;
          errors.push(...guard(rule.id, [record.rowIndex], () => rule.evaluate(record)));
        }
      } else {
        for (const [groupKey, group] of groupRecords(records, rule)) {
          errors.push(
            ...guard(
              rule.id,
              group.map((record) => record.rowIndex),
              () => rule.evaluate(groupKey, group)
            )
          );
        }
      }
    }

    return errors;
  }
}

/**
 * Missing prerequisites were already reported by the field validator.
 */
function hasPrerequisites(record: DataRecord, requires: readonly string[]): boolean {
  return requires.every((field) => (record.fields[field] ?? null) !== null);
}

function groupRecords(records: readonly DataRecord[], rule: GroupRule): Map<string, DataRecord[]> {
  const groups = new Map<string, DataRecord[]>();
  for (const record of records) {
    if (!hasPrerequisites(record, rule.requires)) continue;
    const key = keyOf(record.fields[rule.groupBy] ?? null);
    if (key === null) continue;

    const group = groups.get(key);
    if (group) {
      group.push(record);
    } else {
      groups.set(key, [record]);
    }
  }
  return groups;
}

/**
 * A throwing rule becomes a finding so the rest of the scan still runs.
 */
function guard(ruleId: string, rowIndices: number[], evaluate: () => ValidationError[]): ValidationError[] {
  try {
    return evaluate();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return [
      createValidationError({
        ruleId: 'domain.rule-failure',
        stage: 'domain',
        rowIndices,
        message: `Rule ${ruleId} failed: ${message}`,
      }),
    ];
  }
}
