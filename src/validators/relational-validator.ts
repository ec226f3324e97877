// src/validators/relational-validator.ts

import { RelationalRuleConfig } from '../config/schema.js';
import { createRelationalRule, RelationalRule } from './relational-rules.js';
import { createValidationError, ValidationContext, ValidationError, Validator } from './types.js';

/**
 * Uniqueness, foreign-key and completeness checks over the whole dataset.
 * Findings are ordered by rule registration, then first offending row.
 */
export class RelationalValidator implements Validator {
  readonly name = 'relational';
  readonly stage = 'relational' as const;
  private rules: RelationalRule[] = [];

  constructor(configs: readonly RelationalRuleConfig[] = []) {
    configs.forEach((config) => this.register(createRelationalRule(config)));
  }

  register(rule: RelationalRule): void {
    this.rules.push(rule);
  }

  ruleIds(): string[] {
    return this.rules.map((rule) => rule.id);
  }

  validate(context: ValidationContext): ValidationError[] {
    const errors: ValidationError[] = [];

    for (const rule of this.rules) {
      try {
        errors.push(...rule.evaluate(context.dataset));
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        errors.push(
          createValidationError({
            ruleId: 'relational.rule-failure',
            stage: 'relational',
            rowIndices: [],
            message: `Rule ${rule.id} failed: ${message}`,
          })
        );
      }
    }

    return errors;
  }
}
