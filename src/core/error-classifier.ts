// src/core/error-classifier.ts

import { SeverityTable } from '../config/schema.js';
import { Logger } from '../utils/logger.js';
import { Severity, ValidationError } from '../validators/types.js';
import { ClassifiedError } from './error-report.js';

export interface SeverityResolution {
  severity: Severity;
  /** Table key that matched, or null when the default applied */
  matchedBy: string | null;
}

/**
 * Resolves severities from the central rule id table. Only the rule id is
 * consulted, never the stage that raised the finding.
 */
export class ErrorClassifier {
  constructor(
    private table: SeverityTable,
    private defaultSeverity: Severity = 'WARNING'
  ) {}

  /**
   * Exact id first, then the `*.<check>` wildcard on the last id segment.
   */
  resolve(ruleId: string): SeverityResolution {
    const exact = this.table.get(ruleId);
    if (exact) {
      return { severity: exact, matchedBy: ruleId };
    }

    const lastDot = ruleId.lastIndexOf('.');
    if (lastDot !== -1) {
      const wildcard = `*${ruleId.slice(lastDot)}`;
      const matched = this.table.get(wildcard);
      if (matched) {
        return { severity: matched, matchedBy: wildcard };
      }
    }

    return { severity: this.defaultSeverity, matchedBy: null };
  }

  classify(errors: readonly ValidationError[]): ClassifiedError[] {
    const unmapped = new Map<string, number>();

    const classified = errors.map((error) => {
      const { severity, matchedBy } = this.resolve(error.ruleId);
      if (matchedBy === null) {
        unmapped.set(error.ruleId, (unmapped.get(error.ruleId) ?? 0) + 1);
      }
      return Object.freeze({ ...error, severity, defaulted: matchedBy === null });
    });

    for (const [ruleId, count] of unmapped) {
      Logger.warn(
        `No severity mapping for rule "${ruleId}" (${count} finding${count === 1 ? '' : 's'}), classified as ${this.defaultSeverity}`
      );
    }

    return classified;
  }
}
