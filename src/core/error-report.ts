// src/core/error-report.ts

import { Severity, ValidationError, ValidationStage, STAGE_ORDER } from '../validators/types.js';

export type Decision = 'PASS' | 'PASS_WITH_WARNINGS' | 'HALT';

export const SEVERITIES: readonly Severity[] = ['INFO', 'WARNING', 'ERROR', 'CRITICAL'];

export interface ClassifiedError extends ValidationError {
  readonly severity: Severity;
  /** True when no severity table entry matched and the policy default was used */
  readonly defaulted: boolean;
}

export type SeverityCounts = Record<Severity, number>;

/**
 * Entry of the serialized report. Field names are the downstream contract.
 */
export interface ReportEntry {
  rule_id: string;
  stage: ValidationStage;
  row_indices: number[];
  field?: string;
  table?: string;
  severity: Severity;
  message: string;
}

export interface SerializedReport {
  dataset: string;
  decision: Decision;
  counts: SeverityCounts;
  errors: ReportEntry[];
}

export function emptyCounts(): SeverityCounts {
  return { INFO: 0, WARNING: 0, ERROR: 0, CRITICAL: 0 };
}

export function countBySeverity(errors: readonly ClassifiedError[]): SeverityCounts {
  const counts = emptyCounts();
  for (const error of errors) {
    counts[error.severity]++;
  }
  return counts;
}

/**
 * Run-scoped error report. Appended to stage by stage, finalized exactly once
 * with the policy decision, read-only afterwards.
 */
export class ErrorReport {
  private entries: ClassifiedError[] = [];
  private lastStage = -1;
  private decisionValue: Decision | null = null;

  constructor(readonly datasetName: string) {}

  /**
   * Append one stage's classified findings. Stages must arrive in merge order.
   */
  append(stage: ValidationStage, errors: readonly ClassifiedError[]): void {
    if (this.decisionValue !== null) {
      throw new Error('ErrorReport is finalized and read-only');
    }

    const position = STAGE_ORDER.indexOf(stage);
    if (position < this.lastStage) {
      throw new Error(`Stage "${stage}" appended after a later stage`);
    }
    this.lastStage = position;

    for (const error of errors) {
      if (error.stage !== stage) {
        throw new Error(`Finding ${error.ruleId} belongs to stage "${error.stage}", not "${stage}"`);
      }
      this.entries.push(error);
    }
  }

  finalize(decision: Decision): void {
    if (this.decisionValue !== null) {
      throw new Error('ErrorReport is already finalized');
    }
    this.decisionValue = decision;
    Object.freeze(this.entries);
  }

  get finalized(): boolean {
    return this.decisionValue !== null;
  }

  get decision(): Decision {
    if (this.decisionValue === null) {
      throw new Error('ErrorReport has no decision before finalization');
    }
    return this.decisionValue;
  }

  get errors(): readonly ClassifiedError[] {
    return this.entries;
  }

  get counts(): SeverityCounts {
    return countBySeverity(this.entries);
  }

  get isEmpty(): boolean {
    return this.entries.length === 0;
  }

  toJSON(): SerializedReport {
    return {
      dataset: this.datasetName,
      decision: this.decision,
      counts: this.counts,
      errors: this.entries.map(toReportEntry),
    };
  }
}

export function toReportEntry(error: ClassifiedError): ReportEntry {
  return {
    rule_id: error.ruleId,
    stage: error.stage,
    row_indices: [...error.rowIndices],
    ...(error.field !== undefined ? { field: error.field } : {}),
    ...(error.table !== undefined ? { table: error.table } : {}),
    severity: error.severity,
    message: error.message,
  };
}
