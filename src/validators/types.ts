// src/validators/types.ts

import { Dataset } from '../core/dataset.js';

export type ValidationStage = 'cleaning' | 'field' | 'domain' | 'relational';

/** Fixed merge priority: reports always list field, then domain, then relational findings. */
export const STAGE_ORDER: readonly ValidationStage[] = ['cleaning', 'field', 'domain', 'relational'];

export type Severity = 'INFO' | 'WARNING' | 'ERROR' | 'CRITICAL';

/**
 * A single detected problem, before severity resolution.
 */
export interface ValidationError {
  readonly ruleId: string;
  readonly stage: ValidationStage;
  /** Offending rows; one entry for record findings, several for relational or per-trip findings */
  readonly rowIndices: readonly number[];
  readonly field?: string;
  /** Lookup table the rows belong to, when not the dataset itself */
  readonly table?: string;
  readonly message: string;
  /** Hint from the rule; the classifier's table always wins */
  readonly rawSeverity?: Severity;
}

/**
 * Shared context passed to every validator of a run.
 */
export interface ValidationContext {
  readonly dataset: Dataset;
  /** Fixed "now" for date rules so reruns give identical reports */
  readonly referenceTime: Date;
}

/**
 * Interface for the three dataset validators.
 * Validators are composed by the QualityPipeline and merged by stage order.
 */
export interface Validator {
  /** Unique identifier for this validator */
  readonly name: string;

  readonly stage: Exclude<ValidationStage, 'cleaning'>;

  /** Rule ids this validator can emit, for `transport-gate rules` */
  ruleIds(): string[];

  /**
   * Scans the whole dataset and returns findings in discovery order.
   * Must not mutate the dataset and must finish the scan even after severe findings.
   */
  validate(context: ValidationContext): ValidationError[];
}

export function createValidationError(error: ValidationError): ValidationError {
  return Object.freeze({ ...error, rowIndices: Object.freeze([...error.rowIndices]) });
}
