// src/core/severity-policy.ts

import { SeverityPolicy } from '../config/schema.js';
import { ClassifiedError, countBySeverity, Decision, SeverityCounts } from './error-report.js';

export interface PolicyEvaluation {
  decision: Decision;
  counts: SeverityCounts;
  /** Why the run halted; empty unless decision is HALT */
  reasons: string[];
}

/**
 * Single pass over the complete, classified findings.
 * HALT on any CRITICAL (when criticalHalts) or when the ERROR count reaches
 * errorThreshold; otherwise PASS_WITH_WARNINGS if anything was found, else PASS.
 * With criticalHalts off, CRITICAL findings count toward the ERROR threshold.
 */
export function evaluatePolicy(errors: readonly ClassifiedError[], policy: SeverityPolicy): PolicyEvaluation {
  const counts = countBySeverity(errors);
  const reasons: string[] = [];

  if (policy.criticalHalts && counts.CRITICAL > 0) {
    reasons.push(`${counts.CRITICAL} CRITICAL finding${counts.CRITICAL === 1 ? '' : 's'}`);
  }

  const errorCount = counts.ERROR + (policy.criticalHalts ? 0 : counts.CRITICAL);
  if (errorCount >= policy.errorThreshold) {
    reasons.push(`${errorCount} ERROR finding${errorCount === 1 ? '' : 's'} (threshold ${policy.errorThreshold})`);
  }

  let decision: Decision;
  if (reasons.length > 0) {
    decision = 'HALT';
  } else if (errors.length > 0) {
    decision = 'PASS_WITH_WARNINGS';
  } else {
    decision = 'PASS';
  }

  return { decision, counts, reasons };
}

export function decide(errors: readonly ClassifiedError[], policy: SeverityPolicy): Decision {
  return evaluatePolicy(errors, policy).decision;
}
