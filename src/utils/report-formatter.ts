// src/utils/report-formatter.ts

import { Dataset } from '../core/dataset.js';
import { ClassifiedError, Decision, ErrorReport, SEVERITIES } from '../core/error-report.js';
import { PolicyEvaluation } from '../core/severity-policy.js';
import { Severity } from '../validators/types.js';

const MAX_LISTED_ROWS = 10;

export class ReportFormatter {
  static getSeverityEmoji(severity: Severity): string {
    const emojiMap: Record<Severity, string> = {
      INFO: 'ℹ️',
      WARNING: '⚠️',
      ERROR: '❌',
      CRITICAL: '🛑',
    };
    return emojiMap[severity];
  }

  static getDecisionEmoji(decision: Decision): string {
    const emojiMap: Record<Decision, string> = {
      PASS: '✅',
      PASS_WITH_WARNINGS: '⚠️',
      HALT: '🛑',
    };
    return emojiMap[decision];
  }

  /**
   * Row attribution as the user sees it: source lines when the file had a
   * header row, otherwise 0-based row indices.
   */
  static formatRows(rowIndices: readonly number[], firstDataLine: number | null): string {
    if (rowIndices.length === 0) {
      return 'whole dataset';
    }

    const shown = rowIndices
      .slice(0, MAX_LISTED_ROWS)
      .map((index) => (firstDataLine === null ? index : firstDataLine + index));
    const more = rowIndices.length > MAX_LISTED_ROWS ? ` (+${rowIndices.length - MAX_LISTED_ROWS} more)` : '';
    const label = firstDataLine === null ? 'row' : 'line';

    return `${label}${rowIndices.length === 1 ? '' : 's'} ${shown.join(', ')}${more}`;
  }

  static formatEntry(error: ClassifiedError, dataset: Dataset): string {
    const source = error.table ? dataset.lookups[error.table] : dataset;
    const firstDataLine = source ? source.firstDataLine : null;
    const table = error.table ? `${error.table} ` : '';
    const defaulted = error.defaulted ? ' (unmapped)' : '';

    return `  ${this.getSeverityEmoji(error.severity)} ${error.severity}${defaulted} [${error.stage}] ${error.ruleId} (${table}${this.formatRows(error.rowIndices, firstDataLine)}): ${error.message}`;
  }

  static formatCounts(report: ErrorReport): string {
    const counts = report.counts;
    return [...SEVERITIES]
      .reverse()
      .map((severity) => `${counts[severity]} ${severity}`)
      .join(', ');
  }

  static formatSummary(report: ErrorReport, dataset: Dataset, evaluation?: PolicyEvaluation): string {
    const lines: string[] = [];
    const separator = '='.repeat(60);

    lines.push('');
    lines.push(separator);
    lines.push(`Quality Gate: ${report.datasetName}`);
    lines.push(separator);
    lines.push('');

    lines.push(`Decision: ${this.getDecisionEmoji(report.decision)} ${report.decision}`);
    lines.push(`Rows: ${dataset.records.length}`);
    lines.push(`Findings: ${this.formatCounts(report)}`);

    if (evaluation && evaluation.reasons.length > 0) {
      lines.push(`Halted by: ${evaluation.reasons.join('; ')}`);
    }

    lines.push('');
    if (report.isEmpty) {
      lines.push('No findings.');
    } else {
      lines.push('Findings:');
      for (const error of report.errors) {
        lines.push(this.formatEntry(error, dataset));
      }
    }

    lines.push('');
    lines.push(separator);
    lines.push('');

    return lines.join('\n');
  }
}
