import { describe, it, expect } from 'vitest';
import { ReportFormatter } from '../../utils/report-formatter.js';
import { ClassifiedError, ErrorReport } from '../../core/error-report.js';
import { createDataset } from '../../core/dataset.js';
import { evaluatePolicy } from '../../core/severity-policy.js';
import { DEFAULT_POLICY } from '../../config/schema.js';

const stops = createDataset('stops', [{ stop_id: 'S1' }, { stop_id: 'S2' }], { firstDataLine: 2 });
const dataset = createDataset('stop_times', [{ stop_id: 'S1' }, { stop_id: null }, { stop_id: 'S1' }], {
  firstDataLine: 2,
  lookups: { stops },
});

const missingStop: ClassifiedError = {
  ruleId: 'stop_id.required',
  stage: 'field',
  rowIndices: [1],
  field: 'stop_id',
  message: 'stop_id is required',
  severity: 'CRITICAL',
  defaulted: false,
};

const unusedStop: ClassifiedError = {
  ruleId: 'unused_stop',
  stage: 'relational',
  rowIndices: [1],
  field: 'stop_id',
  table: 'stops',
  message: 'stops.stop_id "S2" has no records referencing it through stop_id',
  severity: 'WARNING',
  defaulted: true,
};

describe('ReportFormatter', () => {
  describe('formatRows', () => {
    it('should show source lines when the file had a header', () => {
      expect(ReportFormatter.formatRows([0], 2)).toBe('line 2');
      expect(ReportFormatter.formatRows([0, 3], 2)).toBe('lines 2, 5');
    });

    it('should show row indices otherwise', () => {
      expect(ReportFormatter.formatRows([4], null)).toBe('row 4');
    });

    it('should cap long lists', () => {
      const indices = Array.from({ length: 12 }, (_, i) => i);

      expect(ReportFormatter.formatRows(indices, null)).toBe('rows 0, 1, 2, 3, 4, 5, 6, 7, 8, 9 (+2 more)');
    });

    it('should describe findings without rows', () => {
      expect(ReportFormatter.formatRows([], 2)).toBe('whole dataset');
    });
  });

  describe('formatEntry', () => {
    it('should format a dataset finding', () => {
      expect(ReportFormatter.formatEntry(missingStop, dataset)).toBe(
        '  🛑 CRITICAL [field] stop_id.required (line 3): stop_id is required'
      );
    });

    it('should name the lookup table and mark unmapped severities', () => {
      expect(ReportFormatter.formatEntry(unusedStop, dataset)).toBe(
        '  ⚠️ WARNING (unmapped) [relational] unused_stop (stops line 3): stops.stop_id "S2" has no records referencing it through stop_id'
      );
    });
  });

  describe('formatSummary', () => {
    it('should render a halted report with its reasons', () => {
      const report = new ErrorReport('stop_times');
      report.append('field', [missingStop]);
      report.append('relational', [unusedStop]);
      const evaluation = evaluatePolicy(report.errors, DEFAULT_POLICY);
      report.finalize(evaluation.decision);

      const summary = ReportFormatter.formatSummary(report, dataset, evaluation);

      expect(summary.split('\n')).toEqual([
        '',
        '='.repeat(60),
        'Quality Gate: stop_times',
        '='.repeat(60),
        '',
        'Decision: 🛑 HALT',
        'Rows: 3',
        'Findings: 1 CRITICAL, 0 ERROR, 1 WARNING, 0 INFO',
        'Halted by: 1 CRITICAL finding',
        '',
        'Findings:',
        '  🛑 CRITICAL [field] stop_id.required (line 3): stop_id is required',
        '  ⚠️ WARNING (unmapped) [relational] unused_stop (stops line 3): stops.stop_id "S2" has no records referencing it through stop_id',
        '',
        '='.repeat(60),
        '',
      ]);
    });

    it('should say so when there are no findings', () => {
      const report = new ErrorReport('stop_times');
      report.finalize('PASS');

      const summary = ReportFormatter.formatSummary(report, dataset);

      expect(summary).toContain('Decision: ✅ PASS');
      expect(summary).toContain('\nNo findings.\n');
      expect(summary).not.toContain('Halted by');
    });
  });
});
