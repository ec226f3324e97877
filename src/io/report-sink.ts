// src/io/report-sink.ts

import * as fs from 'fs/promises';
import * as path from 'path';
import Papa from 'papaparse';
import { Dataset, FieldValue } from '../core/dataset.js';
import { Decision, ErrorReport, SerializedReport } from '../core/error-report.js';
import { formatDate } from '../utils/value-parser.js';

export interface SinkInput {
  cleanedDataset: Dataset;
  report: ErrorReport;
  decision: Decision;
}

export interface SinkResult {
  reportPath: string;
  /** null when the decision was HALT and the dataset was withheld */
  datasetPath: string | null;
}

export interface PersistedReport extends SerializedReport {
  run_id: string;
}

/**
 * Persists run output. The report is always written; the cleaned dataset only
 * when the decision allows delivery.
 */
export class ReportSink {
  constructor(private outputDir: string) {}

  async write(input: SinkInput, runId: string): Promise<SinkResult> {
    await fs.mkdir(this.outputDir, { recursive: true });

    const reportPath = path.join(this.outputDir, `${input.cleanedDataset.name}.report.json`);
    const persisted: PersistedReport = { run_id: runId, ...input.report.toJSON() };
    await fs.writeFile(reportPath, JSON.stringify(persisted, null, 2) + '\n', 'utf-8');

    if (input.decision === 'HALT') {
      return { reportPath, datasetPath: null };
    }

    const datasetPath = path.join(this.outputDir, `${input.cleanedDataset.name}.cleaned.csv`);
    await fs.writeFile(datasetPath, toCsv(input.cleanedDataset), 'utf-8');

    return { reportPath, datasetPath };
  }
}

/**
 * Columns in first-seen order; dates as YYYY-MM-DD (or full ISO when they carry a time).
 */
export function toCsv(dataset: Dataset): string {
  const columns: string[] = [];
  const seen = new Set<string>();
  for (const record of dataset.records) {
    for (const column of Object.keys(record.fields)) {
      if (!seen.has(column)) {
        seen.add(column);
        columns.push(column);
      }
    }
  }

  const rows = dataset.records.map((record) => columns.map((column) => serializeCell(record.fields[column] ?? null)));
  return Papa.unparse({ fields: columns, data: rows }, { newline: '\n' }) + '\n';
}

function serializeCell(value: FieldValue): string {
  if (value === null) return '';
  if (value instanceof Date) return formatDate(value);
  return String(value);
}
