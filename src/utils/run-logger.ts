// src/utils/run-logger.ts

import * as fs from 'fs';
import * as path from 'path';
import { Dataset } from '../core/dataset.js';
import { Decision, ErrorReport } from '../core/error-report.js';
import { PolicyEvaluation } from '../core/severity-policy.js';
import { ReportFormatter } from './report-formatter.js';

/**
 * Run logger that writes to a log file and, unless quiet, to the console.
 * It subscribes to the finished report; nothing in the pipeline writes here.
 */
export class RunLogger {
  private logStream: fs.WriteStream | null = null;
  private logPath: string;
  private quiet: boolean;

  constructor(outputDir: string, datasetName: string, quiet: boolean = false) {
    this.quiet = quiet;

    fs.mkdirSync(outputDir, { recursive: true });
    this.logPath = path.join(outputDir, `${datasetName}.log`);

    // Open log file for appending
    this.logStream = fs.createWriteStream(this.logPath, { flags: 'a' });
  }

  getLogPath(): string {
    return this.logPath;
  }

  /**
   * Write a timestamped log entry
   */
  log(message: string): void {
    const timestamp = new Date().toISOString();
    this.logStream?.write(`[${timestamp}] ${message}\n`);

    if (!this.quiet) {
      console.log(message);
    }
  }

  /**
   * Write a raw message without timestamp (banners, report bodies)
   */
  logRaw(message: string): void {
    this.logStream?.write(message + '\n');

    if (!this.quiet) {
      console.log(message);
    }
  }

  error(message: string): void {
    const timestamp = new Date().toISOString();
    this.logStream?.write(`[${timestamp}] ERROR: ${message}\n`);

    if (!this.quiet) {
      console.error(message);
    }
  }

  runStart(dataset: Dataset, runId: string, configPath: string): void {
    this.logRaw(`\n${'═'.repeat(60)}`);
    this.log(`Dataset: ${dataset.name} (${dataset.records.length} rows)`);
    this.log(`Run ID: ${runId.substring(0, 8)}`);
    this.log(`Config: ${configPath}`);
    const lookups = Object.keys(dataset.lookups);
    if (lookups.length > 0) {
      this.log(`Lookups: ${lookups.join(', ')}`);
    }
    this.logRaw('═'.repeat(60));
  }

  /**
   * Logs every finding. Always called before the decision is enforced.
   */
  logReport(report: ErrorReport, dataset: Dataset, evaluation?: PolicyEvaluation): void {
    this.logRaw(ReportFormatter.formatSummary(report, dataset, evaluation));
  }

  runComplete(decision: Decision, totalDuration: number, outputs: { reportPath: string; datasetPath: string | null }): void {
    this.log(`Report written: ${outputs.reportPath}`);
    if (outputs.datasetPath) {
      this.log(`Cleaned dataset written: ${outputs.datasetPath}`);
    } else {
      this.error('Cleaned dataset withheld: decision is HALT');
    }
    this.log(`Run ${decision} in ${totalDuration.toFixed(2)}s`);
  }

  /**
   * Close the log stream, resolving once buffered entries are flushed.
   */
  close(): Promise<void> {
    const stream = this.logStream;
    this.logStream = null;
    if (!stream) return Promise.resolve();

    return new Promise((resolve) => {
      stream.end(() => resolve());
    });
  }
}
