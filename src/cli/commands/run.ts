// src/cli/commands/run.ts

import * as path from 'path';
import chalk from 'chalk';
import { v4 as uuidv4 } from 'uuid';
import { GateConfigLoader } from '../../config/gate-config-loader.js';
import { SeverityPolicy, SeverityPolicySchema } from '../../config/schema.js';
import { Decision } from '../../core/error-report.js';
import { QualityPipeline } from '../../core/quality-pipeline.js';
import { DatasetLoader } from '../../io/dataset-loader.js';
import { ReportSink } from '../../io/report-sink.js';
import { ConfigurationError, GateError } from '../../utils/errors.js';
import { Logger } from '../../utils/logger.js';
import { RunLogger } from '../../utils/run-logger.js';

export interface RunOptions {
  config?: string;
  outputDir?: string;
  /** Extra or overriding lookup tables, name → path relative to the working directory */
  lookups?: Record<string, string>;
  sheet?: string;
  criticalHalts?: boolean;
  errorThreshold?: number;
  referenceTime?: string;
  quiet?: boolean;
}

export const EXIT_CODES = {
  ok: 0,
  fatal: 1,
  halt: 2,
} as const;

export function exitCodeFor(decision: Decision): number {
  return decision === 'HALT' ? EXIT_CODES.halt : EXIT_CODES.ok;
}

/**
 * CLI flags override the config file's policy; the result is re-validated.
 */
export function applyPolicyOverrides(policy: SeverityPolicy, options: RunOptions): SeverityPolicy {
  const parsed = SeverityPolicySchema.safeParse({
    ...policy,
    ...(options.criticalHalts !== undefined ? { criticalHalts: options.criticalHalts } : {}),
    ...(options.errorThreshold !== undefined ? { errorThreshold: options.errorThreshold } : {}),
  });

  if (!parsed.success) {
    throw new ConfigurationError(
      'Invalid policy override',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return parsed.data;
}

export function parseReferenceTime(value?: string): Date | undefined {
  if (value === undefined) return undefined;
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new ConfigurationError(`Invalid --reference-time: ${value}`);
  }
  return date;
}

export async function runCommand(
  basePath: string,
  datasetPath: string,
  options: RunOptions = {}
): Promise<void> {
  let decision: Decision;

  try {
    decision = await executeRun(basePath, datasetPath, options);
  } catch (error) {
    if (error instanceof GateError) {
      Logger.error(error.message);
      process.exit(EXIT_CODES.fatal);
    }
    throw error;
  }

  process.exit(exitCodeFor(decision));
}

/**
 * Load config and data, run the gate, log the full report, then persist.
 * The report is logged before the sink enforces a HALT.
 */
export async function executeRun(basePath: string, datasetPath: string, options: RunOptions): Promise<Decision> {
  const { config, metadata } = await new GateConfigLoader(basePath).loadConfig(options.config);
  const policy = applyPolicyOverrides(config.policy, options);
  const referenceTime = parseReferenceTime(options.referenceTime);

  const lookups: Record<string, string> = { ...config.lookups };
  for (const [name, lookupPath] of Object.entries(options.lookups ?? {})) {
    lookups[name] = path.resolve(basePath, lookupPath);
  }

  const dataset = await new DatasetLoader(basePath).loadWithLookups(datasetPath, lookups, {
    sheet: options.sheet,
    name: config.name,
  });

  const runId = uuidv4();
  const outputDir = path.resolve(basePath, options.outputDir ?? 'gate-output');
  const logger = new RunLogger(outputDir, dataset.name, options.quiet);
  const startTime = Date.now();

  try {
    logger.runStart(dataset, runId, metadata.sourcePath);

    const pipeline = new QualityPipeline(config);
    const result = await pipeline.run(dataset, policy, { referenceTime });

    logger.logReport(result.report, result.cleanedDataset, result.evaluation);

    const outputs = await new ReportSink(outputDir).write(result, runId);
    logger.runComplete(result.decision, (Date.now() - startTime) / 1000, outputs);

    console.log(formatDecisionLine(result.decision));
    return result.decision;
  } finally {
    await logger.close();
  }
}

function formatDecisionLine(decision: Decision): string {
  switch (decision) {
    case 'PASS':
      return chalk.green.bold(`✅ ${decision}`);
    case 'PASS_WITH_WARNINGS':
      return chalk.yellow.bold(`⚠️  ${decision}`);
    case 'HALT':
      return chalk.red.bold(`🛑 ${decision}: cleaned dataset withheld`);
  }
}
