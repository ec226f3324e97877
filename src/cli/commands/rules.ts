// src/cli/commands/rules.ts

import chalk from 'chalk';
import { GateConfigLoader } from '../../config/gate-config-loader.js';
import { ErrorClassifier } from '../../core/error-classifier.js';
import { QualityPipeline } from '../../core/quality-pipeline.js';
import { GateError } from '../../utils/errors.js';
import { Logger } from '../../utils/logger.js';
import { Severity } from '../../validators/types.js';

export interface RulesOptions {
  config?: string;
}

export interface RuleListing {
  stage: string;
  ruleId: string;
  severity: Severity;
  matchedBy: string | null;
}

const SEVERITY_COLORS: Record<Severity, (text: string) => string> = {
  INFO: chalk.blue,
  WARNING: chalk.yellow,
  ERROR: chalk.red,
  CRITICAL: chalk.bgRed.white,
};

/**
 * Every rule id the configured validators can emit, with its resolved severity.
 */
export function listRules(pipeline: QualityPipeline, classifier: ErrorClassifier): RuleListing[] {
  return pipeline.getValidators().flatMap((validator) =>
    [...validator.ruleIds(), `${validator.stage}.rule-failure`].map((ruleId) => ({
      stage: validator.stage,
      ruleId,
      ...classifier.resolve(ruleId),
    }))
  );
}

export async function rulesCommand(basePath: string, options: RulesOptions = {}): Promise<void> {
  try {
    const { config, metadata } = await new GateConfigLoader(basePath).loadConfig(options.config);
    const pipeline = new QualityPipeline(config);
    const classifier = new ErrorClassifier(config.severities, config.policy.defaultUnclassifiedSeverity);
    const listings = listRules(pipeline, classifier);

    console.log(`\n📋 Rules from ${metadata.sourcePath}\n`);

    const width = Math.max(...listings.map((l) => l.ruleId.length));
    for (const listing of listings) {
      const source = listing.matchedBy === null ? chalk.dim('(default)') : chalk.dim(`(${listing.matchedBy})`);
      console.log(
        `  ${listing.stage.padEnd(10)} ${listing.ruleId.padEnd(width)}  ${SEVERITY_COLORS[listing.severity](listing.severity)} ${source}`
      );
    }

    const { policy } = config;
    console.log(
      `\nPolicy: criticalHalts=${policy.criticalHalts}, errorThreshold=${policy.errorThreshold}, defaultUnclassifiedSeverity=${policy.defaultUnclassifiedSeverity}\n`
    );
  } catch (error) {
    if (error instanceof GateError) {
      Logger.error(error.message);
      process.exit(1);
    }
    throw error;
  }
}
