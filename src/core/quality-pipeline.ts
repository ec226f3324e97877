// src/core/quality-pipeline.ts

import { DEFAULT_POLICY, GateConfig, SeverityPolicy, SeverityPolicySchema } from '../config/schema.js';
import { ConfigurationError } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';
import { DomainValidator } from '../validators/domain-validator.js';
import { FieldValidator } from '../validators/field-validator.js';
import { RelationalValidator } from '../validators/relational-validator.js';
import {
  createValidationError,
  STAGE_ORDER,
  ValidationContext,
  ValidationError,
  Validator,
} from '../validators/types.js';
import { Cleaner } from './cleaner.js';
import { Dataset, freezeDataset } from './dataset.js';
import { ErrorClassifier } from './error-classifier.js';
import { Decision, ErrorReport } from './error-report.js';
import { evaluatePolicy, PolicyEvaluation } from './severity-policy.js';

export type PipelineConfig = Pick<
  GateConfig,
  'fields' | 'derive' | 'nullSentinels' | 'domainRules' | 'relationalRules' | 'severities'
>;

export interface PipelineRunOptions {
  /** "now" for date rules; defaults to the wall clock at run start */
  referenceTime?: Date;
}

export interface PipelineResult {
  cleanedDataset: Dataset;
  report: ErrorReport;
  decision: Decision;
  evaluation: PolicyEvaluation;
}

/**
 * Runs Cleaner → {Field, Domain, Relational} validators → classifier → policy.
 * Validators run concurrently and always to completion; their findings are
 * merged in stage order regardless of which finishes first. A HALT decision is
 * returned, never thrown.
 */
export class QualityPipeline {
  private cleaner: Cleaner;
  private validators: Validator[] = [];

  constructor(private config: PipelineConfig) {
    this.cleaner = new Cleaner({
      fields: config.fields,
      derive: config.derive,
      nullSentinels: config.nullSentinels,
    });

    this.register(new FieldValidator(config.fields));
    this.register(new DomainValidator(config.domainRules));
    this.register(new RelationalValidator(config.relationalRules));
  }

  /**
   * Register a validator. Validators are kept sorted by stage; the sort is stable,
   * so validators of the same stage keep registration order.
   */
  register(validator: Validator): void {
    this.validators.push(validator);
    this.validators.sort((a, b) => STAGE_ORDER.indexOf(a.stage) - STAGE_ORDER.indexOf(b.stage));
  }

  getValidators(): readonly Validator[] {
    return this.validators;
  }

  async run(
    rawDataset: Dataset,
    policy: SeverityPolicy = DEFAULT_POLICY,
    options: PipelineRunOptions = {}
  ): Promise<PipelineResult> {
    const gatePolicy = validatePolicy(policy);
    const report = new ErrorReport(rawDataset.name);
    const referenceTime = options.referenceTime ?? new Date();

    const cleanedDataset = freezeDataset(this.cleaner.clean(rawDataset));
    Logger.debug(`Cleaned ${cleanedDataset.records.length} records of ${cleanedDataset.name}`);

    const context: ValidationContext = { dataset: cleanedDataset, referenceTime };
    const outputs = await this.runValidators(context);

    const classifier = new ErrorClassifier(this.config.severities, gatePolicy.defaultUnclassifiedSeverity);
    outputs.forEach(({ validator, errors }) => {
      Logger.debug(`Validator ${validator.name}: ${errors.length} finding(s)`);
      report.append(validator.stage, classifier.classify(errors));
    });

    const evaluation = evaluatePolicy(report.errors, gatePolicy);
    report.finalize(evaluation.decision);

    return { cleanedDataset, report, decision: evaluation.decision, evaluation };
  }

  /**
   * Fan-out/fan-in over all validators. A validator that throws is turned into
   * a `<stage>.rule-failure` finding so the others still report.
   */
  private async runValidators(
    context: ValidationContext
  ): Promise<Array<{ validator: Validator; errors: ValidationError[] }>> {
    const results = await Promise.allSettled(
      this.validators.map(async (validator) => validator.validate(context))
    );

    return results.map((result, index) => {
      const validator = this.validators[index];
      if (result.status === 'fulfilled') {
        return { validator, errors: result.value };
      }

      const reason = result.reason instanceof Error ? result.reason.message : String(result.reason);
      Logger.error(`Validator ${validator.name} failed: ${reason}`);
      return {
        validator,
        errors: [
          createValidationError({
            ruleId: `${validator.stage}.rule-failure`,
            stage: validator.stage,
            rowIndices: [],
            message: `Validator ${validator.name} failed: ${reason}`,
          }),
        ],
      };
    });
  }
}

/**
 * Policies built in code skip the config loader, so they are checked here.
 */
export function validatePolicy(policy: SeverityPolicy): SeverityPolicy {
  const parsed = SeverityPolicySchema.safeParse(policy);
  if (!parsed.success) {
    throw new ConfigurationError(
      'Invalid severity policy',
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return parsed.data;
}
