// src/config/schema.ts

import { z } from 'zod';
import type { Severity } from '../validators/types.js';

export const SeveritySchema = z.enum(['INFO', 'WARNING', 'ERROR', 'CRITICAL']);

const POLICY_ALIASES: Record<string, string> = {
  critical_halts: 'criticalHalts',
  error_threshold: 'errorThreshold',
  default_unclassified_severity: 'defaultUnclassifiedSeverity',
};

/**
 * Halt policy. Accepts the documented snake_case option names as aliases.
 */
export const SeverityPolicySchema = z.preprocess(
  (raw) => {
    if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) return raw;
    return Object.fromEntries(
      Object.entries(raw).map(([key, value]) => [POLICY_ALIASES[key] ?? key, value])
    );
  },
  z
    .object({
      criticalHalts: z.boolean().default(true),
      errorThreshold: z.number().int().positive().default(1),
      defaultUnclassifiedSeverity: SeveritySchema.default('WARNING'),
    })
    .strict()
);

export type SeverityPolicy = z.infer<typeof SeverityPolicySchema>;

export const DEFAULT_POLICY: SeverityPolicy = {
  criticalHalts: true,
  errorThreshold: 1,
  defaultUnclassifiedSeverity: 'WARNING',
};

const RuleIdSchema = z
  .string()
  .regex(/^[a-z0-9_][a-z0-9_.-]*$/, 'rule ids use lowercase letters, digits, "_", "-" and "."');

const BoundSchema = z.union([z.number(), z.string().min(1)]);

export const FieldSpecSchema = z
  .object({
    name: z.string().min(1),
    id: z.string().regex(/^[a-z0-9_]+$/).optional(),
    type: z.enum(['string', 'number', 'integer', 'date']).default('string'),
    required: z.boolean().default(false),
    case: z.enum(['upper', 'lower']).optional(),
    pattern: z.string().min(1).optional(),
    allowed: z.array(z.union([z.string(), z.number()])).min(1).optional(),
    allowedSet: z.string().min(1).optional(),
    length: z
      .object({
        min: z.number().int().nonnegative().optional(),
        max: z.number().int().positive().optional(),
      })
      .strict()
      .optional(),
    min: BoundSchema.optional(),
    max: BoundSchema.optional(),
  })
  .strict();

export const DeriveSpecSchema = z
  .object({
    from: z.string().min(1),
    separator: z.string().min(1),
    into: z.tuple([z.string().min(1), z.string().min(1)]),
  })
  .strict();

export const DomainRuleConfigSchema = z.discriminatedUnion('type', [
  z
    .object({
      type: z.literal('ordered'),
      id: RuleIdSchema,
      earlier: z.string().min(1),
      later: z.string().min(1),
      strict: z.boolean().default(false),
    })
    .strict(),
  z
    .object({
      type: z.literal('coordinates'),
      id: RuleIdSchema,
      latitude: z.string().min(1),
      longitude: z.string().min(1),
    })
    .strict(),
  z
    .object({
      type: z.literal('non-negative'),
      id: RuleIdSchema,
      fields: z.array(z.string().min(1)).min(1),
      /** Zero is a violation too (weights, capacities) */
      strict: z.boolean().default(false),
    })
    .strict(),
  z
    .object({
      type: z.literal('ceiling'),
      id: RuleIdSchema,
      field: z.string().min(1),
      limit: z.number(),
      exemptField: z.string().min(1).optional(),
      exemptValues: z.array(z.string()).default([]),
    })
    .strict(),
  z
    .object({
      type: z.literal('sequence'),
      id: RuleIdSchema,
      groupBy: z.string().min(1),
      field: z.string().min(1),
    })
    .strict(),
]);

export type DomainRuleConfig = z.infer<typeof DomainRuleConfigSchema>;

const TableRefSchema = z
  .object({
    table: z.string().min(1),
    field: z.string().min(1),
  })
  .strict();

export const RelationalRuleConfigSchema = z.discriminatedUnion('type', [
  z
    .object({
      type: z.literal('unique'),
      id: RuleIdSchema,
      fields: z.array(z.string().min(1)).min(1),
    })
    .strict(),
  z
    .object({
      type: z.literal('foreign-key'),
      id: RuleIdSchema,
      field: z.string().min(1),
      references: TableRefSchema,
    })
    .strict(),
  z
    .object({
      type: z.literal('has-children'),
      id: RuleIdSchema,
      parent: TableRefSchema,
      childField: z.string().min(1),
    })
    .strict(),
]);

export type RelationalRuleConfig = z.infer<typeof RelationalRuleConfigSchema>;

export const GateConfigFileSchema = z
  .object({
    name: z.string().min(1).optional(),
    nullSentinels: z.array(z.string()).optional(),
    fields: z.array(FieldSpecSchema).default([]),
    derive: z.array(DeriveSpecSchema).default([]),
    domainRules: z.array(DomainRuleConfigSchema).default([]),
    relationalRules: z.array(RelationalRuleConfigSchema).default([]),
    lookups: z.record(z.string().min(1), z.string().min(1)).default({}),
    severities: z.record(z.string().min(1), SeveritySchema).default({}),
    policy: SeverityPolicySchema.default({}),
  })
  .strict();

export type GateConfigFile = z.infer<typeof GateConfigFileSchema>;

export type FieldType = 'string' | 'number' | 'integer' | 'date';

/**
 * A resolved range bound. `now` is evaluated against the run's reference time.
 */
export type Bound =
  | { kind: 'number'; value: number }
  | { kind: 'date'; value: Date }
  | { kind: 'now' };

export interface FieldSpec {
  name: string;                        // Column name as it appears in the dataset
  id: string;                          // Slug used in rule ids, e.g. primary_reference
  type: FieldType;
  required: boolean;
  case?: 'upper' | 'lower';
  pattern?: RegExp;
  allowed?: ReadonlySet<string>;
  length?: { min?: number; max?: number };
  min?: Bound;
  max?: Bound;
}

export type DeriveSpec = z.infer<typeof DeriveSpecSchema>;

/** Rule id → severity; keys may be exact ids or `*.<check>` wildcards */
export type SeverityTable = ReadonlyMap<string, Severity>;

export const DEFAULT_NULL_SENTINELS: readonly string[] = ['', 'NA', 'N/A', 'NULL', 'null', 'NaN', 'nan'];

/**
 * Fully resolved gate configuration handed to the pipeline.
 */
export interface GateConfig {
  name?: string;
  nullSentinels: readonly string[];
  fields: readonly FieldSpec[];
  derive: readonly DeriveSpec[];
  domainRules: readonly DomainRuleConfig[];
  relationalRules: readonly RelationalRuleConfig[];
  /** Lookup name → absolute file path */
  lookups: Readonly<Record<string, string>>;
  severities: SeverityTable;
  policy: SeverityPolicy;
}

export interface GateConfigMetadata {
  sourcePath: string;                  // Absolute path to YAML file
  loadedAt: string;                    // ISO timestamp
}
