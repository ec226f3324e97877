// src/cli/commands/register-core.ts - Core command registrations

import { InvalidArgumentError, type Command } from 'commander';

import { runCommand } from './run.js';
import { rulesCommand } from './rules.js';
import { initCommand } from './init.js';

export function parseLookup(value: string, previous: Record<string, string> = {}): Record<string, string> {
  const separator = value.indexOf('=');
  if (separator <= 0 || separator === value.length - 1) {
    throw new InvalidArgumentError('Expected <name>=<path>, e.g. stops=stops.csv');
  }
  return { ...previous, [value.slice(0, separator)]: value.slice(separator + 1) };
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer');
  }
  return parsed;
}

export function registerCoreCommands(program: Command): void {
  const basePath = process.cwd();

  program
    .command('run')
    .description('Clean, validate and gate a dataset')
    .argument('<dataset>', 'Dataset file (.csv, .xlsx, .xls, .json)')
    .option('-c, --config <file>', 'Gate config file', 'transport-gate.yml')
    .option('-o, --output-dir <dir>', 'Directory for report, log and cleaned dataset', 'gate-output')
    .option('--lookup <name=path>', 'Reference table for relational rules (repeatable)', parseLookup)
    .option('--sheet <name>', 'Worksheet to read from spreadsheet files')
    .option('--critical-halts', 'Halt on any CRITICAL finding')
    .option('--no-critical-halts', 'Count CRITICAL findings toward the error threshold instead')
    .option('--error-threshold <n>', 'ERROR findings that trigger HALT', parsePositiveInt)
    .option('--reference-time <iso>', 'Fixed "now" for date rules (reproducible reruns)')
    .option('--quiet', 'Only write the log file and the final decision')
    .action(async (dataset: string, opts: {
      config?: string;
      outputDir?: string;
      lookup?: Record<string, string>;
      sheet?: string;
      criticalHalts?: boolean;
      errorThreshold?: number;
      referenceTime?: string;
      quiet?: boolean;
    }) => {
      await runCommand(basePath, dataset, {
        config: opts.config,
        outputDir: opts.outputDir,
        lookups: opts.lookup,
        sheet: opts.sheet,
        criticalHalts: opts.criticalHalts,
        errorThreshold: opts.errorThreshold,
        referenceTime: opts.referenceTime,
        quiet: opts.quiet,
      });
    });

  program
    .command('rules')
    .description('List rule ids and their resolved severities')
    .option('-c, --config <file>', 'Gate config file', 'transport-gate.yml')
    .action(async (opts: { config?: string }) => {
      await rulesCommand(basePath, opts);
    });

  program
    .command('init')
    .description('Write an example transport-gate.yml')
    .option('--force', 'Overwrite an existing config')
    .action(async (opts: { force?: boolean }) => {
      await initCommand(basePath, opts);
    });
}
