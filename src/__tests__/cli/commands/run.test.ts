import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import {
  applyPolicyOverrides,
  exitCodeFor,
  parseReferenceTime,
  runCommand,
} from '../../../cli/commands/run.js';
import { DEFAULT_POLICY } from '../../../config/schema.js';
import { ConfigurationError } from '../../../utils/errors.js';
import { createTempDir, cleanupTempDir } from '../../setup.js';

const CONFIG = `name: stop_times
fields:
  - name: trip_id
    required: true
  - name: stop_id
    required: true
    case: upper
  - name: stop_sequence
    type: integer
    required: true
relationalRules:
  - type: foreign-key
    id: unknown_stop
    field: stop_id
    references: { table: stops, field: stop_id }
lookups:
  stops: stops.csv
severities:
  trip_id.required: CRITICAL
  unknown_stop: ERROR
policy:
  errorThreshold: 2
`;

describe('runCommand', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir('run-command-test-');
    await fs.writeFile(path.join(tempDir, 'transport-gate.yml'), CONFIG);
    await fs.writeFile(path.join(tempDir, 'stops.csv'), 'stop_id,stop_name\nS1,Central\nS2,Market\n');

    vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`process.exit(${code})`);
    });
  });

  afterEach(async () => {
    await cleanupTempDir(tempDir);
  });

  async function writeData(content: string): Promise<void> {
    await fs.writeFile(path.join(tempDir, 'data.csv'), content);
  }

  function outputFile(name: string): string {
    return path.join(tempDir, 'gate-output', name);
  }

  it('should deliver the cleaned dataset and exit 0 when the gate passes with warnings', async () => {
    await writeData('trip_id,stop_id,stop_sequence\nT1,S1,1\nT1,s2,2\nT1,,3\n');

    await expect(runCommand(tempDir, 'data.csv', { quiet: true })).rejects.toThrow('process.exit(0)');

    expect(await fs.readFile(outputFile('stop_times.cleaned.csv'), 'utf-8')).toBe(
      'trip_id,stop_id,stop_sequence\nT1,S1,1\nT1,S2,2\nT1,,3\n'
    );
    const report = JSON.parse(await fs.readFile(outputFile('stop_times.report.json'), 'utf-8'));
    expect(report.decision).toBe('PASS_WITH_WARNINGS');
    expect(report.errors).toEqual([
      {
        rule_id: 'stop_id.required',
        stage: 'field',
        row_indices: [2],
        field: 'stop_id',
        severity: 'WARNING',
        message: 'stop_id is required',
      },
    ]);
    expect(report.run_id).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('should withhold the dataset and exit 2 on HALT', async () => {
    await writeData('trip_id,stop_id,stop_sequence\nT1,S1,1\n,S2,2\n');

    await expect(runCommand(tempDir, 'data.csv', { quiet: true })).rejects.toThrow('process.exit(2)');

    await expect(fs.access(outputFile('stop_times.cleaned.csv'))).rejects.toThrow();
    const report = JSON.parse(await fs.readFile(outputFile('stop_times.report.json'), 'utf-8'));
    expect(report.decision).toBe('HALT');
    expect(report.counts).toEqual({ INFO: 0, WARNING: 0, ERROR: 0, CRITICAL: 1 });
  });

  it('should log the full report before enforcing the decision', async () => {
    await writeData('trip_id,stop_id,stop_sequence\nT1,S9,1\n,S2,2\n');

    await expect(runCommand(tempDir, 'data.csv', { quiet: true })).rejects.toThrow('process.exit(2)');

    const log = await fs.readFile(outputFile('stop_times.log'), 'utf-8');
    expect(log).toContain('Decision: 🛑 HALT');
    expect(log).toContain('[field] trip_id.required (line 3): trip_id is required');
    expect(log).toContain('[relational] unknown_stop (line 2): stop_id "S9" not found in stops.stop_id');
    expect(log).toContain('ERROR: Cleaned dataset withheld: decision is HALT');
  });

  it('should apply threshold overrides from the command line', async () => {
    await writeData('trip_id,stop_id,stop_sequence\nT1,S9,1\n');

    await expect(runCommand(tempDir, 'data.csv', { quiet: true, errorThreshold: 1 })).rejects.toThrow(
      'process.exit(2)'
    );
  });

  it('should let command line lookups replace configured ones', async () => {
    await fs.writeFile(path.join(tempDir, 'all-stops.csv'), 'stop_id\nS1\nS9\n');
    await writeData('trip_id,stop_id,stop_sequence\nT1,S9,1\n');

    await expect(
      runCommand(tempDir, 'data.csv', { quiet: true, lookups: { stops: 'all-stops.csv' } })
    ).rejects.toThrow('process.exit(0)');

    const report = JSON.parse(await fs.readFile(outputFile('stop_times.report.json'), 'utf-8'));
    expect(report.decision).toBe('PASS');
  });

  it('should exit 1 without writing output when the dataset cannot be loaded', async () => {
    await expect(runCommand(tempDir, 'missing.csv', { quiet: true })).rejects.toThrow('process.exit(1)');

    expect(console.error).toHaveBeenCalledWith(`❌ [${path.join(tempDir, 'missing.csv')}] File not found`);
    await expect(fs.access(path.join(tempDir, 'gate-output'))).rejects.toThrow();
  });

  it('should exit 1 when the config is missing', async () => {
    await writeData('trip_id\nT1\n');

    await expect(runCommand(tempDir, 'data.csv', { config: 'other.yml' })).rejects.toThrow('process.exit(1)');

    expect(console.error).toHaveBeenCalledWith(`❌ Gate config not found: ${path.join(tempDir, 'other.yml')}`);
  });
});

describe('run helpers', () => {
  it('should map decisions to exit codes', () => {
    expect(exitCodeFor('PASS')).toBe(0);
    expect(exitCodeFor('PASS_WITH_WARNINGS')).toBe(0);
    expect(exitCodeFor('HALT')).toBe(2);
  });

  it('should override only the given policy options', () => {
    expect(applyPolicyOverrides(DEFAULT_POLICY, { criticalHalts: false })).toEqual({
      ...DEFAULT_POLICY,
      criticalHalts: false,
    });
    expect(applyPolicyOverrides(DEFAULT_POLICY, {})).toEqual(DEFAULT_POLICY);
  });

  it('should reject invalid overrides', () => {
    expect(() => applyPolicyOverrides(DEFAULT_POLICY, { errorThreshold: 0 })).toThrow(ConfigurationError);
  });

  it('should parse reference times', () => {
    expect(parseReferenceTime(undefined)).toBeUndefined();
    expect(parseReferenceTime('2024-06-01T00:00:00Z')).toEqual(new Date('2024-06-01T00:00:00Z'));
    expect(() => parseReferenceTime('someday')).toThrow('Invalid --reference-time: someday');
  });
});
