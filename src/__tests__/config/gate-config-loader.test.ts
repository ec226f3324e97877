import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { GateConfigLoader, resolveGateConfig } from '../../config/gate-config-loader.js';
import { ConfigurationError } from '../../utils/errors.js';
import { createTempDir, cleanupTempDir } from '../setup.js';

describe('GateConfigLoader', () => {
  let tempDir: string;
  let loader: GateConfigLoader;

  beforeEach(async () => {
    tempDir = await createTempDir('gate-config-loader-test-');
    loader = new GateConfigLoader(tempDir);
  });

  afterEach(async () => {
    await cleanupTempDir(tempDir);
  });

  async function writeConfig(content: string, name = 'transport-gate.yml'): Promise<void> {
    await fs.writeFile(path.join(tempDir, name), content, 'utf-8');
  }

  describe('loadConfig', () => {
    it('should load the shipped example config', async () => {
      const example = new GateConfigLoader(process.cwd());

      const { config, metadata } = await example.loadConfig('defaults/transport-gate.example.yml');

      expect(metadata.sourcePath).toBe(path.resolve(process.cwd(), 'defaults/transport-gate.example.yml'));
      expect(config.name).toBe('shipments');
      expect(config.fields).toHaveLength(15);
      expect(config.fields[0]).toEqual({
        name: 'Primary Reference',
        id: 'primary_reference',
        type: 'string',
        required: true,
      });
      expect(config.fields[2].min).toEqual({ kind: 'date', value: new Date('2020-01-01T00:00:00Z') });
      expect(config.fields[2].max).toEqual({ kind: 'now' });
      expect(config.fields[5].allowed?.size).toBe(63);
      expect(config.fields[5].allowed?.has('ON')).toBe(true);
      expect(config.derive).toHaveLength(2);
      expect(config.domainRules.map((r) => r.id)).toEqual([
        'ship_start_after_end',
        'delivery_start_after_end',
        'delivery_before_shipping',
        'non_positive_weight',
        'overweight',
      ]);
      expect(config.policy).toEqual({ criticalHalts: true, errorThreshold: 5, defaultUnclassifiedSeverity: 'WARNING' });
      expect(config.domainRules[3]).toEqual({
        type: 'non-negative',
        id: 'non_positive_weight',
        fields: ['Weight'],
        strict: true,
      });
      expect(config.fields[1].min).toBeUndefined();
      expect(config.severities.get('create_date.max')).toBe('CRITICAL');
      expect(config.severities.get('*.type')).toBe('ERROR');
      expect(config.nullSentinels).toContain('N/A');
    });

    it('should apply defaults to a minimal config', async () => {
      await writeConfig('fields:\n  - name: Trip ID\n');

      const { config } = await loader.loadConfig();

      expect(config.fields).toEqual([{ name: 'Trip ID', id: 'trip_id', type: 'string', required: false }]);
      expect(config.domainRules).toEqual([]);
      expect(config.policy).toEqual({ criticalHalts: true, errorThreshold: 1, defaultUnclassifiedSeverity: 'WARNING' });
      expect(config.severities.get('*.rule-failure')).toBe('CRITICAL');
    });

    it('should let the config override default severities', async () => {
      await writeConfig('severities:\n  "*.required": ERROR\n  unknown_stop: INFO\n');

      const { config } = await loader.loadConfig();

      expect(config.severities.get('*.required')).toBe('ERROR');
      expect(config.severities.get('unknown_stop')).toBe('INFO');
    });

    it('should accept snake_case policy options', async () => {
      await writeConfig('policy:\n  critical_halts: false\n  error_threshold: 3\n  default_unclassified_severity: INFO\n');

      const { config } = await loader.loadConfig();

      expect(config.policy).toEqual({ criticalHalts: false, errorThreshold: 3, defaultUnclassifiedSeverity: 'INFO' });
    });

    it('should resolve lookup paths against the config directory', async () => {
      await fs.mkdir(path.join(tempDir, 'config'));
      await writeConfig(
        [
          'lookups:',
          '  stops: ../data/stops.csv',
          'relationalRules:',
          '  - type: foreign-key',
          '    id: unknown_stop',
          '    field: stop_id',
          '    references: { table: stops, field: stop_id }',
        ].join('\n'),
        'config/gate.yml'
      );

      const { config } = await loader.loadConfig('config/gate.yml');

      expect(config.lookups).toEqual({ stops: path.join(tempDir, 'data', 'stops.csv') });
    });

    it('should throw when the file does not exist', async () => {
      await expect(loader.loadConfig()).rejects.toThrow(
        `Gate config not found: ${path.join(tempDir, 'transport-gate.yml')}`
      );
    });

    it('should throw on invalid YAML', async () => {
      await writeConfig('fields: [unclosed\n');

      await expect(loader.loadConfig()).rejects.toThrow(ConfigurationError);
      await expect(loader.loadConfig()).rejects.toThrow(/^Invalid YAML in /);
    });
  });

  describe('resolveGateConfig', () => {
    async function issuesFor(raw: unknown): Promise<string[]> {
      try {
        await resolveGateConfig(raw, tempDir);
      } catch (error) {
        if (error instanceof ConfigurationError) return error.issues;
        throw error;
      }
      return [];
    }

    it('should report schema violations with their path', async () => {
      const issues = await issuesFor({ fields: [{ name: 'Weight', type: 'decimal' }], policy: { errorThreshold: 0 } });

      expect(issues).toHaveLength(2);
      expect(issues[0]).toMatch(/^fields\.0\.type: /);
      expect(issues[1]).toMatch(/^policy\.errorThreshold: /);
    });

    it('should reject unknown keys', async () => {
      const issues = await issuesFor({ feilds: [] });

      expect(issues).toHaveLength(1);
      expect(issues[0]).toMatch(/^\(root\): /);
    });

    it('should reject bounds that do not fit the field type', async () => {
      const issues = await issuesFor({
        fields: [
          { name: 'Weight', type: 'number', min: 'heavy' },
          { name: 'Create Date', type: 'date', max: 'tomorrow' },
          { name: 'Status', min: 1 },
        ],
      });

      expect(issues).toEqual([
        'fields.0.min: numeric fields need a numeric bound, got "heavy"',
        'fields.1.max: date fields need "now" or a YYYY-MM-DD bound, got "tomorrow"',
        'fields.2.min: min/max apply to number, integer and date fields only',
      ]);
    });

    it('should reject bad patterns and unknown value sets', async () => {
      const issues = await issuesFor({
        fields: [
          { name: 'Code', pattern: '([A-Z' },
          { name: 'State', allowedSet: 'mars-regions' },
        ],
      });

      expect(issues).toHaveLength(2);
      expect(issues[0]).toMatch(/^fields\.0\.pattern: /);
      expect(issues[1]).toBe(
        'fields.1.allowedSet: unknown value set "mars-regions". Available: [us-states, canadian-provinces, north-american-regions]'
      );
    });

    it('should reject duplicate fields and rule ids', async () => {
      const issues = await issuesFor({
        fields: [{ name: 'Trip ID' }, { name: 'trip id' }],
        domainRules: [{ type: 'non-negative', id: 'checks', fields: ['distance'] }],
        relationalRules: [{ type: 'unique', id: 'checks', fields: ['Trip ID'] }],
      });

      expect(issues).toEqual(['duplicate field id: trip_id', 'duplicate rule id: checks']);
    });

    it('should reject unknown or reserved lookup tables', async () => {
      const issues = await issuesFor({
        lookups: { self: 'self.csv' },
        relationalRules: [
          { type: 'foreign-key', id: 'unknown_stop', field: 'stop_id', references: { table: 'stops', field: 'stop_id' } },
          { type: 'has-children', id: 'unused_trip', parent: { table: 'self', field: 'trip_id' }, childField: 'trip_id' },
        ],
      });

      expect(issues).toEqual([
        'lookups.self: "self" is reserved for the dataset itself',
        'relationalRules.0: unknown lookup table "stops"',
        'relationalRules.1.parent.table: has-children needs a lookup table, not "self"',
      ]);
    });
  });
});
