import { describe, it, expect } from 'vitest';
import { ErrorClassifier } from '../../core/error-classifier.js';
import { createValidationError, ValidationError } from '../../validators/types.js';
import { stopTimeSeverities } from '../fixtures/stop-times.js';

function finding(ruleId: string, stage: ValidationError['stage'] = 'field'): ValidationError {
  return createValidationError({ ruleId, stage, rowIndices: [0], message: `${ruleId} failed` });
}

describe('ErrorClassifier', () => {
  const classifier = new ErrorClassifier(stopTimeSeverities);

  describe('resolve()', () => {
    it('should prefer the exact rule id', () => {
      expect(classifier.resolve('trip_id.required')).toEqual({ severity: 'CRITICAL', matchedBy: 'trip_id.required' });
    });

    it('should fall back to the wildcard on the last segment', () => {
      expect(classifier.resolve('stop_id.required')).toEqual({ severity: 'WARNING', matchedBy: '*.required' });
      expect(classifier.resolve('stop_sequence.type')).toEqual({ severity: 'ERROR', matchedBy: '*.type' });
    });

    it('should use the default for unmapped ids', () => {
      expect(classifier.resolve('unused_stop')).toEqual({ severity: 'WARNING', matchedBy: null });
      expect(new ErrorClassifier(stopTimeSeverities, 'INFO').resolve('x.pattern').severity).toBe('INFO');
    });
  });

  describe('classify()', () => {
    it('should classify by rule id regardless of stage', () => {
      const [fromDomain, fromRelational] = classifier.classify([
        finding('unknown_stop', 'domain'),
        finding('unknown_stop', 'relational'),
      ]);

      expect(fromDomain.severity).toBe('ERROR');
      expect(fromRelational.severity).toBe('ERROR');
    });

    it('should keep finding order and content', () => {
      const input = [finding('duplicate_stop_time', 'relational'), finding('stop_id.required')];

      const classified = classifier.classify(input);

      expect(classified).toEqual([
        { ...input[0], severity: 'CRITICAL', defaulted: false },
        { ...input[1], severity: 'WARNING', defaulted: false },
      ]);
      expect(Object.isFrozen(classified[0])).toBe(true);
    });

    it('should mark and log unmapped rules once per rule id', () => {
      const classified = classifier.classify([finding('unused_stop'), finding('unused_stop'), finding('orphan_trip')]);

      expect(classified.map((e) => e.defaulted)).toEqual([true, true, true]);
      expect(console.warn).toHaveBeenCalledTimes(2);
      expect(console.warn).toHaveBeenCalledWith(
        '⚠️  No severity mapping for rule "unused_stop" (2 findings), classified as WARNING'
      );
      expect(console.warn).toHaveBeenCalledWith(
        '⚠️  No severity mapping for rule "orphan_trip" (1 finding), classified as WARNING'
      );
    });
  });
});
