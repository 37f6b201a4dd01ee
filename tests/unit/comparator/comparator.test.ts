import { describe, it, expect } from 'vitest';
import {
  allScenariosPassed,
  applyGeneralizations,
  compareScenarios,
  quasiIdentifierName,
  runScenario,
  summarizeComparison,
} from '../../../src/lib/comparator/index.js';
import { ErrorCode, InvalidInputError } from '../../../src/utils/errors.js';
import type { ScenarioConfig } from '../../../src/types/data-model.js';
import { referenceStore } from '../../helpers.js';

const LENIENT = { kMin: 1, lMin: 1, tMax: 1 };

const light: ScenarioConfig = {
  name: 'light',
  quasiIdentifiers: [
    { attribute: 'Age', generalization: { type: 'band', width: 10 }, as: 'AgeBand' },
    { attribute: 'ZIP', generalization: { type: 'prefix', length: 3 }, as: 'ZIP3' },
    'Gender',
  ],
  thresholds: { kMin: 2, lMin: 2, tMax: 0.2 },
};

const broken: ScenarioConfig = {
  name: 'broken',
  quasiIdentifiers: [{ attribute: 'Gender', generalization: { type: 'band' } }],
  thresholds: LENIENT,
};

describe('Scenario comparator', () => {
  describe('quasiIdentifierName()', () => {
    it('should prefer the alias of a generalized QI', () => {
      expect(quasiIdentifierName('ZIP')).toBe('ZIP');
      expect(quasiIdentifierName({ attribute: 'ZIP' })).toBe('ZIP');
      expect(quasiIdentifierName({ attribute: 'ZIP', as: 'ZIP3' })).toBe('ZIP3');
    });
  });

  describe('applyGeneralizations()', () => {
    it('should derive generalized columns and label them', () => {
      const store = referenceStore();
      const { store: local, generalizations } = applyGeneralizations(store, light.quasiIdentifiers);

      expect(generalizations).toEqual({ AgeBand: 'band(10)', ZIP3: 'prefix(3,"**")' });
      expect(local.column('ZIP3')).toEqual(['352**', '352**', '352**', '352**', '352**', '352**']);
      expect(store.hasAttribute('AgeBand')).toBe(false);
    });

    it('should reject a rename without a generalization', () => {
      expect(() => applyGeneralizations(referenceStore(), [{ attribute: 'Age', as: 'Years' }])).toThrow(
        InvalidInputError,
      );
    });
  });

  describe('runScenario()', () => {
    it('should report the light scenario against its thresholds', () => {
      const report = runScenario(referenceStore(), light);

      expect(report.quasiIdentifiers).toEqual(['AgeBand', 'ZIP3', 'Gender']);
      expect(report.classCount).toBe(4);
      expect(report.recordCount).toBe(6);
      expect(report.metrics.k).toBe(1);
      expect(report.metrics.l).toBe(1);
      expect(report.metrics.t).toBeCloseTo(2 / 3, 10);
      expect(report.violations.k.map((v) => v.key)).toEqual([
        { AgeBand: '20-29', ZIP3: '352**', Gender: 'M' },
        { AgeBand: '40-49', ZIP3: '352**', Gender: 'F' },
      ]);
      expect(report.violations.l.map((v) => v.size)).toEqual([2, 1, 1]);
      expect(report.violations.t).toHaveLength(4);
      expect(report.overallPassed).toBe(false);
    });
  });

  describe('compareScenarios()', () => {
    it('should keep running after a failing scenario', () => {
      const outcomes = compareScenarios(referenceStore(), [
        broken,
        { name: 'raw', quasiIdentifiers: ['Gender'], thresholds: LENIENT },
      ]);

      expect(outcomes.map((o) => o.status)).toEqual(['error', 'success']);
      const [failure] = outcomes;
      if (failure?.status !== 'error') {
        throw new Error('expected an error outcome');
      }
      expect(failure.error.code).toBe(ErrorCode.INVALID_INPUT);
      expect(failure.error.message).toContain('Cannot generalize attribute "Gender" at record 0');
    });

    it('should rethrow under failFast', () => {
      expect(() => compareScenarios(referenceStore(), [broken], { failFast: true })).toThrow(
        InvalidInputError,
      );
    });

    it('should reject duplicate scenario names', () => {
      expect(() =>
        compareScenarios(referenceStore(), [
          { name: 'a', quasiIdentifiers: ['Age'], thresholds: LENIENT },
          { name: 'a', quasiIdentifiers: ['ZIP'], thresholds: LENIENT },
        ]),
      ).toThrow('Scenario names must be unique: a');
    });

    it('should use one global distribution for every scenario', () => {
      const [first, second] = compareScenarios(referenceStore(), [
        { name: 'gender', quasiIdentifiers: ['Gender'], thresholds: LENIENT },
        { name: 'also-gender', quasiIdentifiers: ['Gender'], thresholds: LENIENT },
      ]);

      if (first?.status !== 'success' || second?.status !== 'success') {
        throw new Error('expected two successful outcomes');
      }
      expect(second.report.metrics).toEqual(first.report.metrics);
    });
  });

  describe('summarizeComparison()', () => {
    it('should produce one row per outcome', () => {
      const outcomes = compareScenarios(referenceStore(), [
        { name: 'raw', quasiIdentifiers: ['Gender'], thresholds: { kMin: 3, lMin: 2, tMax: 0.5 } },
        broken,
      ]);
      const rows = summarizeComparison(outcomes);

      expect(rows[0]).toMatchObject({ scenario: 'raw', quasiIdentifiers: ['Gender'], k: 3, l: 2, passed: true });
      expect(rows[1]).toMatchObject({ scenario: 'broken', k: null, l: null, t: null, passed: false });
      expect(allScenariosPassed(outcomes)).toBe(false);
      expect(allScenariosPassed(outcomes.slice(0, 1))).toBe(true);
    });
  });
});
