import { describe, it, expect } from 'vitest';
import {
  formatComparison,
  formatKey,
  formatPartition,
  formatScenarioReport,
} from '../../../src/lib/reporter/format.js';
import { compareScenarios, runScenario } from '../../../src/lib/comparator/index.js';
import { computeMetrics } from '../../../src/lib/metrics/index.js';
import { partitionRecords } from '../../../src/lib/partitioner/index.js';
import { RecordStore } from '../../../src/lib/store/index.js';
import type { ScenarioConfig, Thresholds } from '../../../src/types/data-model.js';
import { referenceStore } from '../../helpers.js';

function strongScenario(thresholds: Thresholds): ScenarioConfig {
  return {
    name: 'strong',
    quasiIdentifiers: [
      { attribute: 'Age', generalization: { type: 'band', width: 10 }, as: 'AgeBand' },
      { attribute: 'ZIP', generalization: { type: 'prefix', length: 3, mask: '**' }, as: 'ZIP3' },
    ],
    thresholds,
  };
}

describe('Report formatting', () => {
  it('should render a key as name=value pairs', () => {
    expect(formatKey({ AgeBand: '20-29', ZIP3: '352**', Smoker: null })).toBe(
      'AgeBand=20-29 ZIP3=352** Smoker=null',
    );
  });

  it('should render a passing scenario', () => {
    const report = runScenario(referenceStore(), strongScenario({ kMin: 3, lMin: 2, tMax: 0.34 }));

    expect(formatScenarioReport(report).split('\n')).toEqual([
      '--- Privacy report for QI=[AgeBand, ZIP3] (scenario: strong) ---',
      'records = 6, equivalence classes = 2, sensitive attribute = Diagnosis',
      'generalizations: AgeBand=band(10), ZIP3=prefix(3,"**")',
      'k-anonymity = 3  (require k ≥ 3)  PASS',
      'l-diversity = 2  (require l ≥ 2)  PASS',
      't-closeness (TV) = 0.333  (require t ≤ 0.34)  PASS',
    ]);
  });

  it('should list violating groups under each failing metric', () => {
    const report = runScenario(referenceStore(), strongScenario({ kMin: 4, lMin: 3, tMax: 0.3 }));

    expect(formatScenarioReport(report).split('\n').slice(3)).toEqual([
      'k-anonymity = 3  (require k ≥ 4)  FAIL',
      '  Groups violating k:',
      '    AgeBand=20-29 ZIP3=352**  size=3',
      '    AgeBand=40-49 ZIP3=352**  size=3',
      'l-diversity = 2  (require l ≥ 3)  FAIL',
      '  Groups violating l:',
      '    AgeBand=20-29 ZIP3=352**  size=3  l=2',
      '    AgeBand=40-49 ZIP3=352**  size=3  l=2',
      't-closeness (TV) = 0.333  (require t ≤ 0.3)  FAIL',
      '  Groups violating t:',
      '    AgeBand=20-29 ZIP3=352**  size=3  tv=0.333',
      '    AgeBand=40-49 ZIP3=352**  size=3  tv=0.333',
    ]);
  });

  it('should note an empty dataset', () => {
    const store = RecordStore.from([], { sensitiveAttribute: 'Diagnosis' });
    const report = runScenario(store, {
      name: 'empty',
      quasiIdentifiers: ['Age'],
      thresholds: { kMin: 2, lMin: 2, tMax: 0.2 },
    });

    expect(formatScenarioReport(report).split('\n')).toEqual([
      '--- Privacy report for QI=[Age] (scenario: empty) ---',
      'records = 0, equivalence classes = 0, sensitive attribute = Diagnosis',
      'k-anonymity = 0  (require k ≥ 2)  PASS',
      'l-diversity = 0  (require l ≥ 2)  PASS',
      't-closeness (TV) = 0.000  (require t ≤ 0.2)  PASS',
      '  (empty dataset: no equivalence classes, thresholds treated as met)',
    ]);
  });

  it('should tabulate scenarios side by side', () => {
    const outcomes = compareScenarios(referenceStore(), [
      strongScenario({ kMin: 3, lMin: 2, tMax: 0.34 }),
      { name: 'broken', quasiIdentifiers: ['Income'], thresholds: { kMin: 2, lMin: 2, tMax: 0.2 } },
    ]);
    const lines = formatComparison(outcomes).split('\n');

    expect(lines[0]).toBe('scenario  quasi-identifiers  k  l  t      result');
    expect(lines[1]?.startsWith('--------  -----------------  -  -  -----  ------')).toBe(true);
    expect(lines[2]).toBe('strong    AgeBand, ZIP3      3  2  0.333  PASS');
    expect(lines[3]).toBe(
      'broken    -' + ' '.repeat(18) + '-  -  -' + ' '.repeat(6) +
        'ERROR: Unknown quasi-identifier attribute(s): Income',
    );
  });

  it('should list classes of a partition with their measurements', () => {
    const assessment = computeMetrics(partitionRecords(referenceStore(), ['Gender']));

    expect(formatPartition(assessment).split('\n')).toEqual([
      'QI=[Gender]  SA=Diagnosis  records=6  classes=2',
      'Gender=F  size=3  distinct=2  tv=0.333',
      'Gender=M  size=3  distinct=2  tv=0.333',
      'k=3  l=2  t=0.333',
    ]);
  });
});
