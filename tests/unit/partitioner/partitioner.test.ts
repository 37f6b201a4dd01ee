import { describe, it, expect } from 'vitest';
import {
  partitionRecords,
  validateQuasiIdentifiers,
} from '../../../src/lib/partitioner/index.js';
import { RecordStore } from '../../../src/lib/store/index.js';
import { prefixMask } from '../../../src/lib/generalizer/index.js';
import { InvalidInputError } from '../../../src/utils/errors.js';
import { referenceStore } from '../../helpers.js';

describe('Partitioner', () => {
  describe('partitionRecords()', () => {
    it('should group records sharing a QI tuple', () => {
      const partition = partitionRecords(referenceStore(), ['Gender']);

      expect(partition.classes).toHaveLength(2);
      expect(partition.classes[0]).toMatchObject({
        key: ['F'],
        label: { Gender: 'F' },
        size: 3,
        memberIndices: [0, 2, 4],
        sensitiveValues: ['Asthma', 'Asthma', 'Cancer'],
      });
      expect(partition.classes[1]).toMatchObject({
        key: ['M'],
        size: 3,
        memberIndices: [1, 3, 5],
        sensitiveValues: ['Diabetes', 'Cancer', 'Diabetes'],
      });
    });

    it('should cover every record exactly once', () => {
      const partition = partitionRecords(referenceStore(), ['Age', 'ZIP', 'Gender']);
      const members = partition.classes.flatMap((c) => [...c.memberIndices]).sort((a, b) => a - b);

      expect(members).toEqual([0, 1, 2, 3, 4, 5]);
      expect(partition.classes.reduce((sum, c) => sum + c.size, 0)).toBe(partition.recordCount);
    });

    it('should sort classes by key', () => {
      const partition = partitionRecords(referenceStore(), ['Age', 'ZIP', 'Gender']);

      expect(partition.classes.map((c) => c.key)).toEqual([
        [28, '35294', 'F'],
        [29, '35294', 'M'],
        [29, '35295', 'F'],
        [40, '35294', 'M'],
        [40, '35295', 'F'],
        [41, '35295', 'M'],
      ]);
    });

    it('should keep values of different types apart and treat null as a value', () => {
      const store = RecordStore.from(
        [
          { A: 1, S: 'x' },
          { A: '1', S: 'y' },
          { A: null, S: 'z' },
          { A: true, S: 'x' },
          { S: 'y' },
        ],
        { sensitiveAttribute: 'S' },
      );
      const partition = partitionRecords(store, ['A']);

      expect(partition.classes.map((c) => c.key)).toEqual([[null], [true], [1], ['1']]);
      expect(partition.classes[0]?.memberIndices).toEqual([2, 4]);
    });

    it('should keep masked values apart when prefixes differ in astral characters', () => {
      const store = RecordStore.from(
        [
          { Tag: '😀x', S: 'a' },
          { Tag: '😁x', S: 'b' },
        ],
        { sensitiveAttribute: 'S' },
      ).withGeneralized('Tag', prefixMask(1, '**'));
      const partition = partitionRecords(store, ['Tag']);

      expect(partition.classes.map((c) => c.key)).toEqual([['😀**'], ['😁**']]);
    });

    it('should return no classes for an empty store', () => {
      const store = RecordStore.from([], { sensitiveAttribute: 'Diagnosis' });
      const partition = partitionRecords(store, ['Age']);

      expect(partition.classes).toEqual([]);
      expect(partition.recordCount).toBe(0);
    });

    it('should record the QI list and sensitive attribute', () => {
      const partition = partitionRecords(referenceStore(), ['ZIP']);

      expect(partition.quasiIdentifiers).toEqual(['ZIP']);
      expect(partition.sensitiveAttribute).toBe('Diagnosis');
    });
  });

  describe('validateQuasiIdentifiers()', () => {
    it('should require at least one QI', () => {
      expect(() => validateQuasiIdentifiers(referenceStore(), [])).toThrow(
        'At least one quasi-identifier is required',
      );
    });

    it('should reject duplicates', () => {
      expect(() => validateQuasiIdentifiers(referenceStore(), ['Age', 'Age'])).toThrow(
        'Duplicate quasi-identifier(s): Age',
      );
    });

    it('should reject the sensitive attribute', () => {
      expect(() => validateQuasiIdentifiers(referenceStore(), ['Diagnosis'])).toThrow(
        InvalidInputError,
      );
    });

    it('should reject unknown attributes', () => {
      expect(() => partitionRecords(referenceStore(), ['Age', 'Income'])).toThrow(
        'Unknown quasi-identifier attribute(s): Income',
      );
    });
  });
});
