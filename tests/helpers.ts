/**
 * Shared test data
 */

import type { RawRow } from '../src/types/data-model.js';
import { RecordStore } from '../src/lib/store/index.js';

export const REFERENCE_ROWS: RawRow[] = [
  { Age: 28, ZIP: '35294', Gender: 'F', Diagnosis: 'Asthma' },
  { Age: 29, ZIP: '35294', Gender: 'M', Diagnosis: 'Diabetes' },
  { Age: 29, ZIP: '35295', Gender: 'F', Diagnosis: 'Asthma' },
  { Age: 40, ZIP: '35294', Gender: 'M', Diagnosis: 'Cancer' },
  { Age: 40, ZIP: '35295', Gender: 'F', Diagnosis: 'Cancer' },
  { Age: 41, ZIP: '35295', Gender: 'M', Diagnosis: 'Diabetes' },
];

export function referenceStore(): RecordStore {
  return RecordStore.from(REFERENCE_ROWS, { sensitiveAttribute: 'Diagnosis' });
}

/**
 * Deterministic pseudo-random rows for property checks (LCG, fixed seed)
 */
export function syntheticRows(count: number, seed = 42): RawRow[] {
  let state = seed;
  const next = (): number => {
    state = (Math.imul(state, 1103515245) + 12345) >>> 0;
    return state / 4294967296;
  };
  const diagnoses = ['Asthma', 'Diabetes', 'Cancer', 'Flu'];
  const rows: RawRow[] = [];

  for (let i = 0; i < count; i++) {
    rows.push({
      Age: Math.floor(next() * 90) + 10,
      ZIP: String(35000 + Math.floor(next() * 600)),
      Gender: next() < 0.5 ? 'F' : 'M',
      Diagnosis: diagnoses[Math.floor(next() * diagnoses.length)] ?? 'Flu',
    });
  }
  return rows;
}
