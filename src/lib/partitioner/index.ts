/**
 * Equivalence class partitioner - groups records by their QI value tuple
 */

import type {
  EquivalenceClass,
  Partition,
  ScalarValue,
} from "../../types/data-model.js";
import type { RecordStore } from "../store/index.js";
import { InvalidInputError } from "../../utils/errors.js";
import { compareTuples, encodeTuple } from "../../utils/frequency-map.js";
import { logger } from "../../utils/logger.js";

interface ClassAccumulator {
  key: ScalarValue[];
  memberIndices: number[];
  sensitiveValues: ScalarValue[];
}

/**
 * Check a QI selection against the store before grouping
 */
export function validateQuasiIdentifiers(
  store: RecordStore,
  quasiIdentifiers: readonly string[],
): void {
  if (quasiIdentifiers.length === 0) {
    throw new InvalidInputError("At least one quasi-identifier is required");
  }

  const duplicates = quasiIdentifiers.filter(
    (name, index) => quasiIdentifiers.indexOf(name) !== index,
  );
  if (duplicates.length > 0) {
    throw new InvalidInputError(
      `Duplicate quasi-identifier(s): ${[...new Set(duplicates)].join(", ")}`,
      { duplicates },
    );
  }

  if (quasiIdentifiers.includes(store.sensitiveAttribute)) {
    throw new InvalidInputError(
      `The sensitive attribute "${store.sensitiveAttribute}" cannot be a quasi-identifier`,
      { attribute: store.sensitiveAttribute },
    );
  }

  store.assertAttributes(quasiIdentifiers, "quasi-identifier");
}

/**
 * Partition the store into equivalence classes over the given QI columns.
 * Key equality is exact and type-aware; null is a valid key component.
 * Classes come back sorted by key.
 */
export function partitionRecords(
  store: RecordStore,
  quasiIdentifiers: readonly string[],
): Partition {
  validateQuasiIdentifiers(store, quasiIdentifiers);

  const groups = new Map<string, ClassAccumulator>();
  const sensitiveAttribute = store.sensitiveAttribute;

  store.records().forEach((record, index) => {
    const key = quasiIdentifiers.map((name) => record[name] ?? null);
    const encoded = encodeTuple(key);

    let group = groups.get(encoded);
    if (!group) {
      group = { key, memberIndices: [], sensitiveValues: [] };
      groups.set(encoded, group);
    }
    group.memberIndices.push(index);
    group.sensitiveValues.push(record[sensitiveAttribute] ?? null);
  });

  const classes: EquivalenceClass[] = [...groups.values()]
    .sort((a, b) => compareTuples(a.key, b.key))
    .map((group) => ({
      key: Object.freeze(group.key),
      label: Object.freeze(
        Object.fromEntries(
          quasiIdentifiers.map((name, i) => [name, group.key[i] ?? null]),
        ),
      ),
      size: group.memberIndices.length,
      memberIndices: Object.freeze(group.memberIndices),
      sensitiveValues: Object.freeze(group.sensitiveValues),
    }));

  logger.debug("Partitioned records", {
    quasiIdentifiers,
    records: store.size,
    classes: classes.length,
  });

  return {
    quasiIdentifiers: [...quasiIdentifiers],
    sensitiveAttribute,
    recordCount: store.size,
    classes,
  };
}
