/**
 * Record store - immutable in-memory table of records
 *
 * Deriving a generalized column returns a new store; an existing store is
 * never mutated, so one instance can back any number of scenarios.
 */

import type {
  DataRecord,
  Generalizer,
  RawRow,
  ScalarValue,
} from "../../types/data-model.js";
import { InvalidInputError, ReidRiskError } from "../../utils/errors.js";

export interface RecordStoreOptions {
  sensitiveAttribute: string;
  attributes?: readonly string[]; // Explicit schema, otherwise inferred from the rows
}

export type AttributeRole =
  | "quasi-identifier"
  | "sensitive attribute"
  | "generalization source";

export function isScalarValue(value: unknown): value is ScalarValue {
  return (
    value === null ||
    typeof value === "string" ||
    typeof value === "boolean" ||
    (typeof value === "number" && Number.isFinite(value))
  );
}

export class RecordStore {
  private constructor(
    private readonly _attributes: readonly string[],
    private readonly _records: readonly DataRecord[],
    readonly sensitiveAttribute: string,
    private readonly schemaOpen: boolean,
  ) {}

  /**
   * Build a store from loader rows. Missing attributes become null.
   */
  static from(rows: readonly RawRow[], options: RecordStoreOptions): RecordStore {
    const attributes = options.attributes
      ? [...options.attributes]
      : inferAttributes(rows);
    const schemaOpen = !options.attributes && rows.length === 0;

    if (new Set(attributes).size !== attributes.length) {
      throw new InvalidInputError("Attribute names must be unique", {
        attributes,
      });
    }

    if (!schemaOpen && !attributes.includes(options.sensitiveAttribute)) {
      throw new InvalidInputError(
        `Sensitive attribute "${options.sensitiveAttribute}" is not in the dataset schema`,
        { attribute: options.sensitiveAttribute, attributes },
      );
    }

    const records = rows.map((row, index) =>
      freezeRecord(row, attributes, index),
    );

    return new RecordStore(
      Object.freeze(attributes),
      Object.freeze(records),
      options.sensitiveAttribute,
      schemaOpen,
    );
  }

  get size(): number {
    return this._records.length;
  }

  get attributes(): readonly string[] {
    return this._attributes;
  }

  records(): readonly DataRecord[] {
    return this._records;
  }

  record(index: number): DataRecord {
    const record = this._records[index];
    if (!record) {
      throw new InvalidInputError(`No record at index ${index}`, {
        index,
        size: this.size,
      });
    }
    return record;
  }

  hasAttribute(name: string): boolean {
    return this.schemaOpen || this._attributes.includes(name);
  }

  /**
   * Fail with InvalidInputError naming every attribute absent from the schema
   */
  assertAttributes(names: readonly string[], role: AttributeRole): void {
    const missing = names.filter((name) => !this.hasAttribute(name));
    if (missing.length > 0) {
      throw new InvalidInputError(
        `Unknown ${role} attribute(s): ${missing.join(", ")}`,
        { role, missing, attributes: this._attributes },
      );
    }
  }

  column(name: string): ScalarValue[] {
    this.assertAttributes([name], "quasi-identifier");
    return this._records.map((record) => record[name] ?? null);
  }

  sensitiveValues(): ScalarValue[] {
    return this._records.map(
      (record) => record[this.sensitiveAttribute] ?? null,
    );
  }

  /**
   * New store where `target` holds the generalized values of `source`.
   * With target === source the raw column is replaced in the new store only.
   */
  withGeneralized(
    source: string,
    generalizer: Generalizer,
    target: string = source,
  ): RecordStore {
    this.assertAttributes([source], "generalization source");

    if (source === this.sensitiveAttribute || target === this.sensitiveAttribute) {
      throw new InvalidInputError(
        `The sensitive attribute "${this.sensitiveAttribute}" cannot be generalized or overwritten`,
        { source, target },
      );
    }
    if (target !== source && this._attributes.includes(target)) {
      throw new InvalidInputError(
        `Generalized column "${target}" would overwrite an existing attribute`,
        { source, target },
      );
    }

    const records = this._records.map((record, index) => {
      let generalized: ScalarValue;
      try {
        generalized = generalizer(record[source] ?? null);
      } catch (error) {
        throw new InvalidInputError(
          `Cannot generalize attribute "${source}" at record ${index}: ${error instanceof Error ? error.message : String(error)}`,
          {
            attribute: source,
            recordIndex: index,
            ...(error instanceof ReidRiskError && isPlainDetails(error.details)
              ? error.details
              : {}),
          },
          { cause: error },
        );
      }
      return Object.freeze({ ...record, [target]: generalized });
    });

    const attributes = this._attributes.includes(target)
      ? this._attributes
      : Object.freeze([...this._attributes, target]);

    return new RecordStore(
      attributes,
      Object.freeze(records),
      this.sensitiveAttribute,
      this.schemaOpen,
    );
  }
}

function isPlainDetails(details: unknown): details is Record<string, unknown> {
  return typeof details === "object" && details !== null && !Array.isArray(details);
}

function inferAttributes(rows: readonly RawRow[]): string[] {
  const seen = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      seen.add(key);
    }
  }
  return [...seen];
}

function freezeRecord(
  row: RawRow,
  attributes: readonly string[],
  index: number,
): DataRecord {
  if (typeof row !== "object" || row === null || Array.isArray(row)) {
    throw new InvalidInputError(`Row ${index} is not an object`, {
      recordIndex: index,
    });
  }

  const unknown = Object.keys(row).filter((key) => !attributes.includes(key));
  if (unknown.length > 0) {
    throw new InvalidInputError(
      `Row ${index} has attribute(s) outside the schema: ${unknown.join(", ")}`,
      { recordIndex: index, unknown },
    );
  }

  const record: Record<string, ScalarValue> = {};
  for (const attribute of attributes) {
    const value: unknown = row[attribute];
    if (value === undefined) {
      record[attribute] = null;
      continue;
    }
    if (!isScalarValue(value)) {
      throw new InvalidInputError(
        `Attribute "${attribute}" of row ${index} is not a scalar value`,
        { recordIndex: index, attribute },
      );
    }
    record[attribute] = value;
  }
  return Object.freeze(record);
}
