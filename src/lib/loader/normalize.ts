/**
 * Row normalization - turns loader or driver objects into scalar rows
 */

import type { RawRow, ScalarValue } from "../../types/data-model.js";
import { InvalidInputError } from "../../utils/errors.js";
import { isScalarValue } from "../store/index.js";

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function hasHexString(value: object): value is { toHexString(): string } {
  return "toHexString" in value && typeof value.toHexString === "function";
}

function normalizeValue(
  value: unknown,
  attribute: string,
  index: number,
): ScalarValue {
  if (value === undefined) return null;
  if (isScalarValue(value)) return value;
  if (value instanceof Date) return value.toISOString();
  // ObjectId and other driver id types
  if (typeof value === "object" && value !== null && hasHexString(value)) {
    return value.toHexString();
  }

  throw new InvalidInputError(
    `Attribute "${attribute}" of row ${index} is not a scalar value`,
    {
      recordIndex: index,
      attribute,
      type: Array.isArray(value) ? "array" : typeof value,
    },
  );
}

/**
 * Convert one loaded row to attribute → scalar
 */
export function normalizeRow(raw: unknown, index: number): RawRow {
  if (!isPlainObject(raw)) {
    throw new InvalidInputError(`Row ${index} is not an object`, {
      recordIndex: index,
    });
  }

  const row: Record<string, ScalarValue> = {};
  for (const [attribute, value] of Object.entries(raw)) {
    row[attribute] = normalizeValue(value, attribute, index);
  }
  return row;
}
