/**
 * Generalization strategies for quasi-identifier attributes
 *
 * Each factory returns a pure function. Every strategy maps null to null so a
 * missing value keeps forming its own group; any other value outside the
 * strategy's domain raises InvalidInputError instead of being coerced.
 */

import type { Generalizer, ScalarValue } from "../../types/data-model.js";
import { InvalidInputError } from "../../utils/errors.js";

export const DEFAULT_BAND_WIDTH = 10;
export const DEFAULT_PREFIX_LENGTH = 3;
export const DEFAULT_MASK = "**";
export const DEFAULT_SUPPRESSION_TOKEN = "*";

const YEAR_PATTERN = /^(\d{4})(?:$|[-/T ])/;

function describeValue(value: ScalarValue): string {
  return `${JSON.stringify(value)} (${typeof value})`;
}

function nullSafe(fn: (value: Exclude<ScalarValue, null>) => ScalarValue): Generalizer {
  return (value) => (value === null ? null : fn(value));
}

/**
 * Numeric banding: v → "{lower}-{upper}" with lower = ⌊v/width⌋·width
 *
 * @example
 * numericBand(10)(28) // "20-29"
 */
export function numericBand(width: number = DEFAULT_BAND_WIDTH): Generalizer {
  if (!Number.isInteger(width) || width <= 0) {
    throw new InvalidInputError(
      `Band width must be a positive integer, got ${width}`,
      { width },
    );
  }

  return nullSafe((value) => {
    if (typeof value !== "number" || !Number.isFinite(value)) {
      throw new InvalidInputError(
        `Numeric banding needs a finite number, got ${describeValue(value)}`,
        { generalization: "band", value },
      );
    }
    const lower = Math.floor(value / width) * width;
    const upper = lower + width - 1;
    return `${lower}-${upper}`;
  });
}

/**
 * Prefix masking: keep the first `length` characters and append `mask`.
 * Strings shorter than `length` keep all their characters.
 *
 * @example
 * prefixMask(3, "**")("35294") // "352**"
 */
export function prefixMask(
  length: number = DEFAULT_PREFIX_LENGTH,
  mask: string = DEFAULT_MASK,
): Generalizer {
  if (!Number.isInteger(length) || length < 0) {
    throw new InvalidInputError(
      `Prefix length must be a non-negative integer, got ${length}`,
      { length },
    );
  }

  return nullSafe((value) => {
    if (typeof value !== "string") {
      throw new InvalidInputError(
        `Prefix masking needs a string, got ${describeValue(value)}`,
        { generalization: "prefix", value },
      );
    }
    // Count code points so surrogate pairs stay whole
    return Array.from(value).slice(0, length).join("") + mask;
  });
}

/**
 * Year extraction from a date string: "1987-03-12" → "1987"
 */
export function yearOf(): Generalizer {
  return nullSafe((value) => {
    const match = typeof value === "string" ? YEAR_PATTERN.exec(value) : null;
    if (!match || match[1] === undefined) {
      throw new InvalidInputError(
        `Year extraction needs a date string starting with a four-digit year, got ${describeValue(value)}`,
        { generalization: "year", value },
      );
    }
    return match[1];
  });
}

/**
 * Suppression: every present value becomes the same token
 */
export function suppress(token: string = DEFAULT_SUPPRESSION_TOKEN): Generalizer {
  return nullSafe(() => token);
}
