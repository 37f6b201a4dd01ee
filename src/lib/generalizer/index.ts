/**
 * Generalizer module - builds generalization functions from declarative specs
 */

import type {
  GeneralizationSpec,
  Generalizer,
} from "../../types/data-model.js";
import { InvalidInputError } from "../../utils/errors.js";
import {
  DEFAULT_BAND_WIDTH,
  DEFAULT_MASK,
  DEFAULT_PREFIX_LENGTH,
  DEFAULT_SUPPRESSION_TOKEN,
  numericBand,
  prefixMask,
  suppress,
  yearOf,
} from "./strategies.js";

export * from "./strategies.js";

/**
 * Create a generalizer from its configuration form
 */
export function createGeneralizer(spec: GeneralizationSpec): Generalizer {
  switch (spec.type) {
    case "band":
      return numericBand(spec.width ?? DEFAULT_BAND_WIDTH);
    case "prefix":
      return prefixMask(
        spec.length ?? DEFAULT_PREFIX_LENGTH,
        spec.mask ?? DEFAULT_MASK,
      );
    case "year":
      return yearOf();
    case "suppress":
      return suppress(spec.token ?? DEFAULT_SUPPRESSION_TOKEN);
    default:
      return unknownGeneralization(spec);
  }
}

/**
 * Short label for reports, e.g. band(10) or prefix(3,"**")
 */
export function describeGeneralization(spec: GeneralizationSpec): string {
  switch (spec.type) {
    case "band":
      return `band(${spec.width ?? DEFAULT_BAND_WIDTH})`;
    case "prefix":
      return `prefix(${spec.length ?? DEFAULT_PREFIX_LENGTH},${JSON.stringify(spec.mask ?? DEFAULT_MASK)})`;
    case "year":
      return "year";
    case "suppress":
      return `suppress(${JSON.stringify(spec.token ?? DEFAULT_SUPPRESSION_TOKEN)})`;
    default:
      return unknownGeneralization(spec);
  }
}

function unknownGeneralization(spec: never): never {
  throw new InvalidInputError("Unknown generalization type", { spec });
}
