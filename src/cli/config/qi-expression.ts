/**
 * Command-line quasi-identifier expressions
 *
 * Comma-separated items, each an attribute optionally followed by
 * `|generalization` and `=Alias`:
 *
 *   Age|band:10=AgeBand, ZIP|prefix:3:**, DOB|year, Gender|suppress:X
 */

import type {
  GeneralizationSpec,
  QuasiIdentifierSpec,
} from "../../types/data-model.js";
import { ConfigError } from "../../utils/errors.js";

function parseInteger(raw: string, item: string): number {
  if (!/^\d+$/.test(raw)) {
    throw new ConfigError(`Expected a whole number in "${item}", got "${raw}"`);
  }
  return Number(raw);
}

function parseGeneralization(text: string, item: string): GeneralizationSpec {
  const [type = "", ...args] = text.split(":");

  switch (type) {
    case "band":
      return args[0] === undefined
        ? { type: "band" }
        : { type: "band", width: parseInteger(args[0], item) };
    case "prefix": {
      const spec: Extract<GeneralizationSpec, { type: "prefix" }> = {
        type: "prefix",
      };
      if (args[0] !== undefined) spec.length = parseInteger(args[0], item);
      // The mask may itself contain ':'
      if (args.length > 1) spec.mask = args.slice(1).join(":");
      return spec;
    }
    case "year":
      return { type: "year" };
    case "suppress":
      return args.length === 0
        ? { type: "suppress" }
        : { type: "suppress", token: args.join(":") };
    default:
      throw new ConfigError(
        `Unknown generalization "${type}" in "${item}". Use band, prefix, year or suppress`,
      );
  }
}

function parseItem(item: string): QuasiIdentifierSpec {
  const [head = "", alias] = item.split("=", 2).map((part) => part.trim());
  const [attribute = "", generalization] = head
    .split("|", 2)
    .map((part) => part.trim());

  if (attribute === "") {
    throw new ConfigError(`Missing attribute name in "${item}"`);
  }
  if (generalization === undefined) {
    if (alias !== undefined) {
      throw new ConfigError(`Alias in "${item}" needs a generalization`);
    }
    return attribute;
  }

  return {
    attribute,
    generalization: parseGeneralization(generalization, item),
    ...(alias ? { as: alias } : {}),
  };
}

/**
 * Parse a comma-separated QI expression
 */
export function parseQuasiIdentifierExpression(
  expression: string,
): QuasiIdentifierSpec[] {
  const items = expression
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item !== "");

  if (items.length === 0) {
    throw new ConfigError("At least one quasi-identifier is required");
  }

  return items.map(parseItem);
}
