/**
 * JSON Schema for assessment configuration files, checked with Ajv
 */

import Ajv from "ajv";
import type { AssessmentConfig } from "../../types/config.js";
import { ConfigError } from "../../utils/errors.js";

const generalizationSchema = {
  oneOf: [
    {
      type: "object",
      properties: {
        type: { type: "string", const: "band" },
        width: { type: "integer", minimum: 1 },
      },
      required: ["type"],
      additionalProperties: false,
    },
    {
      type: "object",
      properties: {
        type: { type: "string", const: "prefix" },
        length: { type: "integer", minimum: 0 },
        mask: { type: "string" },
      },
      required: ["type"],
      additionalProperties: false,
    },
    {
      type: "object",
      properties: { type: { type: "string", const: "year" } },
      required: ["type"],
      additionalProperties: false,
    },
    {
      type: "object",
      properties: {
        type: { type: "string", const: "suppress" },
        token: { type: "string" },
      },
      required: ["type"],
      additionalProperties: false,
    },
  ],
} as const;

const quasiIdentifierSchema = {
  oneOf: [
    { type: "string", minLength: 1 },
    {
      type: "object",
      properties: {
        attribute: { type: "string", minLength: 1 },
        generalization: generalizationSchema,
        as: { type: "string", minLength: 1 },
      },
      required: ["attribute"],
      additionalProperties: false,
    },
  ],
} as const;

export const assessmentConfigSchema = {
  type: "object",
  properties: {
    dataset: {
      type: "object",
      properties: {
        path: { type: "string", minLength: 1 },
        format: { type: "string", enum: ["json", "ndjson", "csv"] },
        mongo: {
          type: "object",
          properties: {
            uri: { type: "string", minLength: 1 },
            database: { type: "string", minLength: 1 },
            collection: { type: "string", minLength: 1 },
            sampleSize: { type: "integer", minimum: 1 },
            strategy: { type: "string", enum: ["random", "firstN"] },
          },
          required: ["uri", "database", "collection"],
          additionalProperties: false,
        },
        attributes: {
          type: "array",
          items: { type: "string", minLength: 1 },
          uniqueItems: true,
        },
      },
      additionalProperties: false,
    },
    sensitiveAttribute: { type: "string", minLength: 1 },
    failFast: { type: "boolean" },
    scenarios: {
      type: "array",
      minItems: 1,
      items: {
        type: "object",
        properties: {
          name: { type: "string", minLength: 1 },
          quasiIdentifiers: {
            type: "array",
            minItems: 1,
            items: quasiIdentifierSchema,
          },
          thresholds: {
            type: "object",
            properties: {
              kMin: { type: "integer", minimum: 0 },
              lMin: { type: "integer", minimum: 0 },
              tMax: { type: "number", minimum: 0, maximum: 1 },
            },
            required: ["kMin", "lMin", "tMax"],
            additionalProperties: false,
          },
        },
        required: ["name", "quasiIdentifiers", "thresholds"],
        additionalProperties: false,
      },
    },
  },
  required: ["sensitiveAttribute", "scenarios"],
  additionalProperties: false,
} as const;

const ajv = new Ajv({
  allErrors: true, // Collect all validation errors
});

const validateFn = ajv.compile<AssessmentConfig>(assessmentConfigSchema);

export interface ConfigViolation {
  path: string;
  message: string;
}

/**
 * Check a parsed configuration document and return it typed
 */
export function validateAssessmentConfig(
  value: unknown,
  source = "configuration",
): AssessmentConfig {
  if (validateFn(value)) {
    assertUniqueScenarioNames(value, source);
    return value;
  }

  const violations: ConfigViolation[] = (validateFn.errors ?? []).map(
    (error) => ({
      path: error.instancePath || "/",
      message: `${error.message ?? "invalid"} (keyword: ${error.keyword})`,
    }),
  );

  throw new ConfigError(`Invalid ${source}`, { violations });
}

function assertUniqueScenarioNames(
  config: AssessmentConfig,
  source: string,
): void {
  const violations: ConfigViolation[] = [];
  const seen = new Set<string>();

  config.scenarios.forEach((scenario, index) => {
    if (seen.has(scenario.name)) {
      violations.push({
        path: `/scenarios/${index}/name`,
        message: `duplicate scenario name "${scenario.name}"`,
      });
    }
    seen.add(scenario.name);
  });

  if (violations.length > 0) {
    throw new ConfigError(`Invalid ${source}`, { violations });
  }
}
