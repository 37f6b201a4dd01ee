/**
 * Core data model types for reid-risk
 * These structures flow through the pipeline: store → partition → metrics → violation report → comparison
 */

/**
 * ScalarValue - The only value kinds a record attribute can hold
 */
export type ScalarValue = string | number | boolean | null;

/**
 * DataRecord - One frozen row of the dataset, attribute name → value
 */
export type DataRecord = Readonly<Record<string, ScalarValue>>;

/**
 * RawRow - A row as supplied by a loader, before the store fills in missing attributes
 */
export type RawRow = Readonly<Record<string, ScalarValue | undefined>>;

/**
 * Generalizer - Pure mapping from a raw attribute value to a coarser one
 */
export type Generalizer = (value: ScalarValue) => ScalarValue;

/**
 * GeneralizationSpec - Declarative form of a generalizer, as written in configuration files
 */
export type GeneralizationSpec =
  | { type: "band"; width?: number }
  | { type: "prefix"; length?: number; mask?: string }
  | { type: "year" }
  | { type: "suppress"; token?: string };

/**
 * QuasiIdentifierSpec - A raw attribute name, or an attribute read through a generalization
 */
export type QuasiIdentifierSpec =
  | string
  | {
      attribute: string;
      generalization?: GeneralizationSpec;
      as?: string; // Column name of the generalized values, defaults to attribute
    };

/**
 * EquivalenceClass - Records sharing the same tuple of (possibly generalized) QI values
 */
export interface EquivalenceClass {
  key: readonly ScalarValue[];
  label: Readonly<Record<string, ScalarValue>>; // QI name → key component
  size: number;
  memberIndices: readonly number[]; // Positions in the record store
  sensitiveValues: readonly ScalarValue[];
}

/**
 * Partition - Equivalence classes of one store under one QI set, sorted by key
 */
export interface Partition {
  quasiIdentifiers: readonly string[];
  sensitiveAttribute: string;
  recordCount: number;
  classes: readonly EquivalenceClass[];
}

/**
 * Distribution - SA value encoded with encodeValue (JSON text, so "Asthma" is keyed '"Asthma"')
 * → relative frequency (sums to 1, empty for no records). Build one with distributionOf.
 */
export type Distribution = ReadonlyMap<string, number>;

/**
 * MetricResult - One scalar per metric for a (dataset, QI set) pair
 */
export interface MetricResult {
  k: number;
  l: number;
  t: number;
}

/**
 * ClassMeasurement - Per-class inputs to the three metrics
 */
export interface ClassMeasurement {
  equivalenceClass: EquivalenceClass;
  size: number;
  distinctSensitive: number;
  distance: number; // Total variation distance from the global SA distribution
}

/**
 * MetricAssessment - Metrics plus the per-class measurements they were reduced from
 */
export interface MetricAssessment {
  partition: Partition;
  metrics: MetricResult;
  measurements: readonly ClassMeasurement[];
}

export interface Thresholds {
  kMin: number;
  lMin: number;
  tMax: number;
}

export type MetricName = "k" | "l" | "t";

/**
 * Violation - A class failing one metric threshold
 */
export interface Violation {
  key: Readonly<Record<string, ScalarValue>>;
  size: number;
  value: number; // Offending size, distinct SA count or TV distance
}

export interface ViolationReport {
  metrics: MetricResult;
  thresholds: Thresholds;
  passed: Record<MetricName, boolean>;
  overallPassed: boolean;
  empty: boolean; // Empty partition: never violates, see reportViolations
  violations: Record<MetricName, Violation[]>;
}

/**
 * ScenarioConfig - One QI/generalization choice with its own thresholds
 */
export interface ScenarioConfig {
  name: string;
  quasiIdentifiers: QuasiIdentifierSpec[];
  thresholds: Thresholds;
}

export interface ScenarioReport extends ViolationReport {
  scenario: string;
  quasiIdentifiers: string[];
  generalizations: Record<string, string>; // QI column → generalization label
  sensitiveAttribute: string;
  recordCount: number;
  classCount: number;
}

export type ScenarioOutcome =
  | { status: "success"; scenario: string; report: ScenarioReport }
  | {
      status: "error";
      scenario: string;
      error: { code: string; message: string; details?: unknown };
    };

export interface ComparisonRow {
  scenario: string;
  quasiIdentifiers: string[];
  k: number | null;
  l: number | null;
  t: number | null;
  passed: boolean;
  error?: string;
}
