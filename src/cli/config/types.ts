/**
 * CLI configuration types
 */

export type OutputFormat = "json" | "ndjson" | "text";

/**
 * CLI command options (from commander)
 */
export interface AssessCommandOptions {
  config: string;
  input?: string;
  sensitive?: string;
  format?: string;
  outputPath?: string;
  failFast?: boolean;
}

export interface InspectCommandOptions {
  input: string;
  sensitive: string;
  qi: string;
  format?: string;
}
