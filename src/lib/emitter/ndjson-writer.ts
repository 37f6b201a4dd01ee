/**
 * NDJSON Writer - Transform stream that converts scenario outcomes to NDJSON
 */

import { Readable, Transform, TransformCallback } from "stream";
import type { ScenarioOutcome } from "../../types/data-model.js";

/**
 * Transform stream that converts object-mode outcomes to NDJSON strings
 */
export class NDJSONWriter extends Transform {
  constructor() {
    super({
      writableObjectMode: true, // Input is outcomes
      readableObjectMode: false, // Output is strings
    });
  }

  _transform(
    chunk: ScenarioOutcome,
    _encoding: BufferEncoding,
    callback: TransformCallback,
  ): void {
    try {
      this.push(JSON.stringify(chunk) + "\n");
      callback();
    } catch (error) {
      callback(error instanceof Error ? error : new Error(String(error)));
    }
  }
}

/**
 * Create NDJSON writer transform stream
 */
export function createNDJSONWriter(): Transform {
  return new NDJSONWriter();
}

/**
 * Render outcomes as NDJSON text, one line per scenario
 */
export async function renderNDJSON(
  outcomes: readonly ScenarioOutcome[],
): Promise<string> {
  const writer = Readable.from(outcomes, { objectMode: true }).pipe(
    createNDJSONWriter(),
  );

  const chunks: string[] = [];
  for await (const chunk of writer) {
    chunks.push(String(chunk));
  }
  return chunks.join("");
}
