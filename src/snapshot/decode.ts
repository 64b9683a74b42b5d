import { z } from "zod";

import type { GraphSnapshot } from "../graph/types.js";
import { SnapshotUnavailableError, type SnapshotErrorCode } from "./types.js";

/**
 * Top-level shape of a dump: an array. Elements are left to the graph indexer,
 * which drops whatever it cannot use.
 */
export const SnapshotDocumentSchema = z.array(z.unknown());

/**
 * Parses the text printed by the dump command. Invalid JSON, a document that
 * is not an array, and an empty array are all rejected.
 */
export function decodeSnapshot(text: string): GraphSnapshot {
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    throw new SnapshotUnavailableError(
      "E-SNAPSHOT-PARSE",
      `dump is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      { length: text.length },
      { cause: error },
    );
  }

  const parsed = SnapshotDocumentSchema.safeParse(document);
  if (!parsed.success) {
    throw new SnapshotUnavailableError(
      "E-SNAPSHOT-SHAPE",
      "dump must be a JSON array",
      { issues: parsed.error.issues.slice(0, 5) },
    );
  }
  if (parsed.data.length === 0) {
    throw new SnapshotUnavailableError("E-SNAPSHOT-EMPTY", "dump contains no elements");
  }
  return parsed.data;
}

/** Wraps unexpected failures so callers always see a {@link SnapshotUnavailableError}. */
export function toSnapshotError(
  error: unknown,
  code: SnapshotErrorCode,
  context: string,
): SnapshotUnavailableError {
  if (error instanceof SnapshotUnavailableError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new SnapshotUnavailableError(code, `${context}: ${message}`, {}, { cause: error });
}
