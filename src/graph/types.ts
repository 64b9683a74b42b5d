/**
 * Loosely-typed shapes mirroring the objects printed by `pw-dump`. Property
 * bags vary per driver, so everything below `info` stays `unknown` until the
 * attribute resolver decodes it.
 */

/** Plain JSON object as found inside a dump element. */
export type JsonRecord = Readonly<Record<string, unknown>>;

/** Raw element of the dump before indexing. */
export type SnapshotElement = JsonRecord;

/**
 * Ordered, immutable sequence of dump elements captured by one invocation.
 * Elements stay `unknown` so malformed entries reach the indexer, which drops them.
 */
export type GraphSnapshot = readonly unknown[];

/** Runtime state reported by a node (`running`, `suspended`, `idle`, ...). */
export type NodeState = string;

/**
 * Audio node indexed from the snapshot. `props` and `params` are kept as the
 * raw records; `attributes.ts` decodes them on demand.
 */
export interface AudioNode {
  readonly id: number;
  readonly type: string;
  readonly props: JsonRecord;
  readonly state: NodeState | null;
  readonly params: JsonRecord;
}

/** Link between two node identities. Either endpoint may be missing. */
export interface AudioLink {
  readonly id: number;
  readonly type: string;
  readonly outputNodeId: number | null;
  readonly inputNodeId: number | null;
}

/** Narrows an unknown value to a plain (non-array) object. */
export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Reads a nested record, returning an empty one when the key is absent or malformed. */
export function readRecord(source: JsonRecord, key: string): JsonRecord {
  const value = source[key];
  return isRecord(value) ? value : {};
}

/** Reads an integer field, returning `null` for anything else. */
export function readInteger(source: JsonRecord, key: string): number | null {
  const value = source[key];
  return typeof value === "number" && Number.isInteger(value) ? value : null;
}

/** Reads a string field, returning `null` for anything else. */
export function readText(source: JsonRecord, key: string): string | null {
  const value = source[key];
  return typeof value === "string" ? value : null;
}
