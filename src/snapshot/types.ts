import type { GraphSnapshot } from "../graph/types.js";

/** Stable codes attached to {@link SnapshotUnavailableError}. */
export type SnapshotErrorCode =
  | "E-SNAPSHOT-COMMAND"
  | "E-SNAPSHOT-EXIT"
  | "E-SNAPSHOT-READ"
  | "E-SNAPSHOT-PARSE"
  | "E-SNAPSHOT-SHAPE"
  | "E-SNAPSHOT-EMPTY";

/**
 * Raised (or returned inside a {@link SnapshotResult}) when no usable dump
 * could be obtained.
 */
export class SnapshotUnavailableError extends Error {
  public readonly code: SnapshotErrorCode;
  public readonly details: Readonly<Record<string, unknown>>;

  constructor(
    code: SnapshotErrorCode,
    message: string,
    details: Record<string, unknown> = {},
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "SnapshotUnavailableError";
    this.code = code;
    this.details = details;
  }
}

export type SnapshotResult =
  | { readonly ok: true; readonly snapshot: GraphSnapshot }
  | { readonly ok: false; readonly error: SnapshotUnavailableError };

/** Provider of one graph dump per call. `acquire` resolves even on failure. */
export interface SnapshotSource {
  /** Short description used in diagnostics (command line or file path). */
  readonly label: string;
  acquire(): Promise<SnapshotResult>;
}
