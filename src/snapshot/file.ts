import { readFile } from "node:fs/promises";

import { decodeSnapshot, toSnapshotError } from "./decode.js";
import type { SnapshotResult, SnapshotSource } from "./types.js";

/** Reads a dump previously saved with `pw-dump > file.json`. */
export function createFileSnapshotSource(path: string): SnapshotSource {
  return {
    label: path,
    async acquire(): Promise<SnapshotResult> {
      try {
        const contents = await readFile(path, "utf8");
        return { ok: true, snapshot: decodeSnapshot(contents) };
      } catch (error) {
        return { ok: false, error: toSnapshotError(error, "E-SNAPSHOT-READ", `cannot read '${path}'`) };
      }
    },
  };
}
