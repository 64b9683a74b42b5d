import { createCommandRunner, type CommandRunner } from "../gateways/commandRunner.js";
import { decodeSnapshot, toSnapshotError } from "./decode.js";
import { SnapshotUnavailableError, type SnapshotResult, type SnapshotSource } from "./types.js";

/** Command printing the PipeWire graph as JSON. */
export const DEFAULT_DUMP_COMMAND = "pw-dump";

/** Maximum number of stderr characters copied into error details. */
const STDERR_EXCERPT_LIMIT = 512;

export interface PwDumpSourceOptions {
  readonly runner?: CommandRunner;
  readonly command?: string;
  readonly args?: readonly string[];
  readonly timeoutMs?: number;
  /** Environment the allow-listed variables are copied from. */
  readonly env?: Readonly<Record<string, string | undefined>>;
}

/**
 * Snapshot source running the dump command once per {@link SnapshotSource.acquire}
 * call. Spawn failures, timeouts, non-zero exits and undecodable output all
 * resolve to a failed {@link SnapshotResult}.
 */
export function createPwDumpSource(options: PwDumpSourceOptions = {}): SnapshotSource {
  const runner = options.runner ?? createCommandRunner();
  const command = options.command ?? DEFAULT_DUMP_COMMAND;
  const args = options.args ?? [];
  const label = [command, ...args].join(" ");

  return {
    label,
    async acquire(): Promise<SnapshotResult> {
      try {
        const result = await runner.run({
          command,
          args,
          ...(options.timeoutMs !== undefined ? { timeoutMs: options.timeoutMs } : {}),
          ...(options.env !== undefined ? { inheritEnv: options.env } : {}),
        });
        if (result.exitCode !== 0) {
          const reason = result.exitCode === null ? `signal ${result.signal ?? "unknown"}` : `code ${result.exitCode}`;
          throw new SnapshotUnavailableError("E-SNAPSHOT-EXIT", `'${label}' exited with ${reason}`, {
            exitCode: result.exitCode,
            signal: result.signal,
            stderr: result.stderr.trim().slice(0, STDERR_EXCERPT_LIMIT),
          });
        }
        return { ok: true, snapshot: decodeSnapshot(result.stdout) };
      } catch (error) {
        return { ok: false, error: toSnapshotError(error, "E-SNAPSHOT-COMMAND", `'${label}' failed`) };
      }
    },
  };
}
