/**
 * Gateway running a short-lived external command and collecting its output.
 * Commands are spawned without a shell, with an allow-listed environment and
 * an optional timeout after which the child is killed.
 */
import { Buffer } from "node:buffer";
import { spawn as nodeSpawn, type SpawnOptions } from "node:child_process";
import process from "node:process";
import type { Readable } from "node:stream";

// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

/** Environment variables forwarded to commands unless the caller overrides the list. */
export const DEFAULT_ALLOWED_ENV_KEYS: readonly string[] = [
  "PATH",
  "HOME",
  "XDG_RUNTIME_DIR",
  "PIPEWIRE_RUNTIME_DIR",
  "PIPEWIRE_REMOTE",
  "LANG",
];

export interface RunCommandOptions {
  /** Executable name or absolute path. Must not be empty. */
  readonly command: string;
  readonly args?: readonly string[];
  /** Keys copied from {@link inheritEnv}; everything else is dropped. */
  readonly allowedEnvKeys?: readonly string[];
  /** Environment snapshot to inherit from (defaults to {@link process.env}). */
  readonly inheritEnv?: Readonly<Record<string, string | undefined>>;
  /** Kill the command with SIGKILL after this many milliseconds. */
  readonly timeoutMs?: number;
}

export interface CommandResult {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number | null;
  readonly signal: NodeJS.Signals | null;
}

/** Raised when the command name is empty or not a string. */
export class InvalidCommandError extends Error {
  public readonly code = "E-COMMAND-INVALID";

  constructor(command: string) {
    super(`Command must be a non-empty string. Received: "${command}".`);
    this.name = "InvalidCommandError";
  }
}

/** Raised when an argument contains a NUL byte. */
export class InvalidCommandArgumentError extends TypeError {
  public readonly code = "E-COMMAND-ARGUMENT";

  constructor(index: number) {
    super(`Command argument at index ${index} contains a NUL byte.`);
    this.name = "InvalidCommandArgumentError";
  }
}

/** Raised when the command exceeds its timeout. */
export class CommandTimeoutError extends Error {
  public readonly code = "E-COMMAND-TIMEOUT";

  constructor(public readonly timeoutMs: number) {
    super(`Command exceeded its timeout of ${timeoutMs}ms.`);
    this.name = "CommandTimeoutError";
  }
}

export interface CommandRunner {
  run(options: RunCommandOptions): Promise<CommandResult>;
}

/** Subset of `ChildProcess` the runner relies on. */
export interface SpawnedCommand {
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  readonly killed: boolean;
  readonly exitCode: number | null;
  kill(signal?: NodeJS.Signals): boolean;
  once(event: "error", listener: (error: Error) => void): this;
  once(event: "close", listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
}

export type SpawnImpl = (command: string, args: readonly string[], options: SpawnOptions) => SpawnedCommand;

interface CommandRunnerDeps {
  /** Concrete spawn implementation (defaults to Node.js {@link nodeSpawn}). */
  readonly spawnImpl?: SpawnImpl;
}

/**
 * Builds the runner. Tests inject {@link CommandRunnerDeps.spawnImpl} to feed
 * canned output without launching processes.
 */
export function createCommandRunner({ spawnImpl = nodeSpawn }: CommandRunnerDeps = {}): CommandRunner {
  return {
    run(options: RunCommandOptions): Promise<CommandResult> {
      const command = options.command;
      if (typeof command !== "string" || command.trim().length === 0) {
        return Promise.reject(new InvalidCommandError(command));
      }
      const args = options.args ?? [];
      const badIndex = args.findIndex((value) => value.includes("\u0000"));
      if (badIndex >= 0) {
        return Promise.reject(new InvalidCommandArgumentError(badIndex));
      }

      const spawnOptions: SpawnOptions = {
        env: buildAllowedEnv(options.allowedEnvKeys ?? DEFAULT_ALLOWED_ENV_KEYS, options.inheritEnv ?? process.env),
        stdio: ["ignore", "pipe", "pipe"],
        shell: false,
        windowsVerbatimArguments: false,
      };

      return new Promise<CommandResult>((resolve, reject) => {
        let child: SpawnedCommand;
        try {
          child = spawnImpl(command, [...args], spawnOptions);
        } catch (error) {
          reject(error);
          return;
        }

        const stdout: Buffer[] = [];
        const stderr: Buffer[] = [];
        child.stdout?.on("data", (chunk: Buffer) => stdout.push(chunk));
        child.stderr?.on("data", (chunk: Buffer) => stderr.push(chunk));

        let settled = false;
        let timeoutHandle: NodeJS.Timeout | null = null;

        const cleanup = () => {
          if (timeoutHandle) {
            clearTimeout(timeoutHandle);
            timeoutHandle = null;
          }
        };

        const fail = (error: unknown) => {
          if (settled) {
            return;
          }
          settled = true;
          cleanup();
          if (!child.killed && child.exitCode === null) {
            child.kill("SIGKILL");
          }
          reject(error);
        };

        if (options.timeoutMs !== undefined) {
          const timeoutMs = options.timeoutMs;
          timeoutHandle = setTimeout(() => fail(new CommandTimeoutError(timeoutMs)), timeoutMs);
          timeoutHandle.unref();
        }

        child.once("error", fail);
        child.once("close", (exitCode: number | null, exitSignal: NodeJS.Signals | null) => {
          if (settled) {
            return;
          }
          settled = true;
          cleanup();
          resolve({
            stdout: Buffer.concat(stdout).toString("utf8"),
            stderr: Buffer.concat(stderr).toString("utf8"),
            exitCode,
            signal: exitSignal,
          });
        });
      });
    },
  };
}

/** Copies the allow-listed keys that are set in {@link inheritEnv}. */
function buildAllowedEnv(
  allowedKeys: readonly string[],
  inheritEnv: Readonly<Record<string, string | undefined>>,
): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = {};
  for (const key of new Set(allowedKeys)) {
    const value = inheritEnv[key];
    if (value !== undefined) {
      env[key] = value;
    }
  }
  return env;
}
