#!/usr/bin/env node
import { realpathSync } from "node:fs";
import process from "node:process";
import { fileURLToPath } from "node:url";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.
import { DiagnosticLog } from "./audit/diagnostics.js";
import { runAudit } from "./audit/engine.js";
import { DUMP_TIMEOUT_BOUNDS, loadAuditSettings } from "./config/settings.js";
import { parseIntLiteral, type EnvSource } from "./config/env.js";
import type { CommandRunner } from "./gateways/commandRunner.js";
import { StructuredLogger, type LogStream } from "./logger.js";
import { renderStatus, STATUS_FORMATS, type StatusFormat } from "./render/status.js";
import { createFileSnapshotSource } from "./snapshot/file.js";
import { createPwDumpSource } from "./snapshot/pwDump.js";
import type { SnapshotSource } from "./snapshot/types.js";

interface CliOptions {
  readonly target: string;
  readonly format?: StatusFormat;
  readonly dumpFile?: string;
  readonly timeoutMs?: number;
}

/** Raised for malformed command lines; the CLI prints usage and exits with 1. */
export class CliUsageError extends Error {
  public readonly code = "E-CLI-USAGE";

  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

/** Collaborators overridable by tests. */
export interface CliDependencies {
  readonly env?: EnvSource;
  readonly stdout?: LogStream;
  readonly stderr?: LogStream;
  readonly runner?: CommandRunner;
  readonly logger?: StructuredLogger;
}

function isStatusFormat(value: string): value is StatusFormat {
  return STATUS_FORMATS.some((format) => format === value);
}

function parseArgs(argv: readonly string[]): CliOptions {
  const positionals: string[] = [];
  let format: StatusFormat | undefined;
  let dumpFile: string | undefined;
  let timeoutMs: number | undefined;

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];
    switch (token) {
      case "--format": {
        const value = argv[++i];
        if (value === undefined || !isStatusFormat(value)) {
          throw new CliUsageError(`--format must be one of ${STATUS_FORMATS.join(", ")}`);
        }
        format = value;
        break;
      }
      case "--dump-file": {
        const value = argv[++i];
        if (!value) {
          throw new CliUsageError("--dump-file expects a path");
        }
        dumpFile = value;
        break;
      }
      case "--timeout-ms": {
        const value = parseIntLiteral(argv[++i], DUMP_TIMEOUT_BOUNDS);
        if (value === undefined) {
          throw new CliUsageError(
            `--timeout-ms expects an integer between ${DUMP_TIMEOUT_BOUNDS.min} and ${DUMP_TIMEOUT_BOUNDS.max}`,
          );
        }
        timeoutMs = value;
        break;
      }
      default:
        if (token.startsWith("--")) {
          throw new CliUsageError(`Unknown argument '${token}'`);
        }
        positionals.push(token);
    }
  }

  if (positionals.length !== 1) {
    throw new CliUsageError("Expected exactly one <device_name> argument");
  }
  const [target] = positionals;
  if (target.length === 0) {
    throw new CliUsageError("<device_name> must not be empty");
  }

  return {
    target,
    ...(format === undefined ? {} : { format }),
    ...(dumpFile === undefined ? {} : { dumpFile }),
    ...(timeoutMs === undefined ? {} : { timeoutMs }),
  };
}

function usage(): string {
  return [
    "Usage: pw-rate-audit <device_name> [--format genmon|json] [--dump-file path] [--timeout-ms n]",
    "",
    "Examples:",
    "  pw-rate-audit alsa_output.usb-DAC",
    "  pw-rate-audit alsa_output.usb-DAC --format json",
    "  pw-rate-audit alsa_output.usb-DAC --dump-file graph.json",
    "",
  ].join("\n");
}

/**
 * Runs one audit and prints the rendered status on stdout. Every outcome,
 * including a failed dump, exits with 0 so the bar keeps showing the widget;
 * only a malformed command line returns 1.
 */
export async function main(argv: readonly string[], deps: CliDependencies = {}): Promise<number> {
  const env = deps.env ?? process.env;
  const stdout = deps.stdout ?? process.stdout;
  const stderr = deps.stderr ?? process.stderr;

  let options: CliOptions;
  try {
    options = parseArgs(argv);
  } catch (error) {
    if (error instanceof CliUsageError) {
      stderr.write(`${error.message}\n${usage()}`);
      return 1;
    }
    throw error;
  }

  const settings = loadAuditSettings(env);
  const logger =
    deps.logger ??
    new StructuredLogger({
      logFile: settings.logFile,
      level: settings.logLevel,
      stream: settings.logToStderr ? stderr : null,
    });

  const source: SnapshotSource = options.dumpFile
    ? createFileSnapshotSource(options.dumpFile)
    : createPwDumpSource({
        command: settings.dumpCommand,
        timeoutMs: options.timeoutMs ?? settings.timeoutMs,
        env,
        ...(deps.runner ? { runner: deps.runner } : {}),
      });

  const log = new DiagnosticLog((line) => logger.info("audit_step", { line }));
  const report = await runAudit(source, options.target, { log });
  const level = report.outcome.kind === "Error" ? "error" : "info";
  logger[level]("audit_outcome", { target: options.target, outcome: report.outcome });

  stdout.write(`${renderStatus(report, options.format ?? settings.format)}\n`);
  await logger.flush();
  return 0;
}

const isCliEntryPoint = (() => {
  const executedFromCli = process.argv[1];
  if (!executedFromCli) {
    return false;
  }

  const thisModulePath = fileURLToPath(import.meta.url);
  try {
    return realpathSync(executedFromCli) === realpathSync(thisModulePath);
  } catch {
    return thisModulePath === executedFromCli;
  }
})();

if (isCliEntryPoint) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(error instanceof Error ? error.message : error);
      process.exit(1);
    });
}

/**
 * Exposes internal helpers for the test suite without exporting them as part
 * of the runtime API surface.
 */
export const __testing = {
  parseArgs,
  usage,
};
