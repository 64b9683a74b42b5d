import process from "node:process";

import { LOG_LEVELS, type LogLevel } from "../logger.js";
import { STATUS_FORMATS, type StatusFormat } from "../render/status.js";
import { DEFAULT_DUMP_COMMAND } from "../snapshot/pwDump.js";
import { readBool, readEnum, readInt, readOptionalString, readString, type EnvSource } from "./env.js";

/** Default timeout (ms) granted to the dump command. */
export const DEFAULT_DUMP_TIMEOUT_MS = 5_000;
/** Bounds accepted for {@link AuditSettings.timeoutMs}. */
export const DUMP_TIMEOUT_BOUNDS = { min: 100, max: 60_000 } as const;

/** Runtime settings of the auditor, resolved from `PW_AUDIT_*` variables. */
export interface AuditSettings {
  readonly dumpCommand: string;
  readonly timeoutMs: number;
  readonly format: StatusFormat;
  readonly logLevel: LogLevel;
  readonly logFile: string | null;
  /** Mirror structured log lines to stderr. */
  readonly logToStderr: boolean;
}

export function loadAuditSettings(env: EnvSource = process.env): AuditSettings {
  return {
    dumpCommand: readString("PW_AUDIT_DUMP_COMMAND", DEFAULT_DUMP_COMMAND, env),
    timeoutMs: readInt("PW_AUDIT_TIMEOUT_MS", DEFAULT_DUMP_TIMEOUT_MS, DUMP_TIMEOUT_BOUNDS, env),
    format: readEnum("PW_AUDIT_FORMAT", STATUS_FORMATS, "genmon", env),
    logLevel: readEnum("PW_AUDIT_LOG_LEVEL", LOG_LEVELS, "info", env),
    logFile: readOptionalString("PW_AUDIT_LOG_FILE", env) ?? null,
    logToStderr: readBool("PW_AUDIT_LOG_STDERR", true, env),
  };
}
