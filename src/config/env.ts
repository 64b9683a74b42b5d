/**
 * Helpers reading environment variables with predictable coercion rules.
 * Every reader takes the environment explicitly (defaulting to `process.env`)
 * so settings can be resolved against a snapshot in tests.
 */
import process from "node:process";

const TRUE_LITERALS = new Set(["1", "true", "yes", "on"]);
const FALSE_LITERALS = new Set(["0", "false", "no", "off"]);

export type EnvSource = Readonly<Record<string, string | undefined>>;

/** Trims the raw value, treating blank strings as unset. */
function normaliseEnvValue(raw: string | undefined): string | undefined {
  if (typeof raw !== "string") {
    return undefined;
  }

  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

/**
 * Reads the variable as a boolean. Accepts "1", "true", "yes", "on" and their
 * negative counterparts; anything else falls back to {@link defaultValue}.
 */
export function readBool(name: string, defaultValue: boolean, env: EnvSource = process.env): boolean {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised) {
    return defaultValue;
  }

  const lower = normalised.toLowerCase();
  if (TRUE_LITERALS.has(lower)) {
    return true;
  }
  if (FALSE_LITERALS.has(lower)) {
    return false;
  }
  return defaultValue;
}

interface NumberOptions {
  /** Minimum allowed value (inclusive). */
  readonly min?: number;
  /** Maximum allowed value (inclusive). */
  readonly max?: number;
}

function withinBounds(value: number, options: NumberOptions | undefined): boolean {
  if (!Number.isFinite(value)) {
    return false;
  }
  if (options?.min !== undefined && value < options.min) {
    return false;
  }
  if (options?.max !== undefined && value > options.max) {
    return false;
  }
  return true;
}

/** Parses a base-10 integer literal, rejecting out-of-range and unsafe values. */
export function parseIntLiteral(raw: string | undefined, options?: NumberOptions): number | undefined {
  const normalised = normaliseEnvValue(raw);
  if (!normalised || !/^[-+]?\d+$/.test(normalised)) {
    return undefined;
  }

  const value = Number.parseInt(normalised, 10);
  if (!Number.isSafeInteger(value)) {
    return undefined;
  }
  return withinBounds(value, options) ? value : undefined;
}

/** Reads the variable as an integer, falling back to {@link defaultValue} when invalid. */
export function readInt(
  name: string,
  defaultValue: number,
  options?: NumberOptions,
  env: EnvSource = process.env,
): number {
  return parseIntLiteral(env[name], options) ?? defaultValue;
}

/** Returns the trimmed value when the variable is set to a non-empty string. */
export function readOptionalString(name: string, env: EnvSource = process.env): string | undefined {
  return normaliseEnvValue(env[name]);
}

export function readString(name: string, defaultValue: string, env: EnvSource = process.env): string {
  return readOptionalString(name, env) ?? defaultValue;
}

/**
 * Matches the variable case-insensitively against {@link allowed} and returns
 * the canonical spelling, or `undefined` when absent or not allowed.
 */
export function readOptionalEnum<T extends string>(
  name: string,
  allowed: readonly T[],
  env: EnvSource = process.env,
): T | undefined {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised) {
    return undefined;
  }
  const lower = normalised.toLowerCase();
  return allowed.find((value) => value.toLowerCase() === lower);
}

export function readEnum<T extends string>(
  name: string,
  allowed: readonly T[],
  defaultValue: T,
  env: EnvSource = process.env,
): T {
  return readOptionalEnum(name, allowed, env) ?? defaultValue;
}
