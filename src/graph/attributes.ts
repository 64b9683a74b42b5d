import { isRecord, readText, type AudioNode, type JsonRecord } from "./types.js";

/** Placeholder returned when a node carries none of the naming properties. */
export const UNKNOWN_SOURCE_NAME = "Unknown Source";

/** Naming properties inspected by {@link describeNode}, most descriptive first. */
const NAME_PROPERTIES = ["node.description", "application.name", "node.name"] as const;

/** Parameter group holding the negotiated (active) format. */
export const ACTIVE_FORMAT_GROUP = "Format";
/** Parameter group listing the formats a node can be configured with. */
export const ENUM_FORMAT_GROUP = "EnumFormat";
/** Parameter group holding volume and mute properties. */
export const PROPS_GROUP = "Props";

/** Volume value reported by PipeWire for 100%. Compared with strict equality. */
export const UNITY_VOLUME = 1.0;

/**
 * Encodings observed for a `rate` field: a plain integer, or a range/choice
 * object whose `default` member is the effective value.
 */
export type RateEncoding =
  | { readonly kind: "direct"; readonly value: number }
  | { readonly kind: "range"; readonly defaultValue: number };

/** Where a format entry stores its rate. */
export type FormatLocation =
  | { readonly kind: "audio"; readonly container: JsonRecord }
  | { readonly kind: "top-level"; readonly container: JsonRecord };

/** Outcome of {@link assessVolume}. Failures keep the values that broke unity. */
export type VolumeAssessment =
  | { readonly atUnity: true }
  | {
      readonly atUnity: false;
      readonly field: "volume" | "channelVolumes";
      readonly values: readonly unknown[];
    };

/** Name used in diagnostics, preferring the human-facing description. */
export function describeNode(node: AudioNode): string {
  for (const key of NAME_PROPERTIES) {
    const value = readText(node.props, key);
    if (value) {
      return value;
    }
  }
  return UNKNOWN_SOURCE_NAME;
}

/** Raw `node.name` used for device lookup, or an empty string. */
export function readNodeName(node: AudioNode): string {
  return readText(node.props, "node.name") ?? "";
}

function isSampleRate(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value > 0;
}

/** Decodes a raw `rate` value. Unrecognised shapes yield `null`. */
export function decodeRateEncoding(value: unknown): RateEncoding | null {
  if (isSampleRate(value)) {
    return { kind: "direct", value };
  }
  if (isRecord(value)) {
    const defaultValue = value.default;
    return isSampleRate(defaultValue) ? { kind: "range", defaultValue } : null;
  }
  return null;
}

export function rateFromEncoding(encoding: RateEncoding): number {
  switch (encoding.kind) {
    case "direct":
      return encoding.value;
    case "range":
      return encoding.defaultValue;
  }
}

/**
 * Determines where a format entry keeps its rate. The presence of an `audio`
 * key selects the nested location even when its value is malformed, in which
 * case the rate resolves to unknown.
 */
export function locateFormat(entry: JsonRecord): FormatLocation {
  if ("audio" in entry) {
    const audio = entry.audio;
    return { kind: "audio", container: isRecord(audio) ? audio : {} };
  }
  return { kind: "top-level", container: entry };
}

function readGroup(node: AudioNode, group: string): readonly unknown[] {
  const entries = node.params[group];
  return Array.isArray(entries) ? entries : [];
}

function rateAt(location: FormatLocation): number | null {
  const encoding = decodeRateEncoding(location.container.rate);
  return encoding ? rateFromEncoding(encoding) : null;
}

/**
 * Effective sample rate of a node.
 *
 * A non-empty active format group is decisive: its first entry is read and the
 * enumerated formats are not consulted even when that entry yields nothing.
 * Idle or suspended nodes usually have no active format, so the first
 * enumerated format is used instead (top-level `rate` only).
 */
export function resolveSampleRate(node: AudioNode): number | null {
  const active = readGroup(node, ACTIVE_FORMAT_GROUP);
  if (active.length > 0) {
    const entry = active[0];
    return isRecord(entry) ? rateAt(locateFormat(entry)) : null;
  }

  const available = readGroup(node, ENUM_FORMAT_GROUP);
  if (available.length > 0) {
    const entry = available[0];
    return isRecord(entry) ? rateAt({ kind: "top-level", container: entry }) : null;
  }

  return null;
}

/**
 * Checks that every volume property of the node sits exactly at
 * {@link UNITY_VOLUME}. A node without a `Props` group has nothing that could
 * contradict unity. A `volume` key that is present fails on any other value,
 * `null` and strings included; `channelVolumes` is only inspected when it is an
 * array, and every element must equal unity.
 */
export function assessVolume(node: AudioNode): VolumeAssessment {
  for (const entry of readGroup(node, PROPS_GROUP)) {
    if (!isRecord(entry)) {
      continue;
    }

    if ("volume" in entry && entry.volume !== UNITY_VOLUME) {
      return { atUnity: false, field: "volume", values: [entry.volume] };
    }

    const channelVolumes: unknown = entry.channelVolumes;
    if (Array.isArray(channelVolumes) && channelVolumes.some((value) => value !== UNITY_VOLUME)) {
      return { atUnity: false, field: "channelVolumes", values: channelVolumes };
    }
  }
  return { atUnity: true };
}

function formatVolumeValue(value: unknown): string {
  return typeof value === "number" ? String(value) : JSON.stringify(value);
}

/** Human readable explanation of a failed volume assessment. */
export function formatVolumeFailure(
  node: AudioNode,
  assessment: Extract<VolumeAssessment, { atUnity: false }>,
): string {
  const observed =
    assessment.field === "volume"
      ? `value: ${assessment.values.map(formatVolumeValue).join(", ")}`
      : `values: [${assessment.values.map(formatVolumeValue).join(", ")}]`;
  return `Volume is not 100% for '${describeNode(node)}' (ID: ${node.id}) (${observed})`;
}
