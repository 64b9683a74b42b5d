import type { VolumeAssessment } from "../graph/attributes.js";

/** Why an audit ended in the {@link ErrorOutcome}. */
export type AuditErrorReason = "snapshot-unavailable" | "rate-unknown";

export interface ErrorOutcome {
  readonly kind: "Error";
  readonly reason: AuditErrorReason;
}

export interface DeviceNotFoundOutcome {
  readonly kind: "DeviceNotFound";
  readonly target: string;
}

export interface VolumeMismatchOutcome {
  readonly kind: "VolumeMismatch";
  readonly role: "target" | "source";
  readonly nodeId: number;
  readonly assessment: Extract<VolumeAssessment, { atUnity: false }>;
}

export interface IdleOutcome {
  readonly kind: "Idle";
}

export interface AmbiguousSourcesOutcome {
  readonly kind: "AmbiguousSources";
  readonly count: number;
}

export interface RateMismatchOutcome {
  readonly kind: "RateMismatch";
  readonly targetRate: number;
  readonly sourceRate: number;
}

export interface ConsistentOutcome {
  readonly kind: "Consistent";
  readonly rate: number;
}

/** Terminal classification of one audit run. Exactly one applies. */
export type AuditOutcome =
  | ErrorOutcome
  | DeviceNotFoundOutcome
  | VolumeMismatchOutcome
  | IdleOutcome
  | AmbiguousSourcesOutcome
  | RateMismatchOutcome
  | ConsistentOutcome;

export type AuditOutcomeKind = AuditOutcome["kind"];

/** Outcome paired with the narration that led to it. */
export interface AuditReport {
  readonly outcome: AuditOutcome;
  readonly log: readonly string[];
}
