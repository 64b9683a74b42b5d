import type { AuditOutcome, AuditOutcomeKind, AuditReport } from "../audit/outcome.js";

export type StatusColor = "Red" | "White";

export interface StatusLabel {
  readonly text: string;
  readonly color: StatusColor;
}

/** Output protocols understood by the CLI. */
export const STATUS_FORMATS = ["genmon", "json"] as const;
export type StatusFormat = (typeof STATUS_FORMATS)[number];

/** Short label and colour shown in the status bar for each outcome. */
export function labelFor(outcome: AuditOutcome): StatusLabel {
  switch (outcome.kind) {
    case "Error":
      return { text: "Err", color: "Red" };
    case "DeviceNotFound":
      return { text: "N/A", color: "White" };
    case "VolumeMismatch":
      return { text: "Vol Err", color: "Red" };
    case "AmbiguousSources":
      return { text: "Src Err", color: "Red" };
    case "Idle":
      return { text: "Idle", color: "White" };
    case "RateMismatch":
      return { text: "Freq Err", color: "Red" };
    case "Consistent":
      return { text: String(outcome.rate), color: "White" };
  }
}

export function escapeXml(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

function tooltipText(report: AuditReport): string {
  return report.log.join("\n").trim();
}

/** `DeviceNotFound` → `device-not-found`. */
export function outcomeClass(kind: AuditOutcomeKind): string {
  return kind.replace(/([a-z])([A-Z])/g, "$1-$2").toLowerCase();
}

/** Markup for the xfce4 generic monitor plugin: label plus tooltip. */
export function renderGenmon(report: AuditReport): string {
  const label = labelFor(report.outcome);
  return (
    `<txt><span color='${label.color}'>${escapeXml(label.text)}</span></txt>` +
    `<tool>${escapeXml(tooltipText(report))}</tool>`
  );
}

/** Single-line JSON for bars speaking the `{text, tooltip, class}` protocol. */
export function renderJson(report: AuditReport): string {
  const label = labelFor(report.outcome);
  return JSON.stringify({
    text: label.text,
    tooltip: tooltipText(report),
    class: outcomeClass(report.outcome.kind),
    alt: label.color === "Red" ? "alert" : "normal",
  });
}

export function renderStatus(report: AuditReport, format: StatusFormat): string {
  return format === "json" ? renderJson(report) : renderGenmon(report);
}
