export { DiagnosticLog } from "./audit/diagnostics.js";
export { auditGraph, auditSnapshot, findTargetNode, runAudit, type AuditOptions } from "./audit/engine.js";
export type { AuditOutcome, AuditOutcomeKind, AuditReport } from "./audit/outcome.js";
export {
  assessVolume,
  describeNode,
  resolveSampleRate,
  type RateEncoding,
  type FormatLocation,
  type VolumeAssessment,
} from "./graph/attributes.js";
export { GraphView, buildGraphView } from "./graph/model.js";
export { filterRunningSources, type SourceSelection } from "./graph/sources.js";
export { connectedUpstreamNodes } from "./graph/topology.js";
export type { AudioLink, AudioNode, GraphSnapshot } from "./graph/types.js";
export { renderGenmon, renderJson, renderStatus, type StatusFormat } from "./render/status.js";
export { createFileSnapshotSource } from "./snapshot/file.js";
export { createPwDumpSource } from "./snapshot/pwDump.js";
export { SnapshotUnavailableError, type SnapshotResult, type SnapshotSource } from "./snapshot/types.js";
