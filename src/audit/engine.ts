import {
  assessVolume,
  describeNode,
  formatVolumeFailure,
  readNodeName,
  resolveSampleRate,
} from "../graph/attributes.js";
import { buildGraphView, type GraphView } from "../graph/model.js";
import { filterRunningSources } from "../graph/sources.js";
import { connectedUpstreamNodes } from "../graph/topology.js";
import type { AudioNode } from "../graph/types.js";
import type { SnapshotResult, SnapshotSource } from "../snapshot/types.js";
import { DiagnosticLog } from "./diagnostics.js";
import type { AuditOutcome, AuditReport, VolumeMismatchOutcome } from "./outcome.js";

export interface AuditOptions {
  /** Log receiving the narration. A fresh one is created when omitted. */
  readonly log?: DiagnosticLog;
}

/**
 * First node whose raw `node.name` contains `target`. Iteration follows the
 * dump order, so when several devices match the first listed one wins. An
 * empty `target` matches any node.
 */
export function findTargetNode(view: GraphView, target: string): AudioNode | undefined {
  return view.listNodes().find((node) => readNodeName(node).includes(target));
}

function checkVolume(
  node: AudioNode,
  role: VolumeMismatchOutcome["role"],
  log: DiagnosticLog,
): VolumeMismatchOutcome | null {
  const assessment = assessVolume(node);
  if (assessment.atUnity) {
    return null;
  }
  log.add(formatVolumeFailure(node, assessment));
  return { kind: "VolumeMismatch", role, nodeId: node.id, assessment };
}

function classify(view: GraphView, target: string, log: DiagnosticLog): AuditOutcome {
  log.add(`-> Searching for device: '${target}'`);
  const device = findTargetNode(view, target);
  if (!device) {
    log.add("Device not found.");
    return { kind: "DeviceNotFound", target };
  }
  log.add("Device found.");

  const deviceRate = resolveSampleRate(device);
  if (deviceRate === null) {
    log.add("Could not determine sample rate for the target device.");
    return { kind: "Error", reason: "rate-unknown" };
  }

  const deviceVolume = checkVolume(device, "target", log);
  if (deviceVolume) {
    return deviceVolume;
  }

  log.add(`-> Finding sources connected to device ID ${device.id}`);
  const upstream = connectedUpstreamNodes(view, device.id);
  log.add("-> Filtering sources...");
  const { running, excluded } = filterRunningSources(upstream);
  for (const source of excluded) {
    log.add(`-> Filtering out non-running source: ${source.name} (state: ${source.state ?? "none"})`);
  }

  if (running.length === 0) {
    log.add("Device is idle (no relevant sources connected).");
    return { kind: "Idle" };
  }
  if (running.length > 1) {
    log.add(`Device has ${running.length} active sources. Skipping detailed check.`);
    return { kind: "AmbiguousSources", count: running.length };
  }

  const [source] = running;
  log.add("Found 1 relevant source.");

  const sourceVolume = checkVolume(source, "source", log);
  if (sourceVolume) {
    return sourceVolume;
  }

  const sourceRate = resolveSampleRate(source);
  log.add(
    `-> Checking source '${describeNode(source)}' (ID: ${source.id}): ` +
      `Device rate is ${deviceRate}, Source rate is ${sourceRate ?? "unknown"}`,
  );

  // Unknown source rates pass.
  if (sourceRate !== null && sourceRate !== deviceRate) {
    log.add(`Mismatch found! Device(${deviceRate}) != Source(${sourceRate})`);
    return { kind: "RateMismatch", targetRate: deviceRate, sourceRate };
  }

  log.add("All source sample rates match the device rate.");
  return { kind: "Consistent", rate: deviceRate };
}

/** Classifies an already indexed graph against the target device. */
export function auditGraph(view: GraphView, target: string, options: AuditOptions = {}): AuditReport {
  const log = options.log ?? new DiagnosticLog();
  const outcome = classify(view, target, log);
  return { outcome, log: log.entries() };
}

/**
 * Audits the outcome of one acquisition. A failed acquisition ends the run with
 * the `Error` outcome and its message in the log.
 */
export function auditSnapshot(result: SnapshotResult, target: string, options: AuditOptions = {}): AuditReport {
  const log = options.log ?? new DiagnosticLog();
  if (!result.ok) {
    log.add(`Error getting or parsing the audio graph: ${result.error.message}`);
    return { outcome: { kind: "Error", reason: "snapshot-unavailable" }, log: log.entries() };
  }
  return auditGraph(buildGraphView(result.snapshot), target, { log });
}

/** Acquires a snapshot from the source and audits it. The source never rejects. */
export async function runAudit(
  source: SnapshotSource,
  target: string,
  options: AuditOptions = {},
): Promise<AuditReport> {
  const log = options.log ?? new DiagnosticLog();
  log.add(`-> Acquiring audio graph state from '${source.label}'...`);
  return auditSnapshot(await source.acquire(), target, { log });
}
