import type { GraphView } from "./model.js";
import type { AudioNode } from "./types.js";

/**
 * Nodes feeding the target: every distinct output endpoint of a link whose
 * input endpoint is `targetId`. Endpoints missing from the node index are
 * skipped. Order follows the first link seen for each source.
 */
export function connectedUpstreamNodes(view: GraphView, targetId: number): AudioNode[] {
  const sourceIds = new Set<number>();
  for (const link of view.listLinks()) {
    if (link.inputNodeId === targetId && link.outputNodeId !== null) {
      sourceIds.add(link.outputNodeId);
    }
  }

  const sources: AudioNode[] = [];
  for (const id of sourceIds) {
    const node = view.getNode(id);
    if (node) {
      sources.push(node);
    }
  }
  return sources;
}
