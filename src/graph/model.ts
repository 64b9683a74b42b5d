import {
  isRecord,
  readInteger,
  readRecord,
  readText,
  type AudioLink,
  type AudioNode,
  type GraphSnapshot,
  type SnapshotElement,
} from "./types.js";

/** Discriminator fragment identifying node elements (`PipeWire:Interface:Node`). */
export const NODE_TYPE_TAG = "Node";
/** Discriminator fragment identifying link elements (`PipeWire:Interface:Link`). */
export const LINK_TYPE_TAG = "Link";

/**
 * Read-only index over a snapshot. Nodes and links are keyed by their numeric
 * identity and keep the order in which the dump listed them.
 */
export class GraphView {
  readonly nodes: ReadonlyMap<number, AudioNode>;
  readonly links: ReadonlyMap<number, AudioLink>;

  constructor(nodes: Iterable<AudioNode>, links: Iterable<AudioLink>) {
    this.nodes = new Map(Array.from(nodes, (node) => [node.id, node] as const));
    this.links = new Map(Array.from(links, (link) => [link.id, link] as const));
  }

  getNode(id: number): AudioNode | undefined {
    return this.nodes.get(id);
  }

  listNodes(): AudioNode[] {
    return Array.from(this.nodes.values());
  }

  listLinks(): AudioLink[] {
    return Array.from(this.links.values());
  }
}

function toNode(element: SnapshotElement, id: number, type: string): AudioNode {
  const info = readRecord(element, "info");
  return {
    id,
    type,
    props: readRecord(info, "props"),
    state: readText(info, "state"),
    params: readRecord(info, "params"),
  };
}

function toLink(element: SnapshotElement, id: number, type: string): AudioLink {
  const info = readRecord(element, "info");
  return {
    id,
    type,
    outputNodeId: readInteger(info, "output-node-id"),
    inputNodeId: readInteger(info, "input-node-id"),
  };
}

/**
 * Partitions the dump into node and link indices. Elements without an integer
 * `id` or a string `type`, and elements whose type names neither category,
 * are dropped. Never throws: anything that is not an array yields an empty
 * view.
 */
export function buildGraphView(snapshot: GraphSnapshot | null | undefined): GraphView {
  const nodes: AudioNode[] = [];
  const links: AudioLink[] = [];
  if (!Array.isArray(snapshot)) {
    return new GraphView(nodes, links);
  }

  for (const element of snapshot) {
    if (!isRecord(element)) {
      continue;
    }
    const id = readInteger(element, "id");
    const type = readText(element, "type");
    if (id === null || type === null) {
      continue;
    }
    if (type.includes(NODE_TYPE_TAG)) {
      nodes.push(toNode(element, id, type));
    } else if (type.includes(LINK_TYPE_TAG)) {
      links.push(toLink(element, id, type));
    }
  }

  return new GraphView(nodes, links);
}
