import { describeNode } from "./attributes.js";
import type { AudioNode } from "./types.js";

/** Runtime state of a node that is actively producing audio. */
export const RUNNING_STATE = "running";

/** Source dropped by {@link filterRunningSources}, kept for diagnostics. */
export interface ExcludedSource {
  readonly node: AudioNode;
  readonly name: string;
  readonly state: string | null;
}

export interface SourceSelection {
  /** Running sources, in input order. */
  readonly running: AudioNode[];
  readonly excluded: ExcludedSource[];
}

/** Keeps the nodes whose state is exactly `running`. */
export function filterRunningSources(candidates: readonly AudioNode[]): SourceSelection {
  const running: AudioNode[] = [];
  const excluded: ExcludedSource[] = [];
  for (const node of candidates) {
    if (node.state === RUNNING_STATE) {
      running.push(node);
    } else {
      excluded.push({ node, name: describeNode(node), state: node.state });
    }
  }
  return { running, excluded };
}
