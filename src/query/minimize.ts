import type { EdgeKind } from '../core/types.js';
import type { TraceGraph } from '../graph/graph.js';

export interface MinimizeStats {
  inputCount: number;
  minimalCount: number;
  prunedCount: number;
}

export interface PrunedRequirement {
  id: string;
  /** Surviving inputs that have this id among their ancestors. */
  supersededBy: string[];
}

export interface MinimizeResult {
  minimalSet: string[];
  pruned: PrunedRequirement[];
  notFound: string[];
  stats: MinimizeStats;
}

export const DEFAULT_MINIMIZE_EDGE_KINDS: readonly EdgeKind[] = ['implements', 'refines'];

/**
 * Reduce a set of requirement ids to the most specific ones: an id is
 * dropped when another input reaches it by following `edgeKinds` upward.
 * Mutual ancestors (a cycle) are both kept.
 */
export function minimizeRequirementSet(
  graph: TraceGraph,
  ids: readonly string[],
  edgeKinds: readonly EdgeKind[] = DEFAULT_MINIMIZE_EDGE_KINDS
): MinimizeResult {
  const inputs: string[] = [];
  const notFound: string[] = [];
  for (const id of new Set(ids)) {
    if (graph.hasNode(id)) inputs.push(id);
    else notFound.push(id);
  }

  const ancestors = new Map(inputs.map((id) => [id, ancestorsOf(graph, id, edgeKinds)]));
  const supersedes = (by: string, id: string): boolean =>
    by !== id &&
    (ancestors.get(by)?.has(id) ?? false) &&
    !(ancestors.get(id)?.has(by) ?? false);

  const minimalSet = inputs.filter((id) => !inputs.some((other) => supersedes(other, id)));
  const pruned = inputs
    .filter((id) => !minimalSet.includes(id))
    .map((id) => ({ id, supersededBy: minimalSet.filter((keep) => supersedes(keep, id)) }));

  return {
    minimalSet,
    pruned,
    notFound,
    stats: {
      inputCount: inputs.length + notFound.length,
      minimalCount: minimalSet.length,
      prunedCount: pruned.length,
    },
  };
}

export function ancestorsOf(graph: TraceGraph, id: string, edgeKinds: readonly EdgeKind[]): Set<string> {
  const seen = new Set<string>();
  const stack = [id];
  while (stack.length > 0) {
    const current = stack.pop();
    if (current === undefined) continue;
    for (const edge of graph.edgesTo(current)) {
      if (!edgeKinds.includes(edge.kind) || seen.has(edge.parentId)) continue;
      seen.add(edge.parentId);
      stack.push(edge.parentId);
    }
  }
  return seen;
}
