/**
 * Subtree extraction. One breadth-first walk feeds every output shape so
 * they always agree on membership.
 */

import { notFound, ok, type Result } from '../core/errors.js';
import type { EdgeKind, NodeKind } from '../core/types.js';
import { renderOutline } from '../export/outline.js';
import type { TraceGraph } from '../graph/graph.js';
import type { GraphNode } from '../graph/node.js';
import { defaultSubtreeKinds } from '../graph/schema.js';
import { toNodeView, type NodeView } from '../graph/serialize.js';

export type SubtreeFormat = 'markdown' | 'flat' | 'nested';

export interface SubtreeOptions {
  /** 0 means unlimited. */
  depth?: number;
  kinds?: readonly NodeKind[];
}

export interface SubtreeEntry {
  node: GraphNode;
  depth: number;
  /** Parent through which the walk first reached this node. */
  parentId?: string;
}

export interface SubtreeTreeNode {
  id: string;
  kind: NodeKind;
  label: string;
  depth: number;
  view: NodeView;
  children: SubtreeTreeNode[];
}

export interface FlatSubtree {
  format: 'flat';
  rootId: string;
  nodes: (NodeView & { depth: number })[];
  edges: { parentId: string; childId: string; kind: EdgeKind; assertionTargets: string[] }[];
  stats: { nodeCount: number; edgeCount: number; maxDepth: number; byKind: Partial<Record<NodeKind, number>> };
}

export interface NestedSubtree {
  format: 'nested';
  rootId: string;
  nodeCount: number;
  root: SubtreeTreeNode;
}

export interface MarkdownSubtree {
  format: 'markdown';
  rootId: string;
  nodeCount: number;
  markdown: string;
}

export type Subtree = FlatSubtree | NestedSubtree | MarkdownSubtree;

/**
 * Walk down from `rootId`. Nodes whose kind is filtered out are neither
 * included nor walked through; the root is always included.
 */
export function collectSubtree(
  graph: TraceGraph,
  rootId: string,
  options: SubtreeOptions = {}
): Result<SubtreeEntry[]> {
  const root = graph.findById(rootId);
  if (!root) return notFound('Node', rootId);

  const maxDepth = options.depth ?? 0;
  const kinds = new Set(options.kinds ?? defaultSubtreeKinds(root.kind));
  const visited = new Set<string>([root.id]);
  const entries: SubtreeEntry[] = [{ node: root, depth: 0 }];

  for (let i = 0; i < entries.length; i++) {
    const { node, depth } = entries[i];
    if (maxDepth > 0 && depth >= maxDepth) continue;
    for (const child of node.children()) {
      if (visited.has(child.id) || !kinds.has(child.kind)) continue;
      visited.add(child.id);
      entries.push({ node: child, depth: depth + 1, parentId: node.id });
    }
  }
  return ok(entries);
}

export function getSubtree(
  graph: TraceGraph,
  rootId: string,
  format: SubtreeFormat = 'markdown',
  options: SubtreeOptions = {}
): Result<Subtree> {
  const collected = collectSubtree(graph, rootId, options);
  if (!collected.ok) return collected;
  const entries = collected.value;

  switch (format) {
    case 'flat':
      return ok(flatten(graph, rootId, entries));
    case 'nested':
      return ok({ format, rootId, nodeCount: entries.length, root: nest(entries) });
    case 'markdown':
      return ok({ format, rootId, nodeCount: entries.length, markdown: renderOutline(nest(entries)) });
  }
}

function flatten(graph: TraceGraph, rootId: string, entries: SubtreeEntry[]): FlatSubtree {
  const members = new Set(entries.map((entry) => entry.node.id));
  const edges: FlatSubtree['edges'] = [];
  const byKind: Partial<Record<NodeKind, number>> = {};
  let maxDepth = 0;

  for (const { node, depth } of entries) {
    byKind[node.kind] = (byKind[node.kind] ?? 0) + 1;
    maxDepth = Math.max(maxDepth, depth);
    for (const edge of graph.edgesFrom(node.id)) {
      if (!members.has(edge.childId)) continue;
      edges.push({
        parentId: edge.parentId,
        childId: edge.childId,
        kind: edge.kind,
        assertionTargets: [...edge.assertionTargets],
      });
    }
  }

  return {
    format: 'flat',
    rootId,
    nodes: entries.map(({ node, depth }) => ({ ...toNodeView(node), depth })),
    edges,
    stats: { nodeCount: entries.length, edgeCount: edges.length, maxDepth, byKind },
  };
}

function nest(entries: SubtreeEntry[]): SubtreeTreeNode {
  const byId = new Map<string, SubtreeTreeNode>();
  let root: SubtreeTreeNode | undefined;

  for (const { node, depth, parentId } of entries) {
    const tree: SubtreeTreeNode = {
      id: node.id,
      kind: node.kind,
      label: node.label,
      depth,
      view: toNodeView(node),
      children: [],
    };
    byId.set(node.id, tree);
    const parent = parentId === undefined ? undefined : byId.get(parentId);
    if (parent) parent.children.push(tree);
    else root ??= tree;
  }

  if (!root) throw new Error('Subtree walk produced no root');
  return root;
}
