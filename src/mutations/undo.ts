/**
 * Undo: invert logged mutations, newest first.
 */

import { fail, notFound, ok, type Result } from '../core/errors.js';
import type { EdgeKind } from '../core/types.js';
import type { TraceGraph } from '../graph/graph.js';
import { isKind } from '../graph/node.js';
import { debug } from '../shared/debug.js';
import { isRecognized, type LinkChange, type LoggedEntry, type NodeSnapshot } from './types.js';

/**
 * Pop and invert the most recent mutation.
 */
export function undoLast(graph: TraceGraph): Result<LoggedEntry> {
  const entry = graph.mutationLog.pop();
  if (!entry) {
    return fail('invalid_state', 'Nothing to undo');
  }
  invert(graph, entry);
  return ok(entry);
}

/**
 * Invert every mutation from the newest back to and including `id`.
 * Returns the undone entries, newest first.
 */
export function undoTo(graph: TraceGraph, id: string): Result<LoggedEntry[]> {
  if (!graph.mutationLog.has(id)) return notFound('Mutation', id);

  const undone: LoggedEntry[] = [];
  let entry = graph.mutationLog.pop();
  while (entry) {
    invert(graph, entry);
    undone.push(entry);
    if (entry.id === id) break;
    entry = graph.mutationLog.pop();
  }
  return ok(undone);
}

function invert(graph: TraceGraph, entry: LoggedEntry): void {
  if (!isRecognized(entry)) {
    // Popped but not inverted: the graph stays as it is.
    debug('mutation', 'Skipping unknown operation on undo', { operation: entry.operation, id: entry.id });
    return;
  }

  switch (entry.operation) {
    case 'rename_node': {
      graph.rekey(entry.after.id, entry.before.id);
      for (const rename of entry.after.cascaded) {
        graph.rekey(rename.to, rename.from);
      }
      break;
    }

    case 'update_title': {
      const node = graph.findById(entry.targetId);
      if (node) node.label = entry.before.title;
      break;
    }

    case 'change_status': {
      const node = graph.findById(entry.targetId);
      if (node && isKind(node, 'requirement')) node.setField('status', entry.before.status);
      break;
    }

    case 'add_requirement': {
      graph.removeNode(entry.after.id);
      graph.recomputeRoots();
      break;
    }

    case 'delete_requirement': {
      const { node, assertions, edges, broken } = entry.before;
      for (const snapshot of [...assertions, node].reverse()) {
        restoreNode(graph, snapshot);
      }
      for (const snapshot of [...edges].reverse()) {
        graph.restoreEdge(snapshot);
      }
      for (const { reference, index } of broken) {
        graph.addBrokenReference(reference, index);
      }
      graph.recomputeRoots();
      break;
    }

    case 'add_assertion': {
      graph.removeNode(entry.after.assertionId);
      setHash(graph, entry.targetId, entry.before.hash);
      break;
    }

    case 'update_assertion': {
      const node = graph.findById(entry.targetId);
      if (node && isKind(node, 'assertion')) {
        node.setField('text', entry.before.text);
        node.label = entry.before.text;
        const owner = node.parents().find((parent) => parent.kind === 'requirement');
        if (owner) setHash(graph, owner.id, entry.before.hash);
      }
      break;
    }

    case 'delete_assertion': {
      const { before, after } = entry;
      for (const reference of [...after.brokenAdded].reverse()) {
        const index = lastBrokenIndex(graph, reference.sourceId, reference.targetId);
        if (index !== -1) graph.removeBrokenReferenceAt(index);
      }
      for (const rename of [...after.renames].reverse()) {
        graph.rekey(rename.toId, rename.fromId);
        const sibling = graph.findById(rename.fromId);
        if (sibling && isKind(sibling, 'assertion')) sibling.setField('label', rename.fromLabel);
      }
      restoreNode(graph, before.node);
      for (const snapshot of [...after.removedEdges].reverse()) {
        graph.restoreEdge(snapshot);
      }
      const edges = graph.edgesFrom(before.requirementId);
      before.targets.forEach((targets, i) => {
        const edge = edges[i];
        if (edge && edge.childId === targets.childId && edge.kind === targets.kind) {
          edge.assertionTargets = [...targets.assertionTargets];
        }
      });
      setHash(graph, before.requirementId, before.hash);
      graph.recomputeRoots();
      break;
    }

    case 'rename_assertion': {
      const { before, after } = entry;
      graph.rekey(after.id, before.id);
      const node = graph.findById(before.id);
      if (node && isKind(node, 'assertion')) {
        node.setField('label', before.label);
        const owner = node.parents().find((parent) => parent.kind === 'requirement');
        if (owner) {
          for (const edge of graph.edgesFrom(owner.id)) {
            edge.assertionTargets = edge.assertionTargets.map((label) =>
              label === after.label ? before.label : label
            );
          }
          setHash(graph, owner.id, before.hash);
        }
      }
      break;
    }

    case 'add_edge': {
      const { after } = entry;
      if (after.broken) {
        const index = lastBrokenIndex(graph, after.childId, after.parentId);
        if (index !== -1) graph.removeBrokenReferenceAt(index);
      } else {
        revertLink(graph, after.parentId, after.childId, after.kind, after.assertionTargets, entry.before.link);
      }
      graph.recomputeRoots();
      break;
    }

    case 'change_edge_kind': {
      const { after } = entry;
      const edge = graph
        .edgesBetween(after.parentId, after.childId)
        .find((candidate) => candidate.kind === after.kind);
      if (edge) edge.kind = entry.before.kind;
      break;
    }

    case 'delete_edge': {
      for (const snapshot of [...entry.before.edges].reverse()) {
        graph.restoreEdge(snapshot);
      }
      graph.recomputeRoots();
      break;
    }

    case 'fix_broken_reference': {
      const { before, after } = entry;
      if (after.fixed && after.edge) {
        const { parentId, childId, kind, assertionTargets } = after.edge;
        revertLink(graph, parentId, childId, kind, assertionTargets, before.link);
      } else {
        const index = lastBrokenIndex(graph, before.reference.sourceId, after.newTargetId);
        if (index !== -1) graph.removeBrokenReferenceAt(index);
      }
      graph.addBrokenReference(before.reference, before.index);
      graph.recomputeRoots();
      break;
    }
  }
  debug('mutation', `Undid ${entry.operation}`, { id: entry.id, targetId: entry.targetId });
}

function restoreNode(graph: TraceGraph, snapshot: NodeSnapshot): void {
  graph.releaseDeleted(snapshot.id);
  const node = graph.addNode(
    {
      id: snapshot.id,
      kind: snapshot.kind,
      label: snapshot.label,
      content: structuredClone(snapshot.content),
      source: snapshot.source ? { ...snapshot.source } : undefined,
    },
    snapshot.position
  );
  for (const [name, value] of snapshot.metrics) {
    node.setMetric(name, value);
  }
}

function revertLink(
  graph: TraceGraph,
  parentId: string,
  childId: string,
  kind: EdgeKind,
  assertionTargets: string[],
  link: LinkChange | null
): void {
  if (!link || link.kind === 'none') return;
  const edge = graph.findLinked(parentId, childId, kind, assertionTargets.length > 0);
  if (!edge) return;
  if (link.kind === 'merged') {
    edge.assertionTargets = [...link.previousTargets];
  } else {
    graph.unlink(edge);
  }
}

function setHash(graph: TraceGraph, requirementId: string, hash: string): void {
  const node = graph.findById(requirementId);
  if (node && isKind(node, 'requirement')) node.setField('hash', hash);
}

function lastBrokenIndex(graph: TraceGraph, sourceId: string, targetId: string): number {
  const refs = graph.brokenReferences();
  for (let i = refs.length - 1; i >= 0; i--) {
    if (refs[i].sourceId === sourceId && refs[i].targetId === targetId) return i;
  }
  return -1;
}
