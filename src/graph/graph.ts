/**
 * TraceGraph - container owning every node, edge, broken reference and
 * deleted node of one graph instance.
 *
 * All adjacency lives here, keyed by node id. Nodes reach their
 * neighbours through this index, so renaming means re-keying one place.
 */

import type { BrokenReference, Edge, EdgeKind, NodeKind } from '../core/types.js';
import { MutationLog } from '../mutations/log.js';
import type { EdgeSnapshot, IdRename } from '../mutations/types.js';
import { GraphNode, isKind, type NodeInit, type NodeRegistry, type TraversalOrder } from './node.js';
import { KIND_RULES } from './schema.js';

export class TraceGraph implements NodeRegistry {
  readonly mutationLog = new MutationLog();

  private index = new Map<string, GraphNode>();
  private readonly outgoing = new Map<string, Edge[]>();
  private readonly incoming = new Map<string, Edge[]>();
  private rootIds: string[] = [];
  private orphanIds: string[] = [];
  private readonly broken: BrokenReference[] = [];
  private readonly deleted: GraphNode[] = [];

  // ── Nodes ──────────────────────────────────────────────────────────

  findById(id: string): GraphNode | undefined {
    return this.index.get(id);
  }

  hasNode(id: string): boolean {
    return this.index.has(id);
  }

  nodeCount(): number {
    return this.index.size;
  }

  nodeIds(): string[] {
    return Array.from(this.index.keys());
  }

  positionOf(id: string): number {
    let position = 0;
    for (const key of this.index.keys()) {
      if (key === id) return position;
      position++;
    }
    return -1;
  }

  /**
   * Create a node and index it, optionally at a given index position.
   * Throws if the id is taken; callers validate first.
   */
  addNode<K extends NodeKind>(init: NodeInit<K>, position?: number): GraphNode<K> {
    if (this.index.has(init.id)) {
      throw new Error(`Node already indexed: ${init.id}`);
    }
    const node = new GraphNode(init, this);
    this.insertIndexed(node, position);
    return node;
  }

  /**
   * Remove a node and every edge touching it. Returns the removed edges in
   * removal order, with the positions needed to restore them.
   */
  removeNode(id: string): { node: GraphNode; position: number; edges: EdgeSnapshot[] } | undefined {
    const node = this.index.get(id);
    if (!node) return undefined;

    const position = this.positionOf(id);
    const edges: EdgeSnapshot[] = [];
    for (const edge of [...this.edgesTo(id), ...this.edgesFrom(id)]) {
      const snapshot = this.unlink(edge);
      if (snapshot) edges.push(snapshot);
    }
    this.index.delete(id);
    this.outgoing.delete(id);
    this.incoming.delete(id);
    this.rootIds = this.rootIds.filter((rootId) => rootId !== id);
    this.orphanIds = this.orphanIds.filter((orphanId) => orphanId !== id);
    return { node, position, edges };
  }

  /**
   * Re-key a node. Requirements cascade to their assertion children
   * (`REQ-x-A` becomes `REQ-y-A`). Returns the cascaded renames.
   */
  rename(oldId: string, newId: string): IdRename[] {
    const node = this.index.get(oldId);
    if (!node) return [];

    const cascaded: IdRename[] = [];
    if (isKind(node, 'requirement')) {
      for (const child of node.children()) {
        if (!isKind(child, 'assertion')) continue;
        const label = child.getField('label');
        if (child.id === `${oldId}-${label}`) {
          cascaded.push({ from: child.id, to: `${newId}-${label}` });
        }
      }
    }

    this.rekey(oldId, newId);
    for (const rename of cascaded) {
      this.rekey(rename.from, rename.to);
    }
    return cascaded;
  }

  /**
   * Re-key a single node without cascading.
   */
  rekey(oldId: string, newId: string): void {
    const node = this.index.get(oldId);
    if (!node || oldId === newId) return;

    const rebuilt = new Map<string, GraphNode>();
    for (const [key, value] of this.index) {
      rebuilt.set(key === oldId ? newId : key, value);
    }
    this.index = rebuilt;
    node.assignId(newId);

    const out = this.outgoing.get(oldId);
    if (out) {
      for (const edge of out) edge.parentId = newId;
      this.outgoing.delete(oldId);
      this.outgoing.set(newId, out);
    }
    const inc = this.incoming.get(oldId);
    if (inc) {
      for (const edge of inc) edge.childId = newId;
      this.incoming.delete(oldId);
      this.incoming.set(newId, inc);
    }

    this.rootIds = this.rootIds.map((id) => (id === oldId ? newId : id));
    this.orphanIds = this.orphanIds.map((id) => (id === oldId ? newId : id));
    for (const ref of this.broken) {
      if (ref.sourceId === oldId) ref.sourceId = newId;
    }
  }

  *allNodes(order: TraversalOrder = 'pre'): Generator<GraphNode> {
    const seen = new Set<string>();
    const starts = [...this.iterRoots(), ...this.index.values()];
    for (const start of starts) {
      if (seen.has(start.id)) continue;
      for (const node of start.walk(order)) {
        if (seen.has(node.id)) continue;
        seen.add(node.id);
        yield node;
      }
    }
  }

  *nodesByKind<T extends NodeKind>(kind: T): Generator<GraphNode<T>> {
    for (const node of this.index.values()) {
      if (isKind(node, kind)) yield node;
    }
  }

  // ── Edges ──────────────────────────────────────────────────────────

  /**
   * Link `childId` under `parentId`. An existing edge of the same kind
   * between the pair is reused: targeted edges merge their assertion
   * labels, whole-requirement edges are not duplicated.
   */
  link(parentId: string, childId: string, kind: EdgeKind, assertionTargets: string[] = []): Edge {
    const existing = this.findLinked(parentId, childId, kind, assertionTargets.length > 0);
    if (existing) {
      for (const label of assertionTargets) {
        if (!existing.assertionTargets.includes(label)) {
          existing.assertionTargets.push(label);
        }
      }
      return existing;
    }

    const edge: Edge = { parentId, childId, kind, assertionTargets: [...assertionTargets] };
    this.listFor(this.outgoing, parentId).push(edge);
    this.listFor(this.incoming, childId).push(edge);
    return edge;
  }

  /**
   * The edge `link` would reuse: same pair and kind, and the same
   * whole-or-targeted shape.
   */
  findLinked(parentId: string, childId: string, kind: EdgeKind, targeted: boolean): Edge | undefined {
    return this.edgesBetween(parentId, childId).find(
      (edge) => edge.kind === kind && edge.assertionTargets.length > 0 === targeted
    );
  }

  unlink(edge: Edge): EdgeSnapshot | undefined {
    const out = this.outgoing.get(edge.parentId) ?? [];
    const inc = this.incoming.get(edge.childId) ?? [];
    const outgoingIndex = out.indexOf(edge);
    const incomingIndex = inc.indexOf(edge);
    if (outgoingIndex === -1 || incomingIndex === -1) return undefined;

    out.splice(outgoingIndex, 1);
    inc.splice(incomingIndex, 1);
    return {
      parentId: edge.parentId,
      childId: edge.childId,
      kind: edge.kind,
      assertionTargets: [...edge.assertionTargets],
      outgoingIndex,
      incomingIndex,
    };
  }

  /**
   * Re-insert an edge at the positions it was removed from.
   */
  restoreEdge(snapshot: EdgeSnapshot): Edge {
    const edge: Edge = {
      parentId: snapshot.parentId,
      childId: snapshot.childId,
      kind: snapshot.kind,
      assertionTargets: [...snapshot.assertionTargets],
    };
    this.listFor(this.outgoing, edge.parentId).splice(snapshot.outgoingIndex, 0, edge);
    this.listFor(this.incoming, edge.childId).splice(snapshot.incomingIndex, 0, edge);
    return edge;
  }

  /** Edges whose parent is `id`. */
  edgesFrom(id: string): readonly Edge[] {
    return this.outgoing.get(id) ?? [];
  }

  /** Edges whose child is `id`. */
  edgesTo(id: string): readonly Edge[] {
    return this.incoming.get(id) ?? [];
  }

  edgesBetween(parentId: string, childId: string): Edge[] {
    return this.edgesFrom(parentId).filter((edge) => edge.childId === childId);
  }

  findEdge(parentId: string, childId: string, kind?: EdgeKind): Edge | undefined {
    return this.edgesBetween(parentId, childId).find((edge) => kind === undefined || edge.kind === kind);
  }

  *allEdges(): Generator<Edge> {
    for (const id of this.index.keys()) {
      yield* this.edgesFrom(id);
    }
  }

  // ── NodeRegistry ───────────────────────────────────────────────────

  childIdsOf(id: string): string[] {
    return unique(this.edgesFrom(id).map((edge) => edge.childId));
  }

  parentIdsOf(id: string): string[] {
    return unique(this.edgesTo(id).map((edge) => edge.parentId));
  }

  attachChild(parentId: string, childId: string): void {
    if (this.edgesBetween(parentId, childId).length === 0) {
      this.link(parentId, childId, 'contains');
    }
  }

  detachChild(parentId: string, childId: string): void {
    for (const edge of this.edgesBetween(parentId, childId)) {
      this.unlink(edge);
    }
  }

  // ── Roots & orphans ────────────────────────────────────────────────

  /**
   * Classify every node from its current parent count.
   */
  recomputeRoots(): void {
    const roots: string[] = [];
    const orphans: string[] = [];
    for (const node of this.index.values()) {
      const rule = KIND_RULES[node.kind];
      const hasParents = node.hasParents();
      if (rule.root === 'always' || (rule.root === 'parentless' && !hasParents)) {
        roots.push(node.id);
      } else if (!hasParents && rule.reportOrphan) {
        orphans.push(node.id);
      }
    }
    this.rootIds = roots;
    this.orphanIds = orphans;
  }

  *iterRoots(): Generator<GraphNode> {
    for (const id of this.rootIds) {
      const node = this.index.get(id);
      if (node) yield node;
    }
  }

  rootCount(): number {
    return this.rootIds.length;
  }

  hasRoot(id: string): boolean {
    return this.rootIds.includes(id);
  }

  orphans(): GraphNode[] {
    return this.orphanIds.flatMap((id) => {
      const node = this.index.get(id);
      return node ? [node] : [];
    });
  }

  // ── Broken references ──────────────────────────────────────────────

  brokenReferences(): readonly BrokenReference[] {
    return this.broken;
  }

  addBrokenReference(ref: BrokenReference, position?: number): void {
    const copy = { ...ref };
    if (position === undefined || position >= this.broken.length) {
      this.broken.push(copy);
    } else {
      this.broken.splice(position, 0, copy);
    }
  }

  findBrokenReference(sourceId: string, targetId: string): number {
    return this.broken.findIndex((ref) => ref.sourceId === sourceId && ref.targetId === targetId);
  }

  removeBrokenReferenceAt(position: number): BrokenReference | undefined {
    return this.broken.splice(position, 1)[0];
  }

  // ── Deleted nodes ──────────────────────────────────────────────────

  deletedNodes(): readonly GraphNode[] {
    return this.deleted;
  }

  retainDeleted(node: GraphNode): void {
    this.deleted.push(node);
  }

  /** Drop the most recently retained node with this id from the deleted list. */
  releaseDeleted(id: string): GraphNode | undefined {
    for (let i = this.deleted.length - 1; i >= 0; i--) {
      if (this.deleted[i].id === id) {
        return this.deleted.splice(i, 1)[0];
      }
    }
    return undefined;
  }

  // ── Internals ──────────────────────────────────────────────────────

  private insertIndexed(node: GraphNode, position?: number): void {
    if (position === undefined || position >= this.index.size) {
      this.index.set(node.id, node);
      return;
    }
    const rebuilt = new Map<string, GraphNode>();
    let i = 0;
    for (const [key, value] of this.index) {
      if (i === position) rebuilt.set(node.id, node);
      rebuilt.set(key, value);
      i++;
    }
    this.index = rebuilt;
  }

  private listFor(map: Map<string, Edge[]>, id: string): Edge[] {
    let list = map.get(id);
    if (!list) {
      list = [];
      map.set(id, list);
    }
    return list;
  }
}

function unique(ids: string[]): string[] {
  return Array.from(new Set(ids));
}
