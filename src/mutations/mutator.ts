/**
 * Graph mutations.
 *
 * Every operation validates all of its preconditions before touching the
 * graph, so a failed call leaves nothing behind. Each success appends one
 * entry to the graph's mutation log carrying what undo needs.
 */

import { randomUUID } from 'node:crypto';
import { fail, notFound, ok, type Result } from '../core/errors.js';
import {
  computeRequirementHash,
  DEFAULT_HASH_OPTIONS,
  type HashMode,
  type HashOptions,
} from '../core/hash.js';
import { EDGE_KINDS, type BrokenReference, type Edge, type EdgeKind } from '../core/types.js';
import { redirectToOwner, type ResolvedTarget } from '../graph/builder.js';
import type { TraceGraph } from '../graph/graph.js';
import { assertionsOf, isKind, type GraphNode } from '../graph/node.js';
import { debug } from '../shared/debug.js';
import { undoLast, undoTo } from './undo.js';
import type {
  EdgeSnapshot,
  IndexedBrokenReference,
  LabelRename,
  LinkChange,
  LoggedEntry,
  MutationEntry,
  MutationRecord,
  NodeSnapshot,
} from './types.js';

export interface MutatorOptions {
  hashMode?: HashMode;
  hashLength?: number;
  /** Prefix tried when an edge target does not match an id exactly. */
  idPrefix?: string;
}

export interface NewRequirement {
  id: string;
  title: string;
  level?: string;
  status?: string;
  /** Link the new requirement under this one. */
  parentId?: string;
  edgeKind?: 'implements' | 'refines';
}

export interface DeleteAssertionOptions {
  /** Shift later sibling labels down onto the freed one. */
  compact?: boolean;
}

export class GraphMutator {
  private readonly hash: HashOptions;
  private readonly idPrefix: string;

  constructor(
    private readonly graph: TraceGraph,
    options: MutatorOptions = {}
  ) {
    this.hash = {
      mode: options.hashMode ?? DEFAULT_HASH_OPTIONS.mode,
      length: options.hashLength ?? DEFAULT_HASH_OPTIONS.length,
    };
    this.idPrefix = options.idPrefix ?? 'REQ-';
  }

  // ── Node operations ────────────────────────────────────────────────

  renameNode(oldId: string, newId: string): Result<MutationEntry> {
    const node = this.graph.findById(oldId);
    if (!node) return notFound('Node', oldId);
    if (newId.trim() === '') return fail('invalid_argument', 'New id must not be empty', { oldId });
    if (this.graph.hasNode(newId)) return fail('already_exists', `Node already exists: ${newId}`, { id: newId });

    if (isKind(node, 'requirement')) {
      for (const assertion of assertionsOf(node)) {
        const cascadedId = `${newId}-${assertion.getField('label')}`;
        if (assertion.id === `${oldId}-${assertion.getField('label')}` && this.graph.hasNode(cascadedId)) {
          return fail('already_exists', `Node already exists: ${cascadedId}`, { id: cascadedId });
        }
      }
    }

    const cascaded = this.graph.rename(oldId, newId);
    return this.commit(
      { operation: 'rename_node', before: { id: oldId }, after: { id: newId, cascaded } },
      oldId,
      false
    );
  }

  updateTitle(id: string, title: string): Result<MutationEntry> {
    const req = this.requireRequirement(id);
    if (!req.ok) return req;

    const before = req.value.label;
    req.value.label = title;
    return this.commit(
      { operation: 'update_title', before: { title: before }, after: { title } },
      id,
      false
    );
  }

  changeStatus(id: string, status: string): Result<MutationEntry> {
    const req = this.requireRequirement(id);
    if (!req.ok) return req;
    if (status.trim() === '') return fail('invalid_argument', 'Status must not be empty', { id });

    const before = req.value.getField('status');
    req.value.setField('status', status);
    return this.commit(
      { operation: 'change_status', before: { status: before }, after: { status } },
      id,
      false
    );
  }

  addRequirement(input: NewRequirement): Result<MutationEntry> {
    if (input.id.trim() === '') return fail('invalid_argument', 'Requirement id must not be empty');
    if (this.graph.hasNode(input.id)) {
      return fail('already_exists', `Node already exists: ${input.id}`, { id: input.id });
    }
    const edgeKind = input.edgeKind ?? 'implements';
    if (input.parentId !== undefined) {
      const parent = this.requireRequirement(input.parentId);
      if (!parent.ok) return parent;
    }

    const level = input.level ?? 'PRD';
    const status = input.status ?? 'Active';
    this.graph.addNode({
      id: input.id,
      kind: 'requirement',
      label: input.title,
      content: {
        level,
        status,
        hash: computeRequirementHash('', [], this.hash),
        bodyText: '',
        keywords: [],
      },
    });
    if (input.parentId !== undefined) {
      this.graph.link(input.parentId, input.id, edgeKind);
    }
    this.graph.recomputeRoots();

    return this.commit(
      {
        operation: 'add_requirement',
        before: null,
        after: {
          id: input.id,
          title: input.title,
          level,
          status,
          ...(input.parentId !== undefined ? { parentId: input.parentId, edgeKind } : {}),
        },
      },
      input.id,
      true
    );
  }

  /**
   * Remove a requirement. Its assertions are deleted with it; every other
   * child is only unlinked and may become an orphan.
   */
  deleteRequirement(id: string): Result<MutationEntry> {
    const req = this.requireRequirement(id);
    if (!req.ok) return req;

    const node = req.value;
    const children = node.children().filter((child) => child.kind !== 'assertion');
    const removedAssertions: NodeSnapshot[] = [];
    const edges: EdgeSnapshot[] = [];

    for (const assertion of assertionsOf(node)) {
      removedAssertions.push(this.snapshot(assertion));
      const removed = this.graph.removeNode(assertion.id);
      if (removed) {
        edges.push(...removed.edges);
        this.graph.retainDeleted(removed.node);
      }
    }

    const snapshot = this.snapshot(node);
    const removed = this.graph.removeNode(id);
    if (removed) {
      edges.push(...removed.edges);
      this.graph.retainDeleted(removed.node);
    }

    const broken: IndexedBrokenReference[] = [];
    const refs = this.graph.brokenReferences();
    for (let index = refs.length - 1; index >= 0; index--) {
      if (refs[index].sourceId !== id) continue;
      const reference = this.graph.removeBrokenReferenceAt(index);
      if (reference) broken.unshift({ reference, index });
    }

    this.graph.recomputeRoots();
    const orphanIds = new Set(this.graph.orphans().map((orphan) => orphan.id));
    const orphaned = children.map((child) => child.id).filter((childId) => orphanIds.has(childId));

    return this.commit(
      {
        operation: 'delete_requirement',
        before: { node: snapshot, assertions: removedAssertions, edges, broken },
        after: { orphaned },
      },
      id,
      true
    );
  }

  // ── Assertion operations ───────────────────────────────────────────

  addAssertion(requirementId: string, label: string, text: string): Result<MutationEntry> {
    const req = this.requireRequirement(requirementId);
    if (!req.ok) return req;
    if (label.trim() === '') return fail('invalid_argument', 'Assertion label must not be empty');

    const assertionId = `${requirementId}-${label}`;
    if (assertionsOf(req.value).some((a) => a.getField('label') === label) || this.graph.hasNode(assertionId)) {
      return fail('already_exists', `Assertion already exists: ${assertionId}`, { id: assertionId });
    }

    const before = req.value.getField('hash');
    this.graph.addNode({
      id: assertionId,
      kind: 'assertion',
      label: text,
      content: { label, text },
    });
    this.graph.link(requirementId, assertionId, 'contains');
    const hash = this.rehash(req.value);

    return this.commit(
      {
        operation: 'add_assertion',
        before: { hash: before },
        after: { assertionId, label, text, hash },
      },
      requirementId,
      true
    );
  }

  updateAssertion(assertionId: string, text: string): Result<MutationEntry> {
    const found = this.requireAssertion(assertionId);
    if (!found.ok) return found;

    const { assertion, owner } = found.value;
    const before = { text: assertion.getField('text'), hash: owner.getField('hash') };
    assertion.setField('text', text);
    assertion.label = text;
    const hash = this.rehash(owner);

    return this.commit(
      { operation: 'update_assertion', before, after: { text, hash } },
      assertionId,
      true
    );
  }

  /**
   * Delete an assertion. Its label is dropped from every edge targeting
   * it; an edge left with no targets is removed and recorded as a broken
   * reference to `deletedAssertionTarget(assertionId)`. With `compact`
   * (the default), each later sibling takes its predecessor's label and
   * edge targets follow.
   */
  deleteAssertion(assertionId: string, options: DeleteAssertionOptions = {}): Result<MutationEntry> {
    const found = this.requireAssertion(assertionId);
    if (!found.ok) return found;

    const { assertion, owner } = found.value;
    const compact = options.compact ?? true;
    const siblings = assertionsOf(owner);
    const labels = siblings.map((sibling) => sibling.getField('label'));
    const position = siblings.indexOf(assertion);
    const label = assertion.getField('label');

    const before = {
      node: this.snapshot(assertion),
      requirementId: owner.id,
      targets: this.graph.edgesFrom(owner.id).map((edge) => ({
        childId: edge.childId,
        kind: edge.kind,
        assertionTargets: [...edge.assertionTargets],
      })),
      hash: owner.getField('hash'),
    };

    const removedEdges: EdgeSnapshot[] = [];
    const removed = this.graph.removeNode(assertionId);
    if (removed) {
      removedEdges.push(...removed.edges);
      this.graph.retainDeleted(removed.node);
    }

    const brokenAdded: BrokenReference[] = [];
    for (const edge of [...this.graph.edgesFrom(owner.id)]) {
      if (!edge.assertionTargets.includes(label)) continue;
      edge.assertionTargets = edge.assertionTargets.filter((target) => target !== label);
      if (edge.assertionTargets.length > 0) continue;

      const snapshot = this.graph.unlink(edge);
      if (snapshot) {
        snapshot.assertionTargets = [label];
        removedEdges.push(snapshot);
      }
      const reference = {
        sourceId: edge.childId,
        targetId: deletedAssertionTarget(assertionId),
        edgeKind: edge.kind,
      };
      this.graph.addBrokenReference(reference);
      brokenAdded.push(reference);
    }

    const renames: LabelRename[] = [];
    if (compact) {
      for (let i = position + 1; i < siblings.length; i++) {
        const sibling = siblings[i];
        const fromLabel = labels[i];
        const toLabel = labels[i - 1];
        const fromId = sibling.id;
        const toId = fromId === `${owner.id}-${fromLabel}` ? `${owner.id}-${toLabel}` : fromId;
        this.graph.rekey(fromId, toId);
        sibling.setField('label', toLabel);
        renames.push({ fromLabel, toLabel, fromId, toId });
      }
      const shift = new Map(renames.map((r) => [r.fromLabel, r.toLabel]));
      this.remapTargets(owner.id, shift);
    }

    const hash = this.rehash(owner);
    this.graph.recomputeRoots();
    debug('mutation', 'Assertion deleted', { assertionId, compact, renames: renames.length });

    return this.commit(
      {
        operation: 'delete_assertion',
        before,
        after: { compacted: compact, renames, removedEdges, brokenAdded, hash },
      },
      assertionId,
      true
    );
  }

  renameAssertion(assertionId: string, newLabel: string): Result<MutationEntry> {
    const found = this.requireAssertion(assertionId);
    if (!found.ok) return found;
    if (newLabel.trim() === '') return fail('invalid_argument', 'Assertion label must not be empty');

    const { assertion, owner } = found.value;
    const oldLabel = assertion.getField('label');
    const newId = assertionId === `${owner.id}-${oldLabel}` ? `${owner.id}-${newLabel}` : assertionId;
    if (
      assertionsOf(owner).some((a) => a !== assertion && a.getField('label') === newLabel) ||
      (newId !== assertionId && this.graph.hasNode(newId))
    ) {
      return fail('already_exists', `Assertion already exists: ${owner.id}-${newLabel}`, {
        id: newId,
      });
    }

    const before = { id: assertionId, label: oldLabel, hash: owner.getField('hash') };
    this.graph.rekey(assertionId, newId);
    assertion.setField('label', newLabel);
    this.remapTargets(owner.id, new Map([[oldLabel, newLabel]]));
    const hash = this.rehash(owner);

    return this.commit(
      { operation: 'rename_assertion', before, after: { id: newId, label: newLabel, hash } },
      assertionId,
      true
    );
  }

  // ── Edge operations ────────────────────────────────────────────────

  /**
   * Link `childId` under `parentId`. A parent naming an assertion lands on
   * its requirement with that label targeted. An unknown parent is
   * recorded as a broken reference. Kind pairs the relationship rules do
   * not allow are accepted here and reported by `validateGraph`.
   */
  addEdge(
    childId: string,
    parentId: string,
    kind: EdgeKind,
    assertionTargets: string[] = []
  ): Result<MutationEntry> {
    if (!this.graph.hasNode(childId)) return notFound('Node', childId);
    const kindCheck = checkReferenceKind(kind);
    if (kindCheck) return kindCheck;

    const target = this.resolve(parentId);
    if (!target) {
      if (this.graph.findBrokenReference(childId, parentId) !== -1) {
        return fail('already_exists', `Broken reference already recorded: ${childId} -> ${parentId}`, {
          childId,
          parentId,
        });
      }
      this.graph.addBrokenReference({ sourceId: childId, targetId: parentId, edgeKind: kind });
      return this.commit(
        {
          operation: 'add_edge',
          before: { link: null },
          after: { childId, parentId, kind, assertionTargets: [...assertionTargets], broken: true },
        },
        childId,
        false
      );
    }

    const labels = unique([...target.labels, ...assertionTargets]);
    const planned = this.planLink(childId, target.node, kind, labels);
    if (!planned.ok) return planned;
    if (planned.value === 'none') {
      return fail('already_exists', `Edge already exists: ${childId} ${kind} ${target.node.id}`, {
        childId,
        parentId: target.node.id,
        kind,
      });
    }

    const link = this.applyLink(childId, target.node.id, kind, labels);
    this.graph.recomputeRoots();
    return this.commit(
      {
        operation: 'add_edge',
        before: { link },
        after: { childId, parentId: target.node.id, kind, assertionTargets: labels, broken: false },
      },
      childId,
      false
    );
  }

  /** Same relationship policy as `addEdge`. */
  changeEdgeKind(childId: string, parentId: string, newKind: EdgeKind): Result<MutationEntry> {
    const kindCheck = checkReferenceKind(newKind);
    if (kindCheck) return kindCheck;
    const found = this.referenceEdges(childId, parentId);
    if (!found.ok) return found;

    const [edge] = found.value;
    if (found.value.some((candidate) => candidate.kind === newKind)) {
      return fail('already_exists', `Edge already exists: ${childId} ${newKind} ${edge.parentId}`, {
        childId,
        parentId: edge.parentId,
        kind: newKind,
      });
    }
    const before = edge.kind;
    edge.kind = newKind;
    return this.commit(
      {
        operation: 'change_edge_kind',
        before: { kind: before },
        after: {
          kind: newKind,
          childId,
          parentId: edge.parentId,
          assertionTargets: [...edge.assertionTargets],
        },
      },
      childId,
      false
    );
  }

  /**
   * Remove every reference edge between the pair.
   */
  deleteEdge(childId: string, parentId: string): Result<MutationEntry> {
    const found = this.referenceEdges(childId, parentId);
    if (!found.ok) return found;

    const edges: EdgeSnapshot[] = [];
    for (const edge of found.value) {
      const snapshot = this.graph.unlink(edge);
      if (snapshot) edges.push(snapshot);
    }
    this.graph.recomputeRoots();
    const becameOrphan = this.graph.orphans().some((node) => node.id === childId);

    return this.commit(
      { operation: 'delete_edge', before: { edges }, after: { becameOrphan } },
      childId,
      false
    );
  }

  /**
   * Point a broken reference at a new target. If the new target resolves
   * the reference becomes an edge; otherwise it stays broken under the
   * new target id.
   */
  fixBrokenReference(sourceId: string, oldTargetId: string, newTargetId: string): Result<MutationEntry> {
    const index = this.graph.findBrokenReference(sourceId, oldTargetId);
    if (index === -1) {
      return fail('not_found', `Broken reference not found: ${sourceId} -> ${oldTargetId}`, {
        sourceId,
        targetId: oldTargetId,
      });
    }
    if (!this.graph.hasNode(sourceId)) return notFound('Node', sourceId);

    const reference = { ...this.graph.brokenReferences()[index] };
    const target = this.resolve(newTargetId);

    if (!target) {
      this.graph.removeBrokenReferenceAt(index);
      this.graph.addBrokenReference({ ...reference, targetId: newTargetId }, index);
      return this.commit(
        {
          operation: 'fix_broken_reference',
          before: { reference, index, link: null },
          after: { newTargetId, fixed: false, stillBroken: true },
        },
        sourceId,
        false
      );
    }

    const planned = this.planLink(sourceId, target.node, reference.edgeKind, target.labels);
    if (!planned.ok) return planned;

    this.graph.removeBrokenReferenceAt(index);
    const link = this.applyLink(sourceId, target.node.id, reference.edgeKind, target.labels);
    this.graph.recomputeRoots();
    const edge: Edge = {
      parentId: target.node.id,
      childId: sourceId,
      kind: reference.edgeKind,
      assertionTargets: [...target.labels],
    };
    return this.commit(
      {
        operation: 'fix_broken_reference',
        before: { reference, index, link },
        after: { newTargetId, fixed: true, stillBroken: false, edge },
      },
      sourceId,
      false
    );
  }

  // ── History ────────────────────────────────────────────────────────

  /** Most recent entries, newest first. */
  mutationHistory(limit?: number): LoggedEntry[] {
    const entries = Array.from(this.graph.mutationLog.iterEntries()).reverse();
    return limit === undefined ? entries : entries.slice(0, Math.max(0, limit));
  }

  entriesSince(id: string): Result<LoggedEntry[]> {
    const entries = this.graph.mutationLog.entriesSince(id);
    return entries ? ok(entries) : notFound('Mutation', id);
  }

  undoLast(): Result<LoggedEntry> {
    return undoLast(this.graph);
  }

  undoTo(id: string): Result<LoggedEntry[]> {
    return undoTo(this.graph, id);
  }

  // ── Internals ──────────────────────────────────────────────────────

  private commit(record: MutationRecord, targetId: string, affectsHash: boolean): Result<MutationEntry> {
    const entry: MutationEntry = {
      ...record,
      id: randomUUID(),
      targetId,
      affectsHash,
      timestamp: new Date().toISOString(),
    };
    this.graph.mutationLog.append(entry);
    debug('mutation', `Applied ${entry.operation}`, { id: entry.id, targetId });
    return ok(entry);
  }

  private requireRequirement(id: string): Result<GraphNode<'requirement'>> {
    const node = this.graph.findById(id);
    if (!node) return notFound('Requirement', id);
    if (!isKind(node, 'requirement')) {
      return fail('invalid_state', `${id} is a ${node.kind}, not a requirement`, { id, kind: node.kind });
    }
    return ok(node);
  }

  private requireAssertion(
    id: string
  ): Result<{ assertion: GraphNode<'assertion'>; owner: GraphNode<'requirement'> }> {
    const node = this.graph.findById(id);
    if (!node) return notFound('Assertion', id);
    if (!isKind(node, 'assertion')) {
      return fail('invalid_state', `${id} is a ${node.kind}, not an assertion`, { id, kind: node.kind });
    }
    const owner = node.parents().find((parent): parent is GraphNode<'requirement'> => isKind(parent, 'requirement'));
    if (!owner) return fail('invalid_state', `Assertion ${id} has no requirement`, { id });
    return ok({ assertion: node, owner });
  }

  private resolve(id: string): ResolvedTarget | undefined {
    const node = this.graph.findById(id) ?? this.graph.findById(this.idPrefix + id);
    return node ? redirectToOwner(node) : undefined;
  }

  /**
   * Non-structural edges between a child and a parent (an assertion
   * parent means its requirement).
   */
  private referenceEdges(childId: string, parentId: string): Result<Edge[]> {
    if (!this.graph.hasNode(childId)) return notFound('Node', childId);
    const target = this.resolve(parentId);
    if (!target) return notFound('Node', parentId);
    const edges = this.graph
      .edgesBetween(target.node.id, childId)
      .filter((edge) => edge.kind !== 'contains');
    if (edges.length === 0) {
      return fail('not_found', `No edge from ${childId} to ${parentId}`, { childId, parentId });
    }
    return ok(edges);
  }

  /**
   * Check a link before applying it: what it would change, or why not.
   */
  private planLink(
    childId: string,
    parent: GraphNode,
    kind: EdgeKind,
    labels: string[]
  ): Result<LinkChange['kind']> {
    if (childId === parent.id) {
      return fail('invalid_argument', `A node cannot link to itself: ${childId}`, { id: childId });
    }
    if (labels.length > 0) {
      if (!isKind(parent, 'requirement')) {
        return fail('invalid_argument', `Assertion targets need a requirement parent, got ${parent.kind}`, {
          parentId: parent.id,
        });
      }
      const known = new Set(assertionsOf(parent).map((a) => a.getField('label')));
      const missing = labels.find((label) => !known.has(label));
      if (missing !== undefined) return notFound('Assertion', `${parent.id}-${missing}`);
    }

    const existing = this.findLinked(parent.id, childId, kind, labels.length > 0);
    if (!existing) return ok('created');
    return labels.every((label) => existing.assertionTargets.includes(label)) ? ok('none') : ok('merged');
  }

  private applyLink(childId: string, parentId: string, kind: EdgeKind, labels: string[]): LinkChange {
    const existing = this.findLinked(parentId, childId, kind, labels.length > 0);
    const change: LinkChange = !existing
      ? { kind: 'created' }
      : labels.every((label) => existing.assertionTargets.includes(label))
        ? { kind: 'none' }
        : { kind: 'merged', previousTargets: [...existing.assertionTargets] };
    this.graph.link(parentId, childId, kind, labels);
    return change;
  }

  private findLinked(parentId: string, childId: string, kind: EdgeKind, targeted: boolean): Edge | undefined {
    return this.graph.findLinked(parentId, childId, kind, targeted);
  }

  private remapTargets(requirementId: string, mapping: Map<string, string>): void {
    for (const edge of this.graph.edgesFrom(requirementId)) {
      edge.assertionTargets = edge.assertionTargets.map((label) => mapping.get(label) ?? label);
    }
  }

  private rehash(requirement: GraphNode<'requirement'>): string {
    const hash = computeRequirementHash(
      requirement.getField('bodyText'),
      assertionsOf(requirement).map((a) => ({ label: a.getField('label'), text: a.getField('text') })),
      this.hash
    );
    requirement.setField('hash', hash);
    return hash;
  }

  private snapshot(node: GraphNode): NodeSnapshot {
    return {
      id: node.id,
      kind: node.kind,
      label: node.label,
      content: structuredClone(node.content),
      source: node.source ? { ...node.source } : undefined,
      metrics: node.metricEntries(),
      position: this.graph.positionOf(node.id),
    };
  }
}

/**
 * Target recorded for a reference left dangling by a deleted assertion.
 * Compaction hands the deleted id to the next sibling, so the reference
 * must name something no node can hold.
 */
export function deletedAssertionTarget(assertionId: string): string {
  return `${assertionId}~deleted`;
}

function checkReferenceKind(kind: EdgeKind): Result<never> | undefined {
  if (!EDGE_KINDS.includes(kind) || kind === 'contains') {
    return fail('invalid_argument', `Unsupported edge kind: ${kind}`, { kind });
  }
  return undefined;
}

function unique(values: string[]): string[] {
  return Array.from(new Set(values));
}
