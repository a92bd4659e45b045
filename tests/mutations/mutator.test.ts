/**
 * Tests for graph mutations.
 */

import { describe, it, expect } from 'vitest';
import { computeRequirementHash } from '../../src/core/hash.js';
import { assertionsOf } from '../../src/graph/node.js';
import { validateGraph } from '../../src/graph/validate.js';
import { GraphMutator } from '../../src/mutations/mutator.js';
import { assertions, build, expectFailure, expectOk, requirement } from '../fixtures.js';
import { mutationFixture } from './state.js';

function setup() {
  const graph = mutationFixture();
  return { graph, mutator: new GraphMutator(graph) };
}

function assertionIds(graph: ReturnType<typeof mutationFixture>, id = 'REQ-p1'): string[] {
  const req = graph.findById(id);
  return req ? assertionsOf(req).map((a) => a.id) : [];
}

describe('GraphMutator node operations', () => {
  it('should rename a requirement and its assertions', () => {
    const { graph, mutator } = setup();
    const entry = expectOk(mutator.renameNode('REQ-p1', 'REQ-p9'));

    expect(entry.operation).toBe('rename_node');
    expect(entry.targetId).toBe('REQ-p1');
    expect(assertionIds(graph, 'REQ-p9')).toEqual(['REQ-p9-A', 'REQ-p9-B', 'REQ-p9-C', 'REQ-p9-D']);
    expect(graph.findEdge('REQ-p9', 'REQ-d1')?.assertionTargets).toEqual(['C']);
    expect(graph.hasNode('REQ-p1')).toBe(false);
  });

  it('should refuse a rename onto an existing id', () => {
    const { graph, mutator } = setup();
    expect(expectFailure(mutator.renameNode('REQ-d1', 'REQ-p1')).kind).toBe('already_exists');
    expect(expectFailure(mutator.renameNode('REQ-none', 'REQ-x')).kind).toBe('not_found');
    expect(graph.mutationLog.size).toBe(0);
  });

  it('should refuse a rename whose assertion cascade collides', () => {
    const graph = build(requirement('REQ-x', { assertions: assertions('A') }), requirement('REQ-y-A'));
    const failure = expectFailure(new GraphMutator(graph).renameNode('REQ-x', 'REQ-y'));
    expect(failure).toEqual({
      kind: 'already_exists',
      message: 'Node already exists: REQ-y-A',
      context: { id: 'REQ-y-A' },
    });
    expect(graph.hasNode('REQ-x-A')).toBe(true);
  });

  it('should update the title and status of a requirement', () => {
    const { graph, mutator } = setup();
    expectOk(mutator.updateTitle('REQ-p1', 'Renamed'));
    expectOk(mutator.changeStatus('REQ-p1', 'Deprecated'));

    expect(graph.findById('REQ-p1')?.label).toBe('Renamed');
    expect(graph.findById('REQ-p1')?.content).toHaveProperty('status', 'Deprecated');
    expect(expectFailure(mutator.changeStatus('REQ-p1', ' ')).kind).toBe('invalid_argument');
    expect(expectFailure(mutator.updateTitle('REQ-p1-A', 'x')).kind).toBe('invalid_state');
  });

  it('should add a requirement under a parent', () => {
    const { graph, mutator } = setup();
    const entry = expectOk(mutator.addRequirement({ id: 'REQ-n1', title: 'New one', parentId: 'REQ-p1' }));

    expect(entry.after).toEqual({
      id: 'REQ-n1',
      title: 'New one',
      level: 'PRD',
      status: 'Active',
      parentId: 'REQ-p1',
      edgeKind: 'implements',
    });
    expect(entry.affectsHash).toBe(true);
    expect(graph.findEdge('REQ-p1', 'REQ-n1')?.kind).toBe('implements');
    expect(graph.findById('REQ-n1')?.content).toHaveProperty('hash', 'e3b0c442');
    expect(graph.hasRoot('REQ-n1')).toBe(false);
  });

  it('should make a parentless new requirement a root', () => {
    const { graph, mutator } = setup();
    expectOk(mutator.addRequirement({ id: 'REQ-n1', title: 'Standalone' }));
    expect(graph.hasRoot('REQ-n1')).toBe(true);
    expect(expectFailure(mutator.addRequirement({ id: 'REQ-n1', title: 'Again' })).kind).toBe('already_exists');
    expect(
      expectFailure(mutator.addRequirement({ id: 'REQ-n2', title: 'Bad parent', parentId: 'test-t' })).kind
    ).toBe('invalid_state');
  });

  it('should delete a requirement with its assertions and report orphans', () => {
    const { graph, mutator } = setup();
    const entry = expectOk(mutator.deleteRequirement('REQ-p1'));

    expect(entry.operation === 'delete_requirement' && entry.after.orphaned).toEqual(['test-t']);
    expect(graph.deletedNodes().map((node) => node.id)).toEqual([
      'REQ-p1-A',
      'REQ-p1-B',
      'REQ-p1-C',
      'REQ-p1-D',
      'REQ-p1',
    ]);
    expect(graph.hasRoot('REQ-d1')).toBe(true);
    expect(graph.hasRoot('REQ-d2')).toBe(true);
  });

  it('should drop broken references declared by a deleted requirement', () => {
    const { graph, mutator } = setup();
    expectOk(mutator.deleteRequirement('REQ-d2'));
    expect(graph.brokenReferences()).toEqual([]);
  });
});

describe('GraphMutator assertion operations', () => {
  it('should add an assertion and rehash', () => {
    const { graph, mutator } = setup();
    const entry = expectOk(mutator.addAssertion('REQ-p1', 'E', 'The system shall do E.'));

    expect(assertionIds(graph)).toEqual(['REQ-p1-A', 'REQ-p1-B', 'REQ-p1-C', 'REQ-p1-D', 'REQ-p1-E']);
    expect(entry.operation === 'add_assertion' && entry.after.hash).toBe(
      computeRequirementHash('', assertions('A', 'B', 'C', 'D', 'E'))
    );
    expect(expectFailure(mutator.addAssertion('REQ-p1', 'E', 'Again')).kind).toBe('already_exists');
  });

  it('should update assertion text and rehash', () => {
    const { graph, mutator } = setup();
    expectOk(mutator.updateAssertion('REQ-p1-A', 'Changed text.'));

    expect(graph.findById('REQ-p1-A')?.label).toBe('Changed text.');
    expect(graph.findById('REQ-p1')?.content).toHaveProperty(
      'hash',
      computeRequirementHash('', [{ label: 'A', text: 'Changed text.' }, ...assertions('B', 'C', 'D')])
    );
    expect(expectFailure(mutator.updateAssertion('REQ-p1', 'x')).kind).toBe('invalid_state');
  });

  it('should compact labels after deleting an assertion', () => {
    const { graph, mutator } = setup();
    const entry = expectOk(mutator.deleteAssertion('REQ-p1-B'));

    expect(assertionIds(graph)).toEqual(['REQ-p1-A', 'REQ-p1-B', 'REQ-p1-C']);
    const req = graph.findById('REQ-p1');
    expect(req ? assertionsOf(req).map((a) => a.getField('text')) : []).toEqual([
      'The system shall do A.',
      'The system shall do C.',
      'The system shall do D.',
    ]);
    // REQ-d1 referenced old C, which is now B.
    expect(graph.findEdge('REQ-p1', 'REQ-d1')?.assertionTargets).toEqual(['B']);
    expect(graph.findEdge('REQ-p1', 'REQ-d2')?.assertionTargets).toEqual(['C']);
    expect(graph.findEdge('REQ-p1', 'test-t')).toBeUndefined();
    expect(graph.brokenReferences()).toEqual([
      { sourceId: 'REQ-d2', targetId: 'REQ-gone', edgeKind: 'implements' },
      { sourceId: 'test-t', targetId: 'REQ-p1-B~deleted', edgeKind: 'validates' },
    ]);
    expect(graph.orphans().map((node) => node.id)).toEqual(['test-t']);
    expect(entry.operation === 'delete_assertion' && entry.after.renames).toEqual([
      { fromLabel: 'C', toLabel: 'B', fromId: 'REQ-p1-C', toId: 'REQ-p1-B' },
      { fromLabel: 'D', toLabel: 'C', fromId: 'REQ-p1-D', toId: 'REQ-p1-C' },
    ]);
    expect(graph.findById('REQ-p1')?.content).toHaveProperty(
      'hash',
      computeRequirementHash('', [
        { label: 'A', text: 'The system shall do A.' },
        { label: 'B', text: 'The system shall do C.' },
        { label: 'C', text: 'The system shall do D.' },
      ])
    );
  });

  it('should keep the dangling reference off the id a shifted sibling now holds', () => {
    const { graph, mutator } = setup();
    expectOk(mutator.deleteAssertion('REQ-p1-B'));

    expect(graph.findById('REQ-p1-B')?.label).toBe('The system shall do C.');
    expect(graph.findById('REQ-p1-B~deleted')).toBeUndefined();
    expect(graph.edgesTo('test-t')).toEqual([]);

    expectOk(mutator.fixBrokenReference('test-t', 'REQ-p1-B~deleted', 'REQ-p1-A'));
    expect(graph.findEdge('REQ-p1', 'test-t')?.assertionTargets).toEqual(['A']);
    expect(graph.brokenReferences()).toEqual([
      { sourceId: 'REQ-d2', targetId: 'REQ-gone', edgeKind: 'implements' },
    ]);
  });

  it('should leave later labels alone without compaction', () => {
    const { graph, mutator } = setup();
    expectOk(mutator.deleteAssertion('REQ-p1-B', { compact: false }));

    expect(assertionIds(graph)).toEqual(['REQ-p1-A', 'REQ-p1-C', 'REQ-p1-D']);
    expect(graph.findEdge('REQ-p1', 'REQ-d1')?.assertionTargets).toEqual(['C']);
    expect(graph.findEdge('REQ-p1', 'REQ-d2')?.assertionTargets).toEqual(['D']);
  });

  it('should rename an assertion label and follow it on edges', () => {
    const { graph, mutator } = setup();
    expectOk(mutator.renameAssertion('REQ-p1-C', 'X'));

    expect(assertionIds(graph)).toEqual(['REQ-p1-A', 'REQ-p1-B', 'REQ-p1-X', 'REQ-p1-D']);
    expect(graph.findEdge('REQ-p1', 'REQ-d1')?.assertionTargets).toEqual(['X']);
    expect(expectFailure(mutator.renameAssertion('REQ-p1-X', 'A')).kind).toBe('already_exists');
  });
});

describe('GraphMutator edge operations', () => {
  it('should add a new edge', () => {
    const { graph, mutator } = setup();
    const entry = expectOk(mutator.addEdge('REQ-d1', 'REQ-d2', 'refines'));

    expect(entry.after).toEqual({
      childId: 'REQ-d1',
      parentId: 'REQ-d2',
      kind: 'refines',
      assertionTargets: [],
      broken: false,
    });
    expect(graph.findEdge('REQ-d2', 'REQ-d1')?.kind).toBe('refines');
  });

  it('should merge assertion targets into an existing edge', () => {
    const { graph, mutator } = setup();
    expectOk(mutator.addEdge('test-t', 'REQ-p1-A', 'validates'));
    expect(graph.edgesBetween('REQ-p1', 'test-t').map((edge) => edge.assertionTargets)).toEqual([['B', 'A']]);
  });

  it('should reject edges that are invalid or already present', () => {
    const { graph, mutator } = setup();
    expect(expectFailure(mutator.addEdge('test-t', 'REQ-p1-B', 'validates')).kind).toBe('already_exists');
    expect(expectFailure(mutator.addEdge('REQ-d1', 'REQ-p1', 'contains')).kind).toBe('invalid_argument');
    expect(expectFailure(mutator.addEdge('REQ-d1', 'REQ-d1', 'refines')).kind).toBe('invalid_argument');
    expect(expectFailure(mutator.addEdge('test-t', 'REQ-p1', 'validates', ['Z'])).message).toBe(
      'Assertion not found: REQ-p1-Z'
    );
    expect(expectFailure(mutator.addEdge('test-t', 'code:src/app.ts:5', 'validates', ['A'])).kind).toBe(
      'invalid_argument'
    );
    expect(expectFailure(mutator.addEdge('REQ-none', 'REQ-p1', 'implements')).kind).toBe('not_found');
    expect(graph.mutationLog.size).toBe(0);
  });

  it('should record an edge to an unknown target as broken', () => {
    const { graph, mutator } = setup();
    expectOk(mutator.addEdge('REQ-d1', 'REQ-nowhere', 'implements'));

    expect(graph.brokenReferences()[1]).toEqual({
      sourceId: 'REQ-d1',
      targetId: 'REQ-nowhere',
      edgeKind: 'implements',
    });
    expect(expectFailure(mutator.addEdge('REQ-d1', 'REQ-nowhere', 'implements')).kind).toBe('already_exists');
  });

  it('should change an edge kind in place', () => {
    const { graph, mutator } = setup();
    expectOk(mutator.changeEdgeKind('REQ-d1', 'REQ-p1', 'refines'));

    expect(graph.edgesBetween('REQ-p1', 'REQ-d1')).toEqual([
      { parentId: 'REQ-p1', childId: 'REQ-d1', kind: 'refines', assertionTargets: ['C'] },
    ]);
    expect(expectFailure(mutator.changeEdgeKind('REQ-d1', 'REQ-d2', 'refines')).kind).toBe('not_found');
    expect(expectFailure(mutator.changeEdgeKind('REQ-d1', 'REQ-p1', 'refines')).kind).toBe('already_exists');
  });

  it('should accept a kind pair the rules disallow and report it as a warning', () => {
    const { graph, mutator } = setup();
    expectOk(mutator.addEdge('test-t', 'REQ-d1', 'implements'));
    expectOk(mutator.changeEdgeKind('test-t', 'REQ-p1', 'refines'));

    expect(graph.findEdge('REQ-d1', 'test-t')?.kind).toBe('implements');
    expect(graph.findEdge('REQ-p1', 'test-t')?.kind).toBe('refines');
    const report = validateGraph(graph);
    expect(report.valid).toBe(true);
    expect(
      report.warnings
        .filter((issue) => issue.type === 'relationship_mismatch')
        .map((issue) => issue.message)
    ).toEqual([
      'test test-t cannot refines requirement REQ-p1',
      'test test-t cannot implements requirement REQ-d1',
    ]);
  });

  it('should delete an edge and report a new orphan', () => {
    const { graph, mutator } = setup();
    const entry = expectOk(mutator.deleteEdge('test-t', 'REQ-p1'));

    expect(entry.after).toEqual({ becameOrphan: true });
    expect(graph.edgesTo('test-t')).toEqual([]);
  });

  it('should turn a fixed broken reference into an edge', () => {
    const { graph, mutator } = setup();
    const entry = expectOk(mutator.fixBrokenReference('REQ-d2', 'REQ-gone', 'REQ-d1'));

    expect(entry.after).toEqual({
      newTargetId: 'REQ-d1',
      fixed: true,
      stillBroken: false,
      edge: { parentId: 'REQ-d1', childId: 'REQ-d2', kind: 'implements', assertionTargets: [] },
    });
    expect(graph.brokenReferences()).toEqual([]);
    expect(graph.findEdge('REQ-d1', 'REQ-d2')?.kind).toBe('implements');
  });

  it('should keep a reference broken when the new target is unknown too', () => {
    const { graph, mutator } = setup();
    expectOk(mutator.fixBrokenReference('REQ-d2', 'REQ-gone', 'REQ-other'));

    expect(graph.brokenReferences()).toEqual([
      { sourceId: 'REQ-d2', targetId: 'REQ-other', edgeKind: 'implements' },
    ]);
    expect(expectFailure(mutator.fixBrokenReference('REQ-d2', 'REQ-gone', 'REQ-d1')).kind).toBe('not_found');
  });
});

describe('GraphMutator history', () => {
  it('should list entries newest first and since a given entry', () => {
    const { mutator } = setup();
    const first = expectOk(mutator.updateTitle('REQ-p1', 'One'));
    expectOk(mutator.changeStatus('REQ-p1', 'Draft'));
    expectOk(mutator.updateTitle('REQ-p1', 'Two'));

    expect(mutator.mutationHistory().map((entry) => entry.operation)).toEqual([
      'update_title',
      'change_status',
      'update_title',
    ]);
    expect(mutator.mutationHistory(1)).toHaveLength(1);
    expect(expectOk(mutator.entriesSince(first.id)).map((entry) => entry.operation)).toEqual([
      'change_status',
      'update_title',
    ]);
    expect(expectFailure(mutator.entriesSince('missing')).kind).toBe('not_found');
  });
});
