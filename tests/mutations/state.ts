/**
 * Graph fixture and state capture shared by the mutation tests.
 */

import type { TraceGraph } from '../../src/graph/graph.js';
import { assertions, build, codeRef, requirement, testRef } from '../fixtures.js';

/**
 * REQ-p1 [A, B, C, D]
 *   REQ-d1 implements C, and src/app.ts:5 implements REQ-d1
 *   test-t validates B
 *   REQ-d2 implements B and D, plus a broken reference to REQ-gone
 */
export function mutationFixture(): TraceGraph {
  return build(
    requirement('REQ-p1', { assertions: assertions('A', 'B', 'C', 'D') }),
    requirement('REQ-d1', { level: 'DEV', implements: ['REQ-p1-C'] }),
    testRef('test-t', ['REQ-p1-B']),
    requirement('REQ-d2', { level: 'DEV', implements: ['REQ-p1-B-D', 'REQ-gone'] }),
    codeRef('src/app.ts', 5, ['REQ-d1'])
  );
}

/**
 * Everything undo must put back, in order.
 */
export function captureState(graph: TraceGraph) {
  return {
    nodes: graph.nodeIds().map((id) => {
      const node = graph.findById(id);
      return {
        id,
        kind: node?.kind,
        label: node?.label,
        content: structuredClone(node?.content),
        metrics: node?.metricEntries(),
      };
    }),
    edges: Array.from(graph.allEdges()).map((edge) => ({
      ...edge,
      assertionTargets: [...edge.assertionTargets],
    })),
    broken: graph.brokenReferences().map((ref) => ({ ...ref })),
    roots: Array.from(graph.iterRoots()).map((node) => node.id),
    orphans: graph.orphans().map((node) => node.id),
    deleted: graph.deletedNodes().map((node) => node.id),
  };
}
