/**
 * Coverage gaps: assertions nothing covers, and the tests behind each
 * assertion of one requirement.
 */

import { fail, notFound, ok, type Result } from '../core/errors.js';
import type { TestStatus } from '../core/types.js';
import type { TraceGraph } from '../graph/graph.js';
import { assertionsOf, isKind, type GraphNode } from '../graph/node.js';
import { contributesToCoverage } from '../graph/schema.js';
import { assertionInContext, type AssertionInContext } from '../graph/serialize.js';
import { percent } from './rollup.js';

export interface TestRun {
  id: string;
  status: TestStatus;
  duration?: number;
}

export interface AssertionTest {
  id: string;
  label: string;
  file?: string;
  line?: number;
  results: TestRun[];
}

export interface AssertionTests {
  assertionId: string;
  tests: AssertionTest[];
}

export interface AssertionTestMap {
  requirementId: string;
  /** Keyed by assertion label. */
  assertionTests: Record<string, AssertionTests>;
  totalAssertions: number;
  /** Assertions with at least one test, whole-requirement tests included. */
  coveredCount: number;
  coveragePct: number;
}

/**
 * Assertions without direct, explicit or inferred coverage, grouped by
 * parent requirement. Reads the contributions `annotateCoverage` leaves,
 * so run it first. With `requirementId`, only that requirement's.
 */
export function uncoveredAssertions(graph: TraceGraph, requirementId?: string): Result<AssertionInContext[]> {
  let candidates: GraphNode<'assertion'>[];
  if (requirementId === undefined) {
    candidates = Array.from(graph.nodesByKind('assertion'));
  } else {
    const req = requirementOf(graph, requirementId);
    if (!req.ok) return req;
    candidates = assertionsOf(req.value);
  }

  const uncovered = candidates
    .filter((assertion) => !assertion.contributions.some((c) => c.sourceType !== 'indirect'))
    .map(assertionInContext);
  return ok(uncovered.sort((a, b) => compareIds(a.parentId ?? '', b.parentId ?? '')));
}

/**
 * The tests validating each assertion of a requirement. A test linked
 * to the whole requirement appears under every assertion; one reached
 * through several edges appears once.
 */
export function assertionTestMap(graph: TraceGraph, requirementId: string): Result<AssertionTestMap> {
  const req = requirementOf(graph, requirementId);
  if (!req.ok) return req;

  const byLabel = new Map<string, { assertionId: string; tests: Map<string, AssertionTest> }>();
  for (const assertion of assertionsOf(req.value)) {
    byLabel.set(assertion.getField('label'), { assertionId: assertion.id, tests: new Map() });
  }

  for (const edge of graph.edgesFrom(requirementId)) {
    if (!contributesToCoverage(edge.kind)) continue;
    const test = graph.findById(edge.childId);
    if (!test || !isKind(test, 'test')) continue;

    const labels = edge.assertionTargets.length > 0 ? edge.assertionTargets : Array.from(byLabel.keys());
    for (const label of labels) {
      const bucket = byLabel.get(label);
      if (bucket && !bucket.tests.has(test.id)) bucket.tests.set(test.id, testEntry(test));
    }
  }

  const assertionTests: Record<string, AssertionTests> = {};
  let coveredCount = 0;
  for (const [label, { assertionId, tests }] of byLabel) {
    assertionTests[label] = { assertionId, tests: Array.from(tests.values()) };
    if (tests.size > 0) coveredCount++;
  }

  return ok({
    requirementId,
    assertionTests,
    totalAssertions: byLabel.size,
    coveredCount,
    coveragePct: percent(coveredCount, byLabel.size),
  });
}

function testEntry(test: GraphNode<'test'>): AssertionTest {
  const entry: AssertionTest = { id: test.id, label: test.label, results: [] };
  if (test.source) {
    entry.file = test.source.path;
    entry.line = test.source.line;
  }
  for (const child of test.children()) {
    if (!isKind(child, 'result')) continue;
    const run: TestRun = { id: child.id, status: child.getField('status') };
    const duration = child.getField('duration');
    if (duration !== undefined) run.duration = duration;
    entry.results.push(run);
  }
  return entry;
}

function requirementOf(graph: TraceGraph, id: string): Result<GraphNode<'requirement'>> {
  const node = graph.findById(id);
  if (!node) return notFound('Requirement', id);
  if (!isKind(node, 'requirement')) {
    return fail('invalid_state', `${id} is a ${node.kind}, not a requirement`, { id, kind: node.kind });
  }
  return ok(node);
}

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
