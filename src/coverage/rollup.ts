/**
 * Coverage rollup.
 *
 * Evidence that an assertion is satisfied comes from four sources:
 *
 * | Source   | Producer                              | Counts toward coveragePct |
 * |----------|---------------------------------------|---------------------------|
 * | direct   | test/code targeting the assertion     | yes                       |
 * | explicit | child requirement targeting it        | yes                       |
 * | inferred | child requirement targeting the whole | yes                       |
 * | indirect | test/code targeting the whole         | no (indirectCoveragePct)  |
 *
 * Explicit and inferred contributions carry the child's *own* coverage
 * ratio (its direct evidence only), never its rolled-up ratio.
 *
 * The per-source counters overlap: an assertion with direct and inferred
 * evidence counts once in each. `coveredAssertions` is their union and
 * `directTested` counts assertions with direct evidence from a test.
 */

import { fail, notFound, ok, type Result } from '../core/errors.js';
import type {
  CoverageContribution,
  CoverageSource,
  RollupMetrics,
  TestStatus,
} from '../core/types.js';
import type { TraceGraph } from '../graph/graph.js';
import { assertionsOf, isKind, type GraphNode } from '../graph/node.js';
import { contributesToCoverage } from '../graph/schema.js';
import { debug, debugTimed } from '../shared/debug.js';

export interface CoverageOptions {
  /** Roll child requirement assertion counts into the parent. */
  strictMode: boolean;
  /** Requirements with these statuses never contribute to a parent. */
  excludeStatus: string[];
}

export const DEFAULT_COVERAGE_OPTIONS: CoverageOptions = {
  strictMode: false,
  excludeStatus: ['Deprecated', 'Superseded', 'Draft'],
};

export type ImplementationStatus = 'Full' | 'Partial' | 'Unimplemented';

export interface AssertionCoverage {
  id: string;
  label: string;
  text: string;
  covered: boolean;
  contributions: CoverageContribution[];
}

export interface CoverageBreakdown {
  requirementId: string;
  ownCoverage: number;
  metrics: RollupMetrics;
  assertions: AssertionCoverage[];
}

export function emptyMetrics(): RollupMetrics {
  return {
    totalAssertions: 0,
    coveredAssertions: 0,
    directCovered: 0,
    explicitCovered: 0,
    inferredCovered: 0,
    indirectCovered: 0,
    coveredWithIndirect: 0,
    directTested: 0,
    totalTests: 0,
    passedTests: 0,
    failedTests: 0,
    skippedTests: 0,
    totalCodeRefs: 0,
    coveragePct: 0,
    indirectCoveragePct: 0,
    passRatePct: 0,
    validated: 0,
    validatedWithIndirect: 0,
    hasFailures: false,
  };
}

/**
 * Compute contributions and rollup metrics for every node. Running it
 * again on an unchanged graph yields identical results.
 */
export function annotateCoverage(
  graph: TraceGraph,
  options: CoverageOptions = DEFAULT_COVERAGE_OPTIONS
): void {
  debugTimed('coverage', 'Coverage annotated', () => new CoverageEngine(graph, options).run());
}

/**
 * A test's status from its results: any failure wins, then any pass,
 * then any skip.
 */
export function deriveTestStatus(test: GraphNode<'test'>): TestStatus {
  const statuses = test
    .children()
    .filter((child): child is GraphNode<'result'> => isKind(child, 'result'))
    .map((result) => result.getField('status'));
  if (statuses.some((s) => s === 'failed' || s === 'error')) return 'failed';
  if (statuses.includes('passed')) return 'passed';
  if (statuses.includes('skipped')) return 'skipped';
  return 'unknown';
}

export function implementationStatus(metrics: RollupMetrics): ImplementationStatus {
  if (metrics.totalAssertions > 0 && metrics.coveredAssertions >= metrics.totalAssertions) {
    return 'Full';
  }
  return metrics.coveredAssertions > 0 ? 'Partial' : 'Unimplemented';
}

/**
 * Per-assertion evidence for one requirement. Requires `annotateCoverage`
 * to have run.
 */
export function coverageBreakdown(graph: TraceGraph, requirementId: string): Result<CoverageBreakdown> {
  const node = graph.findById(requirementId);
  if (!node) return notFound('Requirement', requirementId);
  if (!isKind(node, 'requirement')) {
    return fail('invalid_state', `${requirementId} is a ${node.kind}, not a requirement`, {
      id: requirementId,
      kind: node.kind,
    });
  }

  const assertions = assertionsOf(node).map((assertion) => ({
    id: assertion.id,
    label: assertion.getField('label'),
    text: assertion.getField('text'),
    covered: assertion.contributions.some((c) => c.sourceType !== 'indirect'),
    contributions: assertion.contributions.map((c) => ({ ...c })),
  }));
  const ownCoverage = node.getMetric('own_coverage');

  return ok({
    requirementId,
    ownCoverage: typeof ownCoverage === 'number' ? ownCoverage : 0,
    metrics: { ...(node.rollup ?? emptyMetrics()) },
    assertions,
  });
}

class CoverageEngine {
  private readonly own = new Map<string, number>();
  private readonly statuses = new Map<string, TestStatus>();
  private readonly memo = new Map<string, RollupMetrics>();
  private readonly inProgress = new Set<string>();

  constructor(
    private readonly graph: TraceGraph,
    private readonly options: CoverageOptions
  ) {}

  run(): void {
    for (const node of this.graph.allNodes()) {
      node.rollup = undefined;
      node.contributions = [];
    }
    for (const test of this.graph.nodesByKind('test')) {
      this.statuses.set(test.id, deriveTestStatus(test));
    }

    const requirements = Array.from(this.graph.nodesByKind('requirement'));

    // Direct and indirect evidence first; own coverage depends on it.
    for (const req of requirements) {
      this.collectEvidence(req);
    }
    for (const req of requirements) {
      const assertions = assertionsOf(req);
      const covered = assertions.filter((a) => a.contributions.some((c) => c.sourceType === 'direct'));
      const ratio = assertions.length > 0 ? covered.length / assertions.length : 0;
      this.own.set(req.id, ratio);
      req.setMetric('own_coverage', ratio);
    }
    for (const req of requirements) {
      this.collectChildRequirements(req);
    }

    for (const req of requirements) {
      this.rollupRequirement(req);
    }
    debug('coverage', 'Rollup complete', { requirements: requirements.length });
  }

  private collectEvidence(req: GraphNode<'requirement'>): void {
    const byLabel = labelIndex(req);
    for (const edge of this.graph.edgesFrom(req.id)) {
      if (!contributesToCoverage(edge.kind)) continue;
      const child = this.graph.findById(edge.childId);
      if (!child || (child.kind !== 'test' && child.kind !== 'code')) continue;

      if (edge.assertionTargets.length > 0) {
        for (const label of edge.assertionTargets) {
          byLabel.get(label)?.contributions.push(contribution(child.id, 'direct', label, 1));
        }
      } else {
        for (const [label, assertion] of byLabel) {
          assertion.contributions.push(contribution(child.id, 'indirect', label, 1));
        }
      }
    }
  }

  /**
   * Explicit contributions for every targeting child, then inferred ones
   * for whole-requirement children, skipping labels that child already
   * covers explicitly.
   */
  private collectChildRequirements(req: GraphNode<'requirement'>): void {
    const byLabel = labelIndex(req);
    const childEdges = this.graph.edgesFrom(req.id).filter((edge) => {
      if (!contributesToCoverage(edge.kind)) return false;
      const child = this.graph.findById(edge.childId);
      return child !== undefined && isKind(child, 'requirement') && !this.isExcluded(child);
    });

    const explicitByChild = new Map<string, Set<string>>();
    for (const edge of childEdges) {
      if (edge.assertionTargets.length === 0) continue;
      const value = this.own.get(edge.childId) ?? 0;
      const labels = explicitByChild.get(edge.childId) ?? new Set<string>();
      for (const label of edge.assertionTargets) {
        const assertion = byLabel.get(label);
        if (!assertion) continue;
        assertion.contributions.push(contribution(edge.childId, 'explicit', label, value));
        labels.add(label);
      }
      explicitByChild.set(edge.childId, labels);
    }

    for (const edge of childEdges) {
      if (edge.assertionTargets.length > 0) continue;
      const value = this.own.get(edge.childId) ?? 0;
      const explicit = explicitByChild.get(edge.childId);
      for (const [label, assertion] of byLabel) {
        if (explicit?.has(label)) continue;
        assertion.contributions.push(contribution(edge.childId, 'inferred', label, value));
      }
    }
  }

  private rollupRequirement(req: GraphNode<'requirement'>): RollupMetrics {
    const cached = this.memo.get(req.id);
    if (cached) return cached;
    this.inProgress.add(req.id);

    const metrics = emptyMetrics();
    for (const assertion of assertionsOf(req)) {
      const am = this.rollupAssertion(assertion);
      metrics.totalAssertions += am.totalAssertions;
      metrics.coveredAssertions += am.coveredAssertions;
      metrics.directCovered += am.directCovered;
      metrics.explicitCovered += am.explicitCovered;
      metrics.inferredCovered += am.inferredCovered;
      metrics.indirectCovered += am.indirectCovered;
      metrics.coveredWithIndirect += am.coveredWithIndirect;
      metrics.directTested += am.directTested;
      metrics.validated += am.validated;
      metrics.validatedWithIndirect += am.validatedWithIndirect;
    }

    const tests = new Set<string>();
    const code = new Set<string>();
    for (const edge of this.graph.edgesFrom(req.id)) {
      if (!contributesToCoverage(edge.kind)) continue;
      const child = this.graph.findById(edge.childId);
      if (child?.kind === 'test') tests.add(child.id);
      if (child?.kind === 'code') code.add(child.id);
    }
    metrics.totalTests = tests.size;
    metrics.totalCodeRefs = code.size;
    for (const id of tests) {
      const status = this.statuses.get(id);
      if (status === 'passed') metrics.passedTests++;
      else if (status === 'failed') metrics.failedTests++;
      else if (status === 'skipped') metrics.skippedTests++;
    }

    for (const child of req.children()) {
      if (!isKind(child, 'requirement') || this.isExcluded(child) || this.inProgress.has(child.id)) {
        continue;
      }
      const cm = this.rollupRequirement(child);
      metrics.totalTests += cm.totalTests;
      metrics.passedTests += cm.passedTests;
      metrics.failedTests += cm.failedTests;
      metrics.skippedTests += cm.skippedTests;
      metrics.totalCodeRefs += cm.totalCodeRefs;
      if (this.options.strictMode) {
        metrics.totalAssertions += cm.totalAssertions;
        metrics.coveredAssertions += cm.coveredAssertions;
        metrics.directCovered += cm.directCovered;
        metrics.explicitCovered += cm.explicitCovered;
        metrics.inferredCovered += cm.inferredCovered;
        metrics.indirectCovered += cm.indirectCovered;
      metrics.coveredWithIndirect += cm.coveredWithIndirect;
      metrics.directTested += cm.directTested;
        metrics.validated += cm.validated;
        metrics.validatedWithIndirect += cm.validatedWithIndirect;
      }
    }

    finish(metrics);
    this.inProgress.delete(req.id);
    this.memo.set(req.id, metrics);
    req.rollup = metrics;
    publish(req, metrics);
    return metrics;
  }

  private rollupAssertion(assertion: GraphNode<'assertion'>): RollupMetrics {
    const metrics = emptyMetrics();
    const sources = new Set(assertion.contributions.map((c) => c.sourceType));
    metrics.totalAssertions = 1;

    // Each source counts on its own; only `covered` is their union.
    metrics.directCovered = sources.has('direct') ? 1 : 0;
    metrics.explicitCovered = sources.has('explicit') ? 1 : 0;
    metrics.inferredCovered = sources.has('inferred') ? 1 : 0;
    metrics.indirectCovered = sources.has('indirect') ? 1 : 0;
    metrics.coveredAssertions =
      metrics.directCovered || metrics.explicitCovered || metrics.inferredCovered ? 1 : 0;
    metrics.coveredWithIndirect = metrics.coveredAssertions || metrics.indirectCovered;
    metrics.directTested = assertion.contributions.some(
      (c) => c.sourceType === 'direct' && this.statuses.has(c.sourceId)
    )
      ? 1
      : 0;

    const passing = (type: CoverageSource): boolean =>
      assertion.contributions.some(
        (c) => c.sourceType === type && this.statuses.get(c.sourceId) === 'passed'
      );
    metrics.validated = passing('direct') ? 1 : 0;
    metrics.validatedWithIndirect = metrics.validated === 1 || passing('indirect') ? 1 : 0;

    finish(metrics);
    assertion.rollup = metrics;
    assertion.setMetric('covered', metrics.coveredAssertions === 1);
    return metrics;
  }

  private isExcluded(req: GraphNode<'requirement'>): boolean {
    return this.options.excludeStatus.includes(req.getField('status'));
  }
}

function contribution(
  sourceId: string,
  sourceType: CoverageSource,
  assertionLabel: string,
  coverageValue: number
): CoverageContribution {
  return { sourceId, sourceType, assertionLabel, coverageValue };
}

function labelIndex(req: GraphNode<'requirement'>): Map<string, GraphNode<'assertion'>> {
  return new Map(assertionsOf(req).map((a) => [a.getField('label'), a]));
}

export function percent(part: number, whole: number): number {
  return whole > 0 ? (part / whole) * 100 : 0;
}

function finish(metrics: RollupMetrics): void {
  metrics.coveragePct = percent(metrics.coveredAssertions, metrics.totalAssertions);
  metrics.indirectCoveragePct = percent(metrics.coveredWithIndirect, metrics.totalAssertions);
  metrics.passRatePct = percent(metrics.passedTests, metrics.totalTests);
  metrics.hasFailures = metrics.failedTests > 0;
}

function publish(node: GraphNode, metrics: RollupMetrics): void {
  node.setMetric('total_assertions', metrics.totalAssertions);
  node.setMetric('covered_assertions', metrics.coveredAssertions);
  node.setMetric('coverage_pct', metrics.coveragePct);
  node.setMetric('indirect_coverage_pct', metrics.indirectCoveragePct);
  node.setMetric('total_tests', metrics.totalTests);
  node.setMetric('passed_tests', metrics.passedTests);
  node.setMetric('pass_rate_pct', metrics.passRatePct);
  node.setMetric('has_failures', metrics.hasFailures);
}
