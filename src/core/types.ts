/**
 * Core type definitions for traceability graph nodes, edges and the
 * ingestion records that feed the builder.
 */

/**
 * The node kinds of the traceability graph.
 */
export type NodeKind =
  | 'requirement'
  | 'assertion'
  | 'code'
  | 'test'
  | 'result'
  | 'journey'
  | 'remainder';

/**
 * Typed edges with semantic meaning.
 */
export type EdgeKind =
  // Upward edges: the declaring node becomes the child
  | 'implements' // Requirement/Code → Requirement
  | 'refines' // Requirement → Requirement (no coverage)
  | 'validates' // Test/Code → Requirement
  | 'addresses' // Requirement → Journey (informational)
  // Structural edges (downward)
  | 'contains'; // Requirement → Assertion, Test → Result

export const NODE_KINDS: readonly NodeKind[] = [
  'requirement',
  'assertion',
  'code',
  'test',
  'result',
  'journey',
  'remainder',
];

export const EDGE_KINDS: readonly EdgeKind[] = [
  'implements',
  'refines',
  'validates',
  'addresses',
  'contains',
];

/**
 * Test run outcome as reported by a result record.
 */
export type TestStatus = 'passed' | 'failed' | 'skipped' | 'error' | 'unknown';

/**
 * Portable reference to a location in a file.
 */
export interface SourceLocation {
  path: string;
  line: number;
  endLine?: number;
}

export interface RequirementContent {
  level: string;
  status: string;
  hash: string;
  bodyText: string;
  keywords: string[];
}

export interface AssertionContent {
  label: string;
  text: string;
}

export interface CodeContent {
  functionName?: string;
  className?: string;
}

export interface TestContent {
  functionName?: string;
  className?: string;
  /** Created from a result record that named a test nobody declared. */
  fromResults: boolean;
}

export interface ResultContent {
  status: TestStatus;
  testId?: string;
  duration?: number;
  message?: string;
}

export interface JourneyContent {
  actor?: string;
  goal?: string;
}

export interface RemainderContent {
  text: string;
}

/**
 * Identity content keyed by node kind.
 */
export interface ContentByKind {
  requirement: RequirementContent;
  assertion: AssertionContent;
  code: CodeContent;
  test: TestContent;
  result: ResultContent;
  journey: JourneyContent;
  remainder: RemainderContent;
}

/**
 * Values allowed in a node's open annotation map.
 */
export type MetricValue = string | number | boolean;

/**
 * A typed edge. `parentId` is the semantic parent: for upward kinds that
 * is the referenced node, for `contains` the declaring one.
 */
export interface Edge {
  parentId: string;
  childId: string;
  kind: EdgeKind;
  /** Assertion labels on the parent this edge addresses; empty = whole requirement. */
  assertionTargets: string[];
}

/**
 * A relationship whose target could not be resolved.
 */
export interface BrokenReference {
  sourceId: string;
  targetId: string;
  edgeKind: EdgeKind;
}

// ── Coverage ─────────────────────────────────────────────────────────

export type CoverageSource = 'direct' | 'explicit' | 'inferred' | 'indirect';

/**
 * One piece of evidence that an assertion is satisfied.
 */
export interface CoverageContribution {
  sourceId: string;
  sourceType: CoverageSource;
  assertionLabel: string;
  /** 1 for tests and code; the child requirement's own ratio otherwise. */
  coverageValue: number;
}

/**
 * Aggregated coverage and test counters for one node.
 */
export interface RollupMetrics {
  totalAssertions: number;
  coveredAssertions: number;
  directCovered: number;
  explicitCovered: number;
  inferredCovered: number;
  indirectCovered: number;
  /** Covered by any source, indirect included. */
  coveredWithIndirect: number;
  /** Direct evidence from a test node; code references do not count. */
  directTested: number;
  totalTests: number;
  passedTests: number;
  failedTests: number;
  skippedTests: number;
  totalCodeRefs: number;
  coveragePct: number;
  indirectCoveragePct: number;
  passRatePct: number;
  validated: number;
  validatedWithIndirect: number;
  hasFailures: boolean;
}

// ── Validation ───────────────────────────────────────────────────────

export type ValidationIssueType =
  | 'cycle'
  | 'orphan'
  | 'broken_reference'
  | 'relationship_mismatch'
  | 'duplicate_id';

/**
 * A build/validate-time problem. Never thrown; always collected.
 */
export interface ValidationIssue {
  type: ValidationIssueType;
  severity: 'error' | 'warning';
  message: string;
  /** Varies by issue type. */
  context: Record<string, unknown>;
}

export interface ValidationReport {
  valid: boolean;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
}

// ── Ingestion records ────────────────────────────────────────────────

export type ContentType =
  | 'requirement'
  | 'journey'
  | 'code_ref'
  | 'test_ref'
  | 'test_result'
  | 'remainder';

export interface SourceContext {
  sourceId: string;
}

export interface AssertionData {
  label: string;
  text: string;
}

export interface RequirementData {
  id: string;
  title?: string;
  level?: string;
  status?: string;
  hash?: string;
  body?: string;
  keywords?: string[];
  assertions?: AssertionData[];
  implements?: string[];
  refines?: string[];
  addresses?: string[];
}

export interface JourneyData {
  id: string;
  title?: string;
  actor?: string;
  goal?: string;
}

export interface CodeRefData {
  implements?: string[];
  functionName?: string;
  className?: string;
}

export interface TestRefData {
  id?: string;
  validates?: string[];
  functionName?: string;
  className?: string;
}

export interface TestResultData {
  id: string;
  testId?: string;
  status?: string;
  duration?: number;
  message?: string;
}

export interface RemainderData {
  id?: string;
  text?: string;
}

interface ParsedContentBase<T extends ContentType, D> {
  contentType: T;
  startLine: number;
  endLine?: number;
  rawText?: string;
  parsedData: D;
  sourceContext?: SourceContext;
}

/**
 * A structured record emitted by an external parser.
 */
export type ParsedContent =
  | ParsedContentBase<'requirement', RequirementData>
  | ParsedContentBase<'journey', JourneyData>
  | ParsedContentBase<'code_ref', CodeRefData>
  | ParsedContentBase<'test_ref', TestRefData>
  | ParsedContentBase<'test_result', TestResultData>
  | ParsedContentBase<'remainder', RemainderData>;
