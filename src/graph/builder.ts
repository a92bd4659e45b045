/**
 * Two-pass graph builder.
 *
 * Pass 1 (`addParsedContent`) creates nodes and queues every relationship
 * by raw target id. Pass 2 (`build`) resolves the queue, so records can
 * arrive in any order across files.
 */

import { computeRequirementHash, DEFAULT_HASH_OPTIONS, type HashOptions } from '../core/hash.js';
import type {
  CodeRefData,
  EdgeKind,
  JourneyData,
  ParsedContent,
  RemainderData,
  RequirementData,
  SourceLocation,
  TestRefData,
  TestResultData,
  TestStatus,
  ValidationIssue,
} from '../core/types.js';
import { debug } from '../shared/debug.js';
import { TraceGraph } from './graph.js';
import { extractKeywords } from './keywords.js';
import { isKind, type GraphNode } from './node.js';

export interface BuilderOptions {
  /** Prefix tried when a reference does not match an id exactly. */
  idPrefix?: string;
  hash?: HashOptions;
}

interface PendingLink {
  sourceId: string;
  targetId: string;
  kind: EdgeKind;
}

export interface ResolvedTarget {
  node: GraphNode;
  labels: string[];
}

export class GraphBuilder {
  private readonly graph = new TraceGraph();
  private readonly pending: PendingLink[] = [];
  private readonly pendingResults: { resultId: string; testId: string }[] = [];
  private readonly collected: ValidationIssue[] = [];
  private readonly idPrefix: string;
  private readonly hashOptions: HashOptions;
  private built = false;

  constructor(options: BuilderOptions = {}) {
    this.idPrefix = options.idPrefix ?? 'REQ-';
    this.hashOptions = options.hash ?? DEFAULT_HASH_OPTIONS;
  }

  /**
   * Issues found while ingesting, such as duplicate ids.
   */
  issues(): ValidationIssue[] {
    return [...this.collected];
  }

  addParsedContent(record: ParsedContent): void {
    const source = locate(record);
    switch (record.contentType) {
      case 'requirement':
        this.addRequirement(record.parsedData, source);
        break;
      case 'journey':
        this.addJourney(record.parsedData, source);
        break;
      case 'code_ref':
        this.addCodeRef(record.parsedData, source);
        break;
      case 'test_ref':
        this.addTestRef(record.parsedData, source);
        break;
      case 'test_result':
        this.addTestResult(record.parsedData, source);
        break;
      case 'remainder':
        this.addRemainder(record.parsedData, source, record.rawText);
        break;
    }
  }

  addAll(records: Iterable<ParsedContent>): this {
    for (const record of records) {
      this.addParsedContent(record);
    }
    return this;
  }

  /**
   * Resolve queued links, then classify roots and orphans. Calling it
   * again returns the same graph.
   */
  build(): TraceGraph {
    if (this.built) return this.graph;
    this.built = true;

    for (const { resultId, testId } of this.pendingResults) {
      if (!this.graph.hasNode(testId)) {
        this.graph.addNode({
          id: testId,
          kind: 'test',
          label: testId,
          content: { fromResults: true },
        });
        debug('build', 'Created test from result', { testId, resultId });
      }
      this.graph.link(testId, resultId, 'contains');
    }

    for (const link of this.pending) {
      const target = this.resolveTarget(link.targetId);
      if (!target) {
        this.graph.addBrokenReference({
          sourceId: link.sourceId,
          targetId: link.targetId,
          edgeKind: link.kind,
        });
        continue;
      }
      this.graph.link(target.node.id, link.sourceId, link.kind, target.labels);
    }

    this.graph.recomputeRoots();
    debug('build', 'Graph built', {
      nodes: this.graph.nodeCount(),
      links: this.pending.length,
      broken: this.graph.brokenReferences().length,
    });
    return this.graph;
  }

  /**
   * Resolve a raw reference: exact id, then prefixed id, then
   * multi-assertion shorthand, then the first requirement or assertion
   * whose id ends with it.
   */
  resolveTarget(raw: string): ResolvedTarget | undefined {
    const exact = this.graph.findById(raw) ?? this.graph.findById(this.idPrefix + raw);
    if (exact) return redirectToOwner(exact);

    const shorthand = this.resolveShorthand(raw) ?? this.resolveShorthand(this.idPrefix + raw);
    if (shorthand) return shorthand;

    for (const id of this.graph.nodeIds()) {
      const node = this.graph.findById(id);
      if (!node || (node.kind !== 'requirement' && node.kind !== 'assertion')) continue;
      if (id.endsWith(raw)) {
        debug('build', 'Resolved by suffix', { reference: raw, id });
        return redirectToOwner(node);
      }
    }
    return undefined;
  }

  /**
   * `REQ-x-A-B` names assertions A and B of `REQ-x`.
   */
  private resolveShorthand(raw: string): ResolvedTarget | undefined {
    const parts = raw.split('-');
    for (let i = parts.length - 1; i >= 1; i--) {
      const base = this.graph.findById(parts.slice(0, i).join('-'));
      if (!base || !isKind(base, 'requirement')) continue;
      const labels = parts.slice(i);
      if (labels.every((label) => this.graph.hasNode(`${base.id}-${label}`))) {
        return { node: base, labels };
      }
    }
    return undefined;
  }

  private addRequirement(data: RequirementData, source?: SourceLocation): void {
    if (this.rejectDuplicate(data.id, 'requirement')) return;

    const assertions = data.assertions ?? [];
    const title = data.title ?? data.id;
    const bodyText = data.body ?? '';
    this.graph.addNode({
      id: data.id,
      kind: 'requirement',
      label: title,
      source,
      content: {
        level: data.level ?? 'PRD',
        status: data.status ?? 'Active',
        hash: data.hash ?? computeRequirementHash(bodyText, assertions, this.hashOptions),
        bodyText,
        keywords: data.keywords ?? extractKeywords(title, ...assertions.map((a) => a.text)),
      },
    });

    for (const assertion of assertions) {
      const assertionId = `${data.id}-${assertion.label}`;
      if (this.rejectDuplicate(assertionId, 'assertion')) continue;
      this.graph.addNode({
        id: assertionId,
        kind: 'assertion',
        label: assertion.text,
        source,
        content: { label: assertion.label, text: assertion.text },
      });
      this.graph.link(data.id, assertionId, 'contains');
    }

    this.queue(data.id, data.implements, 'implements');
    this.queue(data.id, data.refines, 'refines');
    this.queue(data.id, data.addresses, 'addresses');
  }

  private addJourney(data: JourneyData, source?: SourceLocation): void {
    if (this.rejectDuplicate(data.id, 'journey')) return;
    this.graph.addNode({
      id: data.id,
      kind: 'journey',
      label: data.title ?? data.id,
      source,
      content: { actor: data.actor, goal: data.goal },
    });
  }

  private addCodeRef(data: CodeRefData, source?: SourceLocation): void {
    const id = `code:${source?.path ?? 'unknown'}:${source?.line ?? 0}`;
    if (this.rejectDuplicate(id, 'code')) return;
    this.graph.addNode({
      id,
      kind: 'code',
      label: data.functionName ?? id,
      source,
      content: { functionName: data.functionName, className: data.className },
    });
    this.queue(id, data.implements, 'implements');
  }

  private addTestRef(data: TestRefData, source?: SourceLocation): void {
    const id = data.id ?? `test:${source?.path ?? 'unknown'}:${source?.line ?? 0}`;
    if (this.rejectDuplicate(id, 'test')) return;
    this.graph.addNode({
      id,
      kind: 'test',
      label: data.functionName ?? id,
      source,
      content: { functionName: data.functionName, className: data.className, fromResults: false },
    });
    this.queue(id, data.validates, 'validates');
  }

  private addTestResult(data: TestResultData, source?: SourceLocation): void {
    if (this.rejectDuplicate(data.id, 'result')) return;
    const status = normalizeTestStatus(data.status);
    this.graph.addNode({
      id: data.id,
      kind: 'result',
      label: `${data.testId ?? data.id}: ${status}`,
      source,
      content: {
        status,
        testId: data.testId,
        duration: data.duration,
        message: data.message,
      },
    });
    if (data.testId) {
      this.pendingResults.push({ resultId: data.id, testId: data.testId });
    }
  }

  private addRemainder(data: RemainderData, source?: SourceLocation, rawText?: string): void {
    const id = data.id ?? `rem:${source?.path ?? 'unknown'}:${source?.line ?? 0}`;
    if (this.rejectDuplicate(id, 'remainder')) return;
    const text = data.text ?? rawText ?? '';
    this.graph.addNode({
      id,
      kind: 'remainder',
      label: text.split('\n')[0] ?? '',
      source,
      content: { text },
    });
  }

  private queue(sourceId: string, targets: string[] | undefined, kind: EdgeKind): void {
    for (const targetId of targets ?? []) {
      this.pending.push({ sourceId, targetId, kind });
    }
  }

  private rejectDuplicate(id: string, kind: string): boolean {
    if (!this.graph.hasNode(id)) return false;
    this.collected.push({
      type: 'duplicate_id',
      severity: 'error',
      message: `Duplicate ${kind} id: ${id}`,
      context: { id, kind },
    });
    debug('build', 'Duplicate id ignored', { id, kind });
    return true;
  }
}

/**
 * Assertion references land on the owning requirement, targeted at the
 * assertion's label.
 */
export function redirectToOwner(node: GraphNode): ResolvedTarget {
  if (isKind(node, 'assertion')) {
    const owner = node.parents().find((parent) => parent.kind === 'requirement');
    if (owner) {
      return { node: owner, labels: [node.getField('label')] };
    }
  }
  return { node, labels: [] };
}

function locate(record: ParsedContent): SourceLocation | undefined {
  if (!record.sourceContext) return undefined;
  return { path: record.sourceContext.sourceId, line: record.startLine, endLine: record.endLine };
}

export function normalizeTestStatus(raw: string | undefined): TestStatus {
  switch ((raw ?? '').toLowerCase()) {
    case 'pass':
    case 'passed':
    case 'ok':
      return 'passed';
    case 'fail':
    case 'failed':
    case 'failure':
      return 'failed';
    case 'skip':
    case 'skipped':
      return 'skipped';
    case 'error':
      return 'error';
    default:
      return 'unknown';
  }
}
