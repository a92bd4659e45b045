/**
 * Plain-data views of nodes. Nothing returned here references live graph
 * objects.
 */

import type {
  ContentByKind,
  CoverageContribution,
  MetricValue,
  NodeKind,
  RollupMetrics,
  SourceLocation,
} from '../core/types.js';
import { assertionsOf, isKind, type GraphNode } from './node.js';

export interface AssertionView {
  id: string;
  label: string;
  text: string;
}

export interface NodeView {
  id: string;
  kind: NodeKind;
  label: string;
  source?: SourceLocation;
  content: ContentByKind[NodeKind];
  metrics: Record<string, MetricValue>;
  rollup?: RollupMetrics;
  contributions?: CoverageContribution[];
  parents: string[];
  children: string[];
  assertions?: AssertionView[];
}

export function toNodeView(node: GraphNode): NodeView {
  const view: NodeView = {
    id: node.id,
    kind: node.kind,
    label: node.label,
    content: structuredClone(node.content),
    metrics: Object.fromEntries(node.metricEntries()),
    parents: node.parents().map((parent) => parent.id),
    children: node.children().map((child) => child.id),
  };
  if (node.source) view.source = { ...node.source };
  if (node.rollup) view.rollup = { ...node.rollup };
  if (node.contributions.length > 0) view.contributions = node.contributions.map((c) => ({ ...c }));
  if (isKind(node, 'requirement')) view.assertions = assertionViews(node);
  return view;
}

export function assertionViews(requirement: GraphNode): AssertionView[] {
  return assertionsOf(requirement).map((assertion) => ({
    id: assertion.id,
    label: assertion.getField('label'),
    text: assertion.getField('text'),
  }));
}

export interface AssertionInContext extends AssertionView {
  parentId: string | null;
  parentTitle: string | null;
}

export function assertionInContext(assertion: GraphNode<'assertion'>): AssertionInContext {
  const parent = assertion.parents().find((node) => isKind(node, 'requirement'));
  return {
    id: assertion.id,
    label: assertion.getField('label'),
    text: assertion.getField('text'),
    parentId: parent?.id ?? null,
    parentTitle: parent?.label ?? null,
  };
}
