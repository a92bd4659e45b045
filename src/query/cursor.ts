/**
 * Paginated access to a query result. A session holds at most one open
 * cursor; results are materialized when it opens.
 *
 * The cursor's batch size picks the shape of each item, not the page
 * size:
 *
 * | batchSize | requirement items                         | assertions        |
 * |-----------|-------------------------------------------|-------------------|
 * | -1        | id, kind, title                           | items of their own |
 * | 0         | plus inline `assertions` and `coverage`   | inline only       |
 * | 1 or more | plus `children` (non-assertion children)  | inline only       |
 */

import { fail, notFound, ok, type Result } from '../core/errors.js';
import type { NodeKind, RollupMetrics } from '../core/types.js';
import { emptyMetrics } from '../coverage/rollup.js';
import type { TraceGraph } from '../graph/graph.js';
import { assertionViews, type AssertionView } from '../graph/serialize.js';
import { assertionsOf, isKind, type GraphNode } from '../graph/node.js';
import { debug } from '../shared/debug.js';
import {
  scopedSearch,
  search,
  type MatchField,
  type ScopeDirection,
  type SearchMatch,
  type SearchOptions,
} from './search.js';
import { collectSubtree } from './subtree.js';

export type CursorQuery =
  | ({ type: 'search'; query: string } & SearchOptions)
  | ({ type: 'scoped_search'; query: string; scopeId: string; direction?: ScopeDirection } & SearchOptions)
  | { type: 'subtree'; rootId: string; depth?: number; kinds?: NodeKind[] }
  | { type: 'hierarchy'; reqId: string };

export type CursorQueryType = CursorQuery['type'];

export type HierarchySection = 'ancestor' | 'child';

export interface NodeSummary {
  id: string;
  kind: NodeKind;
  title: string;
}

export interface CursorItem extends NodeSummary {
  depth?: number;
  section?: HierarchySection;
  match?: { field: MatchField; text: string };
  /** Set on assertion items, which only appear at batch size -1. */
  label?: string;
  assertions?: AssertionView[];
  coverage?: RollupMetrics;
  children?: NodeSummary[];
}

export interface CursorInfo {
  query: CursorQueryType;
  batchSize: number;
  total: number;
  position: number;
  remaining: number;
}

export interface CursorOpened extends CursorInfo {
  current: CursorItem | null;
}

export interface CursorPage {
  items: CursorItem[];
  count: number;
  remaining: number;
}

interface OpenCursor {
  query: CursorQueryType;
  batchSize: number;
  items: CursorItem[];
  position: number;
}

interface Entry {
  node: GraphNode;
  depth?: number;
  section?: HierarchySection;
  match?: CursorItem['match'];
}

interface Materialized {
  entries: Entry[];
  /** Search results hold requirements only; their assertions follow them at -1. */
  expandAssertions: boolean;
}

/**
 * Opening a cursor returns the first item and counts it as consumed.
 */
export class CursorSession {
  private cursor: OpenCursor | undefined;

  constructor(
    private readonly graph: TraceGraph,
    private readonly defaultBatchSize = 0
  ) {}

  /**
   * Materialize `query` and replace any open cursor. A failing query
   * leaves the previous cursor in place.
   */
  open(query: CursorQuery, batchSize: number = this.defaultBatchSize): Result<CursorOpened> {
    const found = this.materialize(query);
    if (!found.ok) return found;

    const items = shapeItems(found.value, batchSize);
    const first = items[0];
    this.cursor = {
      query: query.type,
      batchSize,
      items,
      position: first ? 1 : 0,
    };
    debug('cursor', 'Opened cursor', { query: query.type, batchSize, total: items.length });
    return ok({ ...infoOf(this.cursor), current: first ?? null });
  }

  /**
   * The next `count` items. Past the end this returns an empty page.
   */
  next(count = 1): Result<CursorPage> {
    const cursor = this.cursor;
    if (!cursor) return noCursor();

    const items = cursor.items.slice(cursor.position, cursor.position + Math.max(count, 0));
    cursor.position += items.length;
    return ok({ items, count: items.length, remaining: cursor.items.length - cursor.position });
  }

  info(): Result<CursorInfo> {
    if (!this.cursor) return noCursor();
    return ok(infoOf(this.cursor));
  }

  close(): void {
    this.cursor = undefined;
  }

  isOpen(): boolean {
    return this.cursor !== undefined;
  }

  private materialize(query: CursorQuery): Result<Materialized> {
    switch (query.type) {
      case 'search': {
        const found = search(this.graph, query.query, query);
        return found.ok ? ok(this.matches(found.value)) : found;
      }
      case 'scoped_search': {
        const found = scopedSearch(this.graph, query.query, query.scopeId, query.direction, query);
        return found.ok ? ok(this.matches(found.value)) : found;
      }
      case 'subtree': {
        const entries = collectSubtree(this.graph, query.rootId, query);
        if (!entries.ok) return entries;
        return ok({
          entries: entries.value.map(({ node, depth }) => ({ node, depth })),
          expandAssertions: false,
        });
      }
      case 'hierarchy':
        return this.hierarchy(query.reqId);
    }
  }

  private matches(found: SearchMatch[]): Materialized {
    const entries = found.flatMap((match): Entry[] => {
      const node = this.graph.findById(match.id);
      return node ? [{ node, match: { field: match.matchedField, text: match.matchedText } }] : [];
    });
    return { entries, expandAssertions: true };
  }

  /**
   * Ancestors nearest first, then direct children.
   */
  private hierarchy(reqId: string): Result<Materialized> {
    const node = this.graph.findById(reqId);
    if (!node) return notFound('Requirement', reqId);
    if (!isKind(node, 'requirement')) {
      return fail('invalid_state', `${reqId} is a ${node.kind}, not a requirement`, { id: reqId, kind: node.kind });
    }

    const entries: Entry[] = [];
    for (const ancestor of node.ancestors()) {
      entries.push({ node: ancestor, section: 'ancestor' });
    }
    for (const child of node.children()) {
      entries.push({ node: child, section: 'child' });
    }
    return ok({ entries, expandAssertions: false });
  }
}

function shapeItems({ entries, expandAssertions }: Materialized, batchSize: number): CursorItem[] {
  const items: CursorItem[] = [];
  for (const entry of entries) {
    const { node } = entry;
    if (batchSize < 0) {
      items.push(withEntry(summaryItem(node), entry));
      if (expandAssertions && isKind(node, 'requirement')) {
        items.push(...assertionsOf(node).map(summaryItem));
      }
      continue;
    }

    if (node.kind === 'assertion') continue;
    const item = withEntry(summaryItem(node), entry);
    if (isKind(node, 'requirement')) {
      item.assertions = assertionViews(node);
      item.coverage = { ...(node.rollup ?? emptyMetrics()) };
      if (batchSize >= 1) {
        item.children = node
          .children()
          .filter((child) => child.kind !== 'assertion')
          .map((child) => ({ id: child.id, kind: child.kind, title: child.label }));
      }
    }
    items.push(item);
  }
  return items;
}

function summaryItem(node: GraphNode): CursorItem {
  const item: CursorItem = { id: node.id, kind: node.kind, title: node.label };
  if (isKind(node, 'assertion')) item.label = node.getField('label');
  return item;
}

function withEntry(item: CursorItem, { depth, section, match }: Entry): CursorItem {
  if (depth !== undefined) item.depth = depth;
  if (section !== undefined) item.section = section;
  if (match !== undefined) item.match = match;
  return item;
}

function infoOf(cursor: OpenCursor): CursorInfo {
  return {
    query: cursor.query,
    batchSize: cursor.batchSize,
    total: cursor.items.length,
    position: cursor.position,
    remaining: cursor.items.length - cursor.position,
  };
}

function noCursor<T>(): Result<T> {
  return fail('invalid_state', 'No active cursor; open one first');
}
