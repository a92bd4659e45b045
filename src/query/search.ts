/**
 * Requirement search: plain, ranked by relevance, scoped to a region of
 * the graph, and scoped-then-minimized discovery.
 */

import { fail, notFound, ok, type Result } from '../core/errors.js';
import type { EdgeKind } from '../core/types.js';
import type { TraceGraph } from '../graph/graph.js';
import type { GraphNode } from '../graph/node.js';
import { debug } from '../shared/debug.js';
import { minimizeRequirementSet, type MinimizeStats } from './minimize.js';
import { isEmptyQuery, parseQuery } from './parse.js';
import { scoreRequirement } from './score.js';

export type SearchField = 'id' | 'title' | 'body' | 'keywords' | 'all';
export type MatchField = Exclude<SearchField, 'all'>;
export type ScopeDirection = 'descendants' | 'ancestors';

export interface SearchOptions {
  field?: SearchField;
  regex?: boolean;
  /** Stop after this many matches; 0 or less means no limit. */
  limit?: number;
}

export interface SearchMatch {
  id: string;
  title: string;
  level: string;
  status: string;
  matchedField: MatchField;
  matchedText: string;
}

export interface RankedSearchOptions {
  field?: SearchField;
  /** 0 or less means no limit. */
  limit?: number;
}

export interface RankedMatch {
  id: string;
  title: string;
  level: string;
  status: string;
  score: number;
}

export interface DiscoverOptions extends SearchOptions {
  direction?: ScopeDirection;
  edgeKinds?: EdgeKind[];
}

export interface DiscoverResult {
  matches: SearchMatch[];
  pruned: { match: SearchMatch; supersededBy: string[] }[];
  stats: MinimizeStats;
}

const DEFAULT_LIMIT = 50;
const FIELD_ORDER: readonly MatchField[] = ['id', 'title', 'body', 'keywords'];

type Matcher = (text: string) => boolean;

/**
 * Scan requirements in index order for a case-insensitive substring (or
 * regex) match.
 */
export function search(graph: TraceGraph, query: string, options: SearchOptions = {}): Result<SearchMatch[]> {
  return searchAmong(graph.nodesByKind('requirement'), query, options);
}

/**
 * Search with the multi-term query language, best score first. Equal
 * scores keep index order. A query with nothing to match finds nothing.
 */
export function rankedSearch(graph: TraceGraph, query: string, options: RankedSearchOptions = {}): RankedMatch[] {
  const parsed = parseQuery(query);
  if (isEmptyQuery(parsed)) return [];

  const field = options.field ?? 'all';
  const limit = options.limit ?? DEFAULT_LIMIT;
  const ranked: RankedMatch[] = [];
  for (const node of graph.nodesByKind('requirement')) {
    const score = scoreRequirement(node, parsed, field);
    if (score <= 0) continue;
    ranked.push({
      id: node.id,
      title: node.label,
      level: node.getField('level'),
      status: node.getField('status'),
      score,
    });
  }
  ranked.sort((a, b) => b.score - a.score);
  debug('query', 'Ranked search', { query, matches: ranked.length });
  return limit > 0 ? ranked.slice(0, limit) : ranked;
}

/**
 * Search restricted to the nodes reachable from `scopeId`, the scope
 * itself included.
 */
export function scopedSearch(
  graph: TraceGraph,
  query: string,
  scopeId: string,
  direction: ScopeDirection = 'descendants',
  options: SearchOptions = {}
): Result<SearchMatch[]> {
  const scope = graph.findById(scopeId);
  if (!scope) return notFound('Scope node', scopeId);

  const candidates = reachable(scope, direction).filter(
    (node): node is GraphNode<'requirement'> => node.kind === 'requirement'
  );
  debug('query', 'Scoped search', { scopeId, direction, candidates: candidates.length });
  return searchAmong(candidates, query, options);
}

/**
 * Scoped search, then drop every match that another match already
 * implies. Pruned matches keep their match metadata.
 */
export function discoverRequirements(
  graph: TraceGraph,
  query: string,
  scopeId: string,
  options: DiscoverOptions = {}
): Result<DiscoverResult> {
  const found = scopedSearch(graph, query, scopeId, options.direction, options);
  if (!found.ok) return found;

  const byId = new Map(found.value.map((match) => [match.id, match]));
  const minimized = minimizeRequirementSet(graph, Array.from(byId.keys()), options.edgeKinds);

  return ok({
    matches: minimized.minimalSet.flatMap((id) => {
      const match = byId.get(id);
      return match ? [match] : [];
    }),
    pruned: minimized.pruned.flatMap(({ id, supersededBy }) => {
      const match = byId.get(id);
      return match ? [{ match, supersededBy }] : [];
    }),
    stats: minimized.stats,
  });
}

/**
 * Nodes reachable from `start` through children or parents, nearest
 * first, `start` included.
 */
export function reachable(start: GraphNode, direction: ScopeDirection): GraphNode[] {
  const visited = new Set<string>([start.id]);
  const order: GraphNode[] = [];
  const queue: GraphNode[] = [start];
  while (queue.length > 0) {
    const node = queue.shift();
    if (!node) continue;
    order.push(node);
    const next = direction === 'descendants' ? node.children() : node.parents();
    for (const neighbour of next) {
      if (!visited.has(neighbour.id)) {
        visited.add(neighbour.id);
        queue.push(neighbour);
      }
    }
  }
  return order;
}

function searchAmong(
  candidates: Iterable<GraphNode<'requirement'>>,
  query: string,
  options: SearchOptions
): Result<SearchMatch[]> {
  const matcher = buildMatcher(query, options.regex ?? false);
  if (!matcher.ok) return matcher;

  const field = options.field ?? 'all';
  const fields = field === 'all' ? FIELD_ORDER : [field];
  const limit = options.limit ?? DEFAULT_LIMIT;
  const matches: SearchMatch[] = [];

  for (const node of candidates) {
    for (const name of fields) {
      const text = fieldText(node, name);
      if (text === undefined || !matcher.value(text)) continue;
      matches.push({
        id: node.id,
        title: node.label,
        level: node.getField('level'),
        status: node.getField('status'),
        matchedField: name,
        matchedText: text,
      });
      break;
    }
    if (limit > 0 && matches.length >= limit) break;
  }
  return ok(matches);
}

function buildMatcher(query: string, regex: boolean): Result<Matcher> {
  if (!regex) {
    const needle = query.toLowerCase();
    return ok((text) => text.toLowerCase().includes(needle));
  }
  let pattern: RegExp;
  try {
    pattern = new RegExp(query, 'i');
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    return fail('invalid_argument', `Invalid regular expression: ${reason}`, { query });
  }
  return ok((text) => pattern.test(text));
}

function fieldText(node: GraphNode<'requirement'>, field: MatchField): string | undefined {
  switch (field) {
    case 'id':
      return node.id;
    case 'title':
      return node.label;
    case 'body':
      return node.getField('bodyText') || undefined;
    case 'keywords': {
      const keywords = node.getField('keywords');
      return keywords.length > 0 ? keywords.join(' ') : undefined;
    }
  }
}
