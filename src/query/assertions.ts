/**
 * Keyword lookup over assertion text.
 */

import type { TraceGraph } from '../graph/graph.js';
import { assertionInContext, type AssertionInContext } from '../graph/serialize.js';

/**
 * Assertions whose text contains every keyword, or any of them when
 * `matchAll` is false. Matching ignores case; no keywords match nothing.
 */
export function findAssertionsByKeywords(
  graph: TraceGraph,
  keywords: string[],
  matchAll = true
): AssertionInContext[] {
  const needles = keywords.map((keyword) => keyword.trim().toLowerCase()).filter(Boolean);
  if (needles.length === 0) return [];

  const found: AssertionInContext[] = [];
  for (const assertion of graph.nodesByKind('assertion')) {
    const text = assertion.getField('text').toLowerCase();
    const hit = matchAll ? needles.every((n) => text.includes(n)) : needles.some((n) => text.includes(n));
    if (hit) found.push(assertionInContext(assertion));
  }
  return found;
}
