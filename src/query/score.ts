/**
 * Relevance scoring of requirements against a parsed query.
 */

import type { GraphNode } from '../graph/node.js';
import type { ParsedQuery, SearchTerm } from './parse.js';
import type { MatchField, SearchField } from './search.js';

export const FIELD_WEIGHTS = {
  id: 100,
  title: 50,
  keywordExact: 40,
  keywordSubstring: 25,
  body: 10,
} as const;

const ALL_FIELDS: readonly MatchField[] = ['id', 'title', 'keywords', 'body'];

/**
 * 0 when an excluded term matches, a phrase is missing or an AND group has
 * no matching term. Otherwise the sum of each group's best term score; a
 * query of phrases alone scores 1.
 */
export function scoreRequirement(
  node: GraphNode<'requirement'>,
  query: ParsedQuery,
  field: SearchField = 'all'
): number {
  const fields = field === 'all' ? ALL_FIELDS : [field];

  if (query.excluded.some((term) => fields.some((name) => termMatches(node, term, name)))) return 0;
  for (const phrase of query.phrases) {
    if (!fields.some((name) => fieldText(node, name).includes(phrase))) return 0;
  }
  if (query.andGroups.length === 0) return query.phrases.length > 0 ? 1 : 0;

  let total = 0;
  for (const group of query.andGroups) {
    const best = Math.max(0, ...group.map((term) => scoreTerm(node, term, fields)));
    if (best === 0) return 0;
    total += best;
  }
  return total;
}

function scoreTerm(node: GraphNode<'requirement'>, term: SearchTerm, fields: readonly MatchField[]): number {
  let best = 0;
  for (const name of fields) {
    if (name === 'keywords') {
      for (const keyword of keywordsOf(node)) {
        if (term.exact ? keyword === term.text : keyword.includes(term.text)) {
          best = Math.max(best, term.exact ? FIELD_WEIGHTS.keywordExact : FIELD_WEIGHTS.keywordSubstring);
        }
      }
    } else if (fieldText(node, name).includes(term.text)) {
      best = Math.max(best, FIELD_WEIGHTS[name]);
    }
  }
  return best;
}

function termMatches(node: GraphNode<'requirement'>, term: SearchTerm, field: MatchField): boolean {
  if (field === 'keywords') {
    return keywordsOf(node).some((keyword) => (term.exact ? keyword === term.text : keyword.includes(term.text)));
  }
  return fieldText(node, field).includes(term.text);
}

function keywordsOf(node: GraphNode<'requirement'>): string[] {
  return node.getField('keywords').map((keyword) => keyword.toLowerCase());
}

function fieldText(node: GraphNode<'requirement'>, field: MatchField): string {
  switch (field) {
    case 'id':
      return node.id.toLowerCase();
    case 'title':
      return node.label.toLowerCase();
    case 'body':
      return node.getField('bodyText').toLowerCase();
    case 'keywords':
      return keywordsOf(node).join(' ');
  }
}
