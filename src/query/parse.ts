/**
 * Multi-term query language for ranked search.
 *
 * ```
 * term        substring match
 * =term       exact keyword match
 * "a phrase"  contiguous substring, always required
 * -term       exclude anything containing term
 * a OR b      either
 * a b, a AND b both
 * (a OR b)    group; every plain term inside joins one OR group
 * ```
 *
 * `OR` and `AND` are operators only in capitals. Terms and phrases are
 * matched lowercased.
 */

export type QueryToken =
  | { type: 'lparen' }
  | { type: 'rparen' }
  | { type: 'or' }
  | { type: 'and' }
  | { type: 'phrase'; text: string }
  | { type: 'word'; text: string };

export interface SearchTerm {
  text: string;
  /** `=term`: keywords must equal it rather than contain it. */
  exact: boolean;
  negated: boolean;
}

/**
 * What the parser reads off the token stream before terms are grouped.
 */
export type QueryItem =
  | { type: 'term'; term: SearchTerm }
  | { type: 'phrase'; text: string }
  | { type: 'group'; terms: SearchTerm[] }
  | { type: 'or' }
  | { type: 'and' };

/**
 * An AND of OR groups. Every phrase must be present and no excluded term
 * may match.
 */
export interface ParsedQuery {
  andGroups: SearchTerm[][];
  excluded: SearchTerm[];
  phrases: string[];
}

const BREAKS = new Set(['(', ')', '"']);

export function tokenize(raw: string): QueryToken[] {
  const tokens: QueryToken[] = [];
  let i = 0;

  while (i < raw.length) {
    const ch = raw[i];
    if (/\s/.test(ch)) {
      i++;
      continue;
    }
    if (ch === '(' || ch === ')') {
      tokens.push({ type: ch === '(' ? 'lparen' : 'rparen' });
      i++;
      continue;
    }
    if (ch === '"') {
      const close = raw.indexOf('"', i + 1);
      const end = close === -1 ? raw.length : close;
      const text = raw.slice(i + 1, end);
      if (text) tokens.push({ type: 'phrase', text: text.toLowerCase() });
      i = close === -1 ? raw.length : close + 1;
      continue;
    }

    let j = i;
    while (j < raw.length && !BREAKS.has(raw[j]) && !/\s/.test(raw[j])) j++;
    const word = raw.slice(i, j);
    i = j;
    if (word === 'OR') tokens.push({ type: 'or' });
    else if (word === 'AND') tokens.push({ type: 'and' });
    else tokens.push({ type: 'word', text: word });
  }
  return tokens;
}

export function parseQuery(raw: string): ParsedQuery {
  return groupItems(new ItemParser(tokenize(raw)).items());
}

export function isEmptyQuery(query: ParsedQuery): boolean {
  return query.andGroups.length === 0 && query.excluded.length === 0 && query.phrases.length === 0;
}

export function toSearchTerm(word: string): SearchTerm {
  if (word.length > 1 && word.startsWith('-')) {
    return { text: word.slice(1).toLowerCase(), exact: false, negated: true };
  }
  if (word.length > 1 && word.startsWith('=')) {
    return { text: word.slice(1).toLowerCase(), exact: true, negated: false };
  }
  return { text: word.toLowerCase(), exact: false, negated: false };
}

/**
 * Recursive descent over the tokens: `items := item*`, where a `(`
 * opens a group that runs to its matching `)` or the end of input.
 */
class ItemParser {
  private pos = 0;

  constructor(private readonly tokens: QueryToken[]) {}

  items(): QueryItem[] {
    const items: QueryItem[] = [];
    while (this.pos < this.tokens.length) {
      const token = this.tokens[this.pos++];
      switch (token.type) {
        case 'lparen': {
          const terms = this.group();
          if (terms.length > 0) items.push({ type: 'group', terms });
          break;
        }
        case 'rparen':
          // unmatched
          break;
        case 'phrase':
          items.push({ type: 'phrase', text: token.text });
          break;
        case 'or':
        case 'and':
          items.push({ type: token.type });
          break;
        case 'word':
          items.push({ type: 'term', term: toSearchTerm(token.text) });
          break;
      }
    }
    return items;
  }

  /**
   * Plain terms up to the matching `)`, nested groups included. Phrases,
   * operators and negated terms inside a group are dropped.
   */
  private group(): SearchTerm[] {
    const terms: SearchTerm[] = [];
    while (this.pos < this.tokens.length) {
      const token = this.tokens[this.pos++];
      if (token.type === 'rparen') return terms;
      if (token.type === 'lparen') {
        terms.push(...this.group());
      } else if (token.type === 'word') {
        const term = toSearchTerm(token.text);
        if (!term.negated) terms.push(term);
      }
    }
    return terms;
  }
}

function groupItems(items: QueryItem[]): ParsedQuery {
  const andGroups: SearchTerm[][] = [];
  const excluded: SearchTerm[] = [];
  const phrases: string[] = [];
  let current: SearchTerm[] = [];
  let pendingOr = false;

  const flush = (): void => {
    if (current.length > 0) andGroups.push(current);
    current = [];
  };

  for (const item of items) {
    switch (item.type) {
      case 'phrase':
        phrases.push(item.text);
        flush();
        pendingOr = false;
        break;
      case 'group':
        flush();
        andGroups.push(item.terms);
        pendingOr = false;
        break;
      case 'or':
        pendingOr = true;
        break;
      case 'and':
        flush();
        pendingOr = false;
        break;
      case 'term':
        if (item.term.negated) {
          excluded.push(item.term);
        } else if (pendingOr && current.length > 0) {
          current.push(item.term);
          pendingOr = false;
        } else {
          flush();
          current = [item.term];
          pendingOr = false;
        }
        break;
    }
  }
  flush();

  return { andGroups, excluded, phrases };
}
