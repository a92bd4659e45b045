/**
 * Tests for the multi-term query parser.
 */

import { describe, it, expect } from 'vitest';
import { isEmptyQuery, parseQuery, tokenize } from '../../src/query/parse.js';

const plain = (text: string) => ({ text, exact: false, negated: false });

describe('tokenize', () => {
  it('should split words, operators, parentheses and phrases', () => {
    expect(tokenize('(auth OR Token) AND "Row Level" -old')).toEqual([
      { type: 'lparen' },
      { type: 'word', text: 'auth' },
      { type: 'or' },
      { type: 'word', text: 'Token' },
      { type: 'rparen' },
      { type: 'and' },
      { type: 'phrase', text: 'row level' },
      { type: 'word', text: '-old' },
    ]);
  });

  it('should treat lowercase operators as words and drop empty phrases', () => {
    expect(tokenize('a or b ""')).toEqual([
      { type: 'word', text: 'a' },
      { type: 'word', text: 'or' },
      { type: 'word', text: 'b' },
    ]);
  });
});

describe('parseQuery', () => {
  it('should bind OR tighter than the implicit AND', () => {
    expect(parseQuery('auth OR password security')).toEqual({
      andGroups: [[plain('auth'), plain('password')], [plain('security')]],
      excluded: [],
      phrases: [],
    });
  });

  it('should read groups, exact terms, phrases and exclusions', () => {
    expect(parseQuery('(auth OR session) =security "row level" -deprecated')).toEqual({
      andGroups: [
        [plain('auth'), plain('session')],
        [{ text: 'security', exact: true, negated: false }],
      ],
      excluded: [{ text: 'deprecated', exact: false, negated: true }],
      phrases: ['row level'],
    });
  });

  it('should flatten nested groups and drop exclusions inside them', () => {
    expect(parseQuery('(Auth OR (token OR -old)) email').andGroups).toEqual([
      [plain('auth'), plain('token')],
      [plain('email')],
    ]);
  });

  it('should split on an explicit AND', () => {
    expect(parseQuery('a AND b').andGroups).toEqual([[plain('a')], [plain('b')]]);
  });

  it('should keep an OR pending across an exclusion', () => {
    expect(parseQuery('a OR -b c')).toEqual({
      andGroups: [[plain('a'), plain('c')]],
      excluded: [{ text: 'b', exact: false, negated: true }],
      phrases: [],
    });
  });

  it('should run an unclosed quote or group to the end', () => {
    expect(parseQuery('reset "Forgotten Pass')).toEqual({
      andGroups: [[plain('reset')]],
      excluded: [],
      phrases: ['forgotten pass'],
    });
    expect(parseQuery('(a OR b').andGroups).toEqual([[plain('a'), plain('b')]]);
  });

  it('should report when nothing is left to match', () => {
    expect(isEmptyQuery(parseQuery('   '))).toBe(true);
    expect(isEmptyQuery(parseQuery('OR ( )'))).toBe(true);
    expect(isEmptyQuery(parseQuery('-draft'))).toBe(false);
  });
});
