/**
 * Tests for the paginated cursor.
 */

import { describe, it, expect } from 'vitest';
import { annotateCoverage, emptyMetrics } from '../../src/coverage/rollup.js';
import { CursorSession } from '../../src/query/cursor.js';
import { expectFailure, expectOk } from '../fixtures.js';
import { queryFixture } from './graph.js';

const ids = (items: { id: string }[]) => items.map((item) => item.id);

describe('CursorSession', () => {
  it('should return the first item on open and count it as consumed', () => {
    const graph = queryFixture();
    annotateCoverage(graph);
    const session = new CursorSession(graph);
    const opened = expectOk(session.open({ type: 'search', query: 'REQ-' }));

    expect(opened).toMatchObject({ query: 'search', batchSize: 0, total: 4, position: 1, remaining: 3 });
    expect(opened.current).toMatchObject({
      id: 'REQ-p1',
      kind: 'requirement',
      title: 'User Authentication',
      match: { field: 'id', text: 'REQ-p1' },
      assertions: [
        { id: 'REQ-p1-A', label: 'A', text: 'The system shall do A.' },
        { id: 'REQ-p1-B', label: 'B', text: 'The system shall do B.' },
      ],
    });
    // A: test-login directly, REQ-o1 by inference. B: REQ-o1 by inference.
    expect(opened.current?.coverage).toMatchObject({
      totalAssertions: 2,
      coveredAssertions: 2,
      directCovered: 1,
      inferredCovered: 2,
      directTested: 1,
      coveragePct: 100,
    });
    expect(opened.current?.children).toBeUndefined();
  });

  it('should page through the remaining items', () => {
    const session = new CursorSession(queryFixture());
    expectOk(session.open({ type: 'search', query: 'REQ-' }));

    const one = expectOk(session.next());
    const rest = expectOk(session.next(5));
    const after = expectOk(session.next());

    expect(ids(one.items)).toEqual(['REQ-o1']);
    expect(one.remaining).toBe(2);
    expect(ids(rest.items)).toEqual(['REQ-d1', 'REQ-x1']);
    expect(rest).toMatchObject({ count: 2, remaining: 0 });
    expect(after).toEqual({ items: [], count: 0, remaining: 0 });
  });

  it('should advance one item when no count is given', () => {
    const session = new CursorSession(queryFixture(), 2);
    expectOk(session.open({ type: 'search', query: 'REQ-' }));

    expect(ids(expectOk(session.next()).items)).toEqual(['REQ-o1']);
  });

  it('should report position without advancing', () => {
    const session = new CursorSession(queryFixture());
    expectOk(session.open({ type: 'search', query: 'REQ-' }, 3));

    expect(expectOk(session.info())).toEqual({ query: 'search', batchSize: 3, total: 4, position: 1, remaining: 3 });
    expect(expectOk(session.info()).position).toBe(1);
  });

  it('should open on an empty result', () => {
    const session = new CursorSession(queryFixture());
    const opened = expectOk(session.open({ type: 'search', query: 'nothing matches this' }));

    expect(opened).toEqual({ query: 'search', batchSize: 0, total: 0, position: 0, remaining: 0, current: null });
    expect(expectOk(session.next()).items).toEqual([]);
  });

  it('should fail without an open cursor', () => {
    const session = new CursorSession(queryFixture());
    expect(expectFailure(session.next())).toEqual({
      kind: 'invalid_state',
      message: 'No active cursor; open one first',
      context: {},
    });
    expect(expectFailure(session.info()).kind).toBe('invalid_state');
  });

  it('should forget the cursor on close', () => {
    const session = new CursorSession(queryFixture());
    expectOk(session.open({ type: 'search', query: 'REQ-' }));
    session.close();

    expect(session.isOpen()).toBe(false);
    expect(expectFailure(session.next()).kind).toBe('invalid_state');
  });

  it('should keep the previous cursor when opening fails', () => {
    const session = new CursorSession(queryFixture());
    expectOk(session.open({ type: 'search', query: 'REQ-' }));
    expectOk(session.next());

    const failed = session.open({ type: 'scoped_search', query: '', scopeId: 'REQ-nope' });

    expect(expectFailure(failed).kind).toBe('not_found');
    expect(expectOk(session.info())).toMatchObject({ query: 'search', position: 2 });
  });

  it('should replace an open cursor', () => {
    const session = new CursorSession(queryFixture());
    expectOk(session.open({ type: 'search', query: 'REQ-' }));
    const opened = expectOk(session.open({ type: 'scoped_search', query: '', scopeId: 'REQ-d1', direction: 'ancestors' }));

    expect(opened).toMatchObject({ query: 'scoped_search', total: 3, position: 1 });
    expect(ids(expectOk(session.next(2)).items)).toEqual(['REQ-o1', 'REQ-p1']);
  });

  it('should carry depth for subtree items', () => {
    const session = new CursorSession(queryFixture());
    const opened = expectOk(session.open({ type: 'subtree', rootId: 'REQ-p1', kinds: ['requirement', 'test'] }));
    const page = expectOk(session.next(3));

    expect(opened.current).toMatchObject({ id: 'REQ-p1', depth: 0 });
    expect(page.items.map((item) => [item.id, item.kind, item.depth])).toEqual([
      ['REQ-o1', 'requirement', 1],
      ['test-login', 'test', 1],
      ['REQ-d1', 'requirement', 2],
    ]);
    expect(page.items[1].assertions).toBeUndefined();
  });
});

describe('CursorSession item shapes', () => {
  it('should emit assertions as items after their requirement at -1', () => {
    const session = new CursorSession(queryFixture(), -1);
    const opened = expectOk(session.open({ type: 'search', query: 'REQ-' }));
    const page = expectOk(session.next(2));

    expect(opened.total).toBe(6);
    expect(opened.current).toEqual({
      id: 'REQ-p1',
      kind: 'requirement',
      title: 'User Authentication',
      match: { field: 'id', text: 'REQ-p1' },
    });
    expect(page.items).toEqual([
      { id: 'REQ-p1-A', kind: 'assertion', title: 'The system shall do A.', label: 'A' },
      { id: 'REQ-p1-B', kind: 'assertion', title: 'The system shall do B.', label: 'B' },
    ]);
    expect(ids(expectOk(session.next(5)).items)).toEqual(['REQ-o1', 'REQ-d1', 'REQ-x1']);
  });

  it('should keep subtree assertions as items at -1 and drop them from the list at 0', () => {
    const graph = queryFixture();
    const flat = new CursorSession(graph, -1);
    const inline = new CursorSession(graph, 0);
    expectOk(flat.open({ type: 'subtree', rootId: 'REQ-p1' }));
    expectOk(inline.open({ type: 'subtree', rootId: 'REQ-p1' }));

    const flatItems = expectOk(flat.next(10)).items;
    expect(ids(flatItems)).toEqual(['REQ-p1-A', 'REQ-p1-B', 'REQ-o1', 'REQ-d1']);
    expect(flatItems[0]).toEqual({
      id: 'REQ-p1-A',
      kind: 'assertion',
      title: 'The system shall do A.',
      label: 'A',
      depth: 1,
    });
    expect(flatItems[2].assertions).toBeUndefined();

    const inlineItems = expectOk(inline.next(10)).items;
    expect(ids(inlineItems)).toEqual(['REQ-o1', 'REQ-d1']);
    expect(inlineItems[0].assertions).toEqual([]);
    expect(inlineItems[0].coverage).toEqual(emptyMetrics());
  });

  it('should list non-assertion children of requirements at 1', () => {
    const session = new CursorSession(queryFixture(), 1);
    const opened = expectOk(session.open({ type: 'subtree', rootId: 'REQ-p1' }));
    const rest = expectOk(session.next(10)).items;

    expect(opened.current?.children).toEqual([
      { id: 'REQ-o1', kind: 'requirement', title: 'Session storage' },
      { id: 'test-login', kind: 'test', title: 'test-login' },
    ]);
    expect(rest.map((item) => [item.id, item.children])).toEqual([
      ['REQ-o1', [{ id: 'REQ-d1', kind: 'requirement', title: 'Token refresh' }]],
      ['REQ-d1', []],
    ]);
  });
});

describe('CursorSession hierarchy query', () => {
  it('should list ancestors nearest first, then direct children', () => {
    const session = new CursorSession(queryFixture());
    const opened = expectOk(session.open({ type: 'hierarchy', reqId: 'REQ-o1' }));
    const rest = expectOk(session.next(10)).items;

    expect(opened).toMatchObject({ query: 'hierarchy', total: 3 });
    expect(opened.current).toMatchObject({ id: 'REQ-p1', section: 'ancestor' });
    expect(rest.map((item) => [item.id, item.kind, item.section])).toEqual([
      ['JNY-1', 'journey', 'ancestor'],
      ['REQ-d1', 'requirement', 'child'],
    ]);
  });

  it('should include assertion children as items at -1', () => {
    const session = new CursorSession(queryFixture(), -1);
    const opened = expectOk(session.open({ type: 'hierarchy', reqId: 'REQ-p1' }));
    const rest = expectOk(session.next(10)).items;

    expect(opened.current).toEqual({ id: 'JNY-1', kind: 'journey', title: 'Sign in', section: 'ancestor' });
    expect(rest.map((item) => [item.id, item.section])).toEqual([
      ['REQ-p1-A', 'child'],
      ['REQ-p1-B', 'child'],
      ['REQ-o1', 'child'],
      ['test-login', 'child'],
    ]);
  });

  it('should reject unknown ids and non-requirements', () => {
    const session = new CursorSession(queryFixture());
    expect(expectFailure(session.open({ type: 'hierarchy', reqId: 'REQ-nope' }))).toEqual({
      kind: 'not_found',
      message: 'Requirement not found: REQ-nope',
      context: { id: 'REQ-nope' },
    });
    expect(expectFailure(session.open({ type: 'hierarchy', reqId: 'JNY-1' })).kind).toBe('invalid_state');
    expect(session.isOpen()).toBe(false);
  });
});
