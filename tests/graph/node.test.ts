/**
 * Tests for node traversal.
 */

import { describe, it, expect } from 'vitest';
import { assertionsOf } from '../../src/graph/node.js';
import { assertions, build, requirement } from '../fixtures.js';

// REQ-p1 <- REQ-o1 <- REQ-d1, and REQ-p1 <- REQ-d1 directly (a diamond).
function diamond() {
  return build(
    requirement('REQ-p1', { assertions: assertions('A', 'B') }),
    requirement('REQ-o1', { level: 'OPS', implements: ['REQ-p1'] }),
    requirement('REQ-d1', { level: 'DEV', implements: ['REQ-o1', 'REQ-p1'] })
  );
}

describe('GraphNode.walk', () => {
  it('should visit each node once in pre-order', () => {
    const root = diamond().findById('REQ-p1');
    expect(Array.from(root?.walk('pre') ?? []).map((node) => node.id)).toEqual([
      'REQ-p1',
      'REQ-p1-A',
      'REQ-p1-B',
      'REQ-o1',
      'REQ-d1',
    ]);
  });

  it('should yield children before parents in post-order', () => {
    const root = diamond().findById('REQ-p1');
    expect(Array.from(root?.walk('post') ?? []).map((node) => node.id)).toEqual([
      'REQ-p1-A',
      'REQ-p1-B',
      'REQ-d1',
      'REQ-o1',
      'REQ-p1',
    ]);
  });

  it('should walk level by level', () => {
    const root = diamond().findById('REQ-p1');
    expect(Array.from(root?.walk('level') ?? []).map((node) => node.id)).toEqual([
      'REQ-p1',
      'REQ-p1-A',
      'REQ-p1-B',
      'REQ-o1',
      'REQ-d1',
    ]);
  });
});

describe('GraphNode ancestry', () => {
  it('should list ancestors nearest first without the node itself', () => {
    const node = diamond().findById('REQ-d1');
    expect(Array.from(node?.ancestors() ?? []).map((n) => n.id)).toEqual(['REQ-o1', 'REQ-p1']);
  });

  it('should measure depth as the shortest path to a parentless node', () => {
    const graph = diamond();
    expect(graph.findById('REQ-p1')?.depth()).toBe(0);
    expect(graph.findById('REQ-o1')?.depth()).toBe(1);
    expect(graph.findById('REQ-d1')?.depth()).toBe(1);
  });

  it('should return assertions in physical order', () => {
    const graph = diamond();
    const root = graph.findById('REQ-p1');
    expect(root ? assertionsOf(root).map((a) => a.getField('label')) : []).toEqual(['A', 'B']);
  });

  it('should keep metrics outside identity content', () => {
    const node = diamond().findById('REQ-p1');
    node?.setMetric('flag', true);
    expect(node?.getMetric('flag')).toBe(true);
    node?.clearMetric('flag');
    expect(node?.getMetric('flag')).toBeUndefined();
  });
});
