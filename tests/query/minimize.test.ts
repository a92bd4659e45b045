/**
 * Tests for requirement set minimization.
 */

import { describe, it, expect } from 'vitest';
import { ancestorsOf, minimizeRequirementSet } from '../../src/query/minimize.js';
import { build, requirement } from '../fixtures.js';

function chain() {
  return build(
    requirement('REQ-c'),
    requirement('REQ-b', { implements: ['REQ-c'] }),
    requirement('REQ-a', { implements: ['REQ-b'] })
  );
}

describe('minimizeRequirementSet', () => {
  it('should keep only the most specific requirement of a chain', () => {
    const result = minimizeRequirementSet(chain(), ['REQ-a', 'REQ-b', 'REQ-c']);

    expect(result).toEqual({
      minimalSet: ['REQ-a'],
      pruned: [
        { id: 'REQ-b', supersededBy: ['REQ-a'] },
        { id: 'REQ-c', supersededBy: ['REQ-a'] },
      ],
      notFound: [],
      stats: { inputCount: 3, minimalCount: 1, prunedCount: 2 },
    });
  });

  it('should report unknown ids separately', () => {
    const result = minimizeRequirementSet(chain(), ['REQ-c', 'REQ-zz']);
    expect(result.minimalSet).toEqual(['REQ-c']);
    expect(result.notFound).toEqual(['REQ-zz']);
    expect(result.stats).toEqual({ inputCount: 2, minimalCount: 1, prunedCount: 0 });
  });

  it('should count repeated ids once', () => {
    const result = minimizeRequirementSet(chain(), ['REQ-a', 'REQ-b', 'REQ-a', 'REQ-zz', 'REQ-zz']);
    expect(result.minimalSet).toEqual(['REQ-a']);
    expect(result.notFound).toEqual(['REQ-zz']);
    expect(result.stats).toEqual({ inputCount: 3, minimalCount: 1, prunedCount: 1 });
  });

  it('should only follow the given edge kinds', () => {
    const result = minimizeRequirementSet(chain(), ['REQ-a', 'REQ-c'], ['refines']);
    expect(result.minimalSet).toEqual(['REQ-a', 'REQ-c']);
  });

  it('should keep both sides of a cycle', () => {
    const graph = build(
      requirement('REQ-x', { refines: ['REQ-y'] }),
      requirement('REQ-y', { refines: ['REQ-x'] })
    );
    expect(minimizeRequirementSet(graph, ['REQ-x', 'REQ-y']).minimalSet).toEqual(['REQ-x', 'REQ-y']);
  });
});

describe('ancestorsOf', () => {
  it('should collect every ancestor through matching edges', () => {
    expect(Array.from(ancestorsOf(chain(), 'REQ-a', ['implements'])).sort()).toEqual(['REQ-b', 'REQ-c']);
  });
});
