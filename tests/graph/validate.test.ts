/**
 * Tests for structural validation.
 */

import { describe, it, expect } from 'vitest';
import { buildGraph } from '../../src/graph/factory.js';
import { detectCycles, validateGraph } from '../../src/graph/validate.js';
import { build, codeRef, requirement, testRef } from '../fixtures.js';

describe('detectCycles', () => {
  it('should report an implements cycle with both ids', () => {
    const graph = build(
      requirement('REQ-a', { implements: ['REQ-b'] }),
      requirement('REQ-b', { implements: ['REQ-a'] })
    );
    expect(detectCycles(graph)).toEqual([['REQ-a', 'REQ-b', 'REQ-a']]);
  });

  it('should not treat a diamond as a cycle', () => {
    const graph = build(
      requirement('REQ-p1'),
      requirement('REQ-o1', { implements: ['REQ-p1'] }),
      requirement('REQ-o2', { implements: ['REQ-p1'] }),
      requirement('REQ-d1', { implements: ['REQ-o1', 'REQ-o2'] })
    );
    expect(detectCycles(graph)).toEqual([]);
  });
});

describe('validateGraph', () => {
  it('should collect every issue in one report', () => {
    const graph = build(
      requirement('REQ-a', { implements: ['REQ-b'] }),
      requirement('REQ-b', { implements: ['REQ-a'] }),
      requirement('REQ-c', { implements: ['REQ-missing'] }),
      testRef('test-orphan', [])
    );
    const report = validateGraph(graph);

    expect(report.valid).toBe(false);
    expect(report.errors.map((issue) => issue.message)).toEqual(['Cycle detected: REQ-a -> REQ-b -> REQ-a']);
    expect(report.warnings.map((issue) => issue.type)).toEqual(['orphan', 'broken_reference']);
    expect(report.warnings[1].message).toBe('REQ-c implements unknown target REQ-missing');
  });

  it('should warn about relationship kinds the schema does not allow', () => {
    const graph = build(
      requirement('REQ-p1'),
      codeRef('src/app.ts', 3, ['REQ-p1']),
      requirement('REQ-d1', { refines: ['code:src/app.ts:3'] })
    );
    const report = validateGraph(graph);

    expect(report.valid).toBe(true);
    expect(report.warnings).toEqual([
      {
        type: 'relationship_mismatch',
        severity: 'warning',
        message: 'requirement REQ-d1 cannot refines code code:src/app.ts:3',
        context: {
          parentId: 'code:src/app.ts:3',
          childId: 'REQ-d1',
          kind: 'refines',
          parentKind: 'code',
          childKind: 'requirement',
        },
      },
    ]);
  });

  it('should carry builder issues into the report', () => {
    const { report } = buildGraph([requirement('REQ-p1'), requirement('REQ-p1')]);
    expect(report.valid).toBe(false);
    expect(report.errors.map((issue) => issue.type)).toEqual(['duplicate_id']);
  });
});
