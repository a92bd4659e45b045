/**
 * Structural validation. Every check runs; issues are collected into one
 * report instead of thrown.
 */

import type { ValidationIssue, ValidationReport } from '../core/types.js';
import type { TraceGraph } from './graph.js';
import { isAllowedRelationship } from './schema.js';

const WHITE = 0;
const GRAY = 1;
const BLACK = 2;

/**
 * Validate a built graph. `extra` carries builder issues (duplicate ids).
 */
export function validateGraph(graph: TraceGraph, extra: ValidationIssue[] = []): ValidationReport {
  const issues: ValidationIssue[] = [...extra];

  for (const cycle of detectCycles(graph)) {
    issues.push({
      type: 'cycle',
      severity: 'error',
      message: `Cycle detected: ${cycle.join(' -> ')}`,
      context: { cycle },
    });
  }

  for (const node of graph.orphans()) {
    issues.push({
      type: 'orphan',
      severity: 'warning',
      message: `Orphan ${node.kind}: ${node.id}`,
      context: { id: node.id, kind: node.kind },
    });
  }

  for (const ref of graph.brokenReferences()) {
    issues.push({
      type: 'broken_reference',
      severity: 'warning',
      message: `${ref.sourceId} ${ref.edgeKind} unknown target ${ref.targetId}`,
      context: { ...ref },
    });
  }

  for (const edge of graph.allEdges()) {
    const parent = graph.findById(edge.parentId);
    const child = graph.findById(edge.childId);
    if (!parent || !child) continue;
    if (!isAllowedRelationship(edge.kind, parent.kind, child.kind)) {
      issues.push({
        type: 'relationship_mismatch',
        severity: 'warning',
        message: `${child.kind} ${child.id} cannot ${edge.kind} ${parent.kind} ${parent.id}`,
        context: {
          parentId: parent.id,
          childId: child.id,
          kind: edge.kind,
          parentKind: parent.kind,
          childKind: child.kind,
        },
      });
    }
  }

  const errors = issues.filter((issue) => issue.severity === 'error');
  const warnings = issues.filter((issue) => issue.severity === 'warning');
  return { valid: errors.length === 0, errors, warnings };
}

/**
 * DFS over parent -> child edges. Each back edge yields one cycle path,
 * starting and ending with the same id.
 */
export function detectCycles(graph: TraceGraph): string[][] {
  const color = new Map<string, number>();
  const cycles: string[][] = [];

  for (const id of graph.nodeIds()) {
    color.set(id, WHITE);
  }

  const visit = (id: string, path: string[]): void => {
    color.set(id, GRAY);
    path.push(id);
    for (const next of graph.childIdsOf(id)) {
      const state = color.get(next);
      if (state === GRAY) {
        cycles.push([...path.slice(path.indexOf(next)), next]);
      } else if (state === WHITE) {
        visit(next, path);
      }
    }
    path.pop();
    color.set(id, BLACK);
  };

  for (const id of graph.nodeIds()) {
    if (color.get(id) === WHITE) {
      visit(id, []);
    }
  }
  return cycles;
}
