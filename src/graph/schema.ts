/**
 * Relationship and root-eligibility rules for the traceability graph.
 */

import type { EdgeKind, NodeKind } from '../core/types.js';

/**
 * How a node kind takes part in root/orphan classification.
 */
export interface KindRule {
  /** `always`: root regardless of parents; `parentless`: root when it has none. */
  root: 'always' | 'parentless' | 'never';
  /** Whether a parentless, non-root node of this kind is reported as an orphan. */
  reportOrphan: boolean;
}

export const KIND_RULES: Record<NodeKind, KindRule> = {
  requirement: { root: 'parentless', reportOrphan: false },
  journey: { root: 'always', reportOrphan: false },
  assertion: { root: 'never', reportOrphan: true },
  code: { root: 'never', reportOrphan: true },
  test: { root: 'never', reportOrphan: true },
  result: { root: 'never', reportOrphan: true },
  remainder: { root: 'never', reportOrphan: false },
};

/**
 * Which node kinds an edge kind may connect.
 *
 * For `up` edges `from` is the child (the declaring node) and `to` the
 * parent; for `down` edges `from` is the parent.
 */
export interface RelationshipRule {
  from: readonly NodeKind[];
  to: readonly NodeKind[];
  direction: 'up' | 'down';
  contributesToCoverage: boolean;
}

export const RELATIONSHIPS: Record<EdgeKind, RelationshipRule> = {
  implements: {
    from: ['requirement', 'code'],
    to: ['requirement', 'assertion'],
    direction: 'up',
    contributesToCoverage: true,
  },
  refines: {
    from: ['requirement'],
    to: ['requirement', 'assertion'],
    direction: 'up',
    contributesToCoverage: false,
  },
  validates: {
    from: ['test', 'code'],
    to: ['requirement', 'assertion'],
    direction: 'up',
    contributesToCoverage: true,
  },
  addresses: {
    from: ['requirement'],
    to: ['journey'],
    direction: 'up',
    contributesToCoverage: false,
  },
  contains: {
    from: ['requirement', 'test'],
    to: ['assertion', 'result'],
    direction: 'down',
    contributesToCoverage: false,
  },
};

export function contributesToCoverage(kind: EdgeKind): boolean {
  return RELATIONSHIPS[kind].contributesToCoverage;
}

/**
 * Check an edge against the relationship rules.
 */
export function isAllowedRelationship(
  kind: EdgeKind,
  parentKind: NodeKind,
  childKind: NodeKind
): boolean {
  const rule = RELATIONSHIPS[kind];
  if (rule.direction === 'up') {
    return rule.from.includes(childKind) && rule.to.includes(parentKind);
  }
  return rule.from.includes(parentKind) && rule.to.includes(childKind);
}

/**
 * Kinds included in a subtree when the caller names none.
 */
export function defaultSubtreeKinds(rootKind: NodeKind): NodeKind[] {
  switch (rootKind) {
    case 'requirement':
      return ['requirement', 'assertion'];
    case 'journey':
      return ['journey', 'requirement'];
    default:
      return ['requirement', 'assertion', 'code', 'test', 'result', 'journey', 'remainder'];
  }
}
