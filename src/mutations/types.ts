/**
 * Mutation records. Every operation carries a typed before/after payload
 * holding exactly what undo needs to invert it.
 */

import type {
  BrokenReference,
  ContentByKind,
  Edge,
  EdgeKind,
  MetricValue,
  NodeKind,
  SourceLocation,
} from '../core/types.js';

/**
 * Plain copy of a node, enough to re-create it at its old index position.
 */
export interface NodeSnapshot {
  id: string;
  kind: NodeKind;
  label: string;
  content: ContentByKind[NodeKind];
  source?: SourceLocation;
  metrics: [string, MetricValue][];
  position: number;
}

/**
 * Plain copy of an edge with its positions in both adjacency lists.
 */
export interface EdgeSnapshot extends Edge {
  outgoingIndex: number;
  incomingIndex: number;
}

export interface IdRename {
  from: string;
  to: string;
}

export interface LabelRename {
  fromLabel: string;
  toLabel: string;
  fromId: string;
  toId: string;
}

/**
 * What linking did to the edge list: added an edge, merged labels into an
 * existing targeted edge, or nothing (an equal edge was already there).
 */
export type LinkChange =
  | { kind: 'created' }
  | { kind: 'merged'; previousTargets: string[] }
  | { kind: 'none' };

export interface IndexedBrokenReference {
  reference: BrokenReference;
  index: number;
}

export interface EdgeTargets {
  childId: string;
  kind: EdgeKind;
  assertionTargets: string[];
}

export type MutationRecord =
  | {
      operation: 'rename_node';
      before: { id: string };
      after: { id: string; cascaded: IdRename[] };
    }
  | {
      operation: 'update_title';
      before: { title: string };
      after: { title: string };
    }
  | {
      operation: 'change_status';
      before: { status: string };
      after: { status: string };
    }
  | {
      operation: 'add_requirement';
      before: null;
      after: {
        id: string;
        title: string;
        level: string;
        status: string;
        parentId?: string;
        edgeKind?: EdgeKind;
      };
    }
  | {
      operation: 'delete_requirement';
      before: {
        node: NodeSnapshot;
        assertions: NodeSnapshot[];
        /** In removal order. */
        edges: EdgeSnapshot[];
        /** Broken references the requirement declared, ascending by index. */
        broken: IndexedBrokenReference[];
      };
      after: { orphaned: string[] };
    }
  | {
      operation: 'add_assertion';
      before: { hash: string };
      after: { assertionId: string; label: string; text: string; hash: string };
    }
  | {
      operation: 'update_assertion';
      before: { text: string; hash: string };
      after: { text: string; hash: string };
    }
  | {
      operation: 'delete_assertion';
      before: {
        node: NodeSnapshot;
        requirementId: string;
        /** Targets of every outgoing requirement edge, in list order. */
        targets: EdgeTargets[];
        hash: string;
      };
      after: {
        compacted: boolean;
        renames: LabelRename[];
        /** The contains edge first, then emptied reference edges, in removal order. */
        removedEdges: EdgeSnapshot[];
        brokenAdded: BrokenReference[];
        hash: string;
      };
    }
  | {
      operation: 'rename_assertion';
      before: { id: string; label: string; hash: string };
      after: { id: string; label: string; hash: string };
    }
  | {
      operation: 'add_edge';
      before: { link: LinkChange | null };
      after: {
        childId: string;
        parentId: string;
        kind: EdgeKind;
        assertionTargets: string[];
        broken: boolean;
      };
    }
  | {
      operation: 'change_edge_kind';
      before: { kind: EdgeKind };
      after: { kind: EdgeKind; childId: string; parentId: string; assertionTargets: string[] };
    }
  | {
      operation: 'delete_edge';
      before: { edges: EdgeSnapshot[] };
      after: { becameOrphan: boolean };
    }
  | {
      operation: 'fix_broken_reference';
      before: IndexedBrokenReference & { link: LinkChange | null };
      after: {
        newTargetId: string;
        fixed: boolean;
        stillBroken: boolean;
        edge?: Edge;
      };
    };

export type MutationOperation = MutationRecord['operation'];

export type MutationEntry = MutationRecord & {
  id: string;
  targetId: string;
  affectsHash: boolean;
  timestamp: string;
};

/**
 * A logged entry whose operation this release does not recognise, such as
 * one carried over from a newer release's history. Undo skips it.
 */
export interface UnrecognizedEntry {
  id: string;
  targetId: string;
  operation: string;
  affectsHash: boolean;
  timestamp: string;
  before?: unknown;
  after?: unknown;
}

export type LoggedEntry = MutationEntry | UnrecognizedEntry;

const OPERATIONS: Record<MutationOperation, true> = {
  rename_node: true,
  update_title: true,
  change_status: true,
  add_requirement: true,
  delete_requirement: true,
  add_assertion: true,
  update_assertion: true,
  delete_assertion: true,
  rename_assertion: true,
  add_edge: true,
  change_edge_kind: true,
  delete_edge: true,
  fix_broken_reference: true,
};

const KNOWN_OPERATIONS: ReadonlySet<string> = new Set(Object.keys(OPERATIONS));

export function isRecognized(entry: LoggedEntry): entry is MutationEntry {
  return KNOWN_OPERATIONS.has(entry.operation);
}
