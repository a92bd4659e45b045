/**
 * GraphNode - unified node representation for the traceability graph.
 *
 * A node never holds references to its neighbours. Adjacency is owned by
 * the graph's id-keyed index, reached through the `NodeRegistry` the node
 * was created with.
 */

import type {
  ContentByKind,
  CoverageContribution,
  MetricValue,
  NodeKind,
  RollupMetrics,
  SourceLocation,
} from '../core/types.js';

/**
 * Traversal order for `walk`.
 */
export type TraversalOrder = 'pre' | 'post' | 'level';

/**
 * What a node needs from the graph that owns it.
 */
export interface NodeRegistry {
  findById(id: string): GraphNode | undefined;
  childIdsOf(id: string): string[];
  parentIdsOf(id: string): string[];
  /** Idempotent. */
  attachChild(parentId: string, childId: string): void;
  /** Idempotent. */
  detachChild(parentId: string, childId: string): void;
}

export interface NodeInit<K extends NodeKind = NodeKind> {
  id: string;
  kind: K;
  label: string;
  content: ContentByKind[K];
  source?: SourceLocation;
}

export class GraphNode<K extends NodeKind = NodeKind> {
  private currentId: string;
  readonly kind: K;
  label: string;
  source?: SourceLocation;
  readonly content: ContentByKind[K];

  /** Computed by the coverage engine; not part of identity. */
  rollup?: RollupMetrics;
  /** Per-assertion evidence list; only filled for assertion nodes. */
  contributions: CoverageContribution[] = [];

  private readonly annotations = new Map<string, MetricValue>();

  constructor(
    init: NodeInit<K>,
    private readonly registry: NodeRegistry
  ) {
    this.currentId = init.id;
    this.kind = init.kind;
    this.label = init.label;
    this.content = init.content;
    this.source = init.source;
  }

  get id(): string {
    return this.currentId;
  }

  /**
   * Change the id without touching any index. Only the owning graph
   * calls this, as part of re-keying.
   */
  assignId(id: string): void {
    this.currentId = id;
  }

  getField<F extends keyof ContentByKind[K]>(field: F): ContentByKind[K][F] {
    return this.content[field];
  }

  setField<F extends keyof ContentByKind[K]>(field: F, value: ContentByKind[K][F]): void {
    this.content[field] = value;
  }

  getMetric(name: string): MetricValue | undefined {
    return this.annotations.get(name);
  }

  setMetric(name: string, value: MetricValue): void {
    this.annotations.set(name, value);
  }

  clearMetric(name: string): void {
    this.annotations.delete(name);
  }

  metricEntries(): [string, MetricValue][] {
    return Array.from(this.annotations.entries());
  }

  addChild(child: GraphNode): void {
    this.registry.attachChild(this.id, child.id);
  }

  removeChild(child: GraphNode): void {
    this.registry.detachChild(this.id, child.id);
  }

  children(): GraphNode[] {
    return this.resolve(this.registry.childIdsOf(this.id));
  }

  parents(): GraphNode[] {
    return this.resolve(this.registry.parentIdsOf(this.id));
  }

  hasParents(): boolean {
    return this.registry.parentIdsOf(this.id).length > 0;
  }

  /**
   * Shortest distance to a parentless ancestor (0 for parentless nodes).
   */
  depth(): number {
    const seen = new Set<string>([this.id]);
    let frontier: GraphNode[] = [this];
    let level = 0;

    while (frontier.length > 0) {
      const next: GraphNode[] = [];
      for (const node of frontier) {
        const parents = node.parents();
        if (parents.length === 0) return level;
        for (const parent of parents) {
          if (!seen.has(parent.id)) {
            seen.add(parent.id);
            next.push(parent);
          }
        }
      }
      if (next.length === 0) return level;
      frontier = next;
      level++;
    }
    return level;
  }

  /**
   * Iterate this node and its descendants. Each node is visited once,
   * so shared children and cycles terminate.
   */
  walk(order: TraversalOrder = 'pre'): Generator<GraphNode> {
    switch (order) {
      case 'pre':
        return this.walkPre(new Set());
      case 'post':
        return this.walkPost(new Set());
      case 'level':
        return this.walkLevel();
    }
  }

  /**
   * Iterate every ancestor once, nearest first.
   */
  *ancestors(): Generator<GraphNode> {
    const visited = new Set<string>([this.id]);
    const queue: GraphNode[] = this.parents();
    while (queue.length > 0) {
      const node = queue.shift();
      if (!node || visited.has(node.id)) continue;
      visited.add(node.id);
      yield node;
      queue.push(...node.parents());
    }
  }

  *find(predicate: (node: GraphNode) => boolean): Generator<GraphNode> {
    for (const node of this.walk()) {
      if (predicate(node)) yield node;
    }
  }

  *findByKind<T extends NodeKind>(kind: T): Generator<GraphNode<T>> {
    for (const node of this.walk()) {
      if (isKind(node, kind)) yield node;
    }
  }

  private resolve(ids: string[]): GraphNode[] {
    const nodes: GraphNode[] = [];
    for (const id of ids) {
      const node = this.registry.findById(id);
      if (node) nodes.push(node);
    }
    return nodes;
  }

  private *walkPre(visited: Set<string>): Generator<GraphNode> {
    if (visited.has(this.id)) return;
    visited.add(this.id);
    yield this;
    for (const child of this.children()) {
      yield* child.walkPre(visited);
    }
  }

  private *walkPost(visited: Set<string>): Generator<GraphNode> {
    if (visited.has(this.id)) return;
    visited.add(this.id);
    for (const child of this.children()) {
      yield* child.walkPost(visited);
    }
    yield this;
  }

  private *walkLevel(): Generator<GraphNode> {
    const visited = new Set<string>([this.id]);
    const queue: GraphNode[] = [this];
    while (queue.length > 0) {
      const node = queue.shift();
      if (!node) continue;
      yield node;
      for (const child of node.children()) {
        if (!visited.has(child.id)) {
          visited.add(child.id);
          queue.push(child);
        }
      }
    }
  }
}

/**
 * Narrow a node to a specific kind.
 */
export function isKind<T extends NodeKind>(node: GraphNode, kind: T): node is GraphNode<T> {
  return node.kind === kind;
}

/**
 * A requirement's assertions in physical order.
 */
export function assertionsOf(requirement: GraphNode): GraphNode<'assertion'>[] {
  return requirement
    .children()
    .filter((child): child is GraphNode<'assertion'> => isKind(child, 'assertion'));
}
