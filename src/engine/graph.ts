import { DirectedGraph } from "graphology";

import type { ID } from "@/models";

export type DependencyKind = "stage" | "group";

export type EdgeDirection = "out" | "in";

export interface DependencyEdge {
  source: ID;
  target: ID;
  kind: DependencyKind;
}

interface EdgeAttributes {
  kind: DependencyKind;
}

export interface DependencyGraphSnapshot {
  nodes: ID[];
  edges: DependencyEdge[];
}

/**
 * Traversal index over entity ids.
 *
 * Children only store a back-reference to their parent, the graph holds the
 * parent -> child edges used for top-down traversal. It never holds entity
 * data, only reachability.
 */
export class DependencyGraph {
  private readonly graph = new DirectedGraph<Record<string, never>, EdgeAttributes>();

  get nodeCount(): number {
    return this.graph.order;
  }

  get edgeCount(): number {
    return this.graph.size;
  }

  hasNode(id: ID): boolean {
    return this.graph.hasNode(id);
  }

  hasEdge(parent: ID, child: ID): boolean {
    return this.graph.hasDirectedEdge(parent, child);
  }

  addNode(id: ID): void {
    this.graph.mergeNode(id);
  }

  /** Idempotent; missing nodes are created. */
  addEdge(parent: ID, child: ID, kind: DependencyKind): void {
    this.graph.mergeEdge(parent, child, { kind });
  }

  /** Soft unlink: nodes stay in place. */
  removeEdge(parent: ID, child: ID): void {
    if (this.graph.hasDirectedEdge(parent, child)) {
      this.graph.dropDirectedEdge(parent, child);
    }
  }

  removeNode(id: ID): void {
    if (this.graph.hasNode(id)) {
      this.graph.dropNode(id);
    }
  }

  edgesFrom(node: ID, direction: EdgeDirection = "out"): DependencyEdge[] {
    if (!this.graph.hasNode(node)) {
      return [];
    }
    const edges: DependencyEdge[] = [];
    const collect = (_edge: string, attributes: EdgeAttributes, source: string, target: string): void => {
      edges.push({ source, target, kind: attributes.kind });
    };
    if (direction === "out") {
      this.graph.forEachOutEdge(node, collect);
    } else {
      this.graph.forEachInEdge(node, collect);
    }
    return edges;
  }

  childrenOf(node: ID, kind: DependencyKind): ID[] {
    return this.edgesFrom(node, "out")
      .filter((edge) => edge.kind === kind)
      .map((edge) => edge.target);
  }

  /** Breadth-first order of every node reachable from `root`, root included. */
  bfs(root: ID): ID[] {
    if (!this.graph.hasNode(root)) {
      return [];
    }
    const visited = new Set<ID>([root]);
    const order: ID[] = [];
    const queue: ID[] = [root];
    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined) {
        break;
      }
      order.push(current);
      this.graph.forEachOutNeighbor(current, (neighbor) => {
        if (!visited.has(neighbor)) {
          visited.add(neighbor);
          queue.push(neighbor);
        }
      });
    }
    return order;
  }

  clear(): void {
    this.graph.clear();
  }

  clone(): DependencyGraph {
    return DependencyGraph.fromJSON(this.toJSON());
  }

  toJSON(): DependencyGraphSnapshot {
    const edges: DependencyEdge[] = [];
    this.graph.forEachEdge((_edge, attributes, source, target) => {
      edges.push({ source, target, kind: attributes.kind });
    });
    return { nodes: this.graph.nodes(), edges };
  }

  static fromJSON(snapshot: DependencyGraphSnapshot): DependencyGraph {
    const graph = new DependencyGraph();
    snapshot.nodes.forEach((node) => graph.addNode(node));
    snapshot.edges.forEach((edge) => graph.addEdge(edge.source, edge.target, edge.kind));
    return graph;
  }
}
