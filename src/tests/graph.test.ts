import { describe, expect, it } from "vitest";

import { DependencyGraph } from "@/engine";

function sampleGraph(): DependencyGraph {
  const graph = new DependencyGraph();
  graph.addEdge("t-1", "stage-0", "stage");
  graph.addEdge("t-1", "stage-1", "stage");
  graph.addEdge("stage-0", "group-0", "group");
  return graph;
}

describe("dependency graph", () => {
  it("adds edges idempotently and creates missing nodes", () => {
    const graph = new DependencyGraph();
    graph.addEdge("t-1", "stage-0", "stage");
    graph.addEdge("t-1", "stage-0", "stage");

    expect(graph.edgeCount).toBe(1);
    expect(graph.nodeCount).toBe(2);
    expect(graph.hasEdge("t-1", "stage-0")).toBe(true);
    expect(graph.hasEdge("stage-0", "t-1")).toBe(false);
  });

  it("keeps both nodes when an edge is removed", () => {
    const graph = sampleGraph();
    graph.removeEdge("t-1", "stage-1");
    graph.removeEdge("t-1", "missing");

    expect(graph.hasEdge("t-1", "stage-1")).toBe(false);
    expect(graph.hasNode("stage-1")).toBe(true);
    expect(graph.edgeCount).toBe(2);
  });

  it("walks reachable nodes breadth first", () => {
    const graph = sampleGraph();
    graph.addNode("stage-9");

    expect(graph.bfs("t-1")).toEqual(["t-1", "stage-0", "stage-1", "group-0"]);
    expect(graph.bfs("stage-9")).toEqual(["stage-9"]);
    expect(graph.bfs("unknown")).toEqual([]);
  });

  it("terminates on cycles", () => {
    const graph = new DependencyGraph();
    graph.addEdge("a", "b", "stage");
    graph.addEdge("b", "a", "stage");

    expect(graph.bfs("a")).toEqual(["a", "b"]);
  });

  it("lists edges by direction and children by kind", () => {
    const graph = sampleGraph();

    expect(graph.edgesFrom("stage-0", "in")).toEqual([{ source: "t-1", target: "stage-0", kind: "stage" }]);
    expect(graph.edgesFrom("stage-0")).toEqual([{ source: "stage-0", target: "group-0", kind: "group" }]);
    expect(graph.edgesFrom("unknown")).toEqual([]);
    expect(graph.childrenOf("t-1", "stage")).toEqual(["stage-0", "stage-1"]);
    expect(graph.childrenOf("t-1", "group")).toEqual([]);
  });

  it("restores nodes and edges from json", () => {
    const graph = sampleGraph();
    graph.addNode("orphan");
    const restored = DependencyGraph.fromJSON(graph.toJSON());

    expect(restored.toJSON()).toEqual(graph.toJSON());
    expect(restored.hasNode("orphan")).toBe(true);
  });

  it("clones independently", () => {
    const graph = sampleGraph();
    const copy = graph.clone();
    copy.removeNode("stage-0");

    expect(graph.hasEdge("stage-0", "group-0")).toBe(true);
    expect(copy.hasNode("stage-0")).toBe(false);
    expect(copy.hasNode("group-0")).toBe(true);
  });
});
