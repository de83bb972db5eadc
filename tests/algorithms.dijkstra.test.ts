import { describe, it } from "mocha";
import { expect } from "chai";

import { dijkstra } from "../src/algorithms/dijkstra.js";
import { reconstructPath } from "../src/algorithms/path.js";
import { BoundsError, DistanceOverflowError } from "../src/errors.js";
import { Graph } from "../src/graph/model.js";
import { loadTransitNetwork } from "../src/transit/network.js";
import { dataFile } from "./helpers/graphs.js";

const INF = Number.POSITIVE_INFINITY;

function weighted(nodeCount: number, edges: Array<[number, number, number]>): Graph {
  const graph = new Graph(nodeCount);
  for (const [src, dest, weight] of edges) {
    graph.addEdge(src, dest, weight);
  }
  return graph;
}

describe("algorithms/dijkstra", () => {
  it("prefers a cheaper two-hop route over an expensive direct edge", () => {
    const graph = weighted(3, [
      [0, 1, 10],
      [1, 2, 5],
      [0, 2, 20],
    ]);
    const { distances, predecessors } = dijkstra(graph, 0);
    expect(distances).to.deep.equal([0, 10, 15]);
    expect(predecessors).to.deep.equal([null, 0, 1]);
    expect(reconstructPath(predecessors, 0, 2)).to.deep.equal([0, 1, 2]);
  });

  it("reports infinity and no predecessor for unreachable nodes", () => {
    const graph = weighted(4, [
      [0, 1, 3],
      [3, 0, 1],
    ]);
    const { distances, predecessors } = dijkstra(graph, 0);
    expect(distances).to.deep.equal([0, 3, INF, INF]);
    expect(predecessors).to.deep.equal([null, 0, null, null]);
  });

  it("handles a single node and zero-weight edges", () => {
    expect(dijkstra(new Graph(1), 0).distances).to.deep.equal([0]);
    const graph = weighted(3, [
      [0, 1, 0],
      [1, 2, 0],
    ]);
    expect(dijkstra(graph, 0).distances).to.deep.equal([0, 0, 0]);
  });

  describe("tie-break policy", () => {
    const diamond = (): Graph =>
      weighted(4, [
        [0, 1, 1],
        [0, 2, 1],
        [1, 3, 1],
        [2, 3, 1],
      ]);

    it("settles the highest-index tied node first by default", () => {
      const { distances, predecessors } = dijkstra(diamond(), 0);
      expect(distances).to.deep.equal([0, 1, 1, 2]);
      expect(predecessors[3]).to.equal(2);
    });

    it("settles the lowest-index tied node first when configured", () => {
      const { distances, predecessors } = dijkstra(diamond(), 0, { tieBreak: "first" });
      expect(distances).to.deep.equal([0, 1, 1, 2]);
      expect(predecessors[3]).to.equal(1);
    });
  });

  it("computes the sample network's travel times", async () => {
    const { graph } = await loadTransitNetwork(dataFile("transit.yaml"));
    const { distances, predecessors } = dijkstra(graph, 0);
    expect(distances).to.deep.equal([0, 10, 15, 30, 23, 55, 41, INF, 40, 63]);
    expect(predecessors).to.deep.equal([null, 0, 0, 1, 2, 3, 4, null, 3, 6]);
  });

  it("rejects a source outside the graph", () => {
    expect(() => dijkstra(new Graph(2), 2)).to.throw(BoundsError);
  });

  it("accepts costs up to the largest exact integer", () => {
    const graph = weighted(3, [
      [0, 1, Number.MAX_SAFE_INTEGER - 1],
      [1, 2, 1],
    ]);
    expect(dijkstra(graph, 0).distances).to.deep.equal([0, Number.MAX_SAFE_INTEGER - 1, Number.MAX_SAFE_INTEGER]);
  });

  it("refuses to compare costs that no longer fit in an exact integer", () => {
    const graph = weighted(4, [
      [0, 2, Number.MAX_SAFE_INTEGER],
      [2, 1, 1],
      [0, 3, Number.MAX_SAFE_INTEGER],
      [3, 1, 2],
    ]);
    expect(() => dijkstra(graph, 0)).to.throw(DistanceOverflowError, `exceeds ${Number.MAX_SAFE_INTEGER}`);
  });
});
