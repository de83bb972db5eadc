import { describe, it } from "mocha";
import { expect } from "chai";

import { bfs, dfs, dijkstra, pathCost, reconstructPath, type Graph } from "../src/index.js";
import { randomGraph, referenceDistances, seededRandom, transitiveClosure } from "./helpers/graphs.js";

const SEEDS = [1, 7, 42, 1234, 98765];

function assertWalkable(graph: Graph, path: readonly number[], start: number, end: number): void {
  expect(path[0]).to.equal(start);
  expect(path[path.length - 1]).to.equal(end);
  for (let i = 1; i < path.length; i += 1) {
    expect(graph.hasEdge(path[i - 1], path[i]), `edge ${path[i - 1]} -> ${path[i]}`).to.equal(true);
  }
}

describe("traversal properties on random graphs", () => {
  for (const seed of SEEDS) {
    it(`agree with the reference closure and with each other (seed ${seed})`, () => {
      const random = seededRandom(seed);
      const graph = randomGraph(random, { nodes: 12, edges: 18 });
      const closure = transitiveClosure(graph);

      for (let start = 0; start < graph.nodeCount; start += 1) {
        for (let end = 0; end < graph.nodeCount; end += 1) {
          const broad = bfs(graph, start, end);
          const deep = dfs(graph, start, end);
          expect(broad.found, `bfs ${start} -> ${end}`).to.equal(closure[start][end]);
          expect(deep.found, `dfs ${start} -> ${end}`).to.equal(closure[start][end]);
          if (!broad.found) {
            continue;
          }

          const shortest = reconstructPath(broad.predecessors, start, end);
          const some = reconstructPath(deep.predecessors, start, end);
          assertWalkable(graph, shortest, start, end);
          assertWalkable(graph, some, start, end);
          expect(shortest.length).to.be.at.most(some.length);
        }
      }
    });

    it(`matches Bellman-Ford distances (seed ${seed})`, () => {
      const random = seededRandom(seed);
      const graph = randomGraph(random, { nodes: 10, edges: 25, maxWeight: 9 });

      for (let start = 0; start < graph.nodeCount; start += 1) {
        const expected = referenceDistances(graph, start);
        for (const tieBreak of ["last", "first"] as const) {
          const { distances, predecessors } = dijkstra(graph, start, { tieBreak });
          expect(distances).to.deep.equal(expected);
          expect(distances[start]).to.equal(0);
          for (let end = 0; end < graph.nodeCount; end += 1) {
            if (!Number.isFinite(distances[end])) {
              expect(predecessors[end]).to.equal(null);
              continue;
            }
            const path = reconstructPath(predecessors, start, end);
            assertWalkable(graph, path, start, end);
            expect(pathCost(graph, path)).to.equal(distances[end]);
          }
        }
      }
    });
  }
});
