import { AllocationError, BoundsError, InvalidWeightError, NameAlreadySetError } from "../errors.js";

/** Default node ceiling applied when the caller does not configure one. */
export const DEFAULT_MAX_NODES = 1_000_000;

export interface Neighbor {
  readonly to: number;
  readonly weight: number;
}

export interface GraphOptions {
  /** Largest node count the graph accepts; larger requests raise {@link AllocationError}. */
  readonly maxNodes?: number;
}

/**
 * Adjacency-list graph over a fixed set of integer nodes `[0, nodeCount)`.
 *
 * Edges are appended while the graph is being built and never removed.
 * {@link neighbors} walks each list from the most recently added edge back to
 * the first one, so traversal order depends on insertion order.
 */
export class Graph {
  readonly nodeCount: number;
  private readonly adjacency: Neighbor[][];
  private readonly names: Array<string | undefined>;
  private readonly nameIndex = new Map<string, number>();
  private edges = 0;

  constructor(nodeCount: number, options: GraphOptions = {}) {
    const limit = options.maxNodes ?? DEFAULT_MAX_NODES;
    if (!Number.isSafeInteger(nodeCount) || nodeCount < 0 || nodeCount > limit) {
      throw new AllocationError(nodeCount, limit);
    }
    this.nodeCount = nodeCount;
    this.adjacency = Array.from({ length: nodeCount }, () => []);
    this.names = new Array<string | undefined>(nodeCount).fill(undefined);
  }

  get edgeCount(): number {
    return this.edges;
  }

  addEdge(src: number, dest: number, weight = 1): void {
    this.assertNode(src);
    this.assertNode(dest);
    if (!Number.isSafeInteger(weight) || weight < 0) {
      throw new InvalidWeightError(weight, src, dest);
    }
    this.adjacency[src].push({ to: dest, weight });
    this.edges += 1;
  }

  /** Inserts `u -> v` then `v -> u` with the same weight. */
  addUndirectedEdge(u: number, v: number, weight = 1): void {
    this.assertNode(u);
    this.assertNode(v);
    this.addEdge(u, v, weight);
    this.addEdge(v, u, weight);
  }

  /**
   * Outgoing edges of `node`, newest first. The returned iterable is lazy and
   * can be iterated any number of times.
   */
  neighbors(node: number): Iterable<Neighbor> {
    this.assertNode(node);
    const list = this.adjacency[node];
    return {
      *[Symbol.iterator]() {
        for (let i = list.length - 1; i >= 0; i -= 1) {
          yield list[i];
        }
      },
    };
  }

  outDegree(node: number): number {
    this.assertNode(node);
    return this.adjacency[node].length;
  }

  hasEdge(src: number, dest: number): boolean {
    return this.edgeWeight(src, dest) !== undefined;
  }

  /** Cheapest weight among the parallel `src -> dest` edges, if any. */
  edgeWeight(src: number, dest: number): number | undefined {
    this.assertNode(src);
    this.assertNode(dest);
    let best: number | undefined;
    for (const edge of this.adjacency[src]) {
      if (edge.to === dest && (best === undefined || edge.weight < best)) {
        best = edge.weight;
      }
    }
    return best;
  }

  setName(node: number, name: string): void {
    this.assertNode(node);
    if (this.names[node] !== undefined) {
      throw new NameAlreadySetError(node, name, "renamed");
    }
    if (this.nameIndex.has(name)) {
      throw new NameAlreadySetError(node, name, "duplicate");
    }
    this.names[node] = name;
    this.nameIndex.set(name, node);
  }

  name(node: number): string | undefined {
    this.assertNode(node);
    return this.names[node];
  }

  indexOf(name: string): number | undefined {
    return this.nameIndex.get(name);
  }

  /** Throws {@link BoundsError} unless `node` is an integer in `[0, nodeCount)`. */
  assertNode(node: number): void {
    if (!Number.isInteger(node) || node < 0 || node >= this.nodeCount) {
      throw new BoundsError(node, this.nodeCount);
    }
  }
}
