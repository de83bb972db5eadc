import { readFile } from "node:fs/promises";

import { parse as parseYaml } from "yaml";
import { z } from "zod";

import { TransitNetworkError } from "../errors.js";
import { Graph, type GraphOptions } from "../graph/model.js";

/** Stations may be referenced either by name or by their position in `stations`. */
const stationRefSchema = z.union([z.string().trim().min(1), z.number().int().nonnegative()]);

const connectionSchema = z.object({
  from: stationRefSchema,
  to: stationRefSchema,
  // Range checks happen when the edge is inserted into the graph.
  weight: z.number(),
});

export const transitDocumentSchema = z.object({
  name: z.string().min(1).optional(),
  unit: z.string().min(1).default("minutes"),
  stations: z.array(z.string().trim().min(1)).min(1),
  connections: z.array(connectionSchema).default([]),
});

export type StationRef = z.infer<typeof stationRefSchema>;
export type TransitDocument = z.infer<typeof transitDocumentSchema>;

export interface TransitNetwork {
  readonly name: string | null;
  readonly unit: string;
  readonly graph: Graph;
}

/** Resolves a station name or index to its node, throwing for unknown references. */
export function resolveStation(graph: Graph, ref: StationRef): number {
  if (typeof ref === "number") {
    if (ref >= graph.nodeCount) {
      throw new TransitNetworkError(`station index ${ref} is out of range (0-${graph.nodeCount - 1})`, {
        station: ref,
      });
    }
    return ref;
  }
  const index = graph.indexOf(ref);
  if (index === undefined) {
    throw new TransitNetworkError(`unknown station '${ref}'`, { station: ref });
  }
  return index;
}

/**
 * Resolves a station typed as free text, e.g. on the command line. A declared
 * station name wins; otherwise an all-digit value is read as an index.
 */
export function resolveStationArgument(graph: Graph, value: string): number {
  const named = graph.indexOf(value);
  if (named !== undefined) {
    return named;
  }
  return resolveStation(graph, /^\d+$/.test(value) ? Number.parseInt(value, 10) : value);
}

/**
 * Builds the weighted directed graph of a transit document. Connections are
 * inserted exactly as listed, so `A -> B` and `B -> A` may carry different
 * weights.
 */
export function buildTransitNetwork(input: unknown, options: GraphOptions = {}): TransitNetwork {
  const document = transitDocumentSchema.parse(input);
  const seen = new Set<string>();
  for (const station of document.stations) {
    if (seen.has(station)) {
      throw new TransitNetworkError(`station '${station}' is declared more than once`, { station });
    }
    seen.add(station);
  }

  const graph = new Graph(document.stations.length, options);
  document.stations.forEach((station, index) => graph.setName(index, station));
  for (const connection of document.connections) {
    graph.addEdge(resolveStation(graph, connection.from), resolveStation(graph, connection.to), connection.weight);
  }

  return { name: document.name ?? null, unit: document.unit, graph };
}

/** Parses YAML (or JSON, which YAML accepts) network source text. */
export function parseTransitNetwork(source: string, options: GraphOptions = {}): TransitNetwork {
  return buildTransitNetwork(parseYaml(source), options);
}

export async function loadTransitNetwork(file: string, options: GraphOptions = {}): Promise<TransitNetwork> {
  const source = await readFile(file, "utf8");
  return parseTransitNetwork(source, options);
}
