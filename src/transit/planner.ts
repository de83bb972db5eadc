import { dijkstra, type TieBreak } from "../algorithms/dijkstra.js";
import { reconstructPath } from "../algorithms/path.js";
import type { Graph } from "../graph/model.js";
import type { StructuredLogger } from "../logger.js";
import { resolveStation, type StationRef, type TransitNetwork } from "./network.js";

export interface Station {
  readonly index: number;
  readonly name: string;
}

export interface RouteLeg {
  readonly from: Station;
  readonly to: Station;
  readonly weight: number;
}

export type RoutePlan =
  | { readonly status: "same-station"; readonly origin: Station; readonly destination: Station; readonly total: 0 }
  | { readonly status: "unreachable"; readonly origin: Station; readonly destination: Station }
  | {
      readonly status: "found";
      readonly origin: Station;
      readonly destination: Station;
      readonly total: number;
      readonly stations: Station[];
      readonly legs: RouteLeg[];
    };

export interface PlanRouteOptions {
  readonly tieBreak?: TieBreak;
  readonly logger?: StructuredLogger;
}

function station(graph: Graph, index: number): Station {
  return { index, name: graph.name(index) ?? String(index) };
}

export function listStations(network: TransitNetwork): Station[] {
  const stations: Station[] = [];
  for (let index = 0; index < network.graph.nodeCount; index += 1) {
    stations.push(station(network.graph, index));
  }
  return stations;
}

/**
 * Computes the cheapest route between two stations. An unreachable
 * destination is reported through the `"unreachable"` status rather than an
 * exception.
 */
export function planRoute(
  network: TransitNetwork,
  from: StationRef,
  to: StationRef,
  options: PlanRouteOptions = {},
): RoutePlan {
  const { graph } = network;
  const start = resolveStation(graph, from);
  const end = resolveStation(graph, to);
  const origin = station(graph, start);
  const destination = station(graph, end);

  if (start === end) {
    options.logger?.debug("route_planned", { status: "same-station", from: origin.name });
    return { status: "same-station", origin, destination, total: 0 };
  }

  // Omit `tieBreak` entirely when unset; exactOptionalPropertyTypes rejects an explicit undefined.
  const searchOptions = options.tieBreak === undefined ? {} : { tieBreak: options.tieBreak };
  const { distances, predecessors } = dijkstra(graph, start, searchOptions);
  const total = distances[end];
  const nodes = Number.isFinite(total) ? reconstructPath(predecessors, start, end) : [];
  if (nodes.length === 0) {
    options.logger?.debug("route_planned", { status: "unreachable", from: origin.name, to: destination.name });
    return { status: "unreachable", origin, destination };
  }

  const stations = nodes.map((node) => station(graph, node));
  const legs: RouteLeg[] = [];
  for (let i = 1; i < stations.length; i += 1) {
    const weight = distances[nodes[i]] - distances[nodes[i - 1]];
    legs.push({ from: stations[i - 1], to: stations[i], weight });
  }

  options.logger?.debug("route_planned", {
    status: "found",
    from: origin.name,
    to: destination.name,
    total,
    hops: legs.length,
  });
  return { status: "found", origin, destination, total, stations, legs };
}
