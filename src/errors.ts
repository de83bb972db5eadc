/**
 * Error taxonomy shared by the graph core and the maze/transit loaders. Every
 * error carries a stable {@link WaypathError.code} so the CLI can report the
 * failure consistently without inspecting class names.
 */
export const ERROR_CODES = {
  GRAPH_ALLOCATION: "E-GRAPH-ALLOC",
  GRAPH_BOUNDS: "E-GRAPH-BOUNDS",
  GRAPH_WEIGHT: "E-GRAPH-WEIGHT",
  GRAPH_NAME: "E-GRAPH-NAME",
  PATH_CYCLE: "E-PATH-CYCLE",
  PATH_EDGE: "E-PATH-EDGE",
  PATH_OVERFLOW: "E-PATH-OVERFLOW",
  MAZE_ENDPOINT: "E-MAZE-ENDPOINT",
  MAZE_FORMAT: "E-MAZE-FORMAT",
  TRANSIT_NETWORK: "E-TRANSIT-NETWORK",
  CLI_USAGE: "E-CLI-USAGE",
  INPUT_INVALID: "E-INPUT-INVALID",
  UNEXPECTED: "E-UNEXPECTED",
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export class WaypathError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, code: ErrorCode, details?: Record<string, unknown>) {
    super(message);
    this.name = "WaypathError";
    this.code = code;
    if (details !== undefined) {
      this.details = details;
    }
  }
}

/** Raised when graph storage cannot be sized for the requested node count. */
export class AllocationError extends WaypathError {
  constructor(readonly requested: number, readonly limit: number) {
    super(
      `cannot allocate a graph of ${String(requested)} nodes (limit ${limit})`,
      ERROR_CODES.GRAPH_ALLOCATION,
      { requested, limit },
    );
    this.name = "AllocationError";
  }
}

export class BoundsError extends WaypathError {
  constructor(readonly index: number, readonly nodeCount: number) {
    super(`node index ${String(index)} is outside [0, ${nodeCount})`, ERROR_CODES.GRAPH_BOUNDS, {
      index,
      nodeCount,
    });
    this.name = "BoundsError";
  }
}

export class InvalidWeightError extends WaypathError {
  constructor(readonly weight: number, readonly src: number, readonly dest: number) {
    super(
      `edge ${src} -> ${dest} has weight ${String(weight)}; weights must be non-negative integers`,
      ERROR_CODES.GRAPH_WEIGHT,
      { weight, src, dest },
    );
    this.name = "InvalidWeightError";
  }
}

/** Node names are write-once and unique across a graph. */
export class NameAlreadySetError extends WaypathError {
  constructor(readonly index: number, readonly stationName: string, readonly reason: "renamed" | "duplicate") {
    super(
      reason === "renamed"
        ? `node ${index} already has a name and cannot be renamed to '${stationName}'`
        : `name '${stationName}' is already used by another node`,
      ERROR_CODES.GRAPH_NAME,
      { index, name: stationName, reason },
    );
    this.name = "NameAlreadySetError";
  }
}

/**
 * Raised when walking a predecessor array takes more steps than there are
 * nodes. A correct traversal never produces such an array.
 */
export class CycleDetectedError extends WaypathError {
  constructor(readonly start: number, readonly end: number, readonly steps: number) {
    super(
      `predecessor chain from ${end} did not reach ${start} within ${steps} steps`,
      ERROR_CODES.PATH_CYCLE,
      { start, end, steps },
    );
    this.name = "CycleDetectedError";
  }
}

export class MissingEdgeError extends WaypathError {
  constructor(readonly src: number, readonly dest: number) {
    super(`path uses a non-existent edge ${src} -> ${dest}`, ERROR_CODES.PATH_EDGE, { src, dest });
    this.name = "MissingEdgeError";
  }
}

export class MissingEndpointError extends WaypathError {
  constructor(readonly missing: ReadonlyArray<"S" | "E">) {
    super(
      `maze is missing its ${missing.map((marker) => `'${marker}'`).join(" and ")} marker`,
      ERROR_CODES.MAZE_ENDPOINT,
      { missing: [...missing] },
    );
    this.name = "MissingEndpointError";
  }
}

export class MazeFormatError extends WaypathError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ERROR_CODES.MAZE_FORMAT, details);
    this.name = "MazeFormatError";
  }
}

export class TransitNetworkError extends WaypathError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ERROR_CODES.TRANSIT_NETWORK, details);
    this.name = "TransitNetworkError";
  }
}

/**
 * Raised when an accumulated path cost leaves the range where integer
 * arithmetic on numbers is exact. Costs beyond it would compare equal and
 * could select a more expensive route.
 */
export class DistanceOverflowError extends WaypathError {
  constructor(readonly src: number, readonly dest: number, readonly distance: number, readonly weight: number) {
    super(
      `path cost through ${src} -> ${dest} exceeds ${Number.MAX_SAFE_INTEGER}`,
      ERROR_CODES.PATH_OVERFLOW,
      { src, dest, distance, weight },
    );
    this.name = "DistanceOverflowError";
  }
}

export class CliUsageError extends WaypathError {
  constructor(message: string) {
    super(message, ERROR_CODES.CLI_USAGE);
    this.name = "CliUsageError";
  }
}
