import { DEFAULT_TIE_BREAK, type TieBreak } from "../algorithms/dijkstra.js";
import { DEFAULT_MAX_NODES } from "../graph/model.js";
import { LOG_LEVELS, type LogLevel } from "../logger.js";
import { readEnum, readInt, readOptionalString } from "./env.js";

export interface Settings {
  readonly logLevel: LogLevel;
  readonly logFile: string | null;
  readonly maxNodes: number;
  readonly tieBreak: TieBreak;
}

const TIE_BREAKS: readonly TieBreak[] = ["last", "first"];

/** Assembles runtime settings from the `WAYPATH_*` environment variables. */
export function loadSettings(): Settings {
  return {
    logLevel: readEnum("WAYPATH_LOG_LEVEL", LOG_LEVELS, "warn"),
    logFile: readOptionalString("WAYPATH_LOG_FILE") ?? null,
    maxNodes: readInt("WAYPATH_MAX_NODES", DEFAULT_MAX_NODES, { min: 1 }),
    tieBreak: readEnum("WAYPATH_DIJKSTRA_TIE_BREAK", TIE_BREAKS, DEFAULT_TIE_BREAK),
  };
}
