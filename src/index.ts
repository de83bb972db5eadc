export * from "./errors.js";
export * from "./graph/model.js";
export * from "./graph/gridIndex.js";
export * from "./algorithms/types.js";
export * from "./algorithms/bfs.js";
export * from "./algorithms/dfs.js";
export * from "./algorithms/dijkstra.js";
export * from "./algorithms/path.js";
export * from "./maze/parser.js";
export * from "./maze/solver.js";
export * from "./maze/render.js";
export * from "./transit/network.js";
export * from "./transit/planner.js";
export * from "./logger.js";
export { loadSettings, type Settings } from "./config/settings.js";
