#!/usr/bin/env node
import process from "node:process";
import { realpathSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { z } from "zod";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.
import { loadSettings, type Settings } from "./config/settings.js";
import { CliUsageError, ERROR_CODES, WaypathError, type ErrorCode } from "./errors.js";
import { StructuredLogger } from "./logger.js";
import { parseMaze } from "./maze/parser.js";
import { formatCell, formatCells, renderMaze } from "./maze/render.js";
import { MAZE_ALGORITHMS, solveMaze, type MazeAlgorithm, type MazeSolution } from "./maze/solver.js";
import { loadTransitNetwork, resolveStationArgument } from "./transit/network.js";
import { listStations, planRoute, type RoutePlan } from "./transit/planner.js";

type OutputFormat = "text" | "json";

type CliCommand =
  | {
      readonly kind: "maze";
      readonly file: string;
      readonly format: OutputFormat;
      readonly algorithms: MazeAlgorithm[];
      readonly showMaze: boolean;
    }
  | {
      readonly kind: "transit";
      readonly file: string;
      readonly format: OutputFormat;
      readonly from: string;
      readonly to: string;
    }
  | { readonly kind: "stations"; readonly file: string; readonly format: OutputFormat }
  | { readonly kind: "help" };

/** Output channels used by {@link run}; tests substitute recording sinks. */
export interface CliIo {
  readonly stdout: (line: string) => void;
  readonly stderr: (line: string) => void;
}

interface CommandContext {
  readonly io: CliIo;
  readonly settings: Settings;
  readonly logger: StructuredLogger;
}

export interface NormalisedCliError {
  code: ErrorCode;
  message: string;
  details?: unknown;
}

const consoleIo: CliIo = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
};

/**
 * Runs the CLI and resolves with the process exit code. Domain failures are
 * reported on stderr and logged; "no path" outcomes are ordinary output.
 */
export async function run(argv: string[], io: CliIo = consoleIo, settings: Settings = loadSettings()): Promise<number> {
  const logger = new StructuredLogger({ level: settings.logLevel, logFile: settings.logFile });
  const context: CommandContext = { io, settings, logger };
  try {
    const command = parseArgs(argv);
    switch (command.kind) {
      case "help":
        printUsage(io);
        return 0;
      case "maze":
        await runMaze(command, context);
        return 0;
      case "transit":
        await runTransit(command, context);
        return 0;
      case "stations":
        await runStations(command, context);
        return 0;
    }
  } catch (error) {
    const normalised = normaliseCliError(error);
    logger.error("cli_failed", normalised);
    io.stderr(`error[${normalised.code}]: ${normalised.message}`);
    if (error instanceof CliUsageError) {
      printUsage(io);
    }
    return 1;
  } finally {
    await logger.flush();
  }
}

async function runMaze(command: Extract<CliCommand, { kind: "maze" }>, { io, settings, logger }: CommandContext): Promise<void> {
  const source = await readFile(command.file, "utf8");
  const maze = parseMaze(source, { maxNodes: settings.maxNodes });
  logger.debug("maze_parsed", {
    file: command.file,
    rows: maze.grid.rows,
    cols: maze.grid.cols,
    edges: maze.graph.edgeCount,
  });
  const solutions = command.algorithms.map((algorithm) => solveMaze(maze, algorithm, logger));

  if (command.format === "json") {
    io.stdout(
      JSON.stringify(
        {
          file: command.file,
          start: maze.grid.toCell(maze.start),
          end: maze.grid.toCell(maze.end),
          solutions,
        },
        null,
        2,
      ),
    );
    return;
  }

  io.stdout(`Maze ${maze.grid.rows}x${maze.grid.cols}, start ${formatCell(maze.grid.toCell(maze.start))}, end ${formatCell(maze.grid.toCell(maze.end))}`);
  for (const solution of solutions) {
    io.stdout(describeSolution(solution));
    if (solution.found) {
      io.stdout(`  ${formatCells(solution.path)}`);
    }
    if (command.showMaze) {
      for (const row of renderMaze(maze.rows, solution.path)) {
        io.stdout(`  ${row}`);
      }
    }
  }
}

function describeSolution(solution: MazeSolution): string {
  const label = solution.algorithm.toUpperCase();
  if (!solution.found) {
    return `${label}: no path found (visited ${solution.visited} cells)`;
  }
  const qualifier = solution.algorithm === "bfs" ? "shortest path" : "path";
  return `${label}: ${qualifier} of ${solution.steps ?? 0} steps (visited ${solution.visited} cells)`;
}

async function runTransit(
  command: Extract<CliCommand, { kind: "transit" }>,
  { io, settings, logger }: CommandContext,
): Promise<void> {
  const network = await loadTransitNetwork(command.file, { maxNodes: settings.maxNodes });
  logger.debug("transit_network_loaded", {
    file: command.file,
    stations: network.graph.nodeCount,
    connections: network.graph.edgeCount,
  });
  const from = resolveStationArgument(network.graph, command.from);
  const to = resolveStationArgument(network.graph, command.to);
  const plan = planRoute(network, from, to, { tieBreak: settings.tieBreak, logger });

  if (command.format === "json") {
    io.stdout(JSON.stringify({ file: command.file, network: network.name, unit: network.unit, plan }, null, 2));
    return;
  }
  for (const line of describePlan(plan, network.unit)) {
    io.stdout(line);
  }
}

function describePlan(plan: RoutePlan, unit: string): string[] {
  switch (plan.status) {
    case "same-station":
      return [`You are already at '${plan.origin.name}'.`];
    case "unreachable":
      return [`No route available from '${plan.origin.name}' to '${plan.destination.name}'.`];
    case "found":
      return [
        `Minimum travel time from '${plan.origin.name}' to '${plan.destination.name}': ${plan.total} ${unit}`,
        `Route: ${plan.stations.map((entry) => entry.name).join(" -> ")}`,
      ];
  }
}

async function runStations(
  command: Extract<CliCommand, { kind: "stations" }>,
  { io, settings }: CommandContext,
): Promise<void> {
  const network = await loadTransitNetwork(command.file, { maxNodes: settings.maxNodes });
  const stations = listStations(network);
  if (command.format === "json") {
    io.stdout(JSON.stringify({ file: command.file, stations }, null, 2));
    return;
  }
  for (const entry of stations) {
    io.stdout(`${String(entry.index).padStart(2)}. ${entry.name}`);
  }
}

/**
 * Maps any thrown value to `{ code, message, details? }`. Schema failures from
 * zod share the invalid-input code so callers can tell them apart from
 * unexpected crashes.
 */
function normaliseCliError(error: unknown): NormalisedCliError {
  if (error instanceof z.ZodError) {
    const issues = error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
    return {
      code: ERROR_CODES.INPUT_INVALID,
      message: `invalid network document (${issues.join("; ")})`,
      details: { issues: error.issues },
    };
  }
  if (error instanceof WaypathError) {
    return error.details === undefined
      ? { code: error.code, message: error.message }
      : { code: error.code, message: error.message, details: error.details };
  }
  return { code: ERROR_CODES.UNEXPECTED, message: error instanceof Error ? error.message : String(error) };
}

function parseArgs(argv: string[]): CliCommand {
  const [subcommand, ...rest] = argv;
  if (subcommand === undefined || subcommand === "help" || subcommand === "--help" || subcommand === "-h") {
    return { kind: "help" };
  }
  if (subcommand !== "maze" && subcommand !== "transit" && subcommand !== "stations") {
    throw new CliUsageError(`Unknown command '${subcommand}'`);
  }

  const [file, ...flags] = rest;
  if (!file || file.startsWith("--")) {
    throw new CliUsageError(`${subcommand} expects the path to an input file`);
  }

  let format: OutputFormat = "text";
  let algorithms: MazeAlgorithm[] = [...MAZE_ALGORITHMS];
  let showMaze = false;
  let from: string | undefined;
  let to: string | undefined;

  for (let i = 0; i < flags.length; i++) {
    const token = flags[i];
    switch (token) {
      case "--format": {
        const value = flags[++i];
        if (value !== "json" && value !== "text") {
          throw new CliUsageError("--format must be 'json' or 'text'");
        }
        format = value;
        break;
      }
      case "--algorithm": {
        const value = flags[++i];
        if (value === "both") {
          algorithms = [...MAZE_ALGORITHMS];
        } else if (value === "bfs" || value === "dfs") {
          algorithms = [value];
        } else {
          throw new CliUsageError("--algorithm must be 'bfs', 'dfs' or 'both'");
        }
        break;
      }
      case "--show-maze":
        showMaze = true;
        break;
      case "--from":
      case "--to": {
        const value = flags[++i];
        if (!value) {
          throw new CliUsageError(`${token} expects a station name or index`);
        }
        if (token === "--from") {
          from = value;
        } else {
          to = value;
        }
        break;
      }
      default:
        throw new CliUsageError(`Unknown argument '${token}'`);
    }
  }

  if (subcommand === "maze") {
    return { kind: "maze", file, format, algorithms, showMaze };
  }
  if (subcommand === "stations") {
    return { kind: "stations", file, format };
  }
  if (from === undefined || to === undefined) {
    throw new CliUsageError("transit requires --from <station> and --to <station>");
  }
  return { kind: "transit", file, format, from, to };
}

function printUsage(io: CliIo): void {
  io.stdout("Usage:");
  io.stdout("  waypath maze <file> [--algorithm bfs|dfs|both] [--format text|json] [--show-maze]");
  io.stdout("  waypath transit <file> --from <station> --to <station> [--format text|json]");
  io.stdout("  waypath stations <file> [--format text|json]");
}

/**
 * Whether `scriptPath` (normally `process.argv[1]`) launches `moduleUrl`.
 * Package managers install binaries as symlinks, so both sides are compared
 * after resolving links.
 */
export function isCliEntryPoint(scriptPath: string | undefined, moduleUrl: string): boolean {
  if (!scriptPath) {
    return false;
  }
  try {
    return realpathSync(scriptPath) === realpathSync(fileURLToPath(moduleUrl));
  } catch {
    // Unresolvable paths (e.g. `node -e`) can only match literally.
    return scriptPath === fileURLToPath(moduleUrl);
  }
}

if (isCliEntryPoint(process.argv[1], import.meta.url)) {
  run(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(error instanceof Error ? error.message : error);
      process.exitCode = 1;
    });
}

/** Internal helpers exposed to the test suite only. */
export const __testing = {
  describePlan,
  describeSolution,
  normaliseCliError,
  parseArgs,
};
