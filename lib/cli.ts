/**
 * Incidence list CLI (incidence)
 *
 * Builds the incidence lists of an edge list file, or of the built-in
 * sample graph, and prints them together with the depth-first labels
 * from a start vertex.
 *
 * Usage:
 *   incidence [--start <v>] [file]
 *   incidence --help
 *   incidence --version
 */
import { readFile } from "node:fs/promises";
import { resolve } from "node:path";

import { SAMPLE_GRAPH } from "./consts/sampleGraph.ts";
import { constructIncidenceList } from "./graph/incidenceList.ts";
import { GraphInputError } from "./graph/validation.ts";
import { type ParsedEdgeList, parseEdgeList } from "./parser/edgeList.ts";
import { ParseError } from "./parser/parseError.ts";
import { formatDfsTime, formatIncidenceList } from "./render/dump.ts";
import { VERSION } from "./shared/version.ts";
import { depthFirstSearch } from "./traversal/dfs.ts";

export interface CLIOptions {
  help: boolean;
  version: boolean;
  verbose: boolean;
  start: number;
}

export interface CLIIO {
  out(line: string): void;
  err(line: string): void;
  readTextFile(path: string): Promise<string>;
}

export const nodeIO: CLIIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  readTextFile: (path) => readFile(path, "utf-8"),
};

export class UsageError extends Error {}

export function parseArgs(
  args: readonly string[],
): { options: CLIOptions; inputPath?: string } {
  const options: CLIOptions = {
    help: false,
    version: false,
    verbose: false,
    start: 1,
  };

  let inputPath: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case "--help":
      case "-h":
        options.help = true;
        break;
      case "--version":
      case "-v":
        options.version = true;
        break;
      case "--verbose":
      case "-V":
        options.verbose = true;
        break;
      case "--start":
      case "-s": {
        const value = args[++i];
        if (value === undefined || !/^[0-9]+$/.test(value)) {
          throw new UsageError(`${arg} expects a vertex id`);
        }
        options.start = Number(value);
        break;
      }
      default:
        if (arg.startsWith("-")) {
          throw new UsageError(`Unknown option: ${arg}`);
        }
        if (inputPath !== undefined) {
          throw new UsageError("Too many arguments.");
        }
        inputPath = arg;
        break;
    }
  }

  return { options, inputPath };
}

export function helpText(): string {
  return `
Incidence list builder (incidence) v${VERSION}

USAGE:
    incidence [OPTIONS] [file]

ARGUMENTS:
    [file]             Edge list file: an 'n m' line, then m 'tail head' lines.
                       Defaults to the built-in six-vertex sample graph.

OPTIONS:
    -s, --start <v>    Start vertex of the depth-first search (default 1)
    -V, --verbose      Enable verbose output
    -h, --help         Show this help message
    -v, --version      Show version information
`;
}

async function loadGraph(
  io: CLIIO,
  inputPath: string | undefined,
  verbose: boolean,
): Promise<ParsedEdgeList> {
  if (inputPath === undefined) {
    if (verbose) {
      io.out("Using built-in sample graph...");
    }
    return SAMPLE_GRAPH;
  }

  const resolvedPath = resolve(inputPath);
  if (verbose) {
    io.out(`Reading ${resolvedPath}...`);
  }
  return parseEdgeList(await io.readTextFile(resolvedPath));
}

/**
 * @returns the process exit code.
 */
export async function runCli(
  args: readonly string[],
  io: CLIIO = nodeIO,
): Promise<number> {
  let parsed: ReturnType<typeof parseArgs>;
  try {
    parsed = parseArgs(args);
  } catch (error) {
    if (error instanceof UsageError) {
      io.err(error.message);
      io.err("Use --help for usage information.");
      return 1;
    }
    throw error;
  }

  const { options, inputPath } = parsed;
  if (options.help) {
    io.out(helpText());
    return 0;
  }
  if (options.version) {
    io.out(`incidence v${VERSION}`);
    return 0;
  }

  try {
    const { edges, n, m } = await loadGraph(io, inputPath, options.verbose);

    if (options.verbose) {
      io.out(`Building incidence lists for ${n} vertices, ${m} edges...`);
    }
    const graph = constructIncidenceList(edges, n, m);
    io.out(formatIncidenceList(graph));

    if (options.verbose) {
      io.out(`Depth-first search from vertex ${options.start}...`);
    }
    const time = depthFirstSearch(edges, graph, n, options.start);
    io.out(formatDfsTime(time));
    return 0;
  } catch (error) {
    if (error instanceof ParseError) {
      io.err(`Parse error: ${error.message}`);
      return 1;
    }
    if (error instanceof GraphInputError) {
      io.err(`Invalid graph: ${error.message}`);
      return 1;
    }
    if (isErrnoException(error)) {
      io.err(`Cannot read input file '${inputPath}': ${error.message}`);
      return 1;
    }
    io.err(`Unexpected error: ${error}`);
    return 1;
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error &&
    typeof error.code === "string";
}
