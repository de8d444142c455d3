import { parseArgs } from "node:util";

import { compareAlgorithms } from "@/lib/compare";
import { resolveConfig } from "@/lib/config";
import {
  DISK_ALGORITHMS,
  isDiskScheduleError,
  parseAlgorithm,
  parseDirection,
  parsePosition,
  parseRequestQueue,
  schedule,
  type DiskAlgorithm,
} from "@/lib/disk";
import { buildMovementSeries, renderMovementPlot } from "@/lib/present/chart";
import { formatComparison, formatSummary } from "@/lib/present/summary";

export type CliIO = {
  out: (line: string) => void;
  err: (line: string) => void;
  /** Interactive prompt; without it every missing value is a usage error. */
  ask?: (question: string) => Promise<string>;
  env?: Record<string, string | undefined>;
};

export const USAGE = [
  "Usage: seek-planner [options]",
  "  --algo <name>        FCFS, SSTF, SCAN, CSCAN or LOOK",
  "  --requests <list>    request queue, comma or space separated",
  "  --head <position>    starting head position",
  "  --direction <dir>    increasing | decreasing (SCAN, CSCAN, LOOK)",
  "  --bound <position>   highest cylinder (default 199)",
  "  --compare            run every policy and rank them",
  "  --plot               draw the head movement",
  "  --help               show this message",
];

const DIRECTIONAL: ReadonlySet<DiskAlgorithm> = new Set<DiskAlgorithm>(["SCAN", "CSCAN", "LOOK"]);

class UsageError extends Error {}

async function valueOrPrompt(value: string | undefined, io: CliIO, question: string, name: string): Promise<string> {
  if (value !== undefined) return value;
  if (!io.ask) throw new UsageError(`Missing --${name}`);
  return io.ask(question);
}

function readArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    strict: true,
    allowPositionals: false,
    options: {
      algo: { type: "string" },
      requests: { type: "string" },
      head: { type: "string" },
      direction: { type: "string" },
      bound: { type: "string" },
      compare: { type: "boolean", default: false },
      plot: { type: "boolean", default: false },
      help: { type: "boolean", default: false },
    },
  }).values;
}

export async function runCli(argv: string[], io: CliIO): Promise<number> {
  let values: ReturnType<typeof readArgs>;
  try {
    values = readArgs(argv);
  } catch (error) {
    io.err(error instanceof Error ? error.message : String(error));
    USAGE.forEach((line) => io.err(line));
    return 1;
  }

  if (values.help) {
    USAGE.forEach((line) => io.out(line));
    return 0;
  }

  try {
    const config = resolveConfig(io.env ?? process.env);
    const requests = parseRequestQueue(
      await valueOrPrompt(values.requests, io, "Request queue (comma separated): ", "requests"),
    );
    const head = parsePosition(await valueOrPrompt(values.head, io, "Initial head position: ", "head"), "head");
    const bound = values.bound === undefined ? config.bound : parsePosition(values.bound, "bound");

    const algorithm = values.compare
      ? null
      : parseAlgorithm(await valueOrPrompt(values.algo, io, `Policy (${DISK_ALGORITHMS.join(", ")}): `, "algo"));

    let directionText = values.direction;
    if (directionText === undefined && io.ask && (algorithm === null || DIRECTIONAL.has(algorithm))) {
      directionText = await io.ask("Direction (increasing/decreasing) [increasing]: ");
    }
    const direction = parseDirection(directionText) ?? config.direction;

    if (algorithm === null) {
      const comparison = compareAlgorithms({ requests, head, direction, bound });
      formatComparison(comparison).forEach((line) => io.out(line));
      if (values.plot && comparison.best) {
        io.out("");
        renderMovementPlot(buildMovementSeries(comparison.best.result), bound).forEach((line) => io.out(line));
      }
      return 0;
    }

    const result = schedule({ algorithm, requests, head, direction, bound });
    formatSummary(result, requests.length).forEach((line) => io.out(line));
    if (values.plot) {
      io.out("");
      renderMovementPlot(buildMovementSeries(result), bound).forEach((line) => io.out(line));
    }
    return 0;
  } catch (error) {
    if (error instanceof UsageError) {
      io.err(error.message);
      USAGE.forEach((line) => io.err(line));
      return 1;
    }
    if (isDiskScheduleError(error)) {
      io.err(`error [${error.code}]: ${error.message}`);
      return 1;
    }
    throw error;
  }
}
