import { DiskScheduleError } from "@/lib/disk/errors";
import type { Direction, DiskAlgorithm } from "@/lib/disk/types";

const ALGORITHM_ALIASES = new Map<string, DiskAlgorithm>([
  ["fcfs", "FCFS"],
  ["fifo", "FCFS"],
  ["sstf", "SSTF"],
  ["scan", "SCAN"],
  ["elevator", "SCAN"],
  ["cscan", "CSCAN"],
  ["c-scan", "CSCAN"],
  ["c_scan", "CSCAN"],
  ["look", "LOOK"],
]);

const DIRECTION_ALIASES = new Map<string, Direction>([
  ["increasing", "INCREASING"],
  ["up", "INCREASING"],
  ["right", "INCREASING"],
  ["high", "INCREASING"],
  ["decreasing", "DECREASING"],
  ["down", "DECREASING"],
  ["left", "DECREASING"],
  ["low", "DECREASING"],
]);

const INTEGER_TOKEN = /^[+-]?\d+$/;

export function parseAlgorithm(input: string): DiskAlgorithm {
  const key = input.trim().toLowerCase();
  const algorithm = ALGORITHM_ALIASES.get(key);
  if (!algorithm) {
    throw new DiskScheduleError("INVALID_POLICY", `Unknown scheduling policy "${input.trim()}"`);
  }
  return algorithm;
}

/** Blank input means no preference; anything else must name a direction. */
export function parseDirection(input: string | undefined): Direction | undefined {
  const key = input?.trim().toLowerCase() ?? "";
  if (!key) return undefined;
  const direction = DIRECTION_ALIASES.get(key);
  if (!direction) {
    throw new DiskScheduleError("INVALID_DIRECTION", `Unknown direction "${input?.trim()}"`);
  }
  return direction;
}

export function parsePosition(input: string, label = "position"): number {
  const token = input.trim();
  if (!INTEGER_TOKEN.test(token)) {
    throw new DiskScheduleError("INVALID_INPUT", `Expected an integer ${label}, got "${token}"`);
  }
  return Number.parseInt(token, 10);
}

export function parseRequestQueue(input: string): number[] {
  return input
    .split(/[,\s]+/)
    .map((value) => value.trim())
    .filter(Boolean)
    .map((value) => parsePosition(value, "request"));
}
