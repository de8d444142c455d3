import { runCSCAN } from "@/lib/disk/cscan";
import { runFCFS } from "@/lib/disk/fcfs";
import { runLOOK } from "@/lib/disk/look";
import { normalizeSchedule } from "@/lib/disk/normalize";
import { runSCAN } from "@/lib/disk/scan";
import { runSSTF } from "@/lib/disk/sstf";
import type { Direction, DiskAlgorithm, DiskStrategy, ScheduleInput, SeekResult } from "@/lib/disk/types";

export * from "@/lib/disk/types";
export { DiskScheduleError, isDiskScheduleError, type DiskScheduleErrorCode } from "@/lib/disk/errors";
export { createMovement, seekDistance, totalSeekDistance, type Movement } from "@/lib/disk/distance";
export { normalizeQueue, normalizeSchedule } from "@/lib/disk/normalize";
export { parseAlgorithm, parseDirection, parsePosition, parseRequestQueue } from "@/lib/disk/parse";

const STRATEGIES: Record<DiskAlgorithm, DiskStrategy> = {
  FCFS: (requests, head) => runFCFS(requests, head),
  SSTF: (requests, head) => runSSTF(requests, head),
  SCAN: runSCAN,
  CSCAN: runCSCAN,
  LOOK: (requests, head, direction) => runLOOK(requests, head, direction),
};

export function runDiskAlgorithm(
  algo: DiskAlgorithm,
  requests: readonly number[],
  head: number,
  direction: Direction,
  bound: number,
): SeekResult {
  return STRATEGIES[algo](requests, head, direction, bound);
}

export function schedule(input: ScheduleInput): SeekResult {
  const normalized = normalizeSchedule(input);
  return runDiskAlgorithm(
    normalized.algorithm,
    normalized.requests,
    normalized.head,
    normalized.direction,
    normalized.bound,
  );
}
