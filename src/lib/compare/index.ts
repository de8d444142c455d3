import { countReversals } from "@/lib/analytics/seekAnalytics";
import { generateExplanation } from "@/lib/compare/explain";
import { paretoFront, type ObjectiveSpec } from "@/lib/compare/pareto";
import type { ComparisonResult, PolicyRow } from "@/lib/compare/types";
import { DISK_ALGORITHMS, normalizeQueue, runDiskAlgorithm } from "@/lib/disk";
import type { DiskAlgorithm, ScheduleInput, SeekResult } from "@/lib/disk";

export type { ComparisonResult, PolicyRow } from "@/lib/compare/types";

const OBJECTIVES: Array<ObjectiveSpec<PolicyRow>> = [
  { key: "totalDistance", getValue: (row) => row.totalDistance },
  { key: "longestSeek", getValue: (row) => row.longestSeek },
  { key: "reversals", getValue: (row) => row.reversals },
];

function canonicalIndex(algorithm: DiskAlgorithm): number {
  return DISK_ALGORITHMS.indexOf(algorithm);
}

function toRow(result: SeekResult, requestCount: number): PolicyRow {
  return {
    algorithm: result.algorithm,
    result,
    totalDistance: result.totalDistance,
    averageSeek: requestCount > 0 ? result.totalDistance / requestCount : 0,
    longestSeek: result.steps.reduce((max, step) => Math.max(max, step.distance), 0),
    reversals: countReversals(result.steps),
  };
}

function compareRows(left: PolicyRow, right: PolicyRow): number {
  if (left.totalDistance !== right.totalDistance) return left.totalDistance - right.totalDistance;
  if (left.longestSeek !== right.longestSeek) return left.longestSeek - right.longestSeek;
  if (left.reversals !== right.reversals) return left.reversals - right.reversals;
  return canonicalIndex(left.algorithm) - canonicalIndex(right.algorithm);
}

export function compareAlgorithms(input: Omit<ScheduleInput, "algorithm">): ComparisonResult {
  const queue = normalizeQueue(input);
  const rows = DISK_ALGORITHMS.map((algorithm) =>
    toRow(runDiskAlgorithm(algorithm, queue.requests, queue.head, queue.direction, queue.bound), queue.requests.length),
  );

  const ranked = [...rows].sort(compareRows);
  const paretoRows = paretoFront(rows, OBJECTIVES);
  const paretoIds = new Set(paretoRows.map((row) => row.algorithm));
  const dominatedAlgorithms = rows.filter((row) => !paretoIds.has(row.algorithm)).map((row) => row.algorithm);
  const best = ranked[0] ?? null;
  const second = ranked[1] ?? null;

  return {
    rows,
    ranked,
    paretoRows,
    dominatedAlgorithms,
    best,
    second,
    explanation: generateExplanation(best, second, dominatedAlgorithms),
  };
}
