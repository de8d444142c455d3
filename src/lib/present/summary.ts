import type { ComparisonResult } from "@/lib/compare";
import type { DiskAlgorithm, SeekResult } from "@/lib/disk/types";

const POLICY_LABELS: Record<DiskAlgorithm, string> = {
  FCFS: "First-Come First-Served (FCFS)",
  SSTF: "Shortest Seek Time First (SSTF)",
  SCAN: "Elevator (SCAN)",
  CSCAN: "Circular SCAN (C-SCAN)",
  LOOK: "LOOK",
};

export function policyLabel(algorithm: DiskAlgorithm): string {
  return POLICY_LABELS[algorithm];
}

export function averageSeek(result: SeekResult, requestCount: number): number {
  return requestCount > 0 ? result.totalDistance / requestCount : 0;
}

export function formatSummary(result: SeekResult, requestCount: number): string[] {
  return [
    `Policy: ${policyLabel(result.algorithm)}`,
    `Processing order: ${result.order.join(" -> ")}`,
    `Total seek distance: ${result.totalDistance}`,
    `Average seek distance: ${averageSeek(result, requestCount).toFixed(2)}`,
  ];
}

export function formatComparison(comparison: ComparisonResult): string[] {
  const lines = comparison.ranked.map(
    (row, index) =>
      `${index + 1}. ${row.algorithm.padEnd(5)} total=${row.totalDistance} avg=${row.averageSeek.toFixed(2)} longest=${row.longestSeek} reversals=${row.reversals}`,
  );
  return [...lines, "", ...comparison.explanation];
}
