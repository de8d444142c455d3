import { describe, expect, it } from "vitest";

import { compareAlgorithms } from "@/lib/compare";
import { dominates, paretoFront } from "@/lib/compare/pareto";
import { DiskScheduleError } from "@/lib/disk/errors";

const input = { requests: [98, 183, 37, 122, 14, 124, 65, 67], head: 53 };

describe("compareAlgorithms", () => {
  it("ranks policies by total travel", () => {
    const comparison = compareAlgorithms(input);
    expect(comparison.ranked.map((row) => [row.algorithm, row.totalDistance])).toEqual([
      ["SSTF", 236],
      ["LOOK", 299],
      ["SCAN", 331],
      ["CSCAN", 382],
      ["FCFS", 640],
    ]);
    expect(comparison.best?.algorithm).toBe("SSTF");
    expect(comparison.second?.algorithm).toBe("LOOK");
  });

  it("keeps rows in policy order with per-run measures", () => {
    const rows = compareAlgorithms(input).rows;
    expect(rows.map((row) => row.algorithm)).toEqual(["FCFS", "SSTF", "SCAN", "CSCAN", "LOOK"]);
    expect(rows.map((row) => row.longestSeek)).toEqual([146, 84, 162, 199, 146]);
    expect(rows.map((row) => row.reversals)).toEqual([6, 2, 1, 2, 1]);
  });

  it("separates the Pareto front from dominated policies", () => {
    const comparison = compareAlgorithms(input);
    expect(comparison.paretoRows.map((row) => row.algorithm)).toEqual(["SSTF", "LOOK"]);
    expect(comparison.dominatedAlgorithms).toEqual(["FCFS", "SCAN", "CSCAN"]);
  });

  it("explains the winner against the runner-up", () => {
    expect(compareAlgorithms(input).explanation).toEqual([
      "SSTF moves the head 236 cylinders in total (29.5 per request).",
      "Vs LOOK: 63 fewer cylinders (21.1% less travel), longest seek 84 vs 146.",
      "Dominated by another policy: FCFS, SCAN, CSCAN.",
    ]);
  });

  it("falls back to policy order on a full tie", () => {
    const comparison = compareAlgorithms({ requests: [], head: 10 });
    expect(comparison.ranked.map((row) => row.algorithm)).toEqual(["FCFS", "SSTF", "SCAN", "CSCAN", "LOOK"]);
    expect(comparison.dominatedAlgorithms).toEqual([]);
    expect(comparison.explanation).toEqual([
      "FCFS moves the head 0 cylinders in total (0.0 per request).",
      "SSTF ties on every measure; FCFS is listed first.",
    ]);
  });

  it("validates the queue once before running anything", () => {
    expect(() => compareAlgorithms({ requests: [500], head: 0 })).toThrow(DiskScheduleError);
  });
});

describe("pareto", () => {
  const objectives = [
    { key: "a", getValue: (row: number[]) => row[0] },
    { key: "b", getValue: (row: number[]) => row[1] },
  ];

  it("needs one strictly better objective to dominate", () => {
    expect(dominates([1, 2], [1, 3], objectives)).toBe(true);
    expect(dominates([1, 3], [1, 3], objectives)).toBe(false);
    expect(dominates([0, 4], [1, 3], objectives)).toBe(false);
  });

  it("keeps only non-dominated rows", () => {
    expect(paretoFront([[1, 5], [2, 2], [3, 3], [5, 1]], objectives)).toEqual([[1, 5], [2, 2], [5, 1]]);
  });
});
