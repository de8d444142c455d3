import { describe, expect, it } from "vitest";

import {
  DISK_ALGORITHMS,
  DIRECTIONS,
  runDiskAlgorithm,
  schedule,
  seekDistance,
  totalSeekDistance,
  type SeekResult,
} from "@/lib/disk";

import { BOUND, HEAD, QUEUE } from "./fixtures";

const QUEUES: number[][] = [QUEUE, [], [0, 199, 0, 199], [53, 53, 10], [5], [120, 130, 140]];

function allRuns(): SeekResult[] {
  const runs: SeekResult[] = [];
  for (const requests of QUEUES) {
    for (const algorithm of DISK_ALGORITHMS) {
      for (const direction of DIRECTIONS) {
        runs.push(runDiskAlgorithm(algorithm, requests, HEAD, direction, BOUND));
      }
    }
  }
  return runs;
}

describe("seek accounting", () => {
  it("sums absolute gaps between consecutive positions", () => {
    expect(seekDistance(80, 30)).toBe(50);
    expect(totalSeekDistance([53, 65, 37])).toBe(40);
    expect(totalSeekDistance([7])).toBe(0);
  });

  it("matches the recorded order for every policy", () => {
    for (const result of allRuns()) {
      expect(result.order[0]).toBe(HEAD);
      expect(result.totalDistance).toBe(totalSeekDistance(result.order));
      expect(result.steps).toHaveLength(result.order.length - 1);
    }
  });
});

describe("schedule", () => {
  it("adds at most two synthetic visits", () => {
    for (const requests of QUEUES) {
      for (const algorithm of DISK_ALGORITHMS) {
        const result = schedule({ algorithm, requests, head: HEAD });
        const extra = result.order.length - 1 - requests.length;
        expect(extra).toBeGreaterThanOrEqual(0);
        expect(extra).toBeLessThanOrEqual(2);
        expect(result.steps.filter((step) => step.synthetic)).toHaveLength(extra);
      }
    }
  });

  it("returns only the head for an empty queue under every policy", () => {
    for (const algorithm of DISK_ALGORITHMS) {
      const result = schedule({ algorithm, requests: [], head: 77, direction: "DECREASING" });
      expect(result.order).toEqual([77]);
      expect(result.totalDistance).toBe(0);
    }
  });

  it("gives the same answer on repeated calls", () => {
    for (const algorithm of DISK_ALGORITHMS) {
      const first = schedule({ algorithm, requests: QUEUE, head: HEAD });
      const second = schedule({ algorithm, requests: QUEUE, head: HEAD });
      expect(second).toEqual(first);
    }
  });

  it("defaults to an increasing sweep over [0, 199]", () => {
    expect(schedule({ algorithm: "SCAN", requests: QUEUE, head: HEAD }).totalDistance).toBe(331);
  });

  it("honours a custom bound", () => {
    const result = schedule({ algorithm: "CSCAN", requests: [60, 80], head: 50, bound: 99 });
    expect(result.order).toEqual([50, 60, 80, 99, 0]);
    expect(result.totalDistance).toBe(148);
  });

  it("keeps FCFS order verbatim and SSTF choices greedy", () => {
    expect(schedule({ algorithm: "FCFS", requests: QUEUE, head: HEAD }).order.slice(1)).toEqual(QUEUE);

    const sstf = schedule({ algorithm: "SSTF", requests: QUEUE, head: HEAD });
    expect([...sstf.order.slice(1)].sort((a, b) => a - b)).toEqual([...QUEUE].sort((a, b) => a - b));

    const remaining = [...QUEUE];
    for (let i = 1; i < sstf.order.length; i += 1) {
      const cursor = sstf.order[i - 1];
      const chosen = sstf.order[i];
      const best = Math.min(...remaining.map((position) => seekDistance(cursor, position)));
      expect(seekDistance(cursor, chosen)).toBe(best);
      remaining.splice(remaining.indexOf(chosen), 1);
    }
  });

  it("leaves a frozen caller queue intact", () => {
    const requests = Object.freeze([30, 10, 20]);
    expect(schedule({ algorithm: "SSTF", requests, head: 15 }).order).toEqual([15, 10, 20, 30]);
    expect(requests).toEqual([30, 10, 20]);
  });
});
