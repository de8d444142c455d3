export type DiskAlgorithm = "FCFS" | "SSTF" | "SCAN" | "CSCAN" | "LOOK";

export type Direction = "INCREASING" | "DECREASING";

export const DISK_ALGORITHMS: readonly DiskAlgorithm[] = ["FCFS", "SSTF", "SCAN", "CSCAN", "LOOK"];

export const DIRECTIONS: readonly Direction[] = ["INCREASING", "DECREASING"];

export type SeekStep = {
  step: number;
  from: number;
  to: number;
  distance: number;
  synthetic: boolean;
};

export type SeekResult = {
  algorithm: DiskAlgorithm;
  order: number[];
  steps: SeekStep[];
  totalDistance: number;
};

export type ScheduleInput = {
  algorithm: DiskAlgorithm;
  requests: readonly number[];
  head: number;
  direction?: Direction;
  bound?: number;
};

export type NormalizedQueue = {
  requests: readonly number[];
  head: number;
  direction: Direction;
  bound: number;
};

export type NormalizedSchedule = NormalizedQueue & {
  algorithm: DiskAlgorithm;
};

/** Strategy contract shared by every policy; FCFS and SSTF ignore direction and bound. */
export type DiskStrategy = (
  requests: readonly number[],
  head: number,
  direction: Direction,
  bound: number,
) => SeekResult;
