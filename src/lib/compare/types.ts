import type { DiskAlgorithm, SeekResult } from "@/lib/disk/types";

export type PolicyRow = {
  algorithm: DiskAlgorithm;
  result: SeekResult;
  totalDistance: number;
  averageSeek: number;
  longestSeek: number;
  reversals: number;
};

export type ComparisonResult = {
  rows: PolicyRow[];
  ranked: PolicyRow[];
  paretoRows: PolicyRow[];
  dominatedAlgorithms: DiskAlgorithm[];
  best: PolicyRow | null;
  second: PolicyRow | null;
  explanation: string[];
};
