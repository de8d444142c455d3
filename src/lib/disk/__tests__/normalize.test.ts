import { describe, expect, it } from "vitest";

import { normalizeQueue, normalizeSchedule } from "@/lib/disk/normalize";

import { captureError } from "./fixtures";

describe("normalizeSchedule", () => {
  it("fills the default direction and bound", () => {
    expect(normalizeSchedule({ algorithm: "LOOK", requests: [4, 2], head: 3 })).toEqual({
      algorithm: "LOOK",
      requests: [4, 2],
      head: 3,
      direction: "INCREASING",
      bound: 199,
    });
  });

  it("hands back a frozen copy of the queue", () => {
    const requests = [9, 1];
    const normalized = normalizeSchedule({ algorithm: "FCFS", requests, head: 0 });
    expect(normalized.requests).not.toBe(requests);
    expect(Object.isFrozen(normalized.requests)).toBe(true);
  });

  it("rejects an unknown policy", () => {
    const error = captureError(() => normalizeSchedule({ algorithm: "RR", requests: [1], head: 0 }));
    expect(error.code).toBe("INVALID_POLICY");
    expect(error.message).toBe("algorithm: Policy must be one of FCFS, SSTF, SCAN, CSCAN, LOOK");
  });

  it("rejects an unknown direction", () => {
    const error = captureError(() =>
      normalizeSchedule({ algorithm: "SCAN", requests: [1], head: 0, direction: "SIDEWAYS" }),
    );
    expect(error.code).toBe("INVALID_DIRECTION");
  });

  it("rejects requests past the bound", () => {
    const error = captureError(() => normalizeSchedule({ algorithm: "SSTF", requests: [10, 250], head: 0 }));
    expect(error.code).toBe("OUT_OF_RANGE_POSITION");
    expect(error.message).toBe("requests.1: Position 250 is outside [0, 199]");
  });

  it("rejects negative positions", () => {
    const error = captureError(() => normalizeSchedule({ algorithm: "FCFS", requests: [-1], head: 0 }));
    expect(error.code).toBe("OUT_OF_RANGE_POSITION");
  });

  it("checks the head against a custom bound", () => {
    const error = captureError(() =>
      normalizeSchedule({ algorithm: "FCFS", requests: [], head: 150, bound: 100 }),
    );
    expect(error.code).toBe("OUT_OF_RANGE_POSITION");
    expect(error.message).toBe("head: Position 150 is outside [0, 100]");
  });

  it("rejects fractional positions as malformed input", () => {
    const error = captureError(() => normalizeSchedule({ algorithm: "FCFS", requests: [3.5], head: 0 }));
    expect(error.code).toBe("INVALID_INPUT");
    expect(error.issues).toHaveLength(1);
  });
});

describe("normalizeQueue", () => {
  it("validates a queue without a policy", () => {
    expect(normalizeQueue({ requests: [1], head: 2, direction: "DECREASING", bound: 9 })).toEqual({
      requests: [1],
      head: 2,
      direction: "DECREASING",
      bound: 9,
    });
  });
});
