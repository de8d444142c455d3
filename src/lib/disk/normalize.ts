import { z } from "zod";

import { DEFAULT_BOUND, DEFAULT_DIRECTION } from "@/lib/config";
import { DiskScheduleError, type DiskScheduleErrorCode } from "@/lib/disk/errors";
import { DIRECTIONS, DISK_ALGORITHMS, type NormalizedQueue, type NormalizedSchedule } from "@/lib/disk/types";

const positionSchema = z.number().int().nonnegative();

type RangeChecked = {
  requests: number[];
  head: number;
  bound: number;
};

const queueSchema = z.object({
  requests: z.array(positionSchema),
  head: positionSchema,
  direction: z
    .enum(["INCREASING", "DECREASING"], {
      errorMap: () => ({ message: `Direction must be one of ${DIRECTIONS.join(", ")}` }),
    })
    .optional(),
  bound: z.number().int().nonnegative().default(DEFAULT_BOUND),
});

const scheduleSchema = z
  .object({
    algorithm: z.enum(["FCFS", "SSTF", "SCAN", "CSCAN", "LOOK"], {
      errorMap: () => ({ message: `Policy must be one of ${DISK_ALGORITHMS.join(", ")}` }),
    }),
  })
  .merge(queueSchema);

function checkRange(value: RangeChecked, ctx: z.RefinementCtx): void {
  value.requests.forEach((position, index) => {
    if (position > value.bound) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["requests", index],
        message: `Position ${position} is outside [0, ${value.bound}]`,
      });
    }
  });
  if (value.head > value.bound) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["head"],
      message: `Position ${value.head} is outside [0, ${value.bound}]`,
    });
  }
}

function classifyIssue(issue: z.ZodIssue): DiskScheduleErrorCode {
  const field = issue.path[0];
  if (field === "algorithm") return "INVALID_POLICY";
  if (field === "direction") return "INVALID_DIRECTION";
  if ((field === "requests" || field === "head") && (issue.code === "too_small" || issue.code === "custom")) {
    return "OUT_OF_RANGE_POSITION";
  }
  return "INVALID_INPUT";
}

function describeIssue(issue: z.ZodIssue): string {
  const path = issue.path.join(".");
  return path ? `${path}: ${issue.message}` : issue.message;
}

function raiseIssues(error: z.ZodError): never {
  const first = error.issues[0];
  if (!first) throw new DiskScheduleError("INVALID_INPUT", "Invalid schedule input");
  throw new DiskScheduleError(classifyIssue(first), describeIssue(first), error.issues);
}

/** Validates a queue for callers that run more than one policy over it. */
export function normalizeQueue(input: unknown): NormalizedQueue {
  const parsed = queueSchema.superRefine(checkRange).safeParse(input);
  if (!parsed.success) raiseIssues(parsed.error);

  return {
    requests: Object.freeze([...parsed.data.requests]),
    head: parsed.data.head,
    direction: parsed.data.direction ?? DEFAULT_DIRECTION,
    bound: parsed.data.bound,
  };
}

/**
 * Validates a schedule request and returns a private copy of it. Nothing
 * downstream touches the caller's queue, and no strategy runs on bad input.
 */
export function normalizeSchedule(input: unknown): NormalizedSchedule {
  const parsed = scheduleSchema.superRefine(checkRange).safeParse(input);
  if (!parsed.success) raiseIssues(parsed.error);

  return {
    algorithm: parsed.data.algorithm,
    requests: Object.freeze([...parsed.data.requests]),
    head: parsed.data.head,
    direction: parsed.data.direction ?? DEFAULT_DIRECTION,
    bound: parsed.data.bound,
  };
}
