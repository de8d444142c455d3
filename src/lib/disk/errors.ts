import type { ZodIssue } from "zod";

export type DiskScheduleErrorCode =
  | "INVALID_POLICY"
  | "INVALID_DIRECTION"
  | "OUT_OF_RANGE_POSITION"
  | "INVALID_INPUT";

export class DiskScheduleError extends Error {
  readonly code: DiskScheduleErrorCode;

  readonly issues: ZodIssue[];

  constructor(code: DiskScheduleErrorCode, message: string, issues: ZodIssue[] = []) {
    super(message);
    this.name = "DiskScheduleError";
    this.code = code;
    this.issues = issues;
  }
}

export function isDiskScheduleError(error: unknown): error is DiskScheduleError {
  return error instanceof DiskScheduleError;
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return "Unknown scheduling error";
}
