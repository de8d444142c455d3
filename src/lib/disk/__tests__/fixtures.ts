import { DiskScheduleError } from "@/lib/disk/errors";

export const QUEUE = [98, 183, 37, 122, 14, 124, 65, 67];
export const HEAD = 53;
export const BOUND = 199;

export function captureError(run: () => unknown): DiskScheduleError {
  try {
    run();
  } catch (error) {
    if (error instanceof DiskScheduleError) return error;
    throw error;
  }
  throw new Error("expected a DiskScheduleError");
}
