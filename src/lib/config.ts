import { z } from "zod";

import { DiskScheduleError } from "@/lib/disk/errors";
import { parseDirection } from "@/lib/disk/parse";
import type { Direction } from "@/lib/disk/types";

export const DEFAULT_BOUND = 199;
export const DEFAULT_DIRECTION: Direction = "INCREASING";

export type SchedulerConfig = {
  bound: number;
  direction: Direction;
};

const envSchema = z.object({
  DISK_SCHED_BOUND: z
    .string()
    .trim()
    .regex(/^\d+$/, "DISK_SCHED_BOUND must be a non-negative integer")
    .transform((value) => Number.parseInt(value, 10))
    .optional(),
  DISK_SCHED_DIRECTION: z.string().optional(),
});

export function resolveConfig(env: Record<string, string | undefined> = process.env): SchedulerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new DiskScheduleError("INVALID_INPUT", issue?.message ?? "Invalid scheduler environment", parsed.error.issues);
  }

  return {
    bound: parsed.data.DISK_SCHED_BOUND ?? DEFAULT_BOUND,
    direction: parseDirection(parsed.data.DISK_SCHED_DIRECTION) ?? DEFAULT_DIRECTION,
  };
}
