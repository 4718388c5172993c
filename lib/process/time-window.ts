import { TimeWindow } from "@/lib/domain/models";

const HOUR_MS = 3_600_000;

export function computeTimeWindow(lastRunAt: Date | null, now: Date, backfillHours: number): TimeWindow {
  const backfillFloor = now.getTime() - Math.max(0, backfillHours) * HOUR_MS;
  const lastRun = lastRunAt ? lastRunAt.getTime() : 0;
  return { lowerBound: new Date(Math.max(lastRun, backfillFloor)) };
}

export function ageInHours(createdAt: Date, now: Date): number {
  return Math.max(0, Math.floor((now.getTime() - createdAt.getTime()) / HOUR_MS));
}
