import { describe, expect, it } from "vitest";
import { ageInHours, computeTimeWindow } from "@/lib/process/time-window";
import { hoursAgo, NOW } from "./helpers";

describe("time window", () => {
  it("uses the backfill horizon on a first run", () => {
    const window = computeTimeWindow(null, NOW, 168);
    expect(window.lowerBound.toISOString()).toBe("2026-02-22T12:00:00.000Z");
  });

  it("uses the last run when it is more recent than the horizon", () => {
    const lastRun = hoursAgo(5);
    expect(computeTimeWindow(lastRun, NOW, 168).lowerBound).toEqual(lastRun);
  });

  it("never reaches further back than the horizon", () => {
    const lastRun = hoursAgo(500);
    expect(computeTimeWindow(lastRun, NOW, 24).lowerBound.toISOString()).toBe("2026-02-28T12:00:00.000Z");
  });

  it("floors age to whole hours and clamps future timestamps to zero", () => {
    expect(ageInHours(new Date(NOW.getTime() - 59 * 60_000), NOW)).toBe(0);
    expect(ageInHours(hoursAgo(2.5), NOW)).toBe(2);
    expect(ageInHours(new Date(NOW.getTime() + 3_600_000), NOW)).toBe(0);
  });
});
