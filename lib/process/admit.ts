import { AdmitResult, RawItem, TimeWindow } from "@/lib/domain/models";
import { ageInHours } from "@/lib/process/time-window";

export function resolveIdentity(raw: RawItem): string {
  const nativeId = String(raw.id ?? "").trim();
  if (nativeId) {
    return nativeId;
  }
  return String(raw.link || "").trim();
}

/**
 * Admits a raw item into the run or names why it was dropped.
 * An admitted identity is written into `seen` straight away so the same
 * thread found by a later query in this run is rejected as a duplicate.
 */
export function admit(raw: RawItem, seen: Set<string>, window: TimeWindow, now: Date): AdmitResult {
  const id = resolveIdentity(raw);
  if (!id) {
    return { admitted: false, reason: "no-identity" };
  }
  if (seen.has(id)) {
    return { admitted: false, reason: "duplicate" };
  }
  if (raw.createdAt.getTime() < window.lowerBound.getTime()) {
    return { admitted: false, reason: "stale" };
  }

  const title = String(raw.title || "").trim();
  const link = String(raw.link || "").trim();
  if (!title || !link) {
    return { admitted: false, reason: "incomplete" };
  }

  seen.add(id);
  return {
    admitted: true,
    item: {
      id,
      title,
      link,
      createdAt: raw.createdAt,
      feed: raw.feed,
      bucket: raw.bucket,
      ageHours: ageInHours(raw.createdAt, now),
    },
  };
}
