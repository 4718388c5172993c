import fs from "node:fs/promises";
import path from "node:path";
import { isRecord } from "@/lib/domain/errors";
import { ProcessedItem } from "@/lib/domain/models";

export interface SnapshotRow {
  id: string;
  created_utc: number;
  created_iso: string;
  age_hours: number;
  bucket: string;
  feed: string;
  category: string;
  title: string;
  url: string;
  priority: number;
  signals: string[];
  reply_opener: string | null;
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** UTC stamp in the form YYYYMMDD_HHMMSS. */
export function runStamp(now: Date): string {
  return (
    `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}_` +
    `${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}`
  );
}

export function toSnapshotRow(item: ProcessedItem): SnapshotRow {
  return {
    id: item.id,
    created_utc: item.createdAt.getTime() / 1000,
    created_iso: item.createdAt.toISOString(),
    age_hours: item.ageHours,
    bucket: item.bucket,
    feed: item.feed,
    category: item.category,
    title: item.title,
    url: item.link,
    priority: item.priority,
    signals: [...item.signals],
    reply_opener: item.replyOpener,
  };
}

function isFileExists(error: unknown): boolean {
  return isRecord(error) && error.code === "EEXIST";
}

/** Never overwrites an earlier snapshot: a clashing stamp gets a numeric suffix. */
export async function writeQueueSnapshot(items: ProcessedItem[], outputDir: string, now: Date): Promise<string> {
  await fs.mkdir(outputDir, { recursive: true });
  const content = `${JSON.stringify(items.map(toSnapshotRow), null, 2)}\n`;
  const base = `queue_${runStamp(now)}`;

  for (let attempt = 0; ; attempt += 1) {
    const outputPath = path.join(outputDir, attempt ? `${base}_${attempt}.json` : `${base}.json`);
    try {
      await fs.writeFile(outputPath, content, { encoding: "utf-8", flag: "wx" });
      return outputPath;
    } catch (error) {
      if (!isFileExists(error)) {
        throw error;
      }
    }
  }
}
