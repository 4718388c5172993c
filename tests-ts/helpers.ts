import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { CATEGORY_GENERAL, ProcessedItem, RawItem, SourceConfig } from "@/lib/domain/models";

export const NOW = new Date("2026-03-01T12:00:00.000Z");

export function hoursAgo(hours: number, from: Date = NOW): Date {
  return new Date(from.getTime() - hours * 3_600_000);
}

export function source(id: string, name = id): SourceConfig {
  return {
    id,
    name,
    bucket: id,
    query: name,
    url: `https://feeds.example.com/search?q=${encodeURIComponent(name)}`,
  };
}

export function rawItem(overrides: Partial<RawItem> = {}): RawItem {
  return {
    id: "t3_default",
    title: "Default title",
    link: "https://forum.example.com/t/default",
    createdAt: hoursAgo(1),
    feed: "Forum",
    bucket: "forum",
    ...overrides,
  };
}

export function processedItem(overrides: Partial<ProcessedItem> = {}): ProcessedItem {
  return {
    id: "t3_item",
    title: "Some thread",
    link: "https://forum.example.com/t/item",
    createdAt: hoursAgo(1),
    feed: "Forum",
    bucket: "forum",
    ageHours: 1,
    category: CATEGORY_GENERAL,
    priority: 0,
    signals: [],
    replyOpener: null,
    ...overrides,
  };
}

export async function makeTempDir(prefix = "thread-radar-"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}
