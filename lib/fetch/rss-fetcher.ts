import Parser from "rss-parser";
import { SourceCollaborator } from "@/lib/domain/collaborators";
import { errorMessage } from "@/lib/domain/errors";
import { RawItem, SourceConfig } from "@/lib/domain/models";
import { createLogger } from "@/lib/infra/logger";

const TAG_RE = /<[^>]+>/g;
const MULTISPACE_RE = /\s+/g;

interface EntryExtras {
  published?: unknown;
  updated?: unknown;
}

type FeedEntry = Parser.Item & EntryExtras & { id?: unknown };

const parser = new Parser<Record<string, unknown>, EntryExtras>({
  customFields: {
    item: ["published", "updated"],
  },
});

const log = createLogger({ component: "rss" });

async function fetchFeedWithTimeout(feedUrl: string, timeoutMs: number): Promise<FeedEntry[]> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(feedUrl, {
      method: "GET",
      redirect: "follow",
      headers: {
        Accept: "application/atom+xml, application/rss+xml, application/xml, text/xml;q=0.9, */*;q=0.8",
        "User-Agent": "thread-radar/0.1 (+batch digest)",
      },
      signal: controller.signal,
    });

    if (!response.ok) {
      throw new Error(`RSS fetch failed: ${response.status}`);
    }

    const xml = await response.text();
    const feed = await parser.parseString(xml);
    return feed.items || [];
  } finally {
    clearTimeout(timer);
  }
}

function cleanHtmlText(value: string): string {
  return String(value || "")
    .replace(TAG_RE, " ")
    .replace(/&nbsp;/g, " ")
    .replace(/&amp;/g, "&")
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(MULTISPACE_RE, " ")
    .trim();
}

function asText(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}

/** Published first, then updated; ingestion time when the entry carries neither. */
export function parseCreatedAt(entry: FeedEntry, now: Date): Date {
  const candidates = [entry.published, entry.isoDate, entry.pubDate, entry.updated];
  for (const candidate of candidates) {
    const text = asText(candidate);
    if (!text) continue;
    const parsed = new Date(text);
    if (!Number.isNaN(parsed.getTime())) {
      return parsed;
    }
  }
  return now;
}

export function toRawItem(entry: FeedEntry, source: SourceConfig, now: Date): RawItem {
  return {
    id: asText(entry.id) || asText(entry.guid) || null,
    title: cleanHtmlText(asText(entry.title)),
    link: asText(entry.link),
    createdAt: parseCreatedAt(entry, now),
    feed: source.name,
    bucket: source.bucket,
  };
}

export interface RssSearchSourceOptions {
  timeoutSeconds?: number;
  now?: () => Date;
}

export class RssSearchSource implements SourceCollaborator {
  private readonly timeoutMs: number;

  private readonly now: () => Date;

  constructor(options: RssSearchSourceOptions = {}) {
    this.timeoutMs = Math.max(1_000, Math.trunc((options.timeoutSeconds ?? 20) * 1_000));
    this.now = options.now || (() => new Date());
  }

  async fetchItems(source: SourceConfig, limit: number): Promise<RawItem[]> {
    try {
      const entries = await fetchFeedWithTimeout(source.url, this.timeoutMs);
      const now = this.now();
      return entries.slice(0, Math.max(0, limit)).map((entry) => toRawItem(entry, source, now));
    } catch (error) {
      log.warn({ sourceId: source.id, error: errorMessage(error) }, "source fetch failed, yielding no items");
      return [];
    }
  }
}
