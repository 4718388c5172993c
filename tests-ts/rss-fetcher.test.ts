import { afterEach, describe, expect, it } from "vitest";
import { RssSearchSource } from "@/lib/fetch/rss-fetcher";
import { NOW, source } from "./helpers";

const originalFetch = globalThis.fetch;

const atom = `<?xml version="1.0" encoding="UTF-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <title>search results</title>
  <entry>
    <id>t3_abc123</id>
    <title>How do I start?</title>
    <link href="https://forum.example.com/t/abc123" />
    <updated>2026-02-28T16:00:00+00:00</updated>
    <published>2026-02-28T15:00:00+00:00</published>
  </entry>
  <entry>
    <id>t3_def456</id>
    <title>Second entry</title>
    <link href="https://forum.example.com/t/def456" />
    <updated>2026-02-28T14:00:00+00:00</updated>
  </entry>
</feed>`;

const rss = `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0">
  <channel>
    <title>Feed</title>
    <item>
      <title><![CDATA[<b>Bold</b>   title]]></title>
      <link>https://forum.example.com/t/plain</link>
    </item>
  </channel>
</rss>`;

function serve(body: string, status = 200): string[] {
  const requested: string[] = [];
  globalThis.fetch = (async (input: string | URL | Request) => {
    requested.push(String(input instanceof URL ? input.toString() : input));
    return new Response(body, { status, headers: { "content-type": "application/atom+xml" } });
  }) as typeof fetch;
  return requested;
}

afterEach(() => {
  globalThis.fetch = originalFetch;
});

describe("rss fetcher", () => {
  it("maps atom entries to raw items", async () => {
    const requested = serve(atom);
    const feed = source("beginner-findomme", "Beginner findomme");
    const items = await new RssSearchSource({ now: () => NOW }).fetchItems(feed, 10);

    expect(requested).toEqual([feed.url]);
    expect(items).toEqual([
      {
        id: "t3_abc123",
        title: "How do I start?",
        link: "https://forum.example.com/t/abc123",
        createdAt: new Date("2026-02-28T15:00:00.000Z"),
        feed: "Beginner findomme",
        bucket: "beginner-findomme",
      },
      {
        id: "t3_def456",
        title: "Second entry",
        link: "https://forum.example.com/t/def456",
        createdAt: new Date("2026-02-28T14:00:00.000Z"),
        feed: "Beginner findomme",
        bucket: "beginner-findomme",
      },
    ]);
  });

  it("honours the per-source limit", async () => {
    serve(atom);
    const items = await new RssSearchSource({ now: () => NOW }).fetchItems(source("forum"), 1);
    expect(items.map((item) => item.id)).toEqual(["t3_abc123"]);
  });

  it("leaves the id empty and uses ingestion time when the entry has neither", async () => {
    serve(rss);
    const [item] = await new RssSearchSource({ now: () => NOW }).fetchItems(source("forum", "Forum"), 10);
    expect(item).toEqual({
      id: null,
      title: "Bold title",
      link: "https://forum.example.com/t/plain",
      createdAt: NOW,
      feed: "Forum",
      bucket: "forum",
    });
  });

  it("yields no items when the feed request fails", async () => {
    serve("unavailable", 503);
    await expect(new RssSearchSource().fetchItems(source("forum"), 10)).resolves.toEqual([]);
  });
});
