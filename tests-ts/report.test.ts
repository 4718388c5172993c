import { describe, expect, it } from "vitest";
import { loadRules } from "@/lib/config-loader";
import { escapeHtml, renderReportHtml } from "@/lib/output/html-writer";
import { buildReport, buildSubject } from "@/lib/output/report-builder";
import { EMPTY_RUN_LINE, renderReportText } from "@/lib/output/text-writer";
import { NOW, processedItem } from "./helpers";

const rules = loadRules();
const options = { generatedAt: NOW, snapshotPath: "output/queue_20260301_120000.json" };

const creatorLead = processedItem({
  id: "t3_lead",
  title: "How do I start?",
  link: "https://forum.example.com/t/lead",
  feed: "Beginner findomme",
  category: "creator",
  priority: 12,
  ageHours: 1,
  signals: ["question", "start"],
  replyOpener: "Opener text",
});

describe("report builder", () => {
  it("builds the subject from the prefix and item count", () => {
    expect(buildSubject("Thread radar", 3)).toBe("Thread radar: 3 new items");
  });

  it("always emits the five sections in a fixed order", () => {
    const report = buildReport([], rules, options);
    expect(report.sections.map((section) => section.key)).toEqual([
      "high-priority",
      "supporter",
      "creator",
      "media",
      "other",
    ]);
    expect(report.subject).toBe("Thread radar: 0 new items");
  });

  it("selects high priority items by priority and age", () => {
    const report = buildReport(
      [
        processedItem({ id: "hot", priority: 9, ageHours: 30 }),
        processedItem({ id: "edge", priority: 6, ageHours: 24 }),
        processedItem({ id: "low", priority: 5, ageHours: 1 }),
      ],
      rules,
      options,
    );
    expect(report.sections[0].items.map((item) => item.id)).toEqual(["edge"]);
    expect(report.sections[4].items.map((item) => item.id)).toEqual(["hot", "edge", "low"]);
  });

  it("caps each section", () => {
    const items = Array.from({ length: 12 }, (_, index) =>
      processedItem({ id: `s${index}`, category: "supporter" }),
    );
    const report = buildReport(items, rules, options);
    expect(report.totalItems).toBe(12);
    expect(report.sections[1].items).toHaveLength(10);
    expect(report.sections[1].items[9].id).toBe("s9");
  });
});

describe("text report", () => {
  it("renders intro, counts and every section", () => {
    const text = renderReportText(buildReport([creatorLead], rules, options));
    const item = [
      "1. CREATOR lead, Beginner findomme",
      "   Priority: 12, Age: 1h, Signals: question, start",
      "   Title: How do I start?",
      "   Link:  https://forum.example.com/t/lead",
      "   Opener: Opener text",
    ];

    expect(text).toBe(
      [
        "Thread radar leads, pick 3 and reply with value. Usually no links in the comment.",
        "Suggested routine: reply with 3 to 6 sentences, add 1 question at the end, avoid selling.",
        "",
        "Generated: 2026-03-01T12:00:00.000Z",
        "New items: 1",
        "Saved queue: output/queue_20260301_120000.json",
        "",
        "== HIGH PRIORITY ==",
        ...item,
        "",
        "== SUPPORTER LEADS ==",
        "   (none)",
        "",
        "== CREATOR LEADS ==",
        ...item,
        "",
        "== MEDIA MENTIONS ==",
        "   (none)",
        "",
        "== OTHER ==",
        "   (none)",
      ].join("\n") + "\n",
    );
  });

  it("states an empty run explicitly", () => {
    const lines = renderReportText(buildReport([], rules, { generatedAt: NOW, snapshotPath: "" })).split("\n");
    expect(lines.slice(3, 7)).toEqual(["Generated: 2026-03-01T12:00:00.000Z", "New items: 0", "", EMPTY_RUN_LINE]);
    expect(lines.filter((line) => line === "   (none)")).toHaveLength(5);
  });

  it("shows a dash when an item has no signals", () => {
    const text = renderReportText(buildReport([processedItem({ signals: [] })], rules, options));
    expect(text.split("\n")).toContain("   Priority: 0, Age: 1h, Signals: -");
  });
});

describe("html report", () => {
  it("escapes markup in titles", () => {
    expect(escapeHtml(`<b>"Tom" & 'Jerry'</b>`)).toBe("&lt;b&gt;&quot;Tom&quot; &amp; &#39;Jerry&#39;&lt;/b&gt;");

    const html = renderReportHtml(buildReport([processedItem({ title: "<b>bold</b> & more" })], rules, options));
    expect(html).toContain(
      '<div><a href="https://forum.example.com/t/item">&lt;b&gt;bold&lt;/b&gt; &amp; more</a></div>',
    );
    expect(html).toContain("<h2>OTHER</h2>");
    expect(html).toContain("<title>Thread radar: 1 new items</title>");
    expect(html).toContain('<p class="meta">Generated: 2026-03-01T12:00:00.000Z</p>');
  });

  it("marks empty sections", () => {
    const html = renderReportHtml(buildReport([], rules, options));
    expect(html.match(/<p class="empty">\(none\)<\/p>/g)).toHaveLength(5);
  });
});
