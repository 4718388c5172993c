import { writeFileSync } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { buildSearchUrl, loadRules, loadRunSettings, loadSources } from "@/lib/config-loader";
import { ConfigError } from "@/lib/domain/errors";
import { makeTempDir } from "./helpers";

const ORIGINAL_ENV = { ...process.env };
let dir = "";

beforeEach(async () => {
  dir = await makeTempDir();
});

afterEach(async () => {
  process.env = { ...ORIGINAL_ENV };
  await fs.rm(dir, { recursive: true, force: true });
});

async function writeConfig(name: string, content: string): Promise<string> {
  const filePath = path.join(dir, name);
  await fs.writeFile(filePath, content, "utf-8");
  return filePath;
}

describe("config loader", () => {
  it("encodes the query into the search url", () => {
    expect(buildSearchUrl("https://feeds.example.com/search?q={query}&sort=new", 'a "b"')).toBe(
      "https://feeds.example.com/search?q=a%20%22b%22&sort=new",
    );
  });

  it("loads the bundled sources in order", () => {
    const sources = loadSources();
    expect(sources).toHaveLength(11);
    expect(sources[0].id).toBe("beginner-paypig");
    expect(sources[2]).toEqual({
      id: "teamviewer",
      name: "TeamViewer",
      bucket: "supporter",
      query: "teamviewer AND (findom OR femdom)",
      url: "https://www.reddit.com/search.rss?q=teamviewer%20AND%20(findom%20OR%20femdom)&sort=new&t=week",
    });
  });

  it("skips duplicate and incomplete source rows", async () => {
    const filePath = await writeConfig(
      "sources.yaml",
      [
        'search_url_template: "https://feeds.example.com/?q={query}"',
        "sources:",
        "  - { id: one, query: first }",
        "  - { id: one, query: again }",
        "  - { id: two }",
      ].join("\n"),
    );
    const sources = loadSources(filePath);
    expect(sources.map((row) => [row.id, row.name, row.bucket, row.query])).toEqual([
      ["one", "one", "general", "first"],
    ]);
  });

  it("requires a query placeholder in the template", async () => {
    const filePath = await writeConfig(
      "sources.yaml",
      'search_url_template: "https://feeds.example.com/"\nsources:\n  - { id: one, query: first }\n',
    );
    expect(() => loadSources(filePath)).toThrowError(ConfigError);
  });

  it("reads SOURCES_CONFIG when no path is given", async () => {
    process.env.SOURCES_CONFIG = await writeConfig(
      "custom.yaml",
      'search_url_template: "https://feeds.example.com/?q={query}"\nsources:\n  - { id: solo, name: Solo, query: x }\n',
    );
    expect(loadSources().map((row) => row.id)).toEqual(["solo"]);
  });

  it("loads the bundled rules", () => {
    const rules = loadRules();
    expect(rules.classifier.supporter).toEqual(["paypig", "pay pig", "findom slave"]);
    expect(rules.scoring.lexicon).toHaveLength(12);
    expect(rules.scoring.lexicon[3]).toEqual({ term: "how do", weight: 2, tag: "how-to" });
    expect(rules.scoring.age).toEqual({
      freshMaxHours: 2,
      freshBonus: 3,
      recentMaxHours: 6,
      recentBonus: 2,
      warmMaxHours: 12,
      warmBonus: 1,
      oldMinHours: 48,
      oldPenalty: 2,
    });
    expect(rules.sections.titles["high-priority"]).toBe("HIGH PRIORITY");
    expect(rules.replyOpeners).toHaveLength(8);
    expect(rules.report.subjectPrefix).toBe("Thread radar");
  });

  it("falls back to defaults for an empty rules file", async () => {
    const rules = loadRules(await writeConfig("rules.yaml", ""));
    expect(rules.scoring.questionWeight).toBe(3);
    expect(rules.scoring.maxSignals).toBe(6);
    expect(rules.sections.cap).toBe(10);
    expect(rules.sections.highPriorityMin).toBe(6);
    expect(rules.replyOpeners).toEqual([]);
  });

  it("rejects malformed rules", async () => {
    expect(() => loadRules(path.join(dir, "missing.yaml"))).toThrowError(/Cannot read config file/);
    expect(() => loadRules(writeSync("broken.yaml", "scoring: [unclosed"))).toThrowError(/Invalid YAML/);
    expect(() => loadRules(writeSync("tiers.yaml", "scoring:\n  age:\n    warm: { max_hours: 60 }\n"))).toThrowError(
      "scoring.age tiers must satisfy fresh <= recent <= warm < old",
    );
    expect(() =>
      loadRules(writeSync("opener.yaml", "reply_openers:\n  - { category: nobody, text: hi }\n")),
    ).toThrowError("reply_openers[0].category is unknown: nobody");
  });

  it("reads run settings from the environment", () => {
    process.env.BACKFILL_HOURS = "24";
    process.env.MAX_ITEMS_PER_RUN = "5";
    process.env.STATE_ON_CORRUPT = "RESET";
    delete process.env.STATE_PATH;
    delete process.env.OUTPUT_DIR;

    expect(loadRunSettings()).toMatchObject({
      backfillHours: 24,
      maxItemsPerRun: 5,
      statePath: "state.json",
      outputDir: "output",
      resetCorruptState: true,
    });
  });

  it("rejects invalid run settings", () => {
    process.env.MAX_ITEMS_PER_RUN = "0";
    expect(() => loadRunSettings()).toThrowError("MAX_ITEMS_PER_RUN must be an integer >= 1: 0");

    process.env.MAX_ITEMS_PER_RUN = "10";
    process.env.STATE_ON_CORRUPT = "ignore";
    expect(() => loadRunSettings()).toThrowError(ConfigError);
  });
});

function writeSync(name: string, content: string): string {
  const filePath = path.join(dir, name);
  writeFileSync(filePath, content, "utf-8");
  return filePath;
}
