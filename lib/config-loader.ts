import fs from "node:fs";
import path from "node:path";
import yaml from "js-yaml";
import { ConfigError, isRecord } from "@/lib/domain/errors";
import { isCategory, SourceConfig } from "@/lib/domain/models";
import { AgeTiers, DigestRules, LexiconEntry, ReplyOpenerRule } from "@/lib/domain/rules";
import { envInt, envString } from "@/lib/infra/env";

const DEFAULT_CONFIG_DIR = path.join(process.cwd(), "config");
const QUERY_PLACEHOLDER = "{query}";

export interface RunSettings {
  backfillHours: number;
  maxItemsPerRun: number;
  maxEntriesPerSource: number;
  seenIdsLimit: number;
  statePath: string;
  outputDir: string;
  resetCorruptState: boolean;
  feedTimeoutSeconds: number;
}

export function loadYaml(filePath: string): Record<string, unknown> {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
  }
  let data: unknown;
  try {
    data = yaml.load(raw) || {};
  } catch (error) {
    throw new ConfigError(`Invalid YAML in ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
  }
  if (!isRecord(data)) {
    throw new ConfigError(`YAML root must be a mapping: ${filePath}`);
  }
  return data;
}

function section(raw: Record<string, unknown>, key: string, label: string): Record<string, unknown> {
  const value = raw[key];
  if (value === undefined || value === null) {
    return {};
  }
  if (!isRecord(value)) {
    throw new ConfigError(`${label}.${key} must be a mapping`);
  }
  return value;
}

function readNumber(raw: Record<string, unknown>, key: string, label: string, fallback: number): number {
  const value = raw[key];
  if (value === undefined || value === null) {
    return fallback;
  }
  const n = Number(value);
  if (!Number.isFinite(n)) {
    throw new ConfigError(`${label}.${key} must be a number: ${String(value)}`);
  }
  return Math.trunc(n);
}

function readStringList(raw: Record<string, unknown>, key: string, label: string, lowercase = true): string[] {
  const value = raw[key];
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new ConfigError(`${label}.${key} must be a list`);
  }
  const items = value.map((item) => String(item ?? "").trim()).filter(Boolean);
  return lowercase ? items.map((item) => item.toLowerCase()) : items;
}

function readString(raw: Record<string, unknown>, key: string, fallback = ""): string {
  const value = raw[key];
  return value === undefined || value === null ? fallback : String(value).trim();
}

export function buildSearchUrl(template: string, query: string): string {
  return template.split(QUERY_PLACEHOLDER).join(encodeURIComponent(query));
}

export function loadSources(sourcePath?: string): SourceConfig[] {
  const configPath = sourcePath || envString("SOURCES_CONFIG") || path.join(DEFAULT_CONFIG_DIR, "sources.yaml");
  const raw = loadYaml(configPath);
  const template = readString(raw, "search_url_template");
  if (!template.includes(QUERY_PLACEHOLDER)) {
    throw new ConfigError(`search_url_template must contain ${QUERY_PLACEHOLDER}: ${configPath}`);
  }
  const sourceRows = Array.isArray(raw.sources) ? raw.sources : [];

  const sources: SourceConfig[] = [];
  const seenIds = new Set<string>();

  for (const row of sourceRows) {
    if (!isRecord(row)) continue;
    const sourceId = readString(row, "id");
    const query = readString(row, "query");
    if (!sourceId || !query || seenIds.has(sourceId)) {
      continue;
    }

    sources.push({
      id: sourceId,
      name: readString(row, "name") || sourceId,
      bucket: readString(row, "bucket") || "general",
      query,
      url: buildSearchUrl(template, query),
    });
    seenIds.add(sourceId);
  }

  if (!sources.length) {
    throw new ConfigError(`sources cannot be empty: ${configPath}`);
  }
  return sources;
}

function parseLexicon(rows: unknown): LexiconEntry[] {
  if (rows === undefined || rows === null) return [];
  if (!Array.isArray(rows)) {
    throw new ConfigError("scoring.lexicon must be a list");
  }
  return rows.map((row, index) => {
    if (!isRecord(row)) {
      throw new ConfigError(`scoring.lexicon[${index}] must be a mapping`);
    }
    const term = readString(row, "term").toLowerCase();
    if (!term) {
      throw new ConfigError(`scoring.lexicon[${index}].term cannot be empty`);
    }
    return {
      term,
      weight: readNumber(row, "weight", `scoring.lexicon[${index}]`, 1),
      tag: readString(row, "tag") || term,
    };
  });
}

function parseAgeTiers(raw: Record<string, unknown>): AgeTiers {
  const fresh = section(raw, "fresh", "scoring.age");
  const recent = section(raw, "recent", "scoring.age");
  const warm = section(raw, "warm", "scoring.age");
  const old = section(raw, "old", "scoring.age");
  const tiers: AgeTiers = {
    freshMaxHours: readNumber(fresh, "max_hours", "scoring.age.fresh", 2),
    freshBonus: readNumber(fresh, "bonus", "scoring.age.fresh", 3),
    recentMaxHours: readNumber(recent, "max_hours", "scoring.age.recent", 6),
    recentBonus: readNumber(recent, "bonus", "scoring.age.recent", 2),
    warmMaxHours: readNumber(warm, "max_hours", "scoring.age.warm", 12),
    warmBonus: readNumber(warm, "bonus", "scoring.age.warm", 1),
    oldMinHours: readNumber(old, "min_hours", "scoring.age.old", 48),
    oldPenalty: readNumber(old, "penalty", "scoring.age.old", 2),
  };
  if (
    !(tiers.freshMaxHours <= tiers.recentMaxHours && tiers.recentMaxHours <= tiers.warmMaxHours) ||
    tiers.warmMaxHours >= tiers.oldMinHours
  ) {
    throw new ConfigError("scoring.age tiers must satisfy fresh <= recent <= warm < old");
  }
  return tiers;
}

function parseReplyOpeners(rows: unknown): ReplyOpenerRule[] {
  if (rows === undefined || rows === null) return [];
  if (!Array.isArray(rows)) {
    throw new ConfigError("reply_openers must be a list");
  }
  return rows.map((row, index) => {
    if (!isRecord(row)) {
      throw new ConfigError(`reply_openers[${index}] must be a mapping`);
    }
    const category = readString(row, "category");
    if (!isCategory(category)) {
      throw new ConfigError(`reply_openers[${index}].category is unknown: ${category}`);
    }
    const text = readString(row, "text");
    if (!text) {
      throw new ConfigError(`reply_openers[${index}].text cannot be empty`);
    }
    return { category, terms: readStringList(row, "terms", `reply_openers[${index}]`), text };
  });
}

export function loadRules(rulesPath?: string): DigestRules {
  const configPath = rulesPath || envString("RULES_CONFIG") || path.join(DEFAULT_CONFIG_DIR, "rules.yaml");
  const raw = loadYaml(configPath);

  const classifier = section(raw, "classifier", "rules");
  const scoring = section(raw, "scoring", "rules");
  const targetFeeds = section(scoring, "target_feeds", "scoring");
  const megathread = section(scoring, "megathread", "scoring");
  const sections = section(raw, "sections", "rules");
  const highPriority = section(sections, "high_priority", "sections");
  const report = section(raw, "report", "rules");

  const titlesRaw = section(sections, "titles", "sections");
  const titles: Record<string, string> = {};
  for (const [key, value] of Object.entries(titlesRaw)) {
    const title = String(value ?? "").trim();
    if (title) titles[key] = title;
  }

  const maxSignals = readNumber(scoring, "max_signals", "scoring", 6);
  const cap = readNumber(sections, "cap", "sections", 10);
  if (maxSignals < 1 || cap < 1) {
    throw new ConfigError(`scoring.max_signals and sections.cap must be >= 1: ${configPath}`);
  }

  return {
    classifier: {
      creator: readStringList(classifier, "creator", "classifier"),
      supporter: readStringList(classifier, "supporter", "classifier"),
      media: readStringList(classifier, "media", "classifier"),
    },
    scoring: {
      questionWeight: readNumber(scoring, "question_weight", "scoring", 3),
      maxSignals,
      lexicon: parseLexicon(scoring.lexicon),
      targetFeedPatterns: readStringList(targetFeeds, "patterns", "scoring.target_feeds"),
      targetFeedBonus: readNumber(targetFeeds, "bonus", "scoring.target_feeds", 1),
      megathreadMarkers: readStringList(megathread, "markers", "scoring.megathread"),
      megathreadPenalty: readNumber(megathread, "penalty", "scoring.megathread", 4),
      age: parseAgeTiers(section(scoring, "age", "scoring")),
    },
    sections: {
      highPriorityMin: readNumber(highPriority, "min_priority", "sections.high_priority", 6),
      highPriorityMaxAgeHours: readNumber(highPriority, "max_age_hours", "sections.high_priority", 24),
      cap,
      titles,
    },
    replyOpeners: parseReplyOpeners(raw.reply_openers),
    report: {
      subjectPrefix: readString(report, "subject_prefix", "Thread radar") || "Thread radar",
      introLines: readStringList(report, "intro_lines", "report", false),
    },
  };
}

export function loadRunSettings(): RunSettings {
  const onCorrupt = envString("STATE_ON_CORRUPT", "fail").toLowerCase();
  if (onCorrupt !== "fail" && onCorrupt !== "reset") {
    throw new ConfigError(`STATE_ON_CORRUPT must be "fail" or "reset": ${onCorrupt}`);
  }
  return {
    backfillHours: envInt("BACKFILL_HOURS", 168),
    maxItemsPerRun: envInt("MAX_ITEMS_PER_RUN", 120, 1),
    maxEntriesPerSource: envInt("MAX_ENTRIES_PER_SOURCE", 200, 1),
    seenIdsLimit: envInt("SEEN_IDS_LIMIT", 10_000, 1),
    statePath: envString("STATE_PATH", "state.json"),
    outputDir: envString("OUTPUT_DIR", "output"),
    resetCorruptState: onCorrupt === "reset",
    feedTimeoutSeconds: envInt("FEED_TIMEOUT_SECONDS", 20, 1),
  };
}
