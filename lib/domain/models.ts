export const CATEGORY_SUPPORTER = "supporter";
export const CATEGORY_CREATOR = "creator";
export const CATEGORY_MEDIA = "media";
export const CATEGORY_GENERAL = "general";

export type Category =
  | typeof CATEGORY_SUPPORTER
  | typeof CATEGORY_CREATOR
  | typeof CATEGORY_MEDIA
  | typeof CATEGORY_GENERAL;

export const CATEGORIES: readonly Category[] = [CATEGORY_SUPPORTER, CATEGORY_CREATOR, CATEGORY_MEDIA, CATEGORY_GENERAL];

export const NAMED_CATEGORIES: readonly Category[] = [CATEGORY_SUPPORTER, CATEGORY_CREATOR, CATEGORY_MEDIA];

export function isCategory(value: unknown): value is Category {
  return typeof value === "string" && (CATEGORIES as readonly string[]).includes(value);
}

export interface SourceConfig {
  id: string;
  name: string;
  bucket: string;
  query: string;
  url: string;
}

export interface RawItem {
  id: string | null;
  title: string;
  link: string;
  createdAt: Date;
  feed: string;
  bucket: string;
}

export interface AdmittedItem {
  id: string;
  title: string;
  link: string;
  createdAt: Date;
  feed: string;
  bucket: string;
  ageHours: number;
}

export interface ProcessedItem extends AdmittedItem {
  category: Category;
  priority: number;
  signals: string[];
  replyOpener: string | null;
}

export type RejectReason = "no-identity" | "duplicate" | "stale" | "incomplete";

export type AdmitResult = { admitted: true; item: AdmittedItem } | { admitted: false; reason: RejectReason };

export interface TimeWindow {
  lowerBound: Date;
}

export interface ScoreResult {
  priority: number;
  signals: string[];
}

export interface ReportSection {
  key: string;
  title: string;
  items: ProcessedItem[];
}

export interface Report {
  subject: string;
  generatedAt: Date;
  introLines: string[];
  totalItems: number;
  snapshotPath: string;
  sections: ReportSection[];
}

export interface ReportMessage {
  subject: string;
  text: string;
  html?: string;
}

export type RunPhase =
  | "idle"
  | "loading"
  | "ingesting"
  | "ranking"
  | "rendering"
  | "dispatching"
  | "committing"
  | "done"
  | "failed";

export interface SourceRunStats {
  sourceId: string;
  fetched: number;
  admitted: number;
  failed: boolean;
}

export interface DigestRunStats {
  windowLowerBound: string;
  sources: SourceRunStats[];
  rejected: Record<RejectReason, number>;
  admitted: number;
  capReached: boolean;
  phases: RunPhase[];
}

export interface DigestRunResult {
  dryRun: boolean;
  items: ProcessedItem[];
  report: Report;
  text: string;
  html: string;
  snapshotPath: string;
  committed: boolean;
  stats: DigestRunStats;
}
