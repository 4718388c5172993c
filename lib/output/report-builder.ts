import { CATEGORY_GENERAL, NAMED_CATEGORIES, ProcessedItem, Report, ReportSection } from "@/lib/domain/models";
import { DigestRules } from "@/lib/domain/rules";

export const SECTION_HIGH_PRIORITY = "high-priority";
export const SECTION_OTHER = "other";

export interface BuildReportOptions {
  generatedAt: Date;
  snapshotPath: string;
}

function sectionTitle(key: string, titles: Record<string, string>): string {
  return titles[key] || key.replace(/-/g, " ").toUpperCase();
}

export function buildSubject(prefix: string, totalItems: number): string {
  return `${prefix}: ${totalItems} new items`;
}

/** Sections are filtered from the full ranked list, so one item can appear in several. */
export function buildReport(ranked: ProcessedItem[], rules: DigestRules, options: BuildReportOptions): Report {
  const { cap, highPriorityMin, highPriorityMaxAgeHours, titles } = rules.sections;

  const sections: ReportSection[] = [
    {
      key: SECTION_HIGH_PRIORITY,
      title: sectionTitle(SECTION_HIGH_PRIORITY, titles),
      items: ranked
        .filter((item) => item.priority >= highPriorityMin && item.ageHours <= highPriorityMaxAgeHours)
        .slice(0, cap),
    },
  ];

  for (const category of NAMED_CATEGORIES) {
    sections.push({
      key: category,
      title: sectionTitle(category, titles),
      items: ranked.filter((item) => item.category === category).slice(0, cap),
    });
  }

  sections.push({
    key: SECTION_OTHER,
    title: sectionTitle(SECTION_OTHER, titles),
    items: ranked.filter((item) => item.category === CATEGORY_GENERAL).slice(0, cap),
  });

  return {
    subject: buildSubject(rules.report.subjectPrefix, ranked.length),
    generatedAt: options.generatedAt,
    introLines: [...rules.report.introLines],
    totalItems: ranked.length,
    snapshotPath: options.snapshotPath,
    sections,
  };
}
