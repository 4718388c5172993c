import { ProcessedItem, Report } from "@/lib/domain/models";

export const EMPTY_SECTION_PLACEHOLDER = "(none)";
export const EMPTY_RUN_LINE = "No new items in the selected backfill window.";

export function formatSignals(signals: string[]): string {
  return signals.length ? signals.join(", ") : "-";
}

export function formatItemSummary(item: ProcessedItem): string {
  return `Priority: ${item.priority}, Age: ${item.ageHours}h, Signals: ${formatSignals(item.signals)}`;
}

export function formatItemHeading(item: ProcessedItem): string {
  return `${item.category.toUpperCase()} lead, ${item.feed}`;
}

export function renderReportText(report: Report): string {
  const lines: string[] = [];

  lines.push(...report.introLines);
  if (report.introLines.length) {
    lines.push("");
  }
  lines.push(`Generated: ${report.generatedAt.toISOString()}`);
  lines.push(`New items: ${report.totalItems}`);
  if (report.snapshotPath) {
    lines.push(`Saved queue: ${report.snapshotPath}`);
  }
  lines.push("");

  if (!report.totalItems) {
    lines.push(EMPTY_RUN_LINE);
    lines.push("");
  }

  for (const section of report.sections) {
    lines.push(`== ${section.title} ==`);
    if (!section.items.length) {
      lines.push(`   ${EMPTY_SECTION_PLACEHOLDER}`);
      lines.push("");
      continue;
    }
    section.items.forEach((item, index) => {
      lines.push(`${index + 1}. ${formatItemHeading(item)}`);
      lines.push(`   ${formatItemSummary(item)}`);
      lines.push(`   Title: ${item.title}`);
      lines.push(`   Link:  ${item.link}`);
      if (item.replyOpener) {
        lines.push(`   Opener: ${item.replyOpener}`);
      }
      lines.push("");
    });
  }

  return `${lines.join("\n").replace(/\s+$/g, "")}\n`;
}
