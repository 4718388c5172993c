import { ProcessedItem, Report, ReportSection } from "@/lib/domain/models";
import {
  EMPTY_RUN_LINE,
  EMPTY_SECTION_PLACEHOLDER,
  formatItemHeading,
  formatItemSummary,
} from "@/lib/output/text-writer";

const EMAIL_STYLES = `
  body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; color: #1e293b; max-width: 720px; margin: 0 auto; padding: 16px; }
  h1 { font-size: 20px; margin: 0 0 8px 0; }
  h2 { font-size: 15px; letter-spacing: 0.04em; border-bottom: 1px solid #e2e8f0; padding-bottom: 4px; margin-top: 24px; }
  ol { padding-left: 20px; }
  li { margin-bottom: 14px; }
  .meta { color: #64748b; font-size: 13px; }
  .opener { font-style: italic; color: #334155; }
  .empty { color: #94a3b8; }
`;

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

function renderItem(item: ProcessedItem): string {
  const opener = item.replyOpener ? `\n      <div class="opener">${escapeHtml(item.replyOpener)}</div>` : "";
  return `
    <li>
      <div><strong>${escapeHtml(formatItemHeading(item))}</strong></div>
      <div class="meta">${escapeHtml(formatItemSummary(item))}</div>
      <div><a href="${escapeHtml(item.link)}">${escapeHtml(item.title)}</a></div>${opener}
    </li>`;
}

function renderSection(section: ReportSection): string {
  const body = section.items.length
    ? `<ol>${section.items.map(renderItem).join("")}
  </ol>`
    : `<p class="empty">${EMPTY_SECTION_PLACEHOLDER}</p>`;
  return `
  <h2>${escapeHtml(section.title)}</h2>
  ${body}`;
}

export function renderReportHtml(report: Report): string {
  const intro = report.introLines.map((line) => `<p>${escapeHtml(line)}</p>`).join("\n  ");
  const snapshot = report.snapshotPath
    ? `<p class="meta">Saved queue: ${escapeHtml(report.snapshotPath)}</p>`
    : "";
  const emptyRun = report.totalItems ? "" : `<p>${EMPTY_RUN_LINE}</p>`;

  return `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${escapeHtml(report.subject)}</title>
  <style>${EMAIL_STYLES}</style>
</head>
<body>
  <h1>${escapeHtml(report.subject)}</h1>
  ${intro}
  <p class="meta">Generated: ${report.generatedAt.toISOString()}</p>
  <p class="meta">New items: ${report.totalItems}</p>
  ${snapshot}
  ${emptyRun}
  ${report.sections.map(renderSection).join("\n")}
</body>
</html>
`;
}
