import { runDigestFromEnv } from "@/lib/digest-runner";
import { DigestRunResult } from "@/lib/domain/models";
import { toSnapshotRow } from "@/lib/output/queue-snapshot";
import { resolveSettingsOverrides, RunOptionInput } from "../config";
import { toCliError } from "../errors";
import { CommandResult, dimLine, successLine, warnLine } from "../output";

function summaryPayload(result: DigestRunResult): Record<string, unknown> {
  return {
    ok: true,
    dry_run: result.dryRun,
    committed: result.committed,
    subject: result.report.subject,
    item_count: result.items.length,
    snapshot_path: result.snapshotPath,
    window_lower_bound: result.stats.windowLowerBound,
    cap_reached: result.stats.capReached,
    rejected: result.stats.rejected,
    sources: result.stats.sources,
  };
}

async function execute(options: RunOptionInput, dryRun: boolean): Promise<DigestRunResult> {
  try {
    return await runDigestFromEnv({
      dryRun,
      settings: resolveSettingsOverrides(options),
      sourcesConfig: options.sources,
      rulesConfig: options.rules,
    });
  } catch (error) {
    throw toCliError(error);
  }
}

export async function executeRunCommand(options: RunOptionInput): Promise<CommandResult> {
  const result = await execute(options, false);
  const rejected = Object.entries(result.stats.rejected)
    .map(([reason, count]) => `${reason}=${count}`)
    .join(" ");
  const lines = [
    successLine(`Report sent: ${result.report.subject}`),
    `Snapshot: ${result.snapshotPath}`,
    `Window from: ${result.stats.windowLowerBound}`,
    dimLine(`Rejected: ${rejected}`),
  ];
  const failedSources = result.stats.sources.filter((source) => source.failed).map((source) => source.sourceId);
  if (failedSources.length) {
    lines.push(warnLine(`Sources without items due to errors: ${failedSources.join(", ")}`));
  }
  if (result.stats.capReached) {
    lines.push(warnLine("Per-run item cap reached; later sources were skipped"));
  }
  return { payload: summaryPayload(result), lines };
}

export async function executePreviewCommand(options: RunOptionInput): Promise<CommandResult> {
  const result = await execute(options, true);
  return {
    payload: {
      ...summaryPayload(result),
      items: result.items.map(toSnapshotRow),
    },
    lines: [result.text.trimEnd(), "", dimLine("Preview only: nothing was sent and state was not changed")],
  };
}
