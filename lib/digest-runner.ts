import { DeliveryCollaborator, SourceCollaborator } from "@/lib/domain/collaborators";
import { DigestRunError, errorMessage } from "@/lib/domain/errors";
import {
  DigestRunResult,
  DigestRunStats,
  ProcessedItem,
  RawItem,
  RejectReason,
  RunPhase,
  SourceConfig,
} from "@/lib/domain/models";
import { DigestRules } from "@/lib/domain/rules";
import { loadRules, loadRunSettings, loadSources, RunSettings } from "@/lib/config-loader";
import { RssSearchSource } from "@/lib/fetch/rss-fetcher";
import { createLogger, Logger } from "@/lib/infra/logger";
import { MailDelivery } from "@/lib/integrations/mail-client";
import { renderReportHtml } from "@/lib/output/html-writer";
import { runStamp, writeQueueSnapshot } from "@/lib/output/queue-snapshot";
import { buildReport } from "@/lib/output/report-builder";
import { renderReportText } from "@/lib/output/text-writer";
import { admit } from "@/lib/process/admit";
import { enrichItem } from "@/lib/process/enrich";
import { rankItems } from "@/lib/process/rank";
import { computeTimeWindow } from "@/lib/process/time-window";
import { FileStateStore, StateStore } from "@/lib/state/state-store";

export interface DigestDependencies {
  sources: SourceConfig[];
  rules: DigestRules;
  settings: RunSettings;
  source: SourceCollaborator;
  delivery: DeliveryCollaborator | null;
  store: StateStore;
  now?: () => Date;
}

export interface RunDigestOptions {
  dryRun?: boolean;
}

function emptyRejections(): Record<RejectReason, number> {
  return { "no-identity": 0, duplicate: 0, stale: 0, incomplete: 0 };
}

async function fetchSource(
  deps: DigestDependencies,
  source: SourceConfig,
  log: Logger,
): Promise<{ items: RawItem[]; failed: boolean }> {
  try {
    const items = await deps.source.fetchItems(source, deps.settings.maxEntriesPerSource);
    return { items: items.slice(0, deps.settings.maxEntriesPerSource), failed: false };
  } catch (error) {
    log.warn({ sourceId: source.id, error: errorMessage(error) }, "source failed, continuing with remaining sources");
    return { items: [], failed: true };
  }
}

/**
 * One batch pass:
 * idle → loading → ingesting → ranking → rendering → dispatching → committing → done.
 * Any error moves the run to failed and is rethrown as a DigestRunError naming the phase.
 * State is persisted only after the report was handed to the delivery collaborator.
 */
export async function runDigest(deps: DigestDependencies, options: RunDigestOptions = {}): Promise<DigestRunResult> {
  const dryRun = Boolean(options.dryRun);
  const clock = deps.now || (() => new Date());
  const now = clock();
  const log = createLogger({ component: "runner", runId: runStamp(now) });
  const { settings, rules } = deps;

  const stats: DigestRunStats = {
    windowLowerBound: "",
    sources: [],
    rejected: emptyRejections(),
    admitted: 0,
    capReached: false,
    phases: ["idle"],
  };
  let phase: RunPhase = "idle";
  const enter = (next: RunPhase) => {
    phase = next;
    stats.phases.push(next);
    log.debug({ phase: next }, "phase");
  };

  try {
    enter("loading");
    const state = await deps.store.load();
    const window = computeTimeWindow(state.lastRunAt, now, settings.backfillHours);
    stats.windowLowerBound = window.lowerBound.toISOString();
    log.info({ seen: state.seen.size, windowLowerBound: stats.windowLowerBound, dryRun }, "state loaded");

    enter("ingesting");
    const seen = new Set<string>(state.seen.values());
    const collected: ProcessedItem[] = [];

    for (const source of deps.sources) {
      const { items, failed } = await fetchSource(deps, source, log);
      let admittedHere = 0;

      for (const raw of items) {
        const result = admit(raw, seen, window, now);
        if (!result.admitted) {
          stats.rejected[result.reason] += 1;
          log.debug({ sourceId: source.id, reason: result.reason, id: raw.id, link: raw.link }, "item rejected");
          continue;
        }
        collected.push(enrichItem(result.item, rules));
        admittedHere += 1;
      }

      stats.sources.push({ sourceId: source.id, fetched: items.length, admitted: admittedHere, failed });
      log.info({ sourceId: source.id, fetched: items.length, admitted: admittedHere }, "source ingested");

      // checked per source, so the last batch may carry the total past the cap
      if (collected.length >= settings.maxItemsPerRun) {
        stats.capReached = true;
        log.info({ collected: collected.length, cap: settings.maxItemsPerRun }, "per-run item cap reached");
        break;
      }
    }
    stats.admitted = collected.length;

    enter("ranking");
    const ranked = rankItems(collected);

    enter("rendering");
    const snapshotPath = dryRun ? "" : await writeQueueSnapshot(ranked, settings.outputDir, now);
    const report = buildReport(ranked, rules, { generatedAt: now, snapshotPath });
    const text = renderReportText(report);
    const html = renderReportHtml(report);

    const result: DigestRunResult = {
      dryRun,
      items: ranked,
      report,
      text,
      html,
      snapshotPath,
      committed: false,
      stats,
    };

    if (dryRun) {
      enter("done");
      return result;
    }

    enter("dispatching");
    if (!deps.delivery) {
      throw new Error("No delivery collaborator configured");
    }
    await deps.delivery.deliver({ subject: report.subject, text, html });

    enter("committing");
    // admission order, which is the ring's eviction order
    state.seen.addAll(collected.map((item) => item.id));
    state.lastRunAt = now;
    await deps.store.save(state);
    result.committed = true;

    enter("done");
    log.info({ items: ranked.length, rejected: stats.rejected, snapshotPath }, "digest run complete");
    return result;
  } catch (error) {
    const failedPhase = phase;
    enter("failed");
    log.error({ phase: failedPhase, err: error }, "digest run failed");
    throw new DigestRunError(failedPhase, error);
  }
}

export interface RunDigestFromEnvOptions extends RunDigestOptions {
  settings?: Partial<RunSettings>;
  sourcesConfig?: string;
  rulesConfig?: string;
}

export async function runDigestFromEnv(options: RunDigestFromEnvOptions = {}): Promise<DigestRunResult> {
  const settings: RunSettings = { ...loadRunSettings(), ...options.settings };
  const deps: DigestDependencies = {
    sources: loadSources(options.sourcesConfig),
    rules: loadRules(options.rulesConfig),
    settings,
    source: new RssSearchSource({ timeoutSeconds: settings.feedTimeoutSeconds }),
    delivery: options.dryRun ? null : MailDelivery.fromEnv(),
    store: new FileStateStore(settings.statePath, settings.seenIdsLimit, settings.resetCorruptState),
  };
  return runDigest(deps, { dryRun: options.dryRun });
}
