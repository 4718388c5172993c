import { loadRunSettings } from "@/lib/config-loader";
import { emptyRunState, FileStateStore, serializeRunState } from "@/lib/state/state-store";
import { resolveStatePath } from "../config";
import { CliError, toCliError } from "../errors";
import { CommandResult, successLine, warnLine } from "../output";

export interface StateCommandOptions {
  state?: string;
  json?: boolean;
  force?: boolean;
}

function buildStore(options: StateCommandOptions): FileStateStore {
  try {
    const settings = loadRunSettings();
    return new FileStateStore(resolveStatePath(options.state), settings.seenIdsLimit);
  } catch (error) {
    throw toCliError(error);
  }
}

export async function executeStateShowCommand(options: StateCommandOptions): Promise<CommandResult> {
  const store = buildStore(options);
  const state = await store.load().catch((error: unknown) => {
    throw toCliError(error);
  });
  const persisted = serializeRunState(state);
  const newest = persisted.seen_ids.slice(-5).reverse();
  return {
    payload: {
      ok: true,
      state_path: store.statePath,
      seen_count: persisted.seen_ids.length,
      seen_capacity: state.seen.capacity,
      last_run_utc: persisted.last_run_utc,
      newest_ids: newest,
    },
    lines: [
      successLine(`State: ${store.statePath}`),
      `Seen identities: ${persisted.seen_ids.length} / ${state.seen.capacity}`,
      `Last run: ${persisted.last_run_utc ?? "never"}`,
      ...newest.map((id) => `  ${id}`),
    ],
  };
}

export async function executeStateResetCommand(options: StateCommandOptions): Promise<CommandResult> {
  if (!options.force) {
    throw new CliError(1, "state reset forgets every reported item and needs --force", {
      hint: "Example: thread-radar state reset --force",
    });
  }
  const store = buildStore(options);
  try {
    await store.save(emptyRunState(1));
  } catch (error) {
    throw toCliError(error);
  }
  return {
    payload: { ok: true, state_path: store.statePath, reset: true },
    lines: [
      successLine(`State reset: ${store.statePath}`),
      warnLine("The next run reconsiders the full backfill window"),
    ],
  };
}
