import fs from "node:fs/promises";
import path from "node:path";
import { isRecord, StateCorruptError } from "@/lib/domain/errors";
import { createLogger } from "@/lib/infra/logger";
import { SeenRing } from "@/lib/state/seen-ring";

export interface RunState {
  seen: SeenRing;
  lastRunAt: Date | null;
}

export interface PersistedRunState {
  seen_ids: string[];
  last_run_utc: string | null;
}

export interface StateStore {
  load(): Promise<RunState>;
  save(state: RunState): Promise<void>;
}

const log = createLogger({ component: "state" });

export function emptyRunState(capacity: number): RunState {
  return { seen: new SeenRing(capacity), lastRunAt: null };
}

export function serializeRunState(state: RunState): PersistedRunState {
  return {
    seen_ids: state.seen.toArray(),
    last_run_utc: state.lastRunAt ? state.lastRunAt.toISOString() : null,
  };
}

export function parseRunState(text: string, capacity: number, statePath: string): RunState {
  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch (error) {
    throw new StateCorruptError(statePath, error instanceof Error ? error.message : String(error));
  }
  if (!isRecord(payload)) {
    throw new StateCorruptError(statePath, "root must be an object");
  }

  const seenIds = payload.seen_ids;
  if (!Array.isArray(seenIds) || !seenIds.every((id): id is string => typeof id === "string")) {
    throw new StateCorruptError(statePath, "seen_ids must be a list of strings");
  }

  let lastRunAt: Date | null = null;
  const rawLastRun = payload.last_run_utc;
  if (rawLastRun !== null && rawLastRun !== undefined) {
    if (typeof rawLastRun !== "string") {
      throw new StateCorruptError(statePath, "last_run_utc must be an ISO-8601 string or null");
    }
    lastRunAt = new Date(rawLastRun);
    if (Number.isNaN(lastRunAt.getTime())) {
      throw new StateCorruptError(statePath, `last_run_utc is not a valid instant: ${rawLastRun}`);
    }
  }

  return { seen: new SeenRing(capacity, seenIds), lastRunAt };
}

function isMissingFile(error: unknown): boolean {
  return isRecord(error) && error.code === "ENOENT";
}

export class FileStateStore implements StateStore {
  constructor(
    readonly statePath: string,
    private readonly capacity: number,
    private readonly resetCorrupt = false,
  ) {}

  async load(): Promise<RunState> {
    let text: string;
    try {
      text = await fs.readFile(this.statePath, "utf-8");
    } catch (error) {
      if (isMissingFile(error)) {
        log.info({ statePath: this.statePath }, "no state file, starting from empty state");
        return emptyRunState(this.capacity);
      }
      throw error;
    }

    try {
      return parseRunState(text, this.capacity, this.statePath);
    } catch (error) {
      if (error instanceof StateCorruptError && this.resetCorrupt) {
        log.warn({ statePath: this.statePath, err: error }, "corrupt state file ignored, starting from empty state");
        return emptyRunState(this.capacity);
      }
      throw error;
    }
  }

  async save(state: RunState): Promise<void> {
    await fs.mkdir(path.dirname(path.resolve(this.statePath)), { recursive: true });
    const tempPath = `${this.statePath}.tmp-${process.pid}`;
    await fs.writeFile(tempPath, `${JSON.stringify(serializeRunState(state), null, 2)}\n`, "utf-8");
    await fs.rename(tempPath, this.statePath);
    log.debug({ statePath: this.statePath, seen: state.seen.size }, "state saved");
  }
}
