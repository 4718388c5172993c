import { RunSettings } from "@/lib/config-loader";
import { CliError } from "./errors";

export interface RunOptionInput {
  state?: string;
  outputDir?: string;
  maxItems?: number;
  backfillHours?: number;
  sources?: string;
  rules?: string;
  json?: boolean;
}

function normalizeString(value: unknown): string {
  return String(value ?? "").trim();
}

export function parseBoundedInt(label: string, value: unknown, min: number, max: number): number {
  const text = normalizeString(value);
  const parsed = Number.parseInt(text, 10);
  if (!Number.isFinite(parsed)) {
    throw new CliError(2, `${label} is not an integer: ${text}`);
  }
  if (parsed < min || parsed > max) {
    throw new CliError(2, `${label} must be within ${min}-${max}: ${parsed}`);
  }
  return parsed;
}

/** Flags override environment settings; unset flags leave them alone. */
export function resolveSettingsOverrides(options: RunOptionInput): Partial<RunSettings> {
  const overrides: Partial<RunSettings> = {};
  const statePath = normalizeString(options.state);
  if (statePath) {
    overrides.statePath = statePath;
  }
  const outputDir = normalizeString(options.outputDir);
  if (outputDir) {
    overrides.outputDir = outputDir;
  }
  if (options.maxItems !== undefined) {
    overrides.maxItemsPerRun = parseBoundedInt("max-items", options.maxItems, 1, 10_000);
  }
  if (options.backfillHours !== undefined) {
    overrides.backfillHours = parseBoundedInt("backfill-hours", options.backfillHours, 0, 24 * 365);
  }
  return overrides;
}

export function resolveStatePath(explicit?: string): string {
  return normalizeString(explicit) || normalizeString(process.env.STATE_PATH) || "state.json";
}
