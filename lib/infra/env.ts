import { ConfigError } from "@/lib/domain/errors";

export function isEnabled(envName: string, defaultValue = "true"): boolean {
  const raw = String(process.env[envName] || defaultValue || "").trim().toLowerCase();
  return !["0", "false", "no", "off"].includes(raw);
}

export function envString(envName: string, defaultValue = ""): string {
  return String(process.env[envName] || defaultValue).trim();
}

export function envInt(envName: string, defaultValue: number, min = 0): number {
  const raw = String(process.env[envName] ?? "").trim();
  if (!raw) {
    return defaultValue;
  }
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed < min) {
    throw new ConfigError(`${envName} must be an integer >= ${min}: ${raw}`);
  }
  return parsed;
}
