import { RunPhase } from "@/lib/domain/models";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class StateCorruptError extends Error {
  readonly statePath: string;

  constructor(statePath: string, message: string) {
    super(`State file is corrupt (${statePath}): ${message}`);
    this.name = "StateCorruptError";
    this.statePath = statePath;
  }
}

export class DeliveryError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DeliveryError";
  }
}

export class DigestRunError extends Error {
  readonly phase: RunPhase;

  constructor(phase: RunPhase, cause: unknown) {
    super(`Digest run failed during ${phase}: ${errorMessage(cause)}`, { cause });
    this.name = "DigestRunError";
    this.phase = phase;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}
