import { ConfigError, DeliveryError, DigestRunError, errorMessage, StateCorruptError } from "@/lib/domain/errors";

export type ExitCode = 1 | 2 | 3 | 4;

export interface CliErrorOptions {
  hint?: string;
  phase?: string;
  details?: unknown;
}

export class CliError extends Error {
  readonly code: ExitCode;
  readonly hint?: string;
  readonly phase?: string;
  readonly details?: unknown;

  constructor(code: ExitCode, message: string, options: CliErrorOptions = {}) {
    super(message);
    this.name = "CliError";
    this.code = code;
    this.hint = options.hint;
    this.phase = options.phase;
    this.details = options.details;
  }

  toJSON() {
    return {
      ok: false,
      error: {
        code: this.code,
        message: this.message,
        phase: this.phase,
        hint: this.hint,
        details: this.details,
      },
    };
  }
}

export function toCliError(error: unknown): CliError {
  if (error instanceof CliError) {
    return error;
  }
  const phase = error instanceof DigestRunError ? error.phase : undefined;
  const cause = error instanceof DigestRunError ? error.cause : error;

  if (cause instanceof ConfigError) {
    return new CliError(2, cause.message, { phase, hint: "Check .env and the YAML files under config/" });
  }
  if (cause instanceof StateCorruptError) {
    return new CliError(3, cause.message, {
      phase,
      hint: "Inspect the file, restore a backup, or run `thread-radar state reset --force`",
    });
  }
  if (cause instanceof DeliveryError) {
    return new CliError(4, cause.message, { phase, hint: "State was not committed; the next run retries the same items" });
  }
  return new CliError(1, errorMessage(cause), { phase });
}
