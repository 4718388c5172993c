import { existsSync } from "node:fs";
import { resolve } from "node:path";
import { config as loadDotenv } from "dotenv";

const ENV_FILE_VARIABLE = "THREAD_RADAR_ENV_FILE";

/** An explicit THREAD_RADAR_ENV_FILE replaces the search; otherwise the working directory, then the repo root. */
export function envFileCandidates(): string[] {
  const explicit = String(process.env[ENV_FILE_VARIABLE] || "").trim();
  if (explicit) {
    return [resolve(explicit)];
  }
  return Array.from(new Set([resolve(process.cwd(), ".env"), resolve(__dirname, "../../../.env")]));
}

/** Values already in the environment win over .env files. Returns the files that were read. */
export function bootstrapEnvFromDotenv(): string[] {
  const loaded: string[] = [];
  for (const filePath of envFileCandidates()) {
    if (!existsSync(filePath)) {
      continue;
    }
    loadDotenv({ path: filePath, override: false });
    loaded.push(filePath);
  }
  return loaded;
}
