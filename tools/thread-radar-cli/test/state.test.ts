import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { executeStateResetCommand, executeStateShowCommand } from "../src/commands/state";
import { CliError } from "../src/errors";

let dir = "";
let statePath = "";

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "thread-radar-cli-"));
  statePath = path.join(dir, "state.json");
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

describe("state commands", () => {
  it("shows an empty state when no file exists", async () => {
    const result = await executeStateShowCommand({ state: statePath });
    expect(result.payload).toMatchObject({ ok: true, seen_count: 0, last_run_utc: null, newest_ids: [] });
    expect(result.lines[2]).toBe("Last run: never");
  });

  it("lists the newest identities first", async () => {
    const ids = ["t3_1", "t3_2", "t3_3", "t3_4", "t3_5", "t3_6"];
    await fs.writeFile(statePath, JSON.stringify({ seen_ids: ids, last_run_utc: "2026-03-01T12:00:00.000Z" }));

    const result = await executeStateShowCommand({ state: statePath });
    expect(result.payload).toMatchObject({
      seen_count: 6,
      last_run_utc: "2026-03-01T12:00:00.000Z",
      newest_ids: ["t3_6", "t3_5", "t3_4", "t3_3", "t3_2"],
    });
  });

  it("reports a corrupt file with exit code 3", async () => {
    await fs.writeFile(statePath, "{not json");
    const failure = await executeStateShowCommand({ state: statePath }).catch((error: unknown) => error);
    expect(failure).toBeInstanceOf(CliError);
    expect(failure).toMatchObject({ code: 3 });
  });

  it("requires --force to reset", async () => {
    await expect(executeStateResetCommand({ state: statePath })).rejects.toMatchObject({ code: 1 });
    await expect(fs.access(statePath)).rejects.toThrow();
  });

  it("resets state with --force", async () => {
    await fs.writeFile(statePath, "{not json");
    await executeStateResetCommand({ state: statePath, force: true });
    expect(JSON.parse(await fs.readFile(statePath, "utf-8"))).toEqual({ seen_ids: [], last_run_utc: null });
  });
});
