import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";

import { createBaseLogger, LOG_FD } from "@/lib/infra/logger";
import { executeStateShowCommand } from "../src/commands/state";
import { printCommandResult } from "../src/output";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("json output", () => {
  it("keeps stdout parseable while logs go to stderr", async () => {
    const stdout: string[] = [];
    vi.spyOn(process.stdout, "write").mockImplementation((chunk: string | Uint8Array) => {
      stdout.push(String(chunk));
      return true;
    });
    const writeSync = vi.spyOn(fs, "writeSync");

    createBaseLogger({ level: "info", pretty: false }).info({ component: "state" }, "no state file");
    const statePath = path.join(os.tmpdir(), "thread-radar-missing", "state.json");
    printCommandResult(await executeStateShowCommand({ state: statePath, json: true }), true);

    expect(JSON.parse(stdout.join(""))).toMatchObject({
      ok: true,
      state_path: statePath,
      seen_count: 0,
      last_run_utc: null,
    });
    const fds = writeSync.mock.calls.map((call) => call[0]);
    expect(fds.length).toBeGreaterThan(0);
    expect(fds.every((fd) => fd === LOG_FD)).toBe(true);
  });
});
