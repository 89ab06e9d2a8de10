import { mkdtemp, readFile, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { createFileLogger, formatLogLine } from "./logger.js";

const tempDirs: string[] = [];

afterEach(async () => {
  await Promise.all(tempDirs.splice(0).map((dir) => rm(dir, { recursive: true, force: true })));
});

describe("logger", () => {
  it("formats a line with sorted fields", () => {
    expect(formatLogLine("warn", "request failed", { status: 503, kind: "logs" }, 1_700_000_000_000)).toBe(
      "[2023-11-14T22:13:20.000Z] WARN request failed (kind=logs, status=503)\n",
    );
  });

  it("appends lines at or above the level in order", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "tailscope-log-"));
    tempDirs.push(dir);
    const logPath = path.join(dir, "nested", "tailscope.log");
    const logger = createFileLogger({ logPath, level: "info", now: () => 1_700_000_000_000 });

    logger.debug("hidden");
    logger.info("started", { signal: "logs" });
    logger.error("boom");
    await logger.flush();

    expect(await readFile(logPath, "utf8")).toBe(
      "[2023-11-14T22:13:20.000Z] INFO started (signal=logs)\n[2023-11-14T22:13:20.000Z] ERROR boom\n",
    );
  });
});
