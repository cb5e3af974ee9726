import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ProjectLockedError } from "../../src/errors";
import { LOCK_FILE_NAME, ProjectLock } from "../../src/services/projectLock";

describe("ProjectLock", () => {
  let root = "";

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "storyforge-lock-"));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it("writes a lock file naming the run and removes it on release", async () => {
    const handle = await new ProjectLock(root).acquire("run-1");
    const lockPath = path.join(root, LOCK_FILE_NAME);

    expect(handle.lockPath).toBe(lockPath);
    const payload: unknown = JSON.parse(await fs.readFile(lockPath, "utf8"));
    expect(payload).toMatchObject({ pid: process.pid, runId: "run-1" });

    await handle.release();
    await handle.release();
    await expect(fs.readdir(root)).resolves.toEqual([]);
  });

  it("refuses a second holder until the first releases", async () => {
    const lock = new ProjectLock(root);
    const first = await lock.acquire("run-1");

    await expect(lock.acquire("run-2")).rejects.toBeInstanceOf(ProjectLockedError);

    await first.release();
    const second = await lock.acquire("run-2");
    await second.release();
  });

  it("creates a missing project root", async () => {
    const nested = path.join(root, "not", "yet");

    const handle = await new ProjectLock(nested).acquire("run-1");

    await expect(fs.readdir(nested)).resolves.toEqual([LOCK_FILE_NAME]);
    await handle.release();
  });
});
