import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync } from "fs";
import { writeFile } from "fs/promises";
import { FileProcessLock, isPidAlive } from "../../../src/services/process-lock";
import { makeTempDir, removeDir } from "../../support/fakes";

describe("FileProcessLock", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("should let only one holder take a name at a time", async () => {
    const first = new FileProcessLock(dir);
    const second = new FileProcessLock(dir);

    expect(await first.acquire("cat")).toBe(true);
    expect(await second.acquire("cat")).toBe(false);
    expect(await second.acquire("dog")).toBe(true);

    await first.release("cat");
    expect(existsSync(first.lockPath("cat"))).toBe(false);
    expect(await second.acquire("cat")).toBe(true);
  });

  it("should break a lock older than the stale age", async () => {
    const lock = new FileProcessLock(dir, { staleSeconds: 60, now: () => 120_000 });
    await writeFile(lock.lockPath("cat"), JSON.stringify({ pid: process.pid, createdAt: 0 }));

    expect(await lock.acquire("cat")).toBe(true);
  });

  it("should break a lock whose file cannot be read", async () => {
    const lock = new FileProcessLock(dir);
    await writeFile(lock.lockPath("cat"), "not json");

    expect(await lock.acquire("cat")).toBe(true);
  });

  it("should leave a lock it does not hold", async () => {
    const holder = new FileProcessLock(dir);
    const other = new FileProcessLock(dir);
    await holder.acquire("cat");

    await other.release("cat");

    expect(existsSync(holder.lockPath("cat"))).toBe(true);
  });

  it("should sanitize names into the lock file name", () => {
    expect(new FileProcessLock(dir).lockPath("cats: big/small")).toMatch(/\.small\.lock$/);
  });

  it("should report the current process as alive", () => {
    expect(isPidAlive(process.pid)).toBe(true);
  });
});
