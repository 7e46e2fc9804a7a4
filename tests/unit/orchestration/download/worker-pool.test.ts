import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync } from "fs";
import { readFile } from "fs/promises";
import { join } from "path";
import { KeywordRepository } from "../../../../src/db/repositories/keyword.repo";
import { DownloadWorkerPool, defaultWorkerPoolOptions, type WorkerPoolOptions } from "../../../../src/orchestration/download/worker-pool";
import type { ScheduledTask } from "../../../../src/orchestration/download/download-scheduler";
import { DownloadError } from "../../../../src/core/errors";
import {
  FakeFetcher,
  imageResponse,
  imageUrlFor,
  makePin,
  makeTempDir,
  noWait,
  removeDir,
  statusResponse,
} from "../../../support/fakes";

describe("DownloadWorkerPool", () => {
  let outputDir: string;
  let repo: KeywordRepository;
  let task: ScheduledTask;

  beforeEach(async () => {
    outputDir = await makeTempDir();
    repo = KeywordRepository.open(outputDir, "cat");
    await repo.savePinImmediately(makePin("p1"), "cat", null);
    const url = imageUrlFor("p1");
    task = {
      taskId: await repo.createDownloadTask("p1", url),
      pinId: "p1",
      candidates: [url, "https://img.test/p1-small.jpg"],
      expectedPath: join(repo.imagesDir, "p1.jpg"),
    };
  });

  afterEach(async () => {
    repo.close();
    await removeDir(outputDir);
  });

  function pool(fetchers: FakeFetcher[], overrides: Partial<WorkerPoolOptions> = {}): DownloadWorkerPool {
    return new DownloadWorkerPool(
      repo,
      fetchers,
      defaultWorkerPoolOptions({ concurrency: 2, maxAttempts: 3, minFileBytes: 16, pollTimeoutMs: 10, wait: noWait, ...overrides })
    );
  }

  it("should write the image and complete the task", async () => {
    const fetcher = new FakeFetcher("pooled", async () => imageResponse(64));

    expect(await pool([fetcher]).processTask(task)).toBe(true);

    expect((await readFile(task.expectedPath)).length).toBe(64);
    expect(existsSync(`${task.expectedPath}.part`)).toBe(false);
    const stored = await repo.tasks.findById(task.taskId);
    expect(stored).toMatchObject({ status: "completed", localPath: task.expectedPath, fileSize: 64 });
    expect((await repo.pins.findById("p1"))?.downloaded).toBe(true);
  });

  it("should move to the next URL after a 404 without retrying or trying other fetchers", async () => {
    const pooled = new FakeFetcher("pooled", async (url) => (url === task.candidates[0] ? statusResponse(404) : imageResponse()));
    const browser = new FakeFetcher("browser", async () => imageResponse());

    expect(await pool([pooled, browser]).processTask(task)).toBe(true);

    expect(pooled.calls).toEqual(task.candidates);
    expect(browser.calls).toEqual([]);
  });

  it("should retry a timeout up to the attempt limit, then fail the task", async () => {
    const fetcher = new FakeFetcher("pooled", async () => {
      throw new DownloadError("Timed out after 10ms", "TIMEOUT");
    });
    const single: ScheduledTask = { ...task, candidates: [imageUrlFor("p1")] };
    const worker = pool([fetcher]);

    expect(await worker.processTask(single)).toBe(false);

    expect(fetcher.calls).toHaveLength(3);
    const stored = await repo.tasks.findById(task.taskId);
    expect(stored?.status).toBe("failed");
    expect(stored?.retryCount).toBe(1);
    expect(stored?.errorMessage).toBe("All candidate URLs failed (TIMEOUT: Timed out after 10ms)");
    expect(worker.snapshot).toMatchObject({ succeeded: 0, failed: 1, attempts: 3, inFlight: 0 });
  });

  it("should fetch a 404 only once per URL", async () => {
    const fetcher = new FakeFetcher("pooled", async () => statusResponse(404));

    expect(await pool([fetcher]).processTask({ ...task, candidates: [imageUrlFor("p1")] })).toBe(false);
    expect(fetcher.calls).toHaveLength(1);
  });

  it("should retry server errors with backoff", async () => {
    const waits: number[] = [];
    const fetcher = new FakeFetcher("pooled", async (_url, call) => (call === 1 ? statusResponse(503) : imageResponse()));

    const ok = await pool([fetcher], {
      backoff: { baseDelayMs: 100, maxDelayMs: 1000, jitterMs: 0 },
      wait: async (ms) => {
        waits.push(ms);
      },
    }).processTask(task);

    expect(ok).toBe(true);
    expect(fetcher.calls).toHaveLength(2);
    expect(waits).toEqual([100]);
  });

  it("should rotate headers and wait after a 403", async () => {
    const fetcher = new FakeFetcher("pooled", async (_url, call) => (call === 1 ? statusResponse(403) : imageResponse()));

    expect(await pool([fetcher], { forbiddenDelay: { min: 0, max: 0 } }).processTask(task)).toBe(true);
    expect(fetcher.rotations).toBe(1);
  });

  it("should hand an HTML answer to the next fetcher", async () => {
    const pooled = new FakeFetcher("pooled", async () => ({
      status: 200,
      body: Buffer.from("<html>login</html>"),
      headers: { "content-type": "text/html; charset=utf-8" },
    }));
    const browser = new FakeFetcher("browser", async () => imageResponse());

    expect(await pool([pooled, browser]).processTask(task)).toBe(true);
    expect(pooled.calls).toHaveLength(1);
    expect(browser.calls).toEqual([task.candidates[0]]);
  });

  it("should reject an image body below the minimum size", async () => {
    const fetcher = new FakeFetcher("pooled", async () => imageResponse(8));

    expect(await pool([fetcher]).processTask({ ...task, candidates: [imageUrlFor("p1")] })).toBe(false);
    expect(existsSync(task.expectedPath)).toBe(false);
  });
});
