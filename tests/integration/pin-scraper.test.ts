import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { existsSync } from "fs";
import { readFile } from "fs/promises";
import { join } from "path";
import { KeywordRepository } from "../../src/db/repositories/keyword.repo";
import { PinScraper, type PinScraperDeps } from "../../src/orchestration/scrape-coordinator";
import { FileProcessLock } from "../../src/services/process-lock";
import { PINS_EXPORT_FILENAME } from "../../src/services/export";
import { LockContentionError } from "../../src/core/errors";
import type { RawPin } from "../../src/domain/models";
import {
  FakeDetailSource,
  FakeDriver,
  FakeFetcher,
  ScriptedExtractor,
  UnusedSearchApi,
  imageResponse,
  makePins,
  makeTempDir,
  noWait,
  removeDir,
} from "../support/fakes";

describe("PinScraper", () => {
  let outputDir: string;
  let driver: FakeDriver;
  let fetcher: FakeFetcher;

  beforeEach(async () => {
    outputDir = await makeTempDir();
    driver = new FakeDriver();
    fetcher = new FakeFetcher("pooled", async () => imageResponse(64));
  });

  afterEach(async () => {
    await removeDir(outputDir);
  });

  function scraper(records: (call: number) => RawPin[], overrides: Partial<PinScraperDeps> = {}): PinScraper {
    return new PinScraper({
      createDriver: async () => driver,
      extractor: new ScriptedExtractor((_html, call) => records(call)),
      createSearchApi: () => new UnusedSearchApi(),
      createFetchers: () => [fetcher],
      createDetailSource: () => new FakeDetailSource(),
      createLock: (dir) => new FileProcessLock(dir),
      acquisition: { mode: "browser", scrollPixels: 100, wait: noWait },
      downloads: { concurrency: 2, pollTimeoutMs: 10, minFileBytes: 16, wait: noWait },
      exportResults: false,
      ...overrides,
    });
  }

  async function withRepo<T>(keyword: string, fn: (repo: KeywordRepository) => Promise<T>): Promise<T> {
    const repo = KeywordRepository.open(outputDir, keyword);
    try {
      return await fn(repo);
    } finally {
      repo.close();
    }
  }

  it("should collect pins, download every image and complete the session", async () => {
    const result = await scraper(() => makePins("p", 1, 5), { exportResults: true }).scrape("cat", 5, { outputDir });

    expect(result.status).toBe("completed");
    expect(result.fromCache).toBe(false);
    expect(result.pins.map((p) => p.id)).toEqual(["p1", "p2", "p3", "p4", "p5"]);
    expect(result.pins.every((p) => p.downloaded)).toBe(true);
    expect(result.acquisition).toEqual({ saved: 5, duplicates: 0, invalid: 0, persistenceFailures: 0 });
    expect(result.downloads).toEqual({ succeeded: 5, skipped: 0, failed: 0 });
    expect(driver.closed).toBe(true);

    for (let i = 1; i <= 5; i++) {
      expect(existsSync(join(outputDir, "cat", "images", `p${i}.jpg`))).toBe(true);
    }

    await withRepo("cat", async (repo) => {
      expect(await repo.countTasksByStatus()).toEqual({ pending: 0, downloading: 0, completed: 5, failed: 0 });
      const session = await repo.getSession(result.sessionId ?? "");
      expect(session).toMatchObject({ status: "completed", savedCount: 5, targetCount: 5 });
    });

    const exported: unknown = JSON.parse(await readFile(join(outputDir, "cat", PINS_EXPORT_FILENAME), "utf-8"));
    expect(Array.isArray(exported) && exported.length).toBe(5);
    expect(existsSync(join(outputDir, ".cat.lock"))).toBe(false);
  });

  it("should mark the session interrupted with what was stored when cancelled", async () => {
    const controller = new AbortController();
    driver.onScroll = () => controller.abort();

    const result = await scraper((call) => (call === 1 ? makePins("p", 1, 2) : makePins("p", 3, 5))).scrape("cat", 5, {
      outputDir,
      signal: controller.signal,
    });

    expect(result.status).toBe("interrupted");
    expect(result.pins.map((p) => p.id)).toEqual(["p1", "p2"]);
    expect(result.acquisition).toEqual({ saved: 2, duplicates: 0, invalid: 0, persistenceFailures: 0 });
    expect(fetcher.calls).toHaveLength(0);
    expect(driver.closed).toBe(true);

    await withRepo("cat", async (repo) => {
      const session = await repo.getSession(result.sessionId ?? "");
      expect(session).toMatchObject({ status: "interrupted", savedCount: 2 });
    });
  });

  it("should interrupt cleanly when cancelled during downloads", async () => {
    const controller = new AbortController();
    fetcher = new FakeFetcher("slow", async () => {
      await new Promise((resolve) => setTimeout(resolve, 50));
      controller.abort();
      return imageResponse(64);
    });

    const result = await scraper(() => makePins("p", 1, 6), {
      downloads: { concurrency: 1, queueCapacity: 1, pollTimeoutMs: 10, minFileBytes: 16, wait: noWait },
    }).scrape("cat", 6, { outputDir, signal: controller.signal });

    expect(result.status).toBe("interrupted");
    expect(result.acquisition).toMatchObject({ saved: 6 });
    expect(result.downloads).toEqual({ succeeded: 1, skipped: 0, failed: 0 });
    expect(driver.closed).toBe(true);
    expect(existsSync(join(outputDir, ".cat.lock"))).toBe(false);

    await withRepo("cat", async (repo) => {
      const session = await repo.getSession(result.sessionId ?? "");
      expect(session).toMatchObject({ status: "interrupted", savedCount: 6 });
    });
  });

  it("should answer from stored pins without opening a browser", async () => {
    await withRepo("cat", async (repo) => {
      for (const pin of makePins("p", 1, 5)) await repo.savePinImmediately(pin, "cat", null);
    });
    const createDriver = vi.fn(async () => driver);

    const result = await scraper(() => [], { createDriver }).scrape("cat", 3, { outputDir, downloadImages: false });

    expect(createDriver).not.toHaveBeenCalled();
    expect(result).toMatchObject({ status: "completed", fromCache: true, sessionId: null });
    expect(result.pins.map((p) => p.id)).toEqual(["p1", "p2", "p3"]);
  });

  it("should still fetch missing images for a cached keyword", async () => {
    await withRepo("cat", async (repo) => {
      for (const pin of makePins("p", 1, 3)) await repo.savePinImmediately(pin, "cat", null);
    });
    const createFetchers = vi.fn(() => [fetcher]);

    const result = await scraper(() => [], { createFetchers }).scrape("cat", 3, { outputDir });

    expect(createFetchers).toHaveBeenCalledWith(null);
    expect(result.downloads).toEqual({ succeeded: 3, skipped: 0, failed: 0 });
  });

  it("should resume an interrupted session and only collect what is missing", async () => {
    const sessionId = await withRepo("cat", async (repo) => {
      const id = await repo.createSession("cat", 10, outputDir, false);
      for (const pin of makePins("p", 1, 7)) await repo.savePinImmediately(pin, "cat", id);
      await repo.updateSessionStatus(id, "interrupted", 7);
      return id;
    });

    const result = await scraper(() => makePins("p", 1, 10)).scrape("cat", 10, { outputDir, downloadImages: false });

    expect(result.sessionId).toBe(sessionId);
    expect(result.acquisition).toEqual({ saved: 3, duplicates: 7, invalid: 0, persistenceFailures: 0 });
    expect(result.pins).toHaveLength(10);
    await withRepo("cat", async (repo) => {
      expect(await repo.getSession(sessionId)).toMatchObject({ status: "completed", savedCount: 10 });
      expect(await repo.listSessions()).toHaveLength(1);
    });
  });

  it("should refuse to run while another run holds the keyword", async () => {
    const holder = new FileProcessLock(outputDir);
    await holder.acquire("cat");
    const createDriver = vi.fn(async () => driver);

    await expect(scraper(() => [], { createDriver }).scrape("cat", 5, { outputDir })).rejects.toBeInstanceOf(
      LockContentionError
    );
    expect(createDriver).not.toHaveBeenCalled();
    await holder.release("cat");
  });

  it("should fail the session and release everything when acquisition throws", async () => {
    const extractor = new ScriptedExtractor(() => {
      throw new Error("extractor crashed");
    });

    await expect(scraper(() => [], { extractor }).scrape("cat", 5, { outputDir })).rejects.toThrow("extractor crashed");

    expect(driver.closed).toBe(true);
    expect(existsSync(join(outputDir, ".cat.lock"))).toBe(false);
    await withRepo("cat", async (repo) => {
      const [session] = await repo.listSessions();
      expect(session?.status).toBe("failed");
    });
  });

  it("should reject an empty keyword and a non-positive count", async () => {
    await expect(scraper(() => []).scrape("   ", 5, { outputDir })).rejects.toThrow("Keyword or URL is required");
    await expect(scraper(() => []).scrape("cat", 0, { outputDir })).rejects.toThrow("Target count must be a positive integer");
  });
});
