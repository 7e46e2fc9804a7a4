import { KeywordRepository } from "../db/repositories/keyword.repo";
import type { AcquisitionMode } from "../domain/models";
import type { AcquisitionCounters, DownloadCounters, ScrapeResult } from "../domain/scrape-types";
import type { BrowserDriver, BrowserDriverFactory, PinDetailSource, PinExtractor, ProcessLock, SearchApi } from "../platforms/adapter";
import { PinterestHtmlExtractor, PinterestPinDetailSource, PinterestSearchApi, PlaywrightBrowserDriver } from "../platforms/pinterest";
import { FileProcessLock } from "../services/process-lock";
import { FetchHttpClient, defaultFetchers, type Fetcher } from "../services/fetchers";
import { exportResults } from "../services/export";
import { AcquisitionCoordinator, defaultAcquisitionOptions, type AcquisitionOptions } from "./acquisition-coordinator";
import { SessionManager } from "./session-manager";
import { runDownloads, type DownloadPipelineOptions } from "./download/download-pipeline";
import { isUrl, normalizeKeyword, normalizeUrl, sanitizeWorkName } from "../core/normalize";
import { CancellationError, LockContentionError, throwIfAborted } from "../core/errors";
import { env } from "../core/config";
import { logger } from "../core/logger";

export interface ScrapeOptions {
  outputDir?: string;
  downloadImages?: boolean;
  mode?: AcquisitionMode;
  proxyUrl?: string;
  headless?: boolean;
  signal?: AbortSignal;
}

export interface PinScraperDeps {
  createDriver: BrowserDriverFactory;
  extractor: PinExtractor;
  createSearchApi: () => SearchApi;
  createFetchers: (driver: BrowserDriver | null) => Fetcher[];
  /** Null skips the lookup of pins stored without an image URL. */
  createDetailSource: () => PinDetailSource | null;
  createLock: (outputDir: string) => ProcessLock;
  acquisition: Partial<AcquisitionOptions>;
  downloads: DownloadPipelineOptions;
  exportResults: boolean;
}

const EMPTY_ACQUISITION: AcquisitionCounters = { saved: 0, duplicates: 0, invalid: 0, persistenceFailures: 0 };
const EMPTY_DOWNLOADS: DownloadCounters = { succeeded: 0, skipped: 0, failed: 0 };

export function defaultScraperDeps(): PinScraperDeps {
  return {
    createDriver: (options) => PlaywrightBrowserDriver.launch(options),
    extractor: new PinterestHtmlExtractor(),
    createSearchApi: () => new PinterestSearchApi(new FetchHttpClient()),
    createFetchers: (driver) => defaultFetchers(driver instanceof PlaywrightBrowserDriver ? driver.context : undefined),
    createDetailSource: () => new PinterestPinDetailSource(new FetchHttpClient()),
    createLock: (outputDir) => new FileProcessLock(outputDir),
    acquisition: {},
    downloads: {},
    exportResults: true,
  };
}

export function normalizeInput(keywordOrUrl: string): string {
  return isUrl(keywordOrUrl) ? normalizeUrl(keywordOrUrl.trim()) : normalizeKeyword(keywordOrUrl);
}

/**
 * Entry point for one keyword or seed URL: lock, session, acquisition,
 * downloads and export, with every resource released on every exit path.
 */
export class PinScraper {
  private readonly deps: PinScraperDeps;

  constructor(deps: Partial<PinScraperDeps> = {}) {
    this.deps = { ...defaultScraperDeps(), ...deps };
  }

  async scrape(keywordOrUrl: string, targetCount: number, options: ScrapeOptions = {}): Promise<ScrapeResult> {
    const keyword = normalizeInput(keywordOrUrl);
    if (!keyword) throw new Error("Keyword or URL is required");
    if (!Number.isInteger(targetCount) || targetCount < 1) {
      throw new Error(`Target count must be a positive integer, got ${targetCount}`);
    }

    const outputDir = options.outputDir ?? env.OUTPUT_DIR;
    const downloadImages = options.downloadImages ?? true;
    const workName = sanitizeWorkName(keyword);
    const signal = options.signal;

    const lock = this.deps.createLock(outputDir);
    if (!(await lock.acquire(workName))) {
      logger.error({ keyword, workName }, "Another run holds the lock for this keyword");
      throw new LockContentionError(`A scrape for "${keyword}" is already running`, workName);
    }

    let repo: KeywordRepository | null = null;
    let driver: BrowserDriver | null = null;
    let sessions: SessionManager | null = null;
    let sessionId: string | null = null;
    let coordinator: AcquisitionCoordinator | null = null;
    let acquired = false;
    let acquisition: AcquisitionCounters = { ...EMPTY_ACQUISITION };
    let downloads: DownloadCounters = { ...EMPTY_DOWNLOADS };

    try {
      repo = KeywordRepository.open(outputDir, keyword);
      sessions = new SessionManager(repo, outputDir, downloadImages);
      const start = await sessions.startOrResume(keyword, targetCount);
      sessionId = start.sessionId;

      if (start.action !== "cached") {
        throwIfAborted(signal);
        driver = await this.deps.createDriver({ headless: options.headless, proxyUrl: options.proxyUrl });

        coordinator = new AcquisitionCoordinator(
          repo,
          { driver, extractor: this.deps.extractor, searchApi: this.deps.createSearchApi() },
          defaultAcquisitionOptions({ ...this.deps.acquisition, ...(options.mode ? { mode: options.mode } : {}), signal })
        );
        acquisition = await coordinator.acquire(keyword, start.remaining, sessionId);
        acquired = true;
      }

      if (downloadImages) {
        throwIfAborted(signal);
        const detailSource = this.deps.createDetailSource() ?? undefined;
        const result = await runDownloads(repo, this.deps.createFetchers(driver), {
          ...this.deps.downloads,
          detailSource,
          signal,
        });
        downloads = result.counters;
        throwIfAborted(signal);
      }

      const savedCount = await sessions.complete(sessionId, keyword, { acquisition, downloads });
      const pins = await repo.loadPinsByQuery(keyword, targetCount);
      if (this.deps.exportResults) {
        await exportResults(repo.dir, keyword, pins, acquisition, downloads);
      }

      logger.info(
        { keyword, savedCount, returned: pins.length, fromCache: start.action === "cached", ...downloads },
        "Scrape finished"
      );
      return {
        keyword,
        workName,
        sessionId,
        status: "completed",
        fromCache: start.action === "cached",
        pins,
        acquisition,
        downloads,
      };
    } catch (error) {
      if (coordinator && !acquired) acquisition = coordinator.progress;

      if (error instanceof CancellationError && repo && sessions) {
        const savedCount = await sessions.interrupt(sessionId, keyword, { acquisition, downloads });
        logger.warn({ keyword, sessionId, savedCount }, "Scrape interrupted");
        return {
          keyword,
          workName,
          sessionId,
          status: "interrupted",
          fromCache: false,
          pins: await repo.loadPinsByQuery(keyword, targetCount),
          acquisition,
          downloads,
        };
      }

      logger.error({ error, keyword, sessionId }, "Scrape failed");
      if (sessions) {
        await sessions
          .fail(sessionId, keyword, { acquisition, downloads })
          .catch((updateError: unknown) => logger.error({ error: updateError, sessionId }, "Failed to mark session failed"));
      }
      throw error;
    } finally {
      if (driver) {
        await driver.close().catch((error: unknown) => logger.warn({ error }, "Failed to close browser driver"));
      }
      repo?.close();
      await lock.release(workName);
    }
  }
}
