import { rename, unlink, writeFile } from "fs/promises";
import type { KeywordRepository } from "../../db/repositories/keyword.repo";
import type { Fetcher } from "../../services/fetchers";
import { detectImageFormat, isImageContentType } from "../../services/image-validation";
import { computeBackoffDelay, randomBetween, sleep, type BackoffOptions, type Sleep } from "../../core/retry";
import type { DelayRange } from "../../core/cooldown";
import { DownloadError, errorMessage, hasErrorCode } from "../../core/errors";
import { env } from "../../core/config";
import { logger } from "../../core/logger";
import type { BoundedQueue } from "./work-queue";
import type { ScheduledTask } from "./download-scheduler";
import { Semaphore } from "./semaphore";

export interface WorkerPoolOptions {
  concurrency: number;
  timeoutMs: number;
  maxAttempts: number;
  pollTimeoutMs: number;
  minFileBytes: number;
  backoff: BackoffOptions;
  forbiddenDelay: DelayRange;
  wait: Sleep;
  signal?: AbortSignal;
}

export function defaultWorkerPoolOptions(overrides: Partial<WorkerPoolOptions> = {}): WorkerPoolOptions {
  return {
    concurrency: env.DOWNLOAD_CONCURRENCY,
    timeoutMs: env.DOWNLOAD_TIMEOUT_MS,
    maxAttempts: env.DOWNLOAD_MAX_ATTEMPTS,
    pollTimeoutMs: env.DOWNLOAD_POLL_TIMEOUT_MS,
    minFileBytes: env.DOWNLOAD_MIN_FILE_BYTES,
    backoff: { baseDelayMs: 1000, maxDelayMs: 10000, jitterMs: 500 },
    forbiddenDelay: { min: 2000, max: 5000 },
    wait: sleep,
    ...overrides,
  };
}

export interface DownloadStatsSnapshot {
  succeeded: number;
  failed: number;
  attempts: number;
  inFlight: number;
  peakInFlight: number;
}

export class DownloadStats {
  private state: DownloadStatsSnapshot = { succeeded: 0, failed: 0, attempts: 0, inFlight: 0, peakInFlight: 0 };

  started(): void {
    this.state.inFlight++;
    this.state.peakInFlight = Math.max(this.state.peakInFlight, this.state.inFlight);
  }

  finished(ok: boolean): void {
    this.state.inFlight--;
    if (ok) this.state.succeeded++;
    else this.state.failed++;
  }

  attempted(): void {
    this.state.attempts++;
  }

  snapshot(): DownloadStatsSnapshot {
    return { ...this.state };
  }
}

type AttemptOutcome =
  | { kind: "ok"; body: Buffer }
  | { kind: "next_fetcher"; error: DownloadError }
  | { kind: "next_url"; error: DownloadError };

const PERMANENT_STATUSES = new Set([404, 410]);

function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

export class DownloadWorkerPool {
  private readonly stats = new DownloadStats();
  private readonly semaphore: Semaphore;
  private stopped = false;

  constructor(
    private repo: KeywordRepository,
    private fetchers: Fetcher[],
    private options: WorkerPoolOptions
  ) {
    if (fetchers.length === 0) throw new Error("Worker pool needs at least one fetcher");
    this.semaphore = new Semaphore(options.concurrency);
  }

  stop(): void {
    this.stopped = true;
  }

  get snapshot(): DownloadStatsSnapshot {
    return this.stats.snapshot();
  }

  async run(queue: BoundedQueue<ScheduledTask>): Promise<DownloadStatsSnapshot> {
    const workers = Array.from({ length: this.options.concurrency }, (_, index) => this.work(index, queue));
    try {
      await Promise.all(workers);
    } finally {
      // releases a producer blocked on a full queue once nobody is taking
      queue.close();
    }
    const result = this.stats.snapshot();
    logger.info({ ...result }, "Download workers finished");
    return result;
  }

  private async work(index: number, queue: BoundedQueue<ScheduledTask>): Promise<void> {
    while (!this.stopped) {
      if (this.options.signal?.aborted) {
        this.stop();
        break;
      }

      const next = await queue.take(this.options.pollTimeoutMs);
      if (next.kind === "closed") break;
      if (next.kind === "timeout") continue;

      await this.semaphore.use(() => this.processTask(next.item));
    }
    logger.trace({ worker: index }, "Download worker exiting");
  }

  /** Never throws for download failures. */
  async processTask(task: ScheduledTask): Promise<boolean> {
    this.stats.started();
    let ok = false;

    try {
      await this.repo.updateDownloadTaskStatus(task.taskId, "downloading");
      let lastError: DownloadError | null = null;

      for (const url of task.candidates) {
        for (const fetcher of this.fetchers) {
          const outcome = await this.attempt(fetcher, url);
          if (outcome.kind === "ok") {
            await this.writeImage(task.expectedPath, outcome.body);
            await this.repo.updateDownloadTaskStatus(task.taskId, "completed", {
              localPath: task.expectedPath,
              fileSize: outcome.body.length,
            });
            logger.debug({ pinId: task.pinId, url, fetcher: fetcher.name }, "Image downloaded");
            ok = true;
            return true;
          }

          lastError = outcome.error;
          if (outcome.kind === "next_url") break;
        }
      }

      const reason = lastError ? `${lastError.code}: ${lastError.message}` : "no candidates";
      const exhausted = new DownloadError(`All candidate URLs failed (${reason})`, "ALL_CANDIDATES_EXHAUSTED");
      await this.repo.updateDownloadTaskStatus(task.taskId, "failed", { errorMessage: exhausted.message });
      logger.warn({ pinId: task.pinId, taskId: task.taskId, candidates: task.candidates.length, reason }, "Download failed");
      return false;
    } catch (error) {
      logger.error({ error, pinId: task.pinId, taskId: task.taskId }, "Download task errored");
      await this.repo
        .updateDownloadTaskStatus(task.taskId, "failed", { errorMessage: errorMessage(error) })
        .catch((updateError: unknown) => logger.error({ error: updateError, taskId: task.taskId }, "Failed to record task failure"));
      return false;
    } finally {
      this.stats.finished(ok);
    }
  }

  private async attempt(fetcher: Fetcher, url: string): Promise<AttemptOutcome> {
    let lastError = new DownloadError(`No attempt made for ${url}`, "CONNECTION_FAILED");

    for (let attempt = 1; attempt <= this.options.maxAttempts; attempt++) {
      const retriesLeft = attempt < this.options.maxAttempts && !this.stopped && !this.options.signal?.aborted;
      this.stats.attempted();

      let status: number;
      let body: Buffer;
      let contentType: string | undefined;
      try {
        const response = await fetcher.fetch(url, this.options.timeoutMs);
        status = response.status;
        body = response.body;
        contentType = response.headers["content-type"];
      } catch (error) {
        lastError =
          error instanceof DownloadError
            ? error
            : new DownloadError(`Request failed: ${errorMessage(error)}`, "CONNECTION_FAILED");
        logger.debug({ url, fetcher: fetcher.name, attempt, code: lastError.code }, "Download attempt failed");
        if (!retriesLeft) return { kind: "next_fetcher", error: lastError };
        await this.options.wait(computeBackoffDelay(attempt, this.options.backoff));
        continue;
      }

      if (status >= 200 && status < 300) {
        if (contentType !== undefined && !isImageContentType(contentType)) {
          return {
            kind: "next_fetcher",
            error: new DownloadError(`Expected an image, got ${contentType}`, "INVALID_CONTENT"),
          };
        }
        if (body.length < this.options.minFileBytes || detectImageFormat(body) === null) {
          return {
            kind: "next_fetcher",
            error: new DownloadError(`Response is not a valid image (${body.length} bytes)`, "INVALID_CONTENT"),
          };
        }
        return { kind: "ok", body };
      }

      lastError = new DownloadError(`HTTP ${status} for ${url}`, "HTTP_STATUS", status);

      if (PERMANENT_STATUSES.has(status)) {
        return { kind: "next_url", error: lastError };
      }

      if (status === 403) {
        fetcher.rotateHeaders();
        if (!retriesLeft) return { kind: "next_fetcher", error: lastError };
        await this.options.wait(randomBetween(this.options.forbiddenDelay.min, this.options.forbiddenDelay.max));
        continue;
      }

      if (isTransientStatus(status)) {
        if (!retriesLeft) return { kind: "next_fetcher", error: lastError };
        await this.options.wait(computeBackoffDelay(attempt, this.options.backoff));
        continue;
      }

      return { kind: "next_fetcher", error: lastError };
    }

    return { kind: "next_fetcher", error: lastError };
  }

  private async writeImage(path: string, body: Buffer): Promise<void> {
    const partial = `${path}.part`;
    try {
      await writeFile(partial, body);
      await rename(partial, path);
    } catch (error) {
      await unlink(partial).catch((cleanupError: unknown) => {
        if (!hasErrorCode(cleanupError, "ENOENT")) logger.debug({ error: cleanupError, partial }, "Could not remove partial file");
      });
      throw error;
    }
  }
}
