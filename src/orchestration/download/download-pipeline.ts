import type { KeywordRepository } from "../../db/repositories/keyword.repo";
import type { DownloadCounters } from "../../domain/scrape-types";
import type { PinDetailSource } from "../../platforms/adapter";
import type { Fetcher } from "../../services/fetchers";
import { CancellationError } from "../../core/errors";
import { env } from "../../core/config";
import { logger } from "../../core/logger";
import { BoundedQueue } from "./work-queue";
import { PinEnhancer, type EnhancementStats } from "./pin-enhancer";
import { DownloadScheduler, type ScheduledTask, type SchedulerStats } from "./download-scheduler";
import { DownloadWorkerPool, defaultWorkerPoolOptions, type DownloadStatsSnapshot, type WorkerPoolOptions } from "./worker-pool";

export interface DownloadPipelineOptions extends Partial<WorkerPoolOptions> {
  keyword?: string;
  pageSize?: number;
  queueCapacity?: number;
  detailSource?: PinDetailSource;
}

export interface DownloadPipelineResult {
  counters: DownloadCounters;
  /** Set when the signal fired; counters then cover the work done so far. */
  cancelled: boolean;
  enhancement: EnhancementStats;
  scheduler: SchedulerStats;
  workers: DownloadStatsSnapshot;
}

export async function runDownloads(
  repo: KeywordRepository,
  fetchers: Fetcher[],
  options: DownloadPipelineOptions = {}
): Promise<DownloadPipelineResult> {
  const { keyword, pageSize, queueCapacity, detailSource, ...poolOverrides } = options;
  const poolOptions = defaultWorkerPoolOptions(poolOverrides);
  const query = keyword ?? repo.keyword;

  let enhancement: EnhancementStats = { checked: 0, enhanced: 0, failed: 0 };
  if (detailSource) {
    try {
      enhancement = await new PinEnhancer(repo, detailSource, poolOptions.signal).enhance(query);
    } catch (error) {
      // the scheduler below observes the same signal and ends the run
      if (!(error instanceof CancellationError)) throw error;
    }
  }

  const queue = new BoundedQueue<ScheduledTask>(queueCapacity ?? env.SCHEDULER_QUEUE_CAPACITY);
  const scheduler = new DownloadScheduler(repo, {
    keyword: query,
    pageSize: pageSize ?? env.SCHEDULER_PAGE_SIZE,
    minFileBytes: poolOptions.minFileBytes,
    signal: poolOptions.signal,
  });
  const pool = new DownloadWorkerPool(repo, fetchers, poolOptions);

  const [scheduled, worked] = await Promise.allSettled([
    scheduler.produce(queue).catch((error: unknown) => {
      pool.stop();
      throw error;
    }),
    pool.run(queue),
  ]);

  const cancelled = Boolean(poolOptions.signal?.aborted);
  if (!cancelled) {
    if (scheduled.status === "rejected") throw scheduled.reason;
    if (worked.status === "rejected") throw worked.reason;
  }

  const schedulerStats = scheduled.status === "fulfilled" ? scheduled.value : scheduler.summary;
  const workerStats = worked.status === "fulfilled" ? worked.value : pool.snapshot;
  const counters: DownloadCounters = {
    succeeded: workerStats.succeeded,
    skipped: schedulerStats.present,
    failed: workerStats.failed,
  };
  logger.info({ keyword: query, ...counters, healed: schedulerStats.healed, cancelled }, "Downloads finished");
  return { counters, cancelled, enhancement, scheduler: schedulerStats, workers: workerStats };
}
