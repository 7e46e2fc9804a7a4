import { KeywordRepository } from "../db/repositories/keyword.repo";
import type { PinDetailSource, ProcessLock } from "../platforms/adapter";
import type { DownloadCounters } from "../domain/scrape-types";
import type { Fetcher } from "../services/fetchers";
import { logger } from "../core/logger";
import { runDownloads, type DownloadPipelineOptions } from "./download/download-pipeline";

export interface ImageRepairOptions {
  outputDir: string;
  partition: string;
  lock: ProcessLock;
  fetchers: Fetcher[];
  detailSource?: PinDetailSource;
  downloads?: Omit<DownloadPipelineOptions, "keyword" | "detailSource" | "signal">;
  signal?: AbortSignal;
}

export interface QueryRepairResult {
  query: string;
  counters: DownloadCounters;
  enhanced: number;
}

export interface ImageRepairResult {
  partition: string;
  status: "completed" | "locked" | "cancelled";
  queries: QueryRepairResult[];
}

/** Takes the same lock name a scrape of the keyword takes. */
export async function repairPartitionImages(options: ImageRepairOptions): Promise<ImageRepairResult> {
  const { partition, lock } = options;
  const queries: QueryRepairResult[] = [];

  if (!(await lock.acquire(partition))) {
    logger.warn({ partition }, "Partition is locked by another run, skipped");
    return { partition, status: "locked", queries };
  }

  const repo = KeywordRepository.open(options.outputDir, partition);
  try {
    repo.collapseEncodedPinIds();

    for (const query of await repo.pins.listQueries()) {
      const result = await runDownloads(repo, options.fetchers, {
        ...options.downloads,
        keyword: query,
        detailSource: options.detailSource,
        signal: options.signal,
      });
      queries.push({ query, counters: result.counters, enhanced: result.enhancement.enhanced });
      if (result.cancelled) return { partition, status: "cancelled", queries };
    }

    return { partition, status: "completed", queries };
  } finally {
    repo.close();
    await lock.release(partition);
  }
}
