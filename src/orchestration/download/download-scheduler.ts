import { join } from "path";
import type { KeywordRepository } from "../../db/repositories/keyword.repo";
import type { Pin } from "../../domain/models";
import { buildCandidateUrls, imageExtension } from "../../domain/url-fallback";
import { inspectImageFile } from "../../services/image-validation";
import { safeFileStem } from "../../core/normalize";
import { throwIfAborted } from "../../core/errors";
import { logger } from "../../core/logger";
import type { BoundedQueue } from "./work-queue";

export interface ScheduledTask {
  taskId: number;
  pinId: string;
  /** Fixed attempt order; the first entry is the task's canonical URL. */
  candidates: string[];
  expectedPath: string;
}

export interface SchedulerStats {
  scanned: number;
  present: number;
  queued: number;
  healed: number;
  noCandidates: number;
}

export interface SchedulerOptions {
  keyword?: string;
  pageSize: number;
  minFileBytes: number;
  signal?: AbortSignal;
}

export function expectedImagePath(imagesDir: string, pinId: string, canonicalUrl: string): string {
  return join(imagesDir, `${safeFileStem(pinId)}${imageExtension(canonicalUrl)}`);
}

/**
 * Compares pins that have an image against the files on disk and turns each
 * missing file into exactly one download task.
 */
export class DownloadScheduler {
  private stats: SchedulerStats = { scanned: 0, present: 0, queued: 0, healed: 0, noCandidates: 0 };

  constructor(private repo: KeywordRepository, private options: SchedulerOptions) {}

  get summary(): SchedulerStats {
    return { ...this.stats };
  }

  async planTask(pin: Pin): Promise<ScheduledTask | null> {
    this.stats.scanned++;

    const candidates = buildCandidateUrls(pin);
    const canonical = candidates[0];
    if (!canonical) {
      this.stats.noCandidates++;
      return null;
    }

    const expectedPath = expectedImagePath(this.repo.imagesDir, pin.id, canonical);
    const file = await inspectImageFile(expectedPath, this.options.minFileBytes);
    if (file.present) {
      this.stats.present++;
      if (!pin.downloaded || pin.downloadPath !== expectedPath) {
        await this.repo.markPinDownloaded(pin.id, expectedPath);
      }
      return null;
    }

    const task = await this.repo.getDownloadTaskByPinAndUrl(pin.id, canonical);
    if (task && task.status === "completed") {
      logger.warn(
        { taskId: task.id, pinId: pin.id, expectedPath, recordedPath: task.localPath, fileSize: file.size },
        "Completed download has no valid file on disk, re-queueing"
      );
      await this.repo.updateDownloadTaskStatus(task.id, "pending");
      this.stats.healed++;
    }

    const taskId = task ? task.id : await this.repo.createDownloadTask(pin.id, canonical);
    this.stats.queued++;
    return { taskId, pinId: pin.id, candidates, expectedPath };
  }

  /** Pages through the pins, feeding the queue; always closes the queue when done. */
  async produce(queue: BoundedQueue<ScheduledTask>): Promise<SchedulerStats> {
    const keyword = this.options.keyword ?? this.repo.keyword;
    let offset = 0;

    try {
      for (;;) {
        throwIfAborted(this.options.signal);
        const page = await this.repo.loadPinsWithImages(keyword, this.options.pageSize, offset);
        if (page.length === 0) break;
        offset += page.length;

        for (const pin of page) {
          throwIfAborted(this.options.signal);
          const task = await this.planTask(pin);
          if (task) await queue.put(task);
        }

        if (page.length < this.options.pageSize) break;
      }
    } finally {
      queue.close();
    }

    logger.info({ keyword, ...this.stats }, "Download scheduling finished");
    return this.summary;
  }
}
