import { copyFile, readdir } from "fs/promises";
import { existsSync } from "fs";
import { basename, join, resolve } from "path";
import { KeywordRepository } from "../db/repositories/keyword.repo";
import { DATABASE_FILENAME } from "../db/client";
import type { Pin } from "../domain/models";
import { isValidImageFile } from "../services/image-validation";
import { env } from "../core/config";
import { logger } from "../core/logger";

export interface MergeOptions {
  sourceDir: string;
  targetDir: string;
  dryRun?: boolean;
  only?: string[];
  pageSize?: number;
  minFileBytes?: number;
}

export interface PartitionMergeResult {
  partition: string;
  sourcePins: number;
  added: number;
  skipped: number;
  imagesCopied: number;
}

export async function discoverPartitions(outputDir: string): Promise<string[]> {
  const root = resolve(outputDir);
  if (!existsSync(root)) return [];

  const entries = await readdir(root, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isDirectory() && existsSync(join(root, entry.name, DATABASE_FILENAME)))
    .map((entry) => entry.name)
    .sort();
}

async function* pagesOf(repo: KeywordRepository, pageSize: number): AsyncGenerator<{ query: string; pins: Pin[] }> {
  for (const query of await repo.pins.listQueries()) {
    let offset = 0;
    for (;;) {
      const page = await repo.loadPinsByQuery(query, pageSize, offset);
      if (page.length === 0) break;
      offset += page.length;
      yield { query, pins: page };
      if (page.length < pageSize) break;
    }
  }
}

/**
 * Copies every pin of the source tree that the target partition lacks, along
 * with its image file. Rows already in the target are left untouched.
 */
export async function mergeOutputTrees(options: MergeOptions): Promise<PartitionMergeResult[]> {
  const pageSize = options.pageSize ?? env.SCHEDULER_PAGE_SIZE;
  const minFileBytes = options.minFileBytes ?? env.DOWNLOAD_MIN_FILE_BYTES;
  const partitions = (await discoverPartitions(options.sourceDir)).filter(
    (name) => !options.only || options.only.includes(name)
  );

  const results: PartitionMergeResult[] = [];

  for (const partition of partitions) {
    const source = KeywordRepository.open(options.sourceDir, partition);
    const targetExists = existsSync(join(resolve(options.targetDir), partition, DATABASE_FILENAME));
    const target = options.dryRun && !targetExists ? null : KeywordRepository.open(options.targetDir, partition);
    const result: PartitionMergeResult = { partition, sourcePins: 0, added: 0, skipped: 0, imagesCopied: 0 };

    try {
      for await (const { query, pins } of pagesOf(source, pageSize)) {
        for (const pin of pins) {
          result.sourcePins++;

          if (!target) {
            result.added++;
            continue;
          }
          if (await target.pins.findById(pin.id)) {
            result.skipped++;
            continue;
          }
          if (options.dryRun) {
            result.added++;
            continue;
          }

          const saved = await target.savePinImmediately({ ...pin, downloaded: false, downloadPath: null }, query, null);
          if (!saved) {
            result.skipped++;
            continue;
          }
          result.added++;

          if (pin.downloadPath && (await isValidImageFile(pin.downloadPath, minFileBytes))) {
            const destination = join(target.imagesDir, basename(pin.downloadPath));
            if (!existsSync(destination)) {
              await copyFile(pin.downloadPath, destination);
              result.imagesCopied++;
            }
            await target.markPinDownloaded(pin.id, destination);
          }
        }
      }
    } finally {
      source.close();
      target?.close();
    }

    logger.info({ ...result, dryRun: Boolean(options.dryRun) }, "Partition merged");
    results.push(result);
  }

  return results;
}
