import { writeFile } from "fs/promises";
import { join } from "path";
import type { Pin } from "../domain/models";
import type { AcquisitionCounters, DownloadCounters } from "../domain/scrape-types";
import { logger } from "../core/logger";

export const PINS_EXPORT_FILENAME = "pins.json";
export const STATS_EXPORT_FILENAME = "stats.json";

export interface ScrapeStats {
  keyword: string;
  totalPins: number;
  downloadedImages: number;
  uniqueCreators: number;
  averageSaves: number;
  acquisition: AcquisitionCounters;
  downloads: DownloadCounters;
  exportedAt: string;
}

export function summarizePins(pins: Pin[]): Pick<ScrapeStats, "totalPins" | "downloadedImages" | "uniqueCreators" | "averageSaves"> {
  const creators = new Set<string>();
  let saves = 0;
  let downloaded = 0;

  for (const pin of pins) {
    const creatorKey = pin.creator?.id ?? pin.creator?.username;
    if (creatorKey) creators.add(creatorKey);
    saves += pin.stats.saves;
    if (pin.downloaded) downloaded++;
  }

  return {
    totalPins: pins.length,
    downloadedImages: downloaded,
    uniqueCreators: creators.size,
    averageSaves: pins.length > 0 ? Math.round((saves / pins.length) * 100) / 100 : 0,
  };
}

export async function exportResults(
  dir: string,
  keyword: string,
  pins: Pin[],
  acquisition: AcquisitionCounters,
  downloads: DownloadCounters
): Promise<ScrapeStats> {
  const stats: ScrapeStats = {
    keyword,
    ...summarizePins(pins),
    acquisition,
    downloads,
    exportedAt: new Date().toISOString(),
  };

  const exportable = pins.map(({ rawData: _rawData, ...rest }) => rest);
  await writeFile(join(dir, PINS_EXPORT_FILENAME), JSON.stringify(exportable, null, 2), "utf-8");
  await writeFile(join(dir, STATS_EXPORT_FILENAME), JSON.stringify(stats, null, 2), "utf-8");

  logger.debug({ dir, pins: pins.length }, "Exported results");
  return stats;
}
