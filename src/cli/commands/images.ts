import type { Command } from "commander";
import { discoverPartitions } from "../../orchestration/merge-service";
import { repairPartitionImages } from "../../orchestration/image-repair";
import { PinterestPinDetailSource } from "../../platforms/pinterest";
import { FetchHttpClient, defaultFetchers } from "../../services/fetchers";
import { FileProcessLock } from "../../services/process-lock";
import { sanitizeWorkName } from "../../core/normalize";
import { logger } from "../../core/logger";
import { env } from "../../core/config";

interface ImagesCommandOptions {
  output: string;
  concurrency?: string;
  details: boolean;
}

export const commands = (program: Command) => {
  program
    .command("images:download [keyword]")
    .description("Download missing images for one keyword, or for every keyword in the output directory")
    .option("-o, --output <dir>", "Output directory", env.OUTPUT_DIR)
    .option("--concurrency <n>", "Parallel downloads")
    .option("--no-details", "Skip detail lookups for pins stored without an image URL")
    .action(async (keyword: string | undefined, options: ImagesCommandOptions) => {
      const partitions = keyword ? [sanitizeWorkName(keyword)] : await discoverPartitions(options.output);
      if (partitions.length === 0) {
        console.log(`No keyword databases under ${options.output}`);
        return;
      }

      const concurrency = options.concurrency ? parseInt(options.concurrency, 10) : undefined;
      const controller = new AbortController();
      process.once("SIGINT", () => controller.abort());
      const lock = new FileProcessLock(options.output);
      const detailSource = options.details ? new PinterestPinDetailSource(new FetchHttpClient()) : undefined;
      let failed = 0;

      for (const partition of partitions) {
        try {
          const result = await repairPartitionImages({
            outputDir: options.output,
            partition,
            lock,
            fetchers: defaultFetchers(),
            detailSource,
            signal: controller.signal,
            downloads: concurrency && concurrency > 0 ? { concurrency } : {},
          });
          if (result.status === "locked") {
            console.log(`${partition}: skipped, another run holds its lock`);
            continue;
          }
          for (const { query, counters } of result.queries) {
            failed += counters.failed;
            console.log(`${query}: ${counters.succeeded} downloaded, ${counters.skipped} present, ${counters.failed} failed`);
          }
          if (result.status === "cancelled") break;
        } catch (error) {
          logger.error({ error, partition }, "Image download failed");
          failed++;
        }
      }

      process.exit(failed > 0 ? 1 : 0);
    });
};
