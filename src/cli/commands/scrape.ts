import type { Command } from "commander";
import { z } from "zod";
import { AcquisitionModeSchema, type AcquisitionMode } from "../../domain/models";
import type { ScrapeResult } from "../../domain/scrape-types";
import { PinScraper } from "../../orchestration/scrape-coordinator";
import { LockContentionError } from "../../core/errors";
import { logger } from "../../core/logger";
import { env } from "../../core/config";

interface ScrapeCommandOptions {
  count: string;
  output: string;
  proxy?: string;
  images: boolean;
  headless: boolean;
  mode?: string;
  debug?: boolean;
}

const countSchema = z.coerce.number().int().positive();

function parseCount(value: string): number {
  const parsed = countSchema.safeParse(value);
  if (!parsed.success) {
    console.error(`--count must be a positive integer, got "${value}"`);
    process.exit(1);
  }
  return parsed.data;
}

function parseMode(value: string | undefined): AcquisitionMode | undefined {
  if (value === undefined) return undefined;
  const parsed = AcquisitionModeSchema.safeParse(value);
  if (!parsed.success) {
    console.error(`--mode must be one of ${AcquisitionModeSchema.options.join(", ")}, got "${value}"`);
    process.exit(1);
  }
  return parsed.data;
}

/** Aborts the returned signal on the first Ctrl-C; a second one exits hard. */
function interruptSignal(): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const onSigint = () => {
    if (controller.signal.aborted) process.exit(130);
    logger.warn("Interrupt received, finishing current step (Ctrl-C again to force)");
    controller.abort();
  };
  process.on("SIGINT", onSigint);
  return { signal: controller.signal, dispose: () => process.off("SIGINT", onSigint) };
}

function printResult(result: ScrapeResult): void {
  console.log(`${result.keyword}: ${result.status}${result.fromCache ? " (cache)" : ""}`);
  console.log(`  Pins: ${result.pins.length} returned, ${result.acquisition.saved} new this run`);
  console.log(
    `  Skipped: ${result.acquisition.duplicates} duplicate, ${result.acquisition.invalid} invalid, ${result.acquisition.persistenceFailures} write failures`
  );
  console.log(
    `  Images: ${result.downloads.succeeded} downloaded, ${result.downloads.skipped} already present, ${result.downloads.failed} failed`
  );
}

function withScrapeOptions(command: Command): Command {
  return command
    .option("-n, --count <n>", "Number of pins to collect", "100")
    .option("-o, --output <dir>", "Output directory", env.OUTPUT_DIR)
    .option("--proxy <url>", "Proxy for the browser and browser-side downloads", env.PROXY_URL)
    .option("--no-images", "Skip image downloads")
    .option("--no-headless", "Show the browser window")
    .option("--mode <mode>", "Acquisition mode (browser or api)")
    .option("--debug", "Verbose logging");
}

export const commands = (program: Command) => {
  withScrapeOptions(program.command("scrape <keyword>").description("Collect pins for a keyword or seed URL")).action(
    async (keyword: string, options: ScrapeCommandOptions) => {
      if (options.debug) logger.level = "debug";
      const count = parseCount(options.count);
      const mode = parseMode(options.mode);
      const { signal, dispose } = interruptSignal();

      try {
        const result = await new PinScraper().scrape(keyword, count, {
          outputDir: options.output,
          downloadImages: options.images,
          headless: options.headless,
          proxyUrl: options.proxy,
          mode,
          signal,
        });
        printResult(result);
        process.exit(result.status === "completed" ? 0 : 130);
      } catch (error) {
        if (error instanceof LockContentionError) {
          console.error(error.message);
          process.exit(2);
        }
        logger.error({ error }, "Scrape failed");
        process.exit(1);
      } finally {
        dispose();
      }
    }
  );

  withScrapeOptions(
    program.command("scrape:batch <keywords...>").description("Collect pins for several keywords, one after another")
  ).action(async (keywords: string[], options: ScrapeCommandOptions) => {
    if (options.debug) logger.level = "debug";
    const count = parseCount(options.count);
    const mode = parseMode(options.mode);
    const { signal, dispose } = interruptSignal();
    const scraper = new PinScraper();
    let failures = 0;

    try {
      for (const keyword of keywords) {
        if (signal.aborted) break;
        try {
          const result = await scraper.scrape(keyword, count, {
            outputDir: options.output,
            downloadImages: options.images,
            headless: options.headless,
            proxyUrl: options.proxy,
            mode,
            signal,
          });
          printResult(result);
        } catch (error) {
          failures++;
          logger.error({ error, keyword }, "Keyword failed, continuing with the next one");
        }
      }
    } finally {
      dispose();
    }

    logger.info({ keywords: keywords.length, failures, interrupted: signal.aborted }, "Batch finished");
    process.exit(signal.aborted ? 130 : failures > 0 ? 1 : 0);
  });
};
