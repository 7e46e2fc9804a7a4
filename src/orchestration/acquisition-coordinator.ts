import type { KeywordRepository } from "../db/repositories/keyword.repo";
import { PinSchema, type AcquisitionMode, type RawPin } from "../domain/models";
import {
  selectStrategy,
  type AcquisitionCounters,
  type AcquisitionPlan,
  type AcquisitionResult,
  type ExpansionLimits,
} from "../domain/scrape-types";
import type { BrowserDriver, PinExtractor, SearchApi } from "../platforms/adapter";
import { buildPinUrl, buildSearchUrl } from "../platforms/pinterest/selectors";
import { harvestByScrolling, type RecordSink } from "./scroll-harvester";
import { jitteredDelay, type DelayRange } from "../core/cooldown";
import { sleep, type Sleep } from "../core/retry";
import { isUrl } from "../core/normalize";
import { AcquisitionError, PersistenceError, throwIfAborted } from "../core/errors";
import { env } from "../core/config";
import { logger } from "../core/logger";

export interface AcquisitionOptions {
  mode: AcquisitionMode;
  scrollPixels: number;
  apiDelay: DelayRange;
  perSeedCap: number;
  maxNoNewSeeds: number;
  wait: Sleep;
  signal?: AbortSignal;
}

export function defaultAcquisitionOptions(overrides: Partial<AcquisitionOptions> = {}): AcquisitionOptions {
  return {
    mode: env.ACQUISITION_MODE,
    scrollPixels: env.SCRAPER_SCROLL_PIXELS,
    apiDelay: { min: env.SCRAPER_API_DELAY_MIN_MS, max: env.SCRAPER_API_DELAY_MAX_MS },
    perSeedCap: env.PHASE2_PER_SEED_CAP,
    maxNoNewSeeds: env.PHASE2_MAX_NO_NEW_SEEDS,
    wait: sleep,
    ...overrides,
  };
}

export interface AcquisitionCollaborators {
  driver: BrowserDriver;
  extractor: PinExtractor;
  searchApi?: SearchApi;
}

/**
 * Harvests up to `target` new records for one keyword or seed URL, writing
 * each one to the repository the moment it is seen.
 */
export class AcquisitionCoordinator {
  private seen = new Set<string>();
  private discovered: string[] = [];
  private counters: AcquisitionCounters = { saved: 0, duplicates: 0, invalid: 0, persistenceFailures: 0 };
  private target = 0;

  constructor(
    private repo: KeywordRepository,
    private collaborators: AcquisitionCollaborators,
    private options: AcquisitionOptions
  ) {}

  /** Counters so far, readable after `acquire` throws. */
  get progress(): AcquisitionCounters {
    return { ...this.counters };
  }

  async acquire(input: string, target: number, sessionId: string | null): Promise<AcquisitionResult> {
    const keyword = this.repo.keyword;
    const isSearch = !isUrl(input);
    const plan = selectStrategy(target, {
      mode: this.options.mode,
      isSearch,
      perSeedCap: this.options.perSeedCap,
      maxNoNewSeeds: this.options.maxNoNewSeeds,
    });

    this.target = target;
    this.counters = { saved: 0, duplicates: 0, invalid: 0, persistenceFailures: 0 };
    this.discovered = [];
    const baseline = await this.repo.listPinIds(keyword);
    this.seen = new Set(baseline);

    logger.info(
      { keyword, target, plan: plan.kind, seedSource: plan.seedSource, baseline: baseline.length },
      "Acquisition started"
    );

    const sink: RecordSink = (record) => this.persist(record, keyword, sessionId);

    let seedSource = plan.seedSource;
    let stopReason = "target_reached";

    if (plan.seedSource === "api" && this.collaborators.searchApi) {
      try {
        stopReason = await this.runApiPhase(this.collaborators.searchApi, input, sink);
      } catch (error) {
        if (!(error instanceof AcquisitionError)) throw error;
        logger.warn({ keyword, code: error.code, error: error.message }, "API paging failed, falling back to scrolling");
        seedSource = "scroll";
      }
    } else {
      seedSource = "scroll";
    }

    if (seedSource === "scroll" && this.remaining() > 0) {
      stopReason = await this.runScrollPhase(plan, input, isSearch, sink);
    }

    const phase1Saved = this.counters.saved;
    logger.info({ keyword, saved: phase1Saved, stopReason }, "Seed phase finished");

    if (plan.expansion && this.remaining() > 0) {
      const seeds = this.discovered.length > 0 ? [...this.discovered] : baseline;
      stopReason = await this.runExpansionPhase(plan.expansion, seeds, sink);
      logger.info(
        { keyword, saved: this.counters.saved - phase1Saved, stopReason },
        "Expansion phase finished"
      );
    }

    if (this.remaining() <= 0) stopReason = "target_reached";

    const result: AcquisitionResult = {
      ...this.counters,
      plan: plan.kind,
      seedSource,
      phase1Saved,
      phase2Saved: this.counters.saved - phase1Saved,
      stopReason,
    };
    logger.info({ keyword, ...result }, "Acquisition finished");
    return result;
  }

  private remaining(): number {
    return this.target - this.counters.saved;
  }

  private async persist(record: RawPin, keyword: string, sessionId: string | null): Promise<boolean> {
    if (this.remaining() <= 0) return false;

    const parsed = PinSchema.safeParse(record);
    if (!parsed.success) {
      this.counters.invalid++;
      return false;
    }

    const id = parsed.data.id;
    if (this.seen.has(id)) {
      this.counters.duplicates++;
      return false;
    }

    try {
      const saved = await this.repo.savePinImmediately(record, keyword, sessionId);
      this.seen.add(id);
      if (!saved) {
        this.counters.duplicates++;
        return false;
      }
      this.counters.saved++;
      this.discovered.push(id);
      return true;
    } catch (error) {
      if (!(error instanceof PersistenceError)) throw error;
      this.counters.persistenceFailures++;
      logger.warn({ pinId: id, code: error.code, error: error.message }, "Failed to persist pin, skipping");
      return false;
    }
  }

  private async runApiPhase(searchApi: SearchApi, keyword: string, sink: RecordSink): Promise<string> {
    const signal = this.options.signal;
    throwIfAborted(signal);
    const credentials = await searchApi.captureCredentials(this.collaborators.driver, keyword);

    let bookmark: string | null = null;
    let page = 0;

    while (this.remaining() > 0) {
      throwIfAborted(signal);
      if (page > 0) {
        await jitteredDelay(this.options.apiDelay, this.options.wait);
        throwIfAborted(signal);
      }

      const result = await searchApi.fetchPage(credentials, keyword, bookmark);
      page++;

      let fresh = 0;
      for (const record of result.records) {
        throwIfAborted(signal);
        if (await sink(record)) fresh++;
      }

      logger.info(
        { page, records: result.records.length, fresh, saved: this.counters.saved, target: this.target },
        "Search API page processed"
      );

      if (page > 1 && fresh === 0) return "no_new_records";
      if (!result.nextBookmark) return "no_bookmark";
      bookmark = result.nextBookmark;
    }

    return "target_reached";
  }

  private async runScrollPhase(plan: AcquisitionPlan, input: string, isSearch: boolean, sink: RecordSink): Promise<string> {
    throwIfAborted(this.options.signal);
    const url = isSearch ? buildSearchUrl(input) : input;

    try {
      if (!(await this.collaborators.driver.navigate(url))) {
        logger.warn({ url }, "Seed page did not load, ending seed phase");
        return "navigation_failed";
      }
    } catch (error) {
      if (!(error instanceof AcquisitionError)) throw error;
      logger.warn({ url, code: error.code, error: error.message }, "Seed page blocked, ending seed phase");
      return "navigation_failed";
    }

    const state = await harvestByScrolling(
      this.collaborators.driver,
      this.collaborators.extractor,
      { ...plan.seedLimits, target: this.remaining() },
      sink,
      { scrollPixels: this.options.scrollPixels, signal: this.options.signal, label: "seed" }
    );
    return state.doneReason ?? "exhausted";
  }

  /**
   * Breadth-first over seeds: each seed's related-items module is scrolled up
   * to the per-seed cap, and ids it yields join the back of the queue.
   */
  private async runExpansionPhase(expansion: ExpansionLimits, seeds: string[], sink: RecordSink): Promise<string> {
    const queue = [...seeds];
    const visited = new Set<string>();
    let barrenSeeds = 0;

    while (this.remaining() > 0) {
      if (barrenSeeds >= expansion.maxNoNewSeeds) return "seeds_exhausted";
      const seed = queue.shift();
      if (seed === undefined) return "no_more_seeds";
      if (visited.has(seed)) continue;
      visited.add(seed);

      throwIfAborted(this.options.signal);
      const before = this.counters.saved;
      const discoveredBefore = this.discovered.length;

      try {
        if (await this.collaborators.driver.navigate(buildPinUrl(seed))) {
          await harvestByScrolling(
            this.collaborators.driver,
            this.collaborators.extractor,
            { ...expansion.perSeed, target: Math.min(expansion.perSeed.target, this.remaining()) },
            sink,
            { scrollPixels: this.options.scrollPixels, signal: this.options.signal, label: `seed:${seed}` }
          );
        } else {
          logger.debug({ seed }, "Seed detail page did not load");
        }
      } catch (error) {
        if (!(error instanceof AcquisitionError)) throw error;
        logger.warn({ seed, code: error.code, error: error.message }, "Seed expansion failed, moving on");
      }

      queue.push(...this.discovered.slice(discoveredBefore));
      barrenSeeds = this.counters.saved > before ? 0 : barrenSeeds + 1;
    }

    return "target_reached";
  }
}
