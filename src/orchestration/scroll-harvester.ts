import type { RawPin } from "../domain/models";
import { advanceScroll, initialScrollState, type ScrollLimits, type ScrollState } from "../domain/scroll-state-machine";
import type { BrowserDriver, PinExtractor } from "../platforms/adapter";
import { throwIfAborted } from "../core/errors";
import { logger } from "../core/logger";

export type RecordSink = (record: RawPin) => Promise<boolean>;

export interface ScrollHarvestOptions {
  scrollPixels: number;
  signal?: AbortSignal;
  label?: string;
}

/**
 * Extract, persist, scroll until the scroll state machine reports done. The
 * caller has already navigated the driver to the page.
 */
export async function harvestByScrolling(
  driver: BrowserDriver,
  extractor: PinExtractor,
  limits: ScrollLimits,
  sink: RecordSink,
  options: ScrollHarvestOptions
): Promise<ScrollState> {
  let state = initialScrollState();
  if (limits.target <= 0) {
    return { ...state, phase: "done", doneReason: "target_reached" };
  }

  while (state.phase !== "done") {
    throwIfAborted(options.signal);

    const html = await driver.getPageSource();
    const records = extractor.extractRecords(html);

    let fresh = 0;
    for (const record of records) {
      if (state.collected + fresh >= limits.target) break;
      throwIfAborted(options.signal);
      if (await sink(record)) fresh++;
    }

    const previous = state.phase;
    state = advanceScroll(state, fresh, limits);
    logger.debug(
      { label: options.label, round: state.rounds, extracted: records.length, fresh, phase: state.phase },
      "Scroll round"
    );

    if (state.phase === "done") break;

    throwIfAborted(options.signal);
    if (state.phase === "recovering" && previous !== "recovering") {
      await driver.scroll(-options.scrollPixels);
      await driver.scroll(options.scrollPixels * 2);
    } else {
      await driver.scroll(options.scrollPixels);
    }
  }

  logger.debug(
    { label: options.label, rounds: state.rounds, collected: state.collected, reason: state.doneReason },
    "Scroll harvest finished"
  );
  return state;
}
