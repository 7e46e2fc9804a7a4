import type { AcquisitionMode, Pin, ScrapingSessionStatus } from "./models";
import type { ScrollLimits } from "./scroll-state-machine";

export type StrategyKind = "single_pass" | "extended_scroll" | "hybrid";

export interface AcquisitionPlan {
  kind: StrategyKind;
  /** Phase 1 source: scroll the rendered search page, or page the search API. */
  seedSource: "scroll" | "api";
  seedLimits: ScrollLimits;
  /** Present only for hybrid plans. */
  expansion: ExpansionLimits | null;
}

export interface ExpansionLimits {
  perSeed: ScrollLimits;
  maxNoNewSeeds: number;
}

export interface PlanOptions {
  mode: AcquisitionMode;
  /** API paging needs a search keyword; seed URLs always scroll. */
  isSearch: boolean;
  perSeedCap: number;
  maxNoNewSeeds: number;
}

export const SINGLE_PASS_LIMIT = 100;
export const EXTENDED_SCROLL_LIMIT = 1000;

/** Chooses the harvesting strategy from the number of records still wanted. */
export function selectStrategy(count: number, options: PlanOptions): AcquisitionPlan {
  const seedSource = options.mode === "api" && options.isSearch ? "api" : "scroll";

  if (count < SINGLE_PASS_LIMIT) {
    return {
      kind: "single_pass",
      seedSource,
      seedLimits: { target: count, maxScrolls: Math.max(count * 3, 10), stallThreshold: 3, maxConsecutiveNoNew: 10 },
      expansion: null,
    };
  }

  if (count < EXTENDED_SCROLL_LIMIT) {
    return {
      kind: "extended_scroll",
      seedSource,
      seedLimits: { target: count, maxScrolls: count * 3, stallThreshold: 5, maxConsecutiveNoNew: 15 },
      expansion: null,
    };
  }

  return {
    kind: "hybrid",
    seedSource,
    seedLimits: { target: count, maxScrolls: count * 3, stallThreshold: 3, maxConsecutiveNoNew: 10 },
    expansion: {
      perSeed: {
        target: Math.min(options.perSeedCap, count),
        maxScrolls: 20,
        stallThreshold: 2,
        maxConsecutiveNoNew: 3,
      },
      maxNoNewSeeds: options.maxNoNewSeeds,
    },
  };
}

export interface AcquisitionCounters {
  saved: number;
  duplicates: number;
  invalid: number;
  persistenceFailures: number;
}

export interface AcquisitionResult extends AcquisitionCounters {
  plan: StrategyKind;
  seedSource: "scroll" | "api";
  phase1Saved: number;
  phase2Saved: number;
  stopReason: string;
}

export interface DownloadCounters {
  succeeded: number;
  skipped: number;
  failed: number;
}

export interface ScrapeResult {
  keyword: string;
  workName: string;
  sessionId: string | null;
  status: ScrapingSessionStatus;
  /** True when the stored pins already covered the request and nothing was harvested. */
  fromCache: boolean;
  pins: Pin[];
  acquisition: AcquisitionCounters;
  downloads: DownloadCounters;
}
