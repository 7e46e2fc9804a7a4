import type { KeywordRepository } from "../../db/repositories/keyword.repo";
import { PinSchema, type Pin, type RawPin } from "../../domain/models";
import type { PinDetailSource } from "../../platforms/adapter";
import { errorMessage, throwIfAborted } from "../../core/errors";
import { logger } from "../../core/logger";

export interface EnhancementStats {
  checked: number;
  enhanced: number;
  failed: number;
}

export function mergePinDetail(stored: Pin, detail: Pin): Pin {
  return {
    ...stored,
    imageUrls: Object.keys(detail.imageUrls).length > 0 ? detail.imageUrls : stored.imageUrls,
    largestImageUrl: detail.largestImageUrl ?? stored.largestImageUrl,
    title: stored.title ?? detail.title,
    description: stored.description ?? detail.description,
    creator: stored.creator ?? detail.creator,
    board: stored.board ?? detail.board,
    stats: detail.stats,
    rawData: Object.keys(detail.rawData).length > 0 ? detail.rawData : stored.rawData,
  };
}

function hasImage(pin: Pin): boolean {
  return Boolean(pin.largestImageUrl) || Object.keys(pin.imageUrls).length > 0;
}

export class PinEnhancer {
  constructor(
    private repo: KeywordRepository,
    private source: PinDetailSource,
    private signal?: AbortSignal
  ) {}

  async enhance(keyword: string): Promise<EnhancementStats> {
    const stats: EnhancementStats = { checked: 0, enhanced: 0, failed: 0 };
    const ids = await this.repo.listPinIdsWithoutImages(keyword);

    for (const id of ids) {
      throwIfAborted(this.signal);
      stats.checked++;
      if (await this.enhanceOne(id)) stats.enhanced++;
      else stats.failed++;
    }

    if (ids.length > 0) logger.info({ keyword, ...stats }, "Pin enhancement finished");
    return stats;
  }

  private async enhanceOne(id: string): Promise<boolean> {
    const stored = await this.repo.pins.findById(id);
    if (!stored) return false;

    let raw: RawPin | null;
    try {
      raw = await this.source.fetchPinDetail(id);
    } catch (error) {
      logger.warn({ pinId: id, error: errorMessage(error) }, "Pin detail lookup failed");
      return false;
    }

    const parsed = PinSchema.safeParse(raw ?? {});
    if (!parsed.success || !hasImage(parsed.data)) {
      logger.warn({ pinId: id }, "Pin detail has no image URL");
      return false;
    }

    await this.repo.updatePinContent(mergePinDetail(stored, parsed.data));
    return true;
  }
}
