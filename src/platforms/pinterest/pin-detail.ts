import type { RawPin } from "../../domain/models";
import type { HttpClient, PinDetailSource } from "../adapter";
import { DEFAULT_USER_AGENT } from "../../services/browser-session";
import { AcquisitionError, errorMessage } from "../../core/errors";
import { normalizePinId } from "../../core/normalize";
import { env } from "../../core/config";
import { logger } from "../../core/logger";
import { extractPinsFromHtml } from "./parsers";
import { buildPinUrl } from "./selectors";

export interface PinterestPinDetailOptions {
  timeoutMs?: number;
}

/** Reads a pin's detail page over plain HTTP and picks that pin out of the embedded page state. */
export class PinterestPinDetailSource implements PinDetailSource {
  constructor(private http: HttpClient, private options: PinterestPinDetailOptions = {}) {}

  async fetchPinDetail(pinId: string): Promise<RawPin | null> {
    const url = buildPinUrl(pinId);
    const response = await this.http
      .get(
        url,
        { "User-Agent": DEFAULT_USER_AGENT, Accept: "text/html,application/xhtml+xml" },
        this.options.timeoutMs ?? env.SCRAPER_NAVIGATION_TIMEOUT_MS
      )
      .catch((error: unknown) => {
        throw new AcquisitionError(`Pin detail request failed: ${errorMessage(error)}`, "DETAIL_REQUEST_FAILED");
      });

    if (response.status !== 200) {
      throw new AcquisitionError(`Pin detail returned HTTP ${response.status}`, "DETAIL_HTTP_STATUS");
    }

    const records = extractPinsFromHtml(response.body.toString("utf-8"));
    const match = records.find((record) => normalizePinId(record.id.trim()) === pinId);
    if (!match) {
      logger.debug({ pinId, records: records.length }, "Pin detail page did not contain the pin");
    }
    return match ?? null;
  }
}
