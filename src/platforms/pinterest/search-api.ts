import { z } from "zod";
import type { RawPin } from "../../domain/models";
import type {
  BrowserCookie,
  BrowserDriver,
  CapturedRequest,
  HttpClient,
  SearchApi,
  SearchCredentials,
  SearchPage,
} from "../adapter";
import { AcquisitionError, errorMessage } from "../../core/errors";
import { serializeCookies } from "../../core/normalize";
import { env } from "../../core/config";
import { logger } from "../../core/logger";
import { normalizeApiPin } from "./parsers";
import { PINTEREST_SELECTORS, buildSearchUrl } from "./selectors";

export const END_BOOKMARK = "-end-";

const STRIPPED_HEADERS = new Set(["host", "content-length", "cookie"]);
const STRIPPED_HEADER_PREFIXES = ["x-b3-", "sec-ch-"];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseDataParam(url: string): { endpoint: string; sourceUrl: string; data: Record<string, unknown> } | null {
  let parsedUrl: URL;
  try {
    parsedUrl = new URL(url);
  } catch {
    return null;
  }

  const raw = parsedUrl.searchParams.get("data");
  if (!raw) return null;

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!isRecord(data) || !isRecord(data.options)) return null;
  if (typeof data.options.query !== "string" || data.options.scope === undefined) return null;

  return {
    endpoint: `${parsedUrl.origin}${parsedUrl.pathname}`,
    sourceUrl: parsedUrl.searchParams.get("source_url") ?? "",
    data,
  };
}

function hasBookmarks(data: Record<string, unknown>): boolean {
  const options = data.options;
  return isRecord(options) && Array.isArray(options.bookmarks) && options.bookmarks.length > 0;
}

export function sanitizeCapturedHeaders(headers: Record<string, string>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    const lower = name.toLowerCase();
    if (STRIPPED_HEADERS.has(lower)) continue;
    if (STRIPPED_HEADER_PREFIXES.some((prefix) => lower.startsWith(prefix))) continue;
    result[name] = value;
  }
  return result;
}

/**
 * Picks the replayable search request among the captured ones: the most
 * recent GET with a usable `data` parameter, preferring one that already
 * carries a bookmark.
 */
export function extractCredentials(
  requests: CapturedRequest[],
  cookies: BrowserCookie[]
): SearchCredentials | null {
  const candidates = requests
    .filter((request) => request.method.toUpperCase() === "GET")
    .map((request) => ({ request, parsed: parseDataParam(request.url) }))
    .filter((c) => c.parsed !== null)
    .sort((a, b) => b.request.capturedAt - a.request.capturedAt);

  const chosen = candidates.find((c) => c.parsed && hasBookmarks(c.parsed.data)) ?? candidates[0];
  if (!chosen || !chosen.parsed) return null;

  const cookieMap: Record<string, string> = {};
  for (const cookie of cookies) {
    cookieMap[cookie.name] = cookie.value;
  }

  const headers = sanitizeCapturedHeaders(chosen.request.headers);
  const csrf = cookieMap.csrftoken;
  const hasCsrfHeader = Object.keys(headers).some((name) => name.toLowerCase() === "x-csrftoken");
  if (csrf && !hasCsrfHeader) {
    headers["X-CSRFToken"] = csrf;
  }

  return {
    endpoint: chosen.parsed.endpoint,
    sourceUrl: chosen.parsed.sourceUrl,
    data: chosen.parsed.data,
    headers,
    cookies: cookieMap,
  };
}

const SearchResponseSchema = z.object({
  resource_response: z
    .object({
      data: z
        .union([z.object({ results: z.array(z.unknown()).nullish() }).passthrough(), z.array(z.unknown())])
        .nullish(),
      bookmark: z.string().nullish(),
    })
    .passthrough(),
  resource: z
    .object({
      options: z.object({ bookmarks: z.array(z.string()).nullish() }).passthrough().nullish(),
    })
    .passthrough()
    .nullish(),
});

export function parseSearchResponse(body: unknown): SearchPage {
  const parsed = SearchResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new AcquisitionError("Unexpected search API response shape", "API_BAD_RESPONSE");
  }

  const data = parsed.data.resource_response.data;
  const results = Array.isArray(data) ? data : data?.results ?? [];
  const records: RawPin[] = [];
  for (const item of results) {
    const record = normalizeApiPin(item);
    if (record) records.push(record);
  }

  const bookmark = parsed.data.resource_response.bookmark ?? parsed.data.resource?.options?.bookmarks?.[0] ?? null;
  return { records, nextBookmark: bookmark && bookmark !== END_BOOKMARK ? bookmark : null };
}

export function buildSearchRequestUrl(credentials: SearchCredentials, keyword: string, bookmark: string | null): string {
  const options: Record<string, unknown> = isRecord(credentials.data.options) ? { ...credentials.data.options } : {};
  options.query = keyword;
  options.bookmarks = bookmark ? [bookmark] : [];

  const params = new URLSearchParams({
    source_url: credentials.sourceUrl || `${PINTEREST_SELECTORS.SEARCH_PATH}?q=${encodeURIComponent(keyword)}`,
    data: JSON.stringify({ ...credentials.data, options }),
    _: String(Date.now()),
  });
  return `${credentials.endpoint}?${params.toString()}`;
}

export interface PinterestSearchApiOptions {
  timeoutMs?: number;
  /** Scrolls performed after the first load so the page issues its own search request. */
  primingScrolls?: number;
  scrollPixels?: number;
}

export class PinterestSearchApi implements SearchApi {
  constructor(private http: HttpClient, private options: PinterestSearchApiOptions = {}) {}

  async captureCredentials(driver: BrowserDriver, keyword: string): Promise<SearchCredentials> {
    if (!driver.capturedRequests || !driver.cookies) {
      throw new AcquisitionError("Browser driver cannot capture requests", "CAPTURE_UNSUPPORTED");
    }

    const ok = await driver.navigate(buildSearchUrl(keyword));
    if (!ok) {
      throw new AcquisitionError(`Failed to load search page for "${keyword}"`, "NAVIGATION_FAILED");
    }

    const scrolls = this.options.primingScrolls ?? 2;
    for (let i = 0; i < scrolls; i++) {
      await driver.scroll(this.options.scrollPixels ?? env.SCRAPER_SCROLL_PIXELS);
    }

    const credentials = extractCredentials(
      driver.capturedRequests(PINTEREST_SELECTORS.SEARCH_RESOURCE_PATH),
      await driver.cookies()
    );
    if (!credentials) {
      throw new AcquisitionError("No replayable search request was captured", "CREDENTIALS_NOT_CAPTURED");
    }

    logger.info(
      { keyword, headerCount: Object.keys(credentials.headers).length, cookieCount: Object.keys(credentials.cookies).length },
      "Captured search API credentials"
    );
    return credentials;
  }

  async fetchPage(credentials: SearchCredentials, keyword: string, bookmark: string | null): Promise<SearchPage> {
    const url = buildSearchRequestUrl(credentials, keyword, bookmark);
    const headers = {
      Accept: "application/json, text/javascript, */*; q=0.01",
      ...credentials.headers,
      Cookie: serializeCookies(credentials.cookies),
    };

    const response = await this.http
      .get(url, headers, this.options.timeoutMs ?? env.SCRAPER_NAVIGATION_TIMEOUT_MS)
      .catch((error: unknown) => {
        throw new AcquisitionError(`Search API request failed: ${errorMessage(error)}`, "API_REQUEST_FAILED");
      });

    if (response.status !== 200) {
      throw new AcquisitionError(`Search API returned HTTP ${response.status}`, "API_HTTP_STATUS");
    }

    let body: unknown;
    try {
      body = JSON.parse(response.body.toString("utf-8"));
    } catch {
      throw new AcquisitionError("Search API returned non-JSON body", "API_BAD_RESPONSE");
    }
    return parseSearchResponse(body);
  }
}
