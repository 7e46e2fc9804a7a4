import type { RawPin } from "../domain/models";

export interface BrowserCookie {
  name: string;
  value: string;
  domain: string;
}

export interface CapturedRequest {
  url: string;
  method: string;
  headers: Record<string, string>;
  capturedAt: number;
}

export interface BrowserDriver {
  navigate(url: string): Promise<boolean>;

  scroll(pixels: number): Promise<void>;

  getPageSource(): Promise<string>;

  waitForSelector(selector: string, timeoutMs: number): Promise<boolean>;

  close(): Promise<void>;

  /** Requests seen since the last navigation whose URL contains `urlFragment`. */
  capturedRequests?(urlFragment: string): CapturedRequest[];

  cookies?(): Promise<BrowserCookie[]>;
}

export interface PinExtractor {
  extractRecords(html: string): RawPin[];
}

/** Looks up one pin's full record, used for stored pins that never got an image URL. */
export interface PinDetailSource {
  fetchPinDetail(pinId: string): Promise<RawPin | null>;
}

export interface HttpResponse {
  status: number;
  body: Buffer;
  headers: Record<string, string>;
}

export interface HttpClient {
  get(url: string, headers: Record<string, string>, timeoutMs: number): Promise<HttpResponse>;

  close?(): Promise<void>;
}

export interface ProcessLock {
  acquire(name: string): Promise<boolean>;

  release(name: string): Promise<void>;
}

/** Request template lifted from one real page load, replayed for cursor paging. */
export interface SearchCredentials {
  endpoint: string;
  sourceUrl: string;
  data: Record<string, unknown>;
  headers: Record<string, string>;
  cookies: Record<string, string>;
}

export interface SearchPage {
  records: RawPin[];
  nextBookmark: string | null;
}

export interface SearchApi {
  captureCredentials(driver: BrowserDriver, keyword: string): Promise<SearchCredentials>;

  fetchPage(credentials: SearchCredentials, keyword: string, bookmark: string | null): Promise<SearchPage>;
}

export interface BrowserDriverOptions {
  headless?: boolean;
  slowMo?: number;
  proxyUrl?: string;
  navigationTimeoutMs?: number;
}

export type BrowserDriverFactory = (options: BrowserDriverOptions) => Promise<BrowserDriver>;
