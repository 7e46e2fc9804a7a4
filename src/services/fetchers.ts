import { errors as playwrightErrors, type BrowserContext } from "playwright";
import type { HttpClient, HttpResponse } from "../platforms/adapter";
import { DownloadError, errorMessage } from "../core/errors";
import { DEFAULT_USER_AGENT } from "./browser-session";

const USER_AGENTS = [
  DEFAULT_USER_AGENT,
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.4 Safari/605.1.15",
  "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/123.0.0.0 Safari/537.36",
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:125.0) Gecko/20100101 Firefox/125.0",
];

const IMAGE_REFERER = "https://www.pinterest.com/";

function isTimeoutError(error: unknown): boolean {
  return error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError");
}

export class FetchHttpClient implements HttpClient {
  async get(url: string, headers: Record<string, string>, timeoutMs: number): Promise<HttpResponse> {
    let response: Response;
    try {
      response = await fetch(url, { headers, redirect: "follow", signal: AbortSignal.timeout(timeoutMs) });
    } catch (error) {
      if (isTimeoutError(error)) {
        throw new DownloadError(`Timed out after ${timeoutMs}ms: ${url}`, "TIMEOUT");
      }
      throw new DownloadError(`Connection failed: ${errorMessage(error)}`, "CONNECTION_FAILED");
    }

    const responseHeaders: Record<string, string> = {};
    response.headers.forEach((value, name) => {
      responseHeaders[name.toLowerCase()] = value;
    });

    try {
      const body = Buffer.from(await response.arrayBuffer());
      return { status: response.status, body, headers: responseHeaders };
    } catch (error) {
      if (isTimeoutError(error)) {
        throw new DownloadError(`Timed out reading body: ${url}`, "TIMEOUT");
      }
      throw new DownloadError(`Connection dropped: ${errorMessage(error)}`, "CONNECTION_FAILED");
    }
  }
}

/** Requests issued through the browser context, carrying its cookies and fingerprint. */
export class BrowserContextHttpClient implements HttpClient {
  constructor(private context: BrowserContext) {}

  async get(url: string, headers: Record<string, string>, timeoutMs: number): Promise<HttpResponse> {
    try {
      const response = await this.context.request.get(url, { headers, timeout: timeoutMs });
      const responseHeaders: Record<string, string> = {};
      for (const [name, value] of Object.entries(response.headers())) {
        responseHeaders[name.toLowerCase()] = value;
      }
      return { status: response.status(), body: await response.body(), headers: responseHeaders };
    } catch (error) {
      if (error instanceof playwrightErrors.TimeoutError) {
        throw new DownloadError(`Timed out after ${timeoutMs}ms: ${url}`, "TIMEOUT");
      }
      throw new DownloadError(`Browser request failed: ${errorMessage(error)}`, "CONNECTION_FAILED");
    }
  }
}

/** Rotating browser-like request headers for image hosts. */
export class HeaderRotation {
  private index = 0;

  constructor(private userAgents: readonly string[] = USER_AGENTS, private extra: Record<string, string> = {}) {}

  current(): Record<string, string> {
    return {
      "User-Agent": this.userAgents[this.index % this.userAgents.length] ?? DEFAULT_USER_AGENT,
      Accept: "image/avif,image/webp,image/apng,image/*,*/*;q=0.8",
      "Accept-Language": "en-US,en;q=0.9",
      Referer: IMAGE_REFERER,
      ...this.extra,
    };
  }

  rotate(): void {
    this.index = (this.index + 1) % Math.max(1, this.userAgents.length);
  }
}

/** One way of retrieving a URL. Workers try fetchers in list order. */
export interface Fetcher {
  readonly name: string;
  fetch(url: string, timeoutMs: number): Promise<HttpResponse>;
  rotateHeaders(): void;
}

export class HeaderedFetcher implements Fetcher {
  constructor(
    readonly name: string,
    private client: HttpClient,
    private headers: HeaderRotation = new HeaderRotation()
  ) {}

  fetch(url: string, timeoutMs: number): Promise<HttpResponse> {
    return this.client.get(url, this.headers.current(), timeoutMs);
  }

  rotateHeaders(): void {
    this.headers.rotate();
  }
}

/** The pooled client first, then the browser session when one is available. */
export function defaultFetchers(context?: BrowserContext): Fetcher[] {
  const fetchers: Fetcher[] = [new HeaderedFetcher("pooled", new FetchHttpClient())];
  if (context) {
    fetchers.push(new HeaderedFetcher("browser", new BrowserContextHttpClient(context)));
  }
  return fetchers;
}
