import type { BrowserContext, Page, Request } from "playwright";
import type { BrowserCookie, BrowserDriver, BrowserDriverOptions, CapturedRequest } from "../adapter";
import { closeContextSafely, detectBlockChallenge, launchBrowserContext, type LaunchedContext } from "../../services/browser-session";
import { NavigationError } from "../../core/errors";
import { env } from "../../core/config";
import { logger } from "../../core/logger";

const CAPTURE_FRAGMENT = "/resource/";
const MAX_CAPTURED_REQUESTS = 200;

export interface PlaywrightDriverOptions extends BrowserDriverOptions {
  scrollSettleMs?: number;
}

export class PlaywrightBrowserDriver implements BrowserDriver {
  private captured: CapturedRequest[] = [];
  private closed = false;

  private constructor(
    private launched: LaunchedContext,
    private page: Page,
    private options: Required<Pick<PlaywrightDriverOptions, "navigationTimeoutMs" | "scrollSettleMs">>
  ) {
    this.page.on("request", (request) => this.recordRequest(request));
  }

  static async launch(options: PlaywrightDriverOptions = {}): Promise<PlaywrightBrowserDriver> {
    const launched = await launchBrowserContext(options);
    try {
      const page = await launched.context.newPage();
      return new PlaywrightBrowserDriver(launched, page, {
        navigationTimeoutMs: options.navigationTimeoutMs ?? env.SCRAPER_NAVIGATION_TIMEOUT_MS,
        scrollSettleMs: options.scrollSettleMs ?? env.SCRAPER_SCROLL_SETTLE_MS,
      });
    } catch (error) {
      await closeContextSafely(launched);
      throw error;
    }
  }

  private recordRequest(request: Request): void {
    if (!request.url().includes(CAPTURE_FRAGMENT)) return;
    this.captured.push({
      url: request.url(),
      method: request.method(),
      headers: request.headers(),
      capturedAt: Date.now(),
    });
    if (this.captured.length > MAX_CAPTURED_REQUESTS) {
      this.captured.shift();
    }
  }

  async navigate(url: string): Promise<boolean> {
    this.captured = [];
    try {
      await this.page.goto(url, { waitUntil: "domcontentloaded", timeout: this.options.navigationTimeoutMs });
    } catch (error) {
      logger.warn({ error, url }, "Navigation failed");
      return false;
    }

    await this.page.waitForLoadState("networkidle", { timeout: 5000 }).catch((error: unknown) => {
      logger.trace({ error, url }, "Network did not go idle, continuing with current DOM");
    });

    const block = detectBlockChallenge(this.page.url());
    if (block.isBlocked) {
      throw new NavigationError(`Navigation to ${url} landed on ${this.page.url()}`, block.reason ?? "BLOCK_DETECTED");
    }
    return true;
  }

  async scroll(pixels: number): Promise<void> {
    await this.page.mouse.wheel(0, pixels);
    if (this.options.scrollSettleMs > 0) {
      await this.page.waitForTimeout(this.options.scrollSettleMs);
    }
  }

  getPageSource(): Promise<string> {
    return this.page.content();
  }

  async waitForSelector(selector: string, timeoutMs: number): Promise<boolean> {
    try {
      await this.page.waitForSelector(selector, { timeout: timeoutMs, state: "attached" });
      return true;
    } catch {
      return false;
    }
  }

  capturedRequests(urlFragment: string): CapturedRequest[] {
    return this.captured.filter((request) => request.url.includes(urlFragment));
  }

  async cookies(): Promise<BrowserCookie[]> {
    const cookies = await this.launched.context.cookies();
    return cookies.map((cookie) => ({ name: cookie.name, value: cookie.value, domain: cookie.domain }));
  }

  /** Shared with the browser-backed fetcher so downloads reuse this session's cookies. */
  get context(): BrowserContext {
    return this.launched.context;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await closeContextSafely(this.launched);
  }
}
