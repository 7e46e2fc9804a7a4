import { chromium, type Browser, type BrowserContext } from "playwright";
import { logger } from "../core/logger";
import { env } from "../core/config";
import type { BrowserDriverOptions } from "../platforms/adapter";

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36";

const BLOCK_CHALLENGE_PATTERNS = [
  /\/challenge\//i,
  /\/checkpoint\//i,
  /\/login\/?(\?|$)/i,
  /\/consent/i,
  /captcha/i,
  /blocked/i,
  /suspended/i,
  /security.*check/i,
];

export function detectBlockChallenge(url: string): { isBlocked: boolean; reason: string | null } {
  for (const pattern of BLOCK_CHALLENGE_PATTERNS) {
    const match = url.match(pattern);
    if (match) {
      return { isBlocked: true, reason: `BLOCK_DETECTED:url_pattern:${match[0]}` };
    }
  }
  return { isBlocked: false, reason: null };
}

export interface LaunchedContext {
  browser: Browser;
  context: BrowserContext;
}

export async function launchBrowserContext(options: BrowserDriverOptions = {}): Promise<LaunchedContext> {
  const proxyUrl = options.proxyUrl ?? env.PROXY_URL;
  const browser = await chromium.launch({
    headless: options.headless ?? env.PLAYWRIGHT_HEADLESS,
    slowMo: options.slowMo ?? env.PLAYWRIGHT_SLOW_MO,
    proxy: proxyUrl ? { server: proxyUrl } : undefined,
    args: ["--disable-blink-features=AutomationControlled"],
  });

  try {
    const context = await browser.newContext({
      viewport: { width: 1280, height: 800 },
      locale: "en-US",
      userAgent: DEFAULT_USER_AGENT,
    });
    logger.info({ proxy: Boolean(proxyUrl) }, "Launched browser context");
    return { browser, context };
  } catch (error) {
    await browser.close();
    throw error;
  }
}

export async function closeContextSafely(launched: LaunchedContext | null): Promise<void> {
  if (!launched) return;

  try {
    for (const page of launched.context.pages()) {
      await page.close().catch((error: unknown) => logger.trace({ error }, "Page already closed"));
    }
    await launched.context.close();
    await launched.browser.close();
  } catch (error) {
    logger.debug({ error }, "Error closing browser context (non-fatal)");
  }
}
