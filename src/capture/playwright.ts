import { chromium } from "playwright";
import type { BrowserContext, BrowserContextOptions } from "playwright";
import type { CapturePage } from "./pageCapture";
import type { BrowserCookie } from "../config/cookies";
import type { ViewportSize } from "../types/captureMeta";

export const DEFAULT_VIEWPORT: ViewportSize = { width: 1280, height: 1000 };
export const MOBILE_USER_AGENT =
  "Mozilla/5.0 (iPhone; CPU iPhone OS 17_0 like Mac OS X) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.0 Mobile/15E148 Safari/604.1";

const LAUNCH_ARGS = ["--disable-gpu"];

export interface BrowserSessionOptions {
  headless: boolean;
  viewport?: ViewportSize;
  mobile?: boolean;
  userDataDir?: string;
}

export interface BrowserSession {
  newPage(): Promise<CapturePage>;
  addCookies(cookies: BrowserCookie[]): Promise<void>;
  close(): Promise<void>;
}

function sessionFor(context: BrowserContext, close: () => Promise<void>): BrowserSession {
  return {
    newPage: () => context.newPage(),
    addCookies: (cookies) => context.addCookies(cookies),
    close
  };
}

export function contextOptions(options: BrowserSessionOptions): BrowserContextOptions {
  const viewport = options.viewport ?? DEFAULT_VIEWPORT;
  if (!options.mobile) {
    return { viewport };
  }
  return {
    viewport,
    isMobile: true,
    hasTouch: true,
    userAgent: MOBILE_USER_AGENT
  };
}

/**
 * One context for the whole run. With a user data dir the context is
 * persistent and owns the browser process.
 */
export async function openBrowserSession(options: BrowserSessionOptions): Promise<BrowserSession> {
  if (options.userDataDir) {
    const context = await chromium.launchPersistentContext(options.userDataDir, {
      headless: options.headless,
      args: LAUNCH_ARGS,
      ...contextOptions(options)
    });
    return sessionFor(context, () => context.close());
  }

  const browser = await chromium.launch({ headless: options.headless, args: LAUNCH_ARGS });
  try {
    const context = await browser.newContext(contextOptions(options));
    return sessionFor(context, async () => {
      await context.close();
      await browser.close();
    });
  } catch (error) {
    await browser.close();
    throw error;
  }
}
