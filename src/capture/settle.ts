import { errors } from "playwright";
import type { Page } from "playwright";
import { consoleLogger, type Logger } from "../utils/log";

export type SettlePage = Pick<Page, "waitForLoadState" | "waitForTimeout">;

export interface SettleOptions {
  idleTimeoutMs: number;
  settleDelayMs: number;
  logger?: Logger;
}

/**
 * Waits for lazily loaded content after a scroll. The network-idle wait is
 * advisory: a timeout is logged and the capture goes on.
 */
export async function settlePage(page: SettlePage, options: SettleOptions): Promise<void> {
  const logger = options.logger ?? consoleLogger;
  try {
    await page.waitForLoadState("networkidle", { timeout: options.idleTimeoutMs });
  } catch (error) {
    if (!(error instanceof errors.TimeoutError)) {
      throw error;
    }
    logger.warn(`[warn] Timeout waiting for networkidle: ${error.message}. Continuing...`);
  }

  if (options.settleDelayMs > 0) {
    await page.waitForTimeout(options.settleDelayMs);
  }
}
