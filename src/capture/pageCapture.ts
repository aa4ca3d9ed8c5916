import type { Page } from "playwright";
import {
  resolveScrollContainer,
  defaultContainerProbes,
  type ProbePage
} from "./containerResolver";
import {
  CaptureAbortedError,
  captureTiles,
  scrollStep,
  type CaptureTilesResult,
  type StopReason
} from "./scrollCapture";
import { windowSurface, type RootPage } from "./scrollSurface";
import { settlePage, type SettlePage } from "./settle";
import { parseWaitStrategy, type WaitStrategy } from "../config/waitStrategy";
import { tilesDir } from "../io/paths";
import { buildPageMeta, writePageMeta } from "../io/sessionMeta";
import type { PageMeta, TileRecord, ViewportSize } from "../types/captureMeta";
import { ensureDir } from "../utils/fs";
import { consoleLogger, type Logger } from "../utils/log";
import { sleep } from "../utils/time";

/** The slice of a Playwright page that one capture drives. */
export type CapturePage = Pick<Page, "goto" | "screenshot"> & ProbePage & RootPage & SettlePage;

export interface PageCaptureOptions {
  page: CapturePage;
  url: string;
  pageDir: string;
  viewport: ViewportSize;
  scale: number;
  wait: string;
  tileOverlap: number;
  capHeight: number;
  maxTiles: number;
  scrollDelayMs: number;
  idleTimeoutMs: number;
  logger?: Logger;
}

export interface PageCaptureResult {
  meta: PageMeta;
  meta_path: string;
  tiles: TileRecord[];
  selector: string;
  stopReason: StopReason;
}

export async function navigate(
  page: Pick<Page, "goto">,
  url: string,
  strategy: WaitStrategy
): Promise<void> {
  if (strategy.kind === "delay") {
    await page.goto(url, { waitUntil: "load", timeout: strategy.timeoutMs });
    await sleep(strategy.seconds * 1000);
    return;
  }
  await page.goto(url, { waitUntil: strategy.state, timeout: strategy.timeoutMs });
}

export async function applyZoom(page: Pick<Page, "evaluate">, scale: number): Promise<void> {
  if (scale === 1) return;
  await page.evaluate((zoom) => {
    document.body.style.zoom = zoom;
  }, String(scale));
}

export async function capturePage(options: PageCaptureOptions): Promise<PageCaptureResult> {
  const logger = options.logger ?? consoleLogger;
  const { page } = options;

  await navigate(page, options.url, parseWaitStrategy(options.wait));
  await applyZoom(page, options.scale);

  const { surface, selector } = await resolveScrollContainer(
    page,
    defaultContainerProbes(),
    windowSurface,
    logger
  );
  logger.log(`Using scroll container: ${selector}`);

  const totalHeight = Math.min(await surface.contentHeight(), options.capHeight);
  const viewportHeight = options.viewport.height;
  logger.log(
    `Total scroll height: ${totalHeight}, Step: ${scrollStep(viewportHeight, options.tileOverlap)}`
  );

  const tilesDirPath = tilesDir(options.pageDir);
  await ensureDir(tilesDirPath);

  const writeMeta = async (tiles: TileRecord[]): Promise<{ meta: PageMeta; metaPath: string }> => {
    const meta = buildPageMeta({
      url: options.url,
      totalHeight,
      viewport: options.viewport,
      scale: options.scale,
      wait: options.wait,
      tiles
    });
    const metaPath = await writePageMeta(options.pageDir, meta);
    return { meta, metaPath };
  };

  let capture: CaptureTilesResult;
  try {
    capture = await captureTiles({
      url: options.url,
      surface,
      tilesDir: tilesDirPath,
      viewportHeight,
      overlap: options.tileOverlap,
      maxTiles: options.maxTiles,
      scrollLimit: options.capHeight,
      settle: () =>
        settlePage(page, {
          idleTimeoutMs: options.idleTimeoutMs,
          settleDelayMs: options.scrollDelayMs,
          logger
        }),
      screenshot: async (filePath) => {
        await page.screenshot({ path: filePath });
      },
      logger
    });
  } catch (error) {
    if (error instanceof CaptureAbortedError) {
      await writeMeta(error.tiles);
    }
    throw error;
  }

  logger.log(`Total tiles captured: ${capture.tiles.length}`);
  logger.log(`Final scroll position: ${capture.finalOffset}`);

  const { meta, metaPath } = await writeMeta(capture.tiles);

  return {
    meta,
    meta_path: metaPath,
    tiles: capture.tiles,
    selector,
    stopReason: capture.stopReason
  };
}
