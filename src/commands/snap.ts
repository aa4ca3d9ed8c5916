import { capturePage } from "../capture/pageCapture";
import { openBrowserSession, type BrowserSession } from "../capture/playwright";
import { CaptureAbortedError } from "../capture/scrollCapture";
import { loadCookies } from "../config/cookies";
import type { SnapOptions } from "../config/snapOptions";
import { pageDir, sessionDir, stitchedPath } from "../io/paths";
import { buildSessionMeta, writeSessionMeta } from "../io/sessionMeta";
import { stitchTiles } from "../stitch/stitchTiles";
import type { SessionError, SessionMeta, TileRecord } from "../types/captureMeta";
import { errorMessage } from "../utils/errors";
import { ensureDir } from "../utils/fs";
import { consoleLogger, type Logger } from "../utils/log";
import { epochSeconds, sessionStamp } from "../utils/time";

export interface SnapResult {
  sessionDir: string;
  meta: SessionMeta;
  meta_path: string;
  failures: SessionError[];
}

async function addCookies(
  session: BrowserSession,
  cookiesPath: string,
  logger: Logger
): Promise<void> {
  try {
    const cookies = await loadCookies(cookiesPath);
    await session.addCookies(cookies);
    logger.log(`Loaded ${cookies.length} cookies from ${cookiesPath}`);
  } catch (error) {
    logger.warn(`[warn] failed to load cookies: ${errorMessage(error)}`);
  }
}

function stackOf(error: unknown): string | undefined {
  const root = error instanceof CaptureAbortedError ? error.cause : error;
  return root instanceof Error ? root.stack : undefined;
}

/**
 * Captures every URL in order with one browser page. A URL that fails is
 * recorded and skipped; its partial output stays on disk and its tiles stay
 * in the session manifest.
 */
export async function runSnap(options: SnapOptions, logger: Logger = consoleLogger): Promise<SnapResult> {
  const sessionDirPath = sessionDir(options.outDir, sessionStamp());
  await ensureDir(sessionDirPath);

  const startedAt = epochSeconds();
  const tiles: TileRecord[] = [];
  const failures: SessionError[] = [];
  const viewport = { width: options.width, height: options.height };

  const session = await openBrowserSession({
    headless: options.headless,
    viewport,
    mobile: options.mobile,
    userDataDir: options.userDataDir
  });

  try {
    if (options.cookies) {
      await addCookies(session, options.cookies, logger);
    }
    const page = await session.newPage();

    for (const url of options.urls) {
      logger.log(`==> ${url}`);
      const pageDirPath = pageDir(sessionDirPath, url);
      try {
        const capture = await capturePage({
          page,
          url,
          pageDir: pageDirPath,
          viewport,
          scale: options.scale,
          wait: options.wait,
          tileOverlap: options.tileOverlap,
          capHeight: options.capHeight,
          maxTiles: options.maxTiles,
          scrollDelayMs: options.scrollDelayMs,
          idleTimeoutMs: options.idleTimeoutMs,
          logger
        });
        tiles.push(...capture.tiles);

        if (options.stitch && capture.tiles.length > 0) {
          const stitched = await stitchTiles(capture.meta.tiles, stitchedPath(pageDirPath), {
            overlapTop: options.stickyTop,
            overlapBottom: options.stickyBottom
          });
          logger.log(`[ok] stitched -> ${stitched.path}`);
        }
      } catch (error) {
        if (error instanceof CaptureAbortedError) {
          tiles.push(...error.tiles);
        }
        logger.error(`[error] ${url}: ${errorMessage(error)}`);
        failures.push({
          url,
          message: errorMessage(error),
          stack: stackOf(error)
        });
      }
    }
  } finally {
    await session.close().catch((error: unknown) => {
      logger.warn(`[warn] failed to close browser: ${errorMessage(error)}`);
    });
  }

  const meta = buildSessionMeta({
    urls: options.urls,
    startedAt,
    finishedAt: epochSeconds(),
    tiles,
    errors: failures
  });
  const metaPath = await writeSessionMeta(sessionDirPath, meta);

  logger.log(`\nDone. Output at: ${sessionDirPath}`);
  return { sessionDir: sessionDirPath, meta, meta_path: metaPath, failures };
}
