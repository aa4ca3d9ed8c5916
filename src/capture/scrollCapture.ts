import type { ScrollSurface } from "./scrollSurface";
import { tilePath } from "../io/paths";
import type { TileRecord } from "../types/captureMeta";
import { errorMessage } from "../utils/errors";
import { consoleLogger, type Logger } from "../utils/log";

export type StopReason = "bottom" | "max-tiles" | "height-cap";

export interface CaptureTilesOptions {
  url: string;
  surface: ScrollSurface;
  tilesDir: string;
  viewportHeight: number;
  overlap: number;
  maxTiles: number;
  /** Offset + viewport height at which capture stops; unbounded when omitted. */
  scrollLimit?: number;
  settle: () => Promise<void>;
  screenshot: (filePath: string) => Promise<void>;
  logger?: Logger;
}

export interface CaptureTilesResult {
  tiles: TileRecord[];
  finalOffset: number;
  stopReason: StopReason;
}

/**
 * A capture that failed partway. `tiles` lists the screenshots already on disk;
 * the original failure is the `cause`.
 */
export class CaptureAbortedError extends Error {
  readonly tiles: TileRecord[];

  constructor(tiles: TileRecord[], cause: unknown) {
    super(errorMessage(cause), { cause });
    this.name = "CaptureAbortedError";
    this.tiles = tiles;
  }
}

export function scrollStep(viewportHeight: number, overlap: number): number {
  return Math.max(1, viewportHeight - overlap);
}

/**
 * Scrolls the surface in overlapping steps and takes one screenshot per new
 * offset. The bottom is an offset that did not move after a scroll; comparing
 * against a precomputed maximum breaks when content loads mid-capture.
 *
 * A scroll that is a no-op mid-content also reads as the bottom.
 */
export async function captureTiles(options: CaptureTilesOptions): Promise<CaptureTilesResult> {
  const logger = options.logger ?? consoleLogger;
  const step = scrollStep(options.viewportHeight, options.overlap);
  const scrollLimit = options.scrollLimit ?? Number.POSITIVE_INFINITY;
  const tiles: TileRecord[] = [];

  const shoot = async (y: number): Promise<void> => {
    const index = tiles.length + 1;
    const filePath = tilePath(options.tilesDir, index);
    logger.log(`Capturing tile ${index} at position: ${y}`);
    await options.screenshot(filePath);
    tiles.push({ url: options.url, tile: filePath, y, height: options.viewportHeight });
  };
  const reachedLimit = (y: number): boolean => y + options.viewportHeight >= scrollLimit;

  const walk = async (): Promise<CaptureTilesResult> => {
    let position = await options.surface.scrollOffset();
    await shoot(position);

    let stopReason: StopReason | null = reachedLimit(position) ? "height-cap" : null;
    while (stopReason === null) {
      if (tiles.length >= options.maxTiles) {
        logger.warn(
          `[warn] Reached max tiles limit (${options.maxTiles}). Capturing might be incomplete.`
        );
        stopReason = "max-tiles";
        break;
      }

      await options.surface.scrollBy(step);
      await options.settle();

      const next = await options.surface.scrollOffset();
      if (next === position) {
        logger.log(`Scroll position hasn't changed (${next}). Reached the bottom.`);
        stopReason = "bottom";
        break;
      }

      position = next;
      await shoot(position);
      if (reachedLimit(position)) {
        logger.log(`Reached height cap (${scrollLimit}px) at position: ${position}`);
        stopReason = "height-cap";
      }
    }

    return { tiles, finalOffset: position, stopReason };
  };

  try {
    return await walk();
  } catch (error) {
    throw new CaptureAbortedError([...tiles], error);
  }
}
