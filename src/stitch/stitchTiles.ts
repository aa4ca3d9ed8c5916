import { promises as fs } from "fs";
import path from "path";
import sharp from "sharp";
import { NO_CROP, planStitch, type StitchCrop, type TileSize } from "./layout";
import { ConfigurationError } from "../utils/errors";
import { ensureDir } from "../utils/fs";

const WHITE = { r: 255, g: 255, b: 255 };

// The stitched canvas of a long page can exceed sharp's default input limit.
export const CANVAS_INPUT_OPTIONS: sharp.SharpOptions = { limitInputPixels: false };

export interface StitchResult {
  path: string;
  width: number;
  height: number;
}

interface LoadedTile {
  path: string;
  buffer: Buffer;
  size: TileSize;
}

async function loadTile(filePath: string): Promise<LoadedTile> {
  const buffer = await fs.readFile(filePath);
  const { width, height } = await sharp(buffer).metadata();
  if (!width || !height) {
    throw new Error(`Unable to read image size of ${filePath}`);
  }
  return { path: filePath, buffer, size: { width, height } };
}

/**
 * Stacks tiles top to bottom on a white canvas as wide as the widest tile and
 * writes an opaque RGB PNG. Tile files are only read.
 */
export async function stitchTiles(
  tilePaths: string[],
  outPath: string,
  crop: StitchCrop = NO_CROP
): Promise<StitchResult> {
  if (tilePaths.length === 0) {
    throw new ConfigurationError("No tiles to stitch");
  }

  const tiles: LoadedTile[] = [];
  for (const tilePath of tilePaths) {
    tiles.push(await loadTile(tilePath));
  }

  const layout = planStitch(
    tiles.map((tile) => tile.size),
    crop
  );

  const overlays: sharp.OverlayOptions[] = [];
  for (const [index, tile] of tiles.entries()) {
    const placement = layout.placements[index];
    const input = await sharp(tile.buffer)
      .extract({
        left: 0,
        top: placement.cropTop,
        width: placement.width,
        height: placement.keepHeight
      })
      .png()
      .toBuffer();
    overlays.push({ input, left: 0, top: placement.top });
  }

  const composed = await sharp({
    create: {
      width: layout.width,
      height: layout.height,
      channels: 3,
      background: WHITE
    }
  })
    .composite(overlays)
    .png()
    .toBuffer();

  await ensureDir(path.dirname(outPath));
  await sharp(composed, CANVAS_INPUT_OPTIONS).flatten({ background: WHITE }).png().toFile(outPath);

  return { path: outPath, width: layout.width, height: layout.height };
}
