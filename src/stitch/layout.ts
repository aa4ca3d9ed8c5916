import { ConfigurationError } from "../utils/errors";

export interface TileSize {
  width: number;
  height: number;
}

export interface StitchCrop {
  /** Rows dropped from the top of every tile but the first. */
  overlapTop: number;
  /** Rows dropped from the bottom of every tile but the last. */
  overlapBottom: number;
}

export interface TilePlacement {
  top: number;
  cropTop: number;
  keepHeight: number;
  width: number;
}

export interface StitchLayout {
  width: number;
  height: number;
  placements: TilePlacement[];
}

export const NO_CROP: StitchCrop = { overlapTop: 0, overlapBottom: 0 };

/**
 * Each tile keeps at least one row, so crops larger than a tile never yield a
 * negative canvas. A misconfigured crop can leave duplicated rows instead.
 */
export function planStitch(sizes: TileSize[], crop: StitchCrop = NO_CROP): StitchLayout {
  if (sizes.length === 0) {
    throw new ConfigurationError("No tiles to stitch");
  }

  const last = sizes.length - 1;
  let top = 0;
  const placements = sizes.map((size, index) => {
    const trimTop = index > 0 ? crop.overlapTop : 0;
    const trimBottom = index < last ? crop.overlapBottom : 0;
    const keepHeight = Math.max(1, size.height - trimTop - trimBottom);
    const placement: TilePlacement = {
      top,
      cropTop: Math.min(trimTop, size.height - 1),
      keepHeight,
      width: size.width
    };
    top += keepHeight;
    return placement;
  });

  return {
    width: Math.max(...sizes.map((size) => size.width)),
    height: top,
    placements
  };
}
