import path from "path";
import { truncate } from "../utils/text";

const MAX_DIRNAME_LENGTH = 120;

/**
 * Directory name for a URL: scheme dropped, anything outside [A-Za-z0-9._-]
 * collapsed to "_", cut at 120 characters. Distinct URLs can collide.
 */
export function sanitizeUrl(url: string): string {
  const name = url.replace(/^https?:\/\//, "").replace(/[^A-Za-z0-9._-]+/g, "_");
  return truncate(name, MAX_DIRNAME_LENGTH);
}

export function sessionDir(outDir: string, stamp: string): string {
  return path.join(outDir, stamp);
}

export function sessionMetaPath(sessionDirPath: string): string {
  return path.join(sessionDirPath, "meta.json");
}

export function pageDir(sessionDirPath: string, url: string): string {
  return path.join(sessionDirPath, sanitizeUrl(url));
}

export function pageMetaPath(pageDirPath: string): string {
  return path.join(pageDirPath, "page_meta.json");
}

export function tilesDir(pageDirPath: string): string {
  return path.join(pageDirPath, "tiles");
}

export function tilePath(tilesDirPath: string, index: number): string {
  return path.join(tilesDirPath, `tile_${String(index).padStart(4, "0")}.png`);
}

export function stitchedPath(pageDirPath: string): string {
  return path.join(pageDirPath, "stitched.png");
}
