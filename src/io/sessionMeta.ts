import { pageMetaPath, sessionMetaPath } from "./paths";
import { writeJson } from "../utils/fs";
import type {
  PageMeta,
  SessionError,
  SessionMeta,
  TileRecord,
  ViewportSize
} from "../types/captureMeta";

export interface PageMetaParams {
  url: string;
  totalHeight: number;
  viewport: ViewportSize;
  scale: number;
  wait: string;
  tiles: TileRecord[];
}

export function buildPageMeta(params: PageMetaParams): PageMeta {
  return {
    url: params.url,
    total_height: params.totalHeight,
    viewport: { width: params.viewport.width, height: params.viewport.height },
    scale: params.scale,
    wait: params.wait,
    tiles: params.tiles.map((tile) => tile.tile)
  };
}

export async function writePageMeta(pageDirPath: string, meta: PageMeta): Promise<string> {
  const filePath = pageMetaPath(pageDirPath);
  await writeJson(filePath, meta);
  return filePath;
}

export interface SessionMetaParams {
  urls: string[];
  startedAt: number;
  finishedAt: number;
  tiles: TileRecord[];
  errors: SessionError[];
}

export function buildSessionMeta(params: SessionMetaParams): SessionMeta {
  return {
    urls: [...params.urls],
    started_at: params.startedAt,
    finished_at: params.finishedAt,
    tiles: params.tiles,
    errors: params.errors
  };
}

export async function writeSessionMeta(sessionDirPath: string, meta: SessionMeta): Promise<string> {
  const filePath = sessionMetaPath(sessionDirPath);
  await writeJson(filePath, meta);
  return filePath;
}
