export interface ViewportSize {
  width: number;
  height: number;
}

export interface TileRecord {
  url: string;
  tile: string;
  y: number;
  height: number;
}

export interface PageMeta {
  url: string;
  total_height: number;
  viewport: ViewportSize;
  scale: number;
  wait: string;
  tiles: string[];
}

export interface SessionError {
  url: string;
  message: string;
  stack?: string;
}

export interface SessionMeta {
  urls: string[];
  started_at: number;
  finished_at: number;
  tiles: TileRecord[];
  errors: SessionError[];
}
