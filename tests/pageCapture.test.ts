import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { applyZoom, capturePage, navigate, type PageCaptureOptions } from "../src/capture/pageCapture";
import { CaptureAbortedError } from "../src/capture/scrollCapture";
import { parseWaitStrategy } from "../src/config/waitStrategy";
import { pageMetaPath, tilePath, tilesDir } from "../src/io/paths";
import { StubPage, type StubPageOptions } from "./support/stubPage";
import { silentLogger } from "./support/fakes";

const PAGE_URL = "https://example.com/feed";

let workDir: string;

beforeEach(async () => {
  workDir = await fs.mkdtemp(path.join(os.tmpdir(), "scrollsnap-page-"));
});

afterEach(async () => {
  await fs.rm(workDir, { recursive: true, force: true });
});

function captureOptions(page: StubPage, overrides: Partial<PageCaptureOptions> = {}): PageCaptureOptions {
  return {
    page,
    url: PAGE_URL,
    pageDir: workDir,
    viewport: { width: 1280, height: 1000 },
    scale: 1,
    wait: "load",
    tileOverlap: 80,
    capHeight: 50000,
    maxTiles: 150,
    scrollDelayMs: 0,
    idleTimeoutMs: 1000,
    logger: silentLogger(),
    ...overrides
  };
}

function stubPage(options: Partial<StubPageOptions> = {}): StubPage {
  return new StubPage({ contentHeight: 2600, viewportHeight: 1000, ...options });
}

async function readPageMeta(): Promise<unknown> {
  return JSON.parse(await fs.readFile(pageMetaPath(workDir), "utf8"));
}

describe("navigate", () => {
  it("waits for the mapped load state", async () => {
    const page = stubPage();
    await navigate(page, PAGE_URL, parseWaitStrategy("dom"));

    expect(page.goto).toHaveBeenCalledWith(PAGE_URL, { waitUntil: "domcontentloaded", timeout: 90000 });
  });

  it("loads then sleeps for a fixed delay", async () => {
    const page = stubPage();
    await navigate(page, PAGE_URL, parseWaitStrategy("0s"));

    expect(page.goto).toHaveBeenCalledWith(PAGE_URL, { waitUntil: "load", timeout: 60000 });
  });
});

describe("applyZoom", () => {
  it("leaves the page alone at scale 1", async () => {
    const page = stubPage();
    await applyZoom(page, 1);

    expect(page.evaluate).not.toHaveBeenCalled();
  });

  it("sets the body zoom as a string", async () => {
    const page = stubPage();
    await applyZoom(page, 1.5);

    expect(page.evaluate).toHaveBeenCalledWith(expect.any(Function), "1.5");
  });
});

describe("capturePage", () => {
  it("scrolls the window by wheel when no container overflows", async () => {
    const page = stubPage();
    const result = await capturePage(captureOptions(page));

    expect(result.selector).toBe("window");
    expect(result.stopReason).toBe("bottom");
    expect(result.tiles.map((tile) => tile.y)).toEqual([0, 920, 1600]);
    expect(page.mouse.wheel.mock.calls).toEqual([
      [0, 920],
      [0, 920],
      [0, 920]
    ]);
    expect(page.goto).toHaveBeenCalledWith(PAGE_URL, { waitUntil: "load", timeout: 90000 });
    expect(result.meta).toEqual({
      url: PAGE_URL,
      total_height: 2600,
      viewport: { width: 1280, height: 1000 },
      scale: 1,
      wait: "load",
      tiles: [1, 2, 3].map((index) => tilePath(tilesDir(workDir), index))
    });
    expect(result.meta_path).toBe(pageMetaPath(workDir));
    expect(await readPageMeta()).toEqual(result.meta);
  });

  it("scrolls a matched container instead of the window", async () => {
    const page = stubPage({ container: { selector: "main", contentHeight: 3000, visibleHeight: 800 } });
    const result = await capturePage(captureOptions(page));

    expect(result.selector).toBe("main");
    expect(result.meta.total_height).toBe(3000);
    expect(result.tiles.map((tile) => tile.y)).toEqual([0, 920, 1840, 2200]);
    expect(page.mouse.wheel).not.toHaveBeenCalled();
  });

  it("caps the recorded height and stops at the cap", async () => {
    const page = stubPage();
    const result = await capturePage(captureOptions(page, { capHeight: 1500 }));

    expect(result.meta.total_height).toBe(1500);
    expect(result.stopReason).toBe("height-cap");
    expect(result.tiles.map((tile) => tile.y)).toEqual([0, 920]);
  });

  it("records the zoom in page_meta.json", async () => {
    const page = stubPage({ contentHeight: 1000 });
    const result = await capturePage(captureOptions(page, { scale: 1.5, wait: "0s" }));

    expect(page.evaluate).toHaveBeenCalledWith(expect.any(Function), "1.5");
    expect(result.meta.scale).toBe(1.5);
    expect(result.meta.wait).toBe("0s");
    expect(result.tiles).toHaveLength(1);
  });

  it("writes page_meta.json with the tiles taken before a screenshot failure", async () => {
    const page = stubPage({ contentHeight: 5000, failScreenshotAt: 3 });

    const failure = await capturePage(captureOptions(page)).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(CaptureAbortedError);
    expect(failure).toHaveProperty("message", "Target crashed");
    expect(await readPageMeta()).toMatchObject({
      url: PAGE_URL,
      total_height: 5000,
      tiles: [tilePath(tilesDir(workDir), 1), tilePath(tilesDir(workDir), 2)]
    });
    await expect(fs.stat(tilePath(tilesDir(workDir), 2))).resolves.toBeTruthy();
  });

  it("writes no page_meta.json when navigation fails", async () => {
    const page = stubPage({ failGoto: [PAGE_URL] });

    await expect(capturePage(captureOptions(page))).rejects.toThrow("net::ERR_NAME_NOT_RESOLVED");
    await expect(fs.stat(pageMetaPath(workDir))).rejects.toThrow();
  });
});
