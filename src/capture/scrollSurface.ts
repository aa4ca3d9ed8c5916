import type { Locator, Mouse, Page } from "playwright";

/**
 * The scrollable thing a capture walks through: an element inside the page
 * or the page root. Offsets and heights are CSS pixels.
 */
export interface ScrollSurface {
  readonly label: string;
  contentHeight(): Promise<number>;
  visibleHeight(): Promise<number>;
  scrollOffset(): Promise<number>;
  scrollBy(delta: number): Promise<void>;
}

export const WINDOW_LABEL = "window";

export type SurfaceLocator = Pick<Locator, "evaluate">;

export type RootPage = Pick<Page, "evaluate"> & { mouse: Pick<Mouse, "wheel"> };

export function elementSurface(locator: SurfaceLocator, label: string): ScrollSurface {
  return {
    label,
    contentHeight: () => locator.evaluate((el) => el.scrollHeight),
    visibleHeight: () => locator.evaluate((el) => el.clientHeight),
    scrollOffset: () => locator.evaluate((el) => el.scrollTop),
    async scrollBy(delta: number) {
      await locator.evaluate((el, dy) => el.scrollBy(0, dy), delta);
    }
  };
}

// The root scrolls through wheel input so scroll listeners fire the way they
// do for a user.
export function windowSurface(page: RootPage): ScrollSurface {
  return {
    label: WINDOW_LABEL,
    contentHeight: () =>
      page.evaluate(() =>
        Math.max(document.body.scrollHeight, document.documentElement.scrollHeight)
      ),
    visibleHeight: () => page.evaluate(() => window.innerHeight),
    scrollOffset: () =>
      page.evaluate(() => window.pageYOffset || document.documentElement.scrollTop),
    async scrollBy(delta: number) {
      await page.mouse.wheel(0, delta);
    }
  };
}
