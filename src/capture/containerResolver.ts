import type { Locator } from "playwright";
import { elementSurface, type ScrollSurface, type SurfaceLocator } from "./scrollSurface";
import { consoleLogger, type Logger } from "../utils/log";

export type ContainerProbe<P> = (page: P) => Promise<ScrollSurface | null>;

export interface ProbePage {
  locator(selector: string): Pick<Locator, "count"> & { first(): SurfaceLocator };
}

export interface ResolvedContainer {
  surface: ScrollSurface;
  selector: string;
}

// Document-platform containers first, generic layout containers last.
export const DEFAULT_CONTAINER_SELECTORS: readonly string[] = [
  ".bear-web-x-container.catalogue-opened.docx-in-wiki",
  ".bear-web-x-container",
  ".docx-content",
  ".wiki-content",
  "[role='main']",
  "main",
  ".scrollable-container",
  ".content-container"
];

export function selectorProbe(selector: string): ContainerProbe<ProbePage> {
  return async (page) => {
    const locator = page.locator(selector);
    if ((await locator.count()) === 0) return null;
    return elementSurface(locator.first(), selector);
  };
}

export function defaultContainerProbes(
  selectors: readonly string[] = DEFAULT_CONTAINER_SELECTORS
): ContainerProbe<ProbePage>[] {
  return selectors.map(selectorProbe);
}

/**
 * Returns the first probed surface whose content is taller than its visible
 * area, or the fallback (page root) when none is.
 */
export async function resolveScrollContainer<P>(
  page: P,
  probes: ContainerProbe<P>[],
  fallback: (page: P) => ScrollSurface,
  logger: Logger = consoleLogger
): Promise<ResolvedContainer> {
  for (const probe of probes) {
    const surface = await probe(page);
    if (!surface) continue;

    const scrollHeight = await surface.contentHeight();
    const clientHeight = await surface.visibleHeight();
    if (scrollHeight > clientHeight) {
      logger.log(
        `Found scroll container: ${surface.label} (scrollHeight: ${scrollHeight}, clientHeight: ${clientHeight})`
      );
      return { surface, selector: surface.label };
    }
  }

  const surface = fallback(page);
  return { surface, selector: surface.label };
}
