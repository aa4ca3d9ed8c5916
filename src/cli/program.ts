import { Command } from "commander";
import pkg from "../../package.json";
import type { EnvDefaults } from "../config/env";
import { parseSnapOptions, type SnapOptions } from "../config/snapOptions";

interface CliOptions {
  out: string;
  stitch: boolean;
  width: number;
  height: number;
  scale: number;
  wait: string;
  scrollDelayMs: number;
  tileOverlap: number;
  stickyTop: number;
  stickyBottom: number;
  capHeight: number;
  maxTiles: number;
  idleTimeoutMs: number;
  cookies?: string;
  userDataDir?: string;
  mobile: boolean;
  headless: boolean;
}

const int = (value: string): number => Number.parseInt(value, 10);

export interface ProgramSettings {
  envPath: string;
  defaults: EnvDefaults;
  run: (options: SnapOptions) => Promise<void>;
}

export function buildProgram(settings: ProgramSettings): Command {
  const { defaults } = settings;
  const program = new Command();

  program
    .name("scrollsnap")
    .description("Scroll a page, snap it to tiles, optionally stitch them into one long image")
    .version(pkg.version)
    .argument("<url...>", "One or more page URLs")
    .option(
      "--env-file <path>",
      "Path to .env file (overrides SCROLLSNAP_ENV_FILE/DOTENV_CONFIG_PATH)",
      settings.envPath
    )
    .option("--out <dir>", "Output directory", defaults.outDir ?? "out")
    .option("--stitch", "Stitch all tiles into one long image", false)
    .option("--no-stitch", "Keep tiles only (default)")
    .option("--width <px>", "Viewport width", int, 1280)
    .option("--height <px>", "Viewport height (tile height baseline)", int, 1000)
    .option("--scale <factor>", "Page zoom, e.g. 1.0 / 2.0", Number.parseFloat, 1)
    .option("--wait <strategy>", "load|dom|networkidle|<seconds>s", "networkidle")
    .option("--scroll-delay-ms <ms>", "Delay after each scroll", int, 350)
    .option("--tile-overlap <px>", "Overlap pixels between tiles to avoid gaps", int, 80)
    .option("--sticky-top <px>", "Pixels to crop from top of tiles 2..N when stitching", int, 0)
    .option("--sticky-bottom <px>", "Pixels to crop from bottom of tiles 1..N-1 when stitching", int, 0)
    .option("--cap-height <px>", "Max page height to capture", int, 50000)
    .option("--max-tiles <n>", "Max tiles per page", int, 150)
    .option("--idle-timeout-ms <ms>", "Network-idle wait per scroll step", int, 5000)
    .option("--cookies <path>", "Path to cookies.json (Playwright format)", defaults.cookies)
    .option("--user-data-dir <dir>", "Chromium user data dir for persistent login", defaults.userDataDir)
    .option("--mobile", "Emulate mobile-like viewport/touch UA", false)
    .option("--no-mobile", "Desktop emulation (default)")
    .option("--headless", "Run headless (default)", true)
    .option("--no-headless", "Run with a visible browser")
    .action(async (urls: string[], opts: CliOptions) => {
      const options = parseSnapOptions({
        urls,
        outDir: opts.out,
        stitch: opts.stitch,
        width: opts.width,
        height: opts.height,
        scale: opts.scale,
        wait: opts.wait,
        scrollDelayMs: opts.scrollDelayMs,
        tileOverlap: opts.tileOverlap,
        stickyTop: opts.stickyTop,
        stickyBottom: opts.stickyBottom,
        capHeight: opts.capHeight,
        maxTiles: opts.maxTiles,
        idleTimeoutMs: opts.idleTimeoutMs,
        cookies: opts.cookies,
        userDataDir: opts.userDataDir,
        mobile: opts.mobile,
        headless: opts.headless
      });
      await settings.run(options);
    });

  return program;
}
