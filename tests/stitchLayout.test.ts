import { describe, expect, it } from "vitest";
import { planStitch } from "../src/stitch/layout";
import { ConfigurationError } from "../src/utils/errors";

describe("stitch layout", () => {
  it("stacks tiles without crops", () => {
    const layout = planStitch([
      { width: 100, height: 50 },
      { width: 100, height: 50 }
    ]);

    expect(layout).toEqual({
      width: 100,
      height: 100,
      placements: [
        { top: 0, cropTop: 0, keepHeight: 50, width: 100 },
        { top: 50, cropTop: 0, keepHeight: 50, width: 100 }
      ]
    });
  });

  it("crops the top of later tiles and the bottom of earlier ones", () => {
    const layout = planStitch(
      [
        { width: 100, height: 100 },
        { width: 100, height: 100 }
      ],
      { overlapTop: 20, overlapBottom: 20 }
    );

    expect(layout.height).toBe(160);
    expect(layout.placements).toEqual([
      { top: 0, cropTop: 0, keepHeight: 80, width: 100 },
      { top: 80, cropTop: 20, keepHeight: 80, width: 100 }
    ]);
  });

  it("crops both edges of middle tiles", () => {
    const layout = planStitch(
      [
        { width: 100, height: 100 },
        { width: 100, height: 100 },
        { width: 100, height: 100 }
      ],
      { overlapTop: 10, overlapBottom: 30 }
    );

    expect(layout.height).toBe(220);
    expect(layout.placements.map((placement) => placement.top)).toEqual([0, 70, 130]);
    expect(layout.placements.map((placement) => placement.keepHeight)).toEqual([70, 60, 90]);
    expect(layout.placements.map((placement) => placement.cropTop)).toEqual([0, 10, 10]);
  });

  it("leaves a single tile untouched", () => {
    const layout = planStitch([{ width: 640, height: 480 }], { overlapTop: 20, overlapBottom: 20 });
    expect(layout).toEqual({
      width: 640,
      height: 480,
      placements: [{ top: 0, cropTop: 0, keepHeight: 480, width: 640 }]
    });
  });

  it("uses the widest tile for the canvas width", () => {
    const layout = planStitch([
      { width: 80, height: 10 },
      { width: 120, height: 10 }
    ]);
    expect(layout.width).toBe(120);
  });

  it("keeps one row of a tile when the crop exceeds its height", () => {
    const layout = planStitch(
      [
        { width: 100, height: 10 },
        { width: 100, height: 10 }
      ],
      { overlapTop: 30, overlapBottom: 0 }
    );

    expect(layout.height).toBe(11);
    expect(layout.placements[1]).toEqual({ top: 10, cropTop: 9, keepHeight: 1, width: 100 });
  });

  it("rejects an empty tile list", () => {
    expect(() => planStitch([])).toThrow(ConfigurationError);
  });
});
