import { describe, expect, it } from "vitest";
import { ColorMapper, paletteFromConfig } from "../src/color.js";
import { defaultConfig } from "../src/config.js";
import { createCoordinateSystem } from "../src/coordinates.js";
import { calculateLayout, calculateLegend, formatTick } from "../src/layout.js";

const corners = createCoordinateSystem(defaultConfig).hexPoints();
const mapper = new ColorMapper(paletteFromConfig(defaultConfig));

describe("calculateLayout", () => {
  it("sizes the canvas around the grid and the legend", () => {
    const res = calculateLayout([{ x: 0, y: 0 }, { x: 10, y: 20 }], corners, defaultConfig);
    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.value).toMatchObject({
      width: 126,
      height: 112,
      minX: -6,
      minY: -6,
      offsetX: 16,
      offsetY: 48,
      titleX: 10,
      titleY: 22,
      subtitleY: 36,
      legendX: 56,
      legendY: 42,
      legendTitleY: 36,
    });
    expect(res.value.corners).toHaveLength(6);
  });

  it("rejects an empty hexagon list", () => {
    const res = calculateLayout([], corners, defaultConfig);
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error.kind).toBe("rendering");
  });

  it("rejects a zero-area bounding box", () => {
    const res = calculateLayout([{ x: 0, y: 0 }], corners, { ...defaultConfig, hex_size: 0 });
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error.message).toBe("Degenerate canvas bounding box 0x0");
  });
});

describe("calculateLegend", () => {
  const layout = { legendY: 42, legendHeight: 60 };
  const legend = calculateLegend({ minValue: 0, maxValue: 10 }, mapper, layout, 5, "Synapse count");

  it("colors each bin with the color of its center", () => {
    expect(legend.swatches.map((s) => s.color)).toEqual([1, 3, 5, 7, 9].map((v) => mapper.mapValueToColor(v, 0, 10)));
    expect(legend.swatches[2].color).toBe("#fb6a4a");
  });

  it("stacks bins from the bottom", () => {
    expect(legend.swatches[0]).toMatchObject({ y: 90, height: 12 });
    expect(legend.swatches[4].y).toBe(42);
  });

  it("labels every bin edge", () => {
    expect(legend.ticks.map((t) => t.label)).toEqual(["0", "2", "4", "6", "8", "10"]);
    expect(legend.ticks[0].y).toBe(102);
    expect(legend.ticks[5].y).toBe(42);
  });
});

describe("formatTick", () => {
  it("keeps at most two decimals", () => {
    expect(formatTick(6.9)).toBe("6.9");
    expect(formatTick(1 / 3)).toBe("0.33");
  });
});
