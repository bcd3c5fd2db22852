import { describe, expect, it } from "vitest";
import { ColorMapper, paletteFromConfig } from "../src/color.js";
import { defaultConfig } from "../src/config.js";
import { determineValueRange } from "../src/data_processor.js";

const mapper = new ColorMapper(paletteFromConfig(defaultConfig));

describe("ColorMapper", () => {
  it("hits the palette stops at their positions", () => {
    expect(mapper.mapValueToColor(0, 0, 10)).toBe("#fee5d9");
    expect(mapper.mapValueToColor(2.5, 0, 10)).toBe("#fcae91");
    expect(mapper.mapValueToColor(5, 0, 10)).toBe("#fb6a4a");
    expect(mapper.mapValueToColor(10, 0, 10)).toBe("#a50f15");
  });

  it("interpolates between stops", () => {
    expect(mapper.mapValueToColor(1.25, 0, 10)).toBe("#fdcab5");
  });

  it("clamps values outside the range", () => {
    expect(mapper.mapValueToColor(-5, 0, 10)).toBe("#fee5d9");
    expect(mapper.mapValueToColor(50, 0, 10)).toBe("#a50f15");
  });

  it("normalizes monotonically", () => {
    const ts = Array.from({ length: 11 }, (_, v) => mapper.normalize(v, 0, 10));
    for (let i = 1; i < ts.length; i += 1) expect(ts[i]).toBeGreaterThanOrEqual(ts[i - 1]);
    expect(ts[0]).toBe(0);
    expect(ts[10]).toBe(1);
  });

  it("colors a value at the center of a collapsed threshold with the middle stop", () => {
    const range = determineValueRange([7, 7]);
    expect(range.ok).toBe(true);
    if (!range.ok) return;
    expect(mapper.mapValueToColor(7, range.value.minValue, range.value.maxValue)).toBe("#fb6a4a");
  });

  it("uses fixed colors for columns without data", () => {
    expect(mapper.statusColor("no_data")).toBe("#ffffff");
    expect(mapper.statusColor("not_in_region")).toBe("#999999");
  });
});
