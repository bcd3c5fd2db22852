import { describe, expect, it } from "vitest";
import { defaultConfig } from "../src/config.js";
import { createCoordinateSystem, mirrorFor } from "../src/coordinates.js";

const coords = createCoordinateSystem(defaultConfig);

describe("createCoordinateSystem", () => {
  it("places the origin column at 0,0", () => {
    expect(coords.toPixel(0, 0, false)).toEqual({ x: 0, y: 0 });
    expect(Object.is(coords.toPixel(0, 0, true).x, 0)).toBe(true);
  });

  it("spaces columns by hex_size times spacing_factor", () => {
    const p = coords.toPixel(2, 1, false);
    expect(p.x).toBeCloseTo(9.9, 6);
    expect(p.y).toBeCloseTo(17.1473, 3);
  });

  it("mirrors by negating x only", () => {
    const plain = coords.toPixel(2, 1, false);
    const mirrored = coords.toPixel(2, 1, true);
    expect(mirrored.x).toBe(-plain.x);
    expect(mirrored.y).toBe(plain.y);
  });

  it("is deterministic", () => {
    expect(coords.toPixel(5, -3, true)).toEqual(coords.toPixel(5, -3, true));
  });

  it("draws six corners at hex_size", () => {
    const pts = coords.hexPoints();
    expect(pts).toHaveLength(6);
    expect(pts[0]).toEqual({ x: 6, y: 0 });
    expect(pts[3].x).toBeCloseTo(-6, 9);
    expect(pts[3].y).toBeCloseTo(0, 9);
  });
});

describe("mirrorFor", () => {
  it("mirrors the right hemisphere", () => {
    expect(mirrorFor("R")).toBe(true);
    expect(mirrorFor("L")).toBe(false);
  });
});
