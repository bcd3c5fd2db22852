import type { EyemapConfig } from "./config.js";
import type { Hemisphere, Point } from "./model.js";

const SQRT3 = Math.sqrt(3);

export type CoordinateSystem = {
  toPixel: (hex1: number, hex2: number, mirror: boolean) => Point;
  hexPoints: () => Point[];
};

export function mirrorFor(side: Hemisphere): boolean {
  return side === "R";
}

export function createCoordinateSystem(cfg: Pick<EyemapConfig, "hex_size" | "spacing_factor">): CoordinateSystem {
  const size = cfg.hex_size * cfg.spacing_factor;

  // Flat-top axial layout: q runs along hex1 - hex2, r along hex2.
  const toPixel = (hex1: number, hex2: number, mirror: boolean): Point => {
    const q = hex1 - hex2;
    const r = hex2;
    const x = 1.5 * size * q;
    const y = SQRT3 * size * (r + q / 2);
    // + 0 folds -0 into 0 so mirrored output stays byte-stable
    return { x: mirror ? -x + 0 : x + 0, y: y + 0 };
  };

  // Corners of a single hexagon around its center, drawn at hex_size (gaps come from spacing_factor).
  const hexPoints = (): Point[] =>
    Array.from({ length: 6 }, (_, i) => {
      const angle = (Math.PI / 3) * i;
      return { x: cfg.hex_size * Math.cos(angle), y: cfg.hex_size * Math.sin(angle) };
    });

  return { toPixel, hexPoints };
}
