import { scaleLinear, type ScaleLinear } from "d3-scale";
import { rgb } from "d3-color";
import type { EyemapConfig } from "./config.js";
import type { ColumnStatus } from "./model.js";
import { clamp } from "./util.js";

export type ColorPalette = {
  stops: string[];
  white: string;
  darkGray: string;
};

export function paletteFromConfig(cfg: Pick<EyemapConfig, "palette" | "no_data_color" | "not_in_region_color">): ColorPalette {
  return { stops: [...cfg.palette], white: cfg.no_data_color, darkGray: cfg.not_in_region_color };
}

// Ranges must already satisfy min < max (see determineValueRange).
export class ColorMapper {
  readonly palette: ColorPalette;
  private readonly scale: ScaleLinear<string, string>;

  constructor(palette: ColorPalette) {
    this.palette = palette;
    const n = palette.stops.length;
    this.scale = scaleLinear<string>()
      .domain(palette.stops.map((_, i) => i / (n - 1)))
      .range(palette.stops)
      .clamp(true);
  }

  normalize(value: number, minValue: number, maxValue: number): number {
    return clamp((value - minValue) / (maxValue - minValue), 0, 1);
  }

  mapValueToColor(value: number, minValue: number, maxValue: number): string {
    return rgb(this.scale(this.normalize(value, minValue, maxValue))).formatHex();
  }

  statusColor(status: Exclude<ColumnStatus, "has_data">): string {
    return status === "no_data" ? this.palette.white : this.palette.darkGray;
  }
}
