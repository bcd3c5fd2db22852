import type { ColorMapper } from "./color.js";
import type { EyemapConfig } from "./config.js";
import { RenderingError, err, ok, type Result } from "./errors.js";
import type { Point, ValueRange } from "./model.js";
import { fmt } from "./util.js";

export type LayoutRules = Pick<
  EyemapConfig,
  | "hex_size"
  | "margin"
  | "title_height"
  | "legend_width"
  | "legend_height"
  | "legend_gap"
  | "legend_label_width"
  | "legend_bins"
>;

export type Layout = {
  width: number;
  height: number;
  minX: number;
  minY: number;
  // Translation applied to every hexagon center.
  offsetX: number;
  offsetY: number;
  titleX: number;
  titleY: number;
  subtitleY: number;
  legendX: number;
  legendY: number;
  legendWidth: number;
  legendHeight: number;
  legendTitleX: number;
  legendTitleY: number;
  corners: Point[];
  hexPoints: string;
};

export type LegendSwatch = { y: number; height: number; color: string };
export type LegendTick = { y: number; label: string };

export type Legend = {
  title: string;
  swatches: LegendSwatch[];
  ticks: LegendTick[];
};

export function calculateLayout(centers: readonly Point[], corners: readonly Point[], rules: LayoutRules): Result<Layout, RenderingError> {
  if (centers.length === 0) {
    return err(new RenderingError("Cannot lay out an empty hexagon list", "calculate_layout"));
  }
  const minX = Math.min(...centers.map((p) => p.x)) - rules.hex_size;
  const maxX = Math.max(...centers.map((p) => p.x)) + rules.hex_size;
  const minY = Math.min(...centers.map((p) => p.y)) - rules.hex_size;
  const maxY = Math.max(...centers.map((p) => p.y)) + rules.hex_size;
  const gridW = maxX - minX;
  const gridH = maxY - minY;
  if (!(gridW > 0) || !(gridH > 0)) {
    return err(
      new RenderingError(`Degenerate canvas bounding box ${gridW}x${gridH}`, "calculate_layout", { gridW, gridH }),
    );
  }

  const m = rules.margin;
  const top = m + rules.title_height;
  const legendX = m + gridW + rules.legend_gap;
  const legendY = top + Math.max(0, (gridH - rules.legend_height) / 2);
  return ok({
    width: Math.ceil(legendX + rules.legend_width + rules.legend_label_width + m),
    height: Math.ceil(top + Math.max(gridH, rules.legend_height) + m),
    minX,
    minY,
    offsetX: m - minX,
    offsetY: top - minY,
    titleX: m,
    titleY: m + 12,
    subtitleY: m + 26,
    legendX,
    legendY,
    legendWidth: rules.legend_width,
    legendHeight: rules.legend_height,
    legendTitleX: legendX,
    legendTitleY: legendY - 6,
    corners: [...corners],
    hexPoints: corners.map((c) => `${fmt(c.x)},${fmt(c.y)}`).join(" "),
  });
}

export function formatTick(v: number): string {
  return String(Number(v.toFixed(2)));
}

// Swatches run bottom (min) to top (max), colored at their bin centers.
export function calculateLegend(
  range: ValueRange,
  mapper: ColorMapper,
  layout: Pick<Layout, "legendY" | "legendHeight">,
  bins: number,
  title: string,
): Legend {
  const { minValue, maxValue } = range;
  const span = maxValue - minValue;
  const binH = layout.legendHeight / bins;
  const bottom = layout.legendY + layout.legendHeight;
  const swatches = Array.from({ length: bins }, (_, i) => ({
    y: bottom - (i + 1) * binH,
    height: binH,
    color: mapper.mapValueToColor(minValue + ((i + 0.5) / bins) * span, minValue, maxValue),
  }));
  const ticks = Array.from({ length: bins + 1 }, (_, i) => ({
    y: bottom - i * binH,
    label: formatTick(minValue + (i / bins) * span),
  }));
  return { title, swatches, ticks };
}
