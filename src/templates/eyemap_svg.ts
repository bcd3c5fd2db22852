import type { Legend } from "../layout.js";
import { esc, fmt } from "../util.js";

export type TemplateHexagon = {
  x: number;
  y: number;
  color: string;
  status: string;
  tooltip: string;
  tooltipLayers: string[];
  layerColors: string[];
};

export type EyemapTemplateContext = {
  width: number;
  height: number;
  title: string;
  subtitle: string;
  hexPoints: string;
  offsetX: number;
  offsetY: number;
  titleX: number;
  titleY: number;
  subtitleY: number;
  legendX: number;
  legendY: number;
  legendWidth: number;
  legendTitleX: number;
  legendTitleY: number;
  hexagons: TemplateHexagon[];
  legend: Legend;
};

export type SvgTemplate = (ctx: EyemapTemplateContext) => string;

// Iteration and interpolation only: anything computed belongs in the layout.
export const eyemapTemplate: SvgTemplate = (ctx) => {
  const hexagons = ctx.hexagons
    .map(
      (h) =>
        `\n    <g class="hex ${h.status}" transform="translate(${fmt(h.x)},${fmt(h.y)})" data-layer-colors="${esc(JSON.stringify(h.layerColors))}" data-layer-tooltips="${esc(JSON.stringify(h.tooltipLayers))}">\n      <polygon points="${ctx.hexPoints}" fill="${h.color}"/>\n      <title>${esc(h.tooltip)}</title>\n    </g>`,
    )
    .join("");
  const swatches = ctx.legend.swatches
    .map(
      (s) =>
        `\n    <rect x="${fmt(ctx.legendX)}" y="${fmt(s.y)}" width="${fmt(ctx.legendWidth)}" height="${fmt(s.height)}" fill="${s.color}"/>`,
    )
    .join("");
  const ticks = ctx.legend.ticks
    .map(
      (t) =>
        `\n    <text class="legendTick" x="${fmt(ctx.legendX + ctx.legendWidth + 4)}" y="${fmt(t.y)}" dominant-baseline="middle">${esc(t.label)}</text>`,
    )
    .join("");

  return `<?xml version="1.0" encoding="UTF-8"?>\n<svg xmlns="http://www.w3.org/2000/svg" width="${ctx.width}" height="${ctx.height}" viewBox="0 0 ${ctx.width} ${ctx.height}">\n<style>\n.title { font: 600 12px sans-serif; fill: #0f172a; }\n.subtitle { font: 10px sans-serif; fill: #1f2937; }\n.legendTitle, .legendTick { font: 9px sans-serif; fill: #1f2937; }\n.hex polygon { stroke: #d1d5db; stroke-width: 0.5; }\n.hex:hover polygon { stroke: #111827; stroke-width: 1; }\n</style>\n<g class="titles">\n  <text class="title" x="${fmt(ctx.titleX)}" y="${fmt(ctx.titleY)}">${esc(ctx.title)}</text>\n  <text class="subtitle" x="${fmt(ctx.titleX)}" y="${fmt(ctx.subtitleY)}">${esc(ctx.subtitle)}</text>\n</g>\n<g class="hexagons" transform="translate(${fmt(ctx.offsetX)},${fmt(ctx.offsetY)})">${hexagons}\n</g>\n<g class="legend">\n  <text class="legendTitle" x="${fmt(ctx.legendTitleX)}" y="${fmt(ctx.legendTitleY)}">${esc(ctx.legend.title)}</text>${swatches}${ticks}\n</g>\n</svg>\n`;
};

export const templates: Record<string, SvgTemplate> = {
  eyemap: eyemapTemplate,
};
