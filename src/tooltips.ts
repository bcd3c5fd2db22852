import type { Hemisphere, Hexagon, HexagonDraft } from "./model.js";

// LO numbers its layers 5A/5B/6 where the lattice data counts 5/6/7.
const LAYER_REMAP: Record<string, Record<number, string>> = {
  LO: { 5: "5A", 6: "5B", 7: "6" },
};

export function layerDisplayName(region: string, layer: number): string {
  return `${region}${LAYER_REMAP[region]?.[layer] ?? String(layer)}`;
}

export type Tooltips = { tooltip: string; tooltipLayers: string[] };

export function tooltipFor(hex: HexagonDraft, region: string, side: Hemisphere, label: string): Tooltips {
  const where = `${region} (${side})`;
  const column = `Column: ${hex.hex1}, ${hex.hex2}`;
  switch (hex.status) {
    case "not_in_region":
      return {
        tooltip: `${column}\nColumn not identified in ${where}`,
        tooltipLayers: hex.layerValues.map((_, i) => `${column}\nColumn not identified in ${where} layer(${i + 1})`),
      };
    case "no_data":
      return {
        tooltip: `${column}\n${label}: 0\nROI: ${where}`,
        tooltipLayers: hex.layerValues.map((_, i) => `0\nROI: ${layerDisplayName(region, i + 1)}`),
      };
    case "has_data":
      return {
        tooltip: `${column}\n${label}: ${Math.trunc(hex.value ?? 0)}\nROI: ${where}`,
        tooltipLayers: hex.layerValues.map((v, i) => `${Math.trunc(v)}\nROI: ${layerDisplayName(region, i + 1)}`),
      };
  }
}

export function withTooltips(hexagons: readonly HexagonDraft[], region: string, side: Hemisphere, label: string): Hexagon[] {
  return hexagons.map((h) => ({ ...h, ...tooltipFor(h, region, side, label) }));
}
