import yaml from "js-yaml";
import { asBool, asNum, asStr, isRecord, readText } from "./util.js";

export type EyemapConfig = {
  hex_size: number;
  spacing_factor: number;
  margin: number;
  title_height: number;
  legend_width: number;
  legend_height: number;
  legend_gap: number;
  legend_label_width: number;
  legend_bins: number;
  png_scale: number;
  output_dir: string;
  eyemaps_dir: string;
  template: string;
  palette: string[];
  no_data_color: string;
  not_in_region_color: string;
  cache: boolean;
};

export const defaultConfig: EyemapConfig = {
  hex_size: 6,
  spacing_factor: 1.1,
  margin: 10,
  title_height: 32,
  legend_width: 12,
  legend_height: 60,
  legend_gap: 24,
  legend_label_width: 48,
  legend_bins: 5,
  png_scale: 2,
  output_dir: "output",
  eyemaps_dir: "eyemaps",
  template: "eyemap",
  palette: ["#fee5d9", "#fcae91", "#fb6a4a", "#de2d26", "#a50f15"],
  no_data_color: "#ffffff",
  not_in_region_color: "#999999",
  cache: true,
};

const HEX_COLOR = /^#[0-9a-fA-F]{6}$/;

function asColor(v: unknown): string | undefined {
  const s = asStr(v);
  return s && HEX_COLOR.test(s) ? s : undefined;
}

function asPalette(v: unknown): string[] | undefined {
  if (!Array.isArray(v)) return undefined;
  const colors = v.map(asColor).filter((c): c is string => c !== undefined);
  return colors.length >= 2 && colors.length === v.length ? colors : undefined;
}

// Accepts either a bare mapping or one nested under an `eyemap:` key.
export function mergeConfig(raw: unknown): EyemapConfig {
  const src = isRecord(raw) && isRecord(raw.eyemap) ? raw.eyemap : isRecord(raw) ? raw : {};
  const d = defaultConfig;
  const bins = asNum(src.legend_bins);
  return {
    hex_size: asNum(src.hex_size) ?? d.hex_size,
    spacing_factor: asNum(src.spacing_factor) ?? d.spacing_factor,
    margin: asNum(src.margin) ?? d.margin,
    title_height: asNum(src.title_height) ?? d.title_height,
    legend_width: asNum(src.legend_width) ?? d.legend_width,
    legend_height: asNum(src.legend_height) ?? d.legend_height,
    legend_gap: asNum(src.legend_gap) ?? d.legend_gap,
    legend_label_width: asNum(src.legend_label_width) ?? d.legend_label_width,
    legend_bins: bins !== undefined && Number.isInteger(bins) && bins >= 1 ? bins : d.legend_bins,
    png_scale: asNum(src.png_scale) ?? d.png_scale,
    output_dir: asStr(src.output_dir) ?? d.output_dir,
    eyemaps_dir: asStr(src.eyemaps_dir) ?? d.eyemaps_dir,
    template: asStr(src.template) ?? d.template,
    palette: asPalette(src.palette) ?? d.palette,
    no_data_color: asColor(src.no_data_color) ?? d.no_data_color,
    not_in_region_color: asColor(src.not_in_region_color) ?? d.not_in_region_color,
    cache: asBool(src.cache) ?? d.cache,
  };
}

export function loadConfig(file?: string): EyemapConfig {
  if (!file) return mergeConfig(undefined);
  return mergeConfig(yaml.load(readText(file)));
}
