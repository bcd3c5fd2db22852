import { cacheGet, cacheKey, cachePut, dataSignature, type EyemapCache } from "./cache.js";
import type { ColorMapper } from "./color.js";
import { mirrorFor, type CoordinateSystem } from "./coordinates.js";
import { classifyColumns, determineValueRange, latticeCells, layerCountFor } from "./data_processor.js";
import { ok, type EyemapError, type Result } from "./errors.js";
import { log } from "./log.js";
import {
  gridKey,
  hemispheresFor,
  metricLabel,
  type GridGenerationRequest,
  type HexagonDraft,
  type MetricType,
  type Point,
  type ProcessedColumn,
  type RegionGrid,
  type SingleRegionGridRequest,
  type ValueRange,
} from "./model.js";
import type { PerfCollector } from "./perf.js";
import { withTooltips } from "./tooltips.js";
import { requirePresent, validateSingleRegionRequest } from "./validation.js";

export type GridServices = {
  coords: CoordinateSystem;
  mapper: ColorMapper;
  cache: EyemapCache<RegionGrid>;
  perf: PerfCollector;
};

export type GridBatch = {
  grids: Map<string, Record<MetricType, RegionGrid>>;
  warnings: string[];
};

function regionalRange(req: SingleRegionGridRequest): readonly [number, number] | undefined {
  const mm = req.minMaxData?.[req.metric]?.[req.regionName];
  return mm ? [mm.min, mm.max] : undefined;
}

function layerColors(col: ProcessedColumn, mapper: ColorMapper, range: ValueRange): string[] {
  if (col.status !== "has_data") {
    const fixed = mapper.statusColor(col.status);
    return col.layerValues.map(() => fixed);
  }
  return col.layerValues.map((v) => (v > 0 ? mapper.mapValueToColor(v, range.minValue, range.maxValue) : mapper.palette.white));
}

function hexColor(col: ProcessedColumn, mapper: ColorMapper, range: ValueRange): string {
  if (col.status === "has_data" && col.value !== null) {
    return mapper.mapValueToColor(col.value, range.minValue, range.maxValue);
  }
  return col.status === "not_in_region" ? mapper.palette.darkGray : mapper.palette.white;
}

export function buildRegionGrid(services: GridServices, req: SingleRegionGridRequest): Result<RegionGrid, EyemapError> {
  const valid = validateSingleRegionRequest(req);
  if (!valid.ok) return valid;
  const pre = requirePresent("single_region_grid", { possibleColumns: req.possibleColumns, regionName: req.regionName });
  if (!pre.ok) return pre;

  const { regionName: region, side, metric } = req;
  const range = determineValueRange(req.threshold ?? regionalRange(req));
  if (!range.ok) return range;
  const layerRangeSource = regionalRange(req);
  const layerRange = layerRangeSource ? determineValueRange(layerRangeSource) : range;
  if (!layerRange.ok) return layerRange;

  const key = cacheKey({
    region,
    side,
    metric,
    neuronType: req.neuronType,
    valueRange: range.value,
    layerRange: layerRange.value,
    data: dataSignature(req.possibleColumns, req.columnData, region, side),
  });
  const cached = cacheGet(services.cache, key);
  if (cached) {
    log.cache("hit %s %s %s", region, side, metric);
    return ok(structuredClone(cached));
  }

  const classified = services.perf.time("classify_columns", () =>
    classifyColumns(req.possibleColumns, req.columnData, { region, side, metric }),
  );
  if (!classified.ok) return classified;

  const mirror = mirrorFor(side);
  const pixels = new Map<string, Point>();
  for (const cell of latticeCells(req.possibleColumns)) {
    pixels.set(`${cell.hex1},${cell.hex2}`, services.coords.toPixel(cell.hex1, cell.hex2, mirror));
  }
  const ready = requirePresent("hexagon_creation", { pixels, processedColumns: classified.value });
  if (!ready.ok) return ready;

  const { mapper } = services;
  const drafts: HexagonDraft[] = [];
  for (const col of classified.value) {
    const p = pixels.get(`${col.hex1},${col.hex2}`);
    if (!p) continue;
    drafts.push({
      x: p.x,
      y: p.y,
      hex1: col.hex1,
      hex2: col.hex2,
      value: col.value,
      layerValues: col.layerValues,
      color: hexColor(col, mapper, range.value),
      layerColors: layerColors(col, mapper, layerRange.value),
      status: col.status,
      region,
      side,
    });
  }

  const grid: RegionGrid = {
    region,
    side,
    metric,
    hexagons: withTooltips(drafts, region, side, metricLabel(metric)),
    valueRange: range.value,
    layerCount: layerCountFor(req.columnData, region, side),
  };
  // Callers own what they get back; the cache keeps its own copy.
  cachePut(services.cache, key, structuredClone(grid));
  return ok(grid);
}

export function requestRegions(request: GridGenerationRequest): string[] {
  if (request.regions) return [...request.regions];
  return Array.from(new Set(request.possibleColumns.map((c) => c.region)));
}

function buildPair(
  services: GridServices,
  request: GridGenerationRequest,
  region: string,
  side: SingleRegionGridRequest["side"],
): Result<Record<MetricType, RegionGrid>, EyemapError> {
  const columnData = request.columnData.filter((o) => o.region === region && o.side === side);
  const build = (metric: MetricType) =>
    buildRegionGrid(services, {
      possibleColumns: request.possibleColumns,
      columnData,
      regionName: region,
      side,
      metric,
      neuronType: request.neuronType,
      threshold: request.thresholds[metric]?.[region],
      minMaxData: request.minMaxData,
    });
  const synapses = build("synapse_density");
  if (!synapses.ok) return synapses;
  const cells = build("cell_count");
  if (!cells.ok) return cells;
  return ok({ synapse_density: synapses.value, cell_count: cells.value });
}

// A failing pair becomes a warning and is left out of the map.
export function buildGrids(services: GridServices, request: GridGenerationRequest): GridBatch {
  const grids = new Map<string, Record<MetricType, RegionGrid>>();
  const warnings: string[] = [];
  for (const region of requestRegions(request)) {
    for (const side of hemispheresFor(request.side)) {
      const key = gridKey(region, side);
      const pair = services.perf.time("build_region_pair", () => buildPair(services, request, region, side));
      if (pair.ok) {
        grids.set(key, pair.value);
      } else {
        warnings.push(`${key}: ${pair.error.name}: ${pair.error.message}`);
        log.generator("skipping %s: %s", key, pair.error.message);
      }
    }
  }
  return { grids, warnings };
}
