import { performance } from "perf_hooks";
import { MemoryCache, NullCache, cacheClear, type CacheStats, type EyemapCache } from "./cache.js";
import { ColorMapper, paletteFromConfig } from "./color.js";
import type { EyemapConfig } from "./config.js";
import { createCoordinateSystem, type CoordinateSystem } from "./coordinates.js";
import { err, ok, type EyemapError, type RenderingError, type Result } from "./errors.js";
import { log } from "./log.js";
import {
  METRICS,
  type GridGenerationRequest,
  type GridGenerationResult,
  type MetricArtifacts,
  type MetricType,
  type OutputFormat,
  type RegionGrid,
  type RenderingRequest,
  type SingleRegionGridRequest,
} from "./model.js";
import { emitArtifact, outputModeFor, removeArtifact, type Artifact, type ArtifactName, type OutputMode } from "./output.js";
import { createPerfCollector, type PerfCollector, type PerfReport } from "./perf.js";
import { buildGrids, buildRegionGrid, type GridBatch } from "./region_grid.js";
import { renderPng } from "./render_png.js";
import { prepareScene, renderSvg } from "./render_svg.js";
import { validateGridRequest } from "./validation.js";

export type EyemapServices = Readonly<{
  config: EyemapConfig;
  coords: CoordinateSystem;
  mapper: ColorMapper;
  cache: EyemapCache<RegionGrid>;
  perf: PerfCollector;
}>;

export type ServiceOverrides = {
  cache?: EyemapCache<RegionGrid>;
  perf?: PerfCollector;
};

export type PerformanceStatistics = {
  operations: PerfReport;
  cache?: CacheStats;
};

// The whole object graph is built here, once, and never looked up by name.
export function createEyemapServices(config: EyemapConfig, overrides: ServiceOverrides = {}): EyemapServices {
  return Object.freeze({
    config,
    coords: createCoordinateSystem(config),
    mapper: new ColorMapper(paletteFromConfig(config)),
    cache: overrides.cache ?? (config.cache ? new MemoryCache<RegionGrid>() : new NullCache<RegionGrid>()),
    perf: overrides.perf ?? createPerfCollector(),
  });
}

function seconds(start: number): number {
  return (performance.now() - start) / 1000;
}

export class EyemapGenerator {
  constructor(private readonly services: EyemapServices) {}

  static fromConfig(config: EyemapConfig, overrides?: ServiceOverrides): EyemapGenerator {
    return new EyemapGenerator(createEyemapServices(config, overrides));
  }

  buildGrids(request: GridGenerationRequest): GridBatch {
    return buildGrids(this.services, request);
  }

  render(request: RenderingRequest): Result<Artifact, RenderingError> {
    const { config, coords, mapper, perf } = this.services;
    return perf.time("render", (): Result<Artifact, RenderingError> => {
      const scene = prepareScene(request, { rules: config, coords, mapper });
      if (!scene.ok) return scene;
      if (request.outputFormat === "png") {
        const png = renderPng(scene.value, config.png_scale);
        if (!png.ok) return png;
        const artifact: Artifact = { format: "png", content: png.value };
        return ok(artifact);
      }
      const svg = renderSvg(scene.value, config.template);
      if (!svg.ok) return svg;
      const artifact: Artifact = { format: "svg", content: svg.value };
      return ok(artifact);
    });
  }

  // One region, one hemisphere, one metric.
  async generateSingleRegionGrid(
    request: SingleRegionGridRequest,
    outputFormat: OutputFormat,
    saveToFile: boolean,
  ): Promise<Result<string, EyemapError>> {
    const grid = buildRegionGrid(this.services, request);
    if (!grid.ok) return grid;
    const { config } = this.services;
    return this.emitGrid(grid.value, request.neuronType, outputFormat, outputModeFor(saveToFile, config.output_dir, config.eyemaps_dir));
  }

  async generate(request: GridGenerationRequest): Promise<GridGenerationResult> {
    const start = performance.now();
    const valid = validateGridRequest(request);
    if (!valid.ok) {
      log.generator("request validation failed: %s", valid.error.message);
      return {
        regionGrids: {},
        processingTime: seconds(start),
        success: false,
        errorMessage: `Request validation failed: ${valid.error.message}`,
        warnings: [],
      };
    }

    const { config, perf } = this.services;
    const batch = perf.time("build_grids", () => this.buildGrids(request));
    const mode = outputModeFor(request.saveToFiles, config.output_dir, config.eyemaps_dir);
    const pairs = Array.from(batch.grids.entries());
    const emitted = await Promise.all(pairs.map(([, grids]) => this.emitPair(grids, request, mode)));

    const regionGrids: Record<string, MetricArtifacts> = {};
    const warnings = [...batch.warnings];
    emitted.forEach((res, i) => {
      const key = pairs[i][0];
      if (res.ok) regionGrids[key] = res.value;
      else warnings.push(`${key}: ${res.error.name}: ${res.error.message}`);
    });

    const processingTime = seconds(start);
    log.generator("generated %d region grids in %ss", Object.keys(regionGrids).length, processingTime.toFixed(3));
    return { regionGrids, processingTime, success: true, warnings };
  }

  performanceStatistics(): PerformanceStatistics {
    const { cache, perf } = this.services;
    return {
      operations: perf.report(),
      cache: cache instanceof MemoryCache ? cache.stats() : undefined,
    };
  }

  clearCaches(): boolean {
    this.services.perf.reset();
    return cacheClear(this.services.cache);
  }

  private renderGrid(grid: RegionGrid, neuronType: string, format: OutputFormat): Result<Artifact, RenderingError> {
    return this.render({
      hexagons: grid.hexagons,
      valueRange: grid.valueRange,
      metric: grid.metric,
      region: grid.region,
      side: grid.side,
      neuronType,
      outputFormat: format,
    });
  }

  private async emitGrid(
    grid: RegionGrid,
    neuronType: string,
    format: OutputFormat,
    mode: OutputMode,
  ): Promise<Result<string, EyemapError>> {
    const artifact = this.renderGrid(grid, neuronType, format);
    if (!artifact.ok) return artifact;
    return emitArtifact(artifact.value, mode, artifactName(grid, neuronType, format));
  }

  // Both metrics render before anything is written, and a pair that fails
  // mid-write leaves no files behind.
  private async emitPair(
    grids: Record<MetricType, RegionGrid>,
    request: GridGenerationRequest,
    mode: OutputMode,
  ): Promise<Result<MetricArtifacts, EyemapError>> {
    const rendered: Array<[RegionGrid, Artifact]> = [];
    for (const metric of METRICS) {
      const artifact = this.renderGrid(grids[metric], request.neuronType, request.outputFormat);
      if (!artifact.ok) return err(artifact.error);
      rendered.push([grids[metric], artifact.value]);
    }

    const out: MetricArtifacts = {};
    const written: string[] = [];
    for (const [grid, artifact] of rendered) {
      const res = await emitArtifact(artifact, mode, artifactName(grid, request.neuronType, request.outputFormat));
      if (!res.ok) {
        await Promise.all(written.map(removeArtifact));
        return err(res.error);
      }
      if (mode.kind === "save") written.push(res.value);
      out[grid.metric] = res.value;
    }
    return ok(out);
  }
}

function artifactName(grid: RegionGrid, neuronType: string, format: OutputFormat): ArtifactName {
  return { metric: grid.metric, neuronType, region: grid.region, side: grid.side, format };
}
