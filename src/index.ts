export * from "./model.js";
export * from "./errors.js";
export { defaultConfig, loadConfig, mergeConfig, type EyemapConfig } from "./config.js";
export { createCoordinateSystem, mirrorFor, type CoordinateSystem } from "./coordinates.js";
export { ColorMapper, paletteFromConfig, type ColorPalette } from "./color.js";
export { classifyColumns, determineValueRange, DEGENERATE_EPSILON } from "./data_processor.js";
export { layerDisplayName, tooltipFor } from "./tooltips.js";
export { calculateLayout, calculateLegend, type Layout, type Legend } from "./layout.js";
export { prepareScene, renderSvg, type Scene } from "./render_svg.js";
export { renderPng } from "./render_png.js";
export { artifactFilename, emitArtifact, type Artifact, type OutputMode } from "./output.js";
export { MemoryCache, NullCache, cacheKey, dataSignature, type EyemapCache } from "./cache.js";
export { createPerfCollector, noopCollector, type PerfCollector } from "./perf.js";
export { buildGrids, buildRegionGrid } from "./region_grid.js";
export { EyemapGenerator, createEyemapServices, type EyemapServices } from "./eyemap_generator.js";
export { parseGridRequest } from "./request_schema.js";
export { parseSomaSide, requirePresent, validateGridRequest, validateSingleRegionRequest } from "./validation.js";
