import { XMLValidator } from "fast-xml-parser";
import type { ColorMapper } from "./color.js";
import type { CoordinateSystem } from "./coordinates.js";
import { RenderingError, err, ok, type Result } from "./errors.js";
import { calculateLayout, calculateLegend, type Layout, type LayoutRules, type Legend } from "./layout.js";
import { log } from "./log.js";
import { metricLabel, metricTitle, type Hexagon, type RenderingRequest } from "./model.js";
import { templates, type EyemapTemplateContext } from "./templates/eyemap_svg.js";

export type Scene = {
  layout: Layout;
  legend: Legend;
  title: string;
  subtitle: string;
  hexagons: Hexagon[];
};

export type SceneDeps = {
  rules: LayoutRules;
  coords: CoordinateSystem;
  mapper: ColorMapper;
};

export function prepareScene(request: RenderingRequest, deps: SceneDeps): Result<Scene, RenderingError> {
  if (request.hexagons.length === 0) {
    return err(new RenderingError("hexagons list cannot be empty", "prepare_scene", { region: request.region }));
  }
  const layout = calculateLayout(request.hexagons, deps.coords.hexPoints(), deps.rules);
  if (!layout.ok) return layout;
  const legend = calculateLegend(
    request.valueRange,
    deps.mapper,
    layout.value,
    deps.rules.legend_bins,
    metricLabel(request.metric),
  );
  return ok({
    layout: layout.value,
    legend,
    title: metricTitle(request.metric),
    subtitle: `${request.neuronType} · ${request.region} (${request.side})`,
    hexagons: request.hexagons,
  });
}

export function templateContext(scene: Scene): EyemapTemplateContext {
  const { layout } = scene;
  return {
    width: layout.width,
    height: layout.height,
    title: scene.title,
    subtitle: scene.subtitle,
    hexPoints: layout.hexPoints,
    offsetX: layout.offsetX,
    offsetY: layout.offsetY,
    titleX: layout.titleX,
    titleY: layout.titleY,
    subtitleY: layout.subtitleY,
    legendX: layout.legendX,
    legendY: layout.legendY,
    legendWidth: layout.legendWidth,
    legendTitleX: layout.legendTitleX,
    legendTitleY: layout.legendTitleY,
    hexagons: scene.hexagons.map((h) => ({
      x: h.x,
      y: h.y,
      color: h.color,
      status: h.status,
      tooltip: h.tooltip,
      tooltipLayers: h.tooltipLayers,
      layerColors: h.layerColors,
    })),
    legend: scene.legend,
  };
}

export function renderSvg(scene: Scene, templateName: string): Result<string, RenderingError> {
  const template = templates[templateName];
  if (!template) {
    return err(new RenderingError(`SVG template not found: ${templateName}`, "render_svg", { templateName }));
  }
  const svg = template(templateContext(scene));
  const checked = XMLValidator.validate(svg);
  if (checked !== true) {
    return err(
      new RenderingError(`Template ${templateName} produced malformed SVG: ${checked.err.msg}`, "render_svg", {
        line: checked.err.line,
      }),
    );
  }
  if (!svg.includes("<svg")) {
    return err(new RenderingError(`Template ${templateName} produced no <svg> root`, "render_svg"));
  }
  log.render("rendered SVG with %d hexagons (%dx%d)", scene.hexagons.length, scene.layout.width, scene.layout.height);
  return ok(svg);
}
