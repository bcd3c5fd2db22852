import { Resvg } from "@resvg/resvg-js";
import { RenderingError, describeError, err, ok, type Result } from "./errors.js";
import { log } from "./log.js";
import type { Scene } from "./render_svg.js";
import { esc, fmt } from "./util.js";

// Raster output has no hover layer, so the scene is drawn as bare shapes.
export function sceneMarkup(scene: Scene): string {
  const { layout, legend } = scene;
  const polys = scene.hexagons
    .map((h) => {
      const pts = layout.corners
        .map((c) => `${fmt(c.x + h.x + layout.offsetX)},${fmt(c.y + h.y + layout.offsetY)}`)
        .join(" ");
      return `<polygon points="${pts}" fill="${h.color}" stroke="#d1d5db" stroke-width="0.5"/>`;
    })
    .join("");
  const swatches = legend.swatches
    .map((s) => `<rect x="${fmt(layout.legendX)}" y="${fmt(s.y)}" width="${fmt(layout.legendWidth)}" height="${fmt(s.height)}" fill="${s.color}"/>`)
    .join("");
  const ticks = legend.ticks
    .map((t) => `<text x="${fmt(layout.legendX + layout.legendWidth + 4)}" y="${fmt(t.y + 3)}" font-size="9" font-family="sans-serif">${esc(t.label)}</text>`)
    .join("");
  return (
    `<svg xmlns="http://www.w3.org/2000/svg" width="${layout.width}" height="${layout.height}" viewBox="0 0 ${layout.width} ${layout.height}">` +
    `<rect width="100%" height="100%" fill="#ffffff"/>` +
    `<text x="${fmt(layout.titleX)}" y="${fmt(layout.titleY)}" font-size="12" font-weight="600" font-family="sans-serif">${esc(scene.title)}</text>` +
    `<text x="${fmt(layout.titleX)}" y="${fmt(layout.subtitleY)}" font-size="10" font-family="sans-serif">${esc(scene.subtitle)}</text>` +
    polys +
    `<text x="${fmt(layout.legendTitleX)}" y="${fmt(layout.legendTitleY)}" font-size="9" font-family="sans-serif">${esc(legend.title)}</text>` +
    swatches +
    ticks +
    `</svg>`
  );
}

export function renderPng(scene: Scene, scale: number): Result<Buffer, RenderingError> {
  if (scene.hexagons.length === 0) {
    return err(new RenderingError("hexagons list cannot be empty", "render_png"));
  }
  try {
    const resvg = new Resvg(sceneMarkup(scene), {
      fitTo: { mode: "zoom", value: scale },
    });
    const png = resvg.render().asPng();
    log.render("rasterized %d hexagons at %dx", scene.hexagons.length, scale);
    return ok(png);
  } catch (e) {
    return err(new RenderingError(`PNG rasterization failed: ${describeError(e)}`, "render_png"));
  }
}
