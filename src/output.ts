import fs from "fs";
import path from "path";
import { RenderingError, describeError, err, ok, type Result } from "./errors.js";
import { log } from "./log.js";
import type { Hemisphere, MetricType, OutputFormat } from "./model.js";

export type OutputMode = { kind: "embed" } | { kind: "save"; dir: string };

export type Artifact = { format: "svg"; content: string } | { format: "png"; content: Buffer };

export type ArtifactName = {
  metric: MetricType;
  neuronType: string;
  region: string;
  side: Hemisphere;
  format: OutputFormat;
};

export function outputModeFor(saveToFiles: boolean, outputDir: string, eyemapsDir: string): OutputMode {
  return saveToFiles ? { kind: "save", dir: path.join(outputDir, eyemapsDir) } : { kind: "embed" };
}

export function cleanFilename(base: string, format: OutputFormat): string {
  return `${base.replace(/ /g, "_").replace(/[()]/g, "")}.${format}`;
}

export function artifactFilename(n: ArtifactName): string {
  return cleanFilename(`${n.metric} ${n.neuronType} ${n.region} (${n.side})`, n.format);
}

export function embedArtifact(artifact: Artifact): string {
  return artifact.format === "svg" ? artifact.content : `data:image/png;base64,${artifact.content.toString("base64")}`;
}

// Save mode returns the written path instead of the content.
export async function emitArtifact(artifact: Artifact, mode: OutputMode, name: ArtifactName): Promise<Result<string, RenderingError>> {
  if (mode.kind === "embed") return ok(embedArtifact(artifact));
  const file = path.join(mode.dir, artifactFilename(name));
  try {
    await fs.promises.mkdir(mode.dir, { recursive: true });
    await fs.promises.writeFile(file, artifact.content);
    log.output("wrote %s", file);
    return ok(file);
  } catch (e) {
    return err(new RenderingError(`Failed to write ${file}: ${describeError(e)}`, "save_artifact", { file }));
  }
}

export async function removeArtifact(file: string): Promise<void> {
  try {
    await fs.promises.rm(file, { force: true });
    log.output("removed %s", file);
  } catch (e) {
    log.output("could not remove %s: %s", file, describeError(e));
  }
}
