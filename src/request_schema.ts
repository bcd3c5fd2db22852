import { z } from "zod";
import { ValidationError, err, ok, type Result } from "./errors.js";
import type { GridGenerationRequest } from "./model.js";
import { parseSomaSide } from "./validation.js";

const hemisphereSchema = z.enum(["L", "R"]);

const countSchema = z.number().nonnegative().default(0);

const layerSchema = z
  .object({ synapse_count: countSchema, neuron_count: countSchema })
  .transform((l) => ({ synapseCount: l.synapse_count, neuronCount: l.neuron_count }));

export const observationSchema = z
  .object({
    region: z.string().min(1),
    hex1: z.number().int(),
    hex2: z.number().int(),
    side: hemisphereSchema,
    synapse_count: countSchema,
    neuron_count: countSchema,
    layers: z.array(layerSchema).default([]),
  })
  .transform((o) => ({
    region: o.region,
    hex1: o.hex1,
    hex2: o.hex2,
    side: o.side,
    synapseCount: o.synapse_count,
    neuronCount: o.neuron_count,
    layers: o.layers,
  }));

export const possibleColumnSchema = z.object({
  region: z.string().min(1),
  hex1: z.number().int(),
  hex2: z.number().int(),
  side: hemisphereSchema.optional(),
});

const thresholdSchema = z.tuple([z.number(), z.number()]);

const rangeSchema = z.object({ min: z.number(), max: z.number() });

const perMetric = <T extends z.ZodTypeAny>(value: T) =>
  z.object({
    synapse_density: z.record(value).optional(),
    cell_count: z.record(value).optional(),
  });

export const gridRequestSchema = z.object({
  neuron_type: z.string(),
  soma_side: z.string(),
  output_format: z.enum(["svg", "png"]).default("svg"),
  save_to_files: z.boolean().default(true),
  column_data: z.array(observationSchema),
  possible_columns: z.array(possibleColumnSchema),
  thresholds: perMetric(thresholdSchema).default({}),
  min_max_data: perMetric(rangeSchema).optional(),
  regions: z.array(z.string()).optional(),
});

export function parseGridRequest(raw: unknown): Result<GridGenerationRequest, ValidationError> {
  const parsed = gridRequestSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue && issue.path.length > 0 ? issue.path.join(".") : "request";
    return err(new ValidationError(issue?.message ?? "invalid request", field, undefined, "parse_grid_request"));
  }
  const r = parsed.data;
  const side = parseSomaSide(r.soma_side);
  if (!side.ok) return side;
  return ok({
    columnData: r.column_data,
    possibleColumns: r.possible_columns,
    thresholds: r.thresholds,
    side: side.value,
    neuronType: r.neuron_type,
    outputFormat: r.output_format,
    saveToFiles: r.save_to_files,
    minMaxData: r.min_max_data,
    regions: r.regions,
  });
}
