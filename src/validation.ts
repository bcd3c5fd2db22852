import { ValidationError, err, ok, type Result } from "./errors.js";
import {
  METRICS,
  OUTPUT_FORMATS,
  type GridGenerationRequest,
  type MetricType,
  type OutputFormat,
  type SingleRegionGridRequest,
  type SomaSide,
} from "./model.js";

const SIDE_ALIASES: Record<string, SomaSide> = {
  left: "left",
  l: "left",
  right: "right",
  r: "right",
  combined: "combined",
  both: "combined",
};

export function parseSomaSide(raw: string): Result<SomaSide, ValidationError> {
  const side = SIDE_ALIASES[raw.trim().toLowerCase()];
  return side ? ok(side) : err(new ValidationError(`Invalid soma side: ${raw}`, "side", raw, "parse_soma_side"));
}

function isOutputFormat(v: string): v is OutputFormat {
  return OUTPUT_FORMATS.some((f) => f === v);
}

function isMetric(v: string): v is MetricType {
  return METRICS.some((m) => m === v);
}

function isSomaSide(v: string): v is SomaSide {
  return v === "left" || v === "right" || v === "combined";
}

export function validateGridRequest(request: GridGenerationRequest): Result<GridGenerationRequest, ValidationError> {
  const op = "validate_grid_request";
  if (request.neuronType.trim().length === 0) {
    return err(new ValidationError("neuronType cannot be empty", "neuronType", request.neuronType, op));
  }
  if (!isSomaSide(request.side)) {
    return err(new ValidationError(`Invalid side: ${request.side}`, "side", request.side, op));
  }
  if (!isOutputFormat(request.outputFormat)) {
    return err(new ValidationError(`Invalid output format: ${request.outputFormat}`, "outputFormat", request.outputFormat, op));
  }
  if (request.possibleColumns.length === 0) {
    return err(new ValidationError("possibleColumns cannot be empty", "possibleColumns", request.possibleColumns.length, op));
  }
  if (request.regions !== undefined) {
    const blank = request.regions.find((r) => r.trim().length === 0);
    if (blank !== undefined) return err(new ValidationError("region names cannot be empty", "regions", blank, op));
  }
  return ok(request);
}

export function validateSingleRegionRequest(
  request: SingleRegionGridRequest,
): Result<SingleRegionGridRequest, ValidationError> {
  const op = "validate_single_region_request";
  if (request.regionName.trim().length === 0) {
    return err(new ValidationError("regionName cannot be empty", "regionName", request.regionName, op));
  }
  if (!isMetric(request.metric)) {
    return err(new ValidationError(`Invalid metric type: ${request.metric}`, "metric", request.metric, op));
  }
  if (request.side !== "L" && request.side !== "R") {
    return err(new ValidationError(`Invalid side: ${request.side}`, "side", request.side, op));
  }
  return ok(request);
}

function isMissing(v: unknown): boolean {
  if (v === undefined || v === null) return true;
  if (typeof v === "string" || Array.isArray(v)) return v.length === 0;
  if (v instanceof Map || v instanceof Set) return v.size === 0;
  return false;
}

// The first absent or empty input fails the stage.
export function requirePresent(operation: string, inputs: Record<string, unknown>): Result<void, ValidationError> {
  for (const [field, value] of Object.entries(inputs)) {
    if (isMissing(value)) {
      return err(new ValidationError(`${operation} requires ${field}`, field, value, operation));
    }
  }
  return ok(undefined);
}
