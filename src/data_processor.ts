import { DataProcessingError, err, ok, type Result } from "./errors.js";
import { log } from "./log.js";
import type {
  ColumnObservation,
  Hemisphere,
  MetricType,
  PossibleColumn,
  ProcessedColumn,
  Threshold,
  ValueRange,
} from "./model.js";

export const DEGENERATE_EPSILON = 0.1;

export type ClassifyTarget = {
  region: string;
  side: Hemisphere;
  metric: MetricType;
};

export type LatticeCell = { hex1: number; hex2: number };

type Coordinated = { hex1: unknown; hex2: unknown };

function coordKey(hex1: number, hex2: number): string {
  return `${hex1},${hex2}`;
}

export function observationKey(region: string, side: Hemisphere, hex1: number, hex2: number): string {
  return `${region}:${side}:${hex1}:${hex2}`;
}

function checkCoordinates(records: readonly Coordinated[], what: string): DataProcessingError | undefined {
  for (let i = 0; i < records.length; i += 1) {
    const { hex1, hex2 } = records[i];
    if (typeof hex1 !== "number" || typeof hex2 !== "number" || !Number.isFinite(hex1) || !Number.isFinite(hex2)) {
      return new DataProcessingError(`${what} at index ${i} missing required coordinates (hex1/hex2)`, "classify_columns", {
        index: i,
      });
    }
  }
  return undefined;
}

function checkValues(observed: readonly ColumnObservation[]): DataProcessingError | undefined {
  for (let i = 0; i < observed.length; i += 1) {
    const o = observed[i];
    const values = [o.synapseCount, o.neuronCount, ...o.layers.flatMap((l) => [l.synapseCount, l.neuronCount])];
    if (!values.every(Number.isFinite)) {
      return new DataProcessingError(`Column observation at index ${i} has a non-finite metric value`, "classify_columns", {
        index: i,
      });
    }
  }
  return undefined;
}

export function inLattice(col: PossibleColumn, region: string, side: Hemisphere): boolean {
  return col.region === region && (col.side === undefined || col.side === side);
}

// Every distinct coordinate of the lattice, in first-appearance order.
export function latticeCells(possibleColumns: readonly PossibleColumn[]): LatticeCell[] {
  const seen = new Set<string>();
  const cells: LatticeCell[] = [];
  for (const c of possibleColumns) {
    const k = coordKey(c.hex1, c.hex2);
    if (seen.has(k)) continue;
    seen.add(k);
    cells.push({ hex1: c.hex1, hex2: c.hex2 });
  }
  return cells;
}

export function buildDataMap(observed: readonly ColumnObservation[]): Map<string, ColumnObservation> {
  const map = new Map<string, ColumnObservation>();
  for (const o of observed) map.set(observationKey(o.region, o.side, o.hex1, o.hex2), o);
  return map;
}

export function metricValue(o: { synapseCount: number; neuronCount: number }, metric: MetricType): number {
  return metric === "synapse_density" ? o.synapseCount : o.neuronCount;
}

export function layerCountFor(observed: readonly ColumnObservation[], region: string, side: Hemisphere): number {
  let n = 0;
  for (const o of observed) {
    if (o.region === region && o.side === side) n = Math.max(n, o.layers.length);
  }
  return n;
}

export function classifyColumns(
  possibleColumns: readonly PossibleColumn[],
  observedColumns: readonly ColumnObservation[],
  target: ClassifyTarget,
): Result<ProcessedColumn[], DataProcessingError> {
  if (possibleColumns.length === 0) {
    return err(new DataProcessingError("Possible-column lattice is empty", "classify_columns", { region: target.region }));
  }
  const badLattice = checkCoordinates(possibleColumns, "Possible column");
  if (badLattice) return err(badLattice);
  const badObserved = checkCoordinates(observedColumns, "Column observation");
  if (badObserved) return err(badObserved);
  const badValue = checkValues(observedColumns);
  if (badValue) return err(badValue);

  const { region, side, metric } = target;
  const regionCoords = new Set(
    possibleColumns.filter((c) => inLattice(c, region, side)).map((c) => coordKey(c.hex1, c.hex2)),
  );
  if (regionCoords.size === 0) {
    return err(
      new DataProcessingError(`No lattice columns for ${region} (${side})`, "classify_columns", { region, side }),
    );
  }
  const dataMap = buildDataMap(observedColumns);
  const layerCount = layerCountFor(observedColumns, region, side);
  const zeros = (): number[] => Array.from({ length: layerCount }, () => 0);

  const processed = latticeCells(possibleColumns).map((cell): ProcessedColumn => {
    const { hex1, hex2 } = cell;
    if (!regionCoords.has(coordKey(hex1, hex2))) {
      return { hex1, hex2, status: "not_in_region", value: null, layerValues: zeros() };
    }
    const obs = dataMap.get(observationKey(region, side, hex1, hex2));
    if (!obs) {
      return { hex1, hex2, status: "no_data", value: null, layerValues: zeros() };
    }
    return {
      hex1,
      hex2,
      status: "has_data",
      value: metricValue(obs, metric),
      layerValues: obs.layers.map((l) => metricValue(l, metric)),
    };
  });
  log.processor("classified %d columns for %s (%s) %s", processed.length, region, side, metric);
  return ok(processed);
}

// A collapsed threshold is widened by DEGENERATE_EPSILON on each side.
export function determineValueRange(threshold?: Threshold): Result<ValueRange, DataProcessingError> {
  if (!threshold) return ok({ minValue: 0, maxValue: 1 });
  const [lo, hi] = threshold;
  if (!Number.isFinite(lo) || !Number.isFinite(hi)) {
    return err(
      new DataProcessingError("All threshold values must be finite numbers", "determine_value_range", { lo, hi }),
    );
  }
  if (lo > hi) {
    return err(
      new DataProcessingError(`Threshold minimum (${lo}) must be less than maximum (${hi})`, "determine_value_range", {
        lo,
        hi,
      }),
    );
  }
  if (lo === hi) {
    log.processor("expanding degenerate range at %d", lo);
    return ok({ minValue: lo - DEGENERATE_EPSILON, maxValue: hi + DEGENERATE_EPSILON });
  }
  return ok({ minValue: lo, maxValue: hi });
}
