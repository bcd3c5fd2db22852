export type Hemisphere = "L" | "R";

export type SomaSide = "left" | "right" | "combined";

export type MetricType = "synapse_density" | "cell_count";

export type OutputFormat = "svg" | "png";

export type ColumnStatus = "has_data" | "no_data" | "not_in_region";

export const METRICS: readonly MetricType[] = ["synapse_density", "cell_count"];

export const OUTPUT_FORMATS: readonly OutputFormat[] = ["svg", "png"];

export type LayerCounts = {
  synapseCount: number;
  neuronCount: number;
};

export type ColumnObservation = {
  region: string;
  hex1: number;
  hex2: number;
  side: Hemisphere;
  synapseCount: number;
  neuronCount: number;
  layers: LayerCounts[];
};

// A column without a side exists on both hemispheres.
export type PossibleColumn = {
  region: string;
  hex1: number;
  hex2: number;
  side?: Hemisphere;
};

export type ProcessedColumn = {
  hex1: number;
  hex2: number;
  status: ColumnStatus;
  value: number | null;
  layerValues: number[];
};

export type ValueRange = {
  minValue: number;
  maxValue: number;
};

export type Point = { x: number; y: number };

export type Hexagon = {
  x: number;
  y: number;
  hex1: number;
  hex2: number;
  value: number | null;
  layerValues: number[];
  color: string;
  layerColors: string[];
  status: ColumnStatus;
  region: string;
  side: Hemisphere;
  tooltip: string;
  tooltipLayers: string[];
};

export type HexagonDraft = Omit<Hexagon, "tooltip" | "tooltipLayers">;

export type Threshold = readonly [number, number];

export type ThresholdTable = Partial<Record<MetricType, Record<string, Threshold>>>;

export type MinMaxData = Partial<Record<MetricType, Record<string, { min: number; max: number }>>>;

export type GridGenerationRequest = {
  columnData: ColumnObservation[];
  possibleColumns: PossibleColumn[];
  thresholds: ThresholdTable;
  side: SomaSide;
  neuronType: string;
  outputFormat: OutputFormat;
  saveToFiles: boolean;
  minMaxData?: MinMaxData;
  // Defaults to every region named in the lattice, in lattice order.
  regions?: string[];
};

export type SingleRegionGridRequest = {
  possibleColumns: PossibleColumn[];
  columnData: ColumnObservation[];
  regionName: string;
  side: Hemisphere;
  metric: MetricType;
  neuronType: string;
  threshold?: Threshold;
  minMaxData?: MinMaxData;
};

export type RegionGrid = {
  region: string;
  side: Hemisphere;
  metric: MetricType;
  hexagons: Hexagon[];
  valueRange: ValueRange;
  layerCount: number;
};

export type RenderingRequest = {
  hexagons: Hexagon[];
  valueRange: ValueRange;
  metric: MetricType;
  region: string;
  side: Hemisphere;
  neuronType: string;
  outputFormat: OutputFormat;
};

export type MetricArtifacts = Partial<Record<MetricType, string>>;

export type GridGenerationResult = {
  regionGrids: Record<string, MetricArtifacts>;
  processingTime: number;
  success: boolean;
  errorMessage?: string;
  warnings: string[];
};

export function gridKey(region: string, side: Hemisphere): string {
  return `${region}_${side}`;
}

export function hemispheresFor(side: SomaSide): Hemisphere[] {
  switch (side) {
    case "left":
      return ["L"];
    case "right":
      return ["R"];
    case "combined":
      return ["L", "R"];
  }
}

export function metricLabel(metric: MetricType): string {
  return metric === "synapse_density" ? "Synapse count" : "Cell count";
}

export function metricTitle(metric: MetricType): string {
  return metric === "synapse_density" ? "Synapses (All Columns)" : "Cell Count (All Columns)";
}
