import type { ColumnObservation, GridGenerationRequest, PossibleColumn } from "../src/model.js";

export function column(region: string, hex1: number, hex2: number, side?: "L" | "R"): PossibleColumn {
  return side ? { region, hex1, hex2, side } : { region, hex1, hex2 };
}

export function observation(
  region: string,
  hex1: number,
  hex2: number,
  side: "L" | "R",
  synapseCount: number,
  neuronCount = 1,
  layers: Array<[number, number]> = [],
): ColumnObservation {
  return {
    region,
    hex1,
    hex2,
    side,
    synapseCount,
    neuronCount,
    layers: layers.map(([s, n]) => ({ synapseCount: s, neuronCount: n })),
  };
}

export const meLattice: PossibleColumn[] = [column("ME", 0, 0), column("ME", 1, 0), column("ME", 0, 1)];

export function gridRequest(overrides: Partial<GridGenerationRequest> = {}): GridGenerationRequest {
  return {
    columnData: [observation("ME", 0, 0, "R", 5, 2, [[2, 1], [3, 1]]), observation("ME", 0, 1, "L", 8, 1)],
    possibleColumns: meLattice,
    thresholds: {
      synapse_density: { ME: [0, 10] },
      cell_count: { ME: [0, 4] },
    },
    side: "combined",
    neuronType: "Dm4",
    outputFormat: "svg",
    saveToFiles: false,
    ...overrides,
  };
}
