import { describe, expect, it } from "vitest";
import { parseGridRequest } from "../src/request_schema.js";

const raw = {
  neuron_type: "Dm4",
  soma_side: "both",
  column_data: [
    {
      region: "ME",
      hex1: 0,
      hex2: 0,
      side: "R",
      synapse_count: 5,
      neuron_count: 2,
      layers: [{ synapse_count: 2, neuron_count: 1 }],
    },
  ],
  possible_columns: [{ region: "ME", hex1: 0, hex2: 0 }],
  thresholds: { synapse_density: { ME: [0, 10] } },
};

describe("parseGridRequest", () => {
  it("maps a snake_case request onto the model", () => {
    const res = parseGridRequest(raw);
    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.value.side).toBe("combined");
    expect(res.value.neuronType).toBe("Dm4");
    expect(res.value.columnData[0]).toEqual({
      region: "ME",
      hex1: 0,
      hex2: 0,
      side: "R",
      synapseCount: 5,
      neuronCount: 2,
      layers: [{ synapseCount: 2, neuronCount: 1 }],
    });
    expect(res.value.thresholds.synapse_density).toEqual({ ME: [0, 10] });
  });

  it("fills in defaults", () => {
    const res = parseGridRequest({ ...raw, thresholds: undefined });
    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.value.outputFormat).toBe("svg");
    expect(res.value.saveToFiles).toBe(true);
    expect(res.value.thresholds).toEqual({});
  });

  it("rejects an unknown output format", () => {
    const res = parseGridRequest({ ...raw, output_format: "gif" });
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error.field).toBe("output_format");
  });

  it("rejects an unknown soma side", () => {
    const res = parseGridRequest({ ...raw, soma_side: "up" });
    expect(!res.ok && res.error.field).toBe("side");
  });

  it("points at the offending nested field", () => {
    const res = parseGridRequest({ ...raw, possible_columns: [{ region: "ME", hex1: "a", hex2: 0 }] });
    expect(!res.ok && res.error.field).toBe("possible_columns.0.hex1");
  });
});
