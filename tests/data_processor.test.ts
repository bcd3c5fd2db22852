import { describe, expect, it } from "vitest";
import { classifyColumns, determineValueRange, latticeCells } from "../src/data_processor.js";
import { column, meLattice, observation } from "./fixtures.js";

const target = { region: "ME", side: "R", metric: "synapse_density" } as const;

describe("classifyColumns", () => {
  it("marks lattice columns without observations as no_data", () => {
    const res = classifyColumns(meLattice, [observation("ME", 0, 0, "R", 5)], target);
    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.value.map((c) => c.status)).toEqual(["has_data", "no_data", "no_data"]);
    expect(res.value.map((c) => c.value)).toEqual([5, null, null]);
  });

  it("marks columns of other regions as not_in_region", () => {
    const lattice = [column("ME", 0, 0), column("LO", 1, 0), column("ME", 0, 1)];
    const res = classifyColumns(lattice, [], target);
    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.value.map((c) => [c.hex1, c.hex2, c.status])).toEqual([
      [0, 0, "no_data"],
      [1, 0, "not_in_region"],
      [0, 1, "no_data"],
    ]);
  });

  it("keeps a zero observation as has_data", () => {
    const res = classifyColumns(meLattice, [observation("ME", 1, 0, "R", 0)], target);
    expect(res.ok && res.value[1]).toMatchObject({ status: "has_data", value: 0 });
  });

  it("reads layer values for the requested metric and zero-fills the rest", () => {
    const observed = [observation("ME", 0, 0, "R", 5, 2, [[2, 1], [3, 1]])];
    const synapses = classifyColumns(meLattice, observed, target);
    const cells = classifyColumns(meLattice, observed, { ...target, metric: "cell_count" });
    expect(synapses.ok && synapses.value.map((c) => c.layerValues)).toEqual([[2, 3], [0, 0], [0, 0]]);
    expect(cells.ok && cells.value[0]).toMatchObject({ value: 2, layerValues: [1, 1] });
  });

  it("ignores observations from the other hemisphere", () => {
    const res = classifyColumns(meLattice, [observation("ME", 0, 0, "L", 5)], target);
    expect(res.ok && res.value[0].status).toBe("no_data");
  });

  it("honors a hemisphere restriction on the lattice", () => {
    const lattice = [column("ME", 0, 0), column("ME", 1, 0, "R")];
    const res = classifyColumns(lattice, [], { ...target, side: "L" });
    expect(res.ok && res.value.map((c) => c.status)).toEqual(["no_data", "not_in_region"]);
  });

  it("rejects an empty lattice", () => {
    const res = classifyColumns([], [], target);
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error.kind).toBe("data_processing");
    expect(res.error.message).toBe("Possible-column lattice is empty");
  });

  it("rejects columns without numeric coordinates", () => {
    const res = classifyColumns([column("ME", Number.NaN, 0)], [], target);
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error.message).toBe("Possible column at index 0 missing required coordinates (hex1/hex2)");
  });

  it("rejects observations with non-finite metric values", () => {
    const res = classifyColumns(meLattice, [observation("ME", 0, 0, "R", 1), observation("ME", 1, 0, "R", Number.NaN)], target);
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error.kind).toBe("data_processing");
    expect(res.error.message).toBe("Column observation at index 1 has a non-finite metric value");
  });

  it("rejects non-finite layer values", () => {
    const res = classifyColumns(meLattice, [observation("ME", 0, 0, "R", 1, 1, [[Number.POSITIVE_INFINITY, 0]])], target);
    expect(!res.ok && res.error.message).toBe("Column observation at index 0 has a non-finite metric value");
  });

  it("rejects a region absent from the lattice", () => {
    const res = classifyColumns(meLattice, [], { ...target, region: "XX" });
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error.message).toBe("No lattice columns for XX (R)");
  });

  it("returns the same result for the same input", () => {
    const observed = [observation("ME", 0, 1, "R", 3)];
    expect(classifyColumns(meLattice, observed, target)).toEqual(classifyColumns(meLattice, observed, target));
  });
});

describe("latticeCells", () => {
  it("lists each coordinate once in first-appearance order", () => {
    const lattice = [column("ME", 1, 0), column("LO", 0, 0), column("LO", 1, 0)];
    expect(latticeCells(lattice)).toEqual([
      { hex1: 1, hex2: 0 },
      { hex1: 0, hex2: 0 },
    ]);
  });
});

describe("determineValueRange", () => {
  it("defaults to 0..1", () => {
    expect(determineValueRange()).toEqual({ ok: true, value: { minValue: 0, maxValue: 1 } });
  });

  it("passes an ordered threshold through", () => {
    expect(determineValueRange([0, 10])).toEqual({ ok: true, value: { minValue: 0, maxValue: 10 } });
  });

  it("widens a collapsed threshold", () => {
    const res = determineValueRange([7, 7]);
    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.value.minValue).toBeCloseTo(6.9, 9);
    expect(res.value.maxValue).toBeCloseTo(7.1, 9);
  });

  it("rejects an inverted threshold", () => {
    const res = determineValueRange([5, 1]);
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error.message).toBe("Threshold minimum (5) must be less than maximum (1)");
  });

  it("rejects non-finite bounds", () => {
    expect(determineValueRange([Number.NaN, 1]).ok).toBe(false);
  });
});
