import { describe, expect, it } from "vitest";
import { computeStatistics, normalizeKeys } from "./datasetStatistics";

describe("normalizeKeys", () => {
  it("drops variable prefixes", () => {
    expect(normalizeKeys({ "a.Porosity": 0.2, name: "x" })).toEqual({ Porosity: 0.2, name: "x" });
  });
});

describe("computeStatistics", () => {
  it("returns null without numeric properties", () => {
    expect(computeStatistics([])).toBeNull();
    expect(computeStatistics([{ name: "A" }, { Depth: "deep" }])).toBeNull();
  });

  it("summarizes a property and flags outliers", () => {
    const rows = [
      ...Array.from({ length: 9 }, (_, i) => ({ "a.OBJECTID": `A${i + 1}`, "a.Thickness": 10 })),
      { "a.OBJECTID": "A10", "a.Thickness": 100 },
    ];

    const stats = computeStatistics(rows);

    expect(stats?.rowCount).toBe(10);
    const thickness = stats?.properties.Thickness;
    expect(thickness).toMatchObject({
      count: 10,
      mean: 19,
      min: 10,
      max: 100,
      percentiles: { p5: 10, p25: 10, p50: 10, p75: 10, p95: 100 },
    });
    expect(thickness?.stdDev).toBeCloseTo(Math.sqrt(810), 10);
    expect(thickness?.outliers).toHaveLength(1);
    expect(thickness?.outliers[0]).toMatchObject({ objectId: "A10", value: 100 });
    expect(thickness?.outliers[0].zScore).toBeCloseTo(81 / Math.sqrt(810), 10);
    expect(stats?.risk.Thickness).toEqual({ lowRisk: 1, mediumRisk: 0, highRisk: 9, assessed: 10 });
  });

  it("computes permeability in millidarcy and keeps stored values in outliers", () => {
    const stats = computeStatistics([{ Permeability: -12 }, { Permeability: -13 }]);

    const permeability = stats?.properties.Permeability;
    expect(permeability?.count).toBe(2);
    expect(permeability?.min).toBeCloseTo(101.325, 3);
    expect(permeability?.max).toBeCloseTo(1013.25, 2);
    expect(permeability?.outliers).toEqual([]);
    expect(stats?.risk.Permeability).toEqual({ lowRisk: 1, mediumRisk: 0, highRisk: 1, assessed: 2 });
  });

  it("reports a zero spread for a single value", () => {
    const stats = computeStatistics([{ Depth: 1500 }]);
    expect(stats?.properties.Depth).toEqual({
      count: 1,
      mean: 1500,
      min: 1500,
      max: 1500,
      stdDev: 0,
      percentiles: { p5: 1500, p25: 1500, p50: 1500, p75: 1500, p95: 1500 },
      outliers: [],
    });
  });
});
