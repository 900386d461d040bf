import { describe, expect, it } from "vitest";
import { assessRisk, permeabilityToMillidarcy, riskReport } from "./riskAssessment";

describe("permeabilityToMillidarcy", () => {
  it("converts log10(m²) to millidarcy", () => {
    expect(permeabilityToMillidarcy(-12)).toBeCloseTo(1013.25, 2);
    expect(permeabilityToMillidarcy(-13)).toBeCloseTo(101.325, 3);
  });
});

describe("assessRisk", () => {
  it("takes the first band containing the value", () => {
    expect(assessRisk("Depth", 800).level).toBe("low_risk");
    expect(assessRisk("Depth", 2500).level).toBe("low_risk");
    expect(assessRisk("Depth", 4000).level).toBe("medium_risk");
    expect(assessRisk("Depth", 500).level).toBe("high_risk");
  });

  it("compares permeability in millidarcy", () => {
    expect(assessRisk("Permeability", -12).level).toBe("low_risk");
    expect(assessRisk("Permeability", -12.5).level).toBe("medium_risk");
    expect(assessRisk("Permeability", -13).level).toBe("high_risk");
  });

  it("cites the sources of the bands", () => {
    expect(assessRisk("Recharge", 0.3)).toEqual({
      level: "medium_risk",
      source: "(Chadwick et al., n.d.), (Bentham & Kirby, 2005)",
    });
  });

  it("reports unknown for other properties and out-of-band values", () => {
    expect(assessRisk("Salinity", 3)).toEqual({ level: "unknown", source: "" });
    expect(assessRisk("Depth", -5)).toEqual({ level: "unknown", source: "" });
    expect(assessRisk("Porosity", Number.NaN)).toEqual({ level: "unknown", source: "" });
  });
});

describe("riskReport", () => {
  it("reports numeric properties in display units", () => {
    const report = riskReport({ OBJECTID: "7", Depth: 1200, Porosity: 0.25, Permeability: -12, Thickness: "n/a" });

    expect(Object.keys(report)).toEqual(["Depth", "Porosity", "Permeability"]);
    expect(report.Depth).toEqual({
      value: 1200,
      unit: "m",
      risk: "low_risk",
      source: "(Bentham & Kirby, 2005), (Chadwick et al., n.d.), (Li et al., 2024)",
    });
    expect(report.Porosity).toMatchObject({ value: 25, unit: "%", risk: "low_risk" });
    expect(report.Permeability?.unit).toBe("mD");
    expect(report.Permeability?.value).toBeCloseTo(1013.25, 2);
  });
});
