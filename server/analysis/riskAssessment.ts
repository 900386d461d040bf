/**
 * Storage-suitability risk bands for aquifer properties.
 *
 * Each property has three inclusive bands, checked in the order listed; the
 * first band containing the value wins. Permeability is stored as
 * log10(m²) and compared in millidarcy.
 */

export const RISK_PROPERTIES = ["Depth", "Porosity", "Permeability", "Thickness", "Recharge", "Lake_area"] as const;
export type RiskProperty = (typeof RISK_PROPERTIES)[number];

export type RiskLevel = "low_risk" | "medium_risk" | "high_risk" | "unknown";

interface RiskBand {
  level: Exclude<RiskLevel, "unknown">;
  min: number;
  max: number;
}

const RISK_BANDS: Record<RiskProperty, RiskBand[]> = {
  Depth: [
    { level: "low_risk", min: 800, max: 2500 },
    { level: "medium_risk", min: 2500, max: Infinity },
    { level: "high_risk", min: 0, max: 800 },
  ],
  Porosity: [
    { level: "low_risk", min: 0.2, max: Infinity },
    { level: "medium_risk", min: 0.1, max: 0.2 },
    { level: "high_risk", min: 0, max: 0.1 },
  ],
  Permeability: [
    { level: "low_risk", min: 500, max: Infinity },
    { level: "medium_risk", min: 200, max: 500 },
    { level: "high_risk", min: 0, max: 200 },
  ],
  Thickness: [
    { level: "low_risk", min: 50, max: Infinity },
    { level: "medium_risk", min: 20, max: 50 },
    { level: "high_risk", min: 0, max: 20 },
  ],
  Recharge: [
    { level: "low_risk", min: 0, max: 0.2 },
    { level: "medium_risk", min: 0.2, max: 0.5 },
    { level: "high_risk", min: 0.5, max: Infinity },
  ],
  Lake_area: [
    { level: "low_risk", min: 0, max: 0.0001 },
    { level: "medium_risk", min: 0.0001, max: 10_000 },
    { level: "high_risk", min: 10_000, max: Infinity },
  ],
};

const RISK_SOURCES: Record<RiskProperty, string> = {
  Permeability: "(Rasool et al., 2023), (Bentham & Kirby, 2005), (Chadwick et al., n.d.)",
  Porosity: "(Bentham & Kirby, 2005), (Rasool et al., 2023), (Chadwick et al., n.d.)",
  Depth: "(Bentham & Kirby, 2005), (Chadwick et al., n.d.), (Li et al., 2024)",
  Thickness: "(Chadwick et al., n.d.), (Li et al., 2024), (Rasool et al., 2023)",
  Recharge: "(Chadwick et al., n.d.), (Bentham & Kirby, 2005)",
  Lake_area: "(Chadwick et al., n.d.), (Bentham & Kirby, 2005)",
};

const DISPLAY_UNITS: Record<RiskProperty, string> = {
  Depth: "m",
  Porosity: "%",
  Permeability: "mD",
  Thickness: "m",
  Recharge: "m/yr",
  Lake_area: "m²",
};

/** 1 mD in m² */
export const MILLIDARCY_IN_M2 = 9.869233e-16;

export function isRiskProperty(name: string): name is RiskProperty {
  return (RISK_PROPERTIES as readonly string[]).includes(name);
}

export function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

/** log10(m²) → millidarcy */
export function permeabilityToMillidarcy(log10SquareMeters: number): number {
  return 10 ** log10SquareMeters / MILLIDARCY_IN_M2;
}

export interface RiskAssessment {
  level: RiskLevel;
  /** Literature the bands come from; empty when the level is unknown */
  source: string;
}

export function assessRisk(property: string, value: number): RiskAssessment {
  if (!isRiskProperty(property) || !Number.isFinite(value)) return { level: "unknown", source: "" };

  const compared = property === "Permeability" ? permeabilityToMillidarcy(value) : value;
  const band = RISK_BANDS[property].find(b => compared >= b.min && compared <= b.max);
  return band ? { level: band.level, source: RISK_SOURCES[property] } : { level: "unknown", source: "" };
}

export interface RiskReportEntry {
  /** Value in display units */
  value: number;
  unit: string;
  risk: RiskLevel;
  source: string;
}

/** Display value: permeability in mD, porosity as a percentage, the rest unchanged. */
export function toDisplayValue(property: RiskProperty, value: number): number {
  if (property === "Permeability") return permeabilityToMillidarcy(value);
  if (property === "Porosity") return value * 100;
  return value;
}

/**
 * Per-property risk report for one record. Properties that are missing or not
 * numeric are left out.
 */
export function riskReport(record: Record<string, unknown>): Partial<Record<RiskProperty, RiskReportEntry>> {
  const report: Partial<Record<RiskProperty, RiskReportEntry>> = {};
  for (const property of RISK_PROPERTIES) {
    const value = record[property];
    if (!isFiniteNumber(value)) continue;
    const { level, source } = assessRisk(property, value);
    report[property] = { value: toDisplayValue(property, value), unit: DISPLAY_UNITS[property], risk: level, source };
  }
  return report;
}
