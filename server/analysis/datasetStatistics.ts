/**
 * Descriptive statistics over query rows, handed to the synthesizer next to
 * the rows themselves so counts, ranges and outliers come from arithmetic
 * rather than from the model.
 */

import type { Row } from "@shared/pipelineSchemas";
import { RISK_PROPERTIES, assessRisk, isFiniteNumber, permeabilityToMillidarcy } from "./riskAssessment";

/** Numeric aquifer properties summarized when present */
export const STATISTIC_PROPERTIES = [
  "Porosity",
  "Permeability",
  "Depth",
  "Thickness",
  "Recharge",
  "Lake_area",
  "Parameter_area",
] as const;

const PERCENTILES = [5, 25, 50, 75, 95] as const;
const OUTLIER_Z_SCORE = 2.5;

export interface Outlier {
  objectId: unknown;
  /** The stored value, before unit conversion */
  value: number;
  zScore: number;
}

export interface PropertyStatistics {
  count: number;
  mean: number;
  min: number;
  max: number;
  /** Sample standard deviation; 0 for a single value */
  stdDev: number;
  percentiles: Record<`p${(typeof PERCENTILES)[number]}`, number>;
  outliers: Outlier[];
}

export interface RiskCounts {
  lowRisk: number;
  mediumRisk: number;
  highRisk: number;
  assessed: number;
}

export interface DatasetStatistics {
  rowCount: number;
  properties: Record<string, PropertyStatistics>;
  risk: Record<string, RiskCounts>;
}

/**
 * Drop variable prefixes from column names: `a.Porosity` → `Porosity`.
 */
export function normalizeKeys(row: Row): Row {
  const normalized: Row = {};
  for (const [key, value] of Object.entries(row)) {
    normalized[key.split(".").pop() ?? key] = value;
  }
  return normalized;
}

function comparable(property: string, value: number): number {
  return property === "Permeability" ? permeabilityToMillidarcy(value) : value;
}

function describe(property: string, rows: readonly Row[]): PropertyStatistics | null {
  const entries = rows
    .map(row => ({ row, raw: row[property] }))
    .filter((e): e is { row: Row; raw: number } => isFiniteNumber(e.raw))
    .map(e => ({ ...e, value: comparable(property, e.raw) }));
  if (entries.length === 0) return null;

  const values = entries.map(e => e.value);
  const count = values.length;
  const mean = values.reduce((sum, v) => sum + v, 0) / count;
  const stdDev = count > 1 ? Math.sqrt(values.reduce((sum, v) => sum + (v - mean) ** 2, 0) / (count - 1)) : 0;

  const sorted = [...values].sort((a, b) => a - b);
  const pick = (p: number) => sorted[Math.max(0, Math.min(count - 1, Math.floor((count * p) / 100)))];

  const outliers =
    stdDev > 0
      ? entries
          .map(e => ({ objectId: e.row.OBJECTID ?? null, value: e.raw, zScore: (e.value - mean) / stdDev }))
          .filter(o => Math.abs(o.zScore) > OUTLIER_Z_SCORE)
      : [];

  return {
    count,
    mean,
    min: sorted[0],
    max: sorted[count - 1],
    stdDev,
    percentiles: { p5: pick(5), p25: pick(25), p50: pick(50), p75: pick(75), p95: pick(95) },
    outliers,
  };
}

function countRisk(property: string, rows: readonly Row[]): RiskCounts | null {
  const values = rows.map(row => row[property]).filter(isFiniteNumber);
  if (values.length === 0) return null;

  const counts: RiskCounts = { lowRisk: 0, mediumRisk: 0, highRisk: 0, assessed: values.length };
  for (const value of values) {
    const { level } = assessRisk(property, value);
    if (level === "low_risk") counts.lowRisk++;
    else if (level === "medium_risk") counts.mediumRisk++;
    else if (level === "high_risk") counts.highRisk++;
  }
  return counts;
}

/**
 * Statistics for every known numeric property the rows carry. Null when the
 * rows have none.
 */
export function computeStatistics(rows: readonly Row[]): DatasetStatistics | null {
  if (rows.length === 0) return null;
  const normalized = rows.map(normalizeKeys);

  const properties: Record<string, PropertyStatistics> = {};
  for (const property of STATISTIC_PROPERTIES) {
    const stats = describe(property, normalized);
    if (stats) properties[property] = stats;
  }

  const risk: Record<string, RiskCounts> = {};
  for (const property of RISK_PROPERTIES) {
    const counts = countRisk(property, normalized);
    if (counts) risk[property] = counts;
  }

  if (Object.keys(properties).length === 0) return null;
  return { rowCount: rows.length, properties, risk };
}

/**
 * Compact JSON for prompts, numbers rounded to 4 significant digits.
 */
export function formatStatistics(stats: DatasetStatistics): string {
  return JSON.stringify(stats, (_key, value: unknown) =>
    typeof value === "number" && Number.isFinite(value) ? Number(value.toPrecision(4)) : value
  );
}
