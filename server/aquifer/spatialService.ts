/**
 * Aquifer map data — graph rows → GeoJSON, and per-aquifer risk reports.
 *
 * Geometry comes from the `Location` point when present, otherwise from the
 * WKT text in `Boundary_coordinates` (POLYGON or MULTIPOLYGON). Rows with
 * neither are left out of the collection.
 */

import type { Feature, FeatureCollection, Geometry, MultiPolygon, Polygon, Position } from "geojson";
import type { Row } from "@shared/pipelineSchemas";
import { normalizeKeys } from "../analysis/datasetStatistics";
import {
  RISK_PROPERTIES,
  assessRisk,
  isFiniteNumber,
  riskReport,
  type RiskProperty,
  type RiskReportEntry,
} from "../analysis/riskAssessment";
import type { GraphStore } from "../graph/graphStore";

/** Returned for every aquifer regardless of the requested properties */
export const CORE_SPATIAL_PROPERTIES = [
  "OBJECTID",
  "Location",
  "Boundary_coordinates",
  ...RISK_PROPERTIES,
] as const;

export const DEFAULT_SPATIAL_LIMIT = 2000;

/** Property names are written into the query text, so only plain identifiers are accepted */
export const PROPERTY_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export interface SpatialRequest {
  objectIds?: string[];
  /** Basin name, matched through the basin full-text index */
  basin?: string;
  /** Extra aquifer properties; must be plain identifiers */
  properties?: string[];
  limit?: number;
}

export interface SpatialQuery {
  query: string;
  parameters: Record<string, unknown>;
}

// ── WKT ─────────────────────────────────────────────────────────────────────

function parseRing(text: string): Position[] | null {
  const ring: Position[] = [];
  for (const point of text.split(",")) {
    const coords = point.trim().split(/\s+/).map(Number);
    if (coords.length < 2 || !coords.every(Number.isFinite)) return null;
    ring.push(coords.slice(0, 2));
  }
  return ring.length > 0 ? ring : null;
}

function parseRings(text: string): Position[][] | null {
  const rings: Position[][] = [];
  for (const match of text.matchAll(/\(([^()]*)\)/g)) {
    const ring = parseRing(match[1]);
    if (!ring) return null;
    rings.push(ring);
  }
  return rings.length > 0 ? rings : null;
}

/**
 * Parse a WKT POLYGON or MULTIPOLYGON. Null for anything else or for a
 * coordinate that is not a number.
 */
export function parseWktPolygon(wkt: string): Polygon | MultiPolygon | null {
  const text = wkt.trim();

  const multi = /^MULTIPOLYGON\s*\((.*)\)$/is.exec(text);
  if (multi) {
    const polygons: Position[][][] = [];
    for (const match of multi[1].matchAll(/\(\s*(\([^()]*\)(?:\s*,\s*\([^()]*\))*)\s*\)/g)) {
      const rings = parseRings(match[1]);
      if (!rings) return null;
      polygons.push(rings);
    }
    return polygons.length > 0 ? { type: "MultiPolygon", coordinates: polygons } : null;
  }

  const single = /^POLYGON\s*\((.*)\)$/is.exec(text);
  if (single) {
    const rings = parseRings(single[1]);
    return rings ? { type: "Polygon", coordinates: rings } : null;
  }

  return null;
}

// ── Features ────────────────────────────────────────────────────────────────

function pointFrom(location: unknown): Geometry | null {
  if (typeof location !== "object" || location === null || !("coordinates" in location)) return null;
  const { coordinates } = location;
  if (!Array.isArray(coordinates) || coordinates.length < 2) return null;
  const [longitude, latitude] = coordinates;
  return isFiniteNumber(longitude) && isFiniteNumber(latitude) ? { type: "Point", coordinates: [longitude, latitude] } : null;
}

/**
 * One feature per row, with `<property>_risk` added for every assessed
 * property. Null when the row has no usable geometry.
 */
export function toFeature(row: Row): Feature | null {
  const properties = normalizeKeys(row);
  for (const property of RISK_PROPERTIES) {
    const value = properties[property];
    if (isFiniteNumber(value)) {
      properties[`${property}_risk`] = assessRisk(property, value).level;
    }
  }

  const boundary = properties.Boundary_coordinates;
  const geometry = pointFrom(properties.Location) ?? (typeof boundary === "string" ? parseWktPolygon(boundary) : null);
  if (!geometry) return null;

  const objectId = properties.OBJECTID;
  return {
    type: "Feature",
    geometry,
    properties,
    ...(typeof objectId === "string" || typeof objectId === "number" ? { id: objectId } : {}),
  };
}

export function toFeatureCollection(rows: readonly Row[]): FeatureCollection {
  const features = rows.map(toFeature).filter((f): f is Feature => f !== null);
  if (features.length < rows.length) {
    console.warn(`[Spatial] ${rows.length - features.length} of ${rows.length} aquifers have no usable geometry`);
  }
  return { type: "FeatureCollection", features };
}

// ── Queries ─────────────────────────────────────────────────────────────────

function returnClause(properties: readonly string[]): string {
  return properties.map(p => `a.${p} AS \`${p}\``).join(", ");
}

export function buildSpatialQuery(request: SpatialRequest): SpatialQuery {
  const parameters: Record<string, unknown> = {};
  const lines: string[] = [];

  if (request.basin) {
    lines.push(
      'CALL db.index.fulltext.queryNodes("basinSearch", $basin) YIELD node AS b, score',
      "WITH b ORDER BY score DESC LIMIT 1",
      "MATCH (a:Aquifer)-[:LOCATED_IN_BASIN]->(b)"
    );
    parameters.basin = request.basin;
  } else {
    lines.push("MATCH (a:Aquifer)");
  }

  if (request.objectIds && request.objectIds.length > 0) {
    lines.push("WHERE a.OBJECTID IN $objectIds");
    parameters.objectIds = request.objectIds;
  }

  const requested = request.properties ?? [];
  const invalid = requested.find(p => !PROPERTY_NAME_PATTERN.test(p));
  if (invalid !== undefined) {
    throw new RangeError(`Invalid property name: ${invalid}`);
  }
  const properties = Array.from(new Set<string>([...CORE_SPATIAL_PROPERTIES, ...requested]));
  lines.push(`RETURN ${returnClause(properties)}`);
  lines.push(`LIMIT ${Math.trunc(request.limit ?? DEFAULT_SPATIAL_LIMIT)}`);

  return { query: lines.join("\n"), parameters };
}

export async function getSpatialData(
  graphStore: GraphStore,
  request: SpatialRequest,
  options: { timeoutMs: number; signal?: AbortSignal }
): Promise<FeatureCollection> {
  const { query, parameters } = buildSpatialQuery(request);
  const { rows, executionTimeMs } = await graphStore.execute(query, { ...options, parameters });
  console.log(`[Spatial] ${rows.length} aquifers in ${executionTimeMs}ms`);
  return toFeatureCollection(rows);
}

export interface AquiferRiskReport {
  objectId: string;
  report: Partial<Record<RiskProperty, RiskReportEntry>>;
}

/**
 * Risk report for one aquifer. Null when no aquifer has the id.
 */
export async function getRiskReport(
  graphStore: GraphStore,
  objectId: string,
  options: { timeoutMs: number; signal?: AbortSignal }
): Promise<AquiferRiskReport | null> {
  const query = `MATCH (a:Aquifer) WHERE a.OBJECTID = $objectId\nRETURN ${returnClause(["OBJECTID", ...RISK_PROPERTIES])}\nLIMIT 1`;
  const { rows } = await graphStore.execute(query, { ...options, parameters: { objectId } });
  if (rows.length === 0) return null;
  return { objectId, report: riskReport(rows[0]) };
}
