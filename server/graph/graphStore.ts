/**
 * Graph Store — query execution and schema vocabulary over Neo4j.
 *
 * Generated queries run in read sessions by default. Every execution is bounded
 * twice: the transaction timeout is sent to the server, and a client-side timer
 * rejects the call if the server does not answer in time.
 */

import neo4j, {
  Neo4jError,
  isDate,
  isDateTime,
  isDuration,
  isInt,
  isLocalDateTime,
  isLocalTime,
  isNode,
  isPath,
  isPoint,
  isRelationship,
  isTime,
} from "neo4j-driver";
import NodeCache from "node-cache";
import { z } from "zod";
import type { Row } from "@shared/pipelineSchemas";
import type { GraphSettings } from "../_core/config";
import { GraphStoreError, PipelineAbortedError, errorMessage } from "../_core/errors";
import bundledSchema from "./graphSchema.json";

// ── Types ───────────────────────────────────────────────────────────────────

export interface SchemaVocabulary {
  entityKinds: string[];
  relationshipKinds: string[];
  propertyKeys: string[];
  /** Property names per entity kind, when known */
  propertiesByKind?: Record<string, string[]>;
  /** Human-readable relationship shapes, e.g. (:A)-[:R]->(:B) */
  relationshipPatterns?: string[];
}

export interface ExecuteOptions {
  timeoutMs: number;
  signal?: AbortSignal;
  /** Run in a read-access session (default true) */
  readOnly?: boolean;
  /** Query parameters, referenced as $name in the query text */
  parameters?: Record<string, unknown>;
}

export interface QueryExecution {
  rows: Row[];
  executionTimeMs: number;
}

export interface GraphStore {
  execute(queryText: string, options: ExecuteOptions): Promise<QueryExecution>;
  schemaVocabulary(): Promise<SchemaVocabulary>;
  verifyConnectivity(): Promise<void>;
  close(): Promise<void>;
}

/** The subset of the driver API this store relies on. */
export interface GraphDriver {
  session(config: { database?: string; defaultAccessMode?: "READ" | "WRITE" }): GraphSession;
  verifyConnectivity(): Promise<unknown>;
  close(): Promise<void>;
}

export interface GraphSession {
  run(query: string, parameters: Record<string, unknown>, config: { timeout?: number }): PromiseLike<{
    records: Array<{ toObject(): Record<string, unknown> }>;
  }>;
  close(): Promise<void>;
}

// ── Vocabulary ──────────────────────────────────────────────────────────────

const vocabularySchema = z.object({
  entityKinds: z.array(z.string()).min(1),
  relationshipKinds: z.array(z.string()),
  propertyKeys: z.array(z.string()),
  propertiesByKind: z.record(z.array(z.string())).optional(),
  relationshipPatterns: z.array(z.string()).optional(),
});

export const DEFAULT_VOCABULARY: SchemaVocabulary = vocabularySchema.parse(bundledSchema);

const VOCABULARY_CACHE_KEY = "vocabulary";
const VOCABULARY_TTL_SECONDS = 300;

const INTROSPECTION_QUERIES = {
  entityKinds: "CALL db.labels() YIELD label RETURN collect(label) AS values",
  relationshipKinds: "CALL db.relationshipTypes() YIELD relationshipType RETURN collect(relationshipType) AS values",
  propertyKeys: "CALL db.propertyKeys() YIELD propertyKey RETURN collect(propertyKey) AS values",
} as const;

// ── Value conversion ────────────────────────────────────────────────────────

/**
 * Convert driver values to plain JSON: integers to numbers (strings when out of
 * the safe range), nodes and relationships to their property maps, paths to
 * the property maps of their nodes, points to GeoJSON-like objects, temporal
 * values to ISO strings.
 */
export function toPlainValue(value: unknown): unknown {
  if (value === null || value === undefined) return null;
  if (Array.isArray(value)) return value.map(toPlainValue);
  if (typeof value !== "object") return value;

  if (isInt(value)) {
    return value.inSafeRange() ? value.toNumber() : value.toString();
  }
  if (isNode(value) || isRelationship(value)) {
    return toPlainValue(value.properties);
  }
  if (isPath(value)) {
    return [value.start, ...value.segments.map(s => s.end)].map(node => toPlainValue(node.properties));
  }
  if (isPoint(value)) {
    const coordinates = value.z === undefined ? [value.x, value.y] : [value.x, value.y, value.z];
    return { type: "Point", coordinates, srid: toPlainValue(value.srid) };
  }
  if (
    isDate(value) ||
    isDateTime(value) ||
    isLocalDateTime(value) ||
    isLocalTime(value) ||
    isTime(value) ||
    isDuration(value)
  ) {
    return value.toString();
  }

  const plain: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    plain[key] = toPlainValue(entry);
  }
  return plain;
}

function toRow(record: { toObject(): Record<string, unknown> }): Row {
  const row: Row = {};
  for (const [key, value] of Object.entries(record.toObject())) {
    row[key] = toPlainValue(value);
  }
  return row;
}

// ── Error classification ────────────────────────────────────────────────────

const TIMEOUT_CODES = ["Neo.ClientError.Transaction.TransactionTimedOut", "Neo.ClientError.Transaction.TransactionTimedOutClientConfiguration"];
const UNAVAILABLE_CODES = ["ServiceUnavailable", "SessionExpired"];

export function classifyDriverError(err: unknown): GraphStoreError {
  if (err instanceof GraphStoreError) return err;
  if (err instanceof Neo4jError) {
    if (TIMEOUT_CODES.includes(err.code)) {
      return new GraphStoreError("timeout", err.message, { cause: err, code: err.code });
    }
    if (UNAVAILABLE_CODES.includes(err.code)) {
      return new GraphStoreError("unavailable", err.message, { cause: err, code: err.code });
    }
    return new GraphStoreError("execution", err.message, { cause: err, code: err.code });
  }
  return new GraphStoreError("execution", errorMessage(err), { cause: err });
}

/**
 * Race a driver call against a client-side deadline and the caller's signal.
 */
function withDeadline<T>(work: PromiseLike<T>, timeoutMs: number, signal?: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      cleanup();
      reject(new PipelineAbortedError(signal?.reason));
    };
    const timer = setTimeout(() => {
      cleanup();
      reject(new GraphStoreError("timeout", `Query timed out after ${timeoutMs}ms`));
    }, timeoutMs);
    const cleanup = () => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    };

    if (signal?.aborted) {
      onAbort();
      return;
    }
    signal?.addEventListener("abort", onAbort, { once: true });

    work.then(
      value => {
        cleanup();
        resolve(value);
      },
      (err: unknown) => {
        cleanup();
        reject(err);
      }
    );
  });
}

// ── Neo4j implementation ────────────────────────────────────────────────────

export class Neo4jGraphStore implements GraphStore {
  private readonly driver: GraphDriver;
  private readonly cache = new NodeCache({ stdTTL: VOCABULARY_TTL_SECONDS, checkperiod: 0, useClones: false });

  constructor(
    private readonly settings: GraphSettings,
    driver?: GraphDriver
  ) {
    this.driver =
      driver ??
      neo4j.driver(settings.uri, settings.password ? neo4j.auth.basic(settings.user, settings.password) : undefined);
  }

  async execute(queryText: string, options: ExecuteOptions): Promise<QueryExecution> {
    const session = this.driver.session({
      database: this.settings.database,
      defaultAccessMode: options.readOnly === false ? "WRITE" : "READ",
    });
    const startTime = Date.now();

    try {
      const result = await withDeadline(
        session.run(queryText, options.parameters ?? {}, { timeout: options.timeoutMs }),
        options.timeoutMs,
        options.signal
      );
      return { rows: result.records.map(toRow), executionTimeMs: Date.now() - startTime };
    } catch (err) {
      if (err instanceof PipelineAbortedError) throw err;
      const failure = classifyDriverError(err);
      console.warn(`[GraphStore] Query failed (${failure.kind}) after ${Date.now() - startTime}ms: ${failure.message}`);
      throw failure;
    } finally {
      void session.close().catch((closeErr: unknown) => {
        console.warn(`[GraphStore] Session close failed: ${errorMessage(closeErr)}`);
      });
    }
  }

  async schemaVocabulary(): Promise<SchemaVocabulary> {
    if (this.settings.schemaSource === "static") return DEFAULT_VOCABULARY;

    const cached = this.cache.get<SchemaVocabulary>(VOCABULARY_CACHE_KEY);
    if (cached) return cached;

    try {
      const vocabulary = await this.introspect();
      this.cache.set(VOCABULARY_CACHE_KEY, vocabulary);
      return vocabulary;
    } catch (err) {
      console.warn(`[GraphStore] Schema introspection failed, using bundled vocabulary: ${errorMessage(err)}`);
      return DEFAULT_VOCABULARY;
    }
  }

  async verifyConnectivity(): Promise<void> {
    try {
      await this.driver.verifyConnectivity();
    } catch (err) {
      throw new GraphStoreError("unavailable", errorMessage(err), { cause: err });
    }
  }

  async close(): Promise<void> {
    this.cache.close();
    await this.driver.close();
  }

  private async introspect(): Promise<SchemaVocabulary> {
    const readList = async (query: string): Promise<string[]> => {
      const { rows } = await this.execute(query, { timeoutMs: 10_000 });
      const values = rows[0]?.values;
      return Array.isArray(values) ? values.filter((v): v is string => typeof v === "string").sort() : [];
    };

    const [entityKinds, relationshipKinds, propertyKeys] = await Promise.all([
      readList(INTROSPECTION_QUERIES.entityKinds),
      readList(INTROSPECTION_QUERIES.relationshipKinds),
      readList(INTROSPECTION_QUERIES.propertyKeys),
    ]);

    if (entityKinds.length === 0) {
      throw new GraphStoreError("execution", "Database reported no node labels");
    }

    // Per-kind properties and patterns only come from the bundled file, and only for kinds that still exist
    const propertiesByKind: Record<string, string[]> = {};
    for (const kind of entityKinds) {
      const known = DEFAULT_VOCABULARY.propertiesByKind?.[kind];
      if (known) propertiesByKind[kind] = known;
    }
    const relationshipPatterns = (DEFAULT_VOCABULARY.relationshipPatterns ?? []).filter(pattern =>
      relationshipKinds.some(kind => pattern.includes(`[:${kind}]`))
    );

    console.log(
      `[GraphStore] Introspected ${entityKinds.length} labels, ${relationshipKinds.length} relationship types, ${propertyKeys.length} property keys`
    );
    return { entityKinds, relationshipKinds, propertyKeys, propertiesByKind, relationshipPatterns };
  }
}

/**
 * Render the vocabulary for prompts.
 */
export function describeVocabulary(vocabulary: SchemaVocabulary): string {
  const lines: string[] = ["Node labels:"];
  for (const kind of vocabulary.entityKinds) {
    const props = vocabulary.propertiesByKind?.[kind];
    lines.push(props && props.length > 0 ? `- :${kind} (properties: ${props.join(", ")})` : `- :${kind}`);
  }
  lines.push("Relationship types:");
  if (vocabulary.relationshipPatterns && vocabulary.relationshipPatterns.length > 0) {
    for (const pattern of vocabulary.relationshipPatterns) lines.push(`- ${pattern}`);
  } else {
    for (const kind of vocabulary.relationshipKinds) lines.push(`- :${kind}`);
  }
  lines.push(`Property keys: ${vocabulary.propertyKeys.join(", ")}`);
  return lines.join("\n");
}
