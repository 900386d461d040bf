/**
 * Static and schema checks for generated Cypher.
 *
 * Both checks run before a query touches the database. They work on a masked
 * copy of the query in which string literals and comments are blanked out, so
 * brackets or keywords inside text never count.
 */

import type { FailureStatus } from "@shared/pipelineSchemas";
import type { SchemaVocabulary } from "../graph/graphStore";

export type CheckResult = { ok: true } | { ok: false; status: Extract<FailureStatus, "SYNTAX_ERROR" | "SCHEMA_ERROR">; message: string };

const OK: CheckResult = { ok: true };

const OPENERS: Record<string, string> = { "(": ")", "[": "]", "{": "}" };
const CLOSERS = new Set([")", "]", "}"]);

// ── Masking + delimiter scan ────────────────────────────────────────────────

interface ScanResult {
  /** Query text with string contents and comments replaced by spaces */
  masked: string;
  error?: string;
}

/**
 * Walk the query once: blank out literals and comments and verify that
 * (), [] and {} are balanced and properly nested.
 */
export function scanQuery(query: string): ScanResult {
  const out: string[] = [];
  const stack: Array<{ char: string; index: number }> = [];
  let i = 0;

  while (i < query.length) {
    const ch = query[i];
    const next = query[i + 1];

    if (ch === "'" || ch === '"') {
      const quote = ch;
      out.push(quote);
      i++;
      let closed = false;
      while (i < query.length) {
        if (query[i] === "\\" && i + 1 < query.length) {
          out.push("  ");
          i += 2;
          continue;
        }
        if (query[i] === quote) {
          closed = true;
          break;
        }
        out.push(query[i] === "\n" ? "\n" : " ");
        i++;
      }
      if (!closed) {
        return { masked: out.join(""), error: `Unterminated string literal starting with ${quote}` };
      }
      out.push(quote);
      i++;
      continue;
    }

    if (ch === "`") {
      const end = query.indexOf("`", i + 1);
      if (end < 0) {
        return { masked: out.join(""), error: "Unterminated backtick-quoted identifier" };
      }
      out.push(query.slice(i, end + 1));
      i = end + 1;
      continue;
    }

    if (ch === "/" && next === "/") {
      while (i < query.length && query[i] !== "\n") {
        out.push(" ");
        i++;
      }
      continue;
    }

    if (ch === "/" && next === "*") {
      const end = query.indexOf("*/", i + 2);
      if (end < 0) {
        return { masked: out.join(""), error: "Unterminated block comment" };
      }
      out.push(query.slice(i, end + 2).replace(/[^\n]/g, " "));
      i = end + 2;
      continue;
    }

    if (ch in OPENERS) {
      stack.push({ char: ch, index: i });
    } else if (CLOSERS.has(ch)) {
      const open = stack.pop();
      if (!open) {
        return { masked: out.join(""), error: `Unbalanced delimiters: unexpected '${ch}' at position ${i}` };
      }
      if (OPENERS[open.char] !== ch) {
        return {
          masked: out.join(""),
          error: `Unbalanced delimiters: '${open.char}' at position ${open.index} closed by '${ch}' at position ${i}`,
        };
      }
    }

    out.push(ch);
    i++;
  }

  const unclosed = stack.pop();
  if (unclosed) {
    return { masked: out.join(""), error: `Unbalanced delimiters: '${unclosed.char}' at position ${unclosed.index} is never closed` };
  }
  return { masked: out.join("") };
}

// ── Static check ────────────────────────────────────────────────────────────

const READ_WRITE_CLAUSE = /\b(MATCH|CREATE|MERGE|CALL|UNWIND)\b/i;
const RESULT_CLAUSE = /\bRETURN\b/i;
/** Write keywords in clause position: not a property (n.set), not a map key (set:), not a function (remove()). */
const WRITE_CLAUSE = /(?<![.\w])(CREATE|MERGE|DELETE|SET|REMOVE|DROP|FOREACH|LOAD\s+CSV)\b(?!\s*[:(])/i;

const MALFORMED_PATTERNS: Array<{ pattern: RegExp; message: string }> = [
  { pattern: /\(\s*\w*\s*:\s*[){]/, message: "Node pattern has an empty label (e.g. '(n:)')" },
  { pattern: /\[\s*[A-Za-z_]?\w*\s*:\s*[\]*{]/, message: "Relationship pattern has an empty type (e.g. '[:]')" },
  { pattern: /\bRETURN\s*;?\s*$/i, message: "RETURN clause has no return items" },
  { pattern: /\bWHERE\s+(RETURN|WITH|ORDER|LIMIT)\b/i, message: "WHERE clause has no predicate" },
  { pattern: /\b(?:OPTIONAL\s+)?MATCH\s+(RETURN|WHERE|WITH)\b/i, message: "MATCH clause has no pattern" },
  { pattern: /;\s*;/, message: "Doubled semicolon" },
  { pattern: /,\s*(RETURN|WHERE|WITH|MATCH|ORDER\s+BY|LIMIT|SKIP)\b/i, message: "Dangling comma before a clause" },
  { pattern: /\bLIMIT\s*(;?\s*$|RETURN\b)/i, message: "LIMIT has no value" },
];

/**
 * Static syntax check: balanced delimiters, a read/write clause, a RETURN
 * clause, none of the known malformed patterns and, in read-only mode, no
 * write clauses.
 */
export function checkSyntax(query: string, options: { readOnly: boolean }): CheckResult {
  if (!query.trim()) {
    return { ok: false, status: "SYNTAX_ERROR", message: "Query is empty" };
  }

  const { masked, error } = scanQuery(query);
  if (error) {
    return { ok: false, status: "SYNTAX_ERROR", message: error };
  }

  if (!READ_WRITE_CLAUSE.test(masked)) {
    return { ok: false, status: "SYNTAX_ERROR", message: "Query has no MATCH, CREATE, MERGE, CALL or UNWIND clause" };
  }
  if (!RESULT_CLAUSE.test(masked)) {
    return { ok: false, status: "SYNTAX_ERROR", message: "Query has no RETURN clause" };
  }

  for (const { pattern, message } of MALFORMED_PATTERNS) {
    if (pattern.test(masked)) {
      return { ok: false, status: "SYNTAX_ERROR", message };
    }
  }

  if (options.readOnly) {
    const write = masked.match(WRITE_CLAUSE);
    if (write) {
      return {
        ok: false,
        status: "SYNTAX_ERROR",
        message: `Write clause ${write[1].toUpperCase().replace(/\s+/g, " ")} is not allowed; queries must be read-only`,
      };
    }
  }

  return OK;
}

// ── Schema check ────────────────────────────────────────────────────────────

const NAME = "(?:`[^`]+`|[A-Za-z_][\\w]*)";
const NODE_LABELS = new RegExp(`\\(\\s*(?:${NAME})?\\s*:\\s*(${NAME}(?:\\s*[:|&]\\s*!?\\s*${NAME})*)`, "g");
const RELATIONSHIP_TYPES = new RegExp(`\\[\\s*(?:${NAME})?\\s*:\\s*(${NAME}(?:\\s*\\|\\s*:?\\s*${NAME})*)`, "g");

function splitNames(group: string): string[] {
  return group
    .split(/[:|&!]/)
    .map(part => part.trim().replace(/^`|`$/g, ""))
    .filter(part => part.length > 0);
}

export interface ReferencedKinds {
  labels: string[];
  relationshipTypes: string[];
}

/**
 * Collect node labels and relationship types used in patterns, in order of first appearance.
 */
export function referencedKinds(query: string): ReferencedKinds {
  const { masked } = scanQuery(query);
  const labels = new Set<string>();
  const relationshipTypes = new Set<string>();

  for (const match of masked.matchAll(NODE_LABELS)) {
    for (const name of splitNames(match[1])) labels.add(name);
  }
  for (const match of masked.matchAll(RELATIONSHIP_TYPES)) {
    for (const name of splitNames(match[1])) relationshipTypes.add(name);
  }

  return { labels: Array.from(labels), relationshipTypes: Array.from(relationshipTypes) };
}

function editDistance(a: string, b: string): number {
  const previous = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i++) {
    let diagonal = previous[0];
    previous[0] = i;
    for (let j = 1; j <= b.length; j++) {
      const above = previous[j];
      previous[j] = Math.min(previous[j] + 1, previous[j - 1] + 1, diagonal + (a[i - 1] === b[j - 1] ? 0 : 1));
      diagonal = above;
    }
  }
  return previous[b.length];
}

/**
 * Closest known name by case-insensitive edit distance (at most 2), if any.
 */
export function closestName(name: string, known: readonly string[]): string | undefined {
  let best: { name: string; distance: number } | undefined;
  for (const candidate of known) {
    const distance = editDistance(name.toLowerCase(), candidate.toLowerCase());
    if (distance <= 2 && (!best || distance < best.distance)) {
      best = { name: candidate, distance };
    }
  }
  return best?.name;
}

function describeUnknown(kind: string, unknown: string[], known: readonly string[]): string {
  const names = unknown
    .map(name => {
      const suggestion = closestName(name, known);
      return suggestion ? `${name} (did you mean ${suggestion}?)` : name;
    })
    .join(", ");
  return `Unknown ${kind}: ${names}. Known ${kind}s: ${known.join(", ")}`;
}

/**
 * Every node label and relationship type referenced must be in the vocabulary (case-sensitive).
 */
export function checkSchema(query: string, vocabulary: SchemaVocabulary): CheckResult {
  const { labels, relationshipTypes } = referencedKinds(query);

  const unknownLabels = labels.filter(label => !vocabulary.entityKinds.includes(label));
  if (unknownLabels.length > 0) {
    return { ok: false, status: "SCHEMA_ERROR", message: describeUnknown("node label", unknownLabels, vocabulary.entityKinds) };
  }

  const unknownTypes = relationshipTypes.filter(type => !vocabulary.relationshipKinds.includes(type));
  if (unknownTypes.length > 0) {
    return {
      ok: false,
      status: "SCHEMA_ERROR",
      message: describeUnknown("relationship type", unknownTypes, vocabulary.relationshipKinds),
    };
  }

  return OK;
}

// ── Cleaning model output ───────────────────────────────────────────────────

const CLAUSE_START = /^\s*(MATCH|OPTIONAL\s+MATCH|CALL|UNWIND|WITH|CREATE|MERGE|RETURN)\b/i;

/**
 * Turn a model reply into bare query text: drop code fences, any prose lines
 * before the first clause, and a single trailing semicolon.
 */
export function cleanQueryText(reply: string): string {
  let text = reply.trim();
  const fenced = text.match(/```[\w-]*\s*\n?([\s\S]*?)\n?```/);
  if (fenced) text = fenced[1].trim();

  const lines = text.split("\n");
  const firstClause = lines.findIndex(line => CLAUSE_START.test(line));
  if (firstClause > 0) text = lines.slice(firstClause).join("\n").trim();

  return text.replace(/;\s*$/, "").trim();
}
