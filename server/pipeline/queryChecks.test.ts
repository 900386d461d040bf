import { describe, expect, it } from "vitest";
import { DEFAULT_VOCABULARY } from "../graph/graphStore";
import { checkSchema, checkSyntax, cleanQueryText, closestName, referencedKinds, scanQuery } from "./queryChecks";

const READ_ONLY = { readOnly: true };

function syntaxMessage(query: string, readOnly = true): string | null {
  const result = checkSyntax(query, { readOnly });
  return result.ok ? null : result.message;
}

describe("scanQuery", () => {
  it("blanks string contents and comments", () => {
    const { masked, error } = scanQuery("RETURN 'a(b' // c)");
    expect(error).toBeUndefined();
    expect(masked).toBe("RETURN '   '      ");
  });

  it("keeps backtick identifiers intact", () => {
    expect(scanQuery("MATCH (n:`My Label`) RETURN n").masked).toBe("MATCH (n:`My Label`) RETURN n");
  });
});

describe("checkSyntax", () => {
  it("accepts a well-formed read query", () => {
    const query =
      "MATCH (a:Aquifer)-[:LOCATED_IN_BASIN]->(b:Basin) WHERE b.name = 'Nile (upper)' RETURN a.name AS name LIMIT 10";
    expect(checkSyntax(query, READ_ONLY)).toEqual({ ok: true });
  });

  it("rejects an empty query", () => {
    expect(syntaxMessage("   ")).toBe("Query is empty");
  });

  it("reports an unclosed parenthesis with its position", () => {
    expect(syntaxMessage("MATCH (a:Aquifer RETURN a")).toBe(
      "Unbalanced delimiters: '(' at position 6 is never closed"
    );
  });

  it("reports mismatched delimiters", () => {
    expect(syntaxMessage("MATCH (a:Aquifer] RETURN a")).toBe(
      "Unbalanced delimiters: '(' at position 6 closed by ']' at position 16"
    );
  });

  it("ignores brackets inside string literals and comments", () => {
    expect(syntaxMessage("MATCH (c:Country) WHERE c.name = 'Chad (north' RETURN c.name")).toBeNull();
    expect(syntaxMessage("MATCH (c:Country) // RETURN (\nRETURN c")).toBeNull();
  });

  it("rejects an unterminated string literal", () => {
    expect(syntaxMessage("MATCH (c:Country) WHERE c.name = 'Chad RETURN c")).toBe(
      "Unterminated string literal starting with '"
    );
  });

  it("requires a read/write clause and a RETURN clause", () => {
    expect(syntaxMessage("RETURN 1")).toBe("Query has no MATCH, CREATE, MERGE, CALL or UNWIND clause");
    expect(syntaxMessage("MATCH (c:Country)")).toBe("Query has no RETURN clause");
  });

  it("flags known malformed patterns", () => {
    expect(syntaxMessage("MATCH (n:) RETURN n")).toBe("Node pattern has an empty label (e.g. '(n:)')");
    expect(syntaxMessage("MATCH (a)-[:]->(b) RETURN a")).toBe("Relationship pattern has an empty type (e.g. '[:]')");
    expect(syntaxMessage("MATCH (a:Aquifer) RETURN")).toBe("RETURN clause has no return items");
    expect(syntaxMessage("MATCH (a:Aquifer) WHERE RETURN a")).toBe("WHERE clause has no predicate");
    expect(syntaxMessage("MATCH (a:Aquifer) RETURN a;;")).toBe("Doubled semicolon");
    expect(syntaxMessage("MATCH (a:Aquifer), RETURN a")).toBe("Dangling comma before a clause");
  });

  it("accepts whitespace between the colon and the label", () => {
    expect(syntaxMessage("MATCH (n: Aquifer) RETURN n")).toBeNull();
  });

  it("rejects write clauses only in read-only mode", () => {
    const query = "MATCH (a:Aquifer) SET a.Depth = 0 RETURN a";
    expect(syntaxMessage(query)).toBe("Write clause SET is not allowed; queries must be read-only");
    expect(syntaxMessage(query, false)).toBeNull();
    expect(syntaxMessage("MATCH (a:Aquifer) DETACH DELETE a RETURN count(*)")).toBe(
      "Write clause DELETE is not allowed; queries must be read-only"
    );
  });

  it("does not mistake properties or aliases for write clauses", () => {
    expect(syntaxMessage("MATCH (a:Aquifer) RETURN a.set AS offset")).toBeNull();
  });
});

describe("referencedKinds", () => {
  it("collects labels and relationship types in order of appearance", () => {
    const kinds = referencedKinds(
      "MATCH (a:Aquifer)-[r:PART_OF]->(c:Cluster), (a)-[:LOCATED_IN_BASIN|PART_OF]->(b:Basin) RETURN a"
    );
    expect(kinds.labels).toEqual(["Aquifer", "Cluster", "Basin"]);
    expect(kinds.relationshipTypes).toEqual(["PART_OF", "LOCATED_IN_BASIN"]);
  });

  it("ignores labels inside string literals", () => {
    expect(referencedKinds("MATCH (a:Aquifer) WHERE a.name = '(x:Fake)' RETURN a").labels).toEqual(["Aquifer"]);
  });
});

describe("closestName", () => {
  it("suggests names within two edits, ignoring case", () => {
    expect(closestName("Aquifier", DEFAULT_VOCABULARY.entityKinds)).toBe("Aquifer");
    expect(closestName("country", DEFAULT_VOCABULARY.entityKinds)).toBe("Country");
    expect(closestName("Ocean", DEFAULT_VOCABULARY.entityKinds)).toBeUndefined();
  });
});

describe("checkSchema", () => {
  it("accepts known labels and relationship types", () => {
    expect(
      checkSchema("MATCH (a:Aquifer)-[:LOCATED_IN_BASIN]->(b:Basin) RETURN a", DEFAULT_VOCABULARY)
    ).toEqual({ ok: true });
  });

  it("names an unknown label with a suggestion", () => {
    expect(checkSchema("MATCH (a:Aquifier) RETURN a", DEFAULT_VOCABULARY)).toEqual({
      ok: false,
      status: "SCHEMA_ERROR",
      message:
        "Unknown node label: Aquifier (did you mean Aquifer?). Known node labels: Aquifer, Basin, Country, Continent, Cluster",
    });
  });

  it("is case-sensitive", () => {
    const result = checkSchema("MATCH (a:aquifer) RETURN a", DEFAULT_VOCABULARY);
    expect(result.ok).toBe(false);
  });

  it("names an unknown relationship type", () => {
    expect(checkSchema("MATCH (a:Aquifer)-[:LOCATED_IN]->(b:Basin) RETURN a", DEFAULT_VOCABULARY)).toEqual({
      ok: false,
      status: "SCHEMA_ERROR",
      message:
        "Unknown relationship type: LOCATED_IN. Known relationship types: LOCATED_IN_BASIN, PART_OF, IS_LOCATED_IN_COUNTRY, LOCATED_IN_CONTINENT",
    });
  });
});

describe("cleanQueryText", () => {
  it("strips code fences and a trailing semicolon", () => {
    expect(cleanQueryText("```cypher\nMATCH (n) RETURN n;\n```")).toBe("MATCH (n) RETURN n");
  });

  it("drops prose before the first clause", () => {
    expect(cleanQueryText("Here is the query:\nMATCH (n:Basin)\nRETURN n.name")).toBe("MATCH (n:Basin)\nRETURN n.name");
  });
});
