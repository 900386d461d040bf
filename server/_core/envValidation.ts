/**
 * Boot-time environment variable validation.
 * Every variable has a default in config.ts; errors are reserved for values
 * the graph driver cannot use.
 */

interface EnvCheck {
  key: string;
  description: string;
  category: "graph" | "llm" | "pipeline" | "persistence";
}

const ENV_CHECKS: EnvCheck[] = [
  // Graph database
  {
    key: "NEO4J_URI",
    description: "Graph database Bolt URI (default: bolt://localhost:7687)",
    category: "graph",
  },
  {
    key: "NEO4J_USER",
    description: "Graph database username (default: neo4j)",
    category: "graph",
  },
  {
    key: "NEO4J_PASSWORD",
    description: "Graph database password (default: none)",
    category: "graph",
  },
  {
    key: "NEO4J_DATABASE",
    description: "Graph database name (default: server default)",
    category: "graph",
  },
  {
    key: "SCHEMA_SOURCE",
    description: "Schema vocabulary source: static | introspect (default: static)",
    category: "graph",
  },

  // Text-generation backend
  {
    key: "LLM_BACKEND",
    description: "Generation backend: ollama | openai (default: ollama)",
    category: "llm",
  },
  {
    key: "LLM_BASE_URL",
    description: "Generation backend base URL",
    category: "llm",
  },
  {
    key: "LLM_API_KEY",
    description: "Bearer token for OpenAI-compatible backends",
    category: "llm",
  },
  {
    key: "PLANNER_MODEL",
    description: "Model for the planner role",
    category: "llm",
  },
  {
    key: "QUERY_WRITER_MODEL",
    description: "Model for the query-writer role",
    category: "llm",
  },
  {
    key: "HEALER_MODEL",
    description: "Model for the healer role",
    category: "llm",
  },
  {
    key: "SYNTHESIZER_MODEL",
    description: "Model for the synthesizer role",
    category: "llm",
  },

  // Pipeline tuning
  {
    key: "MAX_RETRIES",
    description: "Healing attempts per query (default: 3)",
    category: "pipeline",
  },
  {
    key: "QUERY_TIMEOUT_MS",
    description: "Graph query timeout (default: 30000)",
    category: "pipeline",
  },
  {
    key: "SUMMARY_TRIGGER_PAIRS",
    description: "Older exchanges that trigger a conversation summary, 0 disables (default: 5)",
    category: "pipeline",
  },
  {
    key: "RUN_LOG_DIR",
    description: "Directory for the per-run JSONL log (default: disabled)",
    category: "pipeline",
  },
  {
    key: "SESSION_BUSY_POLICY",
    description: "Concurrent messages per session: queue | reject (default: queue)",
    category: "pipeline",
  },

  // Session persistence
  {
    key: "DATABASE_URL",
    description: "MySQL connection string for chat sessions",
    category: "persistence",
  },
];

const NEO4J_SCHEMES = /^(bolt|neo4j)(\+s|\+ssc)?:\/\//;

const CATEGORY_LABELS: Record<EnvCheck["category"], string> = {
  graph: "Graph Database (Neo4j)",
  llm: "Text Generation",
  pipeline: "Pipeline",
  persistence: "Session Persistence (MySQL)",
};

function maskValue(key: string, value: string): string {
  if (key.includes("PASS") || key.includes("SECRET") || key.includes("KEY") || key.includes("TOKEN")) {
    return `${value.substring(0, 4)}${"*".repeat(Math.max(0, value.length - 4))}`;
  }
  if (key === "DATABASE_URL") {
    return value.replace(/\/\/([^:/@]+):([^@]+)@/, "//$1:****@");
  }
  return value.length > 50 ? `${value.substring(0, 47)}...` : value;
}

/**
 * Validate environment variables at boot time.
 * The caller exits the process when errors are returned.
 */
export function validateEnvironment(env: Record<string, string | undefined> = process.env): {
  errors: string[];
  warnings: string[];
  info: string[];
} {
  const errors: string[] = [];
  const warnings: string[] = [];
  const info: string[] = [];

  console.log("\n╔══════════════════════════════════════════════════╗");
  console.log("║          Graph Analyst — Environment Check       ║");
  console.log("╚══════════════════════════════════════════════════╝\n");

  // Group checks by category
  const grouped = new Map<EnvCheck["category"], EnvCheck[]>();
  for (const check of ENV_CHECKS) {
    const list = grouped.get(check.category) || [];
    list.push(check);
    grouped.set(check.category, list);
  }

  for (const [category, checks] of Array.from(grouped.entries())) {
    console.log(`  ┌─ ${CATEGORY_LABELS[category]}`);

    for (const check of checks) {
      const value = env[check.key]?.trim();

      if (value) {
        console.log(`  │  ✅ ${check.key} = ${maskValue(check.key, value)}`);
      } else {
        console.log(`  │  ⚠️  ${check.key} — not set (${check.description})`);
      }
    }
    console.log("  └─");
  }

  const graphUri = env.NEO4J_URI?.trim();
  if (graphUri && !NEO4J_SCHEMES.test(graphUri)) {
    errors.push(`NEO4J_URI: unsupported scheme in "${graphUri}" (expected bolt://, neo4j:// or their +s/+ssc variants)`);
    console.log("\n  ❌ NEO4J_URI is not a Bolt or Neo4j URI");
  }
  if (!env.NEO4J_PASSWORD?.trim()) {
    warnings.push("NEO4J_PASSWORD not set — connecting to the graph without a password");
    console.log("\n  ⚠️  No NEO4J_PASSWORD — the graph database must have auth disabled");
  }

  if (!env.DATABASE_URL?.trim()) {
    warnings.push("DATABASE_URL not set — chat sessions are kept in memory and lost on restart");
    console.log("\n  ⚠️  No DATABASE_URL — sessions will not survive a restart");
  } else {
    info.push("Chat sessions persisted to MySQL");
  }

  const backend = env.LLM_BACKEND?.trim() || "ollama";
  if (backend === "openai" && !env.LLM_BASE_URL?.trim()) {
    warnings.push("LLM_BACKEND=openai without LLM_BASE_URL — defaulting to http://localhost:8000");
    console.log("  ⚠️  OpenAI-compatible backend selected without LLM_BASE_URL");
  }
  info.push(`Generation backend: ${backend}`);

  if (env.READ_ONLY_QUERIES?.trim().toLowerCase() === "false") {
    warnings.push("READ_ONLY_QUERIES=false — generated queries may modify the graph");
    console.log("  ⚠️  Write clauses in generated queries are allowed");
  }

  // Summary
  console.log("\n  ─────────────────────────────────────────────────");
  if (errors.length > 0) {
    console.error(`\n  ❌ ${errors.length} CRITICAL ERROR(S) — server cannot start:\n`);
    for (const err of errors) {
      console.error(`     • ${err}`);
    }
    console.error("\n  Fix the above variables in your .env file and restart.\n");
  } else if (warnings.length > 0) {
    console.log(`\n  ✅ Core checks passed | ⚠️  ${warnings.length} warning(s)\n`);
  } else {
    console.log("\n  ✅ All environment checks passed\n");
  }

  return { errors, warnings, info };
}
