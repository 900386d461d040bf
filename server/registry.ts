/**
 * Long-lived services, built once at startup and shared by every request.
 */

import type { ModelRole } from "@shared/pipelineSchemas";
import type { AppConfig, StageTimeouts } from "./_core/config";
import { getDb } from "./db";
import { Neo4jGraphStore } from "./graph/graphStore";
import { LLMModelGateway } from "./llm/modelGateway";
import type { PipelineServices } from "./pipeline/orchestrator";
import { RunLog } from "./pipeline/runLog";
import { SessionQueue } from "./pipeline/sessionQueue";
import { DrizzleSessionStore, InMemorySessionStore, type SessionStore } from "./sessions/sessionStore";

/**
 * Gateway timeout per role, taken from the stage it serves.
 */
export function roleTimeouts(timeouts: StageTimeouts): Record<ModelRole, number> {
  return {
    planner: timeouts.plan,
    "query-writer": timeouts.generation,
    healer: timeouts.healing,
    synthesizer: timeouts.synthesis,
  };
}

async function createSessionStore(): Promise<SessionStore> {
  const db = await getDb();
  if (db) {
    console.log("[Sessions] Using MySQL session store");
    return new DrizzleSessionStore(db);
  }
  console.warn("[Sessions] DATABASE_URL not set, using in-memory session store");
  return new InMemorySessionStore();
}

export async function createServiceRegistry(config: AppConfig): Promise<PipelineServices> {
  const gateway = new LLMModelGateway(config.llm, roleTimeouts(config.pipeline.timeouts));
  const graphStore = new Neo4jGraphStore(config.graph);
  const sessionStore = await createSessionStore();
  const sessionQueue = new SessionQueue(config.pipeline.sessionBusyPolicy);
  const runLog = config.runLogDir ? new RunLog(config.runLogDir) : undefined;
  if (runLog) console.log(`[Startup] Writing run log to ${runLog.directory}`);

  console.log(
    `[Startup] LLM backend ${config.llm.backend} at ${config.llm.baseUrl}; graph ${config.graph.uri} (schema: ${config.graph.schemaSource})`
  );
  return { gateway, graphStore, sessionStore, sessionQueue, config, runLog };
}
