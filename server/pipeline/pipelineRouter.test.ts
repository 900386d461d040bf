import { TRPCError } from "@trpc/server";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { TrpcContext } from "../_core/context";
import { appRouter } from "../routers";
import { FakeGraphStore, FakeModelGateway, createTestServices, deferred } from "../testing/fakes";
import type { PipelineServices } from "./orchestrator";

function createContext(services: PipelineServices): TrpcContext {
  return {
    req: { protocol: "https", headers: {} } as TrpcContext["req"],
    res: {} as TrpcContext["res"],
    services,
  };
}

describe("pipeline router", () => {
  let gateway: FakeModelGateway;
  let graphStore: FakeGraphStore;
  let services: PipelineServices;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    gateway = new FakeModelGateway();
    graphStore = new FakeGraphStore();
    services = createTestServices({ gateway, graphStore });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("answers a question and records it in a new session", async () => {
    gateway
      .script("planner", {
        complexity: "SIMPLE",
        subTasks: [{ id: 1, description: "Find basins", queryType: "lookup", requiredEntityKinds: ["Basin"], dependsOn: [] }],
        rationale: "",
      })
      .script("query-writer", { query: "MATCH (b:Basin) RETURN b.name AS name", explanation: "", expectedColumns: [] })
      .script("synthesizer", { summary: "One basin." });
    graphStore.defaultRows = [{ name: "Lake Chad" }];
    const caller = appRouter.createCaller(createContext(services));

    const response = await caller.pipeline.ask({ question: "  Which basins exist?  " });

    expect(response.answerText).toBe("## Summary\n\nOne basin.");
    expect(response.metadata.validQueries).toBe(1);

    const { session, messages } = await caller.pipeline.sessionHistory({ sessionId: response.sessionId });
    expect(session.title).toBe("Which basins exist?");
    expect(messages.map(m => m.content)).toEqual(["Which basins exist?", "## Summary\n\nOne basin."]);
  });

  it("rejects an empty question", async () => {
    const caller = appRouter.createCaller(createContext(services));
    await expect(caller.pipeline.ask({ question: "   " })).rejects.toMatchObject({ code: "BAD_REQUEST" });
    expect(gateway.calls).toHaveLength(0);
  });

  it("maps an unknown session to NOT_FOUND", async () => {
    const caller = appRouter.createCaller(createContext(services));

    const failure = caller.pipeline.ask({ question: "q", sessionId: "missing" });
    await expect(failure).rejects.toBeInstanceOf(TRPCError);
    await expect(failure).rejects.toMatchObject({ code: "NOT_FOUND", message: "Session missing not found" });
  });

  it("maps a busy session to CONFLICT under the reject policy", async () => {
    services = createTestServices({ gateway, graphStore, pipeline: { sessionBusyPolicy: "reject" } });
    const caller = appRouter.createCaller(createContext(services));
    const { sessionId } = await caller.pipeline.createSession({ title: "Busy" });
    const gate = deferred<void>();
    const inFlight = services.sessionQueue.run(sessionId, () => gate.promise);

    await expect(caller.pipeline.ask({ question: "q", sessionId })).rejects.toMatchObject({ code: "CONFLICT" });
    await expect(caller.pipeline.deleteSession({ sessionId })).rejects.toMatchObject({ code: "CONFLICT" });

    gate.resolve();
    await inFlight;
  });

  it("manages sessions", async () => {
    const caller = appRouter.createCaller(createContext(services));

    const created = await caller.pipeline.createSession({ title: "Basins" });
    expect(created.title).toBe("Basins");
    expect((await caller.pipeline.listSessions()).map(s => s.sessionId)).toEqual([created.sessionId]);

    await expect(caller.pipeline.renameSession({ sessionId: created.sessionId, title: "Chad basins" })).resolves.toEqual({
      success: true,
    });
    expect((await caller.pipeline.sessionHistory({ sessionId: created.sessionId })).session.title).toBe("Chad basins");

    await expect(caller.pipeline.deleteSession({ sessionId: created.sessionId })).resolves.toEqual({ success: true });
    await expect(caller.pipeline.sessionHistory({ sessionId: created.sessionId })).rejects.toMatchObject({
      code: "NOT_FOUND",
    });
    await expect(caller.pipeline.renameSession({ sessionId: created.sessionId, title: "x" })).rejects.toMatchObject({
      code: "NOT_FOUND",
    });
  });

  it("reports the configured backend and limits", async () => {
    const caller = appRouter.createCaller(createContext(services));

    await expect(caller.pipeline.status()).resolves.toEqual({
      backend: "openai",
      baseUrl: "http://llm.test",
      models: { planner: "plan-model", "query-writer": "query-model", healer: "heal-model", synthesizer: "synth-model" },
      maxRetries: 3,
      readOnlyQueries: true,
      sessionBusyPolicy: "queue",
      schemaSource: "static",
      sessionStore: "memory",
    });
  });
});
