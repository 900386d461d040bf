import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { TrpcContext } from "../_core/context";
import { GraphStoreError } from "../_core/errors";
import { appRouter } from "../routers";
import { FakeGraphStore, createTestServices } from "../testing/fakes";

describe("aquifer router", () => {
  let graphStore: FakeGraphStore;
  let caller: ReturnType<typeof appRouter.createCaller>;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    graphStore = new FakeGraphStore();
    const ctx: TrpcContext = {
      req: { protocol: "https", headers: {} } as TrpcContext["req"],
      res: {} as TrpcContext["res"],
      services: createTestServices({ graphStore }),
    };
    caller = appRouter.createCaller(ctx);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns map features for a basin", async () => {
    graphStore.defaultRows = [{ OBJECTID: 1, Location: { type: "Point", coordinates: [14, 13] }, Recharge: 0.1 }];

    const collection = await caller.aquifer.spatial({ basin: "Lake Chad" });

    expect(collection.type).toBe("FeatureCollection");
    expect(collection.features[0].properties).toMatchObject({ Recharge_risk: "low_risk" });
    expect(graphStore.executed[0]).toContain("LIMIT 2000");
    expect(graphStore.parameters).toEqual([{ basin: "Lake Chad" }]);
  });

  it("rejects a property name that is not an identifier", async () => {
    await expect(caller.aquifer.spatial({ properties: ["a.b"] })).rejects.toMatchObject({ code: "BAD_REQUEST" });
    expect(graphStore.executed).toHaveLength(0);
  });

  it("maps a query timeout to TIMEOUT", async () => {
    graphStore.on("MATCH (a:Aquifer)", new GraphStoreError("timeout", "Query timed out after 30000ms"));

    await expect(caller.aquifer.spatial()).rejects.toMatchObject({
      code: "TIMEOUT",
      message: "Query timed out after 30000ms",
    });
  });

  it("returns a risk report or NOT_FOUND", async () => {
    graphStore.on("$objectId", [{ OBJECTID: 5, Depth: 500 }], []);

    await expect(caller.aquifer.riskReport({ objectId: "5" })).resolves.toMatchObject({
      objectId: "5",
      report: { Depth: { value: 500, unit: "m", risk: "high_risk" } },
    });
    await expect(caller.aquifer.riskReport({ objectId: "6" })).rejects.toMatchObject({
      code: "NOT_FOUND",
      message: "Aquifer 6 not found",
    });
  });
});
