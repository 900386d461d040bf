import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { FakeModelGateway } from "../testing/fakes";
import { pendingPairs, refreshSummary } from "./conversationSummary";
import { InMemorySessionStore } from "./sessionStore";

const pairs = (n: number) => Array.from({ length: n }, (_, i) => ({ question: `q${i + 1}`, answer: `a${i + 1}` }));

describe("pendingPairs", () => {
  it("returns the uncovered pairs older than the history window", () => {
    expect(pendingPairs(pairs(6), 0, 3)).toEqual(pairs(3));
    expect(pendingPairs(pairs(6), 2, 3)).toEqual([{ question: "q3", answer: "a3" }]);
  });

  it("is empty when everything outside the window is covered", () => {
    expect(pendingPairs(pairs(6), 3, 3)).toEqual([]);
    expect(pendingPairs(pairs(2), 0, 3)).toEqual([]);
  });
});

describe("refreshSummary", () => {
  let store: InMemorySessionStore;
  let gateway: FakeModelGateway;
  let sessionId: string;

  async function ask(n: number) {
    await store.appendExchange(sessionId, { question: `q${n}`, answerText: `a${n}` });
  }

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    store = new InMemorySessionStore();
    gateway = new FakeModelGateway();
    ({ sessionId } = await store.createSession("Chad"));
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("summarizes once enough pairs have left the window, then builds on the previous summary", async () => {
    const settings = { historyPairs: 1, summaryTriggerPairs: 2 };
    gateway.script("synthesizer", "  Asked about Chad and Niger.  ", "Asked about Chad, Niger and Mali.");
    for (const n of [1, 2, 3]) await ask(n);

    await expect(refreshSummary(store, gateway, sessionId, settings)).resolves.toEqual({
      text: "Asked about Chad and Niger.",
      pairsCovered: 2,
    });
    expect(gateway.calls[0].prompt).toBe(
      "## Previous summary\n(none)\n\n## New exchanges\nUser: q1\nAssistant: a1\n\nUser: q2\nAssistant: a2"
    );

    await ask(4);
    await expect(refreshSummary(store, gateway, sessionId, settings)).resolves.toBeNull();
    expect(gateway.calls).toHaveLength(1);

    await ask(5);
    await refreshSummary(store, gateway, sessionId, settings);
    expect(gateway.calls[1].prompt).toBe(
      "## Previous summary\nAsked about Chad and Niger.\n\n## New exchanges\nUser: q3\nAssistant: a3\n\nUser: q4\nAssistant: a4"
    );
    await expect(store.getSummary(sessionId)).resolves.toEqual({
      text: "Asked about Chad, Niger and Mali.",
      pairsCovered: 4,
    });
  });

  it("does nothing when summaries are disabled", async () => {
    for (const n of [1, 2, 3, 4]) await ask(n);

    await expect(refreshSummary(store, gateway, sessionId, { historyPairs: 1, summaryTriggerPairs: 0 })).resolves.toBeNull();
    expect(gateway.calls).toHaveLength(0);
  });

  it("keeps the previous summary when the model returns nothing", async () => {
    gateway.script("synthesizer", "   ");
    for (const n of [1, 2]) await ask(n);

    await expect(refreshSummary(store, gateway, sessionId, { historyPairs: 1, summaryTriggerPairs: 1 })).resolves.toBeNull();
    await expect(store.getSummary(sessionId)).resolves.toBeNull();
  });
});
