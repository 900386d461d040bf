import { router } from "./_core/trpc";
import { aquiferRouter } from "./aquifer/aquiferRouter";
import { pipelineRouter } from "./pipeline/pipelineRouter";

export const appRouter = router({
  // Question answering + chat sessions
  pipeline: pipelineRouter,
  // Map features + risk reports
  aquifer: aquiferRouter,
});

export type AppRouter = typeof appRouter;
