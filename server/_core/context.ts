import type { CreateExpressContextOptions } from "@trpc/server/adapters/express";
import type { PipelineServices } from "../pipeline/orchestrator";

export type TrpcContext = {
  req: CreateExpressContextOptions["req"];
  res: CreateExpressContextOptions["res"];
  services: PipelineServices;
};

/**
 * Bind the long-lived services into a per-request context factory.
 */
export function createContextFactory(services: PipelineServices) {
  return async (opts: CreateExpressContextOptions): Promise<TrpcContext> => ({
    req: opts.req,
    res: opts.res,
    services,
  });
}
