/**
 * Aquifer tRPC Router — map features and per-aquifer risk reports, read
 * straight from the graph without going through the model.
 */

import { TRPCError } from "@trpc/server";
import { z } from "zod";
import { publicProcedure, router } from "../_core/trpc";
import { GraphStoreError, PipelineAbortedError, errorMessage } from "../_core/errors";
import {
  DEFAULT_SPATIAL_LIMIT,
  PROPERTY_NAME_PATTERN,
  getRiskReport,
  getSpatialData,
  type AquiferRiskReport,
} from "./spatialService";

const objectIdSchema = z.string().trim().min(1).max(64);

function toTRPCError(err: unknown): TRPCError {
  if (err instanceof TRPCError) return err;
  if (err instanceof PipelineAbortedError) {
    return new TRPCError({ code: "CLIENT_CLOSED_REQUEST", message: err.message, cause: err });
  }
  if (err instanceof GraphStoreError && err.kind === "timeout") {
    return new TRPCError({ code: "TIMEOUT", message: err.message, cause: err });
  }
  console.error(`[Spatial] Request failed: ${errorMessage(err)}`);
  return new TRPCError({ code: "INTERNAL_SERVER_ERROR", message: "Aquifer lookup failed", cause: err });
}

export const aquiferRouter = router({
  /** Aquifers as a GeoJSON feature collection */
  spatial: publicProcedure
    .input(
      z
        .object({
          objectIds: z.array(objectIdSchema).max(5000).optional(),
          basin: z.string().trim().min(1).max(200).optional(),
          properties: z.array(z.string().regex(PROPERTY_NAME_PATTERN)).max(50).optional(),
          limit: z.number().int().min(1).max(5000).default(DEFAULT_SPATIAL_LIMIT),
        })
        .optional()
    )
    .query(async ({ ctx, input, signal }) => {
      try {
        return await getSpatialData(ctx.services.graphStore, input ?? {}, {
          timeoutMs: ctx.services.config.pipeline.timeouts.query,
          signal,
        });
      } catch (err) {
        throw toTRPCError(err);
      }
    }),

  riskReport: publicProcedure
    .input(z.object({ objectId: objectIdSchema }))
    .query(async ({ ctx, input, signal }) => {
      let report: AquiferRiskReport | null;
      try {
        report = await getRiskReport(ctx.services.graphStore, input.objectId, {
          timeoutMs: ctx.services.config.pipeline.timeouts.query,
          signal,
        });
      } catch (err) {
        throw toTRPCError(err);
      }
      if (!report) {
        throw new TRPCError({ code: "NOT_FOUND", message: `Aquifer ${input.objectId} not found` });
      }
      return report;
    }),
});
