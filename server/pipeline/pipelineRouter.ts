/**
 * Pipeline tRPC Router — question answering and chat session management.
 */

import { TRPCError } from "@trpc/server";
import { z } from "zod";
import { publicProcedure, router } from "../_core/trpc";
import { PipelineAbortedError, SessionBusyError, SessionNotFoundError, errorMessage } from "../_core/errors";
import { runPipeline } from "./orchestrator";

const sessionIdSchema = z.string().trim().min(1).max(64);
const titleSchema = z.string().trim().min(1).max(256);

/**
 * Map pipeline errors onto tRPC codes. Anything unexpected is logged and
 * surfaced as an internal error.
 */
function toTRPCError(err: unknown): TRPCError {
  if (err instanceof TRPCError) return err;
  if (err instanceof SessionBusyError) {
    return new TRPCError({ code: "CONFLICT", message: err.message, cause: err });
  }
  if (err instanceof SessionNotFoundError) {
    return new TRPCError({ code: "NOT_FOUND", message: err.message, cause: err });
  }
  if (err instanceof PipelineAbortedError) {
    return new TRPCError({ code: "CLIENT_CLOSED_REQUEST", message: err.message, cause: err });
  }
  console.error(`[Pipeline] Request failed: ${errorMessage(err)}`);
  return new TRPCError({ code: "INTERNAL_SERVER_ERROR", message: "Pipeline request failed", cause: err });
}

export const pipelineRouter = router({
  /** Answer a question, optionally continuing a session */
  ask: publicProcedure
    .input(
      z.object({
        question: z.string().trim().min(1).max(2000),
        sessionId: sessionIdSchema.optional(),
        detailedMode: z.boolean().default(false),
      })
    )
    .mutation(async ({ ctx, input, signal }) => {
      try {
        return await runPipeline(ctx.services, input, signal);
      } catch (err) {
        throw toTRPCError(err);
      }
    }),

  createSession: publicProcedure
    .input(z.object({ title: titleSchema.optional() }).optional())
    .mutation(async ({ ctx, input }) => {
      const session = await ctx.services.sessionStore.createSession(input?.title);
      console.log(`[Sessions] Created ${session.sessionId}`);
      return session;
    }),

  listSessions: publicProcedure
    .input(z.object({ limit: z.number().int().min(1).max(200).default(50) }).optional())
    .query(({ ctx, input }) => ctx.services.sessionStore.listSessions(input?.limit ?? 50)),

  sessionHistory: publicProcedure
    .input(z.object({ sessionId: sessionIdSchema }))
    .query(async ({ ctx, input }) => {
      const session = await ctx.services.sessionStore.getSession(input.sessionId);
      if (!session) {
        throw toTRPCError(new SessionNotFoundError(input.sessionId));
      }
      const messages = await ctx.services.sessionStore.history(input.sessionId);
      return { session, messages };
    }),

  renameSession: publicProcedure
    .input(z.object({ sessionId: sessionIdSchema, title: titleSchema }))
    .mutation(async ({ ctx, input }) => {
      const renamed = await ctx.services.sessionStore.renameSession(input.sessionId, input.title);
      if (!renamed) {
        throw toTRPCError(new SessionNotFoundError(input.sessionId));
      }
      return { success: true } as const;
    }),

  deleteSession: publicProcedure
    .input(z.object({ sessionId: sessionIdSchema }))
    .mutation(async ({ ctx, input }) => {
      if (ctx.services.sessionQueue.isBusy(input.sessionId)) {
        throw toTRPCError(new SessionBusyError(input.sessionId));
      }
      const deleted = await ctx.services.sessionStore.deleteSession(input.sessionId);
      if (!deleted) {
        throw toTRPCError(new SessionNotFoundError(input.sessionId));
      }
      console.log(`[Sessions] Deleted ${input.sessionId}`);
      return { success: true } as const;
    }),

  /** Configured backend, per-role models and loop limits */
  status: publicProcedure.query(({ ctx }) => {
    const { llm, pipeline, graph } = ctx.services.config;
    return {
      backend: llm.backend,
      baseUrl: llm.baseUrl,
      models: { ...llm.models },
      maxRetries: pipeline.maxRetries,
      readOnlyQueries: pipeline.readOnlyQueries,
      sessionBusyPolicy: pipeline.sessionBusyPolicy,
      schemaSource: graph.schemaSource,
      sessionStore: ctx.services.sessionStore.mode,
    };
  }),
});
