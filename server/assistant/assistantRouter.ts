/**
 * Assistant Router — chat turns, session state and transcript.
 */

import { z } from "zod";
import { nanoid } from "nanoid";
import { publicProcedure, router } from "../_core/trpc";
import { runTurn } from "./assistantGraph";
import { WORKFLOW_STEPS } from "./conversationState";
import { INTENTS } from "./intentClassifier";
import { createDefaultServices, type AssistantServices } from "./services";

const sessionIdSchema = z.string().min(1).max(64);

/**
 * Build the router over a set of services. The app router uses the default
 * services; tests pass fakes.
 */
export function createAssistantRouter(getServices: () => AssistantServices = createDefaultServices) {
  return router({
    chat: publicProcedure
      .input(
        z.object({
          sessionId: sessionIdSchema.optional(),
          message: z.string().min(1).max(10_000),
        })
      )
      .mutation(({ input }) => runTurn(getServices(), input.sessionId ?? nanoid(), input.message)),

    newSession: publicProcedure.mutation(() => ({ sessionId: nanoid() })),

    state: publicProcedure.input(z.object({ sessionId: sessionIdSchema })).query(async ({ input }) => {
      const state = await getServices().store.load(input.sessionId);
      return { sessionId: input.sessionId, exists: state !== null, state: state ?? {} };
    }),

    history: publicProcedure
      .input(
        z.object({
          sessionId: sessionIdSchema,
          limit: z.number().int().min(1).max(500).default(200),
        })
      )
      .query(async ({ input }) => {
        const messages = await getServices().store.history(input.sessionId, input.limit);
        return { sessionId: input.sessionId, messages };
      }),

    /** Workflow steps and intents, for rendering progress */
    workflow: publicProcedure.query(() => ({
      steps: WORKFLOW_STEPS.map((name, index) => ({ index, name })),
      intents: [...INTENTS],
    })),
  });
}

export const assistantRouter = createAssistantRouter();
