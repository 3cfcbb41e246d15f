import { router } from "./_core/trpc";
import { assistantRouter } from "./assistant/assistantRouter";
import { llmRouter } from "./llm/llmRouter";

export const appRouter = router({
  // Conversational remediation workflow
  assistant: assistantRouter,

  // Model health monitoring and token usage tracking
  llm: llmRouter,
});

export type AppRouter = typeof appRouter;
