/**
 * LLM Router — model health and token usage.
 *
 * - healthCheck: which model answers assistant prompts, and whether it is reachable
 * - usageStats: aggregated token usage for a time range
 * - recentCalls: paginated list of recent model invocations
 */

import { z } from "zod";
import { and, desc, eq, gte, sql } from "drizzle-orm";
import { publicProcedure, router } from "../_core/trpc";
import { isBuiltInLLMConfigured } from "../_core/llm";
import { ENV } from "../_core/env";
import { getDb } from "../db";
import { llmUsage } from "../../drizzle/schema";
import { getEffectiveLLMConfig, testLLMConnection } from "./llmService";

export type UsageRange = "today" | "7d" | "30d" | "all";

const EMPTY_STATS = {
  totalRequests: 0,
  totalPromptTokens: 0,
  totalCompletionTokens: 0,
  totalTokens: 0,
  avgLatencyMs: 0,
  failedRequests: 0,
  customEndpointRequests: 0,
  builtInRequests: 0,
  fallbackCount: 0,
};

const DAY_MS = 24 * 60 * 60 * 1000;

export function rangeCutoff(range: UsageRange, now: Date = new Date()): Date | null {
  switch (range) {
    case "today":
      return new Date(now.getFullYear(), now.getMonth(), now.getDate());
    case "7d":
      return new Date(now.getTime() - 7 * DAY_MS);
    case "30d":
      return new Date(now.getTime() - 30 * DAY_MS);
    case "all":
      return null;
  }
}

export interface LLMHealth {
  status: "online" | "offline" | "builtin" | "unconfigured";
  latencyMs: number;
  model: string;
  endpoint: string;
  message: string;
}

/**
 * The self-hosted endpoint is probed when enabled; otherwise the built-in
 * deployment is reported without a call.
 */
export async function checkLLMHealth(): Promise<LLMHealth> {
  const config = getEffectiveLLMConfig();

  if (config.enabled && config.host) {
    const endpoint = `${config.protocol}://${config.host}:${config.port}`;
    const result = await testLLMConnection(config);
    return {
      status: result.success ? "online" : "offline",
      latencyMs: result.latencyMs,
      model: config.model,
      endpoint,
      message: result.message,
    };
  }

  if (isBuiltInLLMConfigured()) {
    return {
      status: "builtin",
      latencyMs: 0,
      model: ENV.azureOpenAiModel,
      endpoint: ENV.azureOpenAiEndpoint,
      message: "Using the built-in Azure OpenAI deployment",
    };
  }

  return {
    status: "unconfigured",
    latencyMs: 0,
    model: "",
    endpoint: "",
    message: "No model configured. Set AZURE_OPENAI_* or LLM_HOST with LLM_ENABLED=true.",
  };
}

export const llmRouter = router({
  healthCheck: publicProcedure.query(() => checkLLMHealth()),

  usageStats: publicProcedure
    .input(
      z.object({
        range: z.enum(["today", "7d", "30d", "all"]).default("today"),
      })
    )
    .query(async ({ input }) => {
      const db = await getDb();
      if (!db) return { ...EMPTY_STATS };

      const cutoff = rangeCutoff(input.range);
      const conditions = cutoff ? [gte(llmUsage.createdAt, cutoff)] : [];

      const result = await db
        .select({
          totalRequests: sql<number>`COUNT(*)`,
          totalPromptTokens: sql<number>`COALESCE(SUM(${llmUsage.promptTokens}), 0)`,
          totalCompletionTokens: sql<number>`COALESCE(SUM(${llmUsage.completionTokens}), 0)`,
          totalTokens: sql<number>`COALESCE(SUM(${llmUsage.totalTokens}), 0)`,
          avgLatencyMs: sql<number>`COALESCE(ROUND(AVG(${llmUsage.latencyMs})), 0)`,
          failedRequests: sql<number>`SUM(CASE WHEN ${llmUsage.success} = 0 THEN 1 ELSE 0 END)`,
          customEndpointRequests: sql<number>`SUM(CASE WHEN ${llmUsage.source} = 'custom' THEN 1 ELSE 0 END)`,
          builtInRequests: sql<number>`SUM(CASE WHEN ${llmUsage.source} = 'builtin' THEN 1 ELSE 0 END)`,
          fallbackCount: sql<number>`SUM(CASE WHEN ${llmUsage.source} = 'fallback' THEN 1 ELSE 0 END)`,
        })
        .from(llmUsage)
        .where(conditions.length > 0 ? and(...conditions) : undefined);

      return result[0] ?? { ...EMPTY_STATS };
    }),

  /**
   * Recent model calls, newest first. `caller` narrows to one component
   * (e.g. "intent-classifier", "step-analysis").
   */
  recentCalls: publicProcedure
    .input(
      z.object({
        limit: z.number().int().min(1).max(100).default(25),
        offset: z.number().int().min(0).default(0),
        caller: z.string().max(64).optional(),
      })
    )
    .query(async ({ input }) => {
      const db = await getDb();
      if (!db) return { calls: [], total: 0 };

      const filter = input.caller ? eq(llmUsage.caller, input.caller) : undefined;
      const [calls, countResult] = await Promise.all([
        db.select().from(llmUsage).where(filter).orderBy(desc(llmUsage.createdAt)).limit(input.limit).offset(input.offset),
        db.select({ count: sql<number>`COUNT(*)` }).from(llmUsage).where(filter),
      ]);

      return {
        calls,
        total: countResult[0]?.count ?? 0,
      };
    }),
});
