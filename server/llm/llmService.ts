/**
 * LLM Service — Routes LLM requests to a self-hosted endpoint or falls back to built-in.
 *
 * Supports OpenAI-compatible APIs (e.g., llama.cpp, vLLM, Ollama, TGI).
 * Configuration is read from environment variables (LLM_HOST, LLM_PORT,
 * LLM_MODEL, LLM_API_KEY, LLM_PROTOCOL, LLM_ENABLED). The built-in model is the
 * Azure OpenAI deployment in _core/llm.
 */

import {
  invokeLLM as invokeBuiltInLLM,
  isBuiltInLLMConfigured,
  type InvokeParams,
  type InvokeResult,
} from "../_core/llm";
import { ENV } from "../_core/env";
import { getDb } from "../db";
import { llmUsage } from "../../drizzle/schema";

// ── Types ───────────────────────────────────────────────────────────────────

export interface LLMConfig {
  host: string;
  port: number;
  model: string;
  apiKey?: string;
  enabled: boolean;
  protocol: string;
}

export interface LLMTestResult {
  success: boolean;
  message: string;
  latencyMs: number;
  models?: string[];
}

export interface AskOptions {
  /** Component issuing the call, recorded in llm_usage */
  caller: string;
  /** Optional system message placed before the prompt */
  system?: string;
  /** Ask the endpoint for a JSON object response */
  json?: boolean;
  maxTokens?: number;
}

// ── Config Resolution ───────────────────────────────────────────────────────

/**
 * Get the effective self-hosted LLM configuration from the environment.
 */
export function getEffectiveLLMConfig(): LLMConfig {
  return {
    host: process.env.LLM_HOST ?? "",
    port: parseInt(process.env.LLM_PORT ?? "30000", 10),
    model: process.env.LLM_MODEL ?? "default",
    apiKey: process.env.LLM_API_KEY ?? "",
    enabled: process.env.LLM_ENABLED === "true",
    protocol: process.env.LLM_PROTOCOL ?? "http",
  };
}

/**
 * Check if a custom LLM is configured and enabled.
 */
export function isCustomLLMEnabled(): boolean {
  const config = getEffectiveLLMConfig();
  return config.enabled && !!config.host;
}

// ── Custom LLM Invocation ───────────────────────────────────────────────────

function buildBaseUrl(config: LLMConfig): string {
  return `${config.protocol}://${config.host}:${config.port}`;
}

/**
 * Invoke the custom LLM endpoint (OpenAI-compatible /v1/chat/completions).
 */
async function invokeCustomLLM(params: InvokeParams, config: LLMConfig): Promise<InvokeResult> {
  const url = `${buildBaseUrl(config)}/v1/chat/completions`;

  const payload: Record<string, unknown> = {
    model: config.model,
    messages: params.messages,
    max_tokens: params.maxTokens ?? 32768,
    temperature: params.temperature ?? 0.2,
  };

  if (params.responseFormat) {
    payload.response_format = params.responseFormat;
  }

  const headers: Record<string, string> = {
    "Content-Type": "application/json",
  };

  if (config.apiKey) {
    headers["Authorization"] = `Bearer ${config.apiKey}`;
  }

  const response = await fetch(url, {
    method: "POST",
    headers,
    body: JSON.stringify(payload),
    signal: AbortSignal.timeout(120_000), // 2 minute timeout for large models
  });

  if (!response.ok) {
    const errorText = await response.text();
    throw new Error(
      `Custom LLM request failed: ${response.status} ${response.statusText} — ${errorText}`
    );
  }

  return (await response.json()) as InvokeResult;
}

// ── Unified LLM Invocation ──────────────────────────────────────────────────

/**
 * Log token usage to the database. Never throws.
 */
async function logUsage(entry: {
  model: string;
  source: "custom" | "builtin" | "fallback";
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
  latencyMs: number;
  caller?: string;
  success: boolean;
  errorMessage?: string;
}): Promise<void> {
  try {
    const db = await getDb();
    if (!db) return;
    await db.insert(llmUsage).values({
      model: entry.model,
      source: entry.source,
      promptTokens: entry.promptTokens,
      completionTokens: entry.completionTokens,
      totalTokens: entry.totalTokens,
      latencyMs: entry.latencyMs,
      caller: entry.caller,
      success: entry.success ? 1 : 0,
      errorMessage: entry.errorMessage,
    });
  } catch (err) {
    console.error(`[LLM] Failed to log usage: ${(err as Error).message}`);
  }
}

function extractUsage(result: InvokeResult): { promptTokens: number; completionTokens: number; totalTokens: number } {
  return {
    promptTokens: result.usage?.prompt_tokens ?? 0,
    completionTokens: result.usage?.completion_tokens ?? 0,
    totalTokens: result.usage?.total_tokens ?? 0,
  };
}

/**
 * Invoke LLM — routes to custom endpoint if configured, otherwise falls back to built-in.
 * Logs token usage for every call.
 */
export async function invokeLLMWithFallback(params: InvokeParams & { caller?: string }): Promise<InvokeResult> {
  const config = getEffectiveLLMConfig();
  const startTime = Date.now();
  const { caller, ...invokeParams } = params;

  if (config.enabled && config.host) {
    try {
      console.log(`[LLM] Using custom endpoint: ${buildBaseUrl(config)} (model: ${config.model})`);
      const result = await invokeCustomLLM(invokeParams, config);
      await logUsage({
        model: config.model,
        source: "custom",
        ...extractUsage(result),
        latencyMs: Date.now() - startTime,
        caller,
        success: true,
      });
      return result;
    } catch (err) {
      const message = (err as Error).message;
      console.error(`[LLM] Custom endpoint failed: ${message}`);
      await logUsage({
        model: config.model,
        source: "custom",
        promptTokens: 0,
        completionTokens: 0,
        totalTokens: 0,
        latencyMs: Date.now() - startTime,
        caller,
        success: false,
        errorMessage: message,
      });

      if (!isBuiltInLLMConfigured()) throw err;

      console.log("[LLM] Falling back to built-in LLM...");
      const fallbackStart = Date.now();
      const result = await invokeBuiltInLLM(invokeParams);
      await logUsage({
        model: result.model ?? ENV.azureOpenAiModel,
        source: "fallback",
        ...extractUsage(result),
        latencyMs: Date.now() - fallbackStart,
        caller,
        success: true,
      });
      return result;
    }
  }

  const result = await invokeBuiltInLLM(invokeParams);
  await logUsage({
    model: result.model ?? ENV.azureOpenAiModel,
    source: "builtin",
    ...extractUsage(result),
    latencyMs: Date.now() - startTime,
    caller,
    success: true,
  });
  return result;
}

/**
 * Send a single prompt and return the trimmed text of the first choice.
 * Throws when the model returns no content.
 */
export async function askModel(prompt: string, options: AskOptions): Promise<string> {
  const messages: InvokeParams["messages"] = [];
  if (options.system) messages.push({ role: "system", content: options.system });
  messages.push({ role: "user", content: prompt });

  const result = await invokeLLMWithFallback({
    messages,
    maxTokens: options.maxTokens,
    responseFormat: options.json ? { type: "json_object" } : undefined,
    caller: options.caller,
  });

  const content = result.choices[0]?.message.content;
  if (!content) {
    throw new Error(`[LLM] Empty response for ${options.caller}`);
  }
  return content.trim();
}

// ── Test Connection ─────────────────────────────────────────────────────────

/**
 * Test connectivity to a custom LLM endpoint.
 * Tries /v1/models first, then a lightweight /v1/chat/completions call.
 */
export async function testLLMConnection(config: LLMConfig = getEffectiveLLMConfig()): Promise<LLMTestResult> {
  if (!config.host) {
    return { success: false, message: "Host is required", latencyMs: 0 };
  }

  const baseUrl = buildBaseUrl(config);
  const startTime = Date.now();

  const headers: Record<string, string> = {
    "Content-Type": "application/json",
  };
  if (config.apiKey) {
    headers["Authorization"] = `Bearer ${config.apiKey}`;
  }

  try {
    const modelsResponse = await fetch(`${baseUrl}/v1/models`, {
      method: "GET",
      headers,
      signal: AbortSignal.timeout(10_000),
    });

    const latencyMs = Date.now() - startTime;

    if (modelsResponse.ok) {
      const modelsData = await modelsResponse.json() as { data?: Array<{ id: string }> };
      const models = modelsData.data?.map(m => m.id) ?? [];

      return {
        success: true,
        message: `Connected to LLM at ${config.host}:${config.port} — ${models.length} model(s) available`,
        latencyMs,
        models,
      };
    }

    const completionResponse = await fetch(`${baseUrl}/v1/chat/completions`, {
      method: "POST",
      headers,
      body: JSON.stringify({
        model: config.model || "default",
        messages: [{ role: "user", content: "ping" }],
        max_tokens: 1,
      }),
      signal: AbortSignal.timeout(15_000),
    });

    const completionLatency = Date.now() - startTime;

    if (completionResponse.ok) {
      return {
        success: true,
        message: `Connected to LLM at ${config.host}:${config.port} (completions API verified)`,
        latencyMs: completionLatency,
      };
    }

    return {
      success: false,
      message: `LLM endpoint responded with status ${completionResponse.status}`,
      latencyMs: completionLatency,
    };
  } catch (err) {
    const latencyMs = Date.now() - startTime;
    const error = err as Error;

    if (error.name === "TimeoutError" || error.message?.includes("timeout")) {
      return {
        success: false,
        message: `Connection timed out after ${latencyMs}ms — is the LLM server running at ${config.host}:${config.port}?`,
        latencyMs,
      };
    }

    if (error.message?.includes("ECONNREFUSED")) {
      return {
        success: false,
        message: `Connection refused at ${config.host}:${config.port} — verify the LLM server is running and the port is correct`,
        latencyMs,
      };
    }

    return {
      success: false,
      message: `Connection error: ${error.message}`,
      latencyMs,
    };
  }
}

// ── Model Client ────────────────────────────────────────────────────────────

/**
 * Prompt-in, text-out view of the model used by the assistant. Handlers take
 * this interface so tests can substitute a scripted model.
 */
export interface ModelClient {
  ask(prompt: string, options: AskOptions): Promise<string>;
}

export const defaultModelClient: ModelClient = { ask: askModel };
