/**
 * Built-in LLM — Azure OpenAI chat completions deployment.
 *
 * Request and response shapes follow the OpenAI /chat/completions API so the
 * self-hosted path in llm/llmService can reuse them unchanged.
 */

import { ENV } from "./env";

export type Role = "system" | "user" | "assistant";

export interface Message {
  role: Role;
  content: string;
}

export type ResponseFormat = { type: "text" } | { type: "json_object" };

export interface InvokeParams {
  messages: Message[];
  maxTokens?: number;
  temperature?: number;
  responseFormat?: ResponseFormat;
}

export interface InvokeResult {
  id: string;
  created: number;
  model?: string;
  choices: Array<{
    index: number;
    message: { role: Role; content: string | null };
    finish_reason: string | null;
  }>;
  usage?: {
    prompt_tokens?: number;
    completion_tokens?: number;
    total_tokens?: number;
  };
}

export function isBuiltInLLMConfigured(): boolean {
  return !!ENV.azureOpenAiEndpoint && !!ENV.azureOpenAiApiKey && !!ENV.azureOpenAiModel;
}

function buildDeploymentUrl(): string {
  const deployment = encodeURIComponent(ENV.azureOpenAiModel);
  const version = encodeURIComponent(ENV.azureOpenAiApiVersion);
  return `${ENV.azureOpenAiEndpoint}/openai/deployments/${deployment}/chat/completions?api-version=${version}`;
}

export async function invokeLLM(params: InvokeParams): Promise<InvokeResult> {
  if (!isBuiltInLLMConfigured()) {
    throw new Error("Built-in LLM is not configured. Set AZURE_OPENAI_ENDPOINT, AZURE_OPENAI_API_KEY and AZURE_OPENAI_MODEL.");
  }

  const payload: Record<string, unknown> = {
    messages: params.messages,
    max_tokens: params.maxTokens ?? 4096,
  };
  if (params.temperature !== undefined) payload.temperature = params.temperature;
  if (params.responseFormat) payload.response_format = params.responseFormat;

  const response = await fetch(buildDeploymentUrl(), {
    method: "POST",
    headers: {
      "Content-Type": "application/json",
      "api-key": ENV.azureOpenAiApiKey,
    },
    body: JSON.stringify(payload),
    signal: AbortSignal.timeout(120_000),
  });

  if (!response.ok) {
    const errorText = await response.text();
    throw new Error(`LLM invoke failed: ${response.status} ${response.statusText} — ${errorText}`);
  }

  return (await response.json()) as InvokeResult;
}
