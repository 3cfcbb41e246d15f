/**
 * Intent classifier — turns one operator message into an intent label and a
 * short data payload (vulnerability id, issue key, shell command, …).
 */

import { z } from "zod";
import type { ModelClient } from "../llm/llmService";
import { parseModelOutput } from "../llm/modelJson";

export const INTENTS = [
  "LIST_VULNS",
  "ANALYZE_VULN",
  "ADD_DETAILS",
  "CREATE_JIRA_STORY",
  "FETCH_JIRA_STORY",
  "UPDATE_JIRA_STORY",
  "QUERY_GRAPHDB",
  "GENERATE_PLAN",
  "PATCH_VULN",
  "RUN_COMMAND",
  "HELP",
  "OTHER",
] as const;

export type Intent = (typeof INTENTS)[number];

export interface IntentResult {
  intent: Intent;
  data: string;
}

export const FALLBACK_INTENT: IntentResult = { intent: "OTHER", data: "" };

const INTENT_DESCRIPTIONS: Record<Intent, string> = {
  LIST_VULNS: "user wants to see vulnerabilities",
  ANALYZE_VULN: "user wants to analyze or resolve a specific vulnerability; data = the Vuln ID number",
  ADD_DETAILS: "user provides CVE IDs, paths, system details or changes to the remediation plan",
  CREATE_JIRA_STORY: "user wants a JIRA story created for the vulnerability",
  FETCH_JIRA_STORY: "user wants JIRA story, sub-task details or status; data = issue key if given",
  UPDATE_JIRA_STORY: "user wants the JIRA story status or progress updated; data = percent or status if given",
  QUERY_GRAPHDB: "user asks about blast radius, impacted hosts/apps or responsible teams",
  GENERATE_PLAN: "user wants a remediation plan generated",
  PATCH_VULN: "user wants the remediation plan executed / the vulnerability patched",
  RUN_COMMAND: "user gives an explicit shell command to run on the server; data = the command",
  HELP: "user asks what the assistant can do",
  OTHER: "anything else",
};

const intentReplySchema = z.object({
  intent: z.string(),
  data: z.union([z.string(), z.number()]).nullish(),
});

export function isIntent(value: string): value is Intent {
  return INTENTS.some(intent => intent === value);
}

export function buildClassifierPrompt(message: string): string {
  const options = INTENTS.map(intent => `- ${intent}: ${INTENT_DESCRIPTIONS[intent]}`).join("\n");
  return [
    "Analyze the user's message and classify their intent.",
    "Possible intents:",
    options,
    "Reply with ONLY a valid JSON object in this exact format:",
    '{"intent": "<intent>", "data": "<data>"}',
    "Set 'data' to an empty string when the intent carries no data.",
    `Message: '''${message}'''`,
  ].join("\n");
}

/**
 * Classify a message. Never throws: model errors, unparseable replies and
 * unknown labels all yield OTHER with empty data.
 */
export async function classifyIntent(model: ModelClient, message: string): Promise<IntentResult> {
  if (!message.trim()) return { ...FALLBACK_INTENT };

  let raw: string;
  try {
    raw = await model.ask(buildClassifierPrompt(message), { caller: "intent-classifier", json: true });
  } catch (err) {
    console.warn(`[Assistant] Intent classification failed: ${(err as Error).message}`);
    return { ...FALLBACK_INTENT };
  }

  const parsed = parseModelOutput(raw, intentReplySchema);
  if (!parsed.ok) {
    console.warn(`[Assistant] Unparseable intent reply: ${parsed.error}`);
    return { ...FALLBACK_INTENT };
  }

  const intent = parsed.value.intent.trim().toUpperCase();
  if (!isIntent(intent) || intent === "OTHER") {
    return { ...FALLBACK_INTENT };
  }

  const data = parsed.value.data;
  return { intent, data: data === null || data === undefined ? "" : String(data).trim() };
}
