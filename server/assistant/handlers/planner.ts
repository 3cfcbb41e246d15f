/**
 * Generate plan — asks the model for a short, executable remediation plan and
 * stores it in the session and the plan file.
 */

import { parseModelJson } from "../../llm/modelJson";
import type { ModelClient } from "../../llm/llmService";
import { parseRemediationPlan } from "../../remediation/remediationPlan";
import { VULN_ID_COLUMN, VULN_NAME_COLUMN } from "../../vulnData/vulnerabilityTable";
import { WorkflowStep, type ConversationState } from "../conversationState";
import type { Handler } from "../services";

const SUMMARY_IN_PROMPT = 1000;
const NOT_AVAILABLE = "Not available";

async function summaryFor(
  model: ModelClient,
  existing: string | undefined,
  label: "CVE" | "CSAF",
  data: unknown
): Promise<string> {
  if (existing) return existing;
  if (data === undefined || data === null || (Array.isArray(data) && data.length === 0)) return NOT_AVAILABLE;
  try {
    return await model.ask(`Summarize the ${label} data and do not miss any important details: ${JSON.stringify(data)}`, {
      caller: `${label.toLowerCase()}-summary`,
    });
  } catch (err) {
    console.warn(`[Planner] ${label} summary failed: ${(err as Error).message}`);
    return NOT_AVAILABLE;
  }
}

export function buildPlanPrompt(
  state: ConversationState,
  vulnId: string,
  vulnName: string,
  cveSummary: string,
  csafSummary: string
): string {
  const extra = state.additionalInfo ? `\nOperator notes (paths, hosts, environment):\n${state.additionalInfo}\n` : "";
  return `Generate a SHORT, CONCISE remediation plan in JSON format for agents to fix:
Vulnerability ID: ${vulnId}
Vulnerability Name: ${vulnName}
RHSA ID: ${state.rhsaId || NOT_AVAILABLE}
CVE IDs: ${state.cveIds?.length ? state.cveIds.join(", ") : NOT_AVAILABLE}

Key CVE/CSAF details (full data available in state):
${cveSummary.slice(0, SUMMARY_IN_PROMPT)}
${csafSummary.slice(0, SUMMARY_IN_PROMPT)}
${extra}
Return ONLY valid JSON with this exact structure:
{
  "pre_checks": {
    "<check_name>": {"command": "<read-only command verifying the system is ready>", "description": "<brief description>"}
  },
  "check_packages": {
    "command": "<command to check installed package versions>",
    "description": "<brief description>"
  },
  "apply_remediation": {
    "command": "<specific patch/update command or config change>",
    "type": "<patch|update|config>",
    "description": "<brief description - refer to CVE/CSAF data for details>"
  },
  "verify_fix": {
    "command": "<command to verify vulnerability is resolved>",
    "expected_result": "<what to expect if fixed>"
  },
  "rollback_plan": {
    "command": "<command that undoes the remediation>",
    "description": "<brief description>"
  },
  "production_report": {
    "template_fields": ["vuln_id", "patch_applied", "verification_status", "notes"],
    "description": "<brief template description>"
  }
}

Keep it SHORT - only essential commands. Reference CVE/CSAF data instead of repeating details.
Reply with ONLY the JSON object, no markdown, no explanations.`;
}

export const generatePlan: Handler = async ({ state, services }) => {
  console.log("[Assistant] Generating remediation plan");
  const { model, planStore } = services;

  const row = state.vulnData;
  if (!row) {
    return {
      output: "No vulnerability data found. Please analyze the vulnerability first.\nExample: `Analyze Vuln ID 241573`",
      ok: false,
    };
  }
  const hasCve = (state.cveData?.length ?? 0) > 0;
  const hasCsaf = state.csafData !== undefined && state.csafData !== null;
  if (!hasCve && !hasCsaf) {
    return {
      output: "No CVE or CSAF data available. Please analyze the vulnerability first to fetch CVE/CSAF data.",
      ok: false,
    };
  }

  const vulnId = row[VULN_ID_COLUMN] ?? state.vulnId ?? "Unknown";
  const vulnName = row[VULN_NAME_COLUMN] ?? "Unknown";
  const cveSummary = await summaryFor(model, state.cveSummary, "CVE", state.cveData);
  const csafSummary = await summaryFor(model, state.csafSummary, "CSAF", state.csafData);

  let raw: string;
  try {
    raw = await model.ask(buildPlanPrompt(state, vulnId, vulnName, cveSummary, csafSummary), {
      caller: "remediation-planner",
      json: true,
    });
  } catch (err) {
    console.error(`[Planner] Plan generation failed: ${(err as Error).message}`);
    return { output: `Error generating remediation plan: ${(err as Error).message}`, ok: false };
  }

  let document: unknown;
  try {
    document = parseModelJson(raw);
  } catch (err) {
    console.error(`[Planner] Plan is not JSON: ${(err as Error).message}`);
    return { output: `Error: Failed to parse remediation plan as JSON. ${(err as Error).message}`, ok: false };
  }

  const parsed = parseRemediationPlan(document);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const detail = issue ? `${issue.path.join(".") || "plan"}: ${issue.message}` : "unknown error";
    return { output: `Error: Remediation plan has an invalid structure. ${detail}`, ok: false };
  }
  const plan = parsed.data;

  let savedNote = `Plan saved to: \`${planStore.location}\``;
  try {
    await planStore.save(plan);
  } catch (err) {
    console.error(`[Planner] Failed to save plan: ${(err as Error).message}`);
    savedNote = `Warning: plan could not be saved to \`${planStore.location}\`: ${(err as Error).message}`;
  }

  const lines = [
    "# Vulnerability Remediation Plan",
    "",
    `**Vulnerability ID:** ${vulnId}`,
    `**Vulnerability Name:** ${vulnName}`,
  ];
  if (state.rhsaId) lines.push(`**RHSA ID:** ${state.rhsaId}`);
  lines.push("", "---", "", "```json", JSON.stringify(plan, null, 2), "```", "", savedNote);

  return {
    output: lines.join("\n"),
    update: {
      remediationPlan: plan,
      planVulnId: vulnId,
      cveSummary: state.cveSummary || (cveSummary === NOT_AVAILABLE ? undefined : cveSummary),
      csafSummary: state.csafSummary || (csafSummary === NOT_AVAILABLE ? undefined : csafSummary),
      currentStep: WorkflowStep.GENERATE_PLAN,
    },
  };
};
