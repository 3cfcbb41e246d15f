/**
 * Analyze one vulnerability: look up the CSV row, collect advisory data
 * (Red Hat API by RHSA id, else the local CVE directory) and have the model
 * summarize it.
 */

import { extractCveIds, extractRhsaId } from "../../advisories/redhatClient";
import type { ModelClient } from "../../llm/llmService";
import { VULN_NAME_COLUMN, type VulnerabilityRow } from "../../vulnData/vulnerabilityTable";
import { vulnerabilityReset, WorkflowStep, type StateUpdate } from "../conversationState";
import type { Handler, TurnContext } from "../services";

// Keep advisory payloads within a single prompt
const MAX_PROMPT_DATA = 24_000;

const VULN_ID_IN_TEXT = /vuln(?:erability)?\s*id\s*[:#]?\s*([A-Za-z0-9_-]+)/i;

export function resolveVulnId(data: string, message: string): string | null {
  const fromData = data.trim();
  if (fromData) return fromData;
  const match = VULN_ID_IN_TEXT.exec(message);
  if (match) return match[1];
  const bareNumber = /\b(\d{3,})\b/.exec(message);
  return bareNumber ? bareNumber[1] : null;
}

function serializeForPrompt(data: unknown): string {
  const json = JSON.stringify(data);
  return json.length > MAX_PROMPT_DATA ? `${json.slice(0, MAX_PROMPT_DATA)}…` : json;
}

async function summarize(model: ModelClient, label: "CVE" | "CSAF", data: unknown): Promise<string> {
  try {
    return await model.ask(
      `Summarize the ${label} data and do not miss any important details: ${serializeForPrompt(data)}`,
      { caller: `${label.toLowerCase()}-summary` }
    );
  } catch (err) {
    console.warn(`[Assistant] ${label} summary failed: ${(err as Error).message}`);
    return "";
  }
}

interface AdvisoryData {
  cveData: unknown[];
  csafData: unknown | null;
  cveIds: string[];
}

async function collectAdvisoryData(ctx: TurnContext, rhsaId: string | null, cveIds: string[]): Promise<AdvisoryData> {
  const { advisories } = ctx.services;
  if (rhsaId) {
    const bundle = await advisories.fetchByRhsa(rhsaId);
    const ids = bundle.cveIds.length > 0 ? [...bundle.cveIds].sort() : cveIds;
    return { cveData: bundle.cveData, csafData: bundle.csafData, cveIds: ids };
  }
  if (cveIds.length > 0) {
    return { cveData: await advisories.loadLocalCves(cveIds), csafData: null, cveIds };
  }
  return { cveData: [], csafData: null, cveIds };
}

export const analyzeVulnerability: Handler = async ctx => {
  const { services, intent, message } = ctx;
  const vulnId = resolveVulnId(intent.data, message);
  console.log(`[Assistant] Analyzing vulnerability ${vulnId ?? "(none)"}`);

  if (!vulnId) {
    return {
      output: "Please provide the Vuln ID to analyze.\nExample: `Analyze Vuln ID 241573`",
      ok: false,
    };
  }

  let row: VulnerabilityRow | null;
  try {
    row = await services.vulnTable.getById(vulnId);
  } catch (err) {
    return { output: `Could not read the vulnerability data: ${(err as Error).message}`, ok: false };
  }
  if (!row) {
    return {
      output: `Vuln ID ${vulnId} was not found in the vulnerability data. Use \`list vulnerabilities\` to see available IDs.`,
      ok: false,
    };
  }

  const rowText = Object.values(row).join(" ");
  const rhsaId = extractRhsaId(rowText);
  // CVE ids added by the operator for this same vulnerability are kept
  const addedCveIds = ctx.state.vulnId === vulnId ? (ctx.state.cveIds ?? []) : [];
  const rowCveIds = Array.from(new Set([...extractCveIds(rowText), ...addedCveIds])).sort();
  const vulnName = row[VULN_NAME_COLUMN] ?? "";

  const switched = ctx.state.vulnId !== undefined && ctx.state.vulnId !== vulnId;
  if (switched) console.log(`[Assistant] Switching from vulnerability ${ctx.state.vulnId} to ${vulnId}`);

  const selection: StateUpdate = {
    ...(switched ? vulnerabilityReset() : {}),
    vulnId,
    vulnData: row,
    rhsaId: rhsaId ?? "",
    cveIds: rowCveIds,
  };

  let advisory: AdvisoryData;
  try {
    advisory = await collectAdvisoryData(ctx, rhsaId, rowCveIds);
  } catch (err) {
    console.error(`[Assistant] Advisory fetch failed for ${rhsaId}: ${(err as Error).message}`);
    return {
      output: `Error fetching CVE/CSAF data for RHSA ID ${rhsaId}: ${(err as Error).message}\nYou can add CVE IDs manually, e.g. \`Add CVE-2025-47273\`.`,
      update: selection,
      ok: false,
    };
  }

  if (advisory.cveData.length === 0 && !advisory.csafData) {
    const reason = rhsaId
      ? `No CVE or CSAF data was returned for ${rhsaId}.`
      : advisory.cveIds.length > 0
        ? `No CVE records found in the local database for ${advisory.cveIds.join(", ")}.`
        : "No RHSA ID or CVE IDs were found in the vulnerability record.";
    return {
      output: `${reason}\nProvide CVE IDs or extra context with a message like \`Add CVE-2025-47273\`, then analyze again.`,
      update: { ...selection, cveIds: advisory.cveIds },
      ok: false,
    };
  }

  const cveSummary = advisory.cveData.length > 0 ? await summarize(services.model, "CVE", advisory.cveData) : "";
  const csafSummary = advisory.csafData ? await summarize(services.model, "CSAF", advisory.csafData) : "";

  const lines = [`## Vulnerability ${vulnId}${vulnName ? `: ${vulnName}` : ""}`, ""];
  if (rhsaId) lines.push(`**RHSA ID:** ${rhsaId}`);
  if (advisory.cveIds.length > 0) lines.push(`**CVE IDs:** ${advisory.cveIds.join(", ")}`);
  lines.push(`**CVE records:** ${advisory.cveData.length}${advisory.csafData ? " (CSAF document available)" : ""}`);
  if (cveSummary) lines.push("", "### CVE Summary", cveSummary);
  if (csafSummary) lines.push("", "### CSAF Summary", csafSummary);
  lines.push("", "Next: `Create JIRA story for this vulnerability` or `Generate plan`.");

  return {
    output: lines.join("\n"),
    update: {
      ...selection,
      cveIds: advisory.cveIds,
      cveData: advisory.cveData,
      csafData: advisory.csafData,
      cveSummary,
      csafSummary,
      currentStep: WorkflowStep.ANALYZE_VULNERABILITY,
    },
  };
};
