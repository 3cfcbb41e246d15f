/**
 * Add details — operator-supplied CVE ids, environment notes and plan edits.
 */

import { z } from "zod";
import { extractCveIds } from "../../advisories/redhatClient";
import { parseModelOutput } from "../../llm/modelJson";
import {
  changedStages,
  isEmptyPlan,
  isPlainObject,
  mergePlanUpdate,
  parseRemediationPlan,
  type RemediationPlan,
} from "../../remediation/remediationPlan";
import type { ConversationState, StateUpdate } from "../conversationState";
import type { Handler } from "../services";

const INFO_SEPARATOR = "\n\n---\n\n";
const PREVIEW_LENGTH = 200;

const detailsReplySchema = z.object({
  update_cve_ids: z.boolean().optional(),
  cve_ids: z.array(z.string()).nullish(),
  update_additional_info: z.boolean().optional(),
  additional_info: z.string().nullish(),
  update_remediation_plan: z.boolean().optional(),
  remediation_plan_changes: z.unknown().optional(),
});

type DetailsReply = z.infer<typeof detailsReplySchema>;

function buildDetailsPrompt(message: string, state: ConversationState): string {
  const planJson = !isEmptyPlan(state.remediationPlan) ? JSON.stringify(state.remediationPlan, null, 2).slice(0, 500) : "None";
  return `Analyze the user's message and determine which state variables should be updated.

Available state variables:
1. cve_ids: A list of CVE ID strings (e.g., ["CVE-2025-47273", "CVE-2025-47222"])
2. additional_info: A string containing additional information like application paths, package paths, system details, etc.
3. remediation_plan: A JSON object containing a remediation plan with keys like pre_checks, check_packages, apply_remediation, verify_fix, rollback_plan, production_report

Current state:
- cve_ids: ${state.cveIds?.length ? state.cveIds.join(", ") : "None"}
- additional_info: ${state.additionalInfo ? state.additionalInfo.slice(0, 200) : "None"}
- remediation_plan: ${planJson}

User message: '''${message}'''

Extract ONLY the NEW values from the user's message. For remediation plan changes return only the sections to change,
in the same structure as the plan (a section set to null removes it).

Return ONLY a valid JSON object in this exact format:
{
  "update_cve_ids": <true or false>,
  "cve_ids": <list of NEW CVE ID strings, or null>,
  "update_additional_info": <true or false>,
  "additional_info": <string with NEW additional info, or null>,
  "update_remediation_plan": <true or false>,
  "remediation_plan_changes": <object with the plan sections to change, or null>
}`;
}

function mergeCveIds(existing: string[] | undefined, added: string[]): string[] {
  return Array.from(new Set([...(existing ?? []), ...added.map(id => id.toUpperCase())])).sort();
}

function appendInfo(existing: string | undefined, added: string): string {
  return existing ? `${existing}${INFO_SEPARATOR}${added}` : added;
}

function applyPlanChanges(existing: RemediationPlan | undefined, changes: Record<string, unknown>): RemediationPlan {
  if (existing) return mergePlanUpdate(existing, changes);
  const parsed = parseRemediationPlan(changes);
  if (!parsed.success) {
    throw new Error(parsed.error.issues[0]?.message ?? "invalid plan");
  }
  return parsed.data;
}

/**
 * Updates derived without the model: CVE ids by pattern, otherwise the whole
 * message becomes additional info.
 */
export function fallbackDetails(message: string, state: ConversationState): StateUpdate {
  const cveIds = extractCveIds(message);
  if (cveIds.length > 0) return { cveIds: mergeCveIds(state.cveIds, cveIds) };
  const text = message.trim();
  return text ? { additionalInfo: appendInfo(state.additionalInfo, text) } : {};
}

function updatesFromReply(reply: DetailsReply, state: ConversationState): StateUpdate {
  const update: StateUpdate = {};

  if (reply.update_cve_ids && reply.cve_ids?.length) {
    const valid = reply.cve_ids.filter(id => /^CVE-\d{4}-\d{4,}$/i.test(id.trim())).map(id => id.trim());
    if (valid.length > 0) update.cveIds = mergeCveIds(state.cveIds, valid);
  }

  if (reply.update_additional_info && reply.additional_info?.trim()) {
    update.additionalInfo = appendInfo(state.additionalInfo, reply.additional_info.trim());
  }

  if (reply.update_remediation_plan && isPlainObject(reply.remediation_plan_changes)) {
    update.remediationPlan = applyPlanChanges(state.remediationPlan, reply.remediation_plan_changes);
    if (state.vulnId) update.planVulnId = state.vulnId;
  }

  return update;
}

function describeUpdates(update: StateUpdate, previousPlan: RemediationPlan | undefined): string {
  const lines = ["Details added successfully:\n"];

  if (update.cveIds) {
    lines.push(`✓ CVE IDs: ${update.cveIds.join(", ")}`);
  }

  if (update.additionalInfo) {
    const preview = update.additionalInfo.length > PREVIEW_LENGTH
      ? `${update.additionalInfo.slice(0, PREVIEW_LENGTH)}...`
      : update.additionalInfo;
    lines.push(`✓ Additional Information: ${preview}`);
  }

  if (update.remediationPlan) {
    const sections = Object.keys(update.remediationPlan);
    if (!isEmptyPlan(previousPlan)) {
      const changed = changedStages(previousPlan, update.remediationPlan);
      lines.push(
        changed.length > 0
          ? `✓ Remediation Plan: Updated sections (${changed.join(", ")})`
          : "✓ Remediation Plan: No changes"
      );
    } else {
      lines.push(`✓ Remediation Plan: Created with ${sections.length} sections (${sections.join(", ")})`);
    }
  }

  return lines.join("\n");
}

export const addDetails: Handler = async ({ message, state, services }) => {
  console.log("[Assistant] Adding details");

  if (!message.trim()) {
    return { output: "No input provided to add details.", ok: false };
  }

  let reply: DetailsReply | null = null;
  try {
    const raw = await services.model.ask(buildDetailsPrompt(message, state), { caller: "add-details", json: true });
    const parsed = parseModelOutput(raw, detailsReplySchema);
    if (parsed.ok) {
      reply = parsed.value;
    } else {
      console.warn(`[Assistant] Details reply unusable (${parsed.error}); using pattern extraction`);
    }
  } catch (err) {
    console.warn(`[Assistant] Details extraction failed (${(err as Error).message}); using pattern extraction`);
  }

  let update: StateUpdate;
  if (reply) {
    try {
      update = updatesFromReply(reply, state);
    } catch (err) {
      return { output: `Could not apply the plan changes: ${(err as Error).message}`, ok: false };
    }
  } else {
    update = fallbackDetails(message, state);
  }

  if (Object.keys(update).length === 0) {
    return {
      output:
        "I couldn't identify any details to add from your input. Please provide CVE IDs (format: CVE-YYYY-NNNNN), additional information like paths, system details, or a remediation plan (JSON format).",
      ok: false,
    };
  }

  if (update.remediationPlan) {
    try {
      await services.planStore.save(update.remediationPlan);
    } catch (err) {
      console.warn(`[Assistant] Could not save updated plan: ${(err as Error).message}`);
    }
  }

  return { output: describeUpdates(update, state.remediationPlan), update };
};
