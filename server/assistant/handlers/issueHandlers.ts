/**
 * Issue tracking — one epic per application (matched on App Code) and one
 * story per vulnerability, moved through To Do / In Progress / Done.
 */

import {
  statusForPercent,
  type IssueStatusTarget,
  type IssueTracker,
  type JiraFieldCatalog,
} from "../../jira/jiraClient";
import { buildCustomFields, findRhsaField } from "../../jira/jiraFieldMapping";
import { isEmptyPlan } from "../../remediation/remediationPlan";
import type { ModelClient } from "../../llm/llmService";
import {
  APP_CODE_COLUMN,
  APP_NAME_COLUMN,
  VULN_ID_COLUMN,
  VULN_NAME_COLUMN,
  type VulnerabilityRow,
} from "../../vulnData/vulnerabilityTable";
import { WorkflowStep, type ConversationState } from "../conversationState";
import type { Handler, HandlerResult } from "../services";

// Advisory ids (CVE-2025-1234, RHSA-2025:1234) share the KEY-123 shape
const ISSUE_KEY_PATTERN = /\b(?!CVE-|RHSA-)([A-Z][A-Z0-9]+-\d+)\b/;

export const JIRA_NOT_CONFIGURED =
  "JIRA is not configured. Set JIRA_URL, JIRA_EMAIL, JIRA_API_TOKEN and JIRA_PROJECT_KEY to track remediation progress.";

const NO_VULNERABILITY =
  "No vulnerability selected. Please analyze a vulnerability first.\nExample: `Analyze Vuln ID 241573`";

const NO_STORY = "No JIRA story found. Create one first with `Create JIRA story for this vulnerability`.";

export function resolveIssueKey(data: string, message: string, state: ConversationState): string | null {
  const match = ISSUE_KEY_PATTERN.exec(data) ?? ISSUE_KEY_PATTERN.exec(message);
  return match ? match[1] : state.storyKey || null;
}

async function loadCatalog(issues: IssueTracker): Promise<JiraFieldCatalog> {
  try {
    return await issues.getStoryFieldCatalog();
  } catch (err) {
    console.warn(`[Jira] Field metadata unavailable: ${(err as Error).message}`);
    return {};
  }
}

async function fieldsForRow(
  issues: IssueTracker,
  model: ModelClient,
  row: VulnerabilityRow,
  rhsaId: string | undefined
): Promise<Record<string, unknown>> {
  const catalog = await loadCatalog(issues);
  if (Object.keys(catalog).length === 0) return {};

  const fields = await buildCustomFields(model, row, catalog);
  if (rhsaId) {
    const rhsaField = findRhsaField(catalog);
    if (rhsaField) fields[rhsaField] = rhsaId;
  }
  return fields;
}

async function findEpicForApp(issues: IssueTracker, appCode: string): Promise<string | null> {
  const wanted = appCode.toUpperCase();
  const epics = await issues.listEpics();
  const match = epics.find(epic => epic.summary.toUpperCase().includes(wanted));
  return match ? match.key : null;
}

// ── Create ──────────────────────────────────────────────────────────────────

export const createIssue: Handler = async ({ state, services }) => {
  console.log("[Assistant] Creating JIRA story");
  const { issues, model } = services;

  if (!issues) return { output: JIRA_NOT_CONFIGURED, ok: false };
  const row = state.vulnData;
  if (!row) return { output: NO_VULNERABILITY, ok: false };

  const appCode = (row[APP_CODE_COLUMN] ?? "").trim();
  const appName = (row[APP_NAME_COLUMN] ?? "").trim();
  if (!appCode) {
    return { output: "App Code not found in the vulnerability data; cannot choose an epic for the story.", ok: false };
  }

  try {
    let epicKey = state.epicKey || (await findEpicForApp(issues, appCode));
    if (!epicKey) {
      const epic = await issues.createEpic(appName ? `${appCode} - ${appName}` : appCode, `Epic for application ${appCode}`);
      epicKey = epic.key;
    }

    if (state.storyKey) {
      return {
        output: `JIRA: Epic ${epicKey}, Story ${state.storyKey} ready.`,
        update: { epicKey, currentStep: Math.max(state.currentStep ?? 0, WorkflowStep.TRACK_ISSUE) },
      };
    }

    const vulnId = (row[VULN_ID_COLUMN] ?? state.vulnId ?? "").trim();
    const vulnName = (row[VULN_NAME_COLUMN] ?? "Vulnerability").trim();
    const solution = (row.Solution ?? "").trim();
    const fields = await fieldsForRow(issues, model, row, state.rhsaId);
    const description = solution ? `Solving the vulnerability ${vulnId}: ${vulnName} by ${solution}` : undefined;

    const story = await issues.createStory(epicKey, `Patch ${vulnId}: ${vulnName}`, fields, description);
    return {
      output: `JIRA: Epic ${epicKey}, Story ${story.key} ready.`,
      update: {
        epicKey,
        storyKey: story.key,
        currentStep: Math.max(state.currentStep ?? 0, WorkflowStep.TRACK_ISSUE),
      },
    };
  } catch (err) {
    console.error(`[Jira] Story creation failed: ${(err as Error).message}`);
    return { output: `Error creating JIRA story: ${(err as Error).message}`, ok: false };
  }
};

// ── Fetch ───────────────────────────────────────────────────────────────────

export const fetchIssue: Handler = async ({ state, services, intent, message }) => {
  const { issues } = services;
  if (!issues) return { output: JIRA_NOT_CONFIGURED, ok: false };

  const key = resolveIssueKey(intent.data, message, state);
  console.log(`[Assistant] Fetching JIRA story ${key ?? "(none)"}`);
  if (!key) return { output: NO_STORY, ok: false };

  try {
    const story = await issues.getIssue(key);
    const subtasks = await issues.listSubtasks(key);

    const lines = [
      `**${story.key}: ${story.summary}**`,
      `- Type: ${story.type}`,
      `- Status: ${story.status}`,
      `- Progress: ${story.progress.percent}% (${story.progress.progress}/${story.progress.total})`,
      "",
    ];
    if (subtasks.length === 0) {
      lines.push("No sub-tasks.");
    } else {
      lines.push("**Sub-tasks:**");
      for (const task of subtasks) lines.push(`- ${task.key}: ${task.summary} — ${task.status}`);
    }
    return { output: lines.join("\n") };
  } catch (err) {
    return { output: `Error fetching JIRA story ${key}: ${(err as Error).message}`, ok: false };
  }
};

// ── Update ──────────────────────────────────────────────────────────────────

/**
 * Target status from a percentage or status words; otherwise from the outcome
 * of the last patch run.
 */
export function resolveTargetStatus(text: string, state: ConversationState): IssueStatusTarget {
  const percent = /(\d{1,3})\s*%/.exec(text);
  if (percent) return statusForPercent(Math.min(100, parseInt(percent[1], 10)));

  const lower = text.toLowerCase();
  if (/\b(done|complete[d]?|resolved|closed|finished)\b/.test(lower)) return "Done";
  if (/\b(in progress|in-progress|started|working)\b/.test(lower)) return "In Progress";
  if (/\b(to do|todo|reopen|reopened|not started)\b/.test(lower)) return "To Do";

  if (state.patcherLogs?.length) {
    return state.patcherErrors?.length ? "In Progress" : "Done";
  }
  return isEmptyPlan(state.remediationPlan) ? "To Do" : "In Progress";
}

export const updateIssue: Handler = async ({ state, services, intent, message }): Promise<HandlerResult> => {
  const { issues, model } = services;
  if (!issues) return { output: JIRA_NOT_CONFIGURED, ok: false };

  const key = resolveIssueKey(intent.data, message, state);
  console.log(`[Assistant] Updating JIRA story ${key ?? "(none)"}`);
  if (!key) return { output: NO_STORY, ok: false };

  const target = resolveTargetStatus(`${intent.data} ${message}`, state);
  const lines: string[] = [];

  try {
    const moved = await issues.transitionTo(key, target);
    lines.push(moved ? `Story ${key} moved to ${target}.` : `No "${target}" transition is available for ${key}.`);
  } catch (err) {
    return { output: `Error updating JIRA story ${key}: ${(err as Error).message}`, ok: false };
  }

  if (state.vulnData) {
    try {
      const fields = await fieldsForRow(issues, model, state.vulnData, state.rhsaId);
      if (Object.keys(fields).length > 0) {
        await issues.updateFields(key, fields);
        lines.push(`Updated ${Object.keys(fields).length} field(s) from the vulnerability data.`);
      }
    } catch (err) {
      lines.push(`Warning: could not refresh fields: ${(err as Error).message}`);
    }
  }

  return { output: lines.join("\n"), update: { storyKey: key } };
};
