/**
 * Conversation state — the per-session record every handler reads from and
 * contributes a partial update to. Fields are optional and are never removed
 * within a session; a turn's update is merged over the previous state.
 */

import { z } from "zod";
import { remediationPlanSchema } from "../remediation/remediationPlan";
import type { ExecutionLogEntry } from "../remediation/stepExecutor";

export const WORKFLOW_STEPS = [
  "Start",
  "List vulnerabilities",
  "Analyze vulnerability",
  "Track issue",
  "Generate plan",
  "System pre-checks",
  "Patch",
  "Verify",
  "Report",
  "Done",
] as const;

export type WorkflowStepName = (typeof WORKFLOW_STEPS)[number];

export const WorkflowStep = {
  START: 0,
  LIST_VULNERABILITIES: 1,
  ANALYZE_VULNERABILITY: 2,
  TRACK_ISSUE: 3,
  GENERATE_PLAN: 4,
  PRE_CHECKS: 5,
  PATCH: 6,
  VERIFY: 7,
  REPORT: 8,
  DONE: 9,
} as const;

const attemptSchema = z.object({
  attempt: z.number(),
  command: z.string(),
  status: z.enum(["success", "error"]),
  output: z.string().optional(),
  error: z.string().optional(),
  analysis: z
    .object({ success: z.boolean(), needsRetry: z.boolean(), updatedCommand: z.string(), reason: z.string() })
    .optional(),
  resolution: z.object({ updatedCommand: z.string(), reason: z.string() }).optional(),
  analysisError: z.string().optional(),
  resolutionError: z.string().optional(),
});

export const executionLogEntrySchema = z.object({
  step: z.string(),
  command: z.string(),
  description: z.string(),
  status: z.enum(["pending", "success", "partial_success", "error"]),
  attempts: z.array(attemptSchema),
  output: z.string().optional(),
  error: z.string().optional(),
  analysis: z.string().optional(),
}) satisfies z.ZodType<ExecutionLogEntry>;

export const patcherErrorSchema = z.object({
  step: z.string(),
  error: z.string(),
  suggestion: z.string(),
  reasoning: z.string(),
});

export type PatcherError = z.infer<typeof patcherErrorSchema>;

export const conversationStateSchema = z.object({
  userInput: z.string().optional(),
  intent: z.string().optional(),
  intentData: z.string().optional(),
  output: z.string().optional(),

  vulnId: z.string().optional(),
  vulnData: z.record(z.string(), z.string()).optional(),
  rhsaId: z.string().optional(),
  cveIds: z.array(z.string()).optional(),
  cveData: z.array(z.unknown()).optional(),
  csafData: z.unknown().optional(),
  cveSummary: z.string().optional(),
  csafSummary: z.string().optional(),
  additionalInfo: z.string().optional(),

  remediationPlan: remediationPlanSchema.optional(),
  /** Vuln ID the plan was written for; empty once the plan no longer applies. */
  planVulnId: z.string().optional(),

  epicKey: z.string().optional(),
  storyKey: z.string().optional(),

  graphResult: z.unknown().optional(),

  patcherLogs: z.array(executionLogEntrySchema).optional(),
  patcherErrors: z.array(patcherErrorSchema).optional(),

  currentStep: z.number().int().min(0).max(WORKFLOW_STEPS.length - 1).optional(),
});

export type ConversationState = z.infer<typeof conversationStateSchema>;
export type StateUpdate = Partial<ConversationState>;

/**
 * Validate a stored checkpoint. Fields that fail validation are dropped
 * rather than discarding the whole session.
 */
export function parseConversationState(value: unknown): ConversationState {
  const parsed = conversationStateSchema.safeParse(value);
  if (parsed.success) return parsed.data;

  if (typeof value !== "object" || value === null) return {};
  const state: Record<string, unknown> = {};
  const shape: Record<string, z.ZodTypeAny> = conversationStateSchema.shape;
  for (const [key, fieldValue] of Object.entries(value)) {
    const fieldSchema = shape[key];
    if (!fieldSchema) continue;
    const field = fieldSchema.safeParse(fieldValue);
    if (field.success) state[key] = field.data;
  }
  console.warn(`[Assistant] Dropped invalid checkpoint fields: ${parsed.error.issues.map(i => i.path.join(".")).join(", ")}`);
  return conversationStateSchema.parse(state);
}

/**
 * Merge a handler's update over the state. Undefined values leave the field
 * as it was; any other value replaces it.
 */
export function applyStateUpdate(state: ConversationState, update: StateUpdate): ConversationState {
  const next: ConversationState = { ...state };
  for (const [key, value] of Object.entries(update)) {
    if (value !== undefined) Object.assign(next, { [key]: value });
  }
  return next;
}

export function stepName(step: number | undefined): WorkflowStepName {
  return WORKFLOW_STEPS[step ?? 0] ?? WORKFLOW_STEPS[0];
}

/**
 * Overwrites for everything tied to the previously selected vulnerability:
 * advisory data, the tracked issue, the plan and the patch history.
 */
export function vulnerabilityReset(): StateUpdate {
  return {
    cveData: [],
    csafData: null,
    cveSummary: "",
    csafSummary: "",
    epicKey: "",
    storyKey: "",
    remediationPlan: {},
    planVulnId: "",
    patcherLogs: [],
    patcherErrors: [],
  };
}
