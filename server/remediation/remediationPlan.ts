/**
 * Remediation plan model — the document produced by the planner, edited by
 * operator updates, and executed stage by stage by the patcher.
 */

import { z } from "zod";

// ── Schema ──────────────────────────────────────────────────────────────────

export const planStepSchema = z.object({
  command: z.string().default(""),
  description: z.string().optional(),
  expectedResult: z.string().optional(),
  /** patch | update | config */
  type: z.string().optional(),
});

export const productionReportSchema = z.object({
  templateFields: z.array(z.string()).default([]),
  description: z.string().optional(),
});

export const remediationPlanSchema = z.object({
  preChecks: z.record(z.string(), planStepSchema).optional(),
  checkPackages: planStepSchema.optional(),
  applyRemediation: planStepSchema.optional(),
  verifyFix: planStepSchema.optional(),
  rollbackPlan: planStepSchema.optional(),
  productionReport: productionReportSchema.optional(),
});

export type PlanStep = z.infer<typeof planStepSchema>;
export type RemediationPlan = z.infer<typeof remediationPlanSchema>;
export type PlanStageName = keyof RemediationPlan;

/** Single-step stages, in execution order. */
export const EXECUTION_STAGES = ["checkPackages", "applyRemediation", "verifyFix"] as const;
export type ExecutionStage = (typeof EXECUTION_STAGES)[number];

export const STAGE_LABELS: Record<PlanStageName, string> = {
  preChecks: "Pre-checks",
  checkPackages: "Check Packages",
  applyRemediation: "Apply Remediation",
  verifyFix: "Verify Fix",
  rollbackPlan: "Rollback Plan",
  productionReport: "Production Report",
};

/** A partial plan as supplied by the operator: any stage may be null to remove it. */
export type PlanUpdate = Record<string, unknown>;

// ── Key normalization ───────────────────────────────────────────────────────

const KEY_ALIASES: Record<string, string> = {
  expected: "expectedResult",
  rollback: "rollbackPlan",
  report: "productionReport",
};

function toCamelCase(key: string): string {
  const camel = key.replace(/[_-]+([a-zA-Z0-9])/g, (_, ch: string) => ch.toUpperCase());
  return KEY_ALIASES[camel] ?? camel;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function camelizeKeys(value: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, inner] of Object.entries(value)) {
    out[toCamelCase(key)] = inner;
  }
  return out;
}

/**
 * Convert a plan written with snake_case keys (`pre_checks`, `expected_result`)
 * to the camelCase shape. Names of individual pre-checks are left untouched.
 */
export function normalizePlanKeys(value: unknown): unknown {
  if (!isPlainObject(value)) return value;

  const out: Record<string, unknown> = {};
  for (const [rawKey, stage] of Object.entries(value)) {
    const key = toCamelCase(rawKey);
    if (key === "preChecks" && isPlainObject(stage)) {
      const checks: Record<string, unknown> = {};
      for (const [checkName, check] of Object.entries(stage)) {
        checks[checkName] = isPlainObject(check) ? camelizeKeys(check) : check;
      }
      out[key] = checks;
    } else {
      out[key] = isPlainObject(stage) ? camelizeKeys(stage) : stage;
    }
  }
  return out;
}

/** True when there is no plan or every stage has been removed. */
export function isEmptyPlan(plan: RemediationPlan | null | undefined): boolean {
  return !plan || Object.keys(plan).length === 0;
}

/**
 * Validate an untrusted plan document (model output, plan file, operator input).
 */
export function parseRemediationPlan(value: unknown): z.SafeParseReturnType<unknown, RemediationPlan> {
  return remediationPlanSchema.safeParse(normalizePlanKeys(value));
}

// ── Merge ───────────────────────────────────────────────────────────────────

function mergeObjects(base: unknown, changes: Record<string, unknown>): Record<string, unknown> {
  const merged: Record<string, unknown> = isPlainObject(base) ? { ...base } : {};
  for (const [key, value] of Object.entries(changes)) {
    if (value === null) {
      delete merged[key];
    } else {
      merged[key] = value;
    }
  }
  return merged;
}

/**
 * Merge an operator's partial update into an existing plan.
 *
 * - stages absent from the update are kept as they are
 * - a stage set to null is removed
 * - step stages merge field by field; pre-checks merge check by check
 * - anything else replaces the existing value
 *
 * Throws when the merged document is not a valid plan.
 */
export function mergePlanUpdate(existing: RemediationPlan | null | undefined, update: PlanUpdate): RemediationPlan {
  const normalized = normalizePlanKeys(update);
  const changes = isPlainObject(normalized) ? normalized : {};
  const merged: Record<string, unknown> = { ...(existing ?? {}) };

  for (const [stage, value] of Object.entries(changes)) {
    if (value === null) {
      delete merged[stage];
      continue;
    }

    if (stage === "preChecks" && isPlainObject(value)) {
      const checks = mergeObjects(merged.preChecks, {});
      for (const [checkName, check] of Object.entries(value)) {
        if (check === null) {
          delete checks[checkName];
        } else if (isPlainObject(check)) {
          checks[checkName] = mergeObjects(checks[checkName], check);
        } else {
          checks[checkName] = check;
        }
      }
      merged.preChecks = checks;
    } else if (isPlainObject(value)) {
      merged[stage] = mergeObjects(merged[stage], value);
    } else {
      merged[stage] = value;
    }
  }

  const parsed = remediationPlanSchema.safeParse(merged);
  if (!parsed.success) {
    throw new Error(`Merged remediation plan is invalid: ${parsed.error.issues[0]?.message ?? "unknown error"}`);
  }
  return parsed.data;
}

/**
 * Names of the stages whose content differs between two plans.
 */
export function changedStages(before: RemediationPlan | null | undefined, after: RemediationPlan): string[] {
  const keys = new Set([...Object.keys(before ?? {}), ...Object.keys(after)]);
  const changed: string[] = [];
  for (const key of Array.from(keys)) {
    const a = before ? JSON.stringify(before[key as PlanStageName]) : undefined;
    const b = JSON.stringify(after[key as PlanStageName]);
    if (a !== b) changed.push(key);
  }
  return changed;
}
