/**
 * Patch — executes the remediation plan on the target host.
 *
 * Order: every pre-check, then check packages → apply remediation → verify
 * fix. The rollback step runs when apply or verify ends in error. Each step
 * goes through the Step Executor, so failing commands are repaired and retried
 * before they are reported.
 */

import { buildPatchReport, humanizeStepName, type ReportItem } from "../../remediation/patchReport";
import { EXECUTION_STAGES, isEmptyPlan, type PlanStep, type RemediationPlan } from "../../remediation/remediationPlan";
import { executeStep, type ExecutionLogEntry, type StepResult } from "../../remediation/stepExecutor";
import { VULN_ID_COLUMN } from "../../vulnData/vulnerabilityTable";
import { WorkflowStep, type PatcherError } from "../conversationState";
import type { Handler, TurnContext } from "../services";

const PRE_CHECK_SUGGESTION = "Review system requirements and environment configuration.";
const PRE_CHECK_REASONING = "Pre-check validation failed. Ensure system meets requirements.";
const STEP_SUGGESTION = "Review command and system state.";
const STEP_REASONING = "Step execution failed after retries.";
const ROLLBACK_SUGGESTION = "Rollback did not complete; restore the host manually before retrying.";

const ROLLBACK_TRIGGERS = new Set(["applyRemediation", "verifyFix"]);

/** "checkPackages" → "check_packages" */
function toStepName(stage: string): string {
  return stage.replace(/([a-z])([A-Z])/g, "$1_$2").toLowerCase();
}

function finalCommand(log: ExecutionLogEntry): string {
  return log.attempts[log.attempts.length - 1]?.command ?? log.command;
}

function hasExecutableSteps(plan: RemediationPlan): boolean {
  return (
    Object.values(plan.preChecks ?? {}).some(check => check.command) ||
    EXECUTION_STAGES.some(stage => Boolean(plan[stage]?.command))
  );
}

// The plan file is read only while the session has never held a plan
async function loadPlan(ctx: TurnContext): Promise<RemediationPlan | null> {
  const { remediationPlan } = ctx.state;
  if (remediationPlan) return isEmptyPlan(remediationPlan) ? null : remediationPlan;
  try {
    return await ctx.services.planStore.load();
  } catch (err) {
    console.error(`[Patcher] Failed to load plan from ${ctx.services.planStore.location}: ${(err as Error).message}`);
    return null;
  }
}

interface PatchRun {
  logs: ExecutionLogEntry[];
  errors: PatcherError[];
  report: ReportItem[];
  currentStep: number;
}

export const patchVulnerability: Handler = async ctx => {
  console.log("[Assistant] Patching vulnerability");
  const { state, services } = ctx;

  const plan = await loadPlan(ctx);
  if (!plan) {
    return { output: "No remediation plan found. Please generate a plan first.", ok: false };
  }

  const vulnId = state.vulnData?.[VULN_ID_COLUMN] ?? state.vulnId;
  if (state.remediationPlan && state.planVulnId && vulnId && state.planVulnId !== vulnId) {
    return {
      output: `The remediation plan was generated for Vuln ID ${state.planVulnId}, not ${vulnId}. Run \`Generate plan\` for the current vulnerability first.`,
      ok: false,
    };
  }
  if (!hasExecutableSteps(plan)) {
    return {
      output: "The remediation plan has no executable steps. Run `Generate plan` or add commands to the plan first.",
      ok: false,
    };
  }

  const run: PatchRun = { logs: [], errors: [], report: [], currentStep: WorkflowStep.PRE_CHECKS };
  const execute = (stepName: string, step: PlanStep): Promise<StepResult> =>
    executeStep(
      stepName,
      step,
      { shell: services.shell, model: services.model },
      { maxRetries: services.settings.maxRetries, cveSummary: state.cveSummary, csafSummary: state.csafSummary }
    );
  const record = (label: string, result: StepResult) => {
    run.logs.push(result.log);
    run.report.push({
      step: label,
      command: finalCommand(result.log),
      status: result.log.status,
      output: result.output ?? result.log.output ?? "",
      attempts: result.log.attempts.length,
    });
  };

  for (const [checkName, check] of Object.entries(plan.preChecks ?? {})) {
    if (!check.command) continue;
    const stepName = `pre_check_${checkName}`;
    const result = await execute(stepName, check);
    record(`Pre-check: ${checkName}`, result);
    if (!result.success) {
      run.errors.push({
        step: stepName,
        error: result.error ?? "Pre-check failed",
        suggestion: PRE_CHECK_SUGGESTION,
        reasoning: PRE_CHECK_REASONING,
      });
    }
  }

  let rollbackNeeded = false;
  for (const stage of EXECUTION_STAGES) {
    const step = plan[stage];
    if (!step?.command) continue;
    run.currentStep = stage === "verifyFix" ? WorkflowStep.VERIFY : WorkflowStep.PATCH;

    const stepName = toStepName(stage);
    const result = await execute(stepName, step);
    record(humanizeStepName(stepName), result);
    if (!result.success) {
      run.errors.push({
        step: stepName,
        error: result.error ?? "Step failed",
        suggestion: result.log.analysis || STEP_SUGGESTION,
        reasoning: STEP_REASONING,
      });
    }
    if (result.log.status === "error" && ROLLBACK_TRIGGERS.has(stage)) rollbackNeeded = true;
  }

  if (rollbackNeeded && plan.rollbackPlan?.command) {
    console.warn("[Patcher] Remediation failed, running rollback plan");
    const result = await execute("rollback_plan", plan.rollbackPlan);
    record("Rollback Plan", result);
    if (!result.success) {
      run.errors.push({
        step: "rollback_plan",
        error: result.error ?? "Rollback failed",
        suggestion: ROLLBACK_SUGGESTION,
        reasoning: STEP_REASONING,
      });
    }
  }

  const header: string[] = [];
  if (vulnId) header.push(`**Vulnerability ID:** ${vulnId}`);
  if (state.storyKey) header.push(`**JIRA Story:** ${state.storyKey}`);

  let output = buildPatchReport(run.report, run.errors, header);
  run.currentStep = run.errors.length === 0 ? WorkflowStep.DONE : WorkflowStep.REPORT;

  if (state.storyKey && services.issues) {
    try {
      await services.issues.addComment(state.storyKey, output);
      output += `Report added to JIRA story ${state.storyKey}.\n`;
    } catch (err) {
      console.warn(`[Patcher] Could not comment on ${state.storyKey}: ${(err as Error).message}`);
    }
  }

  console.log(`[Patcher] Run finished: ${run.report.length} step(s), ${run.errors.length} error(s)`);
  return {
    output,
    update: {
      remediationPlan: plan,
      patcherLogs: [...(state.patcherLogs ?? []), ...run.logs],
      patcherErrors: run.errors,
      currentStep: run.currentStep,
    },
  };
};
