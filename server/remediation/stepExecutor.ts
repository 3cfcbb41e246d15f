/**
 * Step Executor — runs one remediation step over the remote shell and lets the
 * model judge the output or repair a failing command.
 *
 * pending → execute → analyze → (retry | done). A step gets at most
 * `maxRetries + 1` attempts.
 */

import { z } from "zod";
import type { ModelClient } from "../llm/llmService";
import { parseModelOutput } from "../llm/modelJson";
import type { CommandRunner } from "../ssh/sshClient";
import type { PlanStep } from "./remediationPlan";

// ── Types ───────────────────────────────────────────────────────────────────

export type StepStatus = "pending" | "success" | "partial_success" | "error";

export interface OutputAnalysis {
  success: boolean;
  needsRetry: boolean;
  updatedCommand: string;
  reason: string;
}

export interface CommandResolution {
  updatedCommand: string;
  reason: string;
}

export interface StepAttempt {
  attempt: number;
  command: string;
  status: "success" | "error";
  output?: string;
  error?: string;
  analysis?: OutputAnalysis;
  resolution?: CommandResolution;
  analysisError?: string;
  resolutionError?: string;
}

export interface ExecutionLogEntry {
  step: string;
  command: string;
  description: string;
  status: StepStatus;
  attempts: StepAttempt[];
  output?: string;
  error?: string;
  /** Model's reason for the final verdict */
  analysis?: string;
}

export interface StepResult {
  success: boolean;
  log: ExecutionLogEntry;
  output?: string;
  error?: string;
}

export interface StepExecutorDeps {
  shell: CommandRunner;
  model: ModelClient;
}

export interface StepExecutorOptions {
  maxRetries?: number;
  cveSummary?: string;
  csafSummary?: string;
}

export const DEFAULT_MAX_RETRIES = 2;

const SUMMARY_EXCERPT = 500;

// ── Model replies ───────────────────────────────────────────────────────────

const looseBoolean = z.preprocess(
  value => (typeof value === "string" ? value.toLowerCase() === "true" : value),
  z.boolean()
);

const analysisSchema = z
  .object({
    success: looseBoolean.optional(),
    needs_retry: looseBoolean.optional(),
    needsRetry: looseBoolean.optional(),
    updated_command: z.string().nullish(),
    updatedCommand: z.string().nullish(),
    reason: z.string().nullish(),
  })
  .transform(
    (raw): OutputAnalysis => ({
      success: raw.success ?? false,
      needsRetry: raw.needsRetry ?? raw.needs_retry ?? false,
      updatedCommand: (raw.updatedCommand ?? raw.updated_command ?? "").trim(),
      reason: raw.reason ?? "",
    })
  );

const resolutionSchema = z
  .object({
    updated_command: z.string().nullish(),
    updatedCommand: z.string().nullish(),
    reason: z.string().nullish(),
  })
  .transform(
    (raw): CommandResolution => ({
      updatedCommand: (raw.updatedCommand ?? raw.updated_command ?? "").trim(),
      reason: raw.reason ?? "",
    })
  );

function excerpt(summary: string | undefined): string {
  return summary ? summary.slice(0, SUMMARY_EXCERPT) : "N/A";
}

function buildAnalysisPrompt(stepName: string, command: string, expected: string, output: string, cveSummary?: string): string {
  return [
    `Step: ${stepName}`,
    `Command: ${command}`,
    `Expected: ${expected}`,
    `Output: ${output}`,
    `CVE Summary: ${excerpt(cveSummary)}`,
    "",
    'Analyze if the output meets expectations. Reply with ONLY JSON: {"success": true/false, "needs_retry": true/false, "updated_command": "<new command or empty>", "reason": "<brief reason>"}',
  ].join("\n");
}

function buildResolutionPrompt(stepName: string, command: string, error: string, options: StepExecutorOptions): string {
  return [
    `Step: ${stepName}`,
    `Failed Command: ${command}`,
    `Error: ${error}`,
    `CVE Summary: ${excerpt(options.cveSummary)}`,
    `CSAF Summary: ${excerpt(options.csafSummary)}`,
    "",
    'Suggest a fixed command. Reply with ONLY JSON: {"updated_command": "<new command>", "reason": "<brief reason>"}',
  ].join("\n");
}

async function askForJson<T>(
  model: ModelClient,
  prompt: string,
  caller: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<T> {
  const raw = await model.ask(prompt, { caller, json: true });
  const parsed = parseModelOutput(raw, schema);
  if (!parsed.ok) throw new Error(parsed.error);
  return parsed.value;
}

// ── Executor ────────────────────────────────────────────────────────────────

/**
 * Execute a single plan step with model-guided retries.
 *
 * Terminal outcomes:
 * - `success`: the model accepted the output, or its analysis was unusable
 * - `partial_success`: the command ran but the model asked for a retry it cannot get
 * - `error`: the command kept failing, or the model rejected the output
 */
export async function executeStep(
  stepName: string,
  step: PlanStep,
  deps: StepExecutorDeps,
  options: StepExecutorOptions = {}
): Promise<StepResult> {
  const maxRetries = Math.max(0, options.maxRetries ?? DEFAULT_MAX_RETRIES);
  const maxAttempts = maxRetries + 1;
  const expected = step.expectedResult ?? "";

  console.log(`[Patcher] Executing step: ${stepName}`);

  const log: ExecutionLogEntry = {
    step: stepName,
    command: step.command,
    description: step.description ?? "",
    status: "pending",
    attempts: [],
  };

  let currentCommand = step.command;
  let lastError = "";

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const hasAttemptsLeft = attempt < maxAttempts;

    let output: string;
    try {
      output = await deps.shell.run(currentCommand);
    } catch (err) {
      lastError = (err as Error).message;
      const record: StepAttempt = { attempt, command: currentCommand, status: "error", error: lastError };
      log.attempts.push(record);
      console.warn(`[Patcher] ${stepName} attempt ${attempt} failed: ${lastError}`);

      if (!hasAttemptsLeft) break;

      try {
        const resolution = await askForJson(
          deps.model,
          buildResolutionPrompt(stepName, currentCommand, lastError, options),
          "step-resolution",
          resolutionSchema
        );
        record.resolution = resolution;
        if (resolution.updatedCommand) {
          console.log(`[Patcher] Model suggested updated command: ${resolution.updatedCommand}`);
          currentCommand = resolution.updatedCommand;
        }
      } catch (resolutionErr) {
        record.resolutionError = (resolutionErr as Error).message;
        console.warn(`[Patcher] Resolution failed, retrying same command: ${record.resolutionError}`);
      }
      continue;
    }

    const record: StepAttempt = { attempt, command: currentCommand, status: "success", output };
    log.attempts.push(record);

    let analysis: OutputAnalysis;
    try {
      analysis = await askForJson(
        deps.model,
        buildAnalysisPrompt(stepName, currentCommand, expected, output, options.cveSummary),
        "step-analysis",
        analysisSchema
      );
      record.analysis = analysis;
    } catch (analysisErr) {
      // Command ran; an unusable verdict does not fail the step
      record.analysisError = (analysisErr as Error).message;
      console.warn(`[Patcher] Output analysis failed for ${stepName}: ${record.analysisError}`);
      log.status = "success";
      log.output = output;
      return { success: true, log, output };
    }

    if (analysis.success && !analysis.needsRetry) {
      log.status = "success";
      log.output = output;
      return { success: true, log, output };
    }

    if (analysis.needsRetry && analysis.updatedCommand && hasAttemptsLeft) {
      console.log(`[Patcher] Model requested retry with: ${analysis.updatedCommand}`);
      currentCommand = analysis.updatedCommand;
      continue;
    }

    log.status = analysis.success ? "partial_success" : "error";
    log.output = output;
    log.analysis = analysis.reason;
    if (!analysis.success) {
      log.error = analysis.reason || "Output did not meet expectations";
    }
    return { success: analysis.success, log, output, error: log.error };
  }

  log.status = "error";
  log.error = lastError || "Max retries exceeded";
  console.error(`[Patcher] ${stepName} failed after ${log.attempts.length} attempt(s): ${log.error}`);
  return { success: false, log, error: log.error };
}
