import { describe, it, expect } from "vitest";
import type { RemediationPlan } from "../../remediation/remediationPlan";
import type { ExecutionLogEntry } from "../../remediation/stepExecutor";
import {
  createTestServices,
  FakeIssueTracker,
  FakeShell,
  MemoryPlanStore,
  SAMPLE_ROW,
  ScriptedModel,
  turnContext,
} from "../testServices";
import { patchVulnerability } from "./patcher";

const ACCEPTED = JSON.stringify({ success: true, needs_retry: false, updated_command: "", reason: "as expected" });

const fullPlan: RemediationPlan = {
  preChecks: { disk: { command: "df -h /" } },
  checkPackages: { command: "rpm -q openssl" },
  applyRemediation: { command: "yum update -y openssl", type: "patch" },
  verifyFix: { command: "rpm -q openssl --last" },
  rollbackPlan: { command: "yum history undo last -y" },
};

const earlierLog: ExecutionLogEntry = {
  step: "check_packages",
  command: "rpm -q openssl",
  description: "",
  status: "success",
  attempts: [],
};

const noRetries = { maxRetries: 0, autoTrackIssues: false };

describe("patchVulnerability", () => {
  it("runs pre-checks and then every stage in order", async () => {
    const model = new ScriptedModel().on("step-analysis", ACCEPTED, ACCEPTED, ACCEPTED, ACCEPTED);
    const shell = new FakeShell();

    const result = await patchVulnerability(
      turnContext(createTestServices({ model, shell }), {
        intent: "PATCH_VULN",
        state: { vulnData: SAMPLE_ROW, remediationPlan: fullPlan },
      })
    );

    expect(shell.commands).toEqual(["df -h /", "rpm -q openssl", "yum update -y openssl", "rpm -q openssl --last"]);
    expect(result.update?.patcherLogs?.map(log => log.step)).toEqual([
      "pre_check_disk",
      "check_packages",
      "apply_remediation",
      "verify_fix",
    ]);
    expect(result.update?.patcherErrors).toEqual([]);
    expect(result.update?.currentStep).toBe(9);
    expect(
      result.output.startsWith(
        "# Vulnerability Patching Execution Report\n\n**Vulnerability ID:** 241573\n\n1. **Pre-check: disk**\n"
      )
    ).toBe(true);
    expect(result.output).toContain("4. **Verify Fix**\n   - Command: `rpm -q openssl --last`\n");
    expect(result.output).not.toContain("Rollback Plan");
  });

  it("loads the saved plan and appends to earlier logs", async () => {
    const plan: RemediationPlan = { checkPackages: { command: "rpm -q openssl" } };
    const model = new ScriptedModel().on("step-analysis", ACCEPTED);

    const result = await patchVulnerability(
      turnContext(createTestServices({ model, planStore: new MemoryPlanStore(plan) }), {
        state: { patcherLogs: [earlierLog] },
      })
    );

    expect(result.output).toBe(
      "# Vulnerability Patching Execution Report\n\n" +
        "1. **Check Packages**\n   - Command: `rpm -q openssl`\n   - Status: success\n   - SSH Output:\n```\nok\n```\n\n"
    );
    expect(result.update?.remediationPlan).toEqual(plan);
    expect(result.update?.patcherLogs).toHaveLength(2);
    expect(result.update?.patcherLogs?.[0]).toEqual(earlierLog);
  });

  it("asks for a plan when there is none", async () => {
    const result = await patchVulnerability(turnContext(createTestServices()));
    expect(result).toEqual({ output: "No remediation plan found. Please generate a plan first.", ok: false });
  });

  it("refuses a plan without executable steps", async () => {
    const shell = new FakeShell();
    const result = await patchVulnerability(
      turnContext(createTestServices({ shell }), {
        state: { vulnData: SAMPLE_ROW, remediationPlan: { productionReport: { templateFields: ["notes"] } } },
      })
    );

    expect(result).toEqual({
      output: "The remediation plan has no executable steps. Run `Generate plan` or add commands to the plan first.",
      ok: false,
    });
    expect(shell.commands).toEqual([]);
  });

  it("refuses a plan generated for another vulnerability", async () => {
    const shell = new FakeShell();
    const result = await patchVulnerability(
      turnContext(createTestServices({ shell }), {
        state: { vulnId: "241573", vulnData: SAMPLE_ROW, remediationPlan: fullPlan, planVulnId: "241580" },
      })
    );

    expect(result).toEqual({
      output:
        "The remediation plan was generated for Vuln ID 241580, not 241573. Run `Generate plan` for the current vulnerability first.",
      ok: false,
    });
    expect(shell.commands).toEqual([]);
  });

  it("does not fall back to the plan file once the session plan was cleared", async () => {
    const shell = new FakeShell();
    const planStore = new MemoryPlanStore(fullPlan);

    const result = await patchVulnerability(
      turnContext(createTestServices({ shell, planStore }), {
        state: { vulnData: SAMPLE_ROW, remediationPlan: {} },
      })
    );

    expect(result).toEqual({ output: "No remediation plan found. Please generate a plan first.", ok: false });
    expect(shell.commands).toEqual([]);
  });

  it("rolls back a failed remediation and comments the report on the story", async () => {
    const model = new ScriptedModel().on("step-analysis", ACCEPTED, ACCEPTED, ACCEPTED);
    const shell = new FakeShell(command => {
      if (command.startsWith("yum update")) throw new Error("No package openssl available");
      return "ok";
    });
    const issues = new FakeIssueTracker();
    const plan: RemediationPlan = { ...fullPlan, preChecks: undefined };

    const result = await patchVulnerability(
      turnContext(createTestServices({ model, shell, issues, settings: noRetries }), {
        state: { vulnData: SAMPLE_ROW, storyKey: "VULN-102", remediationPlan: plan },
      })
    );

    expect(shell.commands).toEqual([
      "rpm -q openssl",
      "yum update -y openssl",
      "rpm -q openssl --last",
      "yum history undo last -y",
    ]);
    expect(result.update?.patcherErrors).toEqual([
      {
        step: "apply_remediation",
        error: "No package openssl available",
        suggestion: "Review command and system state.",
        reasoning: "Step execution failed after retries.",
      },
    ]);
    expect(result.update?.currentStep).toBe(8);
    expect(result.output).toContain(
      "## Errors and Resolutions\n\n- **apply_remediation**: No package openssl available\n" +
        "  - Suggestion: Review command and system state.\n\n"
    );
    expect(result.output).toContain("4. **Rollback Plan**\n");
    expect(result.output.endsWith("Report added to JIRA story VULN-102.\n")).toBe(true);
    expect(issues.comments).toHaveLength(1);
    expect(issues.comments[0]?.key).toBe("VULN-102");
    expect(result.output.startsWith(issues.comments[0]?.body ?? "-")).toBe(true);
  });

  it("uses the model's verdict as the suggestion for a rejected verification", async () => {
    const rejected = JSON.stringify({ success: false, needs_retry: false, reason: "openssl is still at the old build" });
    const model = new ScriptedModel().on("step-analysis", rejected, ACCEPTED);
    const plan: RemediationPlan = { verifyFix: fullPlan.verifyFix, rollbackPlan: fullPlan.rollbackPlan };

    const result = await patchVulnerability(
      turnContext(createTestServices({ model, settings: noRetries }), { state: { remediationPlan: plan } })
    );

    expect(result.update?.patcherErrors).toEqual([
      {
        step: "verify_fix",
        error: "openssl is still at the old build",
        suggestion: "openssl is still at the old build",
        reasoning: "Step execution failed after retries.",
      },
    ]);
    expect(result.update?.patcherLogs?.map(log => log.step)).toEqual(["verify_fix", "rollback_plan"]);
  });

  it("flags failing pre-checks with environment guidance", async () => {
    const shell = new FakeShell(() => {
      throw new Error("This system is not registered");
    });
    const plan: RemediationPlan = { preChecks: { repos: { command: "yum repolist" } } };

    const result = await patchVulnerability(
      turnContext(createTestServices({ shell, settings: noRetries }), { state: { remediationPlan: plan } })
    );

    expect(result.update?.patcherErrors).toEqual([
      {
        step: "pre_check_repos",
        error: "This system is not registered",
        suggestion: "Review system requirements and environment configuration.",
        reasoning: "Pre-check validation failed. Ensure system meets requirements.",
      },
    ]);
    expect(result.update?.currentStep).toBe(8);
  });
});
