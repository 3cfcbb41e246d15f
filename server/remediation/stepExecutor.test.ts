import { describe, it, expect, vi } from "vitest";
import { ScriptedModel } from "../assistant/testServices";
import type { CommandRunner } from "../ssh/sshClient";
import { executeStep } from "./stepExecutor";

const ACCEPTED = JSON.stringify({ success: true, needs_retry: false, updated_command: "", reason: "Output matches" });

function shellFrom(run: (command: string) => Promise<string>) {
  const shell = { run: vi.fn(run) };
  return shell satisfies CommandRunner;
}

describe("executeStep", () => {
  it("succeeds after exactly one attempt when the command succeeds", async () => {
    const shell = shellFrom(async () => "openssl-3.0.7-27.el9");
    const model = new ScriptedModel().on("step-analysis", ACCEPTED);

    const result = await executeStep("check_packages", { command: "rpm -q openssl" }, { shell, model });

    expect(result.success).toBe(true);
    expect(result.output).toBe("openssl-3.0.7-27.el9");
    expect(result.log.status).toBe("success");
    expect(result.log.attempts).toHaveLength(1);
    expect(shell.run).toHaveBeenCalledTimes(1);
  });

  it("succeeds on the third attempt after two failures, using the repaired commands", async () => {
    let calls = 0;
    const shell = shellFrom(async () => {
      calls++;
      if (calls < 3) throw new Error(`exit status 1 (call ${calls})`);
      return "patched";
    });
    const model = new ScriptedModel()
      .on(
        "step-resolution",
        JSON.stringify({ updated_command: "dnf update -y openssl", reason: "yum missing" }),
        JSON.stringify({ updated_command: "sudo dnf update -y openssl", reason: "needs root" })
      )
      .on("step-analysis", ACCEPTED);

    const result = await executeStep("apply_remediation", { command: "yum update -y openssl" }, { shell, model });

    expect(result.success).toBe(true);
    expect(result.log.status).toBe("success");
    expect(result.log.attempts.map(a => a.command)).toEqual([
      "yum update -y openssl",
      "dnf update -y openssl",
      "sudo dnf update -y openssl",
    ]);
    expect(result.log.attempts.map(a => a.status)).toEqual(["error", "error", "success"]);
  });

  it("fails after exactly maxRetries + 1 attempts when the command always fails", async () => {
    const shell = shellFrom(async () => {
      throw new Error("connection reset");
    });
    const model = new ScriptedModel();

    const result = await executeStep("verify_fix", { command: "rpm -q openssl" }, { shell, model }, { maxRetries: 2 });

    expect(result.success).toBe(false);
    expect(result.log.status).toBe("error");
    expect(result.log.attempts).toHaveLength(3);
    expect(result.error).toBe("connection reset");
    expect(shell.run).toHaveBeenCalledTimes(3);
  });

  it("honours a custom retry limit", async () => {
    const shell = shellFrom(async () => {
      throw new Error("exit status 2");
    });

    const result = await executeStep(
      "verify_fix",
      { command: "false" },
      { shell, model: new ScriptedModel() },
      { maxRetries: 4 }
    );

    expect(result.log.attempts).toHaveLength(5);
  });

  it("retries the same command when the model cannot suggest a fix", async () => {
    let calls = 0;
    const shell = shellFrom(async () => {
      calls++;
      if (calls === 1) throw new Error("temporary failure");
      return "done";
    });
    const model = new ScriptedModel().on("step-resolution", "not json").on("step-analysis", ACCEPTED);

    const result = await executeStep("check_packages", { command: "rpm -q openssl" }, { shell, model });

    expect(result.success).toBe(true);
    expect(shell.run.mock.calls.map(call => call[0])).toEqual(["rpm -q openssl", "rpm -q openssl"]);
    expect(result.log.attempts[0].resolutionError).toBeDefined();
  });

  it("treats an unusable analysis as success", async () => {
    const shell = shellFrom(async () => "some output");
    const model = new ScriptedModel().on("step-analysis", "I think it worked");

    const result = await executeStep("check_packages", { command: "rpm -q openssl" }, { shell, model });

    expect(result.success).toBe(true);
    expect(result.log.status).toBe("success");
    expect(result.log.attempts[0].analysisError).toBeDefined();
  });

  it("reruns with the command the analysis asks for", async () => {
    const shell = shellFrom(async command => `ran ${command}`);
    const model = new ScriptedModel().on(
      "step-analysis",
      JSON.stringify({ success: false, needs_retry: true, updated_command: "rpm -qa | grep openssl", reason: "narrow" }),
      ACCEPTED
    );

    const result = await executeStep("check_packages", { command: "rpm -qa" }, { shell, model });

    expect(result.success).toBe(true);
    expect(result.output).toBe("ran rpm -qa | grep openssl");
    expect(result.log.attempts).toHaveLength(2);
  });

  it("ends in partial_success when a retry is wanted but no attempts remain", async () => {
    const shell = shellFrom(async () => "warning: cache stale");
    const model = new ScriptedModel().on(
      "step-analysis",
      JSON.stringify({ success: true, needs_retry: true, updated_command: "yum clean all", reason: "Stale cache" })
    );

    const result = await executeStep("check_packages", { command: "yum list openssl" }, { shell, model }, { maxRetries: 0 });

    expect(result.success).toBe(true);
    expect(result.log.status).toBe("partial_success");
    expect(result.log.analysis).toBe("Stale cache");
    expect(result.error).toBeUndefined();
  });

  it("ends in error when the analysis rejects the output", async () => {
    const shell = shellFrom(async () => "openssl-3.0.1");
    const model = new ScriptedModel().on(
      "step-analysis",
      JSON.stringify({ success: false, needs_retry: false, updated_command: "", reason: "Old version still installed" })
    );

    const result = await executeStep(
      "verify_fix",
      { command: "rpm -q openssl", expectedResult: "openssl-3.0.7" },
      { shell, model }
    );

    expect(result.success).toBe(false);
    expect(result.log.status).toBe("error");
    expect(result.error).toBe("Old version still installed");
    expect(model.callsFor("step-analysis")[0]).toContain("Expected: openssl-3.0.7");
  });

  it("accepts string booleans in the analysis", async () => {
    const shell = shellFrom(async () => "ok");
    const model = new ScriptedModel().on("step-analysis", '{"success": "true", "needs_retry": "false", "reason": "fine"}');

    const result = await executeStep("check_packages", { command: "true" }, { shell, model });

    expect(result.log.status).toBe("success");
    expect(result.log.attempts[0].analysis).toEqual({
      success: true,
      needsRetry: false,
      updatedCommand: "",
      reason: "fine",
    });
  });
});
